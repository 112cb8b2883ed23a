/**
 * Everything needed to reach and supervise the one daemon this process owns.
 * Built once at startup and handed to collaborators explicitly.
 */
export interface RpcEndpoint {
  readonly host: string;
  readonly port: number;
  readonly secret: string;
}

export interface DaemonHandle {
  readonly binaryPath: string;
  readonly configPath: string;
  readonly logPath: string;
  readonly downloadDir: string;
  readonly serviceName: string;
  readonly rpc: RpcEndpoint;
}

export function rpcUrl(endpoint: RpcEndpoint): string {
  const host = endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host;
  return `http://${host}:${endpoint.port}/jsonrpc`;
}
