import type { CommandResult } from './command-result.port';

export interface RotateRpcSecretCommand {
  /** Generated when omitted. */
  secret?: string;
}

export interface RotateRpcSecretResult {
  secret: string;
  restarted: boolean;
}

/**
 * Rotate RPC Secret Port (Driving Port / Use Case Interface)
 */
export interface RotateRpcSecretPort {
  execute(command?: RotateRpcSecretCommand): Promise<CommandResult<RotateRpcSecretResult>>;
}
