import { Inject, Injectable } from '@nestjs/common';
import type {
  RpcRequestEnvelope,
  RpcResponseListener,
  RpcTransportPort,
} from '../../../application/ports/output/rpc-transport.port';
import { DAEMON_HANDLE } from '../../../application/ports/injection-tokens';
import { type DaemonHandle, rpcUrl } from '../../../domain/value-objects/daemon-handle.vo';
import { RemoteError } from '../../../domain/errors/relay.errors';
import { HttpClientService } from '../../../shared/http/http-client.service';

/**
 * RPC Transport over HTTP POST to `http://host:port/jsonrpc`.
 *
 * The daemon answers errors with a non-2xx status and a JSON-RPC error
 * body, so any JSON object body is handed to the listeners.
 */
@Injectable()
export class HttpRpcTransportAdapter implements RpcTransportPort {
  private readonly listeners: Set<RpcResponseListener> = new Set();
  private readonly url: string;

  constructor(
    private readonly http: HttpClientService,
    @Inject(DAEMON_HANDLE) handle: DaemonHandle,
  ) {
    this.url = rpcUrl(handle.rpc);
  }

  async send(request: RpcRequestEnvelope, signal: AbortSignal): Promise<void> {
    const response = await this.http.post(this.url, request, { signal, maxRetries: 0 });

    if (typeof response.body !== 'object' || response.body === null) {
      throw new RemoteError(`Unexpected HTTP ${response.statusCode} response from the daemon`, {
        code: 'INVALID_RESPONSE',
        context: { method: request.method },
      });
    }

    const body: unknown = response.body;
    this.listeners.forEach((listener) => listener(body));
  }

  onResponse(listener: RpcResponseListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
