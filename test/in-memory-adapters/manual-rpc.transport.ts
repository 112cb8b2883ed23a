import type {
  RpcRequestEnvelope,
  RpcResponseListener,
  RpcTransportPort,
} from '../../src/application/ports/output/rpc-transport.port';

/**
 * Manual RPC Transport
 * Records requests and lets the test answer them, in any order, by hand.
 */
export class ManualRpcTransport implements RpcTransportPort {
  readonly sent: Array<{ request: RpcRequestEnvelope; signal: AbortSignal }> = [];
  sendError: Error | null = null;
  private readonly listeners: Set<RpcResponseListener> = new Set();

  async send(request: RpcRequestEnvelope, signal: AbortSignal): Promise<void> {
    this.sent.push({ request, signal });
    if (this.sendError) {
      throw this.sendError;
    }
  }

  onResponse(listener: RpcResponseListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // Test helper methods

  request(index: number): RpcRequestEnvelope {
    const entry = this.sent[index];
    if (!entry) {
      throw new Error(`No request #${index} was sent`);
    }
    return entry.request;
  }

  respond(id: string, result: unknown): void {
    this.deliver({ jsonrpc: '2.0', id, result });
  }

  respondError(id: string, code: number, message: string): void {
    this.deliver({ jsonrpc: '2.0', id, error: { code, message } });
  }

  deliver(raw: unknown): void {
    this.listeners.forEach((listener) => listener(raw));
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
