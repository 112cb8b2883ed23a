export interface RpcRequestEnvelope {
  jsonrpc: '2.0';
  id: string;
  method: string;
  params: unknown[];
}

/** Receives every decoded response body, unvalidated. */
export type RpcResponseListener = (response: unknown) => void;

/**
 * RPC Transport Port (Driven Port)
 *
 * `send` resolves once the request is handed off. Responses arrive through
 * the listeners, in any order, and are matched to requests by id.
 */
export interface RpcTransportPort {
  send(request: RpcRequestEnvelope, signal: AbortSignal): Promise<void>;

  /** Returns an unsubscribe function. */
  onResponse(listener: RpcResponseListener): () => void;
}
