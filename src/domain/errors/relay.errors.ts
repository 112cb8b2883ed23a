/**
 * Error hierarchy for the relay.
 *
 * Every failure crossing a component boundary is a RelayError carrying a
 * stable `code`. Front ends switch on the code, never on message text.
 */

export class RelayError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string = 'RELAY_ERROR', context?: Record<string, unknown>) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    this.context = context;
  }
}

export type TransportErrorKind = 'unreachable' | 'timeout';

/** The daemon could not be reached, or did not answer in time. Retryable. */
export class TransportError extends RelayError {
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, context?: Record<string, unknown>) {
    super(message, kind === 'timeout' ? 'TIMEOUT' : 'UNREACHABLE', context);
    this.name = 'TransportError';
    this.kind = kind;
  }
}

/** Secret rejected by the daemon. Fatal until the secret is reconfigured. */
export class AuthError extends RelayError {
  constructor(message = 'RPC secret rejected by the daemon') {
    super(message, 'UNAUTHORIZED');
    this.name = 'AuthError';
  }
}

export type RemoteErrorCode = 'REMOTE_ERROR' | 'INVALID_RESPONSE';

/** The daemon answered with an error object, or with a result we cannot read. */
export class RemoteError extends RelayError {
  readonly rpcCode?: number;

  constructor(
    message: string,
    options: { code?: RemoteErrorCode; rpcCode?: number; context?: Record<string, unknown> } = {},
  ) {
    super(message, options.code ?? 'REMOTE_ERROR', options.context);
    this.name = 'RemoteError';
    this.rpcCode = options.rpcCode;
  }
}

export type LifecycleErrorCode =
  | 'ALREADY_INSTALLED'
  | 'NOT_INSTALLED'
  | 'MISSING_ARTIFACTS'
  | 'ALREADY_RUNNING'
  | 'OPERATION_IN_PROGRESS'
  | 'INVALID_STATE'
  | 'START_TIMEOUT'
  | 'START_CANCELLED'
  | 'STOP_FAILED'
  | 'HOST_FAILURE';

/** A lifecycle operation was refused or failed. Service state is left consistent. */
export class LifecycleError extends RelayError {
  declare readonly code: LifecycleErrorCode;

  constructor(code: LifecycleErrorCode, message: string, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'LifecycleError';
  }
}

export type UploadErrorCode = 'UPLOAD_RETRYABLE' | 'UPLOAD_PERMANENT' | 'UPLOAD_TIMEOUT';

export class UploadError extends RelayError {
  declare readonly code: UploadErrorCode;

  constructor(code: UploadErrorCode, message: string, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'UploadError';
  }

  get retryable(): boolean {
    return this.code !== 'UPLOAD_PERMANENT';
  }
}

/** Bad user input: malformed URI, unknown task id, empty torrent. */
export class ValidationError extends RelayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_INPUT', context);
    this.name = 'ValidationError';
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

export interface ErrorView {
  code: string;
  message: string;
}

/**
 * Render any failure for the chat front end. Unknown errors never leak
 * their message.
 */
export function toErrorView(error: unknown): ErrorView {
  if (isRelayError(error)) {
    return { code: error.code, message: error.message };
  }
  return { code: 'INTERNAL_ERROR', message: 'Internal error' };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
