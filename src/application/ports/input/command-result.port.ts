import type { ErrorView } from '../../../domain/errors/relay.errors';

/**
 * Outcome of a command as the chat front end sees it. Failures carry a
 * stable code and a message safe to show to the user.
 */
export type CommandResult<T> = { ok: true; value: T } | { ok: false; error: ErrorView };

export function succeeded<T>(value: T): CommandResult<T> {
  return { ok: true, value };
}

export function failed<T>(error: ErrorView): CommandResult<T> {
  return { ok: false, error };
}
