import type { ReservaError, ReservaErrorOptions } from './types';

/**
 * Wraps an unknown error as a specific ReservaError subclass.
 *
 * @internal
 */
export function wrapAsError<T extends ReservaError<TCode>, TCode extends string>(
  error: unknown,
  ErrorClass: new (message: string, options: ReservaErrorOptions<TCode>) => T,
  options: { code: TCode; context?: Record<string, unknown> }
): T {
  const cause = error instanceof Error ? error : new Error(String(error));
  return new ErrorClass(cause.message, { ...options, cause });
}

/**
 * Best-effort message extraction for values caught from collaborators.
 */
export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
