import type { EngagementError, EngagementErrorKind } from './errors/engagement-error';

/**
 * Outcome of an engagement operation. Expected business conditions come back
 * as `{ ok: false }`; only unexpected storage failures reject the promise.
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: EngagementError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T = never>(
  kind: EngagementErrorKind,
  message: string,
): Result<T> => ({ ok: false, error: { kind, message } });
