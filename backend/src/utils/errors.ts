export type PlaybackErrorKind =
  | 'sink'
  | 'timeout'
  | 'session_not_found';

export class PlaybackError extends Error {
  readonly kind: PlaybackErrorKind;

  constructor(kind: PlaybackErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = 'PlaybackError';
  }
}

export class SinkError extends PlaybackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('sink', message, options);
    this.name = 'SinkError';
  }
}

export class OperationTimeoutError extends PlaybackError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('timeout', `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
    this.name = 'OperationTimeoutError';
  }
}

/** Raised when a caller addresses a session key the registry has never seen. */
export class SessionNotFoundError extends PlaybackError {
  readonly sessionKey: string;

  constructor(sessionKey: string) {
    super('session_not_found', `No session for key ${sessionKey}`);
    this.sessionKey = sessionKey;
    this.name = 'SessionNotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Races a promise against a timer. The timer is always cleared, so a settled
 * promise never keeps the process alive.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(label, ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
