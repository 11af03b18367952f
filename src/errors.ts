/**
 * Pipeline Errors
 *
 * Per-item failures (AdapterTransient, ParseError) are absorbed by the stage
 * that hits them. Run-level failures (AdapterUnavailable, StorageFailure,
 * SessionCancelled) end the current extraction session as failed.
 */

export type PainRadarErrorCode =
  | 'STORAGE_FAILURE'
  | 'ADAPTER_UNAVAILABLE'
  | 'ADAPTER_TRANSIENT'
  | 'PARSE_ERROR'
  | 'SESSION_CANCELLED'
  | 'SESSION_CONFLICT'
  | 'INVALID_SESSION_TRANSITION'
  | 'SESSION_NOT_FOUND';

export class PainRadarError extends Error {
  readonly code: PainRadarErrorCode;

  constructor(code: PainRadarErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class StorageFailure extends PainRadarError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_FAILURE', message, options);
  }
}

export class AdapterUnavailable extends PainRadarError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ADAPTER_UNAVAILABLE', message, options);
  }
}

export class AdapterTransient extends PainRadarError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ADAPTER_TRANSIENT', message, options);
  }
}

export class ParseError extends PainRadarError {
  /** First characters of the reply that failed to parse */
  readonly excerpt: string;

  constructor(message: string, excerpt: string = '') {
    super('PARSE_ERROR', message);
    this.excerpt = excerpt.slice(0, 100);
  }
}

export class SessionCancelled extends PainRadarError {
  constructor(message: string = 'Extraction session cancelled') {
    super('SESSION_CANCELLED', message);
  }
}

export class SessionConflict extends PainRadarError {
  constructor(activeSessionId?: string) {
    super(
      'SESSION_CONFLICT',
      activeSessionId
        ? `Extraction session ${activeSessionId} is still in progress`
        : 'An extraction session is already running'
    );
  }
}

export class InvalidSessionTransition extends PainRadarError {
  constructor(sessionId: string) {
    super('INVALID_SESSION_TRANSITION', `Extraction session ${sessionId} is not in progress`);
  }
}

export class SessionNotFound extends PainRadarError {
  constructor(sessionId: string) {
    super('SESSION_NOT_FOUND', `Extraction session ${sessionId} not found`);
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/**
 * Race an adapter call against a timer. The timer is cleared either way.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new AdapterTransient(message)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
