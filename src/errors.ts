export type BurstloadErrorCode = 'TRANSPORT' | 'CONFIG' | 'SERIALIZATION';

export class BurstloadError extends Error {
  code: BurstloadErrorCode;

  constructor(message: string, code: BurstloadErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BurstloadError';
    this.code = code;
  }
}

/** The HTTP call produced no response at all. */
export class TransportError extends BurstloadError {
  timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, 'TRANSPORT', { cause: options.cause });
    this.name = 'TransportError';
    this.timedOut = options.timedOut ?? false;
  }

  static from(error: unknown, timeoutMs: number): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    if (error instanceof Error && error.name === 'TimeoutError') {
      return new TransportError(`request timed out after ${timeoutMs}ms`, { cause: error, timedOut: true });
    }
    if (error instanceof Error && error.name === 'AbortError') {
      return new TransportError('request aborted', { cause: error });
    }
    if (error instanceof Error) {
      // undici reports the socket-level reason on `cause`
      const reason = error.cause instanceof Error ? `: ${error.cause.message}` : '';
      return new TransportError(`${error.message}${reason}`, { cause: error });
    }
    return new TransportError(String(error), { cause: error });
  }
}

export class ConfigurationError extends BurstloadError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigurationError';
  }
}

export class SerializationError extends BurstloadError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SERIALIZATION', { cause });
    this.name = 'SerializationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
