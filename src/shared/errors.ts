export type ErrorCode =
  | 'INVALID_PARAMS'
  | 'NOT_FOUND'
  | 'UNKNOWN_SOURCE'
  | 'SOURCE_UNAVAILABLE'
  | 'MALFORMED_IDENTITY'
  | 'INTERNAL_ERROR';

export class NuclideQueryError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public data?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'NuclideQueryError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
    };
  }
}

export function isNuclideQueryError(err: unknown, code?: ErrorCode): err is NuclideQueryError {
  return err instanceof NuclideQueryError && (code === undefined || err.code === code);
}

export function invalidParams(message: string, data?: Record<string, unknown>): NuclideQueryError {
  return new NuclideQueryError('INVALID_PARAMS', message, data);
}

export function notFound(message: string, data?: Record<string, unknown>): NuclideQueryError {
  return new NuclideQueryError('NOT_FOUND', message, data);
}

export function unknownSource(name: string, valid: readonly string[]): NuclideQueryError {
  return new NuclideQueryError(
    'UNKNOWN_SOURCE',
    `Unknown source: ${name}. Valid sources: ${valid.join(', ')}`,
    { source: name, valid: [...valid] }
  );
}

export function sourceUnavailable(source: string, reason: string, data?: Record<string, unknown>): NuclideQueryError {
  return new NuclideQueryError('SOURCE_UNAVAILABLE', `Source ${source} is unavailable: ${reason}`, {
    source,
    ...data,
  });
}

export function malformedIdentity(message: string, data?: Record<string, unknown>): NuclideQueryError {
  return new NuclideQueryError('MALFORMED_IDENTITY', message, data);
}
