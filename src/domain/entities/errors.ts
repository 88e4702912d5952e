/**
 * Raised when the weather API cannot be reached or answers with
 * something other than a JSON object.
 */
export class WeatherFetchError extends Error {
  constructor(
    public readonly city: string,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'WeatherFetchError';
  }
}

/**
 * Raised when an observation lacks a field the report depends on.
 * Not converted into a Result: it aborts the whole run.
 */
export class MalformedObservationError extends Error {
  constructor(
    public readonly city: string,
    public readonly field: string,
  ) {
    super(`Unexpected weather data for ${city}: missing or invalid ${field}`);
    this.name = 'MalformedObservationError';
  }
}

export type ArchiveErrorReason = 'no-observation' | 'upload-failed';

export class ArchiveError extends Error {
  constructor(
    public readonly city: string,
    public readonly reason: ArchiveErrorReason,
    message: string,
    public readonly key?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ArchiveError';
  }
}

export class BucketEnsureError extends Error {
  constructor(
    public readonly bucket: string | undefined,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BucketEnsureError';
  }
}
