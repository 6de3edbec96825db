export class GageError extends Error {
  constructor(message: string, public originalError?: unknown) {
    super(message);
    this.name = 'GageError';
  }
}

/** Network failure or a non-200 answer from an upstream host. */
export class UpstreamUnavailableError extends GageError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    originalError?: unknown
  ) {
    super(message, originalError);
    this.name = 'UpstreamUnavailableError';
  }
}

/** Upstream answered, but not in the DOM/JSON shape we parse. */
export class UpstreamFormatChangedError extends GageError {
  constructor(message: string, originalError?: unknown) {
    super(message, originalError);
    this.name = 'UpstreamFormatChangedError';
  }
}

export class ImageNotFoundError extends GageError {
  constructor(gageId: string) {
    super(`image address not found for ${gageId}`);
    this.name = 'ImageNotFoundError';
  }
}

export class NoDataComputedError extends GageError {
  constructor(message: string) {
    super(message);
    this.name = 'NoDataComputedError';
  }
}

export class CorruptStoredRecordError extends GageError {
  constructor(
    public readonly file: string,
    public readonly line: string
  ) {
    super(`Corrupt line found in ${file}: "${line}"`);
    this.name = 'CorruptStoredRecordError';
  }
}

export class GageNotFoundError extends GageError {
  constructor(gageId: string, gageType: string) {
    super(`Gage not found: ${gageType} ${gageId}`);
    this.name = 'GageNotFoundError';
  }
}

export class UnknownGageTypeError extends GageError {
  constructor(gageType: string) {
    super(`gage_type must be one of USGS, DWR, WYSEO, PRR, VIRTUAL, was passed ${gageType}`);
    this.name = 'UnknownGageTypeError';
  }
}

export class InvalidGageConfigError extends GageError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidGageConfigError';
  }
}

export class UnsupportedGageError extends GageError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedGageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
