export class DocketError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'DocketError';
  }
}

/** Initial portal load failed; retried, then fatal to the session. */
export class TransientLoadError extends DocketError {
  constructor(message: string, cause?: Error) {
    super(message, 'TRANSIENT_LOAD_ERROR', cause);
    this.name = 'TransientLoadError';
  }
}

export class RowExtractionError extends DocketError {
  constructor(
    message: string,
    public readonly rowIndex: number,
    cause?: Error,
  ) {
    super(message, 'ROW_EXTRACTION_ERROR', cause);
    this.name = 'RowExtractionError';
  }
}

export class SessionFatalError extends DocketError {
  constructor(message: string, cause?: Error) {
    super(message, 'SESSION_FATAL_ERROR', cause);
    this.name = 'SessionFatalError';
  }
}

export class SessionAbortedError extends DocketError {
  constructor(message: string, cause?: Error) {
    super(message, 'SESSION_ABORTED', cause);
    this.name = 'SessionAbortedError';
  }
}

export class DriverError extends DocketError {
  constructor(message: string, cause?: Error) {
    super(message, 'DRIVER_ERROR', cause);
    this.name = 'DriverError';
  }
}

export class SearchValidationError extends DocketError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SEARCH_VALIDATION_ERROR');
    this.name = 'SearchValidationError';
  }
}

export class SchemaValidationError extends DocketError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends DocketError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class PersistenceError extends DocketError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
