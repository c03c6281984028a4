export class DataSourceError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation}() failed: ${reason}`, { cause });
    this.name = 'DataSourceError';
    this.operation = operation;
  }
}

export class InvalidDayRecordError extends Error {
  constructor(date: string, reason: string) {
    super(`Invalid contribution day ${JSON.stringify(date)}: ${reason}`);
    this.name = 'InvalidDayRecordError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
