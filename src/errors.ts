// src/errors.ts
// Error types raised by the reporter. HTTP failures are not in here: the fetcher
// returns them as FetchResult values (see api.ts).

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the API rejects the credential. Halts the whole run.
 */
export class UnauthorizedError extends Error {
  readonly target: string;
  readonly category: string;

  constructor(target: string, category: string, detail: string) {
    super(`Authentication failed while fetching ${category} alerts for ${target}: ${detail}`);
    this.name = 'UnauthorizedError';
    this.target = target;
    this.category = category;
  }
}

export class DateParseError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown) {
    super(`Cannot parse ${field} "${String(value)}" (expected yyyy-MM-ddTHH:mm:ssZ)`);
    this.name = 'DateParseError';
    this.field = field;
    this.value = value;
  }
}

export class ReportWriteError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write report ${filePath}: ${reason}`);
    this.name = 'ReportWriteError';
    this.filePath = filePath;
  }
}
