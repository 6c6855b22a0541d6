/**
 * Error taxonomy. None of these is fatal: a session keeps its last good snapshot.
 */

export class RocExplorerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RocExplorerError';
  }
}

/**
 * A value outside a parameter's domain.
 */
export class InvalidParameterError extends RocExplorerError {
  readonly parameter: string;
  readonly value: unknown;

  constructor(parameter: string, value: unknown, message: string) {
    super(`Invalid value for '${parameter}': ${message} (got ${formatValue(value)})`);
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
    this.value = value;
  }
}

/**
 * A sample or curve with no members of one class, or an empty curve.
 */
export class InsufficientDataError extends RocExplorerError {
  constructor(message: string) {
    super(message);
    this.name = 'InsufficientDataError';
  }
}

/**
 * An external dataset that could not be fetched or parsed.
 */
export class FetchFailedError extends RocExplorerError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to fetch ${url}: ${reason}`);
    this.name = 'FetchFailedError';
    this.url = url;
    this.cause = cause;
  }
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value === undefined) return 'undefined';
  return JSON.stringify(value) ?? String(value);
}
