/**
 * Error types shared across commands and services
 */

export class DataFetchError extends Error {
  readonly ticker: string;

  constructor(ticker: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to fetch data for ${ticker}: ${message}`, options);
    this.name = "DataFetchError";
    this.ticker = ticker;
  }
}

export class ConfigValidationError extends Error {
  readonly configName: string;
  readonly issues: string[];

  constructor(configName: string, issues: string[]) {
    super(`Invalid model config "${configName}": ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
    this.configName = configName;
    this.issues = issues;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class InsufficientDataError extends Error {
  readonly ticker: string;
  readonly required: number;
  readonly available: number;

  constructor(ticker: string, required: number, available: number) {
    super(`Insufficient data for ${ticker}: need ${required} bars, got ${available}`);
    this.name = "InsufficientDataError";
    this.ticker = ticker;
    this.required = required;
    this.available = available;
  }
}
