/** A required setting is missing; the invocation stops before any work. */
export class ConfigurationError extends Error {
  readonly status = 500;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** One log record could not be turned into a trip update. */
export class PayloadError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'PayloadError';
  }
}

export class InvalidTimestampError extends Error {
  readonly status = 422;

  constructor(readonly value: unknown) {
    super(`Unparseable pickup_datetime: ${JSON.stringify(value) ?? String(value)}`);
    this.name = 'InvalidTimestampError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
