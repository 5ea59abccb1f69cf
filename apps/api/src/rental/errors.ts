export class UnparseablePriceError extends Error {
  readonly text: string;

  constructor(text: string, reason: string) {
    super(`Unparseable price "${text}": ${reason}`);
    this.name = 'UnparseablePriceError';
    this.text = text;
  }
}

export class InvalidRateError extends Error {
  readonly rate: number;

  constructor(rate: number) {
    super(`Exchange rate must be a positive number of GHS per USD, got ${rate}`);
    this.name = 'InvalidRateError';
    this.rate = rate;
  }
}

/** Startup configuration that cannot be used (bad env or alias table). */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
