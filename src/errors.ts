export class InvalidCadenceError extends Error {
  constructor(message: string) {
    super(`Invalid cadence: ${message}`);
    this.name = 'InvalidCadenceError';
  }
}

export class ProviderUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ProviderUnavailableError';
  }
}

export class PersistenceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceError';
  }
}

export class SendError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SendError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
