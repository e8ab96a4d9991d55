/**
 * Errors raised at the I/O edges (configuration, storage). The redaction and
 * anomaly core never throws for content.
 */
export class IntakeError extends Error {
  public code: string;
  public details?: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.name = "IntakeError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, IntakeError.prototype);
  }
}

export class ConfigError extends IntakeError {
  constructor(message: string, details?: unknown) {
    super("config_invalid", message, details);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export class StorageError extends IntakeError {
  constructor(message: string, details?: unknown) {
    super("storage_failed", message, details);
    this.name = "StorageError";
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
