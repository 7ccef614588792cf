/**
 * Error types shared across the application
 */
import { ZodError } from 'zod';

/**
 * Base error with a machine-readable code
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/**
 * Fatal configuration problems detected at startup
 */
export class ConfigError extends AppError {
  constructor(message: string, code: string = 'CONFIG_INVALID', details?: unknown) {
    super(message, code, details);
    this.name = 'ConfigError';
  }

  static missing(variable: string, hint?: string): ConfigError {
    const message = hint ? `${variable} is not set. ${hint}` : `${variable} is not set`;
    return new ConfigError(message, 'CONFIG_MISSING', { variable });
  }

  static invalid(variable: string, value: string, expected: string): ConfigError {
    return new ConfigError(
      `Invalid ${variable} '${value}': expected ${expected}`,
      'CONFIG_INVALID',
      { variable, value }
    );
  }

  static fromZod(section: string, error: ZodError): ConfigError {
    const fields = formatZodError(error);
    const summary = fields.map((f) => `${f.field}: ${f.message}`).join('; ');
    return new ConfigError(`Invalid ${section} configuration (${summary})`, 'CONFIG_INVALID', fields);
  }
}

export class StoreError extends AppError {
  constructor(
    message: string,
    public key: string,
    cause?: unknown
  ) {
    super(message, 'STORE_WRITE_FAILED', { key }, { cause });
    this.name = 'StoreError';
  }
}

export class ProxmoxApiError extends AppError {
  constructor(
    message: string,
    public path: string,
    public statusCode?: number
  ) {
    super(message, 'PROXMOX_API_ERROR', { path, statusCode });
    this.name = 'ProxmoxApiError';
  }
}

export class TimeoutError extends AppError {
  constructor(
    public operation: string,
    public timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

/**
 * Format Zod validation errors
 */
export function formatZodError(error: ZodError): { field: string; message: string }[] {
  return error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
