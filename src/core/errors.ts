import { ZodError } from 'zod';

/**
 * Invalid startup configuration. The only error class treated as fatal.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public details?: { field: string; message: string }[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZod(section: string, error: ZodError): ConfigError {
    const details = error.errors.map((err) => ({
      field: [section, ...err.path].join('.'),
      message: err.message,
    }));
    const summary = details.map((d) => `${d.field}: ${d.message}`).join('; ');
    return new ConfigError(`Invalid configuration: ${summary}`, details);
  }
}
