// Base error class for all mdchunk errors
export class MdchunkError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'MdchunkError';
  }
}

// Validation error for option, rule and schema failures
export class ValidationError extends MdchunkError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for config file issues
export class ConfigError extends MdchunkError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Input error for documents and tables that cannot be read or decoded
export class InputError extends MdchunkError {
  constructor(message: string, public readonly path: string) {
    super(message, 'INPUT_ERROR');
    this.name = 'InputError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
