/**
 * Error classes and logging utilities for the asset handler
 */

/**
 * Base error class for handler errors
 */
export class AssetHandlerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AssetHandlerError';
  }
}

/**
 * Invalid handler options or embedded manifest
 */
export class ConfigError extends AssetHandlerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/**
 * Raised by a store when a key has no entry
 */
export class AssetNotFoundError extends AssetHandlerError {
  constructor(key: string) {
    super(`Asset not found: ${key}`, 'ASSET_NOT_FOUND', { key });
    this.name = 'AssetNotFoundError';
  }
}

/**
 * Store failure after an asset was found to exist
 */
export class StoreError extends AssetHandlerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORE_ERROR', context);
    this.name = 'StoreError';
  }
}

/**
 * Coerce a thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  if (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string'
  ) {
    return new Error(value.message);
  }
  return new Error(`Unknown error: ${String(value)}`);
}

/**
 * Logging sink injected into the handler
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Build the structured record written for an error
 */
export function describeError(
  error: Error,
  context?: Record<string, unknown>
): Record<string, unknown> {
  const errorData: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
    timestamp: new Date().toISOString(),
    ...context,
  };

  if (error instanceof AssetHandlerError) {
    errorData.code = error.code;
    errorData.context = error.context;
  }

  return errorData;
}

/**
 * Log structured error
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
  logger: Logger = consoleLogger
): void {
  logger.error('Error occurred:', describeError(error, context));
}

export const consoleLogger: Logger = {
  debug(message, context) {
    if (context) {
      console.debug(message, context);
    } else {
      console.debug(message);
    }
  },
  error(message, context) {
    if (context) {
      console.error(message, JSON.stringify(context, null, 2));
    } else {
      console.error(message);
    }
  },
};

export const silentLogger: Logger = {
  debug() {},
  error() {},
};
