/**
 * Home Dashboard - Error Utilities
 *
 * Provides custom error types and error handling utilities.
 */

/**
 * Base error class for dashboard errors
 */
export class DashboardError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DashboardError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DashboardError);
    }
  }
}

/**
 * Error thrown for configuration errors
 */
export class ConfigurationError extends DashboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when an integration's credentials fail validation
 */
export class IntegrationConfigError extends DashboardError {
  public readonly integration: string;

  constructor(integration: string, issues: string[]) {
    super(
      `Integration '${integration}' config validation failed: ${issues.join('; ')}`,
      'INTEGRATION_CONFIG_ERROR',
      { integration, issues }
    );
    this.name = 'IntegrationConfigError';
    this.integration = integration;
  }
}

/**
 * Error thrown when an integration name is not registered
 */
export class UnknownIntegrationError extends DashboardError {
  constructor(integration: string) {
    super(`Unknown integration: ${integration}`, 'UNKNOWN_INTEGRATION', { integration });
    this.name = 'UnknownIntegrationError';
  }
}

/**
 * Raised by a data source that has no incremental update stream.
 * This is a capability signal, not a failure.
 */
export class StreamingNotSupportedError extends DashboardError {
  constructor(sourceId: string) {
    super(`Source '${sourceId}' does not support update streaming`, 'STREAMING_NOT_SUPPORTED', {
      sourceId
    });
    this.name = 'StreamingNotSupportedError';
  }
}

/**
 * Error thrown when the first pull of an update stream fails operationally
 */
export class NegotiationError extends DashboardError {
  public readonly sourceId: string;

  constructor(sourceId: string, cause: unknown) {
    super(
      `Update stream negotiation failed for '${sourceId}': ${formatError(cause)}`,
      'NEGOTIATION_FAILED',
      { sourceId }
    );
    this.name = 'NegotiationError';
    this.sourceId = sourceId;
    this.cause = cause;
  }
}

/**
 * Error thrown when a session does not accept a message in time
 */
export class SendTimeoutError extends DashboardError {
  constructor(sessionId: string, timeoutMs: number) {
    super(`Send to session ${sessionId} timed out after ${timeoutMs}ms`, 'SEND_TIMEOUT', {
      sessionId
    });
    this.name = 'SendTimeoutError';
  }
}

/**
 * Error thrown when an upstream API answers with a non-success status
 */
export class UpstreamRequestError extends DashboardError {
  public readonly url: string;
  public readonly statusCode?: number;

  constructor(url: string, cause: unknown, statusCode?: number) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Upstream request failed: ${message}`, 'UPSTREAM_REQUEST_FAILED', {
      url,
      statusCode
    });
    this.name = 'UpstreamRequestError';
    this.url = url;
    this.statusCode = statusCode;
  }
}

/**
 * Retry configuration options
 */
export interface RetryOptions {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  signal?: AbortSignal;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2
};

/**
 * Execute a function with retry logic and exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: Error | undefined;
  let delay = opts.initialDelayMs;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt < opts.maxRetries) {
        await sleep(delay, opts.signal);
        delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
      }
    }
  }

  throw lastError;
}

/**
 * Sleep for a specified number of milliseconds.
 * Rejects with the signal's reason as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Format an error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof DashboardError) {
    return `[${error.code}] ${error.message}${error.details ? ` - ${JSON.stringify(error.details)}` : ''}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
