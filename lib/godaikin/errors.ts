import axios from 'axios';

export type GoDaikinErrorCode =
  | 'INVALID_CREDENTIALS'
  | 'PROVIDER_UNAVAILABLE'
  | 'SESSION_EXPIRED'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'UNSUPPORTED'
  | 'BUSY'
  | 'STALE_CONFIRMATION'
  | 'COMMAND_FAILED'
  | 'SYNC_FAILED'
  | 'CONFIGURATION';

export class GoDaikinError extends Error {
  readonly code: GoDaikinErrorCode;

  constructor(code: GoDaikinErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The identity provider rejected the username or password. */
export class InvalidCredentialsError extends GoDaikinError {
  constructor(message = 'GO DAIKIN rejected the supplied credentials', options?: { cause?: unknown }) {
    super('INVALID_CREDENTIALS', message, options);
  }
}

export class ProviderUnavailableError extends GoDaikinError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('PROVIDER_UNAVAILABLE', message, options);
    this.status = options?.status;
  }
}

export class SessionExpiredError extends GoDaikinError {
  constructor(message = 'GO DAIKIN session expired, re-authentication required', options?: { cause?: unknown }) {
    super('SESSION_EXPIRED', message, options);
  }
}

/** The vendor REST API refused the bearer token. */
export class UnauthorizedError extends GoDaikinError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UNAUTHORIZED', message, options);
  }
}

export class NotFoundError extends GoDaikinError {
  readonly deviceId: string;

  constructor(deviceId: string) {
    super('NOT_FOUND', `Unknown device: ${deviceId}`);
    this.deviceId = deviceId;
  }
}

export class UnsupportedError extends GoDaikinError {
  readonly deviceId: string;
  readonly field: string;

  constructor(deviceId: string, field: string, value: unknown) {
    super('UNSUPPORTED', `Device ${deviceId} does not support ${field}=${String(value)}`);
    this.deviceId = deviceId;
    this.field = field;
  }
}

export class BusyError extends GoDaikinError {
  constructor(deviceId: string) {
    super('BUSY', `Device ${deviceId} already has a command in flight`);
  }
}

export class StaleConfirmationError extends GoDaikinError {
  readonly deviceId: string;

  constructor(deviceId: string, attempts: number) {
    super(
      'STALE_CONFIRMATION',
      `Device ${deviceId} did not confirm the command after ${attempts} confirmation polls`,
    );
    this.deviceId = deviceId;
  }
}

export class CommandError extends GoDaikinError {
  readonly deviceId: string;
  readonly attempts: number;

  constructor(deviceId: string, attempts: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('COMMAND_FAILED', `Command for ${deviceId} failed after ${attempts} attempts${reason}`, options);
    this.deviceId = deviceId;
    this.attempts = attempts;
  }
}

export class SyncError extends GoDaikinError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SYNC_FAILED', message, options);
  }
}

export class ConfigurationError extends GoDaikinError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIGURATION', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function isTransient(error: unknown): boolean {
  return error instanceof ProviderUnavailableError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps an axios failure from the vendor REST API onto the error taxonomy.
 * Errors that are already classified pass through unchanged.
 */
export function toProviderError(error: unknown, context: string): Error {
  if (error instanceof GoDaikinError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 401 || status === 403) {
      return new UnauthorizedError(`${context} unauthorized (${status})`, { cause: error });
    }
    if (status === undefined || status === 429 || status >= 500) {
      return new ProviderUnavailableError(`${context} failed (${status ?? error.code ?? 'network'}): ${error.message}`, {
        cause: error,
        status,
      });
    }
    return new GoDaikinError('SYNC_FAILED', `${context} failed (${status}): ${error.message}`, { cause: error });
  }

  return error instanceof Error ? error : new Error(String(error));
}
