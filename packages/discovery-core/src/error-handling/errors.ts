export class DomainError extends Error {
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, cause?: unknown, code?: string, details?: Record<string, unknown>) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

export enum DiscoveryErrorCode {
  CONFIGURATION_MISSING = 'CONFIGURATION_MISSING',
  INVALID_SETTINGS = 'INVALID_SETTINGS',
  FORBIDDEN = 'FORBIDDEN',
  NON_SUCCESS_STATUS = 'NON_SUCCESS_STATUS',
  UNMARSHAL_FAILURE = 'UNMARSHAL_FAILURE',
  TIMEOUT = 'TIMEOUT',
  NETWORK_FAILURE = 'NETWORK_FAILURE',
  ADDRESS_RESOLUTION_FAILURE = 'ADDRESS_RESOLUTION_FAILURE',
}

/**
 * Base for every failure a lookup can reject with.
 */
export class DiscoveryError extends DomainError {
  public declare readonly code: DiscoveryErrorCode;

  constructor(code: DiscoveryErrorCode, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause, code, details);
    this.name = 'DiscoveryError';
  }
}

export class ConfigurationMissingError extends DiscoveryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(DiscoveryErrorCode.CONFIGURATION_MISSING, message, details);
    this.name = 'ConfigurationMissingError';
  }
}

export class DiscoverySettingsError extends DiscoveryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(DiscoveryErrorCode.INVALID_SETTINGS, `Invalid discovery settings: ${message}`, details);
    this.name = 'DiscoverySettingsError';
  }
}

export class KubernetesApiForbiddenError extends DiscoveryError {
  constructor(details?: Record<string, unknown>) {
    super(
      DiscoveryErrorCode.FORBIDDEN,
      'Forbidden when communicating with the Kubernetes API. Check RBAC settings.',
      details
    );
    this.name = 'KubernetesApiForbiddenError';
  }
}

export class NonSuccessStatusError extends DiscoveryError {
  public readonly status: number;

  constructor(status: number, details?: Record<string, unknown>) {
    super(DiscoveryErrorCode.NON_SUCCESS_STATUS, `Non-200 from Kubernetes API server: ${status}`, {
      status,
      ...details,
    });
    this.name = 'NonSuccessStatusError';
    this.status = status;
  }
}

export class UnmarshalFailureError extends DiscoveryError {
  public readonly bodyExcerpt: string;

  constructor(reason: string, bodyExcerpt: string, details?: Record<string, unknown>, cause?: unknown) {
    super(
      DiscoveryErrorCode.UNMARSHAL_FAILURE,
      `Failed to unmarshal Kubernetes API response: ${reason}`,
      { bodyExcerpt, ...details },
      cause
    );
    this.name = 'UnmarshalFailureError';
    this.bodyExcerpt = bodyExcerpt;
  }
}

export class ResolutionTimeoutError extends DiscoveryError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, cause?: unknown) {
    super(
      DiscoveryErrorCode.TIMEOUT,
      `Kubernetes API round trip did not complete within ${timeoutMs}ms`,
      { timeoutMs },
      cause
    );
    this.name = 'ResolutionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class NetworkFailureError extends DiscoveryError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(DiscoveryErrorCode.NETWORK_FAILURE, message, details, cause);
    this.name = 'NetworkFailureError';
  }
}

export class AddressResolutionError extends DiscoveryError {
  public readonly ip: string;

  constructor(ip: string) {
    super(DiscoveryErrorCode.ADDRESS_RESOLUTION_FAILURE, `Unable to resolve pod IP [${ip}] to an address`, { ip });
    this.name = 'AddressResolutionError';
    this.ip = ip;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function isDiscoveryError(error: unknown, code?: DiscoveryErrorCode): error is DiscoveryError {
  return error instanceof DiscoveryError && (code === undefined || error.code === code);
}

/**
 * Anything that escapes the lookup pipeline without a discovery code is treated as a transport failure.
 */
export function wrapDiscoveryError(error: unknown): DiscoveryError {
  if (error instanceof DiscoveryError) return error;
  return new NetworkFailureError(`Kubernetes API request failed: ${errorMessage(error)}`, undefined, error);
}
