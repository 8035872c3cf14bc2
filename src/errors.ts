export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'SECRET_RESOLUTION_ERROR'
  | 'AUTOSCALING_VALIDATION_ERROR'
  | 'AUTOSCALING_PUBLISH_ERROR';

/**
 * Base class for every error the generator raises on purpose.
 * Anything else reaching the CLI is reported as unexpected.
 */
export class TaskDefError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed input, missing required field or invalid resource combination. Fatal. */
export class ConfigError extends TaskDefError {
  readonly details: string[];

  constructor(message: string, details: string[] = [], options?: { cause?: unknown }) {
    super(details.length > 0 ? `${message}:\n${details.join('\n')}` : message, 'CONFIG_ERROR', options);
    this.details = details;
  }
}

/** A remote secret lookup failed. Fatal: no partial task definition is produced. */
export class SecretResolutionError extends TaskDefError {
  readonly secretName: string;

  constructor(message: string, secretName: string, options?: { cause?: unknown }) {
    super(message, 'SECRET_RESOLUTION_ERROR', options);
    this.secretName = secretName;
  }
}

/** The autoscaling block failed schema or cross-field validation. Never fatal. */
export class AutoscalingValidationError extends TaskDefError {
  readonly details: string[];

  constructor(details: string[]) {
    super(`Autoscaling config validation failed:\n${details.join('\n')}`, 'AUTOSCALING_VALIDATION_ERROR');
    this.details = details;
  }
}

/** Transport or permission failure while writing the autoscaling record. Never fatal. */
export class AutoscalingPublishError extends TaskDefError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'AUTOSCALING_PUBLISH_ERROR', options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Matches AWS SDK v3 service exceptions by name, e.g. `ResourceNotFoundException`. */
export function isNamedError(error: unknown, name: string): boolean {
  return error instanceof Error && error.name === name;
}
