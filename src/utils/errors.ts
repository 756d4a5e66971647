export type DeviceApiErrorCode = 'INVALID_ARGUMENT' | 'PRECONDITION_FAILED';

export class DeviceApiError extends Error {
  constructor(
    message: string,
    public readonly code: DeviceApiErrorCode
  ) {
    super(message);
    this.name = 'DeviceApiError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Thrown when a connection or credentials value is missing or malformed.
 * Nothing on the client changes when this is raised.
 */
export class InvalidArgumentError extends DeviceApiError {
  constructor(
    public readonly argumentName: string,
    detail = 'is required'
  ) {
    super(`Invalid argument "${argumentName}": ${detail}`, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export class PreconditionFailedError extends DeviceApiError {
  constructor(message: string) {
    super(message, 'PRECONDITION_FAILED');
    this.name = 'PreconditionFailedError';
  }
}
