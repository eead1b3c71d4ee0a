export class ProbeError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'ProbeError';
    this.code = code;
  }
}

export class TransportError extends ProbeError {
  public readonly address: string;

  constructor(address: string, reason: string) {
    super(`Poll of ${address} failed: ${reason}`, 'TRANSPORT_FAILURE');
    this.name = 'TransportError';
    this.address = address;
  }
}

export class NotFoundError extends ProbeError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class MalformedReadingError extends ProbeError {
  constructor(message: string) {
    super(message, 'MALFORMED_READING');
    this.name = 'MalformedReadingError';
  }
}

export class ConfigurationError extends ProbeError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration:\n${errors.join('\n')}`, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

/**
 * Errors a check recovers from locally and reports as a status result
 * rather than letting them escape the check.
 */
export function isRecoverableProbeError(
  err: unknown,
): err is TransportError | NotFoundError | MalformedReadingError {
  return (
    err instanceof TransportError ||
    err instanceof NotFoundError ||
    err instanceof MalformedReadingError
  );
}
