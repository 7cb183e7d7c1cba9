export type CompileErrorReason = 'no_patterns' | 'too_many_patterns' | 'invalid_list';

export type ScanFailureCode = 'depth_exceeded' | 'size_exceeded';

export class DenyGuardError extends Error {
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class CompileError extends DenyGuardError {
  constructor(
    readonly reason: CompileErrorReason,
    message: string,
  ) {
    super('compile_error', message);
  }
}

export class DepthExceededError extends DenyGuardError {
  constructor(
    readonly maxDepth: number,
    readonly locationHint: string,
  ) {
    super('depth_exceeded', `Payload nesting exceeds maxDepth=${maxDepth} at ${locationHint}`);
  }
}

export class SizeExceededError extends DenyGuardError {
  constructor(
    readonly maxBytes: number,
    readonly bytesSeen: number,
    readonly locationHint: string,
  ) {
    super('size_exceeded', `Payload text exceeds maxBytes=${maxBytes} (${bytesSeen} bytes) at ${locationHint}`);
  }
}

export class ConfigError extends DenyGuardError {
  constructor(message: string) {
    super('config_error', message);
  }
}

/**
 * Raised for values outside the scannable shapes. Extends `TypeError` so hosts
 * can treat it as a contract violation.
 */
export class PayloadTypeError extends TypeError {
  readonly code = 'invalid_payload';

  constructor(
    readonly locationHint: string,
    readonly actualType: string,
  ) {
    super(`Unsupported payload value of type ${actualType} at ${locationHint}`);
    this.name = 'PayloadTypeError';
  }
}

export function isScanFailure(error: unknown): error is DepthExceededError | SizeExceededError {
  return error instanceof DepthExceededError || error instanceof SizeExceededError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
