export type DictationErrorCode =
  | 'BACKEND_INIT_FAILED'
  | 'BACKEND_INVOCATION_FAILED'
  | 'COMMAND_HANDLER_FAILED'
  | 'CONFIGURATION_INVALID';

export class DictationError extends Error {
  readonly code: DictationErrorCode;

  constructor(code: DictationErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Model or device setup failed, including the CPU fallback. */
export class BackendInitError extends DictationError {
  constructor(message: string, options?: ErrorOptions) {
    super('BACKEND_INIT_FAILED', message, options);
  }
}

/** A remote call or a local inference request failed. */
export class BackendInvocationError extends DictationError {
  constructor(message: string, options?: ErrorOptions) {
    super('BACKEND_INVOCATION_FAILED', message, options);
  }
}

export class CommandHandlerError extends DictationError {
  constructor(message: string, options?: ErrorOptions) {
    super('COMMAND_HANDLER_FAILED', message, options);
  }
}

/** Missing or invalid configuration. Fatal: raised before any session may start. */
export class ConfigurationError extends DictationError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIGURATION_INVALID', message, options);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || String(err);
  return String(err);
}
