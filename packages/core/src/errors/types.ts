import { wrapAsError } from './utils';

export enum ExecutionErrorCode {
  EXECUTION_ERROR = 'EXECUTION_ERROR',
  RESULT_VALIDATION_ERROR = 'RESULT_VALIDATION_ERROR',
}

export enum ConfigurationErrorCode {
  CONFIG_ERROR = 'CONFIG_ERROR',
  MISSING_API_KEY = 'MISSING_API_KEY',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export enum PersistenceErrorCode {
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  WRITE_ERROR = 'WRITE_ERROR',
}

export type ReservaErrorCode = ExecutionErrorCode | ConfigurationErrorCode | PersistenceErrorCode;

export interface ReservaErrorOptions<TCode extends string = ReservaErrorCode> {
  code: TCode;
  cause?: Error;
  context?: Record<string, unknown>;
}

export interface ErrorOptions<TCode extends string> {
  code?: TCode;
  cause?: Error;
  context?: Record<string, unknown>;
}

export type ExecutionErrorOptions = ErrorOptions<ExecutionErrorCode>;
export type ConfigurationErrorOptions = ErrorOptions<ConfigurationErrorCode>;
export type PersistenceErrorOptions = ErrorOptions<PersistenceErrorCode>;

/**
 * Base error class for everything thrown by @reserva packages.
 *
 * Only collaborator failures surface as exceptions. Negotiation problems
 * (blocking issues, clarification loops, save markers) are carried in the
 * session state instead.
 */
export class ReservaError<TCode extends string = ReservaErrorCode> extends Error {
  readonly code: TCode;
  override readonly cause?: Error;
  readonly context?: Record<string, unknown>;

  constructor(message: string, options: ReservaErrorOptions<TCode>) {
    super(message);
    this.name = 'ReservaError';
    this.code = options.code;
    this.cause = options.cause;
    this.context = options.context;

    // V8-specific stack trace capture
    const ErrorWithCapture = Error as typeof Error & {
      captureStackTrace?: (targetObject: object, constructorOpt?: Function) => void;
    };
    ErrorWithCapture.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when an action could not be executed (generation call failed or
 * the structured result did not match the action's contract).
 */
export class ExecutionError extends ReservaError<ExecutionErrorCode> {
  constructor(message: string, options: ExecutionErrorOptions = {}) {
    super(message, {
      code: options.code ?? ExecutionErrorCode.EXECUTION_ERROR,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'ExecutionError';
  }

  static from(
    error: unknown,
    code: ExecutionErrorCode = ExecutionErrorCode.EXECUTION_ERROR,
    context?: Record<string, unknown>
  ): ExecutionError {
    if (error instanceof ExecutionError) {
      return error;
    }
    return wrapAsError(error, ExecutionError, { code, context });
  }
}

/**
 * Thrown when settings or goal files are missing or invalid.
 */
export class ConfigurationError extends ReservaError<ConfigurationErrorCode> {
  constructor(message: string, options: ConfigurationErrorOptions = {}) {
    super(message, {
      code: options.code ?? ConfigurationErrorCode.CONFIG_ERROR,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'ConfigurationError';
  }

  static from(
    error: unknown,
    code: ConfigurationErrorCode = ConfigurationErrorCode.CONFIG_ERROR,
    context?: Record<string, unknown>
  ): ConfigurationError {
    if (error instanceof ConfigurationError) {
      return error;
    }
    return wrapAsError(error, ConfigurationError, { code, context });
  }
}

/**
 * Thrown by reservation stores. The save-reservation transition catches it
 * and records a marker instead of letting it escape.
 */
export class PersistenceError extends ReservaError<PersistenceErrorCode> {
  constructor(message: string, options: PersistenceErrorOptions = {}) {
    super(message, {
      code: options.code ?? PersistenceErrorCode.PERSISTENCE_ERROR,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'PersistenceError';
  }

  static from(
    error: unknown,
    code: PersistenceErrorCode = PersistenceErrorCode.PERSISTENCE_ERROR,
    context?: Record<string, unknown>
  ): PersistenceError {
    if (error instanceof PersistenceError) {
      return error;
    }
    return wrapAsError(error, PersistenceError, { code, context });
  }
}
