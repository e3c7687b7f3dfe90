import { ReservaError } from '../errors/types';

export enum PromptErrorCode {
  PROMPT_ERROR = 'PROMPT_ERROR',
  NOT_FOUND = 'PROMPT_NOT_FOUND',
  INVALID_FORMAT = 'PROMPT_INVALID_FORMAT',
  TEMPLATE_ERROR = 'PROMPT_TEMPLATE_ERROR',
  IO_ERROR = 'PROMPT_IO_ERROR',
}

export interface PromptErrorOptions {
  code?: PromptErrorCode;
  cause?: Error;
  context?: Record<string, unknown>;
}

/**
 * Base error for prompt loading and rendering.
 */
export class PromptError extends ReservaError<PromptErrorCode> {
  constructor(message: string, options: PromptErrorOptions = {}) {
    super(message, {
      code: options.code ?? PromptErrorCode.PROMPT_ERROR,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'PromptError';
  }
}

/**
 * @example
 * ```typescript
 * throw new PromptNotFoundError('greeting', '1.0.0');
 * // Error: Prompt 'greeting' version '1.0.0' not found
 * ```
 */
export class PromptNotFoundError extends PromptError {
  readonly promptId: string;
  readonly version?: string;

  constructor(promptId: string, version?: string, options: Omit<PromptErrorOptions, 'code'> = {}) {
    const message = version
      ? `Prompt '${promptId}' version '${version}' not found`
      : `Prompt '${promptId}' not found`;

    super(message, {
      code: PromptErrorCode.NOT_FOUND,
      cause: options.cause,
      context: { promptId, version, ...options.context },
    });
    this.name = 'PromptNotFoundError';
    this.promptId = promptId;
    this.version = version;
  }
}

export class PromptInvalidFormatError extends PromptError {
  readonly promptId: string;
  readonly details: string;

  constructor(promptId: string, details: string, options: Omit<PromptErrorOptions, 'code'> = {}) {
    super(`Invalid format for prompt '${promptId}': ${details}`, {
      code: PromptErrorCode.INVALID_FORMAT,
      cause: options.cause,
      context: { promptId, details, ...options.context },
    });
    this.name = 'PromptInvalidFormatError';
    this.promptId = promptId;
    this.details = details;
  }
}

/**
 * Thrown when a template does not compile or a render hits a missing field
 * (templates compile in strict mode).
 */
export class PromptTemplateError extends PromptError {
  readonly promptId: string;
  readonly details: string;

  constructor(promptId: string, details: string, options: Omit<PromptErrorOptions, 'code'> = {}) {
    super(`Template failed for prompt '${promptId}': ${details}`, {
      code: PromptErrorCode.TEMPLATE_ERROR,
      cause: options.cause,
      context: { promptId, details, ...options.context },
    });
    this.name = 'PromptTemplateError';
    this.promptId = promptId;
    this.details = details;
  }
}

export class PromptIOError extends PromptError {
  readonly operation: 'read' | 'list';
  readonly path: string;

  constructor(operation: 'read' | 'list', path: string, options: Omit<PromptErrorOptions, 'code'> = {}) {
    const opText = operation === 'list' ? 'list prompts in' : 'read prompt file';
    super(`Failed to ${opText}: ${path}`, {
      code: PromptErrorCode.IO_ERROR,
      cause: options.cause,
      context: { operation, path, ...options.context },
    });
    this.name = 'PromptIOError';
    this.operation = operation;
    this.path = path;
  }
}
