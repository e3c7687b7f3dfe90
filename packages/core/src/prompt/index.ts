/**
 * Prompt loading and rendering for action executors.
 *
 * @example
 * ```typescript
 * const repo = createFilePromptRepository();
 * const renderer = PromptTemplate.from(await repo.read('greeting')).compile<PromptContext>();
 * const systemPrompt = renderer.renderSystemPrompt(context);
 * ```
 */

export type { PromptTemplateData, PromptRenderer, PromptRepository, FileSystem } from './types';

export { PromptTemplate } from './prompt-template';

export {
  PromptErrorCode,
  PromptError,
  PromptNotFoundError,
  PromptInvalidFormatError,
  PromptTemplateError,
  PromptIOError,
  type PromptErrorOptions,
} from './errors';

export { compileTemplate } from './template';

export {
  FilePromptRepository,
  createFilePromptRepository,
  DEFAULT_PROMPTS_DIRECTORY,
  type FilePromptRepositoryOptions,
} from './file-prompt-repository';
