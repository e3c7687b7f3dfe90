/**
 * Prompt module types.
 *
 * Every action kind owns one prompt: a system template that sets up the guest
 * persona and a user template that carries the current turn.
 */

/**
 * Raw prompt data as stored in the repository (before compilation).
 *
 * @example
 * ```typescript
 * const data: PromptTemplateData = {
 *   id: 'greeting',
 *   version: '1.0.0',
 *   system: 'You are {{agentName}}.',
 *   userTemplate: 'Staff said: {{incomingMessage}}',
 * };
 * ```
 */
export interface PromptTemplateData {
  /** Unique identifier for the prompt */
  id: string;
  /** Semantic version string (e.g., '1.0.0') */
  version: string;
  /** System prompt template (Handlebars syntax) */
  system: string;
  /** User prompt template (Handlebars syntax) */
  userTemplate: string;
}

/**
 * Compiled prompt with render functions.
 *
 * @typeParam TSystemInput - Input for the system prompt
 * @typeParam TUserInput - Input for the user prompt
 */
export interface PromptRenderer<TSystemInput = unknown, TUserInput = TSystemInput> {
  id: string;
  version: string;
  renderSystemPrompt: (input: TSystemInput) => string;
  renderUserPrompt: (input: TUserInput) => string;
}

/**
 * Read access to stored prompts.
 */
export interface PromptRepository {
  /**
   * Reads raw prompt data.
   *
   * @param version - Specific version. If omitted, returns the latest version.
   * @throws {PromptNotFoundError} If the prompt (or version) doesn't exist
   * @throws {PromptInvalidFormatError} If the prompt file is malformed
   */
  read(id: string, version?: string): Promise<PromptTemplateData>;
}

/**
 * Minimal file system interface for the file-backed repository, so tests can
 * swap in an in-memory implementation.
 */
export interface FileSystem {
  readFile(path: string): Promise<string>;
  readdir(path: string): Promise<string[]>;
}
