import { compileTemplate } from './template';
import type { PromptRenderer, PromptTemplateData } from './types';

/**
 * Prompt template with compilation capabilities.
 *
 * @example
 * ```typescript
 * const renderer = PromptTemplate.from(await repo.read('greeting')).compile<PromptContext>();
 * const system = renderer.renderSystemPrompt(context);
 * ```
 */
export class PromptTemplate implements PromptTemplateData {
  private constructor(
    readonly id: string,
    readonly version: string,
    readonly system: string,
    readonly userTemplate: string
  ) {}

  static from(data: PromptTemplateData): PromptTemplate {
    return new PromptTemplate(data.id, data.version, data.system, data.userTemplate);
  }

  /**
   * @throws {PromptTemplateError} If template compilation fails
   */
  compile<TSystemInput = unknown, TUserInput = TSystemInput>(): PromptRenderer<
    TSystemInput,
    TUserInput
  > {
    return {
      id: this.id,
      version: this.version,
      renderSystemPrompt: compileTemplate<TSystemInput>(this.system, this.id),
      renderUserPrompt: compileTemplate<TUserInput>(this.userTemplate, this.id),
    };
  }
}
