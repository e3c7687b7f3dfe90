import { generateText, NoObjectGeneratedError, Output, type LanguageModel } from 'ai';
import { ZodError } from 'zod';

import type { ActionKind } from '../actions/kinds';
import { getAction } from '../actions/registry';
import { parseActionResult, type ActionResult } from '../actions/schemas';
import { ExecutionError, ExecutionErrorCode } from '../errors/types';
import type { SessionState } from '../memory/types';
import { noopLogger, type Logger } from '../observability/logger';
import { createFilePromptRepository } from '../prompt/file-prompt-repository';
import { PromptTemplate } from '../prompt/prompt-template';
import type { PromptRenderer, PromptRepository } from '../prompt/types';
import { buildPromptContext, type PromptContext } from './prompt-context';
import type { ActionExecutor } from './types';

export interface LLMActionExecutorOptions {
  model: LanguageModel;
  /** Prompt source (defaults to the bundled YAML prompts) */
  prompts?: PromptRepository;
  logger?: Logger;
  temperature?: number;
  maxOutputTokens?: number;
}

function modelIdOf(model: LanguageModel): string {
  return typeof model === 'string' ? model : model.modelId;
}

/**
 * Executor that renders the action's prompt and asks the model for output
 * matching the action's result schema.
 *
 * @example
 * ```typescript
 * const executor = createLLMActionExecutor({
 *   model: createOpenRouterModel({ apiKey, modelId: 'openai/gpt-4o-mini' }),
 * });
 * const result = await executor.run(ActionKind.GREETING, state, '');
 * ```
 */
export function createLLMActionExecutor(options: LLMActionExecutorOptions): ActionExecutor {
  const { model, temperature, maxOutputTokens } = options;
  const prompts = options.prompts ?? createFilePromptRepository();
  const logger = options.logger ?? noopLogger;
  const modelId = modelIdOf(model);
  const renderers = new Map<string, PromptRenderer<PromptContext>>();

  async function rendererFor(promptId: string): Promise<PromptRenderer<PromptContext>> {
    const cached = renderers.get(promptId);
    if (cached) {
      return cached;
    }
    const renderer = PromptTemplate.from(await prompts.read(promptId)).compile<PromptContext>();
    renderers.set(promptId, renderer);
    return renderer;
  }

  return {
    async run(kind: ActionKind, state: SessionState, incomingMessage: string): Promise<ActionResult> {
      const action = getAction(kind);
      const startTime = Date.now();

      logger.onLLMCallStart?.({
        type: 'llm_call_start',
        action: kind,
        promptId: action.promptId,
        modelId,
        timestamp: startTime,
      });

      try {
        const renderer = await rendererFor(action.promptId);
        const context = buildPromptContext(state, incomingMessage, action.description);

        const result = await generateText({
          model,
          temperature,
          maxOutputTokens,
          messages: [
            { role: 'system', content: renderer.renderSystemPrompt(context) },
            { role: 'user', content: renderer.renderUserPrompt(context) },
          ],
          output: Output.object({ schema: action.schema }),
        });

        const endTime = Date.now();
        logger.onLLMCallEnd?.({
          type: 'llm_call_end',
          action: kind,
          promptId: action.promptId,
          modelId,
          timestamp: endTime,
          response: { duration: endTime - startTime, usage: result.usage },
        });

        return parseActionResult(kind, result.output);
      } catch (error) {
        const endTime = Date.now();
        logger.onLLMCallEnd?.({
          type: 'llm_call_end',
          action: kind,
          promptId: action.promptId,
          modelId,
          timestamp: endTime,
          response: {
            duration: endTime - startTime,
            error: error instanceof Error ? error : new Error(String(error)),
          },
        });

        const code =
          error instanceof ZodError || NoObjectGeneratedError.isInstance(error)
            ? ExecutionErrorCode.RESULT_VALIDATION_ERROR
            : ExecutionErrorCode.EXECUTION_ERROR;
        throw ExecutionError.from(error, code, { action: kind, promptId: action.promptId });
      }
    },
  };
}
