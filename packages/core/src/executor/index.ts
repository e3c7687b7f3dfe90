export type { ActionExecutor } from './types';
export { buildPromptContext, type PromptContext } from './prompt-context';
export { createLLMActionExecutor, type LLMActionExecutorOptions } from './llm-executor';
export {
  createOpenRouterModel,
  OPENROUTER_BASE_URL,
  DEFAULT_OPENROUTER_MODEL,
  type OpenRouterModelConfig,
} from './openrouter';
