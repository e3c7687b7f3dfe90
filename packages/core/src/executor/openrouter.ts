import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';

import { ConfigurationError, ConfigurationErrorCode } from '../errors/types';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_OPENROUTER_MODEL = 'openai/gpt-4o-mini';

export interface OpenRouterModelConfig {
  apiKey: string | undefined;
  modelId?: string;
  baseURL?: string;
}

/**
 * Chat model served through OpenRouter's OpenAI-compatible endpoint.
 *
 * @throws {ConfigurationError} If no API key is given
 */
export function createOpenRouterModel(config: OpenRouterModelConfig): LanguageModel {
  if (!config.apiKey) {
    throw new ConfigurationError(
      'OPENROUTER_API_KEY is not set. Export it or add it to your env file.',
      { code: ConfigurationErrorCode.MISSING_API_KEY }
    );
  }

  const openrouter = createOpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL ?? OPENROUTER_BASE_URL,
  });
  return openrouter.chat(config.modelId ?? DEFAULT_OPENROUTER_MODEL);
}
