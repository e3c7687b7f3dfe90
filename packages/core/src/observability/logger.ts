import type { LanguageModelUsage } from 'ai';
import type { ActionKind } from '../actions/kinds';
import type { WorkflowStage } from '../memory/enums';

/**
 * Logger interface for observability.
 * All methods are optional - implement only the events you care about.
 *
 * @example
 * ```typescript
 * const myLogger: Logger = {
 *   onTransition(event) {
 *     console.log(`${event.action}: ${event.from} -> ${event.to}`);
 *   },
 * };
 * ```
 */
export interface Logger {
  onLLMCallStart?(event: LLMCallStartEvent): void;
  onLLMCallEnd?(event: LLMCallEndEvent): void;
  onActionSelected?(event: ActionSelectedEvent): void;
  onTransition?(event: TransitionEvent): void;
  log?(level: LogLevel, message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Event emitted right before the generation service is called for an action.
 */
export interface LLMCallStartEvent {
  type: 'llm_call_start';
  action: ActionKind;
  promptId: string;
  modelId: string;
  timestamp: number;
}

/**
 * Event emitted when the generation call ends (success or error).
 */
export interface LLMCallEndEvent {
  type: 'llm_call_end';
  action: ActionKind;
  promptId: string;
  modelId: string;
  timestamp: number;
  response: {
    duration: number;
    usage?: LanguageModelUsage;
    error?: Error;
  };
}

export interface ActionSelectedEvent {
  type: 'action_selected';
  action: ActionKind;
  stage: WorkflowStage;
  timestamp: number;
}

/**
 * Event emitted after the reducer folded an action result into a new state.
 */
export interface TransitionEvent {
  type: 'transition';
  action: ActionKind;
  from: WorkflowStage;
  to: WorkflowStage;
  timestamp: number;
}

/**
 * No-op logger (default when no logger provided).
 */
export const noopLogger: Logger = {};

/**
 * Helper to create a logger with only the handlers you need.
 *
 * @example
 * ```typescript
 * const verbose = createLogger({
 *   log(level, message) {
 *     if (level !== 'debug') console.error(message);
 *   },
 * });
 * ```
 */
export function createLogger(handlers: Partial<Logger>): Logger {
  return handlers;
}
