export type {
  Logger,
  LogLevel,
  LLMCallStartEvent,
  LLMCallEndEvent,
  ActionSelectedEvent,
  TransitionEvent,
} from './logger';

export { noopLogger, createLogger } from './logger';
