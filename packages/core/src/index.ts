// @reserva/core
// Memory model, coordinator and transition reducer for a table-booking guest agent

// =============================================================================
// Errors
// =============================================================================

export {
  ExecutionErrorCode,
  ConfigurationErrorCode,
  PersistenceErrorCode,
  type ReservaErrorCode,
} from './errors';

export type {
  ReservaErrorOptions,
  ExecutionErrorOptions,
  ConfigurationErrorOptions,
  PersistenceErrorOptions,
} from './errors';

export {
  ReservaError,
  ExecutionError,
  ConfigurationError,
  PersistenceError,
  toErrorMessage,
} from './errors';

// =============================================================================
// Observability
// =============================================================================

export * from './observability';

// =============================================================================
// Memory model
// =============================================================================

export * from './memory';

// =============================================================================
// Actions & workflow
// =============================================================================

export * from './actions';
export * from './workflow';

// =============================================================================
// Prompts & execution
// =============================================================================

export * from './prompt';
export * from './executor';

// =============================================================================
// Persistence & session
// =============================================================================

export * from './persistence';
export * from './session';
