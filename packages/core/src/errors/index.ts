export {
  ExecutionErrorCode,
  ConfigurationErrorCode,
  PersistenceErrorCode,
  type ReservaErrorCode,
} from './types';

export type {
  ReservaErrorOptions,
  ExecutionErrorOptions,
  ConfigurationErrorOptions,
  PersistenceErrorOptions,
} from './types';

export { ReservaError, ExecutionError, ConfigurationError, PersistenceError } from './types';

export { toErrorMessage } from './utils';
