export {
  createReservationAgent,
  SESSION_COMPLETE_REPLY,
  DEFAULT_MAX_STEPS,
  type ReservationAgent,
  type ReservationAgentOptions,
  type StepResult,
  type RunResult,
} from './agent';
export { SessionRegistry } from './registry';
