export { selectAction, isTerminalStage } from './coordinator';
export { deriveTopic, syncTopic } from './topic';
export { fieldsNeedingClarification } from './clarification';
export { applyActionResult } from './reducer';
export {
  handleGreeting,
  handleAvailability,
  handleDetails,
  handleMenu,
  handleConfirmation,
  handleAlternative,
  handleErrorRecovery,
  handleSaveReservation,
  POST_CONFIRMATION_FIELDS,
  SPECIAL_REQUEST_REJECTED,
  SAVE_FAILED_MARKER,
  type TransitionDeps,
} from './transitions';
