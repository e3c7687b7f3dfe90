export {
  envSchema,
  goalFileSchema,
  validateSettings,
  validateGoalFile,
  DEFAULT_TEMPERATURE,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_OUTPUT_DIR,
  type ChatSettings,
  type GoalFile,
} from './schema'
export { loadEnvFile, loadSettings, loadGoalFile } from './loader'
