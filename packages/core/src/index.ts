export { logger, createChildLogger } from "./logger.js";
export {
  env,
  requireEnv,
  optionalEnv,
  validateEnv,
  requireCredentials,
  type AiProvider,
  type Credentials,
} from "./env.js";
export { loadSettings, parseSettings, defaultSettings } from "./config.js";
export {
  SettingsSchema,
  type Settings,
  type PostingSettings,
  type ReplySettings,
  type ContentGenerationSettings,
  type StyleSettings,
} from "./schemas/settings.js";
export {
  ConfigurationError,
  ProviderError,
  ParseError,
  ValidationError,
  formatError,
} from "./errors.js";
export { ok, fail, attempt, type Result } from "./result.js";
export {
  saveTrainingData,
  loadTrainingData,
  trainingDataDir,
  samplesDir,
} from "./training-data.js";
export { MAX_POST_LENGTH, truncatePost } from "./text.js";
