/**
 * Lingo Shorts Core
 *
 * Configuration, logging, history persistence and language-model access shared
 * by the video and post pipelines.
 */

export { logger, setLogLevel, errorMessage } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

export { ConfigError } from './errors.js';

export {
  DEFAULT_APP_CONFIG,
  X_SECRET_NAMES,
  loadConfigFromEnv,
  mergeConfig,
  resolveWorkPath,
  validateConfig,
  isTextProvider,
  isPostVariant,
  requireSecrets,
  textProviderSecret,
  loadTextSecret,
  loadVideoSecrets,
  loadPostSecrets,
} from './config.js';
export type {
  AppConfig,
  ConfigOverrides,
  TextProvider,
  PostVariant,
  VideoSecrets,
  PostSecrets,
  XCredentials,
} from './config.js';

export { HistoryStore } from './history-store.js';
export type { HistoryStoreOptions, ItemGuard } from './history-store.js';

export * from './generation/index.js';
