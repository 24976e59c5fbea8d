/**
 * Effective configuration for one command: environment, then CLI flags.
 */

import {
  ConfigError,
  isTextProvider,
  loadConfigFromEnv,
  mergeConfig,
  validateConfig,
} from '@lingo-shorts/core';
import type { AppConfig, ConfigOverrides } from '@lingo-shorts/core';

export interface CommonOptions {
  provider?: string;
  workDir?: string;
}

export function commonOverrides(options: CommonOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.provider !== undefined) {
    if (!isTextProvider(options.provider)) {
      throw new ConfigError(`Unknown text provider "${options.provider}". Use gemini or openai.`);
    }
    overrides.models = { textProvider: options.provider };
  }
  if (options.workDir) {
    overrides.paths = { workDir: options.workDir };
  }
  return overrides;
}

export function loadAppConfig(
  overrides: ConfigOverrides = {},
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const config = mergeConfig(loadConfigFromEnv(env), overrides);
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    throw new ConfigError(`Invalid configuration:\n  - ${errors.join('\n  - ')}`);
  }
  return config;
}
