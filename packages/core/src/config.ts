/**
 * Application Configuration
 *
 * One explicit structure handed to each component at construction. Defaults
 * can be overridden from the environment and again per run (CLI flags).
 */

import * as path from 'path';
import { ConfigError } from './errors.js';

export type TextProvider = 'gemini' | 'openai';
export type PostVariant = 'json' | 'template';

export interface AppConfig {
  models: {
    textProvider: TextProvider;
    geminiModel: string;
    openaiModel: string;
    ttsModel: string;
    ttsVoice: string;
  };
  paths: {
    workDir: string;
    scriptsFile: string;
    audioDir: string;
    videoDir: string;
    remotionProjectDir: string;
    postHistoryFile: string;
  };
  server: {
    host: string;
    port: number;
  };
  video: {
    fps: number;
    endMarginSeconds: number;
    compositionId: string;
    title: string;
    subtitle: string;
    outputPrefix: string;
    npxCommand: string;
    ffprobeCommand: string;
    batchSize: number;
    incrementalSize: number;
    temperature: number;
  };
  post: {
    variant: PostVariant;
    temperature: number;
    hashtags: string;
    templateMarker: string;
    maxLength: number;
  };
}

export type ConfigOverrides = {
  [S in keyof AppConfig]?: Partial<AppConfig[S]>;
};

export const DEFAULT_APP_CONFIG: AppConfig = {
  models: {
    textProvider: 'gemini',
    geminiModel: 'gemini-2.5-pro',
    openaiModel: 'gpt-4o',
    ttsModel: 'gpt-4o-mini-tts',
    ttsVoice: 'ash',
  },
  paths: {
    workDir: '.',
    scriptsFile: 'scripts.json',
    audioDir: 'audio',
    videoDir: 'videos',
    remotionProjectDir: 'shorts',
    postHistoryFile: 'posted_slangs.json',
  },
  server: {
    host: '127.0.0.1',
    port: 8000,
  },
  video: {
    fps: 60,
    endMarginSeconds: 1.0,
    compositionId: 'MainVideo',
    title: 'TOEIC 600点 のシャドーイング',
    subtitle: '最後まで遅れずに読めたらすごい',
    outputPrefix: 'lingo_short',
    npxCommand: 'npx',
    ffprobeCommand: 'ffprobe',
    batchSize: 10,
    incrementalSize: 1,
    temperature: 1.8,
  },
  post: {
    variant: 'json',
    temperature: 1.2,
    hashtags: '#英語学習 #スラング #英会話 #今日の英語',
    templateMarker: "📣 Today's Phrase",
    maxLength: 280,
  },
};

export function isTextProvider(value: string): value is TextProvider {
  return value === 'gemini' || value === 'openai';
}

export function isPostVariant(value: string): value is PostVariant {
  return value === 'json' || value === 'template';
}

/**
 * Merge per-section overrides onto a base config without mutating it.
 */
export function mergeConfig(base: AppConfig, overrides: ConfigOverrides = {}): AppConfig {
  return {
    models: { ...base.models, ...overrides.models },
    paths: { ...base.paths, ...overrides.paths },
    server: { ...base.server, ...overrides.server },
    video: { ...base.video, ...overrides.video },
    post: { ...base.post, ...overrides.post },
  };
}

/**
 * Apply environment overrides to the defaults.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined>,
  base: AppConfig = DEFAULT_APP_CONFIG,
): AppConfig {
  const providerName = env.TEXT_PROVIDER ?? '';
  const variant = env.POST_VARIANT ?? '';
  const textProvider = isTextProvider(providerName) ? providerName : base.models.textProvider;
  // TEXT_MODEL applies to whichever provider is active
  const textModel = env.TEXT_MODEL || '';

  return mergeConfig(base, {
    models: {
      textProvider,
      geminiModel: (textProvider === 'gemini' && textModel) || env.GEMINI_MODEL || base.models.geminiModel,
      openaiModel: (textProvider === 'openai' && textModel) || env.OPENAI_MODEL || base.models.openaiModel,
      ttsModel: env.TTS_MODEL || base.models.ttsModel,
      ttsVoice: env.TTS_VOICE || base.models.ttsVoice,
    },
    paths: {
      workDir: env.LINGO_WORK_DIR || base.paths.workDir,
      scriptsFile: env.SCRIPTS_FILE || base.paths.scriptsFile,
      remotionProjectDir: env.REMOTION_PROJECT_DIR || base.paths.remotionProjectDir,
      postHistoryFile: env.POST_HISTORY_FILE || base.paths.postHistoryFile,
    },
    server: {
      port: parseInt(env.FILE_SERVER_PORT || '') || base.server.port,
    },
    video: {
      ffprobeCommand: env.FFPROBE_PATH || base.video.ffprobeCommand,
    },
    post: {
      variant: isPostVariant(variant) ? variant : base.post.variant,
    },
  });
}

/**
 * Resolve a configured path against the work directory.
 */
export function resolveWorkPath(config: AppConfig, relativePath: string): string {
  return path.resolve(config.paths.workDir, relativePath);
}

export function validateConfig(config: AppConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
    errors.push(`server.port must be an integer between 0 and 65535, got ${config.server.port}`);
  }
  if (!(config.video.fps > 0)) {
    errors.push(`video.fps must be positive, got ${config.video.fps}`);
  }
  if (!(config.video.endMarginSeconds >= 0)) {
    errors.push(`video.endMarginSeconds must not be negative, got ${config.video.endMarginSeconds}`);
  }
  if (!Number.isInteger(config.video.batchSize) || config.video.batchSize < 1) {
    errors.push(`video.batchSize must be a positive integer, got ${config.video.batchSize}`);
  }
  if (!Number.isInteger(config.video.incrementalSize) || config.video.incrementalSize < 1) {
    errors.push(`video.incrementalSize must be a positive integer, got ${config.video.incrementalSize}`);
  }
  if (!config.post.templateMarker.trim()) {
    errors.push('post.templateMarker must not be empty');
  }

  return { valid: errors.length === 0, errors };
}

// ─── Secrets ─────────────────────────────────────────────────

export const X_SECRET_NAMES = [
  'X_API_KEY',
  'X_API_KEY_SECRET',
  'X_ACCESS_TOKEN',
  'X_ACCESS_TOKEN_SECRET',
] as const;

export function textProviderSecret(provider: TextProvider): 'GEMINI_API_KEY' | 'OPENAI_API_KEY' {
  return provider === 'gemini' ? 'GEMINI_API_KEY' : 'OPENAI_API_KEY';
}

/**
 * Throw a ConfigError listing every named variable that is missing or blank.
 */
export function requireSecrets(env: Record<string, string | undefined>, names: readonly string[]): void {
  const missing = names.filter(name => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(', ')}. Set them in .env or the environment.`,
      missing,
    );
  }
}

function secret(env: Record<string, string | undefined>, name: string): string {
  return env[name]?.trim() ?? '';
}

export interface VideoSecrets {
  textApiKey: string;
  openaiApiKey: string;
}

export interface XCredentials {
  appKey: string;
  appSecret: string;
  accessToken: string;
  accessSecret: string;
}

export interface PostSecrets {
  textApiKey: string;
  x: XCredentials;
}

/**
 * Key for the configured text provider alone (dry-run posting needs nothing else).
 */
export function loadTextSecret(env: Record<string, string | undefined>, provider: TextProvider): string {
  const textKey = textProviderSecret(provider);
  requireSecrets(env, [textKey]);
  return secret(env, textKey);
}

export function loadVideoSecrets(env: Record<string, string | undefined>, provider: TextProvider): VideoSecrets {
  const textKey = textProviderSecret(provider);
  requireSecrets(env, [...new Set([textKey, 'OPENAI_API_KEY'])]);
  return {
    textApiKey: secret(env, textKey),
    openaiApiKey: secret(env, 'OPENAI_API_KEY'),
  };
}

export function loadPostSecrets(env: Record<string, string | undefined>, provider: TextProvider): PostSecrets {
  const textKey = textProviderSecret(provider);
  requireSecrets(env, [textKey, ...X_SECRET_NAMES]);
  return {
    textApiKey: secret(env, textKey),
    x: {
      appKey: secret(env, 'X_API_KEY'),
      appSecret: secret(env, 'X_API_KEY_SECRET'),
      accessToken: secret(env, 'X_ACCESS_TOKEN'),
      accessSecret: secret(env, 'X_ACCESS_TOKEN_SECRET'),
    },
  };
}
