/**
 * Video Command
 *
 * Generates new shadowing scripts and renders one short per script.
 */

import { HistoryStore, createTextGenerator, loadVideoSecrets, resolveWorkPath } from '@lingo-shorts/core';
import type { ConfigOverrides } from '@lingo-shorts/core';
import {
  FfprobeAudioProbe,
  OpenAISpeechSynthesizer,
  RemotionRenderer,
  ScriptGenerator,
  isScriptItem,
  runVideoPipeline,
} from '@lingo-shorts/video';
import type { VideoRunSummary } from '@lingo-shorts/video';
import { commonOverrides, loadAppConfig } from './app-config.js';
import type { CommonOptions } from './app-config.js';

export interface VideoCommandOptions extends CommonOptions {
  /** Scripts to request this run, whatever the history holds. */
  batchSize?: number;
  port?: number;
}

export function videoOverrides(options: VideoCommandOptions): ConfigOverrides {
  const overrides = commonOverrides(options);
  if (options.port !== undefined) {
    overrides.server = { port: options.port };
  }
  if (options.batchSize !== undefined) {
    overrides.video = { batchSize: options.batchSize, incrementalSize: options.batchSize };
  }
  return overrides;
}

export async function makeVideos(options: VideoCommandOptions): Promise<VideoRunSummary> {
  const config = loadAppConfig(videoOverrides(options));
  const secrets = loadVideoSecrets(process.env, config.models.textProvider);

  console.log('\n🎬 Lingo Shorts: video run\n');

  const summary = await runVideoPipeline(config, {
    generator: new ScriptGenerator(createTextGenerator(config.models, secrets.textApiKey), {
      temperature: config.video.temperature,
    }),
    history: new HistoryStore({
      filePath: resolveWorkPath(config, config.paths.scriptsFile),
      isItem: isScriptItem,
    }),
    speech: new OpenAISpeechSynthesizer({
      apiKey: secrets.openaiApiKey,
      model: config.models.ttsModel,
      voice: config.models.ttsVoice,
    }),
    probe: new FfprobeAudioProbe(config.video.ffprobeCommand),
    renderer: new RemotionRenderer({
      projectDir: resolveWorkPath(config, config.paths.remotionProjectDir),
      compositionId: config.video.compositionId,
      npxCommand: config.video.npxCommand,
    }),
  });

  console.log('\n' + '═'.repeat(50));
  console.log(`   Scripts: ${summary.scriptsGenerated}`);
  console.log(`   Audio:   ${summary.audioCreated}`);
  console.log(`   Videos:  ${summary.videosRendered}`);
  for (const video of summary.videos) {
    console.log(`   ✅ ${video}`);
  }
  for (const failure of summary.failures) {
    console.log(`   ⚠️  ${failure}`);
  }
  console.log('═'.repeat(50) + '\n');

  return summary;
}
