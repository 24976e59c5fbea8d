/**
 * Video Pipeline
 *
 * generate scripts → record them → narrate each → measure → render each.
 *
 * Items run one after another. A failed narration or render is logged and the
 * loop moves on to the next item; only a failed generation ends the run early.
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger, errorMessage, resolveWorkPath } from '@lingo-shorts/core';
import type { AppConfig, HistoryStore } from '@lingo-shorts/core';
import type { ScriptGenerator } from './script-generator.js';
import type { SpeechSynthesizer } from './speech.js';
import type { AudioProbe } from './audio-probe.js';
import type { VideoRenderer } from './remotion-renderer.js';
import { withFileServer } from './file-server.js';
import type { FileServer } from './file-server.js';
import { buildRenderProps, computeDurationInFrames, formatRunStamp } from './timing.js';
import type { AudioAsset, RenderJob, ScriptItem, VideoRunSummary } from './types.js';

export interface VideoPipelineDeps {
  generator: ScriptGenerator;
  history: HistoryStore<ScriptItem>;
  speech: SpeechSynthesizer;
  probe: AudioProbe;
  renderer: VideoRenderer;
  now?: () => Date;
}

/**
 * Batch size for this run: a full batch the first time, single items after.
 */
export function scriptCountForRun(history: HistoryStore<ScriptItem>, video: AppConfig['video']): number {
  return history.isFirstRun() ? video.batchSize : video.incrementalSize;
}

export async function runVideoPipeline(config: AppConfig, deps: VideoPipelineDeps): Promise<VideoRunSummary> {
  const workDir = resolveWorkPath(config, '.');
  const summary: VideoRunSummary = {
    scriptsGenerated: 0,
    audioCreated: 0,
    videosRendered: 0,
    videos: [],
    failures: [],
  };

  await withFileServer({ rootDir: workDir, port: config.server.port, host: config.server.host }, async (server) => {
    const audioDir = resolveWorkPath(config, config.paths.audioDir);
    const videoDir = resolveWorkPath(config, config.paths.videoDir);
    fs.mkdirSync(audioDir, { recursive: true });
    fs.mkdirSync(videoDir, { recursive: true });

    const count = scriptCountForRun(deps.history, config.video);
    const history = deps.history.load();
    const scripts = await deps.generator.generate(history, count);
    if (scripts.length === 0) {
      logger.warn('[Pipeline] No new scripts were generated, stopping here');
      summary.failures.push('generation: no scripts');
      return;
    }
    summary.scriptsGenerated = scripts.length;
    deps.history.append(scripts);

    const stamp = formatRunStamp((deps.now ?? (() => new Date()))());
    const assets = await narrate(scripts, stamp, audioDir, deps.speech, summary);
    if (assets.length === 0) {
      logger.warn('[Pipeline] No audio was created, stopping here');
      return;
    }

    logger.info(`[Pipeline] Rendering ${assets.length} video(s)`);
    for (const asset of assets) {
      await renderAsset(asset, config, server, videoDir, deps, summary);
    }
  });

  logger.info(
    `[Pipeline] Done: ${summary.scriptsGenerated} script(s), ${summary.audioCreated} audio file(s), `
    + `${summary.videosRendered} video(s) in ${config.paths.videoDir}`,
  );
  return summary;
}

async function narrate(
  scripts: ScriptItem[],
  stamp: string,
  audioDir: string,
  speech: SpeechSynthesizer,
  summary: VideoRunSummary,
): Promise<AudioAsset[]> {
  const assets: AudioAsset[] = [];

  for (const [index, item] of scripts.entries()) {
    const audioPath = path.join(audioDir, `script_${stamp}_${index}.mp3`);
    try {
      await speech.synthesize(item.english_script, audioPath);
      assets.push({ item, index, stamp, audioPath });
      summary.audioCreated++;
      logger.info(`[Pipeline] 🔊 Saved narration ${path.basename(audioPath)}`);
    } catch (error) {
      const message = `audio ${index}: ${errorMessage(error)}`;
      summary.failures.push(message);
      logger.error(`[Pipeline] Narration failed for script ${index + 1}: ${errorMessage(error)}`);
    }
  }

  return assets;
}

async function planRender(
  asset: AudioAsset,
  config: AppConfig,
  server: FileServer,
  videoDir: string,
  probe: AudioProbe,
): Promise<RenderJob> {
  const durationSeconds = await probe.durationSeconds(asset.audioPath);
  const durationInFrames = computeDurationInFrames(durationSeconds, config.video);
  return {
    asset,
    durationSeconds,
    durationInFrames,
    props: buildRenderProps(asset.item, server.urlFor(asset.audioPath), durationInFrames, config.video),
    outputPath: path.join(videoDir, `${config.video.outputPrefix}_${asset.stamp}_${asset.index}.mp4`),
  };
}

async function renderAsset(
  asset: AudioAsset,
  config: AppConfig,
  server: FileServer,
  videoDir: string,
  deps: VideoPipelineDeps,
  summary: VideoRunSummary,
): Promise<void> {
  try {
    const job = await planRender(asset, config, server, videoDir, deps.probe);
    logger.debug(`[Pipeline] ${path.basename(asset.audioPath)}: ${job.durationSeconds.toFixed(2)}s → ${job.durationInFrames} frames`);
    const result = await deps.renderer.render({ props: job.props, outputPath: job.outputPath });

    if (result.success) {
      summary.videosRendered++;
      summary.videos.push(result.outputPath);
    } else {
      summary.failures.push(`render ${asset.index}: ${result.error ?? 'unknown error'}`);
    }
  } catch (error) {
    summary.failures.push(`render ${asset.index}: ${errorMessage(error)}`);
    logger.error(`[Pipeline] Could not measure or render ${path.basename(asset.audioPath)}: ${errorMessage(error)}`);
  }
}
