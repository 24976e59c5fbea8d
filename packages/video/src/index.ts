/**
 * Lingo Shorts Video
 *
 * Shadowing-script shorts: script generation, narration, timing and rendering.
 */

export { runVideoPipeline, scriptCountForRun } from './video-pipeline.js';
export type { VideoPipelineDeps } from './video-pipeline.js';
export { ScriptGenerator } from './script-generator.js';
export type { ScriptGeneratorOptions } from './script-generator.js';
export { buildScriptPrompt } from './prompts.js';
export type { ScriptPromptOptions } from './prompts.js';
export { OpenAISpeechSynthesizer, TTS_VOICES, isTtsVoice } from './speech.js';
export type { SpeechSynthesizer, OpenAISpeechConfig, TtsVoice } from './speech.js';
export { FfprobeAudioProbe, parseProbeDuration } from './audio-probe.js';
export type { AudioProbe } from './audio-probe.js';
export { RemotionRenderer, buildRenderArgs } from './remotion-renderer.js';
export type { VideoRenderer, RemotionRendererConfig } from './remotion-renderer.js';
export { startFileServer, withFileServer } from './file-server.js';
export type { FileServer, FileServerOptions } from './file-server.js';
export { computeDurationInFrames, buildRenderProps, formatRunStamp, DEFAULT_FRAME_TIMING } from './timing.js';
export type { FrameTiming } from './timing.js';
export { isScriptItem } from './types.js';
export type { ScriptItem, AudioAsset, RenderProps, RenderRequest, RenderJob, RenderResult, VideoRunSummary } from './types.js';
