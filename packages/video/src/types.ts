/**
 * Video Pipeline Types
 */

/** One generated shadowing script; `english_script` is its history key. */
export interface ScriptItem {
  english_script: string;
  japanese_translation: string;
}

export function isScriptItem(value: unknown): value is ScriptItem {
  if (typeof value !== 'object' || value === null) return false;
  if (!('english_script' in value) || !('japanese_translation' in value)) return false;
  return typeof value.english_script === 'string'
    && value.english_script.trim().length > 0
    && typeof value.japanese_translation === 'string';
}

export interface AudioAsset {
  item: ScriptItem;
  /** Position of the script in this run's batch. */
  index: number;
  /** Run timestamp, `YYYYMMDD_HHMMSS`. Together with `index` unique per run. */
  stamp: string;
  audioPath: string;
}

/** Input props of the Remotion composition. */
export interface RenderProps {
  title: string;
  subtitle: string;
  scriptText: string;
  audioUrl: string;
  durationInFrames: number;
}

export interface RenderRequest {
  props: RenderProps;
  outputPath: string;
}

/** Everything known about one video before the renderer runs. */
export interface RenderJob {
  asset: AudioAsset;
  durationSeconds: number;
  durationInFrames: number;
  props: RenderProps;
  outputPath: string;
}

export interface RenderResult {
  success: boolean;
  outputPath: string;
  exitCode?: number | null;
  stdout?: string;
  stderr?: string;
  error?: string;
}

export interface VideoRunSummary {
  scriptsGenerated: number;
  audioCreated: number;
  videosRendered: number;
  videos: string[];
  failures: string[];
}
