import type { RenderProps, ScriptItem } from './types.js';

export interface FrameTiming {
  fps: number;
  /** Padding after the narration ends, so captions are not cut off. */
  endMarginSeconds: number;
}

export const DEFAULT_FRAME_TIMING: FrameTiming = {
  fps: 60,
  endMarginSeconds: 1.0,
};

export function computeDurationInFrames(durationSeconds: number, timing: FrameTiming = DEFAULT_FRAME_TIMING): number {
  if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
    throw new RangeError(`Audio duration must be a non-negative number, got ${durationSeconds}`);
  }
  return Math.ceil((durationSeconds + timing.endMarginSeconds) * timing.fps);
}

export function buildRenderProps(
  item: ScriptItem,
  audioUrl: string,
  durationInFrames: number,
  labels: { title: string; subtitle: string },
): RenderProps {
  return {
    title: labels.title,
    subtitle: labels.subtitle,
    scriptText: item.english_script,
    audioUrl,
    durationInFrames,
  };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time run stamp, `YYYYMMDD_HHMMSS`.
 */
export function formatRunStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}
