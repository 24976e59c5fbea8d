/**
 * Audio duration via ffprobe.
 */

import { spawn } from 'child_process';

export interface AudioProbe {
  /** Length of the audio stream in seconds, read from container metadata. */
  durationSeconds(filePath: string): Promise<number>;
}

/**
 * Read `format.duration` from `ffprobe -of json` output.
 */
export function parseProbeDuration(output: string): number {
  const data: unknown = JSON.parse(output);
  if (typeof data !== 'object' || data === null || !('format' in data)) {
    throw new Error('ffprobe output has no format section');
  }

  const format = data.format;
  if (typeof format !== 'object' || format === null || !('duration' in format)) {
    throw new Error('ffprobe output has no duration');
  }

  const duration = Number(format.duration);
  if (!Number.isFinite(duration) || duration < 0) {
    throw new Error(`ffprobe reported an invalid duration: ${String(format.duration)}`);
  }
  return duration;
}

export class FfprobeAudioProbe implements AudioProbe {
  constructor(private command: string = 'ffprobe') {}

  durationSeconds(filePath: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const probe = spawn(this.command, [
        '-v', 'error',
        '-show_entries', 'format=duration',
        '-of', 'json',
        filePath,
      ]);

      let output = '';
      let stderr = '';
      probe.stdout.on('data', (data: Buffer) => {
        output += data.toString();
      });
      probe.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      probe.on('close', (code) => {
        if (code !== 0) {
          reject(new Error(`ffprobe exited with code ${code}: ${stderr.trim()}`));
          return;
        }
        try {
          resolve(parseProbeDuration(output));
        } catch (error) {
          reject(error);
        }
      });

      probe.on('error', (error: NodeJS.ErrnoException) => {
        reject(error.code === 'ENOENT'
          ? new Error(`"${this.command}" not found. Install FFmpeg (it ships ffprobe) or set FFPROBE_PATH`)
          : error);
      });
    });
  }
}
