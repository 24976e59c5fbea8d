/**
 * Remotion Renderer
 *
 * Runs `npx remotion render <composition> <output> --props <json>` inside the
 * Remotion project and waits for it to exit. Every failure comes back as a
 * RenderResult with the captured output so the batch can move on.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '@lingo-shorts/core';
import type { RenderRequest, RenderResult } from './types.js';

export interface VideoRenderer {
  render(request: RenderRequest): Promise<RenderResult>;
}

export interface RemotionRendererConfig {
  projectDir: string;
  compositionId: string;
  npxCommand?: string;
  timeoutMs?: number;
}

const VIDEO_EXTENSION = /\.(mp4|webm|mov|mkv)$/i;
const OUTPUT_TAIL = 2000;

export function buildRenderArgs(compositionId: string, outputPath: string, props: RenderRequest['props']): string[] {
  return ['remotion', 'render', compositionId, outputPath, '--props', JSON.stringify(props)];
}

export class RemotionRenderer implements VideoRenderer {
  private projectDir: string;
  private compositionId: string;
  private npxCommand: string;
  private timeoutMs: number;

  constructor(config: RemotionRendererConfig) {
    this.projectDir = path.resolve(config.projectDir);
    this.compositionId = config.compositionId;
    this.npxCommand = config.npxCommand ?? 'npx';
    this.timeoutMs = config.timeoutMs ?? 15 * 60 * 1000;
  }

  async render(request: RenderRequest): Promise<RenderResult> {
    // Remotion resolves relative paths against its own project directory.
    const outputPath = path.resolve(request.outputPath);

    if (!VIDEO_EXTENSION.test(outputPath)) {
      const error = `Output path must end in .mp4, .webm, .mov or .mkv: ${outputPath}`;
      logger.error(`[Render] ${error}`);
      return { success: false, outputPath, error };
    }

    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    const args = buildRenderArgs(this.compositionId, outputPath, request.props);
    logger.info(`[Render] Rendering "${request.props.scriptText.slice(0, 30)}..." (${request.props.durationInFrames} frames)`);
    logger.debug(`[Render] ${this.npxCommand} ${args.join(' ')} (cwd ${this.projectDir})`);

    const result = await this.run(args, outputPath);

    if (result.success) {
      logger.info(`[Render] ✅ Rendered ${outputPath}`);
    } else {
      logger.error(`[Render] Failed: ${result.error}`);
      if (result.exitCode !== undefined) logger.error(`[Render] Exit code: ${result.exitCode}`);
      if (result.stdout) logger.error(`[Render] stdout:\n${result.stdout}`);
      if (result.stderr) logger.error(`[Render] stderr:\n${result.stderr}`);
    }
    return result;
  }

  private run(args: string[], outputPath: string): Promise<RenderResult> {
    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (result: RenderResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const child = spawn(this.npxCommand, args, { cwd: this.projectDir });

      timer = setTimeout(() => {
        child.kill();
        finish({
          success: false,
          outputPath,
          stdout: stdout.slice(-OUTPUT_TAIL),
          stderr: stderr.slice(-OUTPUT_TAIL),
          error: `Render timed out after ${this.timeoutMs}ms`,
        });
      }, this.timeoutMs);

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        const missing = error.code === 'ENOENT';
        finish({
          success: false,
          outputPath,
          error: missing
            ? `"${this.npxCommand}" not found. Install Node.js and run npm install in ${this.projectDir}`
            : error.message,
        });
      });

      child.on('close', (code) => {
        const captured = {
          outputPath,
          exitCode: code,
          stdout: stdout.slice(-OUTPUT_TAIL),
          stderr: stderr.slice(-OUTPUT_TAIL),
        };
        if (code !== 0) {
          finish({
            ...captured,
            success: false,
            error: `Remotion exited with code ${code}. Check that ${this.projectDir} has node_modules and a "${this.compositionId}" composition`,
          });
        } else if (!fs.existsSync(outputPath)) {
          finish({ ...captured, success: false, error: `Remotion exited cleanly but ${outputPath} was not written` });
        } else {
          finish({ ...captured, success: true });
        }
      });
    });
  }
}
