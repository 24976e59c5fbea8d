/**
 * Ephemeral File Server
 *
 * Serves the work directory over local HTTP for the length of one run, so the
 * renderer (which cannot read local paths) can fetch narration by URL.
 */

import * as path from 'path';
import type { Server } from 'http';
import express from 'express';
import { logger } from '@lingo-shorts/core';

export interface FileServerOptions {
  rootDir: string;
  port: number;
  host?: string;
  /** How long close() waits for open connections before dropping them. */
  closeTimeoutMs?: number;
}

export interface FileServer {
  readonly port: number;
  readonly baseUrl: string;
  readonly rootDir: string;
  /** URL of a file under rootDir. */
  urlFor(filePath: string): string;
  close(): Promise<void>;
}

function publicHost(host: string): string {
  return host === '0.0.0.0' || host === '::' ? 'localhost' : host;
}

export async function startFileServer(options: FileServerOptions): Promise<FileServer> {
  const rootDir = path.resolve(options.rootDir);
  const host = options.host ?? '127.0.0.1';
  const closeTimeoutMs = options.closeTimeoutMs ?? 2000;

  const app = express();
  app.disable('x-powered-by');
  app.use(express.static(rootDir, { index: false, dotfiles: 'ignore' }));

  const server: Server = await new Promise((resolve, reject) => {
    const listening = app.listen(options.port, host);
    listening.once('listening', () => resolve(listening));
    listening.once('error', reject);
  });

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : options.port;
  const baseUrl = `http://${publicHost(host)}:${port}`;
  logger.info(`[FileServer] Serving ${rootDir} at ${baseUrl}`);

  let closed: Promise<void> | null = null;

  return {
    port,
    baseUrl,
    rootDir,

    urlFor(filePath: string): string {
      const relative = path.relative(rootDir, path.resolve(rootDir, filePath));
      if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
        throw new Error(`${filePath} is not inside ${rootDir}`);
      }
      return `${baseUrl}/${relative.split(path.sep).map(encodeURIComponent).join('/')}`;
    },

    close(): Promise<void> {
      if (closed) return closed;
      closed = new Promise((resolve) => {
        const timer = setTimeout(() => {
          logger.warn('[FileServer] Connections still open after timeout, dropping them');
          server.closeAllConnections();
        }, closeTimeoutMs);

        server.close((error) => {
          clearTimeout(timer);
          if (error) logger.warn(`[FileServer] Close reported: ${error.message}`);
          logger.info('[FileServer] Stopped');
          resolve();
        });
        server.closeIdleConnections();
      });
      return closed;
    },
  };
}

/**
 * Run `fn` with a live file server and always shut it down afterwards,
 * whether `fn` returns early or throws.
 */
export async function withFileServer<T>(
  options: FileServerOptions,
  fn: (server: FileServer) => Promise<T>,
): Promise<T> {
  const server = await startFileServer(options);
  try {
    return await fn(server);
  } finally {
    await server.close();
  }
}
