/**
 * File server tests bind an ephemeral localhost port inside the test process.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { startFileServer, withFileServer } from '../src/file-server.js';

describe('startFileServer', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lingo-serve-'));
    fs.mkdirSync(path.join(dir, 'audio'));
    fs.writeFileSync(path.join(dir, 'audio', 'script_20250102_030405_0.mp3'), 'fake-mp3');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should serve files under the root directory', async () => {
    const server = await startFileServer({ rootDir: dir, port: 0 });
    try {
      expect(server.port).toBeGreaterThan(0);
      expect(server.baseUrl).toBe(`http://127.0.0.1:${server.port}`);

      const url = server.urlFor(path.join(dir, 'audio', 'script_20250102_030405_0.mp3'));
      expect(url).toBe(`http://127.0.0.1:${server.port}/audio/script_20250102_030405_0.mp3`);

      const response = await fetch(url);
      expect(response.status).toBe(200);
      expect(await response.text()).toBe('fake-mp3');
    } finally {
      await server.close();
    }
  });

  it('should return 404 for missing files', async () => {
    const server = await startFileServer({ rootDir: dir, port: 0 });
    try {
      const response = await fetch(`${server.baseUrl}/audio/nope.mp3`);
      expect(response.status).toBe(404);
    } finally {
      await server.close();
    }
  });

  it('should encode path segments and accept paths relative to the root', async () => {
    const server = await startFileServer({ rootDir: dir, port: 0 });
    try {
      expect(server.urlFor('audio/my clip.mp3')).toBe(`${server.baseUrl}/audio/my%20clip.mp3`);
    } finally {
      await server.close();
    }
  });

  it('should refuse paths outside the root', async () => {
    const server = await startFileServer({ rootDir: dir, port: 0 });
    try {
      expect(() => server.urlFor(path.join(os.tmpdir(), 'elsewhere.mp3'))).toThrow('is not inside');
    } finally {
      await server.close();
    }
  });

  it('should reject when the port is taken', async () => {
    const first = await startFileServer({ rootDir: dir, port: 0 });
    try {
      await expect(startFileServer({ rootDir: dir, port: first.port })).rejects.toThrow('EADDRINUSE');
    } finally {
      await first.close();
    }
  });

  it('should tolerate being closed twice', async () => {
    const server = await startFileServer({ rootDir: dir, port: 0 });
    await server.close();
    await expect(server.close()).resolves.toBeUndefined();
  });
});

describe('withFileServer', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lingo-serve-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return the callback result and stop the server', async () => {
    let baseUrl = '';
    const result = await withFileServer({ rootDir: dir, port: 0 }, async (server) => {
      baseUrl = server.baseUrl;
      return 'done';
    });

    expect(result).toBe('done');
    await expect(fetch(`${baseUrl}/`)).rejects.toThrow();
  });

  it('should stop the server when the callback throws', async () => {
    let baseUrl = '';
    await expect(withFileServer({ rootDir: dir, port: 0 }, async (server) => {
      baseUrl = server.baseUrl;
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(fetch(`${baseUrl}/`)).rejects.toThrow();
  });
});
