import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventEmitter } from 'events';

const spawnMock = vi.hoisted(() => vi.fn());

vi.mock('child_process', () => ({
  spawn: spawnMock,
}));

import { FfprobeAudioProbe, parseProbeDuration } from '../src/audio-probe.js';

class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
}

function fakeProcess(stdout: string, code: number, stderr = ''): FakeChild {
  const child = new FakeChild();
  setImmediate(() => {
    if (stdout) child.stdout.emit('data', Buffer.from(stdout));
    if (stderr) child.stderr.emit('data', Buffer.from(stderr));
    child.emit('close', code);
  });
  return child;
}

describe('parseProbeDuration', () => {
  it('should read format.duration', () => {
    expect(parseProbeDuration('{"format":{"duration":"9.300000"}}')).toBe(9.3);
  });

  it('should reject output without a duration', () => {
    expect(() => parseProbeDuration('{"format":{}}')).toThrow('ffprobe output has no duration');
    expect(() => parseProbeDuration('{}')).toThrow('ffprobe output has no format section');
  });

  it('should reject a non-numeric duration', () => {
    expect(() => parseProbeDuration('{"format":{"duration":"N/A"}}')).toThrow('ffprobe reported an invalid duration: N/A');
  });
});

describe('FfprobeAudioProbe', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should run ffprobe and return the duration', async () => {
    spawnMock.mockImplementation(() => fakeProcess('{"format":{"duration":"12.5"}}', 0));

    const probe = new FfprobeAudioProbe();
    await expect(probe.durationSeconds('/tmp/a.mp3')).resolves.toBe(12.5);
    expect(spawnMock).toHaveBeenCalledWith('ffprobe', [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'json',
      '/tmp/a.mp3',
    ]);
  });

  it('should run the configured ffprobe binary', async () => {
    spawnMock.mockImplementation(() => fakeProcess('{"format":{"duration":"3"}}', 0));

    await new FfprobeAudioProbe('/opt/ffmpeg/bin/ffprobe').durationSeconds('/tmp/a.mp3');
    expect(spawnMock.mock.calls[0][0]).toBe('/opt/ffmpeg/bin/ffprobe');
  });

  it('should reject when ffprobe fails', async () => {
    spawnMock.mockImplementation(() => fakeProcess('', 1, 'No such file'));

    const probe = new FfprobeAudioProbe();
    await expect(probe.durationSeconds('/tmp/missing.mp3')).rejects.toThrow('ffprobe exited with code 1: No such file');
  });

  it('should reject when ffprobe is not installed', async () => {
    spawnMock.mockImplementation(() => {
      const child = new FakeChild();
      setImmediate(() => child.emit('error', Object.assign(new Error('spawn ffprobe ENOENT'), { code: 'ENOENT' })));
      return child;
    });

    const probe = new FfprobeAudioProbe();
    await expect(probe.durationSeconds('/tmp/a.mp3')).rejects.toThrow('"ffprobe" not found. Install FFmpeg (it ships ffprobe) or set FFPROBE_PATH');
  });
});
