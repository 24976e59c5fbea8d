import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigError } from '@lingo-shorts/core';

const { tweetMock, meMock, credentialsMock } = vi.hoisted(() => ({
  tweetMock: vi.fn(),
  meMock: vi.fn(),
  credentialsMock: vi.fn(),
}));

vi.mock('twitter-api-v2', () => ({
  TwitterApi: class {
    constructor(credentials: unknown) {
      credentialsMock(credentials);
    }
    get readWrite() {
      return { v2: { tweet: tweetMock, me: meMock } };
    }
  },
}));

import { XPoster, DryRunPoster, tweetUrl } from '../src/x-poster.js';

const credentials = {
  appKey: 'test-app-key',
  appSecret: 'test-app-secret',
  accessToken: 'test-token',
  accessSecret: 'test-token-secret',
};

describe('XPoster', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should build the client from the OAuth 1.0a credentials', () => {
    new XPoster(credentials);
    expect(credentialsMock).toHaveBeenCalledWith(credentials);
  });

  it('should return the id and URL of a new post', async () => {
    tweetMock.mockResolvedValue({ data: { id: '1234567890', text: 'hello' } });
    const poster = new XPoster(credentials);

    const result = await poster.post('hello');

    expect(tweetMock).toHaveBeenCalledWith('hello');
    expect(result).toEqual({ success: true, id: '1234567890', url: 'https://x.com/i/web/status/1234567890' });
  });

  it('should report a rejected post as a failure', async () => {
    tweetMock.mockRejectedValue(Object.assign(new Error('Request failed with code 403'), {
      data: { detail: 'You are not permitted to perform this action.' },
    }));
    const poster = new XPoster(credentials);

    const result = await poster.post('hello');

    expect(result).toEqual({ success: false, error: 'Request failed with code 403' });
  });

  it('should return the username when the credentials work', async () => {
    meMock.mockResolvedValue({ data: { id: '42', name: 'Lingo', username: 'lingo_daily' } });
    await expect(new XPoster(credentials).verify()).resolves.toBe('lingo_daily');
  });

  it('should turn a failed verification into a configuration error', async () => {
    meMock.mockRejectedValue(new Error('Request failed with code 401'));
    const verify = new XPoster(credentials).verify();

    await expect(verify).rejects.toBeInstanceOf(ConfigError);
    await expect(verify).rejects.toThrow('X authentication failed: Request failed with code 401');
  });
});

describe('DryRunPoster', () => {
  it('should record the text and report success without posting', async () => {
    const poster = new DryRunPoster();

    const result = await poster.post('practice post');

    expect(result).toEqual({ success: true, id: 'dry-run' });
    expect(poster.posted).toEqual(['practice post']);
    expect(tweetMock).not.toHaveBeenCalled();
  });
});

describe('tweetUrl', () => {
  it('should link to the post by id', () => {
    expect(tweetUrl('99')).toBe('https://x.com/i/web/status/99');
  });
});
