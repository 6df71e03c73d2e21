import { ConfigService } from '@nestjs/config';
import { DiscoveryError } from './camera.errors';
import { StreamLocatorService, extractStreamUrl } from './stream-locator.service';

const STREAM_URL = 'https://edge.example.net/live/cam.m3u8?token=test-token';
const PAYLOAD = JSON.stringify({ source: STREAM_URL }).replace(/"/g, "'");

function createLocator() {
  return new StreamLocatorService(
    new ConfigService({
      camera: {
        id: 461,
        pageUrl: 'https://cams.example.com/border/',
        authEndpoint: 'https://cams.example.com/ajax',
        userAgent: 'test-agent',
        discoveryTimeoutMs: 1000,
      },
    }),
  );
}

describe('extractStreamUrl', () => {
  it('finds the tokenized playlist URL', () => {
    expect(extractStreamUrl(PAYLOAD)).toBe(STREAM_URL);
  });

  it('rejects payloads without a playlist', () => {
    expect(() => extractStreamUrl('<html>offline</html>')).toThrow(
      new DiscoveryError('No tokenized m3u8 URL found in auth_token response.'),
    );
  });
});

describe('StreamLocatorService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('retries once after a transient failure', async () => {
    const locator = createLocator();
    const request = jest
      .spyOn(locator, 'requestAuthPayload')
      .mockRejectedValueOnce(new DiscoveryError('auth_token request failed: HTTP 503'))
      .mockResolvedValueOnce(PAYLOAD);

    await expect(locator.locate()).resolves.toBe(STREAM_URL);
    expect(request).toHaveBeenCalledTimes(2);
    expect(request).toHaveBeenCalledWith(461, 'https://cams.example.com/border/', 1000);
  });

  it('gives up after two attempts', async () => {
    const locator = createLocator();
    const request = jest.spyOn(locator, 'requestAuthPayload').mockResolvedValue('<html>offline</html>');

    await expect(locator.locate()).rejects.toThrow(
      'Unable to discover stream URL from auth_token response. Last error: No tokenized m3u8 URL found in auth_token response.',
    );
    expect(request).toHaveBeenCalledTimes(2);
  });

  it('never leaks the token in the final error', async () => {
    const locator = createLocator();
    jest
      .spyOn(locator, 'requestAuthPayload')
      .mockRejectedValue(new Error('bad response for https://edge.example.net/a.m3u8?token=test-secret'));

    await expect(locator.locate()).rejects.toThrow(
      'Unable to discover stream URL from auth_token response. Last error: bad response for https://edge.example.net/a.m3u8?token=<redacted>',
    );
  });

  describe('requestAuthPayload', () => {
    it('posts the auth_token form with browser-like headers', async () => {
      const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(new Response(PAYLOAD, { status: 200 }));

      await expect(
        createLocator().requestAuthPayload(461, 'https://cams.example.com/border/', 1000),
      ).resolves.toBe(PAYLOAD);

      expect(fetchSpy).toHaveBeenCalledWith(
        'https://cams.example.com/ajax',
        expect.objectContaining({
          method: 'POST',
          body: 'action=auth_token&id=461&embed=0&main_referer=',
          headers: {
            'User-Agent': 'test-agent',
            Origin: 'https://cams.example.com',
            Referer: 'https://cams.example.com/border/',
            'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
          },
        }),
      );
    });

    it('fails on non-success status codes', async () => {
      jest.spyOn(global, 'fetch').mockResolvedValue(new Response('denied', { status: 403 }));

      await expect(
        createLocator().requestAuthPayload(461, 'https://cams.example.com/border/', 1000),
      ).rejects.toThrow(new DiscoveryError('auth_token request failed: HTTP 403'));
    });

    it('wraps network errors', async () => {
      jest.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

      await expect(
        createLocator().requestAuthPayload(461, 'https://cams.example.com/border/', 1000),
      ).rejects.toThrow('auth_token request failed: fetch failed');
    });

    it('aborts a request that outlives the timeout', async () => {
      jest.spyOn(global, 'fetch').mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          }),
      );

      await expect(
        createLocator().requestAuthPayload(461, 'https://cams.example.com/border/', 50),
      ).rejects.toThrow('auth_token request failed: timed out after 50ms');
    });
  });
});
