import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { runAttempts } from './attempts';
import { DiscoveryError, describeError } from './camera.errors';
import { redactTokens } from './redact';

export const DISCOVERY_ATTEMPTS = 2;

const STREAM_URL_PATTERN = /https:\/\/[^\s'"<>]+\.m3u8\?token=[^\s'"<>]+/;

export function extractStreamUrl(responseText: string): string {
  const match = STREAM_URL_PATTERN.exec(responseText);
  if (!match) {
    throw new DiscoveryError('No tokenized m3u8 URL found in auth_token response.');
  }
  return match[0];
}

/**
 * Scrapes the camera site's auth_token endpoint for a short-lived HLS URL.
 * The returned URL carries a token and must never be logged.
 */
@Injectable()
export class StreamLocatorService {
  private readonly logger = new Logger(StreamLocatorService.name);

  constructor(private readonly configService: ConfigService) {}

  async locate(
    cameraId: number = this.configService.get<number>('camera.id', 461),
    pageUrl: string = this.configService.get<string>('camera.pageUrl', ''),
    timeoutMs: number = this.configService.get<number>('camera.discoveryTimeoutMs', 15000),
  ): Promise<string> {
    const outcome = await runAttempts(
      DISCOVERY_ATTEMPTS,
      async () => extractStreamUrl(await this.requestAuthPayload(cameraId, pageUrl, timeoutMs)),
      () => true,
      (error, attempt) => {
        this.logger.warn(
          `Stream discovery attempt ${attempt}/${DISCOVERY_ATTEMPTS} failed for camera ${cameraId}: ${redactTokens(describeError(error))}`,
        );
      },
    );
    if (outcome.ok) return outcome.value;

    throw new DiscoveryError(
      `Unable to discover stream URL from auth_token response. Last error: ${redactTokens(describeError(outcome.lastError))}`,
      { cause: outcome.lastError },
    );
  }

  /** One POST to the auth endpoint; resolves with the raw response body. */
  async requestAuthPayload(cameraId: number, pageUrl: string, timeoutMs: number): Promise<string> {
    const endpoint = this.configService.get<string>('camera.authEndpoint', '');
    const userAgent = this.configService.get<string>('camera.userAgent', 'Mozilla/5.0');
    const page = new URL(pageUrl);
    const body = new URLSearchParams({
      action: 'auth_token',
      id: String(cameraId),
      embed: '0',
      main_referer: '',
    });

    const ac = new AbortController();
    const t = setTimeout(() => ac.abort(), timeoutMs);
    try {
      const res = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'User-Agent': userAgent,
          Origin: `${page.protocol}//${page.host}`,
          Referer: pageUrl,
          'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
        },
        body: body.toString(),
        signal: ac.signal,
      });
      if (!res.ok) {
        throw new DiscoveryError(`auth_token request failed: HTTP ${res.status}`);
      }
      return await res.text();
    } catch (err) {
      if (err instanceof DiscoveryError) throw err;
      const reason = ac.signal.aborted ? `timed out after ${timeoutMs}ms` : describeError(err);
      throw new DiscoveryError(`auth_token request failed: ${redactTokens(reason)}`, { cause: err });
    } finally {
      clearTimeout(t);
    }
  }
}
