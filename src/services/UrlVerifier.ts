import { Readable } from 'stream';
import type { AxiosInstance, AxiosResponse } from 'axios';
import type { MediaRef } from '../types/music';
import { withTimeout } from '../utils/async';
import { describeUrl, logDebug, logWarning } from '../utils/logger';
import { errorMessage } from '../errors';

const PLAYABLE_CONTENT_TYPE = /^(audio\/|video\/|application\/octet-stream)|mpegurl/i;

export function isPlayableContentType(contentType: string | undefined): boolean {
  if (!contentType) return true;
  return PLAYABLE_CONTENT_TYPE.test(contentType.trim());
}

/**
 * Probes a media locator with a HEAD request (or a one-byte ranged GET when the
 * host refuses HEAD). Resolves false on any failure; never rejects.
 */
export class UrlVerifier {
  constructor(
    private readonly http: AxiosInstance,
    private readonly timeoutMs: number
  ) {}

  async verify(ref: MediaRef): Promise<boolean> {
    const target = describeUrl(ref.url);
    try {
      const response = await withTimeout(
        (signal) => this.probe(ref.url, signal),
        this.timeoutMs,
        () => new Error(`verification timed out after ${this.timeoutMs}ms`)
      );

      if (response.status < 200 || response.status >= 300) {
        logDebug('url_verification_rejected', { ...target, kind: ref.kind, status: response.status });
        return false;
      }

      if (ref.kind === 'page') {
        logDebug('url_verified', { ...target, kind: ref.kind, status: response.status });
        return true;
      }

      const contentType = headerValue(response, 'content-type');
      const ok = isPlayableContentType(contentType);
      logDebug(ok ? 'url_verified' : 'url_verification_rejected', {
        ...target,
        kind: ref.kind,
        status: response.status,
        contentType,
      });
      return ok;
    } catch (error) {
      logWarning('url_verification_failed', { ...target, kind: ref.kind, error: errorMessage(error) });
      return false;
    }
  }

  private async probe(url: string, signal: AbortSignal): Promise<AxiosResponse<unknown>> {
    const head = await this.http.head<unknown>(url, {
      signal,
      timeout: this.timeoutMs,
      validateStatus: () => true,
    });
    if (head.status !== 405) return head;

    const ranged = await this.http.get<unknown>(url, {
      signal,
      timeout: this.timeoutMs,
      headers: { Range: 'bytes=0-0' },
      responseType: 'stream',
      validateStatus: () => true,
    });
    if (ranged.data instanceof Readable) ranged.data.destroy();
    return ranged;
  }
}

function headerValue(response: AxiosResponse<unknown>, name: string): string | undefined {
  const value: unknown = response.headers[name];
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}
