import { once } from 'events';
import { PassThrough, Readable } from 'stream';
import type { AxiosInstance } from 'axios';
import { StreamUnavailable, errorMessage } from '../errors';
import { describeUrl, logDebug, logWarning } from '../utils/logger';

export type SegmentOpener = (url: string, signal: AbortSignal) => Promise<Readable>;

export function httpSegmentOpener(http: AxiosInstance, timeoutMs: number): SegmentOpener {
  return async (url, signal) => {
    const response = await http.get<unknown>(url, { responseType: 'stream', timeout: timeoutMs, signal });
    if (!(response.data instanceof Readable)) {
      throw new StreamUnavailable(`no byte stream from ${describeUrl(url).host}`);
    }
    return response.data;
  };
}

/**
 * Plays `segments` back to back as one Readable. The first segment is opened
 * before this resolves so an unreachable variant fails fast; the rest are
 * fetched one at a time as the consumer reads. Aborting `controller` (or
 * destroying the returned stream) cancels whatever is in flight.
 */
export async function openSegmentedStream(
  segments: readonly string[],
  open: SegmentOpener,
  controller: AbortController
): Promise<Readable> {
  const [firstUrl, ...rest] = segments;
  if (!firstUrl) throw new StreamUnavailable('variant has no segments');

  const first = await open(firstUrl, controller.signal);
  if (segments.length === 1) return first;

  const out = new PassThrough();
  out.once('close', () => controller.abort());

  pump(first, rest, open, out, controller.signal).then(
    () => {
      if (!out.destroyed) out.end();
    },
    (error: unknown) => {
      if (controller.signal.aborted || out.destroyed) return;
      logWarning('segment_stream_failed', { segments: segments.length, error: errorMessage(error) });
      out.destroy(
        error instanceof StreamUnavailable
          ? error
          : new StreamUnavailable(`segment failed: ${errorMessage(error)}`, { cause: error })
      );
    }
  );
  return out;
}

async function pump(
  first: Readable,
  rest: readonly string[],
  open: SegmentOpener,
  out: PassThrough,
  signal: AbortSignal
): Promise<void> {
  await copy(first, out, signal);
  for (const url of rest) {
    if (signal.aborted) return;
    logDebug('segment_opening', describeUrl(url));
    const source = await open(url, signal);
    await copy(source, out, signal);
  }
}

async function copy(source: Readable, out: PassThrough, signal: AbortSignal): Promise<void> {
  const abort = () => source.destroy();
  signal.addEventListener('abort', abort, { once: true });
  try {
    for await (const chunk of source) {
      if (!out.write(chunk)) await once(out, 'drain', { signal });
    }
  } finally {
    signal.removeEventListener('abort', abort);
  }
}
