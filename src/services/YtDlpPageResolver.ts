import { spawn } from 'child_process';
import type { MediaVariant, Quality } from '../types/music';
import { StreamUnavailable, errorMessage } from '../errors';
import { describeUrl, logEvent, logError } from '../utils/logger';

export interface ProcessResult {
  stdout: string;
  stderr: string;
  code: number;
  timedOut: boolean;
}

export type ProcessRunner = (command: string, args: string[], timeoutMs: number) => Promise<ProcessResult>;

export const FORMAT_SELECTORS: Record<Quality, string> = {
  high: 'bestaudio[ext=m4a]/bestaudio/best',
  medium: 'bestaudio[abr<=128]/bestaudio',
  low: 'worstaudio/bestaudio',
};

/** Spawns a process, collecting its output. Killed with SIGKILL once `timeoutMs` passes. */
export const runProcess: ProcessRunner = (command, args, timeoutMs) =>
  new Promise((resolve) => {
    const child = spawn(command, args);
    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    child.stdout.on('data', (d: Buffer) => { stdout += d.toString(); });
    child.stderr.on('data', (d: Buffer) => { stderr += d.toString(); });
    child.on('close', (code) => {
      clearTimeout(timer);
      resolve({ stdout, stderr, code: code ?? -1, timedOut });
    });
    child.on('error', (err) => {
      clearTimeout(timer);
      resolve({ stdout: '', stderr: err.message, code: -1, timedOut });
    });
  });

export interface YtDlpOptions {
  path: string;
  cookiesPath?: string | undefined;
  timeoutMs: number;
}

/**
 * Turns a provider page URL into a playable direct URL with `yt-dlp -g`.
 */
export class YtDlpPageResolver {
  constructor(
    private readonly options: YtDlpOptions,
    private readonly run: ProcessRunner = runProcess
  ) {}

  buildArgs(pageUrl: string, quality: Quality): string[] {
    const args = ['-g', '-f', FORMAT_SELECTORS[quality], '--no-playlist', '--no-warnings'];
    if (this.options.cookiesPath) args.push('--cookies', this.options.cookiesPath);
    args.push(pageUrl);
    return args;
  }

  async resolve(pageUrl: string, quality: Quality): Promise<MediaVariant[]> {
    const args = this.buildArgs(pageUrl, quality);
    logEvent('ytdlp_resolve_started', { ...describeUrl(pageUrl), quality });

    let result: ProcessResult;
    try {
      result = await this.run(this.options.path, args, this.options.timeoutMs);
    } catch (error) {
      throw new StreamUnavailable(`yt-dlp could not start: ${errorMessage(error)}`, { cause: error });
    }

    if (result.timedOut) {
      logError('ytdlp_resolve_timeout', undefined, { ...describeUrl(pageUrl), timeoutMs: this.options.timeoutMs });
      throw new StreamUnavailable(`yt-dlp timed out after ${this.options.timeoutMs}ms`);
    }
    if (result.code !== 0) {
      logError('ytdlp_resolve_failed', new Error(result.stderr.trim() || `exit ${result.code}`), {
        ...describeUrl(pageUrl),
        exitCode: result.code,
      });
      throw new StreamUnavailable(`yt-dlp exited with code ${result.code}`);
    }

    const url = result.stdout
      .split('\n')
      .map((line) => line.trim())
      .find((line) => /^https?:\/\//i.test(line));
    if (!url) {
      throw new StreamUnavailable('yt-dlp returned no stream URL');
    }

    logEvent('ytdlp_resolve_completed', { page: describeUrl(pageUrl), stream: describeUrl(url), quality });
    return [{ quality, segments: [url] }];
  }
}
