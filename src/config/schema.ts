import { z } from 'zod';
import { PlayerConfig, PROVIDER_IDS, ProviderId } from '../types/music';

// Helpers to coerce and validate env values
const intInRange = (min: number, max: number, def: number) =>
  z.preprocess((v) => {
    if (typeof v === 'number') return v;
    if (typeof v === 'string' && v.trim() !== '') {
      const n = Number(v);
      if (Number.isFinite(n)) return n;
    }
    return def;
  }, z.number().int().min(min).max(max));

const numberInRange = (min: number, max: number, def: number) =>
  z.preprocess((v) => {
    if (typeof v === 'number') return v;
    if (typeof v === 'string' && v.trim() !== '') {
      const n = Number(v);
      if (Number.isFinite(n)) return n;
    }
    return def;
  }, z.number().min(min).max(max));

const optionalString = () =>
  z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), z.string().optional());

const providerList = z
  .string()
  .optional()
  .default(PROVIDER_IDS.join(','))
  .transform((raw, ctx) => {
    const out: ProviderId[] = [];
    for (const part of raw.split(',')) {
      const id = part.trim().toLowerCase();
      if (!id) continue;
      const parsed = z.enum(['youtube', 'spotify', 'soundcloud']).safeParse(id);
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown provider "${id}"` });
        return z.NEVER;
      }
      if (!out.includes(parsed.data)) out.push(parsed.data);
    }
    if (out.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'at least one provider is required' });
      return z.NEVER;
    }
    return out;
  });

const quality = z
  .string()
  .optional()
  .default('high')
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(['high', 'medium', 'low']));

const allowedLogLevels = ['error', 'warn', 'info', 'debug', 'verbose', 'silly'] as const;

const EnvSchema = z.object({
  MAX_QUEUE_SIZE: intInRange(1, 1000, 100).optional().default(100),
  MAX_PLAYLIST_SIZE: intInRange(1, 1000, 50).optional().default(50),
  DOWNLOAD_PATH: z.string().optional().default('./downloads'),
  PROVIDER_PRIORITY: providerList,
  RESOLUTION_TIMEOUT_MS: intInRange(100, 120000, 10000).optional().default(10000),
  VERIFICATION_TIMEOUT_MS: intInRange(100, 60000, 5000).optional().default(5000),
  RETRY_BUDGET: intInRange(0, 10, 3).optional().default(3),
  MAX_RESULTS_PER_PROVIDER: intInRange(1, 25, 3).optional().default(3),
  RESOLUTION_CACHE_TTL_MINUTES: intInRange(0, 1440, 10).optional().default(10),
  TITLE_MATCH_STEP: numberInRange(0.01, 1, 0.1).optional().default(0.1),
  DEFAULT_QUALITY: quality,
  STREAM_TIMEOUT_MS: intInRange(1000, 120000, 15000).optional().default(15000),
  INACTIVITY_TIMEOUT: intInRange(0, 3600, 60).optional().default(60),
  DEFAULT_VOLUME: intInRange(0, 100, 50).optional().default(50),

  SOUNDCLOUD_CLIENT_ID: optionalString(),
  PLAYLIST_STORE_PATH: optionalString(),
  YTDLP_PATH: z.string().optional().default('yt-dlp'),
  YTDLP_COOKIES: optionalString(),

  LOG_LEVEL: z.string().optional(),
  LOG_MAX_SIZE_MB: intInRange(1, 200, 10).optional().default(10),
  LOG_MAX_FILES: intInRange(1, 20, 3).optional().default(3),
});

function isLogLevel(level: string): level is (typeof allowedLogLevels)[number] {
  return (allowedLogLevels as readonly string[]).includes(level);
}

export function loadPlayerConfig(env: NodeJS.ProcessEnv = process.env): PlayerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const data = parsed.data;
  const nodeEnv = (env.NODE_ENV || '').toLowerCase();
  const defaultLogLevel = nodeEnv === 'production' ? 'info' : 'debug';
  const inputLevel = data.LOG_LEVEL ? data.LOG_LEVEL.trim().toLowerCase() : defaultLogLevel;

  const cfg: PlayerConfig = {
    maxQueueSize: data.MAX_QUEUE_SIZE,
    maxPlaylistSize: data.MAX_PLAYLIST_SIZE,
    downloadPath: data.DOWNLOAD_PATH,
    providerPriorityOrder: data.PROVIDER_PRIORITY,
    resolutionTimeoutMs: data.RESOLUTION_TIMEOUT_MS,
    verificationTimeoutMs: data.VERIFICATION_TIMEOUT_MS,
    retryBudget: data.RETRY_BUDGET,
    maxResultsPerProvider: data.MAX_RESULTS_PER_PROVIDER,
    resolutionCacheTtlMs: data.RESOLUTION_CACHE_TTL_MINUTES * 60 * 1000,
    defaultQuality: data.DEFAULT_QUALITY,
    streamTimeoutMs: data.STREAM_TIMEOUT_MS,
    inactivityTimeoutMs: data.INACTIVITY_TIMEOUT * 1000,
    defaultVolume: data.DEFAULT_VOLUME / 100,
    scoring: { titleMatchStep: data.TITLE_MATCH_STEP },
    ...(data.SOUNDCLOUD_CLIENT_ID ? { soundcloudClientId: data.SOUNDCLOUD_CLIENT_ID } : {}),
    ...(data.PLAYLIST_STORE_PATH ? { playlistStorePath: data.PLAYLIST_STORE_PATH } : {}),
    ytdlp: {
      path: data.YTDLP_PATH,
      ...(data.YTDLP_COOKIES ? { cookiesPath: data.YTDLP_COOKIES } : {}),
    },
    logging: {
      level: isLogLevel(inputLevel) ? inputLevel : defaultLogLevel,
      maxSizeBytes: data.LOG_MAX_SIZE_MB * 1024 * 1024,
      maxFiles: data.LOG_MAX_FILES,
    },
  };

  return cfg;
}
