import type { Readable } from 'stream';

export type ProviderId = 'youtube' | 'spotify' | 'soundcloud';

export const PROVIDER_IDS: readonly ProviderId[] = ['youtube', 'spotify', 'soundcloud'];

export type Quality = 'high' | 'medium' | 'low';

// Highest first
export const QUALITY_TIERS: readonly Quality[] = ['high', 'medium', 'low'];

export type LoopMode = 'off' | 'track' | 'queue';

export type SessionStatus = 'idle' | 'playing' | 'paused' | 'error';

export type MediaRef =
  | { kind: 'direct'; url: string }
  | { kind: 'page'; url: string };

export interface MediaVariant {
  quality: Quality;
  // Played back-to-back as one stream
  segments: readonly string[];
  mimeType?: string;
  bitrateKbps?: number;
}

export interface Track {
  readonly title: string;
  readonly durationSeconds: number; // 0 = unknown / live
  readonly sourceProvider: ProviderId;
  readonly mediaRef: MediaRef;
  readonly requestedQuality: Quality;
  readonly variants: readonly MediaVariant[];
  readonly creator?: string;
  readonly pageUrl?: string;
  readonly thumbnail?: string;
}

export interface TrackCandidate {
  title: string;
  durationSeconds: number;
  sourceProvider: ProviderId;
  verified: boolean;
  quality: Quality;
  // Alternatives in priority order
  mediaRefs: MediaRef[];
  variants: MediaVariant[];
  creator?: string;
  pageUrl?: string;
  thumbnail?: string;
}

export interface StreamHandle {
  readonly track: Track;
  readonly quality: Quality;
  readonly mimeType?: string;
  readonly stream: Readable;
  close(): void;
}

export interface QueueSnapshot {
  items: readonly Track[];
  cursor: number | null;
  loopMode: LoopMode;
  shuffleEnabled: boolean;
}

export interface SessionSnapshot extends QueueSnapshot {
  guildId: string;
  status: SessionStatus;
  nowPlaying: Track | null;
  preparing: boolean;
  // 0..1
  volume: number;
}

export interface Playlist {
  ownerId: string;
  name: string;
  tracks: Track[];
  createdAt: number;
  updatedAt: number;
}

export interface ScoringPolicy {
  // Title similarities within the same step compare as equal
  titleMatchStep: number;
}

export interface PlayerConfig {
  maxQueueSize: number;
  maxPlaylistSize: number;
  downloadPath: string;
  providerPriorityOrder: ProviderId[];
  resolutionTimeoutMs: number;
  verificationTimeoutMs: number;
  retryBudget: number;
  maxResultsPerProvider: number;
  resolutionCacheTtlMs: number;
  defaultQuality: Quality;
  streamTimeoutMs: number;
  inactivityTimeoutMs: number;
  // 0..1, for new sessions
  defaultVolume: number;
  scoring: ScoringPolicy;
  soundcloudClientId?: string;
  playlistStorePath?: string;
  ytdlp: {
    path: string;
    cookiesPath?: string;
  };
  logging: {
    level: string;
    maxSizeBytes?: number;
    maxFiles?: number;
  };
}
