import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Playlist } from '../types/music';
import { Mutex } from '../utils/mutex';
import { createTrack } from '../utils/tracks';
import { errorMessage } from '../errors';
import { logEvent, logWarning } from '../utils/logger';

/**
 * Persistence for playlists. Implementations store what they are given;
 * naming rules and size limits belong to PlaylistStore.
 */
export interface PlaylistRepository {
  load(ownerId: string, name: string): Promise<Playlist | null>;
  save(playlist: Playlist): Promise<void>;
  remove(ownerId: string, name: string): Promise<boolean>;
  /** Names of the owner's playlists in creation order. */
  listNames(ownerId: string): Promise<string[]>;
}

function copyPlaylist(p: Playlist): Playlist {
  return { ...p, tracks: [...p.tracks] };
}

function namesByCreation(playlists: Iterable<Playlist>): string[] {
  return [...playlists].sort((a, b) => a.createdAt - b.createdAt).map((p) => p.name);
}

export class InMemoryPlaylistRepository implements PlaylistRepository {
  private readonly owners = new Map<string, Map<string, Playlist>>();

  async load(ownerId: string, name: string): Promise<Playlist | null> {
    const playlist = this.owners.get(ownerId)?.get(name);
    return playlist ? copyPlaylist(playlist) : null;
  }

  async save(playlist: Playlist): Promise<void> {
    let byName = this.owners.get(playlist.ownerId);
    if (!byName) {
      byName = new Map();
      this.owners.set(playlist.ownerId, byName);
    }
    byName.set(playlist.name, copyPlaylist(playlist));
  }

  async remove(ownerId: string, name: string): Promise<boolean> {
    const byName = this.owners.get(ownerId);
    if (!byName?.delete(name)) return false;
    if (byName.size === 0) this.owners.delete(ownerId);
    return true;
  }

  async listNames(ownerId: string): Promise<string[]> {
    return namesByCreation(this.owners.get(ownerId)?.values() ?? []);
  }
}

const MediaVariantSchema = z.object({
  quality: z.enum(['high', 'medium', 'low']),
  segments: z.array(z.string()),
  mimeType: z.string().optional(),
  bitrateKbps: z.number().optional(),
});

const StoredTrackSchema = z.object({
  title: z.string(),
  durationSeconds: z.number(),
  sourceProvider: z.enum(['youtube', 'spotify', 'soundcloud']),
  mediaRef: z.object({ kind: z.enum(['direct', 'page']), url: z.string().min(1) }),
  requestedQuality: z.enum(['high', 'medium', 'low']),
  variants: z.array(MediaVariantSchema).default([]),
  creator: z.string().optional(),
  pageUrl: z.string().optional(),
  thumbnail: z.string().optional(),
});

const StoredPlaylistSchema = z.object({
  ownerId: z.string(),
  name: z.string(),
  tracks: z.array(StoredTrackSchema),
  createdAt: z.number(),
  updatedAt: z.number(),
});

const StoreFileSchema = z.object({
  version: z.literal(1),
  playlists: z.array(StoredPlaylistSchema),
});

type StoredPlaylist = z.infer<typeof StoredPlaylistSchema>;

function fromStored(stored: StoredPlaylist): Playlist {
  return {
    ownerId: stored.ownerId,
    name: stored.name,
    createdAt: stored.createdAt,
    updatedAt: stored.updatedAt,
    tracks: stored.tracks.map((t) =>
      createTrack({
        title: t.title,
        durationSeconds: t.durationSeconds,
        sourceProvider: t.sourceProvider,
        mediaRef: { kind: t.mediaRef.kind, url: t.mediaRef.url },
        requestedQuality: t.requestedQuality,
        variants: t.variants.map((v) => ({
          quality: v.quality,
          segments: v.segments,
          ...(v.mimeType !== undefined ? { mimeType: v.mimeType } : {}),
          ...(v.bitrateKbps !== undefined ? { bitrateKbps: v.bitrateKbps } : {}),
        })),
        creator: t.creator,
        pageUrl: t.pageUrl,
        thumbnail: t.thumbnail,
      })
    ),
  };
}

/**
 * Keeps every playlist in one JSON document. The document is loaded on first
 * use and rewritten whole after each change, through a temp file and a rename.
 */
export class JsonFilePlaylistRepository implements PlaylistRepository {
  private state: Map<string, Playlist> | null = null;
  private loading: Promise<Map<string, Playlist>> | null = null;
  private readonly writes = new Mutex();

  constructor(private readonly filePath: string) {}

  async load(ownerId: string, name: string): Promise<Playlist | null> {
    const state = await this.ensureLoaded();
    const playlist = state.get(this.key(ownerId, name));
    return playlist ? copyPlaylist(playlist) : null;
  }

  async save(playlist: Playlist): Promise<void> {
    await this.commit((next) => {
      next.set(this.key(playlist.ownerId, playlist.name), copyPlaylist(playlist));
      return true;
    });
  }

  async remove(ownerId: string, name: string): Promise<boolean> {
    return this.commit((next) => next.delete(this.key(ownerId, name)));
  }

  async listNames(ownerId: string): Promise<string[]> {
    const state = await this.ensureLoaded();
    return namesByCreation([...state.values()].filter((p) => p.ownerId === ownerId));
  }

  private key(ownerId: string, name: string): string {
    return JSON.stringify([ownerId, name]);
  }

  private ensureLoaded(): Promise<Map<string, Playlist>> {
    if (this.state) return Promise.resolve(this.state);
    if (!this.loading) {
      this.loading = this.read().then(
        (state) => {
          this.state = state;
          return state;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    }
    return this.loading;
  }

  private async read(): Promise<Map<string, Playlist>> {
    const state = new Map<string, Playlist>();
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return state;
      throw error;
    }

    const parsed = StoreFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Playlist file ${this.filePath} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    for (const stored of parsed.data.playlists) {
      const playlist = fromStored(stored);
      state.set(this.key(playlist.ownerId, playlist.name), playlist);
    }
    logEvent('playlist_file_loaded', { path: this.filePath, playlists: state.size });
    return state;
  }

  /**
   * Applies `change` to a copy of the state and adopts the copy only once it
   * is on disk. A change that returns false writes nothing.
   */
  private commit(change: (next: Map<string, Playlist>) => boolean): Promise<boolean> {
    return this.writes.run(async () => {
      const next = new Map(await this.ensureLoaded());
      if (!change(next)) return false;
      await this.write(next);
      this.state = next;
      return true;
    });
  }

  private async write(state: Map<string, Playlist>): Promise<void> {
    const body = JSON.stringify({ version: 1, playlists: [...state.values()] }, null, 2);
    const dir = path.dirname(this.filePath);
    const tempPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);
    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(tempPath, body, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      logWarning('playlist_file_write_failed', { path: this.filePath, error: errorMessage(error) });
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logWarning('playlist_temp_cleanup_failed', { path: tempPath, error: errorMessage(cleanupError) });
      });
      throw error;
    }
  }
}
