import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import os from 'os';
import { MusicManager, type MusicManagerDeps } from '../services/MusicManager';
import type { TrackResolver } from '../services/DownloadService';
import { DownloadService } from '../services/DownloadService';
import { PlaylistStore } from '../services/PlaylistStore';
import { InMemoryPlaylistRepository } from '../services/playlistRepositories';
import { PlaylistNotFound, ResolutionFailed } from '../errors';
import type { ProviderId, Quality, Track } from '../types/music';
import { ImmediatePreparer, RecordingSink, flush, makeTrack } from './fixtures';

class FakeResolver implements TrackResolver {
  readonly calls: [string, ProviderId | undefined, Quality | undefined][] = [];
  private readonly gates = new Map<string, Promise<void>>();

  /** Holds resolutions of `query` until the returned function is called. */
  hold(query: string): () => void {
    let release: () => void = () => undefined;
    this.gates.set(query, new Promise<void>((resolve) => {
      release = resolve;
    }));
    return () => release();
  }

  async resolve(query: string, provider?: ProviderId, quality?: Quality): Promise<Track> {
    this.calls.push([query, provider, quality]);
    await this.gates.get(query);
    if (query === 'missing') throw new ResolutionFailed(query, ['youtube', 'spotify']);
    return makeTrack(query);
  }
}

describe('MusicManager', () => {
  let resolver: FakeResolver;
  let sinks: Map<string, RecordingSink>;

  function createManager(inactivityTimeoutMs = 0): MusicManager {
    const preparer = new ImmediatePreparer();
    const deps: MusicManagerDeps = {
      resolver,
      preparer,
      playlists: new PlaylistStore(new InMemoryPlaylistRepository(), 10),
      downloads: new DownloadService(resolver, preparer, os.tmpdir()),
      sinkFactory: (guildId) => {
        const sink = new RecordingSink();
        sinks.set(guildId, sink);
        return sink;
      },
      config: { maxQueueSize: 10, retryBudget: 2, inactivityTimeoutMs, defaultQuality: 'high', defaultVolume: 0.5 },
    };
    return new MusicManager(deps);
  }

  function sinkOf(guildId: string): RecordingSink {
    const sink = sinks.get(guildId);
    if (!sink) throw new Error(`no sink for ${guildId}`);
    return sink;
  }

  beforeEach(() => {
    resolver = new FakeResolver();
    sinks = new Map();
  });

  describe('play', () => {
    it('should resolve, queue and start playback', async () => {
      const manager = createManager();
      const nowPlaying: [string, string][] = [];
      manager.on('nowPlaying', (guildId, track) => nowPlaying.push([guildId, track.title]));

      const result = await manager.play('guild-1', 'Night Drive', { provider: 'soundcloud' });

      expect(result).toMatchObject({ status: 'queued', position: 0, track: { title: 'Night Drive' } });
      expect(resolver.calls).toEqual([['Night Drive', 'soundcloud', 'high']]);
      expect(nowPlaying).toEqual([['guild-1', 'Night Drive']]);
      expect(manager.getNowPlaying('guild-1')?.title).toBe('Night Drive');
    });

    it('should queue behind the current track', async () => {
      const manager = createManager();
      await manager.play('guild-1', 'Night Drive');

      const result = await manager.play('guild-1', 'Harbor Lights', { quality: 'low' });

      expect(result).toMatchObject({ status: 'queued', position: 1 });
      expect(resolver.calls[1]).toEqual(['Harbor Lights', undefined, 'low']);
      expect(manager.getNowPlaying('guild-1')?.title).toBe('Night Drive');
    });

    it('should discard a result that resolves after stop', async () => {
      const manager = createManager();
      const release = resolver.hold('Night Drive');

      const pending = manager.play('guild-1', 'Night Drive');
      await manager.stop('guild-1');
      release();

      await expect(pending).resolves.toMatchObject({ status: 'discarded', track: { title: 'Night Drive' } });
      expect(manager.getQueue('guild-1').items).toEqual([]);
      expect(sinkOf('guild-1').played).toEqual([]);
    });

    it('should discard a result that resolves after skip', async () => {
      const manager = createManager();
      await manager.play('guild-1', 'Night Drive');
      const release = resolver.hold('Harbor Lights');

      const pending = manager.play('guild-1', 'Harbor Lights');
      await manager.skip('guild-1');
      release();

      await expect(pending).resolves.toMatchObject({ status: 'discarded' });
    });

    it('should keep a result when the previous track simply finished meanwhile', async () => {
      const manager = createManager();
      await manager.play('guild-1', 'Night Drive');
      const release = resolver.hold('Harbor Lights');

      const pending = manager.play('guild-1', 'Harbor Lights');
      sinkOf('guild-1').lastTicket().finished();
      await flush();
      release();

      await expect(pending).resolves.toMatchObject({ status: 'queued', position: 1 });
      expect(manager.getNowPlaying('guild-1')?.title).toBe('Harbor Lights');
    });

    it('should discard a result that resolves after the guild disconnected', async () => {
      const manager = createManager();
      const release = resolver.hold('Night Drive');

      const pending = manager.play('guild-1', 'Night Drive');
      await manager.disconnect('guild-1');
      release();

      await expect(pending).resolves.toMatchObject({ status: 'discarded', track: { title: 'Night Drive' } });
      expect(manager.hasSession('guild-1')).toBe(false);
      expect(sinkOf('guild-1').played).toEqual([]);
    });

    it('should pass resolution failures through', async () => {
      const manager = createManager();

      await expect(manager.play('guild-1', 'missing')).rejects.toBeInstanceOf(ResolutionFailed);
    });
  });

  describe('queue', () => {
    it('should enqueue without starting playback', async () => {
      const manager = createManager();

      const result = await manager.enqueue('guild-1', 'Night Drive');

      expect(result).toMatchObject({ status: 'queued', position: 0 });
      expect(manager.getQueue('guild-1')).toMatchObject({ status: 'idle', nowPlaying: null });
      expect(sinkOf('guild-1').played).toEqual([]);
    });

    it('should report an empty queue for an unknown guild', () => {
      const manager = createManager();

      expect(manager.getQueue('guild-9')).toEqual({
        guildId: 'guild-9',
        status: 'idle',
        nowPlaying: null,
        preparing: false,
        volume: 0.5,
        items: [],
        cursor: null,
        loopMode: 'off',
        shuffleEnabled: false,
      });
      expect(manager.hasSession('guild-9')).toBe(false);
    });

    it('should set the guild volume on its sink', async () => {
      const manager = createManager();
      await manager.play('guild-1', 'Night Drive');

      await expect(manager.setVolume('guild-1', 0.8)).resolves.toBe(0.8);
      await expect(manager.setVolume('guild-1', 4)).resolves.toBe(1);

      expect(sinkOf('guild-1').volumes).toEqual([0.5, 0.8, 1]);
      expect(manager.getQueue('guild-1').volume).toBe(1);
    });

    it('should keep guilds apart', async () => {
      const manager = createManager();
      await manager.play('guild-1', 'Night Drive');
      await manager.play('guild-2', 'Harbor Lights');

      await manager.clearQueue('guild-1');

      expect(manager.getQueue('guild-1').items).toEqual([]);
      expect(manager.getQueue('guild-2').items.map((t) => t.title)).toEqual(['Harbor Lights']);
    });

    it('should forward queue edits to the session', async () => {
      const manager = createManager();
      await manager.enqueue('guild-1', 'Alpha');
      await manager.enqueue('guild-1', 'Bravo');
      await manager.enqueue('guild-1', 'Charlie');

      await manager.moveInQueue('guild-1', 0, 2);
      const removed = await manager.removeFromQueue('guild-1', 0);
      await manager.setLoopMode('guild-1', 'queue');
      await manager.setShuffle('guild-1', true);

      expect(removed.title).toBe('Bravo');
      expect(manager.getQueue('guild-1')).toMatchObject({ loopMode: 'queue', shuffleEnabled: true });
      expect(manager.getQueue('guild-1').items.map((t) => t.title)).toEqual(['Charlie', 'Alpha']);
    });
  });

  describe('playlists', () => {
    it('should play a saved playlist into the queue', async () => {
      const manager = createManager();
      await manager.playlistAdd('user-1', 'Mix', 'Alpha');
      await manager.playlistAdd('user-1', 'Mix', 'Bravo');

      await expect(manager.playlistPlay('guild-1', 'user-1', 'Mix')).resolves.toBe(2);

      expect(manager.getQueue('guild-1').items.map((t) => t.title)).toEqual(['Alpha', 'Bravo']);
      expect(manager.getNowPlaying('guild-1')?.title).toBe('Alpha');
    });

    it('should queue nothing for an empty playlist', async () => {
      const manager = createManager();
      await manager.playlistCreate('user-1', 'Empty');

      await expect(manager.playlistPlay('guild-1', 'user-1', 'Empty')).resolves.toBe(0);
      expect(manager.getQueue('guild-1').items).toEqual([]);
    });

    it('should fail for a missing playlist', async () => {
      const manager = createManager();

      await expect(manager.playlistPlay('guild-1', 'user-1', 'Nope')).rejects.toBeInstanceOf(PlaylistNotFound);
    });

    it('should manage playlists by owner', async () => {
      const manager = createManager();
      await manager.playlistAdd('user-1', 'Mix', 'Alpha');
      await manager.playlistCreate('user-1', 'Later');

      await manager.playlistRename('user-1', 'Later', 'Sunday');
      await manager.playlistDelete('user-1', 'Mix');

      await expect(manager.playlistList('user-1')).resolves.toEqual(['Sunday']);
    });
  });

  describe('session lifecycle', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should close an idle session after the inactivity timeout', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const manager = createManager(1000);
      const closed: [string, string][] = [];
      manager.on('sessionClosed', (guildId, reason) => closed.push([guildId, reason]));
      await manager.play('guild-1', 'Night Drive');

      sinkOf('guild-1').lastTicket().finished();
      await flush();
      await vi.advanceTimersByTimeAsync(999);
      expect(closed).toEqual([]);
      await vi.advanceTimersByTimeAsync(1);
      await flush();

      expect(closed).toEqual([['guild-1', 'inactivity']]);
      expect(sinkOf('guild-1').destroyed).toBe(true);
      expect(manager.hasSession('guild-1')).toBe(false);
    });

    it('should close sessions left idle by failed commands', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const manager = createManager(1000);
      const closed: [string, string][] = [];
      manager.on('sessionClosed', (guildId, reason) => closed.push([guildId, reason]));

      await expect(manager.play('guild-1', 'missing')).rejects.toBeInstanceOf(ResolutionFailed);
      await expect(manager.playlistPlay('guild-2', 'user-1', 'Nope')).rejects.toBeInstanceOf(PlaylistNotFound);
      await vi.advanceTimersByTimeAsync(1000);
      await flush();

      expect([...closed].sort()).toEqual([
        ['guild-1', 'inactivity'],
        ['guild-2', 'inactivity'],
      ]);
      expect(sinkOf('guild-1').destroyed).toBe(true);
      expect(manager.hasSession('guild-2')).toBe(false);
    });

    it('should cancel the inactivity timer when playback resumes', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const manager = createManager(1000);
      await manager.play('guild-1', 'Night Drive');
      sinkOf('guild-1').lastTicket().finished();
      await flush();

      await manager.play('guild-1', 'Harbor Lights');
      await vi.advanceTimersByTimeAsync(5000);

      expect(manager.hasSession('guild-1')).toBe(true);
      expect(manager.getNowPlaying('guild-1')?.title).toBe('Harbor Lights');
    });

    it('should close every session on shutdown', async () => {
      const manager = createManager();
      const closed: [string, string][] = [];
      manager.on('sessionClosed', (guildId, reason) => closed.push([guildId, reason]));
      await manager.play('guild-1', 'Night Drive');
      await manager.enqueue('guild-2', 'Harbor Lights');

      await manager.shutdown();

      expect([...closed].sort()).toEqual([
        ['guild-1', 'shutdown'],
        ['guild-2', 'shutdown'],
      ]);
      expect(sinkOf('guild-1').destroyed).toBe(true);
      expect(manager.hasSession('guild-2')).toBe(false);
    });

    it('should report a disconnect', async () => {
      const manager = createManager();
      const closed: string[] = [];
      manager.on('sessionClosed', (_guildId, reason) => closed.push(reason));
      await manager.enqueue('guild-1', 'Night Drive');

      await manager.disconnect('guild-1');
      await manager.disconnect('guild-1');

      expect(closed).toEqual(['disconnect']);
    });
  });
});
