import { IndexOutOfRange, QueueFull } from '../errors';
import { LoopMode, QueueSnapshot, Track } from '../types/music';

export type RandomSource = () => number;

/**
 * Ordered tracks of one session plus the play cursor and loop/shuffle policy.
 *
 * `cursor` is either null or a valid index into `items`. Items are kept after
 * they have played; `lastPlayed` remembers where playback stopped so that
 * `start()` resumes with the first item after it.
 */
export class TrackQueue {
  private items: Track[] = [];
  private cursor: number | null = null;
  private lastPlayed: number | null = null;
  private loopMode: LoopMode = 'off';
  private shuffleEnabled = false;
  // Indices already played in the current shuffle pass
  private played = new Set<number>();

  constructor(
    private readonly maxSize: number,
    private readonly random: RandomSource = Math.random
  ) {}

  get length(): number {
    return this.items.length;
  }

  getCursor(): number | null {
    return this.cursor;
  }

  current(): Track | null {
    return this.cursor === null ? null : this.items[this.cursor] ?? null;
  }

  /** Returns the index the track landed at. */
  enqueue(track: Track, position?: number): number {
    if (this.items.length + 1 > this.maxSize) {
      throw new QueueFull(this.maxSize);
    }
    const index =
      position !== undefined && Number.isInteger(position) && position >= 0 && position <= this.items.length
        ? position
        : this.items.length;

    this.items.splice(index, 0, track);
    this.remap((i) => (i >= index ? i + 1 : i));
    return index;
  }

  /** Appends every track or none of them. Returns the index of the first one. */
  enqueueMany(tracks: readonly Track[]): number {
    if (this.items.length + tracks.length > this.maxSize) {
      throw new QueueFull(this.maxSize);
    }
    const first = this.items.length;
    this.items.push(...tracks);
    return first;
  }

  removeAt(index: number): Track {
    this.assertIndex(index);
    const [removed] = this.items.splice(index, 1);
    if (!removed) throw new IndexOutOfRange(index, this.items.length + 1);

    // Whatever slid into a removed current/last-played slot plays next
    if (this.cursor === index) this.cursor = null;
    if (this.lastPlayed === index) this.lastPlayed = index > 0 ? index - 1 : null;
    this.played.delete(index);
    this.remap((i) => (i > index ? i - 1 : i));
    return removed;
  }

  reorder(fromIndex: number, toIndex: number): void {
    this.assertIndex(fromIndex);
    this.assertIndex(toIndex);
    if (fromIndex === toIndex) return;

    const [moved] = this.items.splice(fromIndex, 1);
    if (!moved) return;
    this.items.splice(toIndex, 0, moved);

    this.remap((i) => {
      if (i === fromIndex) return toIndex;
      if (fromIndex < toIndex && i > fromIndex && i <= toIndex) return i - 1;
      if (fromIndex > toIndex && i >= toIndex && i < fromIndex) return i + 1;
      return i;
    });
  }

  clear(): number {
    const removed = this.items.length;
    this.items = [];
    this.cursor = null;
    this.lastPlayed = null;
    this.played.clear();
    return removed;
  }

  jumpTo(index: number): Track {
    this.assertIndex(index);
    this.setCursor(index);
    const track = this.items[index];
    if (!track) throw new IndexOutOfRange(index, this.items.length);
    return track;
  }

  /**
   * Positions a null cursor on the next unplayed item. Keeps an existing cursor.
   */
  start(): Track | null {
    if (this.cursor !== null) return this.current();
    if (this.items.length === 0) return null;

    if (this.shuffleEnabled) {
      const next = this.drawShuffled();
      if (next === null) return null;
      this.setCursor(next);
      return this.current();
    }

    let next = this.lastPlayed === null ? 0 : this.lastPlayed + 1;
    if (next >= this.items.length) {
      if (this.loopMode !== 'queue') return null;
      next = 0;
    }
    this.setCursor(next);
    return this.current();
  }

  /**
   * Moves the cursor after the current item finished. Returns the new current
   * item, or null when the queue is exhausted.
   */
  advance(): Track | null {
    if (this.cursor === null) return this.start();
    if (this.loopMode === 'track') return this.current();

    if (this.shuffleEnabled) {
      const next = this.drawShuffled();
      if (next === null) {
        this.stopAt(this.cursor);
        return null;
      }
      this.setCursor(next);
      return this.current();
    }

    if (this.cursor >= this.items.length - 1) {
      if (this.loopMode === 'queue') {
        this.setCursor(0);
        return this.current();
      }
      this.stopAt(this.cursor);
      return null;
    }

    this.setCursor(this.cursor + 1);
    return this.current();
  }

  setLoopMode(mode: LoopMode): void {
    this.loopMode = mode;
  }

  setShuffle(enabled: boolean): void {
    this.shuffleEnabled = enabled;
    this.played.clear();
    if (this.cursor !== null) this.played.add(this.cursor);
  }

  snapshot(): QueueSnapshot {
    return {
      items: [...this.items],
      cursor: this.cursor,
      loopMode: this.loopMode,
      shuffleEnabled: this.shuffleEnabled,
    };
  }

  private setCursor(index: number): void {
    this.cursor = index;
    this.lastPlayed = index;
    this.played.add(index);
  }

  private stopAt(index: number): void {
    this.cursor = null;
    this.lastPlayed = index;
  }

  // Uniform draw among indices not yet played this pass, never the current one
  // while something else is available.
  private drawShuffled(): number | null {
    const n = this.items.length;
    if (n === 0) return null;

    let pool = this.unplayed();
    if (pool.length === 0) {
      if (this.loopMode !== 'queue') return null;
      this.played.clear();
      pool = this.unplayed();
    }
    if (n > 1 && this.cursor !== null) {
      const current = this.cursor;
      pool = pool.filter((i) => i !== current);
    }
    if (pool.length === 0) return null;

    const pick = Math.min(pool.length - 1, Math.floor(this.random() * pool.length));
    return pool[pick] ?? null;
  }

  private unplayed(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.items.length; i++) {
      if (!this.played.has(i)) out.push(i);
    }
    return out;
  }

  private remap(fn: (i: number) => number): void {
    if (this.cursor !== null) this.cursor = fn(this.cursor);
    if (this.lastPlayed !== null) this.lastPlayed = fn(this.lastPlayed);
    const next = new Set<number>();
    for (const i of this.played) next.add(fn(i));
    this.played = next;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new IndexOutOfRange(index, this.items.length);
    }
  }
}
