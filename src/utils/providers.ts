import type { ProviderId } from '../types/music';

const YT_HOSTS = new Set([
  'youtube.com',
  'www.youtube.com',
  'm.youtube.com',
  'music.youtube.com',
  'youtu.be',
]);

const SPOTIFY_HOSTS = new Set([
  'open.spotify.com',
]);

const SOUNDCLOUD_HOSTS = new Set([
  'soundcloud.com',
  'www.soundcloud.com',
  'm.soundcloud.com',
  'on.soundcloud.com',
]);

export function safeParseUrl(input: string): URL | null {
  const trimmed = input.trim();
  if (!/^https?:\/\//i.test(trimmed)) return null;
  try {
    return new URL(trimmed);
  } catch {
    return null;
  }
}

export function isHttpUrl(input: string): boolean {
  return safeParseUrl(input) !== null;
}

/** Provider owning a URL query, or null for free-text queries and unknown hosts. */
export function detectProvider(input: string): ProviderId | null {
  const u = safeParseUrl(input);
  if (!u) return null;
  const h = u.hostname.toLowerCase();
  if (YT_HOSTS.has(h)) return 'youtube';
  if (SPOTIFY_HOSTS.has(h)) return 'spotify';
  if (SOUNDCLOUD_HOSTS.has(h)) return 'soundcloud';
  return null;
}

export function extractYouTubeVideoId(input: string): string | null {
  const u = safeParseUrl(input);
  if (!u) return null;
  const h = u.hostname.toLowerCase();
  if (!YT_HOSTS.has(h)) return null;

  let id: string | null = null;
  if (h === 'youtu.be') {
    id = u.pathname.replace(/^\//, '');
  } else if (u.pathname === '/watch') {
    id = u.searchParams.get('v');
  } else if (u.pathname.startsWith('/shorts/')) {
    id = u.pathname.split('/')[2] || null;
  }
  return id && /^[a-zA-Z0-9_-]{11}$/.test(id) ? id : null;
}

export function isSpotifyTrackUrl(input: string): boolean {
  const u = safeParseUrl(input);
  if (!u || !SPOTIFY_HOSTS.has(u.hostname.toLowerCase())) return false;
  return /^\/(intl-[a-z]+\/)?track\/[A-Za-z0-9]+/.test(u.pathname);
}
