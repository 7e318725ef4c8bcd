export function normalizeTitle(input: string): string {
  if (!input) return input;
  let s = input;
  // Remove common bracketed qualifiers
  const patterns = [
    /\((official\s*(music\s*)?(video|audio)|audio|video|lyric(s)?(\s*video)?|visualizer|hd|hq|4k)\)/ig,
    /\[(official\s*(music\s*)?(video|audio)|audio|video|lyric(s)?(\s*video)?|visualizer|hd|hq|4k)\]/ig,
  ];
  for (const re of patterns) s = s.replace(re, '');

  // Collapse multiple spaces and trim separators
  s = s.replace(/\s{2,}/g, ' ');
  s = s.replace(/\s*[-–—]\s*$/g, '');
  s = s.trim();
  return s;
}

function tokens(s: string): string[] {
  return normalizeTitle(s)
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

/**
 * Token overlap between a query and a candidate title, 0..1.
 * Measured against the query's tokens so extra words in the title cost less
 * than missing ones.
 */
export function titleSimilarity(query: string, title: string): number {
  const q = new Set(tokens(query));
  const t = new Set(tokens(title));
  if (q.size === 0 || t.size === 0) return 0;

  let shared = 0;
  for (const token of q) {
    if (t.has(token)) shared++;
  }
  const recall = shared / q.size;
  const precision = shared / t.size;
  return (2 * recall + precision) / 3;
}

export function sanitizeFileName(title: string, maxLength = 80): string {
  const safe = title
    .replace(/[^\w\s-]/g, '')
    .trim()
    .replace(/[-\s]+/g, '-')
    .slice(0, maxLength)
    .replace(/-+$/g, '');
  return safe || 'track';
}
