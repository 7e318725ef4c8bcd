const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(input: string): string {
  return input.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    const lower = entity.toLowerCase();
    if (lower.startsWith('#')) {
      const code = lower.startsWith('#x') ? parseInt(lower.slice(2), 16) : parseInt(lower.slice(1), 10);
      // Not a code point: leave the text as written
      return code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return ENTITIES[lower] ?? match;
  });
}

/**
 * Content of `<meta property="..." content="...">` (or `name=`), attribute
 * order independent.
 */
export function metaContent(html: string, property: string): string | null {
  const tags = html.match(/<meta\b[^>]*>/gi) ?? [];
  for (const tag of tags) {
    const key = /\b(?:property|name)\s*=\s*["']([^"']+)["']/i.exec(tag)?.[1];
    if (key !== property) continue;
    const content = /\bcontent\s*=\s*"([^"]*)"|\bcontent\s*=\s*'([^']*)'/i.exec(tag);
    const value = content?.[1] ?? content?.[2];
    if (value !== undefined) return decodeEntities(value);
  }
  return null;
}

/**
 * Returns the JSON object literal that follows `marker` in a script body,
 * found by brace matching, or null when it is missing or malformed.
 */
export function extractJsonObject(source: string, marker: string): unknown {
  const at = source.indexOf(marker);
  if (at < 0) return null;
  const start = source.indexOf('{', at + marker.length);
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) {
        try {
          const parsed: unknown = JSON.parse(source.slice(start, i + 1));
          return parsed;
        } catch {
          return null;
        }
      }
    }
  }
  return null;
}
