const ARXIV_ABS_PREFIX = 'https://arxiv.org/abs/';

export const MIRRORS = {
  papersCool: 'https://papers.cool/arxiv/',
  alphaxiv: 'https://alphaxiv.org/abs/',
} as const;

export type Mirror = keyof typeof MIRRORS;

/** Rewrites an arxiv.org abstract URL to a mirror; other URLs pass through. */
export function toMirrorUrl(url: string, mirror: Mirror): string {
  if (!url) return url;
  if (url.startsWith(ARXIV_ABS_PREFIX)) {
    return MIRRORS[mirror] + url.slice(ARXIV_ABS_PREFIX.length);
  }
  return url;
}

/** Filesystem-safe path segment: lowercase, runs of other characters become '-'. */
export function safeSegment(value: string | undefined, fallback: string): string {
  const token = (value ?? '').trim().toLowerCase();
  if (!token) return fallback;
  const slug = token.replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return slug || fallback;
}

export function normalizeTag(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim().toLowerCase();
  return text || null;
}

/** Collapses whitespace; empty results fall back. */
export function normalizeText(value: string | undefined, fallback: string): string {
  const text = (value ?? '').trim().split(/\s+/).join(' ');
  return text ? text : fallback;
}

/** Trimmed, non-empty, first-seen order. */
export function uniqueTokens(values: Iterable<unknown>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of values) {
    if (raw === null || raw === undefined) continue;
    const token = String(raw).trim();
    if (token && !seen.has(token)) {
      seen.add(token);
      out.push(token);
    }
  }
  return out;
}
