import { describe, it, expect } from '@jest/globals';
import {
  normalizeTag,
  normalizeText,
  safeSegment,
  toMirrorUrl,
  uniqueTokens,
} from '../src/utils/canonicalize';

describe('toMirrorUrl', () => {
  it('rewrites arxiv abstract links', () => {
    expect(toMirrorUrl('https://arxiv.org/abs/2501.00001', 'papersCool')).toBe(
      'https://papers.cool/arxiv/2501.00001'
    );
    expect(toMirrorUrl('https://arxiv.org/abs/2501.00001v2', 'alphaxiv')).toBe(
      'https://alphaxiv.org/abs/2501.00001v2'
    );
  });

  it('leaves other urls and empty strings alone', () => {
    expect(toMirrorUrl('https://example.org/paper', 'papersCool')).toBe('https://example.org/paper');
    expect(toMirrorUrl('', 'papersCool')).toBe('');
  });
});

describe('safeSegment', () => {
  it('produces lowercase dash-separated segments', () => {
    expect(safeSegment('Natural Language Processing', 'x')).toBe('natural-language-processing');
    expect(safeSegment('  ML/Systems & Infra ', 'x')).toBe('ml-systems-infra');
  });

  it('falls back when nothing usable remains', () => {
    expect(safeSegment('', 'general')).toBe('general');
    expect(safeSegment('***', 'general')).toBe('general');
    expect(safeSegment(undefined, 'uncategorised')).toBe('uncategorised');
  });
});

describe('normalizeTag', () => {
  it('lowercases and trims', () => {
    expect(normalizeTag('  CS.CL ')).toBe('cs.cl');
    expect(normalizeTag(42)).toBe('42');
  });

  it('returns null for empty values', () => {
    expect(normalizeTag('   ')).toBeNull();
    expect(normalizeTag(undefined)).toBeNull();
  });
});

describe('normalizeText', () => {
  it('collapses whitespace', () => {
    expect(normalizeText('  a\n  b\tc ', 'x')).toBe('a b c');
    expect(normalizeText('   ', 'fallback')).toBe('fallback');
  });
});

describe('uniqueTokens', () => {
  it('keeps first-seen order and drops blanks', () => {
    expect(uniqueTokens([' agents ', 'rl', '', 'agents', null, 7])).toEqual(['agents', 'rl', '7']);
  });
});
