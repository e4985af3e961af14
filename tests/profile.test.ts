import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  applyEnvOverrides,
  ConfigError,
  DEFAULT_CATEGORIES,
  loadProfile,
  parseProfile,
  resolveApiKey,
  resolveDataRoot,
} from '../src/config/profile';
import { makeTempDir, removeTempDir } from './utils/fakes';

describe('parseProfile', () => {
  it('fills defaults for an empty document', () => {
    const profile = parseProfile({});

    expect(profile.subscriptions).toEqual({ categories: DEFAULT_CATEGORIES, interest_tags: [] });
    expect(profile.channels).toEqual([]);
    expect(profile.llm.api_key_env).toBe('GOOGLE_API_KEY');
    expect(profile.schedule).toEqual({ mode: 'workday', max_attempts: 6, interval_seconds: 3600 });
    expect(profile.data_dirs).toEqual({
      raw: './data/raw',
      archive: './data/paper_database',
      daily: './data/daily',
    });
    expect(profile.language).toBe('en');
  });

  it('accepts interest tags as plain strings or objects', () => {
    const profile = parseProfile({
      subscriptions: { interest_tags: ['agents', { label: 'rl', keywords: 'ppo' }] },
    });

    expect(profile.subscriptions.interest_tags).toEqual([
      { label: 'agents', description: '', keywords: [] },
      { label: 'rl', description: '', keywords: ['ppo'] },
    ]);
  });

  it('fills channel defaults', () => {
    const [channel] = parseProfile({ channels: [{ webhook_url: 'https://example.test/hook' }] }).channels;

    expect(channel).toEqual({
      type: 'feishu',
      webhook_url: 'https://example.test/hook',
      delay_seconds: 2,
      separator_text: '🚧 Next: {label} ({current}/{total}) 🚧',
      exclude_tags: [],
    });
  });

  it('raises the retry interval to at least 30 seconds', () => {
    expect(parseProfile({ schedule: { interval_seconds: 5 } }).schedule.interval_seconds).toBe(30);
  });

  it('reports every invalid field', () => {
    try {
      parseProfile({ language: 'fr', llm: { max_concurrency: 0 } });
      throw new Error('expected parseProfile to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues).toHaveLength(2);
      expect(error.issues.some((issue) => issue.startsWith('- language:'))).toBe(true);
      expect(error.issues.some((issue) => issue.startsWith('- llm.max_concurrency:'))).toBe(true);
    }
  });
});

describe('applyEnvOverrides', () => {
  it('applies model, concurrency and a fallback webhook', () => {
    const profile = applyEnvOverrides(parseProfile({}), {
      LLM_MODEL: 'gemini-test',
      LLM_CONCURRENCY: '4',
      FEISHU_WEBHOOK_URL: 'https://example.test/hook',
    });

    expect(profile.llm.model).toBe('gemini-test');
    expect(profile.llm.max_concurrency).toBe(4);
    expect(profile.channels.map((channel) => channel.webhook_url)).toEqual(['https://example.test/hook']);
  });

  it('ignores invalid concurrency and keeps configured channels', () => {
    const base = parseProfile({ channels: [{ webhook_url: 'https://example.test/configured' }] });
    const profile = applyEnvOverrides(base, { LLM_CONCURRENCY: 'many', FEISHU_WEBHOOK_URL: 'https://example.test/env' });

    expect(profile.llm.max_concurrency).toBe(base.llm.max_concurrency);
    expect(profile.channels.map((channel) => channel.webhook_url)).toEqual(['https://example.test/configured']);
  });
});

describe('loadProfile', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('reads and validates a profile file', async () => {
    const file = path.join(root, 'profile.json');
    await fs.writeFile(file, JSON.stringify({ subscriptions: { categories: ['cs.RO'] }, language: 'zh' }));

    const profile = await loadProfile(file, {});

    expect(profile.subscriptions.categories).toEqual(['cs.RO']);
    expect(profile.language).toBe('zh');
  });

  it('uses defaults when the file does not exist', async () => {
    const profile = await loadProfile(path.join(root, 'missing.json'), {});
    expect(profile.subscriptions.categories).toEqual(DEFAULT_CATEGORIES);
  });

  it('rejects a file that is not JSON', async () => {
    const file = path.join(root, 'broken.json');
    await fs.writeFile(file, '{ nope');

    await expect(loadProfile(file, {})).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('resolveDataRoot', () => {
  it('prefers DATA_ROOT', () => {
    expect(resolveDataRoot(parseProfile({}), { DATA_ROOT: '/srv/digest' })).toBe('/srv/digest');
  });

  it('uses the parent of a raw directory', () => {
    const profile = parseProfile({ data_dirs: { raw: '/srv/papers/raw' } });
    expect(resolveDataRoot(profile, {})).toBe('/srv/papers');
  });

  it('falls back to ./data', () => {
    const profile = parseProfile({ data_dirs: { raw: '/srv/papers/incoming' } });
    expect(resolveDataRoot(profile, {})).toBe('./data');
  });
});

describe('resolveApiKey', () => {
  it('reads the configured variable', () => {
    expect(resolveApiKey(parseProfile({}).llm, { GOOGLE_API_KEY: ' test-secret ' })).toBe('test-secret');
  });

  it('fails when the variable is unset', () => {
    expect(() => resolveApiKey(parseProfile({ llm: { api_key_env: 'MY_KEY' } }).llm, {})).toThrow(
      'Environment variable MY_KEY is not set'
    );
  });
});
