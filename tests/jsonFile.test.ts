import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { pathExists, readTextIfExists, writeJsonAtomic } from '../src/utils/jsonFile';
import { makeTempDir, removeTempDir } from './utils/fakes';

describe('jsonFile', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('treats a missing path as absent', async () => {
    const missing = path.join(root, 'nothing-here.json');

    expect(await pathExists(missing)).toBe(false);
    expect(await readTextIfExists(missing)).toBeNull();
  });

  it('still fails on errors other than a missing file', async () => {
    await expect(readTextIfExists(root)).rejects.toMatchObject({ code: 'EISDIR' });
  });

  it('writes JSON that reads back as written', async () => {
    const target = path.join(root, 'nested', 'value.json');

    await writeJsonAtomic(target, { day: '2025-01-15', completed: true });

    expect(await pathExists(target)).toBe(true);
    expect(JSON.parse(await fs.readFile(target, 'utf-8'))).toEqual({ day: '2025-01-15', completed: true });
    expect(await fs.readdir(path.dirname(target))).toEqual(['value.json']);
  });
});
