import { describe, it, expect, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return { ...actual, rmSync: vi.fn(actual.rmSync) };
});

import { rmSync } from 'fs';

import { withScratchDir } from './logWriter.js';

describe('withScratchDir cleanup failures', () => {
  const parents: string[] = [];

  afterEach(() => {
    vi.restoreAllMocks();
    for (const d of parents.splice(0)) rmSync(d, { recursive: true, force: true });
  });

  it('warns and still resolves with the body result when removal fails', async () => {
    const parent = mkdtempSync(join(tmpdir(), 'compdb-wrap-cleanup-'));
    parents.push(parent);
    const dir = join(parent, 'scratch');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.mocked(rmSync).mockImplementationOnce(() => {
      throw new Error('EBUSY: resource busy or locked');
    });

    const result = await withScratchDir(dir, async () => 2);

    expect(result).toBe(2);
    expect(existsSync(dir)).toBe(true);
    expect(warn).toHaveBeenCalledOnce();
    expect(warn).toHaveBeenCalledWith(
      '[compdb-wrap]',
      'warning:',
      `could not remove scratch directory ${dir}: EBUSY: resource busy or locked`,
    );
  });
});
