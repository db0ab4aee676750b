import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { delimiter, join } from 'node:path';

import { shellJoin, shellQuote } from './shellQuote.js';
import { which } from './which.js';

describe('which', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'compdb-wrap-which-'));
    mkdirSync(join(dir, 'a'));
    mkdirSync(join(dir, 'b'));
    writeFileSync(join(dir, 'a', 'plain'), '');
    writeFileSync(join(dir, 'b', 'plain'), '#!/bin/sh\n');
    chmodSync(join(dir, 'b', 'plain'), 0o755);
    writeFileSync(join(dir, 'a', 'tool'), '#!/bin/sh\n');
    chmodSync(join(dir, 'a', 'tool'), 0o755);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('finds the first executable match on the search path', () => {
    const path = [join(dir, 'a'), join(dir, 'b')].join(delimiter);
    expect(which('tool', path)).toBe(join(dir, 'a', 'tool'));
  });

  it('skips non-executable files', () => {
    const path = [join(dir, 'a'), join(dir, 'b')].join(delimiter);
    expect(which('plain', path)).toBe(join(dir, 'b', 'plain'));
  });

  it('returns null when nothing matches', () => {
    expect(which('missing-tool', join(dir, 'a'))).toBe(null);
  });

  it('does not treat a directory as an executable', () => {
    expect(which('a', dir)).toBe(null);
  });

  it('checks names with a slash directly', () => {
    expect(which(join(dir, 'a', 'tool'), '')).toBe(join(dir, 'a', 'tool'));
  });
});

describe('shellQuote', () => {
  it('leaves safe words alone', () => {
    expect(shellQuote('/usr/bin/cc')).toBe('/usr/bin/cc');
    expect(shellQuote('--log')).toBe('--log');
  });

  it('quotes spaces and embedded single quotes', () => {
    expect(shellQuote('/tmp/my dir')).toBe(`'/tmp/my dir'`);
    expect(shellQuote(`it's`)).toBe(`'it'\\''s'`);
    expect(shellQuote('')).toBe(`''`);
  });

  it('joins a command line', () => {
    expect(shellJoin(['node', '/opt/a b/cli.js', '--log'])).toBe(`node '/opt/a b/cli.js' --log`);
  });
});
