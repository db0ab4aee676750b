import { describe, it, expect, afterEach, vi } from 'vitest';

import { isDebugEnabled, logDebug, logWarn, setDebugEnabled } from './logger.js';

describe('dx logger', () => {
  const prev = process.env.COMPDB_WRAP_DEBUG;

  afterEach(() => {
    setDebugEnabled(false);
    vi.restoreAllMocks();
    if (prev == null) delete process.env.COMPDB_WRAP_DEBUG;
    else process.env.COMPDB_WRAP_DEBUG = prev;
  });

  it('is disabled by default', () => {
    delete process.env.COMPDB_WRAP_DEBUG;
    expect(isDebugEnabled()).toBe(false);
  });

  it('enables via env var', () => {
    process.env.COMPDB_WRAP_DEBUG = '1';
    expect(isDebugEnabled()).toBe(true);
  });

  it('enables via setter (tests)', () => {
    delete process.env.COMPDB_WRAP_DEBUG;
    setDebugEnabled(true);
    expect(isDebugEnabled()).toBe(true);
  });

  it('drops debug output when disabled', () => {
    delete process.env.COMPDB_WRAP_DEBUG;
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logDebug('hidden');
    expect(spy).not.toHaveBeenCalled();
  });

  it('always prints warnings to stderr with the prefix', () => {
    delete process.env.COMPDB_WRAP_DEBUG;
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logWarn('disk full');
    expect(spy).toHaveBeenCalledWith('[compdb-wrap]', 'warning:', 'disk full');
  });
});
