import { describe, it, expect } from 'vitest';

import { filterCompilerArgs } from './filterArgs.js';

describe('filterCompilerArgs', () => {
  it('drops -MD and the -MF pair, keeping order', () => {
    const out = filterCompilerArgs(['cc', '-MD', '-c', 'a.c', '-MF', 'out.d', '-o', 'a.o']);
    expect(out).toEqual(['cc', '-c', 'a.c', '-o', 'a.o']);
  });

  it('drops prefixed dependency-output flags such as -MMD', () => {
    expect(filterCompilerArgs(['c++', '-MMD', '-MP', '-c', 'x.cc'])).toEqual([
      'c++',
      '-MP',
      '-c',
      'x.cc',
    ]);
  });

  it('drops the joined -MF spelling as a single argument', () => {
    expect(filterCompilerArgs(['cc', '-MFdeps/a.d', '-c', 'a.c'])).toEqual(['cc', '-c', 'a.c']);
  });

  it('keeps argument 0 even when it looks like a flag', () => {
    expect(filterCompilerArgs(['-MD', '-c', 'a.c'])).toEqual(['-MD', '-c', 'a.c']);
  });

  it('tolerates a trailing -MF with no value', () => {
    expect(filterCompilerArgs(['cc', '-c', 'a.c', '-MF'])).toEqual(['cc', '-c', 'a.c']);
  });

  it('returns an empty vector for empty input', () => {
    expect(filterCompilerArgs([])).toEqual([]);
  });

  it('leaves unrelated flags untouched', () => {
    const argv = ['cc', '-I.', '-O2', '-DMODE=1', '-c', 'main.c'];
    expect(filterCompilerArgs(argv)).toEqual(argv);
  });
});
