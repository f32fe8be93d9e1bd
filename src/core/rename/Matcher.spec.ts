import { describe, expect, test } from 'vitest';
import { Matcher } from './Matcher.js';

describe('Matcher', () => {
  test('excludes the built-in junk names', () => {
    const m = new Matcher();
    expect(m.isExcluded('.DS_Store')).toBe(true);
    expect(m.isExcluded('.git')).toBe(true);
    expect(m.isExcluded('report.txt')).toBe(false);
  });

  test('adds user globs to the defaults', () => {
    const m = new Matcher(['*.tmp', '~*']);
    expect(m.isExcluded('draft.tmp')).toBe(true);
    expect(m.isExcluded('~lock.docx')).toBe(true);
    expect(m.isExcluded('Thumbs.db')).toBe(true);
  });

  test('can run without the defaults', () => {
    expect(new Matcher([], false).isExcluded('.DS_Store')).toBe(false);
  });

  test('matches dotfiles with wildcards', () => {
    expect(new Matcher(['*.bak']).isExcluded('.hidden.bak')).toBe(true);
  });
});
