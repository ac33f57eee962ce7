/**
 * @file sanitize.test.ts
 * @module tests/unit/shared/sanitize
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Unit tests for download path sanitization.
 */

import { toDirectoryName, toLocalFileName } from '../../../src/shared/utils/sanitize.js';

describe('toLocalFileName', () => {
  it('should keep a plain file name', () => {
    expect(toLocalFileName('example-1.0.0.jar')).toBe('example-1.0.0.jar');
  });

  it('should drop directory components', () => {
    expect(toLocalFileName('mods/../../evil.jar')).toBe('evil.jar');
    expect(toLocalFileName('C:\\mods\\thing.jar')).toBe('thing.jar');
    expect(toLocalFileName('/etc/passwd')).toBe('passwd');
  });

  it('should ignore trailing separators', () => {
    expect(toLocalFileName('mods/thing.jar/')).toBe('thing.jar');
    expect(toLocalFileName('mods\\thing.jar\\')).toBe('thing.jar');
  });

  it('should replace control characters', () => {
    expect(toLocalFileName('bad\0name.jar')).toBe('bad_name.jar');
    expect(toLocalFileName('line\nbreak.jar')).toBe('line_break.jar');
  });

  it.each([
    [''],
    ['.'],
    ['..'],
    ['///'],
    ['a/..'],
  ])('should replace unusable name %j', (name) => {
    expect(toLocalFileName(name)).toBe('unnamed');
  });
});

describe('toDirectoryName', () => {
  it('should keep an ordinary slug', () => {
    expect(toDirectoryName('example-mod')).toBe('example-mod');
  });

  it('should replace separators and whitespace', () => {
    expect(toDirectoryName('a/b\\c d')).toBe('a_b_c_d');
  });

  it('should strip leading dots', () => {
    expect(toDirectoryName('..hidden')).toBe('hidden');
  });

  it('should never return an empty name', () => {
    expect(toDirectoryName('...')).toBe('unnamed');
  });
});
