import { describe, it, expect } from 'vitest';
import { InvalidPathError } from '../errors.js';
import {
  comparePaths,
  normalizeRelativePath,
  parentDirectories,
  sortPaths,
  tryNormalizeRelativePath,
} from '../paths.js';

describe('paths', () => {
  describe('normalizeRelativePath', () => {
    it('should strip leading ./ and slashes', () => {
      expect(normalizeRelativePath('./a/b.txt')).toBe('a/b.txt');
      expect(normalizeRelativePath('/a/b.txt')).toBe('a/b.txt');
    });

    it('should collapse empty and dot segments', () => {
      expect(normalizeRelativePath('a//./b/')).toBe('a/b');
    });

    it('should convert backslashes', () => {
      expect(normalizeRelativePath('dir\\sub\\file.txt')).toBe('dir/sub/file.txt');
    });

    it('should reject parent segments', () => {
      expect(() => normalizeRelativePath('a/../b')).toThrow(InvalidPathError);
    });

    it('should reject empty paths', () => {
      expect(() => normalizeRelativePath('./')).toThrow(InvalidPathError);
    });

    it('should return null from the non-throwing variant', () => {
      expect(tryNormalizeRelativePath('../x')).toBeNull();
      expect(tryNormalizeRelativePath('x')).toBe('x');
    });
  });

  describe('ordering', () => {
    it('should order by code unit, uppercase before lowercase', () => {
      expect(sortPaths(['b', 'a/z', 'B', 'a'])).toEqual(['B', 'a', 'a/z', 'b']);
    });

    it('should return 0 for equal paths', () => {
      expect(comparePaths('x', 'x')).toBe(0);
    });
  });

  describe('parentDirectories', () => {
    it('should list parents nearest first', () => {
      expect(parentDirectories('a/b/c.txt')).toEqual(['a/b', 'a']);
      expect(parentDirectories('top.txt')).toEqual([]);
    });
  });
});
