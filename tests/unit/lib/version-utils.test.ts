/**
 * Unit tests for version-utils
 */

import { describe, it, expect } from 'vitest';
import {
  compareVersions,
  dropDot,
  isValidVersion,
  parseVersion,
  versionAtLeast,
  versionOlder
} from '../../../src/lib/version-utils.js';

const v = (version: string) => parseVersion(version)._unsafeUnwrap();

describe('version-utils', () => {
  describe('parseVersion', () => {
    it('should split a dotted version into numbers', () => {
      expect(v('11.8')).toEqual([11n, 8n]);
      expect(v('12')).toEqual([12n]);
      expect(v(' 12.0 ')).toEqual([12n, 0n]);
    });

    it('should reject anything that is not a dotted numeric version', () => {
      for (const bad of ['', 'abc', '1..2', '12.x', '8.6+PTX', '.5']) {
        expect(parseVersion(bad).isErr()).toBe(true);
        expect(isValidVersion(bad)).toBe(false);
      }
    });

    it('should name the offending input', () => {
      expect(parseVersion('12.x')._unsafeUnwrapErr().message).toBe('"12.x" is not a dotted numeric version');
    });
  });

  describe('compareVersions', () => {
    it('should compare components numerically', () => {
      expect(compareVersions(v('10.0'), v('9.0'))).toBeGreaterThan(0);
      expect(compareVersions(v('11.10'), v('11.8'))).toBeGreaterThan(0);
      expect(compareVersions(v('8.6'), v('9.0'))).toBeLessThan(0);
    });

    it('should keep every digit of components beyond the safe integer range', () => {
      expect(compareVersions(v('11.9007199254740993'), v('11.9007199254740992'))).toBe(1);
      expect(compareVersions(v('11.9007199254740992'), v('11.9007199254740993'))).toBe(-1);
    });

    it('should treat equal versions as equal', () => {
      expect(compareVersions(v('8.6'), v('8.6'))).toBe(0);
      expect(compareVersions(v('12'), v('12.0'))).toBe(0);
      expect(compareVersions(v('12.0'), v('12.0.0'))).toBe(0);
    });
  });

  describe('versionAtLeast / versionOlder', () => {
    it('should include equality in versionAtLeast', () => {
      expect(versionAtLeast(v('11.8'), v('11.8'))).toBe(true);
      expect(versionAtLeast(v('11.7'), v('11.8'))).toBe(false);
    });

    it('should exclude equality from versionOlder', () => {
      expect(versionOlder(v('12.0'), v('12.0'))).toBe(false);
      expect(versionOlder(v('12.0'), v('12.1'))).toBe(true);
    });
  });

  describe('dropDot', () => {
    it('should remove every separator', () => {
      expect(dropDot('8.6')).toBe('86');
      expect(dropDot('10.0')).toBe('100');
      expect(dropDot('9')).toBe('9');
    });
  });
});
