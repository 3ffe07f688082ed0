import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { createFingerprinter, resolveAlgorithm, listAlgorithms, DEFAULT_ALGORITHM } from './fingerprint.js';
import { ConfigurationError } from './errors.js';
import { makeTempDir, removeTempDir } from '../__tests__/setup.js';

describe('fingerprint', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTempDir(dir);
  });

  describe('resolveAlgorithm', () => {
    it('should lowercase supported names', () => {
      expect(resolveAlgorithm('SHA256')).toBe('sha256');
      expect(resolveAlgorithm(' md5 ')).toBe('md5');
    });

    it('should reject unknown algorithms with the available list', () => {
      expect(() => resolveAlgorithm('nope')).toThrow(ConfigurationError);
      expect(() => resolveAlgorithm('nope')).toThrow(/Unsupported fingerprint algorithm "nope"\. Available: /);
    });

    it('should select names listed in mixed case', () => {
      vi.spyOn(crypto, 'getHashes').mockReturnValue(['RSA-SHA256', 'md5']);
      expect(resolveAlgorithm('rsa-sha256')).toBe('RSA-SHA256');
      expect(resolveAlgorithm('RSA-SHA256')).toBe('RSA-SHA256');
    });

    it('should reject an empty name', () => {
      expect(() => resolveAlgorithm('')).toThrow(ConfigurationError);
    });
  });

  describe('createFingerprinter', () => {
    it('should default to md5', () => {
      expect(DEFAULT_ALGORITHM).toBe('md5');
      expect(createFingerprinter().algorithm).toBe('md5');
      expect(listAlgorithms()).toContain('md5');
    });

    it('should hash content with md5', () => {
      const fp = createFingerprinter('md5');
      expect(fp.fingerprintContent('hello')).toBe('5d41402abc4b2a76b9719d911017c592');
    });

    it('should hash content with sha256', () => {
      const fp = createFingerprinter('sha256');
      expect(fp.fingerprintContent('hello')).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
    });

    it('should fingerprint an empty file', () => {
      const file = path.join(dir, 'empty.txt');
      fs.writeFileSync(file, '');
      expect(createFingerprinter('md5').fingerprintFile(file)).toBe('d41d8cd98f00b204e9800998ecf8427e');
    });

    it('should read files larger than one chunk completely', () => {
      const content = Buffer.alloc(200 * 1024, 'a');
      content[content.length - 1] = 0x62; // last byte differs
      const file = path.join(dir, 'big.bin');
      fs.writeFileSync(file, content);

      const expected = crypto.createHash('sha1').update(content).digest('hex');
      expect(createFingerprinter('sha1').fingerprintFile(file)).toBe(expected);
    });

    it('should give identical files identical fingerprints', () => {
      fs.writeFileSync(path.join(dir, 'a.txt'), 'same content');
      fs.writeFileSync(path.join(dir, 'b.txt'), 'same content');
      const fp = createFingerprinter('md5');
      expect(fp.fingerprintFile(path.join(dir, 'a.txt'))).toBe(fp.fingerprintFile(path.join(dir, 'b.txt')));
    });

    it('should throw for a missing file', () => {
      const fp = createFingerprinter('md5');
      expect(() => fp.fingerprintFile(path.join(dir, 'missing.txt'))).toThrow(/ENOENT/);
    });

    it('should throw ConfigurationError for an unsupported algorithm', () => {
      expect(() => createFingerprinter('crc-unknown')).toThrow(ConfigurationError);
    });
  });
});
