import { describe, it, expect } from 'vitest';
import { decodeText, detectFromBOM, isCharsetSupported, normalizeCharset, resolveCharset } from '../../src/utils/charset.js';

describe('Charset', () => {
  describe('normalizeCharset', () => {
    it('should normalize common aliases', () => {
      expect(normalizeCharset('UTF8')).toBe('utf-8');
      expect(normalizeCharset('utf_8')).toBe('utf-8');
      expect(normalizeCharset('LATIN1')).toBe('iso-8859-1');
      expect(normalizeCharset('cp1252')).toBe('windows-1252');
    });

    it('should lowercase and trim unknown charsets', () => {
      expect(normalizeCharset('  SomeCharset ')).toBe('somecharset');
    });
  });

  describe('detectFromBOM', () => {
    it('should recognise UTF-8 and UTF-16 marks', () => {
      expect(detectFromBOM(new Uint8Array([0xef, 0xbb, 0xbf, 0x41]))).toBe('utf-8');
      expect(detectFromBOM(new Uint8Array([0xff, 0xfe, 0x41, 0x00]))).toBe('utf-16le');
      expect(detectFromBOM(new Uint8Array([0xfe, 0xff, 0x00, 0x41]))).toBe('utf-16be');
    });

    it('should return null without a mark', () => {
      expect(detectFromBOM(new Uint8Array([0x41, 0x42]))).toBeNull();
    });
  });

  describe('resolveCharset', () => {
    const bom = new Uint8Array([0xff, 0xfe, 0x41, 0x00]);

    it('should prefer explicit, then header, then BOM', () => {
      expect(resolveCharset(bom, { explicit: 'Latin1', header: 'utf-8' })).toEqual({ charset: 'iso-8859-1', source: 'explicit' });
      expect(resolveCharset(bom, { header: 'UTF8' })).toEqual({ charset: 'utf-8', source: 'header' });
      expect(resolveCharset(bom)).toEqual({ charset: 'utf-16le', source: 'bom' });
    });

    it('should default to UTF-8', () => {
      expect(resolveCharset(new Uint8Array([0x41]))).toEqual({ charset: 'utf-8', source: 'default' });
    });
  });

  describe('decodeText', () => {
    it('should decode with the given charset', () => {
      expect(decodeText(new Uint8Array([0x63, 0x61, 0x66, 0xe9]), 'latin1')).toBe('café');
      expect(decodeText(new TextEncoder().encode('héllo'))).toBe('héllo');
    });

    it('should replace invalid bytes unless fatal', () => {
      const invalid = new Uint8Array([0x61, 0xff]);

      expect(decodeText(invalid)).toBe('a�');
      expect(() => decodeText(invalid, 'utf-8', { fatal: true })).toThrow(TypeError);
    });
  });

  describe('isCharsetSupported', () => {
    it('should know what TextDecoder supports', () => {
      expect(isCharsetSupported('utf8')).toBe(true);
      expect(isCharsetSupported('not-a-charset')).toBe(false);
    });
  });
});
