/**
 * Charset Detection and Decoding Utilities
 *
 * Resolves the text encoding of a response body from:
 * - an explicit encoding chosen by the caller
 * - the Content-Type charset parameter
 * - BOM (Byte Order Mark)
 */

export interface CharsetInfo {
  /** Charset name (normalized to lowercase) */
  charset: string;
  source: 'explicit' | 'header' | 'bom' | 'default';
}

/**
 * Common charset aliases (maps to standard names)
 */
const charsetAliases: Record<string, string> = {
  'utf8': 'utf-8',
  'utf_8': 'utf-8',

  'utf16': 'utf-16',
  'utf_16': 'utf-16',
  'utf16le': 'utf-16le',
  'utf16be': 'utf-16be',

  'latin1': 'iso-8859-1',
  'latin-1': 'iso-8859-1',
  'iso8859-1': 'iso-8859-1',
  'iso_8859-1': 'iso-8859-1',

  'cp1252': 'windows-1252',
  'win1252': 'windows-1252',

  'us-ascii': 'ascii',
  'usascii': 'ascii',

  'shift-jis': 'shift_jis',
  'shiftjis': 'shift_jis',
  'sjis': 'shift_jis',
};

/**
 * Normalize charset name to standard form
 */
export function normalizeCharset(charset: string): string {
  const lower = charset.toLowerCase().trim();
  return charsetAliases[lower] || lower;
}

/**
 * Detect charset from a Byte Order Mark
 */
export function detectFromBOM(buffer: Uint8Array): string | null {
  if (buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf) {
    return 'utf-8';
  }
  if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
    return 'utf-16le';
  }
  if (buffer.length >= 2 && buffer[0] === 0xfe && buffer[1] === 0xff) {
    return 'utf-16be';
  }
  return null;
}

/**
 * Pick the charset to decode a body with. An explicit choice wins, then the
 * response header, then a BOM, then UTF-8.
 */
export function resolveCharset(
  buffer: Uint8Array,
  options: { explicit?: string; header?: string } = {}
): CharsetInfo {
  if (options.explicit) return { charset: normalizeCharset(options.explicit), source: 'explicit' };
  if (options.header) return { charset: normalizeCharset(options.header), source: 'header' };
  const bom = detectFromBOM(buffer);
  if (bom) return { charset: bom, source: 'bom' };
  return { charset: 'utf-8', source: 'default' };
}

/**
 * Decode bytes with the given charset. TextDecoder drops a leading BOM that
 * matches the charset. Throws RangeError for unknown charsets and, when
 * `fatal` is set, for byte sequences invalid in that charset.
 */
export function decodeText(buffer: Uint8Array, charset = 'utf-8', options: { fatal?: boolean } = {}): string {
  const decoder = new TextDecoder(normalizeCharset(charset), { fatal: options.fatal ?? false });
  return decoder.decode(buffer);
}

export function isCharsetSupported(charset: string): boolean {
  try {
    new TextDecoder(normalizeCharset(charset));
    return true;
  } catch {
    return false;
  }
}
