import type { ReadonlyBytes } from './duid.js';
import { InvalidHexEncodingError } from './errors.js';

const HEX_DIGITS = /^[0-9a-fA-F]*$/;

/**
 * Convert a hex string to bytes. Colons anywhere in the string are
 * dropped first, so `00:01:ab` and `0001ab` decode identically.
 * Surrounding whitespace is ignored. An empty string yields zero bytes.
 *
 * @throws {InvalidHexEncodingError} on non-hex characters or an odd digit count.
 */
export function parseHex(input: string): Uint8Array {
  const clean = input.trim().replace(/:/g, '');

  if (!HEX_DIGITS.test(clean)) {
    const bad = clean.match(/[^0-9a-fA-F]/)?.[0] ?? '';
    throw new InvalidHexEncodingError(
      input,
      `unexpected character '${bad}'; only 0-9, a-f, A-F and ':' are allowed`,
    );
  }
  if (clean.length % 2 !== 0) {
    throw new InvalidHexEncodingError(input, `odd number of hex digits (${clean.length})`);
  }

  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/** Format bytes as lowercase hex. */
export function toHex(bytes: ReadonlyBytes, separator = ''): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join(separator);
}

/** Format bytes as colon-separated lowercase hex, e.g. `aa:bb:cc`. */
export function toColonHex(bytes: ReadonlyBytes): string {
  return toHex(bytes, ':');
}
