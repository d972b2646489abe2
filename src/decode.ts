import { ByteBuffer } from './ByteBuffer.js';
import { DuidCodec } from './codecs/DuidCodec.js';
import type { Duid } from './duid.js';
import { InvalidHexEncodingError, MalformedDuidError } from './errors.js';
import { parseHex } from './hex.js';

const codec = new DuidCodec();

/**
 * Decode a DUID from its wire bytes. The whole array is one DUID.
 * The returned value is frozen and does not share memory with `bytes`.
 *
 * @throws {MalformedDuidError} if the bytes do not form a valid DUID.
 */
export function decodeDuid(bytes: Uint8Array): Duid {
  return codec.decode(ByteBuffer.from(bytes));
}

/**
 * Encode a DUID to its wire bytes.
 *
 * @throws {MalformedDuidError} if a field is out of range or the result
 *   would break the length bounds of its type.
 */
export function encodeDuid(duid: Duid): Uint8Array {
  const buffer = ByteBuffer.alloc(32);
  codec.encode(buffer, duid);
  return buffer.toUint8Array();
}

export type DuidDecodeResult =
  | { ok: true; duid: Duid; bytes: Uint8Array }
  | { ok: false; error: InvalidHexEncodingError | MalformedDuidError };

/**
 * Parse a hex string (colons allowed) and decode it as a DUID.
 * Bad input is reported in the result rather than thrown.
 */
export function decodeDuidHex(input: string): DuidDecodeResult {
  try {
    const bytes = parseHex(input);
    return { ok: true, duid: decodeDuid(bytes), bytes };
  } catch (err) {
    if (err instanceof InvalidHexEncodingError || err instanceof MalformedDuidError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
