import type { ByteBuffer } from '../ByteBuffer.js';
import type { Duid } from '../duid.js';
import { MalformedDuidError } from '../errors.js';

/** Encodes values of `T` into a ByteBuffer and decodes them back. */
export interface Codec<T> {
  encode(buffer: ByteBuffer, value: T): void;
  decode(buffer: ByteBuffer): T;
}

/** Name and total length bounds (type field included) of a DUID layout. */
export interface DuidLayout {
  readonly label: string;
  readonly minLength: number;
  readonly maxLength: number;
}

/**
 * Codec for one DUID layout. `decode` consumes the whole remaining buffer,
 * type field included.
 */
export interface DuidVariantCodec<T extends Duid> extends Codec<T>, DuidLayout {}

/** Reject a total DUID length outside the bounds of `codec`. */
export function assertDuidLength(codec: DuidLayout, length: number): void {
  if (length < codec.minLength) {
    throw new MalformedDuidError(
      `${codec.label} must be at least ${codec.minLength} bytes long, got ${length}`,
      length,
    );
  }
  if (length > codec.maxLength) {
    throw new MalformedDuidError(
      codec.minLength === codec.maxLength
        ? `${codec.label} must be exactly ${codec.maxLength} bytes long, got ${length}`
        : `${codec.label} must be at most ${codec.maxLength} bytes long, got ${length}`,
      length,
    );
  }
}

/** Reject a field value that does not fit in an unsigned integer of `bits` width. */
export function assertUint(field: string, value: number, bits: 16 | 32): void {
  const max = bits === 16 ? 0xffff : 0xffffffff;
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new MalformedDuidError(`${field} must be an integer in 0..${max}, got ${value}`);
  }
}
