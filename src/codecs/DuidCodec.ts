import { ByteBuffer } from '../ByteBuffer.js';
import {
  DUID_MAX_LENGTH,
  DUID_TYPE_EN,
  DUID_TYPE_LENGTH,
  DUID_TYPE_LL,
  DUID_TYPE_LLT,
  DUID_TYPE_UUID,
  type Duid,
} from '../duid.js';
import { MalformedDuidError } from '../errors.js';
import type { Codec } from './Codec.js';
import { DuidEnCodec } from './DuidEnCodec.js';
import { DuidLlCodec } from './DuidLlCodec.js';
import { DuidLltCodec } from './DuidLltCodec.js';
import { DuidUuidCodec } from './DuidUuidCodec.js';
import { UnknownDuidCodec } from './UnknownDuidCodec.js';

/**
 * Top-level DUID codec. Peeks the 2-byte type code and hands the buffer to
 * the matching layout codec; unregistered codes go to the unknown codec.
 * The whole remaining buffer is taken to be one DUID.
 */
export class DuidCodec implements Codec<Duid> {
  private readonly llt = new DuidLltCodec();
  private readonly en = new DuidEnCodec();
  private readonly ll = new DuidLlCodec();
  private readonly uuid = new DuidUuidCodec();
  private readonly unknown = new UnknownDuidCodec();

  encode(buffer: ByteBuffer, value: Duid): void {
    switch (value.kind) {
      case 'llt':
        this.llt.encode(buffer, value);
        return;
      case 'en':
        this.en.encode(buffer, value);
        return;
      case 'll':
        this.ll.encode(buffer, value);
        return;
      case 'uuid':
        this.uuid.encode(buffer, value);
        return;
      case 'unknown':
        this.unknown.encode(buffer, value);
        return;
    }
  }

  decode(buffer: ByteBuffer): Duid {
    const length = buffer.remaining;
    if (length === 0) {
      throw new MalformedDuidError('DUID is empty', 0);
    }
    if (length > DUID_MAX_LENGTH) {
      throw new MalformedDuidError(
        `DUID must be at most ${DUID_MAX_LENGTH} bytes long, got ${length}`,
        length,
      );
    }
    if (length < DUID_TYPE_LENGTH) {
      throw new MalformedDuidError(
        `DUID is too short (${length} byte) to hold the ${DUID_TYPE_LENGTH}-byte type field`,
        length,
      );
    }

    switch (buffer.peekUint16()) {
      case DUID_TYPE_LLT:
        return this.llt.decode(buffer);
      case DUID_TYPE_EN:
        return this.en.decode(buffer);
      case DUID_TYPE_LL:
        return this.ll.decode(buffer);
      case DUID_TYPE_UUID:
        return this.uuid.decode(buffer);
      default:
        return this.unknown.decode(buffer);
    }
  }
}
