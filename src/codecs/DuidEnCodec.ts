import { ByteBuffer } from '../ByteBuffer.js';
import { DUID_MAX_LENGTH, DUID_TYPE_EN, type DuidEn } from '../duid.js';
import { assertDuidLength, assertUint, type DuidVariantCodec } from './Codec.js';

/**
 * DUID-EN (RFC 8415 §11.3).
 *
 *   type (2) | enterprise number (4) | identifier (rest)
 */
export class DuidEnCodec implements DuidVariantCodec<DuidEn> {
  readonly label = 'DUID-EN';
  readonly minLength = 6;
  readonly maxLength = DUID_MAX_LENGTH;

  encode(buffer: ByteBuffer, value: DuidEn): void {
    assertUint('DUID-EN enterprise number', value.enterpriseNumber, 32);
    assertDuidLength(this, this.minLength + value.identifier.length);

    buffer.writeUint16(DUID_TYPE_EN);
    buffer.writeUint32(value.enterpriseNumber);
    buffer.writeBytes(value.identifier);
  }

  decode(buffer: ByteBuffer): DuidEn {
    assertDuidLength(this, buffer.remaining);
    buffer.readUint16();
    const enterpriseNumber = buffer.readUint32();
    const identifier = buffer.readRemaining();
    const duid: DuidEn = { kind: 'en', type: DUID_TYPE_EN, enterpriseNumber, identifier };
    return Object.freeze(duid);
  }
}
