import { ByteBuffer } from '../ByteBuffer.js';
import { DUID_MAX_LENGTH, DUID_TYPE_LL, type DuidLl } from '../duid.js';
import { assertDuidLength, assertUint, type DuidVariantCodec } from './Codec.js';

/**
 * DUID-LL (RFC 8415 §11.4).
 *
 *   type (2) | hardware type (2) | link-layer address (rest)
 */
export class DuidLlCodec implements DuidVariantCodec<DuidLl> {
  readonly label = 'DUID-LL';
  readonly minLength = 4;
  readonly maxLength = DUID_MAX_LENGTH;

  encode(buffer: ByteBuffer, value: DuidLl): void {
    assertUint('DUID-LL hardware type', value.hardwareType, 16);
    assertDuidLength(this, this.minLength + value.linkLayerAddress.length);

    buffer.writeUint16(DUID_TYPE_LL);
    buffer.writeUint16(value.hardwareType);
    buffer.writeBytes(value.linkLayerAddress);
  }

  decode(buffer: ByteBuffer): DuidLl {
    assertDuidLength(this, buffer.remaining);
    buffer.readUint16();
    const hardwareType = buffer.readUint16();
    const linkLayerAddress = buffer.readRemaining();
    const duid: DuidLl = { kind: 'll', type: DUID_TYPE_LL, hardwareType, linkLayerAddress };
    return Object.freeze(duid);
  }
}
