import { ByteBuffer } from '../ByteBuffer.js';
import { DUID_MAX_LENGTH, DUID_TYPE_LLT, type DuidLlt } from '../duid.js';
import { assertDuidLength, assertUint, type DuidVariantCodec } from './Codec.js';

/**
 * DUID-LLT (RFC 8415 §11.2).
 *
 *   type (2) | hardware type (2) | time (4) | link-layer address (rest)
 */
export class DuidLltCodec implements DuidVariantCodec<DuidLlt> {
  readonly label = 'DUID-LLT';
  readonly minLength = 8;
  readonly maxLength = DUID_MAX_LENGTH;

  encode(buffer: ByteBuffer, value: DuidLlt): void {
    assertUint('DUID-LLT hardware type', value.hardwareType, 16);
    assertUint('DUID-LLT time', value.time, 32);
    assertDuidLength(this, this.minLength + value.linkLayerAddress.length);

    buffer.writeUint16(DUID_TYPE_LLT);
    buffer.writeUint16(value.hardwareType);
    buffer.writeUint32(value.time);
    buffer.writeBytes(value.linkLayerAddress);
  }

  decode(buffer: ByteBuffer): DuidLlt {
    assertDuidLength(this, buffer.remaining);
    buffer.readUint16();
    const hardwareType = buffer.readUint16();
    const time = buffer.readUint32();
    const linkLayerAddress = buffer.readRemaining();
    const duid: DuidLlt = { kind: 'llt', type: DUID_TYPE_LLT, hardwareType, time, linkLayerAddress };
    return Object.freeze(duid);
  }
}
