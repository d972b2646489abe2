import { ByteBuffer } from '../ByteBuffer.js';
import { DUID_MAX_LENGTH, DUID_TYPE_LENGTH, isRegisteredDuidType, type UnknownDuid } from '../duid.js';
import { MalformedDuidError } from '../errors.js';
import { assertDuidLength, assertUint, type DuidVariantCodec } from './Codec.js';

/**
 * Fallback for type codes without a registered layout: the payload is kept
 * verbatim and may be empty.
 */
export class UnknownDuidCodec implements DuidVariantCodec<UnknownDuid> {
  readonly label = 'DUID';
  readonly minLength = DUID_TYPE_LENGTH;
  readonly maxLength = DUID_MAX_LENGTH;

  encode(buffer: ByteBuffer, value: UnknownDuid): void {
    assertUint('DUID type', value.type, 16);
    if (isRegisteredDuidType(value.type)) {
      throw new MalformedDuidError(
        `DUID type ${value.type} has a registered layout and cannot be encoded as an unknown DUID`,
      );
    }
    assertDuidLength(this, DUID_TYPE_LENGTH + value.data.length);

    buffer.writeUint16(value.type);
    buffer.writeBytes(value.data);
  }

  decode(buffer: ByteBuffer): UnknownDuid {
    assertDuidLength(this, buffer.remaining);
    const type = buffer.readUint16();
    const data = buffer.readRemaining();
    const duid: UnknownDuid = { kind: 'unknown', type, data };
    return Object.freeze(duid);
  }
}
