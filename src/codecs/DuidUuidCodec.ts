import { ByteBuffer } from '../ByteBuffer.js';
import { DUID_TYPE_LENGTH, DUID_TYPE_UUID, UUID_LENGTH, type DuidUuid } from '../duid.js';
import { assertDuidLength, type DuidVariantCodec } from './Codec.js';

/**
 * DUID-UUID (RFC 6355).
 *
 *   type (2) | UUID (16)
 *
 * The length is fixed: trailing bytes after the UUID are rejected.
 */
export class DuidUuidCodec implements DuidVariantCodec<DuidUuid> {
  readonly label = 'DUID-UUID';
  readonly minLength = DUID_TYPE_LENGTH + UUID_LENGTH;
  readonly maxLength = DUID_TYPE_LENGTH + UUID_LENGTH;

  encode(buffer: ByteBuffer, value: DuidUuid): void {
    assertDuidLength(this, DUID_TYPE_LENGTH + value.uuid.length);

    buffer.writeUint16(DUID_TYPE_UUID);
    buffer.writeBytes(value.uuid);
  }

  decode(buffer: ByteBuffer): DuidUuid {
    assertDuidLength(this, buffer.remaining);
    buffer.readUint16();
    const uuid = buffer.readBytes(UUID_LENGTH);
    const duid: DuidUuid = { kind: 'uuid', type: DUID_TYPE_UUID, uuid };
    return Object.freeze(duid);
  }
}
