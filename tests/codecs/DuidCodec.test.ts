import { ByteBuffer } from '../../src/ByteBuffer';
import { DuidCodec } from '../../src/codecs/DuidCodec';
import { DuidLltCodec } from '../../src/codecs/DuidLltCodec';
import { DuidEnCodec } from '../../src/codecs/DuidEnCodec';
import { DuidLlCodec } from '../../src/codecs/DuidLlCodec';
import { DuidUuidCodec } from '../../src/codecs/DuidUuidCodec';
import { UnknownDuidCodec } from '../../src/codecs/UnknownDuidCodec';
import { MalformedDuidError } from '../../src/errors';
import { parseHex, toHex } from '../../src/hex';

function decodeHex(hex: string) {
  return new DuidCodec().decode(ByteBuffer.from(parseHex(hex)));
}

describe('DuidCodec', () => {
  describe('DUID-LLT', () => {
    it('decodes hardware type, time and link-layer address', () => {
      const duid = decodeHex('00:01:00:01:2c:3d:4e:5f:aa:bb:cc:dd:ee:ff');
      expect(duid.kind).toBe('llt');
      if (duid.kind !== 'llt') return;
      expect(duid.type).toBe(1);
      expect(duid.hardwareType).toBe(0x0001);
      expect(duid.time).toBe(0x2c3d4e5f);
      expect(toHex(duid.linkLayerAddress)).toBe('aabbccddeeff');
    });

    it('accepts an empty link-layer address', () => {
      const duid = decodeHex('0001000100000000');
      expect(duid).toEqual({
        kind: 'llt',
        type: 1,
        hardwareType: 1,
        time: 0,
        linkLayerAddress: new Uint8Array(0),
      });
    });

    it('rejects 7 bytes', () => {
      expect(() => decodeHex('000100012c3d4e')).toThrow(
        'DUID-LLT must be at least 8 bytes long, got 7',
      );
    });
  });

  describe('DUID-EN', () => {
    it('decodes enterprise number and identifier', () => {
      const duid = decodeHex('00:02:00:00:00:09:01:02:03');
      expect(duid).toEqual({
        kind: 'en',
        type: 2,
        enterpriseNumber: 9,
        identifier: new Uint8Array([0x01, 0x02, 0x03]),
      });
    });

    it('reads the enterprise number as unsigned', () => {
      const duid = decodeHex('0002ffffffff');
      expect(duid.kind === 'en' && duid.enterpriseNumber).toBe(0xffffffff);
    });

    it('rejects 5 bytes', () => {
      expect(() => decodeHex('0002000000')).toThrow('DUID-EN must be at least 6 bytes long, got 5');
    });
  });

  describe('DUID-LL', () => {
    it('decodes hardware type and link-layer address', () => {
      const duid = decodeHex('00:03:00:01:aa:bb:cc:dd:ee:ff');
      expect(duid).toEqual({
        kind: 'll',
        type: 3,
        hardwareType: 1,
        linkLayerAddress: new Uint8Array([0xaa, 0xbb, 0xcc, 0xdd, 0xee, 0xff]),
      });
    });

    it('rejects 3 bytes', () => {
      expect(() => decodeHex('000300')).toThrow('DUID-LL must be at least 4 bytes long, got 3');
    });
  });

  describe('DUID-UUID', () => {
    const uuidHex = '00112233445566778899aabbccddeeff';

    it('decodes a 16-byte UUID', () => {
      const duid = decodeHex(`0004${uuidHex}`);
      expect(duid.kind).toBe('uuid');
      expect(duid.kind === 'uuid' && toHex(duid.uuid)).toBe(uuidHex);
    });

    it('rejects a truncated UUID', () => {
      expect(() => decodeHex(`0004${uuidHex.slice(0, 30)}`)).toThrow(
        'DUID-UUID must be at least 18 bytes long, got 17',
      );
    });

    it('rejects a bare type field', () => {
      expect(() => decodeHex('00:04')).toThrow(MalformedDuidError);
    });

    it('rejects trailing bytes after the UUID', () => {
      expect(() => decodeHex(`0004${uuidHex}00`)).toThrow(
        'DUID-UUID must be exactly 18 bytes long, got 19',
      );
    });
  });

  describe('unknown types', () => {
    it('keeps the payload verbatim', () => {
      expect(decodeHex('0007deadbeef')).toEqual({
        kind: 'unknown',
        type: 7,
        data: new Uint8Array([0xde, 0xad, 0xbe, 0xef]),
      });
    });

    it('treats type 0 as unknown', () => {
      expect(decodeHex('0000')).toEqual({ kind: 'unknown', type: 0, data: new Uint8Array(0) });
    });

    it('reads the type as unsigned', () => {
      expect(decodeHex('ffff01').type).toBe(0xffff);
    });
  });

  describe('length bounds', () => {
    it('rejects empty input', () => {
      expect(() => decodeHex('')).toThrow('DUID is empty');
    });

    it('rejects a single byte', () => {
      expect(() => decodeHex('01')).toThrow('DUID is too short (1 byte) to hold the 2-byte type field');
    });

    it('accepts 130 bytes', () => {
      const duid = decodeHex('0001' + '0001' + '00000000' + 'ab'.repeat(122));
      expect(duid.kind === 'llt' && duid.linkLayerAddress.length).toBe(122);
    });

    it('rejects 131 bytes before looking at the type', () => {
      expect(() => decodeHex('0009' + '00'.repeat(129))).toThrow(
        'DUID must be at most 130 bytes long, got 131',
      );
    });

    it('reports the offending length on the error', () => {
      let caught: unknown;
      try {
        decodeHex('000300');
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(MalformedDuidError);
      expect(caught).toMatchObject({ name: 'MalformedDuidError', length: 3 });
    });
  });

  it('encodes every variant back to its input', () => {
    const codec = new DuidCodec();
    for (const hex of [
      '000100012c3d4e5faabbccddeeff',
      '000200000009010203',
      '00030001aabbccddeeff',
      '000400112233445566778899aabbccddeeff',
      '0007deadbeef',
    ]) {
      const duid = codec.decode(ByteBuffer.from(parseHex(hex)));
      const out = ByteBuffer.alloc();
      codec.encode(out, duid);
      expect(toHex(out.toUint8Array())).toBe(hex);
    }
  });
});

describe('variant codec layouts', () => {
  it('declares total length bounds per type', () => {
    expect([new DuidLltCodec(), new DuidEnCodec(), new DuidLlCodec(), new DuidUuidCodec(), new UnknownDuidCodec()]
      .map(c => [c.label, c.minLength, c.maxLength])).toEqual([
      ['DUID-LLT', 8, 130],
      ['DUID-EN', 6, 130],
      ['DUID-LL', 4, 130],
      ['DUID-UUID', 18, 18],
      ['DUID', 2, 130],
    ]);
  });

  it('refuses to encode a registered type as unknown', () => {
    const buffer = ByteBuffer.alloc();
    expect(() =>
      new UnknownDuidCodec().encode(buffer, { kind: 'unknown', type: 3, data: new Uint8Array(0) }),
    ).toThrow('DUID type 3 has a registered layout and cannot be encoded as an unknown DUID');
  });
});
