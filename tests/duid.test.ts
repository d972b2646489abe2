import {
  createDuidEn,
  createDuidLl,
  createDuidLlt,
  createDuidUuid,
  createUnknownDuid,
} from '../src/builders';
import { decodeDuid, encodeDuid } from '../src/decode';
import {
  DUID_TIME_EPOCH,
  dateFromDuidTime,
  duidEquals,
  duidTimeFromDate,
  isRegisteredDuidType,
} from '../src/duid';
import { MalformedDuidError } from '../src/errors';
import { formatDuid } from '../src/format';
import { parseHex, toHex } from '../src/hex';

const MAC = parseHex('aa:bb:cc:dd:ee:ff');

describe('DUID time', () => {
  it('counts from midnight UTC, 1 January 2000', () => {
    expect(new Date(DUID_TIME_EPOCH).toISOString()).toBe('2000-01-01T00:00:00.000Z');
    expect(dateFromDuidTime(0).toISOString()).toBe('2000-01-01T00:00:00.000Z');
  });

  it('converts the example time to a date', () => {
    expect(dateFromDuidTime(0x2c3d4e5f).toISOString()).toBe('2023-07-09T10:54:23.000Z');
  });

  it('truncates to whole seconds', () => {
    expect(duidTimeFromDate(new Date('2023-07-09T10:54:23.900Z'))).toBe(742215263);
  });

  it('rejects dates before the epoch', () => {
    expect(() => duidTimeFromDate(new Date('1999-12-31T23:59:59Z'))).toThrow(RangeError);
  });

  it('rejects dates past the 32-bit range', () => {
    expect(() => duidTimeFromDate(new Date('2137-01-01T00:00:00Z'))).toThrow(RangeError);
  });

  it('rejects invalid dates', () => {
    expect(() => duidTimeFromDate(new Date(NaN))).toThrow('duidTimeFromDate: invalid date');
  });
});

describe('isRegisteredDuidType', () => {
  it('recognises types 1 to 4 only', () => {
    expect([0, 1, 2, 3, 4, 5].map(isRegisteredDuidType)).toEqual([false, true, true, true, true, false]);
  });
});

describe('builders', () => {
  it('createDuidLlt accepts a date', () => {
    const duid = createDuidLlt({
      hardwareType: 1,
      time: new Date('2023-07-09T10:54:23Z'),
      linkLayerAddress: MAC,
    });
    expect(toHex(encodeDuid(duid))).toBe('000100012c3d4e5faabbccddeeff');
  });

  it('createDuidLlt copies the address and freezes the value', () => {
    const address = MAC.slice();
    const duid = createDuidLlt({ hardwareType: 1, time: 0, linkLayerAddress: address });
    address[0] = 0;
    expect(Object.isFrozen(duid)).toBe(true);
    expect(toHex(duid.linkLayerAddress)).toBe('aabbccddeeff');
  });

  it('createDuidEn builds a DUID-EN', () => {
    const duid = createDuidEn({ enterpriseNumber: 9, identifier: parseHex('010203') });
    expect(toHex(encodeDuid(duid))).toBe('000200000009010203');
  });

  it('createDuidLl builds a DUID-LL', () => {
    const duid = createDuidLl({ hardwareType: 1, linkLayerAddress: MAC });
    expect(toHex(encodeDuid(duid))).toBe('00030001aabbccddeeff');
  });

  it('createDuidUuid requires 16 bytes', () => {
    expect(createDuidUuid(new Uint8Array(16)).uuid).toHaveLength(16);
    expect(() => createDuidUuid(new Uint8Array(17))).toThrow(MalformedDuidError);
  });

  it('createUnknownDuid rejects registered types', () => {
    expect(() => createUnknownDuid(2, new Uint8Array(4))).toThrow(MalformedDuidError);
    expect(createUnknownDuid(42, parseHex('beef'))).toEqual({
      kind: 'unknown',
      type: 42,
      data: parseHex('beef'),
    });
  });

  it('rejects out-of-range fields', () => {
    expect(() => createDuidLl({ hardwareType: 0x10000, linkLayerAddress: MAC })).toThrow(
      MalformedDuidError,
    );
    expect(() => createDuidLlt({ hardwareType: 1, time: 2 ** 32, linkLayerAddress: MAC })).toThrow(
      'DUID-LLT time must be an integer in 0..4294967295, got 4294967296',
    );
  });
});

describe('round-trip', () => {
  it.each([
    ['DUID-LLT', createDuidLlt({ hardwareType: 6, time: 12345, linkLayerAddress: MAC })],
    ['DUID-EN', createDuidEn({ enterpriseNumber: 311, identifier: parseHex('0102030405060708') })],
    ['DUID-LL', createDuidLl({ hardwareType: 32, linkLayerAddress: new Uint8Array(20).fill(7) })],
    ['DUID-UUID', createDuidUuid(parseHex('00112233445566778899aabbccddeeff'))],
    ['unknown', createUnknownDuid(0xfffe, new Uint8Array(0))],
  ])('%s decodes to an equal value', (_name, duid) => {
    const decoded = decodeDuid(encodeDuid(duid));
    expect(decoded).toEqual(duid);
    expect(duidEquals(decoded, duid)).toBe(true);
  });
});

describe('duidEquals', () => {
  it('compares bytes, not identity', () => {
    const a = createDuidLl({ hardwareType: 1, linkLayerAddress: MAC });
    const b = createDuidLl({ hardwareType: 1, linkLayerAddress: MAC.slice() });
    expect(duidEquals(a, b)).toBe(true);
  });

  it('distinguishes different fields', () => {
    const a = createDuidLl({ hardwareType: 1, linkLayerAddress: MAC });
    expect(duidEquals(a, createDuidLl({ hardwareType: 6, linkLayerAddress: MAC }))).toBe(false);
    expect(duidEquals(a, createDuidLl({ hardwareType: 1, linkLayerAddress: MAC.subarray(1) }))).toBe(false);
  });

  it('distinguishes variants', () => {
    const ll = createDuidLl({ hardwareType: 1, linkLayerAddress: MAC });
    const llt = createDuidLlt({ hardwareType: 1, time: 0, linkLayerAddress: MAC });
    expect(duidEquals(ll, llt)).toBe(false);
    expect(duidEquals(createUnknownDuid(7, MAC), createUnknownDuid(8, MAC))).toBe(false);
  });
});

describe('byte fields', () => {
  it('do not alias the decoded input', () => {
    const bytes = parseHex('00030001aabbccddeeff');
    const duid = decodeDuid(bytes);
    bytes.fill(0);
    expect(formatDuid(duid)).toBe('DUID-LL{HWType=Ethernet HWAddr=aa:bb:cc:dd:ee:ff}');
  });

  it('hand out writable copies through slice()', () => {
    const duid = decodeDuid(parseHex('00030001aabbccddeeff'));
    if (duid.kind !== 'll') throw new Error(`expected DUID-LL, got ${duid.kind}`);
    const copy = duid.linkLayerAddress.slice();
    copy[0] = 0;
    expect(toHex(copy)).toBe('00bbccddeeff');
    expect(toHex(duid.linkLayerAddress)).toBe('aabbccddeeff');
  });

  it('reject in-place writes at compile time', () => {
    const duid = createDuidUuid(new Uint8Array(16));
    const writes = (): void => {
      // @ts-expect-error index signature of a DUID byte field only permits reading
      duid.uuid[0] = 1;
      // @ts-expect-error DUID byte fields have no fill()
      duid.uuid.fill(1);
      // @ts-expect-error DUID byte fields have no set()
      duid.uuid.set([1], 0);
    };
    expect(typeof writes).toBe('function');
    expect(toHex(encodeDuid(duid))).toBe('0004' + '00'.repeat(16));
  });
});
