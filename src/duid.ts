/**
 * DHCPv6 Unique Identifier (RFC 8415 §11) value types.
 *
 * Every DUID starts with a 2-byte big-endian type code followed by a
 * type-specific payload. The `kind` tag mirrors the type code for the four
 * registered variants so values can be matched exhaustively; any other
 * code is carried as an `UnknownDuid` with its payload left verbatim.
 */

export const DUID_TYPE_LLT = 1;
export const DUID_TYPE_EN = 2;
export const DUID_TYPE_LL = 3;
export const DUID_TYPE_UUID = 4;

/** Size of the type field that opens every DUID. */
export const DUID_TYPE_LENGTH = 2;

/** Type field plus at most 128 bytes of payload. */
export const DUID_MAX_LENGTH = 130;

/** Byte length of the UUID carried by a DUID-UUID. */
export const UUID_LENGTH = 16;

/** DUID-LLT time counts seconds from midnight UTC, 1 January 2000. */
export const DUID_TIME_EPOCH = Date.UTC(2000, 0, 1);

const MAX_UINT32 = 0xffffffff;

/**
 * Byte field of a DUID value. Index writes and the in-place mutators of
 * Uint8Array do not type-check; `slice()` gives a writable copy.
 */
export type ReadonlyBytes = Readonly<
  Omit<Uint8Array, 'fill' | 'set' | 'copyWithin' | 'reverse' | 'sort' | 'subarray' | 'buffer'>
>;

export type DuidKind = 'llt' | 'en' | 'll' | 'uuid' | 'unknown';

/** Link-layer address plus time. */
export interface DuidLlt {
  readonly kind: 'llt';
  readonly type: typeof DUID_TYPE_LLT;
  readonly hardwareType: number;
  /** Seconds since {@link DUID_TIME_EPOCH}. */
  readonly time: number;
  readonly linkLayerAddress: ReadonlyBytes;
}

/** Vendor-assigned identifier based on an IANA enterprise number. */
export interface DuidEn {
  readonly kind: 'en';
  readonly type: typeof DUID_TYPE_EN;
  readonly enterpriseNumber: number;
  readonly identifier: ReadonlyBytes;
}

/** Link-layer address only. */
export interface DuidLl {
  readonly kind: 'll';
  readonly type: typeof DUID_TYPE_LL;
  readonly hardwareType: number;
  readonly linkLayerAddress: ReadonlyBytes;
}

/** RFC 6355 UUID-based DUID. */
export interface DuidUuid {
  readonly kind: 'uuid';
  readonly type: typeof DUID_TYPE_UUID;
  readonly uuid: ReadonlyBytes;
}

/** Any type code without a registered layout. */
export interface UnknownDuid {
  readonly kind: 'unknown';
  readonly type: number;
  readonly data: ReadonlyBytes;
}

export type Duid = DuidLlt | DuidEn | DuidLl | DuidUuid | UnknownDuid;

/** Human-readable names of the registered DUID types. */
export const DUID_TYPE_NAMES: Readonly<Record<number, string>> = {
  [DUID_TYPE_LLT]: 'DUID-LLT',
  [DUID_TYPE_EN]: 'DUID-EN',
  [DUID_TYPE_LL]: 'DUID-LL',
  [DUID_TYPE_UUID]: 'DUID-UUID',
};

export const DUID_TYPE_DESCRIPTIONS: Readonly<Record<number, string>> = {
  [DUID_TYPE_LLT]: 'Link-layer address plus time',
  [DUID_TYPE_EN]: 'Vendor-assigned unique ID based on Enterprise Number',
  [DUID_TYPE_LL]: 'Link-layer address',
  [DUID_TYPE_UUID]: 'Universally Unique Identifier',
};

/** True for the four type codes with a defined layout. */
export function isRegisteredDuidType(type: number): boolean {
  return type in DUID_TYPE_NAMES;
}

/**
 * Convert a date to a DUID-LLT time value, truncating to whole seconds.
 *
 * @throws {RangeError} if the date falls before 2000-01-01T00:00:00Z or
 *   too far after it to fit in 32 bits.
 */
export function duidTimeFromDate(date: Date): number {
  const ms = date.getTime();
  if (Number.isNaN(ms)) {
    throw new RangeError('duidTimeFromDate: invalid date');
  }
  const seconds = Math.floor((ms - DUID_TIME_EPOCH) / 1000);
  if (seconds < 0 || seconds > MAX_UINT32) {
    throw new RangeError(
      `duidTimeFromDate: ${date.toISOString()} is outside the DUID time range (2000-01-01 to 2136-02-07)`,
    );
  }
  return seconds;
}

/** Convert a DUID-LLT time value back to a date. */
export function dateFromDuidTime(time: number): Date {
  return new Date(DUID_TIME_EPOCH + time * 1000);
}

function bytesEqual(a: ReadonlyBytes, b: ReadonlyBytes): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Structural equality: same variant, same fields, same bytes. */
export function duidEquals(a: Duid, b: Duid): boolean {
  if (a.type !== b.type) return false;
  switch (a.kind) {
    case 'llt':
      return (
        b.kind === 'llt' &&
        a.hardwareType === b.hardwareType &&
        a.time === b.time &&
        bytesEqual(a.linkLayerAddress, b.linkLayerAddress)
      );
    case 'en':
      return (
        b.kind === 'en' &&
        a.enterpriseNumber === b.enterpriseNumber &&
        bytesEqual(a.identifier, b.identifier)
      );
    case 'll':
      return (
        b.kind === 'll' &&
        a.hardwareType === b.hardwareType &&
        bytesEqual(a.linkLayerAddress, b.linkLayerAddress)
      );
    case 'uuid':
      return b.kind === 'uuid' && bytesEqual(a.uuid, b.uuid);
    case 'unknown':
      return b.kind === 'unknown' && bytesEqual(a.data, b.data);
  }
}
