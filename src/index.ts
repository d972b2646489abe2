export { ByteBuffer } from './ByteBuffer.js';
export { DuidError, InvalidHexEncodingError, MalformedDuidError } from './errors.js';
export { parseHex, toHex, toColonHex } from './hex.js';
export {
  DUID_TYPE_LLT,
  DUID_TYPE_EN,
  DUID_TYPE_LL,
  DUID_TYPE_UUID,
  DUID_TYPE_LENGTH,
  DUID_MAX_LENGTH,
  DUID_TIME_EPOCH,
  DUID_TYPE_NAMES,
  DUID_TYPE_DESCRIPTIONS,
  UUID_LENGTH,
  isRegisteredDuidType,
  duidTimeFromDate,
  dateFromDuidTime,
  duidEquals,
} from './duid.js';
export type { Duid, DuidKind, ReadonlyBytes, DuidLlt, DuidEn, DuidLl, DuidUuid, UnknownDuid } from './duid.js';
export type { Codec, DuidLayout, DuidVariantCodec } from './codecs/Codec.js';
export { DuidCodec } from './codecs/DuidCodec.js';
export { DuidLltCodec } from './codecs/DuidLltCodec.js';
export { DuidEnCodec } from './codecs/DuidEnCodec.js';
export { DuidLlCodec } from './codecs/DuidLlCodec.js';
export { DuidUuidCodec } from './codecs/DuidUuidCodec.js';
export { UnknownDuidCodec } from './codecs/UnknownDuidCodec.js';
export { decodeDuid, encodeDuid, decodeDuidHex } from './decode.js';
export type { DuidDecodeResult } from './decode.js';
export {
  createDuidLlt,
  createDuidEn,
  createDuidLl,
  createDuidUuid,
  createUnknownDuid,
} from './builders.js';
export type { DuidLltInit, DuidEnInit, DuidLlInit } from './builders.js';
export { HARDWARE_TYPE_ETHERNET, getHardwareTypeName, getHardwareTypeCodes } from './hardware-types.js';
export { formatDuid, formatUuid, describeDuid, duidToJson } from './format.js';
export type { ReportField, DuidJson } from './format.js';
