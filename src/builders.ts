import {
  DUID_TYPE_EN,
  DUID_TYPE_LL,
  DUID_TYPE_LLT,
  DUID_TYPE_UUID,
  duidTimeFromDate,
  type Duid,
  type DuidEn,
  type DuidLl,
  type DuidLlt,
  type DuidUuid,
  type ReadonlyBytes,
  type UnknownDuid,
} from './duid.js';
import { encodeDuid } from './decode.js';

export interface DuidLltInit {
  hardwareType: number;
  /** Seconds since 2000-01-01T00:00:00Z, or a date to convert. */
  time: number | Date;
  linkLayerAddress: ReadonlyBytes;
}

export interface DuidEnInit {
  enterpriseNumber: number;
  identifier: ReadonlyBytes;
}

export interface DuidLlInit {
  hardwareType: number;
  linkLayerAddress: ReadonlyBytes;
}

/** Freeze after checking the value encodes; throws MalformedDuidError otherwise. */
function validated<T extends Duid>(duid: T): T {
  encodeDuid(duid);
  Object.freeze(duid);
  return duid;
}

export function createDuidLlt(init: DuidLltInit): DuidLlt {
  const time = init.time instanceof Date ? duidTimeFromDate(init.time) : init.time;
  return validated<DuidLlt>({
    kind: 'llt',
    type: DUID_TYPE_LLT,
    hardwareType: init.hardwareType,
    time,
    linkLayerAddress: init.linkLayerAddress.slice(),
  });
}

export function createDuidEn(init: DuidEnInit): DuidEn {
  return validated<DuidEn>({
    kind: 'en',
    type: DUID_TYPE_EN,
    enterpriseNumber: init.enterpriseNumber,
    identifier: init.identifier.slice(),
  });
}

export function createDuidLl(init: DuidLlInit): DuidLl {
  return validated<DuidLl>({
    kind: 'll',
    type: DUID_TYPE_LL,
    hardwareType: init.hardwareType,
    linkLayerAddress: init.linkLayerAddress.slice(),
  });
}

export function createDuidUuid(uuid: ReadonlyBytes): DuidUuid {
  return validated<DuidUuid>({ kind: 'uuid', type: DUID_TYPE_UUID, uuid: uuid.slice() });
}

/** Build a DUID for a type code with no registered layout. */
export function createUnknownDuid(type: number, data: ReadonlyBytes): UnknownDuid {
  return validated<UnknownDuid>({ kind: 'unknown', type, data: data.slice() });
}
