import {
  DUID_TYPE_DESCRIPTIONS,
  DUID_TYPE_NAMES,
  dateFromDuidTime,
  type Duid,
  type ReadonlyBytes,
} from './duid.js';
import { encodeDuid } from './decode.js';
import { HARDWARE_TYPE_ETHERNET, getHardwareTypeName } from './hardware-types.js';
import { toColonHex, toHex } from './hex.js';

const MAC_LENGTH = 6;

function hardwareTypeLabel(code: number): string {
  return getHardwareTypeName(code) ?? `unknown(${code})`;
}

/** Format a 16-byte UUID as 8-4-4-4-12 lowercase hex. */
export function formatUuid(uuid: ReadonlyBytes): string {
  const hex = toHex(uuid);
  return [
    hex.substring(0, 8),
    hex.substring(8, 12),
    hex.substring(12, 16),
    hex.substring(16, 20),
    hex.substring(20),
  ].join('-');
}

/**
 * Canonical one-line form of a DUID, e.g.
 * `DUID-LL{HWType=Ethernet HWAddr=aa:bb:cc:dd:ee:ff}`.
 */
export function formatDuid(duid: Duid): string {
  switch (duid.kind) {
    case 'llt':
      return (
        `DUID-LLT{HWType=${hardwareTypeLabel(duid.hardwareType)} ` +
        `HWAddr=${toColonHex(duid.linkLayerAddress)} Time=${duid.time}}`
      );
    case 'en':
      return `DUID-EN{EnterpriseNumber=${duid.enterpriseNumber} EnterpriseIdentifier=${toHex(duid.identifier)}}`;
    case 'll':
      return `DUID-LL{HWType=${hardwareTypeLabel(duid.hardwareType)} HWAddr=${toColonHex(duid.linkLayerAddress)}}`;
    case 'uuid':
      return `DUID-UUID{UUID=${formatUuid(duid.uuid)}}`;
    case 'unknown':
      return `DUID-Unknown{Type=${duid.type} Data=0x${toHex(duid.data)}}`;
  }
}

export interface ReportField {
  label: string;
  value: string;
}

/**
 * Colon-separated address; anything other than a 6-byte Ethernet MAC
 * carries a `(hex)` suffix.
 */
function formatLinkLayerAddress(hardwareType: number, address: ReadonlyBytes): string {
  const text = toColonHex(address);
  if (hardwareType === HARDWARE_TYPE_ETHERNET && address.length === MAC_LENGTH) {
    return text;
  }
  return `${text} (hex)`;
}

/** Detailed, labelled breakdown of every field of a DUID. */
export function describeDuid(duid: Duid): ReportField[] {
  const typeName = DUID_TYPE_NAMES[duid.type];
  const fields: ReportField[] = [
    { label: 'Total DUID Length', value: `${encodeDuid(duid).length} bytes` },
    {
      label: 'DUID Type',
      value: typeName
        ? `${duid.type} [${typeName} - ${DUID_TYPE_DESCRIPTIONS[duid.type]}]`
        : `${duid.type} [Unknown]`,
    },
  ];

  switch (duid.kind) {
    case 'llt':
      fields.push(
        { label: 'Hardware Type', value: `${duid.hardwareType} [${hardwareTypeLabel(duid.hardwareType)}]` },
        { label: 'Seconds since 2000-01-01T00:00:00Z', value: String(duid.time) },
        { label: 'Timestamp (UTC)', value: dateFromDuidTime(duid.time).toISOString() },
        {
          label: 'Link-layer Address',
          value: formatLinkLayerAddress(duid.hardwareType, duid.linkLayerAddress),
        },
      );
      break;
    case 'en':
      fields.push(
        { label: 'Enterprise Number', value: String(duid.enterpriseNumber) },
        { label: 'Identifier', value: `0x${toHex(duid.identifier)}` },
      );
      break;
    case 'll':
      fields.push(
        { label: 'Hardware Type', value: `${duid.hardwareType} [${hardwareTypeLabel(duid.hardwareType)}]` },
        {
          label: 'Link-layer Address',
          value: formatLinkLayerAddress(duid.hardwareType, duid.linkLayerAddress),
        },
      );
      break;
    case 'uuid':
      fields.push({ label: 'UUID', value: formatUuid(duid.uuid) });
      break;
    case 'unknown':
      fields.push({
        label: 'Undecoded Data',
        value: duid.data.length > 0 ? `0x${toHex(duid.data)}` : '(none)',
      });
      break;
  }
  return fields;
}

export type DuidJson =
  | { kind: 'llt'; type: number; hardwareType: number; time: number; timestamp: string; linkLayerAddress: string }
  | { kind: 'en'; type: number; enterpriseNumber: number; identifier: string }
  | { kind: 'll'; type: number; hardwareType: number; linkLayerAddress: string }
  | { kind: 'uuid'; type: number; uuid: string }
  | { kind: 'unknown'; type: number; data: string };

/** Plain-object view of a DUID with byte fields as lowercase hex. */
export function duidToJson(duid: Duid): DuidJson {
  switch (duid.kind) {
    case 'llt':
      return {
        kind: 'llt',
        type: duid.type,
        hardwareType: duid.hardwareType,
        time: duid.time,
        timestamp: dateFromDuidTime(duid.time).toISOString(),
        linkLayerAddress: toHex(duid.linkLayerAddress),
      };
    case 'en':
      return {
        kind: 'en',
        type: duid.type,
        enterpriseNumber: duid.enterpriseNumber,
        identifier: toHex(duid.identifier),
      };
    case 'll':
      return {
        kind: 'll',
        type: duid.type,
        hardwareType: duid.hardwareType,
        linkLayerAddress: toHex(duid.linkLayerAddress),
      };
    case 'uuid':
      return { kind: 'uuid', type: duid.type, uuid: formatUuid(duid.uuid) };
    case 'unknown':
      return { kind: 'unknown', type: duid.type, data: toHex(duid.data) };
  }
}
