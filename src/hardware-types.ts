/**
 * IANA ARP hardware type numbers (RFC 826 / "Hardware Types" registry),
 * as carried in DUID-LLT and DUID-LL. Only the commonly seen entries are
 * named; anything else is reported by number.
 */

export const HARDWARE_TYPE_ETHERNET = 1;

const HARDWARE_TYPES: Record<number, string> = {
  1: 'Ethernet',
  2: 'Experimental Ethernet',
  3: 'Amateur Radio AX.25',
  4: 'Proteon ProNET Token Ring',
  5: 'Chaos',
  6: 'IEEE 802',
  7: 'ARCNET',
  8: 'Hyperchannel',
  11: 'LocalTalk',
  12: 'LocalNet',
  15: 'Frame Relay',
  16: 'ATM',
  17: 'HDLC',
  18: 'Fibre Channel',
  20: 'Serial Line',
  24: 'IEEE 1394.1995',
  27: 'EUI-64',
  32: 'InfiniBand',
};

/** Look up a hardware type name. Returns undefined if not recognized. */
export function getHardwareTypeName(code: number): string | undefined {
  return HARDWARE_TYPES[code];
}

/** Get all named hardware type codes, ascending. */
export function getHardwareTypeCodes(): number[] {
  return Object.keys(HARDWARE_TYPES)
    .map(Number)
    .sort((a, b) => a - b);
}
