/**
 * Deterministic random generators for DUID fuzz tests.
 */
import {
  createDuidEn,
  createDuidLl,
  createDuidLlt,
  createDuidUuid,
  createUnknownDuid,
} from '../../src/builders';
import type { Duid } from '../../src/duid';

/** Seeded PRNG (mulberry32) so failures reproduce. */
export class Rng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Uniform float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [min, max], inclusive. */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  chance(p: number): boolean {
    return this.next() < p;
  }

  pick<T>(items: readonly T[]): T {
    return items[this.int(0, items.length - 1)];
  }

  bytes(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i++) out[i] = this.int(0, 255);
    return out;
  }
}

/**
 * Random byte string biased towards interesting DUIDs: most start with a
 * registered type code and sit near the length bounds.
 */
export function randomDuidBytes(rng: Rng, maxLength = 140): Uint8Array {
  const length = rng.chance(0.3) ? rng.int(0, maxLength) : rng.pick([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 17, 18, 19, 129, 130, 131]);
  const bytes = rng.bytes(length);
  if (length >= 2 && rng.chance(0.8)) {
    bytes[0] = 0;
    bytes[1] = rng.int(0, 5);
  }
  return bytes;
}

/** A random valid DUID of any variant. */
export function randomDuid(rng: Rng): Duid {
  switch (rng.int(0, 4)) {
    case 0:
      return createDuidLlt({
        hardwareType: rng.int(0, 0xffff),
        time: rng.int(0, 0xffffffff),
        linkLayerAddress: rng.bytes(rng.int(0, 122)),
      });
    case 1:
      return createDuidEn({
        enterpriseNumber: rng.int(0, 0xffffffff),
        identifier: rng.bytes(rng.int(0, 124)),
      });
    case 2:
      return createDuidLl({
        hardwareType: rng.int(0, 0xffff),
        linkLayerAddress: rng.bytes(rng.int(0, 126)),
      });
    case 3:
      return createDuidUuid(rng.bytes(16));
    default:
      return createUnknownDuid(rng.chance(0.1) ? 0 : rng.int(5, 0xffff), rng.bytes(rng.int(0, 128)));
  }
}
