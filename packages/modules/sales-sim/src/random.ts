/** Uniform source in [0, 1), same contract as Math.random. */
export type Rng = () => number;

// Mulberry32: small, fast, good enough for synthetic data.
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seeded when a seed is given, otherwise backed by Math.random. */
export function createRng(seed?: number): Rng {
  return seed === undefined ? Math.random : mulberry32(seed);
}

/** Integer in [min, max], both inclusive. */
export function randInt(rng: Rng, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

export function randFloat(rng: Rng, min: number, max: number): number {
  return rng() * (max - min) + min;
}

function itemAt<T>(items: readonly T[], index: number): T {
  const item = items[index];
  if (item === undefined) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return item;
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
  return itemAt(items, Math.floor(rng() * items.length));
}

/**
 * Draws one item with probability proportional to its weight. Negative or
 * non-finite weights count as zero; when every weight is zero the draw is
 * uniform.
 */
export function weightedPick<T>(rng: Rng, items: readonly T[], weights: readonly number[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  if (weights.length !== items.length) {
    throw new RangeError(`Expected ${items.length} weights, got ${weights.length}`);
  }
  const clean = weights.map((w) => (Number.isFinite(w) && w > 0 ? w : 0));
  const total = clean.reduce((s, w) => s + w, 0);
  if (total === 0) {
    return pick(rng, items);
  }
  let r = rng() * total;
  let lastWeighted = 0;
  for (let i = 0; i < clean.length; i++) {
    const w = clean[i] ?? 0;
    if (w === 0) continue;
    if (r < w) return itemAt(items, i);
    r -= w;
    lastWeighted = i;
  }
  // Floating point residue can leave r a hair above the final weight.
  return itemAt(items, lastWeighted);
}
