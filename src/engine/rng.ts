export type Rng = () => number;

export function makeRng(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function normalizeSeed(seed: number | undefined, fallback: number): number {
  if (seed === undefined || Number.isNaN(seed) || !Number.isFinite(seed)) {
    return fallback >>> 0;
  }
  return seed >>> 0;
}

/**
 * Frame length around `base`, spread uniformly by +/- `spread` (a fraction
 * of base). Never returns a negative duration.
 */
export function jitterFrame(rng: Rng, base: number, spread: number): number {
  if (!(spread > 0)) return base;
  const offset = (rng() * 2 - 1) * spread * base;
  return Math.max(0, base + offset);
}
