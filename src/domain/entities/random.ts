export type RandomNumberGenerator = () => number;

export function mulberry32(seed: number): RandomNumberGenerator {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform index in `[0, length)` for a generator yielding values in `[0, 1)`. */
export function randomIndex(length: number, rng: RandomNumberGenerator): number {
  return Math.min(length - 1, Math.floor(rng() * length));
}
