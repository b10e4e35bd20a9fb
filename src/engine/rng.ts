export interface Rng {
  seed: number;
  uniform: () => number;
  /** Uniform integer in [min, max], both inclusive. */
  integer: (min: number, max: number) => number;
}

export const createRng = (seed: number): Rng => {
  // Bitwise ops in JS/TS convert numbers to 32-bit signed integers.
  let s = seed | 0;
  if (s === 0) s = 0x6d2b79f5;

  // Xorshift-style PRNG producing a 32-bit unsigned integer.
  const nextUint32 = (): number => {
    s ^= s << 13;
    s ^= s >>> 17;
    s ^= s << 5;
    return s >>> 0;
  };

  // Scale a 32-bit integer into a floating point number in [0, 1).
  const uniform = (): number => nextUint32() / 0x1_0000_0000;

  const integer = (min: number, max: number): number => {
    if (max <= min) return min;
    return min + Math.floor(uniform() * (max - min + 1));
  };

  return { seed, uniform, integer };
};

/**
 * Draws `count` distinct entries, each pick weighted by `weightOf` among the entries not yet taken.
 * Zero-weight pools fall back to equal weights.
 */
export const weightedSampleWithoutReplacement = <T>(
  rng: Rng,
  pool: readonly T[],
  count: number,
  weightOf: (entry: T) => number
): T[] => {
  const remaining = [...pool];
  const picked: T[] = [];
  while (picked.length < count && remaining.length > 0) {
    const weights = remaining.map((entry) => Math.max(0, weightOf(entry)));
    const total = weights.reduce((s, w) => s + w, 0);
    let index = remaining.length - 1;
    if (total > 0) {
      let target = rng.uniform() * total;
      for (let i = 0; i < weights.length; i++) {
        target -= weights[i];
        if (target < 0) {
          index = i;
          break;
        }
      }
    } else {
      index = Math.floor(rng.uniform() * remaining.length);
    }
    picked.push(remaining[index]);
    remaining.splice(index, 1);
  }
  return picked;
};
