/** Uniform source in [0, 1), same contract as Math.random. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/** Seeded pseudo-random using a string hash and an LCG step. */
export function createSeededRandom(seed: string): RandomSource {
  let h = 0;
  for (let i = 0; i < seed.length; i += 1) {
    h = ((h << 5) - h + seed.charCodeAt(i)) | 0;
  }
  return () => {
    h = (h * 1664525 + 1013904223) | 0;
    return (h >>> 0) / 4294967296;
  };
}

/** Integer drawn uniformly from [min, max], both ends inclusive. */
export function randomIntInclusive(random: RandomSource, min: number, max: number): number {
  const span = max - min + 1;
  return min + Math.min(span - 1, Math.floor(random() * span));
}

/** Standard normal draw via Box-Muller. */
export function randomGaussian(random: RandomSource): number {
  let u = 0;
  while (u === 0) {
    u = random();
  }
  const v = random();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}
