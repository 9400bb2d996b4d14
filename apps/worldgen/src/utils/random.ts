export type Rng = () => number; // uniform in [0, 1)

export function createRng(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function randRange(rng: Rng, a: number, b: number): number {
  return a + (b - a) * rng();
}

export const resolveRng = (seed?: number): Rng =>
  seed === undefined ? Math.random : createRng(seed);
