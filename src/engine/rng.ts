// Mulberry32: small, fast, deterministic. Returns floats in [0, 1).
export function createRng(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Fresh seed per call; the clock alone repeats within a millisecond
export function randomSeed(): number {
  return (Date.now() ^ Math.floor(Math.random() * 0x100000000)) >>> 0;
}

/**
 * Shuffles the first `count` slots of `items` in place (partial Fisher-Yates)
 * and returns them. With `count` omitted the whole array is shuffled.
 */
export function shuffle<T>(items: T[], rng: () => number, count = items.length): T[] {
  const n = Math.min(count, items.length);
  for (let i = 0; i < n; i++) {
    const j = i + Math.floor(rng() * (items.length - i));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items.slice(0, n);
}
