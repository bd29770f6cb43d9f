/**
 * Deterministic random sources for `Card.random` and friends.
 *
 * Seeds can be derived from any label (a hand id, a file name) with a 32-bit
 * FNV-1a hash so a random draw can be reproduced later.
 */
export function seedFromLabel(label: string): number {
  let hash = 0x811c9dc5; // FNV offset basis

  for (let i = 0; i < label.length; i += 1) {
    hash ^= label.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }

  return hash >>> 0;
}

export function validateSeed(seed: number): boolean {
  return Number.isFinite(seed) && seed >= 0 && seed <= 0xffffffff;
}

/** xorshift32 source returning floats in [0, 1). */
export function createSeededRng(seed: number): () => number {
  let state = seed >>> 0;
  if (state === 0) state = 0x9e3779b9;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}
