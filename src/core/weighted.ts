export type WeightedCandidate<T> = {
  item: T;
  weight: number;
};

/** Returns a value in [0, total). */
export type Draw = (total: number) => number;

export const uniformDraw: Draw = (total) => Math.random() * total;

/**
 * Weighted random choice over cumulative weights.
 *
 * Candidate i owns the half-open range [cum(i-1), cum(i)) and wins when the
 * draw lands inside it, so a fixed draw always maps to the same candidate.
 * Returns null for an empty list or when no weight is positive.
 */
export function selectByWeight<T>(
  candidates: readonly WeightedCandidate<T>[],
  draw: Draw = uniformDraw
): T | null {
  if (candidates.length === 0) return null;

  const total = candidates.reduce((sum, c) => sum + Math.max(0, c.weight), 0);
  if (total <= 0) return null;

  const r = draw(total);

  let cumulative = 0;
  let lastPositive: T | null = null;
  for (const c of candidates) {
    if (c.weight <= 0) continue;
    cumulative += c.weight;
    lastPositive = c.item;
    if (r >= 0 && r < cumulative) return c.item;
  }

  // float drift or an out-of-range injected draw
  return lastPositive;
}
