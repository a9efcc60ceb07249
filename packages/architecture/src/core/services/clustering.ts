/**
 * Deterministic clustering primitives used by the boundary detector.
 */

/** Undirected weighted adjacency; inner map insertion order is stable. */
export type WeightedAdjacency = ReadonlyMap<string, ReadonlyMap<string, number>>;

export function addUndirected(adjacency: Map<string, Map<string, number>>, a: string, b: string, weight: number): void {
  if (a === b) return;
  for (const [from, to] of [
    [a, b],
    [b, a],
  ] as const) {
    const row = adjacency.get(from) ?? new Map<string, number>();
    row.set(to, (row.get(to) ?? 0) + weight);
    adjacency.set(from, row);
  }
}

/**
 * Weighted label propagation. Every node starts with its own id as label;
 * nodes update in id order, in place, taking the label with the largest
 * neighbour weight (ties to the smallest label). Stops when a sweep changes
 * nothing or after `maxIterations` sweeps.
 */
export function propagateLabels(
  ids: readonly string[],
  adjacency: WeightedAdjacency,
  maxIterations: number
): Map<string, string> {
  const order = [...ids].sort();
  const labels = new Map(order.map((id) => [id, id]));

  for (let sweep = 0; sweep < maxIterations; sweep++) {
    let changed = false;
    for (const id of order) {
      const neighbours = adjacency.get(id);
      if (!neighbours || neighbours.size === 0) continue;

      const scores = new Map<string, number>();
      for (const [neighbour, weight] of neighbours) {
        const label = labels.get(neighbour);
        if (label === undefined) continue;
        scores.set(label, (scores.get(label) ?? 0) + weight);
      }

      let best: string | undefined;
      let bestScore = -Infinity;
      for (const [label, score] of scores) {
        if (score > bestScore || (score === bestScore && best !== undefined && label < best)) {
          best = label;
          bestScore = score;
        }
      }
      if (best !== undefined && best !== labels.get(id)) {
        labels.set(id, best);
        changed = true;
      }
    }
    if (!changed) break;
  }
  return labels;
}

export interface Partition<T> {
  chunks: T[][];
  rest: T[];
}

/**
 * Cut an ordered list into contiguous chunks within [minSize, maxSize].
 * Balanced chunks when ⌈n/maxSize⌉ of them all reach minSize; otherwise
 * full chunks of maxSize, with the tail left over. (The tail is never
 * larger than the balanced chunk size, so it cannot reach minSize there.)
 */
export function partitionOrdered<T>(items: readonly T[], minSize: number, maxSize: number): Partition<T> {
  const n = items.length;
  if (n < minSize) return { chunks: [], rest: [...items] };
  if (n <= maxSize) return { chunks: [[...items]], rest: [] };

  const k = Math.ceil(n / maxSize);
  const base = Math.floor(n / k);
  if (base >= minSize) {
    const chunks: T[][] = [];
    const larger = n % k;
    let start = 0;
    for (let i = 0; i < k; i++) {
      const size = i < larger ? base + 1 : base;
      chunks.push(items.slice(start, start + size));
      start += size;
    }
    return { chunks, rest: [] };
  }

  const full = Math.floor(n / maxSize);
  const chunks: T[][] = [];
  for (let i = 0; i < full; i++) chunks.push(items.slice(i * maxSize, (i + 1) * maxSize));
  return { chunks, rest: items.slice(full * maxSize) };
}
