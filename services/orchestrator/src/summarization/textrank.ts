import { setImmediate as nextTurn } from "node:timers/promises";

const DAMPING = 0.85;
const MAX_ITERATIONS = 100;
const TOLERANCE = 1e-6;
const ROWS_PER_TURN = 64;

/** Adjacency lists: `neighbors[i][k]` is linked to `i` with `weights[i][k]`. */
export interface SentenceGraph {
  readonly neighbors: readonly (readonly number[])[];
  readonly weights: readonly (readonly number[])[];
}

export function similarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let overlap = 0;
  for (const token of a) {
    if (b.has(token)) {
      overlap += 1;
    }
  }
  if (overlap === 0) {
    return 0;
  }
  const norm = Math.log(a.size) + Math.log(b.size);
  return norm > 0 ? overlap / norm : overlap;
}

async function checkpoint(signal?: AbortSignal): Promise<void> {
  await nextTurn();
  signal?.throwIfAborted();
}

/**
 * Links only sentences that share a token, found through an inverted index.
 * Yields to the event loop between row batches so a deadline can fire.
 */
export async function buildGraph(
  tokens: ReadonlyArray<ReadonlySet<string>>,
  signal?: AbortSignal,
): Promise<SentenceGraph> {
  const postings = new Map<string, number[]>();
  tokens.forEach((set, index) => {
    for (const token of set) {
      const list = postings.get(token);
      if (list) {
        list.push(index);
      } else {
        postings.set(token, [index]);
      }
    }
  });

  const neighbors: number[][] = tokens.map(() => []);
  const weights: number[][] = tokens.map(() => []);
  for (let i = 0; i < tokens.length; i += 1) {
    if (i > 0 && i % ROWS_PER_TURN === 0) {
      await checkpoint(signal);
    }
    const candidates = new Set<number>();
    for (const token of tokens[i]) {
      for (const j of postings.get(token) ?? []) {
        if (j > i) {
          candidates.add(j);
        }
      }
    }
    for (const j of candidates) {
      const weight = similarity(tokens[i], tokens[j]);
      if (weight > 0) {
        neighbors[i].push(j);
        weights[i].push(weight);
        neighbors[j].push(i);
        weights[j].push(weight);
      }
    }
  }
  return { neighbors, weights };
}

/**
 * Weighted PageRank over the sentence similarity graph. Nodes with no
 * outgoing weight spread their score evenly across the graph. Checks
 * `signal` between iterations.
 */
export async function rankSentences(
  tokens: ReadonlyArray<ReadonlySet<string>>,
  signal?: AbortSignal,
): Promise<number[]> {
  const n = tokens.length;
  if (n === 0) {
    return [];
  }

  const { neighbors, weights } = await buildGraph(tokens, signal);
  const outgoing = weights.map((row) => row.reduce((sum, weight) => sum + weight, 0));

  let scores = new Array<number>(n).fill(1 / n);
  for (let iteration = 0; iteration < MAX_ITERATIONS; iteration += 1) {
    await checkpoint(signal);

    let dangling = 0;
    for (let j = 0; j < n; j += 1) {
      if (outgoing[j] === 0) {
        dangling += scores[j];
      }
    }

    const next = new Array<number>(n).fill((1 - DAMPING) / n + (DAMPING * dangling) / n);
    for (let j = 0; j < n; j += 1) {
      if (outgoing[j] === 0) {
        continue;
      }
      const share = (DAMPING * scores[j]) / outgoing[j];
      neighbors[j].forEach((i, k) => {
        next[i] += weights[j][k] * share;
      });
    }

    const delta = next.reduce((max, value, index) => Math.max(max, Math.abs(value - scores[index])), 0);
    scores = next;
    if (delta < TOLERANCE) {
      break;
    }
  }
  return scores;
}

/** Indices of the `count` best sentences, returned in original order. */
export function selectTop(scores: readonly number[], count: number): number[] {
  return scores
    .map((score, index) => ({ score, index }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, count)
    .map((entry) => entry.index)
    .sort((a, b) => a - b);
}
