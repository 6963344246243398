/**
 * Keyword scoring for the hybrid blend.
 *
 * BM25 is computed over the merged candidate set only: the backends do
 * the recall, this re-weights what they returned. Statistics (document
 * frequency, average length) therefore come from the candidates.
 */

/**
 * BM25 parameters. Defaults are the usual k1 = 1.2, b = 0.75.
 */
export interface BM25Config {
  /** Term frequency saturation */
  k1?: number;
  /** Document length normalization, 0 disables it */
  b?: number;
}

export interface HybridWeights {
  bm25: number;
  vector: number;
}

const DEFAULT_BM25: Required<BM25Config> = { k1: 1.2, b: 0.75 };

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((token) => token.length > 0);
}

/**
 * BM25 score of every document against the query, in input order.
 */
export function bm25Scores(query: string, documents: string[], config: BM25Config = {}): number[] {
  const { k1, b } = { ...DEFAULT_BM25, ...config };
  const terms = [...new Set(tokenize(query))];
  const docs = documents.map(tokenize);
  const total = docs.length;
  if (total === 0 || terms.length === 0) {
    return documents.map(() => 0);
  }

  const avgLength = docs.reduce((sum, doc) => sum + doc.length, 0) / total || 1;

  const documentFrequency = new Map<string, number>();
  const termCounts = docs.map((doc) => {
    const counts = new Map<string, number>();
    for (const token of doc) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    for (const token of counts.keys()) {
      documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
    }
    return counts;
  });

  return docs.map((doc, i) => {
    const counts = termCounts[i];
    let score = 0;
    for (const term of terms) {
      const tf = counts?.get(term) ?? 0;
      if (tf === 0) continue;
      const df = documentFrequency.get(term) ?? 0;
      const idf = Math.log(1 + (total - df + 0.5) / (df + 0.5));
      score += (idf * tf * (k1 + 1)) / (tf + k1 * (1 - b + (b * doc.length) / avgLength));
    }
    return score;
  });
}

/**
 * Scale scores into [0, 1]. A flat list maps to 1 when positive, else 0.
 */
export function minMaxNormalize(scores: number[]): number[] {
  if (scores.length === 0) return [];
  const min = Math.min(...scores);
  const max = Math.max(...scores);
  const range = max - min;
  if (range < 1e-9) {
    return scores.map(() => (max > 0 ? 1 : 0));
  }
  return scores.map((score) => (score - min) / range);
}

/**
 * Re-score candidates as `vector * vectorScore + bm25 * normalizedBm25`
 * and sort best first. With a zero bm25 weight the input order and scores
 * are kept.
 */
export function blendScores<T extends { content: string; score: number }>(
  query: string,
  candidates: T[],
  weights: HybridWeights,
  config?: BM25Config
): T[] {
  if (weights.bm25 <= 0 || candidates.length === 0) {
    return candidates;
  }

  const keyword = minMaxNormalize(
    bm25Scores(
      query,
      candidates.map((candidate) => candidate.content),
      config
    )
  );

  return candidates
    .map((candidate, i) => ({
      ...candidate,
      score: weights.vector * candidate.score + weights.bm25 * (keyword[i] ?? 0),
    }))
    .sort((a, b) => b.score - a.score);
}
