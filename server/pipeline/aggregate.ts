export const roundScore = (value: number): number => Math.round(value * 100) / 100;

/** Similarity in [0,1] to a 0–100 score with two decimals. */
export const toPercent = (similarity: number): number => roundScore(similarity * 100);

export const isRelevant = (score: number, threshold: number): boolean => score > threshold;

/** Mean of each chunk's best score; 0 when there are no chunks. */
export const aggregateScore = (chunkMaxima: readonly number[]): number => {
  if (chunkMaxima.length === 0) {
    return 0;
  }
  const total = chunkMaxima.reduce((sum, value) => sum + value, 0);
  return roundScore(total / chunkMaxima.length);
};
