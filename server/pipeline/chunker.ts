import { splitWords } from '../utils/text';

export const DEFAULT_CHUNK_WORDS = 500;

/**
 * Consecutive groups of exactly `limit` words, the last one possibly shorter.
 * Blank text yields no chunks.
 */
export const chunkWords = (text: string, limit = DEFAULT_CHUNK_WORDS): string[] => {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Chunk size must be a positive integer, got ${limit}`);
  }
  const words = splitWords(text);
  const chunks: string[] = [];
  for (let start = 0; start < words.length; start += limit) {
    chunks.push(words.slice(start, start + limit).join(' '));
  }
  return chunks;
};
