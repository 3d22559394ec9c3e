import { readFileSync } from 'node:fs';

const WORD_LIST_URL = new URL('../../data/words.txt', import.meta.url);

let cached: readonly string[] | null = null;

/**
 * Words used to build alias addresses, one per line in data/words.txt
 */
export function loadWordList(): readonly string[] {
  if (!cached) {
    cached = readFileSync(WORD_LIST_URL, 'utf-8')
      .split('\n')
      .map((word) => word.trim())
      .filter((word) => word.length > 0);
  }
  return cached;
}
