/**
 * FILE PURPOSE: Derive filler candidates from a sample of transcripts
 *
 * WHY: Channels have their own verbal tics. Corpus frequency surfaces them; a
 *      human then reviews the candidates before anything reaches data/fillers.txt.
 * HOW: Lowercase word counts → top fraction by frequency, cut at a minimum
 *      relative frequency → merged with the base spoken fillers → minus words
 *      that carry content.
 */

export const DEFAULT_SPOKEN_FILLERS: readonly string[] = [
  'okay', 'like', 'gonna', 'yeah', 'uh', 'um', 'so', 'well', 'actually', 'literally',
  'basically', 'totally', 'kinda', 'sorta', 'alright', 'yep', 'nope', 'hmm', 'ah', 'oh',
  'wow', 'hey', 'right', 'sure', 'absolutely', 'exactly', 'definitely',
];

export const DEFAULT_CONTENT_WORDS: readonly string[] = [
  'business', 'company', 'people', 'work', 'time', 'money', 'market', 'sales', 'marketing',
  'product', 'customer', 'team', 'growth', 'strategy', 'system', 'process', 'value',
  'success', 'goal',
];

export interface StopwordOptions {
  baseFillers?: Iterable<string>;
  /** Words never emitted, however frequent. */
  keep?: Iterable<string>;
  /** Share of distinct terms, most frequent first, considered as candidates. */
  topFraction?: number;
  /** Minimum count / total tokens for a candidate. */
  minFrequency?: number;
}

export interface StopwordReport {
  stopwords: string[];
  /** Corpus-derived entries not already among the base fillers. */
  corpusAdditions: string[];
  totalTokens: number;
}

export function countTerms(samples: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const sample of samples) {
    for (const term of sample.toLowerCase().match(/[\p{L}\p{N}_']+/gu) ?? []) {
      const word = term.replace(/^'+|'+$/g, '');
      if (word.length < 2 || /^\d+$/.test(word)) continue;
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }
  return counts;
}

export function generateStopwords(samples: readonly string[], options: StopwordOptions = {}): StopwordReport {
  const {
    baseFillers = DEFAULT_SPOKEN_FILLERS,
    keep = DEFAULT_CONTENT_WORDS,
    topFraction = 0.1,
    minFrequency = 0.001,
  } = options;

  const counts = countTerms(samples);
  let totalTokens = 0;
  for (const count of counts.values()) totalTokens += count;

  // Most frequent first; equal counts alphabetically so output is reproducible
  const ranked = [...counts].sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : 1));
  const candidates = new Set<string>();
  for (const [term, count] of ranked.slice(0, Math.floor(ranked.length * topFraction))) {
    if (count / totalTokens < minFrequency) break;
    candidates.add(term);
  }

  const base = new Set([...baseFillers].map((f) => f.toLowerCase()));
  const excluded = new Set([...keep].map((k) => k.toLowerCase()));
  const merged = new Set([...base, ...candidates]);
  for (const word of excluded) merged.delete(word);

  const stopwords = [...merged].sort();
  return {
    stopwords,
    corpusAdditions: stopwords.filter((w) => !base.has(w)),
    totalTokens,
  };
}
