/**
 * FILE PURPOSE: Transcript normalizer — filler removal, whitespace cleanup, intro/outro trim
 *
 * WHY: Auto-generated transcripts are full of "um"/"uh"/"you know" and channel
 *      boilerplate that dilute embeddings and waste context tokens.
 * HOW: One cleanup pass, repeated until the text stops changing, so
 *      normalize(normalize(x)) === normalize(x). Every step only removes or
 *      replaces characters one-for-one, so the output is never longer.
 */

import { tokenize } from '../tokenizer.js';

export interface NormalizerOptions {
  fillers?: Iterable<string>;
  /** Phrases marking channel intros and outros; matched as whole words. */
  boilerplatePhrases?: readonly string[];
  /** Only the first and last this-many tokens are searched for boilerplate. Default 40. */
  boilerplateWindowTokens?: number;
}

export type Normalizer = (text: string) => string;

/** Channel intro/outro phrases; matched case-insensitively. */
export const DEFAULT_BOILERPLATE_PHRASES: readonly string[] = [
  'like and subscribe',
  'hit the bell',
  'subscribe to the channel',
  'thanks for watching',
  'see you in the next video',
  'welcome back to the channel',
];

export const DEFAULT_BOILERPLATE_WINDOW_TOKENS = 40;

const SENTENCE_END_RE = /[.!?]["')\]]*(?=\s|$)|\n/g;
const WORD_BEFORE = "(?<![\\p{L}\\p{N}'’-])";
const WORD_AFTER = "(?![\\p{L}\\p{N}'’-])";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word alternation over `phrases`, longest first so "you know" wins over "you". */
function phraseAlternation(phrases: Iterable<string>): string | null {
  const alternatives = [...new Set([...phrases].map((f) => f.trim().toLowerCase()).filter(Boolean))]
    .sort((a, b) => b.length - a.length)
    .map((f) => f.split(/\s+/).map(escapeRegExp).join('\\s+'));
  if (alternatives.length === 0) return null;
  return `${WORD_BEFORE}(?:${alternatives.join('|')})${WORD_AFTER}`;
}

function buildFillerPattern(fillers: Iterable<string>): RegExp | null {
  const source = phraseAlternation(fillers);
  return source ? new RegExp(`${source}[,;]?`, 'giu') : null;
}

function buildBoilerplatePattern(phrases: Iterable<string>): RegExp | null {
  const source = phraseAlternation(phrases);
  return source ? new RegExp(source, 'giu') : null;
}

function cleanWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[^\S\n]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/ +([,.;:!?])/g, '$1')
    .replace(/([,;])(?:\s*[,;])+/g, '$1')
    .replace(/(^|\n)[,;] ?/g, '$1')
    .trim();
}

/** End of the sentence running on from `from`, if it closes by `limit`; else `from`. */
function extendToSentenceEnd(text: string, from: number, limit: number): number {
  SENTENCE_END_RE.lastIndex = from;
  const match = SENTENCE_END_RE.exec(text);
  if (!match) return from;
  const end = match.index + match[0].length;
  return end <= limit ? end : from;
}

/** Start of the sentence containing `to`, if it opens at or after `floor`; else `to`. */
function extendToSentenceStart(text: string, to: number, floor: number): number {
  let cut = to;
  SENTENCE_END_RE.lastIndex = floor;
  for (let match = SENTENCE_END_RE.exec(text); match; match = SENTENCE_END_RE.exec(text)) {
    const end = match.index + match[0].length;
    if (end > to) break;
    cut = end;
  }
  return cut;
}

/**
 * Cut an intro ending with the first phrase found in the head window, and an
 * outro starting with the last phrase found in the tail window. A cut widens to
 * the enclosing sentence only when that sentence stays inside the window, so
 * an unpunctuated transcript loses at most a window of text at each end per pass.
 */
function trimBoilerplate(text: string, pattern: RegExp | null, windowTokens: number): string {
  if (!pattern || text.length === 0) return text;
  const tokens = tokenize(text);
  const headLimit = tokens[Math.min(windowTokens, tokens.length) - 1]?.end ?? 0;
  const tailLimit = tokens[Math.max(0, tokens.length - windowTokens)]?.start ?? text.length;
  const matches = [...text.matchAll(pattern)].map((m) => {
    const start = m.index ?? 0;
    return { start, end: start + m[0].length };
  });

  let headCut = 0;
  const intro = matches.find((m) => m.end <= headLimit);
  if (intro) headCut = extendToSentenceEnd(text, intro.end, headLimit);

  let tailCut = text.length;
  const outro = matches.filter((m) => m.start >= Math.max(tailLimit, headCut)).pop();
  if (outro) tailCut = extendToSentenceStart(text, outro.start, Math.max(tailLimit, headCut));

  return text.slice(headCut, tailCut);
}

export function createNormalizer(options: NormalizerOptions = {}): Normalizer {
  const fillerPattern = buildFillerPattern(options.fillers ?? []);
  const boilerplatePattern = buildBoilerplatePattern(options.boilerplatePhrases ?? []);
  const windowTokens = options.boilerplateWindowTokens ?? DEFAULT_BOILERPLATE_WINDOW_TOKENS;

  const pass = (text: string): string => {
    let result = fillerPattern ? text.replace(fillerPattern, '') : text;
    result = cleanWhitespace(result);
    result = trimBoilerplate(result, boilerplatePattern, windowTokens);
    return cleanWhitespace(result);
  };

  return (text: string): string => {
    if (!text) return '';
    let current = text;
    for (;;) {
      const next = pass(current);
      if (next === current) return next;
      current = next;
    }
  };
}

export function normalize(text: string, options: NormalizerOptions = {}): string {
  return createNormalizer(options)(text);
}
