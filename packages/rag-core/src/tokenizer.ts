/**
 * FILE PURPOSE: The one tokenizer used for chunk sizes, overlap and context budgets
 *
 * WHY: Mixing token-counting schemes between stages breaks the size invariants.
 *      Every stage counts with this module.
 * HOW: A token is a maximal run of non-whitespace characters. Offsets are
 *      character positions in the input string.
 */

export interface Token {
  text: string;
  start: number;
  end: number;
}

const TOKEN_RE = /\S+/g;

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(TOKEN_RE)) {
    const start = match.index ?? 0;
    tokens.push({ text: match[0], start, end: start + match[0].length });
  }
  return tokens;
}

export function countTokens(text: string): number {
  let count = 0;
  for (const _ of text.matchAll(TOKEN_RE)) count++;
  return count;
}

/** Character offset where token `index` begins; `text.length` past the last token. */
export function tokenOffset(tokens: Token[], index: number, textLength: number): number {
  return tokens[index]?.start ?? textLength;
}
