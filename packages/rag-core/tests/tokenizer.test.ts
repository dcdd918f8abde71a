import { describe, it, expect } from 'vitest';
import { countTokens, tokenize, tokenOffset } from '../src/tokenizer.js';

describe('tokenize', () => {
  it('returns whitespace-delimited tokens with character offsets', () => {
    expect(tokenize('  hello world\nfoo ')).toEqual([
      { text: 'hello', start: 2, end: 7 },
      { text: 'world', start: 8, end: 13 },
      { text: 'foo', start: 14, end: 17 },
    ]);
  });

  it('keeps punctuation attached to its word', () => {
    expect(tokenize('Wait, what?').map((t) => t.text)).toEqual(['Wait,', 'what?']);
  });
});

describe('countTokens', () => {
  it('counts runs of non-whitespace', () => {
    expect(countTokens('a  b\n\nc')).toBe(3);
  });

  it('is zero for empty or blank text', () => {
    expect(countTokens('')).toBe(0);
    expect(countTokens(' \n\t ')).toBe(0);
  });
});

describe('tokenOffset', () => {
  it('falls back to the text length past the last token', () => {
    const text = 'one two';
    const tokens = tokenize(text);
    expect(tokenOffset(tokens, 1, text.length)).toBe(4);
    expect(tokenOffset(tokens, 2, text.length)).toBe(7);
  });
});
