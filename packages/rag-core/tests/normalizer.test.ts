import { describe, it, expect } from 'vitest';
import { createNormalizer, normalize } from '../src/chunking/normalizer.js';

const fillers = ['um', 'uh', 'you know'];

describe('normalize', () => {
  it('strips fillers with their trailing comma', () => {
    expect(normalize('Um, so we uh started the project.', { fillers })).toBe('so we started the project.');
  });

  it('strips multi-word fillers', () => {
    expect(normalize('I think, you know, it works.', { fillers })).toBe('I think, it works.');
  });

  it('only removes whole words', () => {
    expect(normalize('the umbrella hums', { fillers })).toBe('the umbrella hums');
  });

  it('collapses whitespace and keeps paragraph breaks', () => {
    expect(normalize('Hello   world \r\n\r\n\r\n next line .')).toBe('Hello world\n\nnext line.');
  });

  it('returns empty output for empty or filler-only input', () => {
    expect(normalize('')).toBe('');
    expect(normalize('   ')).toBe('');
    expect(normalize('um uh, um', { fillers })).toBe('');
  });

  it('drops intro and outro sentences containing boilerplate phrases', () => {
    const text = 'Welcome back to the channel. Today we talk about caching. Thanks for watching!';
    expect(
      normalize(text, { boilerplatePhrases: ['welcome back to the channel', 'thanks for watching'] }),
    ).toBe('Today we talk about caching.');
  });

  it('leaves an unpunctuated transcript intact when the phrase sits outside the head and tail windows', () => {
    const words = (n: number): string => Array.from({ length: n }, () => 'content').join(' ');
    const text = `${words(150)} thanks for watching ${words(150)}`;
    expect(normalize(text, { boilerplatePhrases: ['thanks for watching'] })).toBe(text);
  });

  it('cuts an unpunctuated intro only up to the phrase', () => {
    const body = Array.from({ length: 100 }, () => 'content').join(' ');
    const text = `hey guys welcome back to the channel today we cover caching ${body}`;
    expect(normalize(text, { boilerplatePhrases: ['welcome back to the channel'] })).toBe(
      `today we cover caching ${body}`,
    );
  });

  it('cuts an unpunctuated outro from the phrase onwards', () => {
    const body = Array.from({ length: 100 }, () => 'content').join(' ');
    expect(normalize(`${body} thanks for watching see you`, { boilerplatePhrases: ['thanks for watching'] })).toBe(
      body,
    );
  });

  it('honours a custom boilerplate window', () => {
    const text = 'one two three welcome back to the channel rest of the talk';
    const phrases = ['welcome back to the channel'];
    expect(normalize(text, { boilerplatePhrases: phrases, boilerplateWindowTokens: 3 })).toBe(text);
    expect(normalize(text, { boilerplatePhrases: phrases, boilerplateWindowTokens: 8 })).toBe('rest of the talk');
  });

  it('is idempotent', () => {
    const run = createNormalizer({ fillers, boilerplatePhrases: ['subscribe'] });
    const inputs = [
      'Please subscribe. Um, , uh ; we start.\n\n\n\nSecond   part , you know ,here.',
      'um um um',
      'Plain sentence without noise.',
      ' , leading comma and\ttabs\t.',
    ];
    for (const input of inputs) {
      const once = run(input);
      expect(run(once)).toBe(once);
    }
  });

  it('never makes the text longer', () => {
    const input = 'So,   uh, this is, you know , a test .\n\n\nEnd.';
    expect(normalize(input, { fillers }).length).toBeLessThanOrEqual(input.length);
  });
});
