import { describe, it, expect } from 'vitest';
import { codePointLength, previewText, sliceCodePoints, toCodePoints } from '../src/textIndex.js';

describe('code-point indexing', () => {
  it('counts an astral-plane character as one position', () => {
    expect('a😀b'.length).toBe(4);
    expect(codePointLength('a😀b')).toBe(3);
  });

  it('slices by code point', () => {
    const codePoints = toCodePoints('Hi 😀 Bob!');

    expect(sliceCodePoints(codePoints, 3, 4)).toBe('😀');
    expect(sliceCodePoints(codePoints, 5, 8)).toBe('Bob');
    expect(sliceCodePoints(codePoints, 5)).toBe('Bob!');
  });
});

describe('previewText', () => {
  it('returns short text unchanged', () => {
    expect(previewText('short', 100)).toBe('short');
  });

  it('returns text of exactly the limit unchanged', () => {
    const text = 'x'.repeat(100);
    expect(previewText(text, 100)).toBe(text);
  });

  it('cuts long text and appends an ellipsis', () => {
    expect(previewText('abcdefgh', 5)).toBe('abcde...');
  });

  it('does not split a surrogate pair', () => {
    expect(previewText('😀😀😀', 2)).toBe('😀😀...');
  });
});
