import { describe, it, expect } from 'vitest';

import {
  ANSI,
  colorize,
  shorten,
  shouldUseColors,
  stripAnsi,
  wrapText,
} from '../terminal.js';

describe('colorize', () => {
  it('wraps text in the given codes when color is enabled', () => {
    expect(colorize('ok', true, ANSI.green)).toBe('\u001B[32mok\u001B[0m');
    expect(colorize('ok', true, ANSI.bold, ANSI.red)).toBe(
      '\u001B[1m\u001B[31mok\u001B[0m'
    );
  });

  it('returns plain text when color is disabled', () => {
    expect(colorize('ok', false, ANSI.green)).toBe('ok');
  });

  it('round-trips through stripAnsi', () => {
    expect(stripAnsi(colorize('hello', true, ANSI.cyan))).toBe('hello');
  });
});

describe('shouldUseColors', () => {
  it('lets NO_COLOR override everything', () => {
    expect(shouldUseColors(true, { NO_COLOR: '1', FORCE_COLOR: '1' })).toBe(
      false
    );
  });

  it('lets FORCE_COLOR override the preference', () => {
    expect(shouldUseColors(false, { FORCE_COLOR: '1' })).toBe(true);
  });

  it('falls back to the explicit preference', () => {
    expect(shouldUseColors(false, {})).toBe(false);
    expect(shouldUseColors(true, { NO_COLOR: '0' })).toBe(true);
  });
});

describe('wrapText', () => {
  it('breaks on word boundaries', () => {
    expect(wrapText('one two three four', 9)).toBe('one two\nthree\nfour');
  });

  it('indents every line', () => {
    expect(wrapText('alpha beta gamma', 12, '  ')).toBe(
      '  alpha beta\n  gamma'
    );
  });

  it('returns an empty string for empty input', () => {
    expect(wrapText('', 10)).toBe('');
  });
});

describe('shorten', () => {
  it('collapses whitespace', () => {
    expect(shorten('a   b\n c', 80)).toBe('a b c');
  });

  it('truncates whole words and appends a placeholder', () => {
    expect(shorten('Hello world, how are you', 15)).toBe('Hello world,...');
  });

  it('returns only the placeholder when the first word does not fit', () => {
    expect(shorten('Supercalifragilistic', 5)).toBe('...');
  });
});
