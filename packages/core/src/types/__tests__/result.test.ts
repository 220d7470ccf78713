import { describe, it, expect } from 'vitest';

import { Err, Ok, err, isErr, isOk, ok, type Result } from '../result.js';

function half(n: number): Result<number, string> {
  return n % 2 === 0 ? ok(n / 2) : err(`${n} is odd`);
}

describe('Result', () => {
  it('wraps values', () => {
    const result = half(4);
    expect(result).toBeInstanceOf(Ok);
    expect(isOk(result)).toBe(true);
    expect(isErr(result)).toBe(false);
    if (isOk(result)) {
      expect(result.value).toBe(2);
    }
  });

  it('wraps errors', () => {
    const result = half(3);
    expect(result).toBeInstanceOf(Err);
    expect(isOk(result)).toBe(false);
    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error).toBe('3 is odd');
    }
  });
});
