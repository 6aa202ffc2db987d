import { describe, it, expect } from 'vitest';
import { Err, Ok, err, isErr, isOk, ok, type Result } from '../result.js';

describe('Result Pattern', () => {
  it('Ok holds the value', () => {
    const result = new Ok(42);
    expect(result._tag).toBe('Ok');
    expect(result.isOk()).toBe(true);
    expect(result.isErr()).toBe(false);
    expect(result.unwrap()).toBe(42);
    expect(result.unwrapOr(0)).toBe(42);
    expect(result.map((x) => x * 2).value).toBe(84);
  });

  it('Err holds the error', () => {
    const error = new Error('failed');
    const result = new Err(error);
    expect(result._tag).toBe('Err');
    expect(result.isOk()).toBe(false);
    expect(result.isErr()).toBe(true);
    expect(result.unwrapOr('fallback')).toBe('fallback');
    expect(result.map(() => 1)).toBe(result);
  });

  it('Err.unwrap rethrows Error values', () => {
    const error = new TypeError('bad input');
    expect(() => err(error).unwrap()).toThrow(error);
    expect(() => err('plain').unwrap()).toThrow(
      'Called unwrap on an Err value: plain'
    );
  });

  it('isOk and isErr narrow a union', () => {
    const results: Array<Result<number, string>> = [ok(1), err('no')];

    const values: number[] = [];
    const errors: string[] = [];
    for (const result of results) {
      if (isOk(result)) values.push(result.value);
      if (isErr(result)) errors.push(result.error);
    }

    expect(values).toEqual([1]);
    expect(errors).toEqual(['no']);
  });
});
