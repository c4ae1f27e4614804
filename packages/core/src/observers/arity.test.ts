import { describe, it, expect } from 'vitest';
import { InvalidObserverError } from '../errors/observa-error.js';
import { resolveArity } from './arity.js';

describe('resolveArity', () => {
  it('should read the declared parameter count', () => {
    expect(resolveArity(() => undefined)).toBe(0);
    expect(resolveArity((_next: number) => undefined)).toBe(1);
    expect(resolveArity((_previous: number, _next: number) => undefined)).toBe(2);
  });

  it('should not count rest or defaulted parameters', () => {
    expect(resolveArity((...values: number[]) => values)).toBe(0);
    expect(resolveArity((next: number, previous = 0) => next + previous)).toBe(1);
  });

  it('should reject more than two parameters', () => {
    function onThree(_a: number, _b: number, _c: number): void {}

    expect(() => resolveArity(onThree)).toThrow(InvalidObserverError);
    expect(() => resolveArity(onThree)).toThrow('Observer must accept zero, one or two parameters, "onThree" declares 3');
  });

  it('should reject non-functions', () => {
    expect(() => resolveArity('not a function')).toThrow('Observer must be a function, got string');
  });
});
