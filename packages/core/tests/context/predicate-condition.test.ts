import { describe, it, expect, vi } from 'vitest';
import { PredicateCondition } from '../../src/context/index.js';

const even = PredicateCondition.of((n: number) => n % 2 === 0);
const positive = PredicateCondition.of((n: number) => n > 0);

describe('PredicateCondition', () => {
  it('should test a single item', () => {
    expect(even.test(4)).toBe(true);
    expect(even.test(3)).toBe(false);
  });

  it('should combine with and', () => {
    expect(even.and(positive).filter([-2, -1, 0, 1, 2, 3, 4])).toEqual([2, 4]);
  });

  it('should combine with or', () => {
    expect(even.or(positive).filter([-2, -1, 0, 1])).toEqual([-2, 0, 1]);
  });

  it('should negate', () => {
    expect(even.not().filter([1, 2, 3])).toEqual([1, 3]);
  });

  it('should short-circuit and', () => {
    const spy = vi.fn((n: number) => n > 0);
    const condition = PredicateCondition.of((n: number) => n > 10).and(PredicateCondition.of(spy));
    condition.test(5);
    expect(spy).not.toHaveBeenCalled();
  });

  it('should leave operands unchanged', () => {
    even.and(positive).not();
    expect(even.test(-2)).toBe(true);
    expect(positive.test(-2)).toBe(false);
  });

  it('should build constants', () => {
    expect(PredicateCondition.constant(true).test()).toBe(true);
    expect(PredicateCondition.constant(false).not().test()).toBe(true);
    expect(PredicateCondition.constant<string>(true).filter(['x', 'y'])).toEqual(['x', 'y']);
  });

  it('should accept any iterable', () => {
    expect(positive.filter(new Set([-1, 5, 7]))).toEqual([5, 7]);
  });
});
