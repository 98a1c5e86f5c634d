import { summarize } from './statistics';

describe('summarize', () => {
  it('should return null for an empty series', () => {
    expect(summarize([])).toBeNull();
  });

  it('should leave std null for a single value', () => {
    expect(summarize([0.5])).toEqual({
      count: 1,
      mean: 0.5,
      std: null,
      min: 0.5,
      max: 0.5,
    });
  });

  it('should use the sample standard deviation', () => {
    const summary = summarize([1, 2, 3, 4]);

    expect(summary?.count).toBe(4);
    expect(summary?.mean).toBe(2.5);
    expect(summary?.std).toBeCloseTo(Math.sqrt(5 / 3), 12);
    expect(summary?.min).toBe(1);
    expect(summary?.max).toBe(4);
  });

  it('should report zero spread for identical values', () => {
    expect(summarize([0.3, 0.3, 0.3])?.std).toBe(0);
  });
});
