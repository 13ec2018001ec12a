import { describe, expect, it } from 'vitest';

import { SeededRandom } from '../../world';

describe('SeededRandom', () => {
  it('repeats the sequence for the same seed', () => {
    const a = new SeededRandom(1234);
    const b = new SeededRandom(1234);
    const first = [a.next(), a.next(), a.next()];
    expect([b.next(), b.next(), b.next()]).toEqual(first);
  });

  it('keeps values in range', () => {
    const rng = new SeededRandom(5);
    for (let i = 0; i < 200; i++) {
      const value = rng.nextInt(3, 7);
      expect(value).toBeGreaterThanOrEqual(3);
      expect(value).toBeLessThanOrEqual(7);
      expect(Number.isInteger(value)).toBe(true);
    }
  });

  it('picks nothing from an empty list', () => {
    expect(new SeededRandom(1).pick([])).toBeUndefined();
    expect(new SeededRandom(1).pick(['only'])).toBe('only');
  });
});
