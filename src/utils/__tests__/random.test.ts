import { describe, it, expect } from 'vitest';
import {
  chance,
  createScriptedRandom,
  createSeededRandom,
  pick,
  randomInt,
  sample,
  uniform,
} from '../random.js';

describe('random helpers', () => {
  it('produces the same sequence for the same seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const first = Array.from({ length: 5 }, () => a.next());
    const second = Array.from({ length: 5 }, () => b.next());

    expect(first).toEqual(second);
    expect(first[0]).toBeCloseTo(1083814273 / 4294967296, 12);
    first.forEach((value) => {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    });
  });

  it('cycles through scripted draws', () => {
    const rng = createScriptedRandom([0.1, 0.9]);
    expect([rng.next(), rng.next(), rng.next()]).toEqual([0.1, 0.9, 0.1]);
  });

  it('rejects an empty script', () => {
    expect(() => createScriptedRandom([])).toThrow('at least one draw');
  });

  it('maps draws onto ranges', () => {
    expect(uniform(createScriptedRandom([0.25]), 0, 360)).toBe(90);
    expect(randomInt(createScriptedRandom([0]), -2, 3)).toBe(-2);
    expect(randomInt(createScriptedRandom([0.999]), -2, 3)).toBe(3);
    expect(chance(createScriptedRandom([0.01]), 0.02)).toBe(true);
    expect(chance(createScriptedRandom([0.02]), 0.02)).toBe(false);
  });

  it('picks by index', () => {
    expect(pick(createScriptedRandom([0.5]), ['a', 'b', 'c'])).toBe('b');
    expect(() => pick(createScriptedRandom([0.5]), [])).toThrow('empty list');
  });

  it('samples distinct items', () => {
    const items = ['a', 'b', 'c', 'd', 'e', 'f'];
    const picked = sample(createSeededRandom(3), items, 4);

    expect(picked).toHaveLength(4);
    expect(new Set(picked).size).toBe(4);
    picked.forEach((item) => expect(items).toContain(item));
    expect(sample(createSeededRandom(3), items, 10)).toHaveLength(6);
  });
});
