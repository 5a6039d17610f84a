/**
 * Random Source Tests
 */

import { describe, it, expect } from 'vitest';
import { createSeededRandomSource, cryptoRandomSource, type RandomSource } from '../../../src/dice/random.js';

function draw(source: RandomSource, count: number, min: number, max: number): number[] {
  return Array.from({ length: count }, () => source.nextInt(min, max));
}

describe('cryptoRandomSource', () => {
  it('should stay within inclusive bounds', () => {
    const values = draw(cryptoRandomSource, 500, 1, 6);
    expect(values.every((value) => Number.isInteger(value) && value >= 1 && value <= 6)).toBe(true);
  });

  it('should return the only value of a single-value range', () => {
    expect(cryptoRandomSource.nextInt(3, 3)).toBe(3);
  });
});

describe('createSeededRandomSource', () => {
  it('should repeat a sequence for the same seed', () => {
    const first = draw(createSeededRandomSource('test-seed'), 20, 1, 20);
    const second = draw(createSeededRandomSource('test-seed'), 20, 1, 20);
    expect(first).toEqual(second);
  });

  it('should stay within inclusive bounds', () => {
    const values = draw(createSeededRandomSource('bounds'), 500, 1, 6);
    expect(values.every((value) => Number.isInteger(value) && value >= 1 && value <= 6)).toBe(true);
  });

  it('should diverge for different seeds', () => {
    const first = draw(createSeededRandomSource('seed-a'), 20, 1, 1000);
    const second = draw(createSeededRandomSource('seed-b'), 20, 1, 1000);
    expect(first).not.toEqual(second);
  });
});
