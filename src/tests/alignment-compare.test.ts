import { describe, it, expect } from 'vitest';
import { perFrameRate, perPhonemeRate } from '../services/alignment-compare.service';
import { ValidationError } from '../utils/errors';
import { loadTheCatSat } from './helpers';

describe('alignment comparison', () => {
  const stretched = () => {
    const target = loadTheCatSat();
    // the leading silence lasts twice as long
    target.update({ durations: [0.3] });
    return target;
  };

  it('gives the duration ratio of each phoneme', () => {
    const rates = perPhonemeRate(loadTheCatSat(), stretched());

    expect(rates).toHaveLength(10);
    expect(rates[0]).toBeCloseTo(2);
    rates.slice(1).forEach((rate) => expect(rate).toBeCloseTo(1));
  });

  it('samples the rate at evenly spaced frames of the source', () => {
    const rates = perFrameRate(loadTheCatSat(), stretched(), 10, 1);
    const expected = [2, 2, 1, 1, 1, 1, 1, 1, 1, 1];

    expect(rates).toHaveLength(expected.length);
    rates.forEach((rate, i) => expect(rate).toBeCloseTo(expected[i]));
  });

  it('takes an explicit frame count', () => {
    const rates = perFrameRate(loadTheCatSat(), stretched(), 10, 1, 3);

    expect(rates).toHaveLength(3);
    expect(rates[0]).toBeCloseTo(2);
    expect(rates[2]).toBeCloseTo(1);
  });

  it('requires the same number of phonemes', () => {
    const source = loadTheCatSat();

    expect(() => perPhonemeRate(source, source.slice(0, 2))).toThrow(ValidationError);
    expect(() => perPhonemeRate(source, source.slice(0, 2))).toThrow(
      'Alignments must have the same number of phonemes (10 vs 3)'
    );
  });
});
