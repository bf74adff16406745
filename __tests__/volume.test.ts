import { MAX_VOLUME_DB, MIN_VOLUME_DB, volumeDecibelsToFraction, volumeFractionToDecibels } from '../src/core/VolumeCodec';
import { OutOfRangeError } from '../src/utils/errors';

describe('VolumeCodec', () => {
  test('fraction end points map to the dB range', () => {
    expect(volumeFractionToDecibels(0)).toBe(-95.5);
    expect(volumeFractionToDecibels(1)).toBe(0);
    expect(volumeFractionToDecibels(0.5)).toBe(-47.75);
  });

  test('dB end points map to 0 and 1', () => {
    expect(volumeDecibelsToFraction(MIN_VOLUME_DB)).toBe(0);
    expect(volumeDecibelsToFraction(MAX_VOLUME_DB)).toBe(1);
    expect(volumeDecibelsToFraction(-47.75)).toBe(0.5);
  });

  test('conversions are inverses', () => {
    for (const f of [0, 0.1, 0.25, 0.33, 0.7, 0.999, 1]) {
      expect(volumeDecibelsToFraction(volumeFractionToDecibels(f))).toBeCloseTo(f, 10);
    }
  });

  test('fractions outside [0, 1] are rejected', () => {
    expect(() => volumeFractionToDecibels(-0.1)).toThrow(OutOfRangeError);
    expect(() => volumeFractionToDecibels(1.1)).toThrow(OutOfRangeError);
    expect(() => volumeFractionToDecibels(Number.NaN)).toThrow(OutOfRangeError);
  });

  test('decibels outside the range are rejected', () => {
    expect(() => volumeDecibelsToFraction(0.5)).toThrow(OutOfRangeError);
    expect(() => volumeDecibelsToFraction(-96)).toThrow(OutOfRangeError);
  });

  test('range error carries the offending value', () => {
    try {
      volumeFractionToDecibels(1.1);
      throw new Error('expected OutOfRangeError');
    } catch (err) {
      expect(err).toBeInstanceOf(OutOfRangeError);
      if (err instanceof OutOfRangeError) {
        expect(err.code).toBe('OUT_OF_RANGE');
        expect(err.value).toBe(1.1);
        expect(err.message).toBe('Volume fraction must be between 0 and 1, got 1.1');
      }
    }
  });
});
