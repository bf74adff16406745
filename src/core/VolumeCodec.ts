import { OutOfRangeError } from '../utils/errors';

/** Quietest level the amplifier accepts (dB) */
export const MIN_VOLUME_DB = -95.5;
/** Loudest level the amplifier accepts (dB) */
export const MAX_VOLUME_DB = 0;
/** Volume resolution of the amplifier (dB) */
export const VOLUME_STEP_DB = 0.5;

/**
 * Convert a volume given as a fraction of the full range to decibels
 *
 * @example
 * volumeFractionToDecibels(0);   // -95.5
 * volumeFractionToDecibels(0.5); // -47.75
 * volumeFractionToDecibels(1);   // 0
 *
 * @throws OutOfRangeError when the fraction is not within [0, 1]
 */
export function volumeFractionToDecibels(fraction: number): number {
  if (!(fraction >= 0 && fraction <= 1)) {
    throw new OutOfRangeError(fraction, 0, 1, 'Volume fraction');
  }
  return MIN_VOLUME_DB + fraction * (MAX_VOLUME_DB - MIN_VOLUME_DB);
}

/**
 * Convert a volume in decibels to a fraction between 0 and 1
 *
 * @throws OutOfRangeError when the value is not within [MIN_VOLUME_DB, MAX_VOLUME_DB]
 */
export function volumeDecibelsToFraction(decibels: number): number {
  if (!(decibels >= MIN_VOLUME_DB && decibels <= MAX_VOLUME_DB)) {
    throw new OutOfRangeError(decibels, MIN_VOLUME_DB, MAX_VOLUME_DB, 'Volume (dB)');
  }
  return (decibels - MIN_VOLUME_DB) / (MAX_VOLUME_DB - MIN_VOLUME_DB);
}
