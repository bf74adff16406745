// Builders for the wire strings sent to the amplifier (power, mute, volume, input)

import { SourceMode } from '../types';
import { OutOfRangeError, UnsupportedSourceError } from '../utils/errors';
import { VOLUME_STEP_DB } from '../core/VolumeCodec';
import { FLEX_COMMANDS, FlexCommandName, MESSAGE_END, SET_VOLUME_PREFIX } from '../core/FlexConstants';

// Two integer digits on the wire
const MAX_ENCODABLE_MAGNITUDE = 99.5;

// Nearest integer, ties to even
function roundHalfEven(x: number): number {
  const r = Math.round(x);
  return Math.abs(x % 1) === 0.5 && r % 2 !== 0 ? r - 1 : r;
}

export function encodeCommand(name: FlexCommandName): string {
  return FLEX_COMMANDS[name];
}

/**
 * '@11P-DD.F'
 *
 * The value is rounded to the nearest 0.5 dB (ties to even) and sent as an
 * unsigned magnitude: -3.2 and 3.2 both encode to '@11P-03.0'.
 *
 * @throws OutOfRangeError for non-finite values or magnitudes above 99.5
 */
export function encodeSetVolumeDecibels(value: number): string {
  if (!Number.isFinite(value)) {
    throw new OutOfRangeError(value, -MAX_ENCODABLE_MAGNITUDE, MAX_ENCODABLE_MAGNITUDE, 'Volume (dB)');
  }
  const magnitude = Math.abs(roundHalfEven(value / VOLUME_STEP_DB) * VOLUME_STEP_DB);
  if (magnitude > MAX_ENCODABLE_MAGNITUDE) {
    throw new OutOfRangeError(value, -MAX_ENCODABLE_MAGNITUDE, MAX_ENCODABLE_MAGNITUDE, 'Volume (dB)');
  }
  return SET_VOLUME_PREFIX + magnitude.toFixed(1).padStart(4, '0') + MESSAGE_END;
}

export function encodeSelectInputSource(source: SourceMode): string {
  switch (source) {
    case SourceMode.AUTO:
      return FLEX_COMMANDS.SELECT_INPUT_AUTO;
    case SourceMode.INPUT_1:
      return FLEX_COMMANDS.SELECT_INPUT_1;
    case SourceMode.INPUT_2:
      return FLEX_COMMANDS.SELECT_INPUT_2;
    default:
      throw new UnsupportedSourceError(source);
  }
}
