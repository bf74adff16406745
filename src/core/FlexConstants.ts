/**
 * Fusion Flex RS-232 protocol constants
 */

/** Every frame starts with apostrophe + at-sign */
export const MESSAGE_START = "'@";
/** ...and ends with a single apostrophe */
export const MESSAGE_END = "'";

/** Longest partial frame kept while waiting for its end token */
export const MAX_PENDING_LENGTH = 16;

/** Serial line settings: 9600 8N1 */
export const BAUD_RATE = 9600;
export const DATA_BITS = 8;
export const STOP_BITS = 1;
export const PARITY = 'none';

/**
 * Fixed commands and their wire strings.
 * The amplifier echoes the same strings back as status reports.
 */
export const FLEX_COMMANDS = {
  POWER_ON: "'@112'",
  POWER_OFF: "'@113'",
  SELECT_INPUT_1: "'@15A'",
  SELECT_INPUT_2: "'@15B'",
  SELECT_INPUT_AUTO: "'@15Z'",
  MUTE_ON: "'@11Q'",
  MUTE_OFF: "'@11R'",
  MUTE_TOGGLE: "'@11U'",
  VOLUME_UP: "'@11S'",
  VOLUME_DOWN: "'@11T'"
} as const;

export type FlexCommandName = keyof typeof FLEX_COMMANDS;

/** Prefix of the parametric set-volume command, followed by DD.F and the end token */
export const SET_VOLUME_PREFIX = "'@11P-";

/**
 * Volume report sent after up/down/set volume:
 * S, T or P, then a fixed minus sign, two digits, a dot and 0 or 5
 */
export const VOLUME_REPORT_PATTERN = /^'@11[STP](-\d\d\.[05])'$/;
