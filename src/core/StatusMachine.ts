import { FusionFlexStatus, SourceMode } from '../types';
import { FLEX_COMMANDS, VOLUME_REPORT_PATTERN } from './FlexConstants';
import { MIN_VOLUME_DB, volumeDecibelsToFraction } from './VolumeCodec';

/**
 * Status assumed before the first report: the amplifier only talks while powered
 */
export const INITIAL_STATUS: FusionFlexStatus = Object.freeze({ isTurnedOn: true });

type StatusUpdate = Partial<{ -readonly [K in keyof FusionFlexStatus]: FusionFlexStatus[K] }>;

const EXACT_MESSAGES: Record<string, StatusUpdate> = {
  [FLEX_COMMANDS.POWER_ON]: { isTurnedOn: true },
  [FLEX_COMMANDS.POWER_OFF]: { isTurnedOn: false },
  [FLEX_COMMANDS.SELECT_INPUT_1]: { sourceMode: SourceMode.INPUT_1 },
  [FLEX_COMMANDS.SELECT_INPUT_2]: { sourceMode: SourceMode.INPUT_2 },
  [FLEX_COMMANDS.SELECT_INPUT_AUTO]: { sourceMode: SourceMode.AUTO },
  [FLEX_COMMANDS.MUTE_ON]: { isMuted: true },
  [FLEX_COMMANDS.MUTE_OFF]: { isMuted: false }
};

/**
 * Decode one complete frame into the fields it reports, or undefined when
 * the frame is not a status report this driver understands.
 */
export function parseMessage(message: string): StatusUpdate | undefined {
  const volume = VOLUME_REPORT_PATTERN.exec(message);
  if (volume) {
    // -96.0 .. -99.5 fit the pattern but sit below the amplifier's range
    const db = Math.max(MIN_VOLUME_DB, Number.parseFloat(volume[1]));
    return { volumeDb: db === 0 ? 0 : db };
  }
  return Object.prototype.hasOwnProperty.call(EXACT_MESSAGES, message) ? EXACT_MESSAGES[message] : undefined;
}

/**
 * Apply one frame to the current status.
 *
 * Returns a new frozen snapshot, or undefined (and leaves `current` alone)
 * when the frame is not recognized. Any report other than power-off means
 * the amplifier is on.
 */
export function applyMessage(current: FusionFlexStatus | undefined, message: string): FusionFlexStatus | undefined {
  const update = parseMessage(message);
  if (!update) return undefined;
  const next: FusionFlexStatus = { ...(current ?? INITIAL_STATUS), ...update };
  if (message !== FLEX_COMMANDS.POWER_OFF) {
    return Object.freeze({ ...next, isTurnedOn: true });
  }
  return Object.freeze(next);
}

/**
 * Volume of a snapshot as a fraction between 0 and 1, undefined until reported
 */
export function volumeFraction(status: FusionFlexStatus): number | undefined {
  return status.volumeDb === undefined ? undefined : volumeDecibelsToFraction(status.volumeDb);
}

/**
 * One-line JSON view, unknown fields as null
 * e.g. {"isTurnedOn":true,"volumeDb":-30,"sourceMode":"INPUT_1","isMuted":null}
 */
export function formatStatus(status: FusionFlexStatus): string {
  return JSON.stringify({
    isTurnedOn: status.isTurnedOn,
    volumeDb: status.volumeDb ?? null,
    sourceMode: status.sourceMode ?? null,
    isMuted: status.isMuted ?? null
  });
}
