import { applyMessage, formatStatus, INITIAL_STATUS, parseMessage, volumeFraction } from '../src/core/StatusMachine';
import { FusionFlexStatus, SourceMode } from '../src/types';

function applyAll(...messages: string[]): FusionFlexStatus | undefined {
  let status: FusionFlexStatus | undefined;
  for (const m of messages) {
    status = applyMessage(status, m) ?? status;
  }
  return status;
}

describe('StatusMachine', () => {
  test('power on from no status', () => {
    const status = applyMessage(undefined, "'@112'");
    expect(status).toEqual({ isTurnedOn: true });
    expect(status?.volumeDb).toBeUndefined();
    expect(status?.sourceMode).toBeUndefined();
    expect(status?.isMuted).toBeUndefined();
  });

  test('power off', () => {
    expect(applyMessage(undefined, "'@113'")).toEqual({ isTurnedOn: false });
  });

  test('volume report sets volume and forces power on', () => {
    const off = applyMessage(undefined, "'@113'");
    const status = applyMessage(off, "'@11S-03.0'");
    expect(status).toEqual({ isTurnedOn: true, volumeDb: -3 });
  });

  test('all three volume report letters are accepted', () => {
    expect(applyMessage(undefined, "'@11S-10.5'")?.volumeDb).toBe(-10.5);
    expect(applyMessage(undefined, "'@11T-95.5'")?.volumeDb).toBe(-95.5);
    expect(applyMessage(undefined, "'@11P-00.0'")?.volumeDb).toBe(0);
  });

  test('mute after power off turns the device back on', () => {
    expect(applyAll("'@113'", "'@11Q'")).toEqual({ isTurnedOn: true, isMuted: true });
  });

  test('mute off', () => {
    expect(applyAll("'@11Q'", "'@11R'")).toEqual({ isTurnedOn: true, isMuted: false });
  });

  test('input source reports', () => {
    expect(applyMessage(undefined, "'@15A'")?.sourceMode).toBe(SourceMode.INPUT_1);
    expect(applyMessage(undefined, "'@15B'")?.sourceMode).toBe(SourceMode.INPUT_2);
    expect(applyMessage(undefined, "'@15Z'")?.sourceMode).toBe(SourceMode.AUTO);
  });

  test('fields accumulate across reports', () => {
    expect(applyAll("'@112'", "'@15B'", "'@11P-40.0'", "'@11Q'", "'@113'")).toEqual({
      isTurnedOn: false,
      volumeDb: -40,
      sourceMode: SourceMode.INPUT_2,
      isMuted: true
    });
  });

  test('unrecognized messages produce no snapshot', () => {
    const current = applyMessage(undefined, "'@112'");
    expect(applyMessage(current, "'@99X'")).toBeUndefined();
    expect(applyMessage(current, "'@11S'")).toBeUndefined();
    expect(applyMessage(current, "'@11S-03.3'")).toBeUndefined();
    expect(applyMessage(current, "'@11S-3.0'")).toBeUndefined();
    expect(applyMessage(current, "'@11P+03.0'")).toBeUndefined();
    expect(current).toEqual({ isTurnedOn: true });
  });

  test('volume reports below the amplifier range are clamped', () => {
    expect(applyMessage(undefined, "'@11S-99.0'")).toEqual({ isTurnedOn: true, volumeDb: -95.5 });
    expect(parseMessage("'@11S-96.0'")).toEqual({ volumeDb: -95.5 });
    const off = applyMessage(undefined, "'@113'");
    expect(applyMessage(off, "'@11T-99.5'")).toEqual({ isTurnedOn: true, volumeDb: -95.5 });
  });

  test('snapshots are frozen and never mutated', () => {
    const first = applyMessage(undefined, "'@112'");
    const second = applyMessage(first, "'@11Q'");
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(second)).toBe(true);
    expect(second).not.toBe(first);
    expect(first).toEqual({ isTurnedOn: true });
    expect(INITIAL_STATUS).toEqual({ isTurnedOn: true });
  });

  test('volumeFraction', () => {
    expect(volumeFraction({ isTurnedOn: true })).toBeUndefined();
    expect(volumeFraction({ isTurnedOn: true, volumeDb: -95.5 })).toBe(0);
    expect(volumeFraction({ isTurnedOn: true, volumeDb: 0 })).toBe(1);
  });

  test('formatStatus', () => {
    expect(formatStatus({ isTurnedOn: true, volumeDb: -30, sourceMode: SourceMode.INPUT_1 }))
      .toBe('{"isTurnedOn":true,"volumeDb":-30,"sourceMode":"INPUT_1","isMuted":null}');
    expect(formatStatus({ isTurnedOn: false }))
      .toBe('{"isTurnedOn":false,"volumeDb":null,"sourceMode":null,"isMuted":null}');
  });
});
