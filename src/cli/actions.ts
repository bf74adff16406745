import { FusionFlexDevice } from '../device/FusionFlexDevice';
import { SourceMode } from '../types';

export interface DeviceAction {
  description: string;
  run: (device: FusionFlexDevice) => void;
}

/**
 * Actions for `flexctl send <action> [value]`; value-taking ones get the raw argument
 */
export const SEND_ACTIONS: Record<string, (value?: string) => DeviceAction> = {
  on: () => ({ description: 'Power ON', run: (d) => d.turnOn() }),
  off: () => ({ description: 'Power OFF', run: (d) => d.turnOff() }),
  mute: () => ({ description: 'Mute ON', run: (d) => d.muteOn() }),
  unmute: () => ({ description: 'Mute OFF', run: (d) => d.muteOff() }),
  'mute-toggle': () => ({ description: 'Mute Toggle', run: (d) => d.muteToggle() }),
  up: () => ({ description: 'Volume Up', run: (d) => d.volumeUp() }),
  down: () => ({ description: 'Volume Down', run: (d) => d.volumeDown() }),
  'volume-db': (value) => {
    const db = parseNumber(value, 'volume-db');
    return { description: `Volume ${db} dB`, run: (d) => d.setVolumeLevelDecibels(db) };
  },
  volume: (value) => {
    const percent = parseNumber(value, 'volume');
    return { description: `Volume ${percent}%`, run: (d) => d.setVolumeLevelFraction(percent / 100) };
  },
  input: (value) => {
    const source = parseSource(value);
    return { description: `Set Source to ${source}`, run: (d) => d.selectInputSource(source) };
  }
};

export function resolveSendAction(name: string, value?: string): DeviceAction {
  const factory = Object.prototype.hasOwnProperty.call(SEND_ACTIONS, name) ? SEND_ACTIONS[name] : undefined;
  if (!factory) {
    throw new Error(`Unknown action "${name}", expected one of: ${Object.keys(SEND_ACTIONS).join(', ')}`);
  }
  return factory(value);
}

function parseNumber(value: string | undefined, action: string): number {
  const n = value === undefined ? NaN : Number(value);
  if (!Number.isFinite(n)) {
    throw new Error(`Action "${action}" needs a numeric value, got "${value ?? ''}"`);
  }
  return n;
}

function parseSource(value: string | undefined): SourceMode {
  switch (value?.toLowerCase()) {
    case 'auto': return SourceMode.AUTO;
    case '1': return SourceMode.INPUT_1;
    case '2': return SourceMode.INPUT_2;
    default:
      throw new Error(`Action "input" expects auto, 1 or 2, got "${value ?? ''}"`);
  }
}

const volumeKey = (key: string, percent: number): [string, DeviceAction] => [
  key,
  { description: `Volume ${String(percent).padStart(3)}%`, run: (d) => d.setVolumeLevelFraction(percent / 100) }
];

/**
 * Single-key bindings of `flexctl interactive`
 */
export const KEY_BINDINGS: ReadonlyMap<string, DeviceAction> = new Map<string, DeviceAction>([
  ['P', { description: 'Power ON', run: (d) => d.turnOn() }],
  ['p', { description: 'Power OFF', run: (d) => d.turnOff() }],
  ['+', { description: 'Volume Up', run: (d) => d.volumeUp() }],
  ['-', { description: 'Volume Down', run: (d) => d.volumeDown() }],
  ...[0, 1, 2, 3, 4, 5, 6, 7, 8, 9].map((n) => volumeKey(String(n), n * 10)),
  volumeKey('_', 100),
  ['M', { description: 'Mute ON', run: (d) => d.muteOn() }],
  ['m', { description: 'Mute OFF', run: (d) => d.muteOff() }],
  ['n', { description: 'Mute Toggle', run: (d) => d.muteToggle() }],
  ['~', { description: 'Set Source to AUTO', run: (d) => d.selectInputSource(SourceMode.AUTO) }],
  ['!', { description: 'Set Source to Input 1', run: (d) => d.selectInputSource(SourceMode.INPUT_1) }],
  ['@', { description: 'Set Source to Input 2', run: (d) => d.selectInputSource(SourceMode.INPUT_2) }]
]);

export function formatKeyHelp(): string {
  const lines = ['Options:', '  (h) Print Options', '  (q) Quit'];
  for (const [key, action] of KEY_BINDINGS) {
    lines.push(`  (${key}) ${action.description}`);
  }
  return lines.join('\n');
}
