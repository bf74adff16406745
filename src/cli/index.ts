#!/usr/bin/env node
/**
 * flexctl: command-line control of a Fusion Flex amplifier
 *
 *   FLEX_HOST=192.168.1.40 FLEX_PORT=7000 flexctl send volume 40
 *   flexctl --serial /dev/ttyUSB0 interactive
 */

import readline from 'readline';
import { Command } from 'commander';
import { ConnectionSettings, connectionConfigFromSettings, settingsFromEnv } from '../config';
import { formatStatus } from '../core/StatusMachine';
import { FusionFlexDevice } from '../device/FusionFlexDevice';
import { setupGlobalErrorHandlers } from '../utils/errorHandling';
import { formatKeyHelp, KEY_BINDINGS, resolveSendAction } from './actions';

const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

function createDevice(settings: ConnectionSettings): FusionFlexDevice {
  const device = new FusionFlexDevice(connectionConfigFromSettings(settings));
  device.onStatusChanged((status) => console.log(formatStatus(status)));
  device.events.on('connectionLost', (info) => {
    console.error(`Connection to ${info.descriptor} lost${info.error ? `: ${info.error.message}` : ''}`);
    process.exitCode = 1;
  });
  return device;
}

function parseMs(value: string): number {
  const ms = Number.parseInt(value, 10);
  if (!Number.isFinite(ms) || ms < 0) throw new Error(`Invalid duration "${value}"`);
  return ms;
}

async function interactive(device: FusionFlexDevice): Promise<void> {
  if (!process.stdin.isTTY) {
    throw new Error('interactive mode needs a terminal');
  }
  console.log(formatKeyHelp());
  readline.emitKeypressEvents(process.stdin);
  process.stdin.setRawMode(true);

  await new Promise<void>((resolve) => {
    const onKeypress = (str: string | undefined, key: readline.Key) => {
      if ((key.ctrl && key.name === 'c') || str === 'q') {
        process.stdin.off('keypress', onKeypress);
        process.stdin.setRawMode(false);
        process.stdin.pause();
        resolve();
        return;
      }
      if (str === 'h') {
        console.log(formatKeyHelp());
        return;
      }
      const action = str === undefined ? undefined : KEY_BINDINGS.get(str);
      if (!action) return;
      console.log(action.description);
      try {
        action.run(device);
      } catch (err) {
        console.error(err instanceof Error ? err.message : String(err));
      }
    };
    process.stdin.on('keypress', onKeypress);
  });
}

export function buildProgram(): Command {
  const env = settingsFromEnv();
  const program = new Command();

  program
    .name('flexctl')
    .description('Control a Fusion Flex stereo amplifier over RS-232 or UDP')
    .option('--serial <path>', 'serial device (selects a serial connection)', env.serial)
    .option('--baud-rate <rate>', 'serial baud rate', env.baudRate === undefined ? undefined : String(env.baudRate))
    .option('--host <host>', 'amplifier host for UDP', env.host)
    .option('--port <port>', 'amplifier UDP port', env.port === undefined ? undefined : String(env.port))
    .option('--local-ip <ip>', 'local UDP bind address', env.localIp)
    .option('--local-port <port>', 'local UDP bind port', env.localPort === undefined ? undefined : String(env.localPort));

  program
    .command('status')
    .description('connect and print status reports')
    .option('--duration <ms>', 'how long to listen', '5000')
    .action(async (opts: { duration: string }, cmd: Command) => {
      const device = createDevice(cmd.optsWithGlobals<ConnectionSettings>());
      await device.start();
      await sleep(parseMs(opts.duration));
      await device.stop();
    });

  program
    .command('send')
    .description('send one command: on, off, mute, unmute, mute-toggle, up, down, volume-db <dB>, volume <percent>, input <auto|1|2>')
    .argument('<action>')
    .argument('[value]')
    .option('--wait <ms>', 'how long to wait for the reply', '1000')
    .action(async (name: string, value: string | undefined, opts: { wait: string }, cmd: Command) => {
      const action = resolveSendAction(name, value);
      const device = createDevice(cmd.optsWithGlobals<ConnectionSettings>());
      await device.start();
      console.log(action.description);
      action.run(device);
      await sleep(parseMs(opts.wait));
      await device.stop();
    });

  program
    .command('interactive')
    .description('single-key control, press h for help and q to quit')
    .action(async (_opts: unknown, cmd: Command) => {
      const device = createDevice(cmd.optsWithGlobals<ConnectionSettings>());
      await device.start();
      try {
        await interactive(device);
      } finally {
        await device.stop();
      }
    });

  return program;
}

if (require.main === module) {
  setupGlobalErrorHandlers();
  buildProgram().parseAsync(process.argv).catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
