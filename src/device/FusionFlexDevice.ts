import { EventEmitter } from 'events';
import { FrameAssembler } from '../core/FrameAssembler';
import { applyMessage, formatStatus } from '../core/StatusMachine';
import { volumeFractionToDecibels } from '../core/VolumeCodec';
import { createTransport, describeConnection, Transport, TransportFactory } from '../transport';
import {
  AmplifierDevice,
  ConnectionConfig,
  ConnectionType,
  DevicePhase,
  Disposable,
  FlexEventEmitter,
  FusionFlexStatus,
  SourceMode
} from '../types';
import { encodeAscii } from '../utils/codec';
import { dbg, warn } from '../utils/debug';
import { ConnectionAbortedError, ConnectionFailedError, NotConnectedError } from '../utils/errors';
import { encodeCommand, encodeSelectInputSource, encodeSetVolumeDecibels } from './FlexCommands';
import { FlexCommandName } from '../core/FlexConstants';

export interface FusionFlexDeviceOptions {
  /** Builds the byte link for a connection; serial or UDP by default */
  transportFactory?: TransportFactory;
}

/**
 * Driver for the Fusion Flex stereo amplifier.
 *
 * Commands are written fire-and-forget; the amplifier answers with status
 * reports which update `status` and fire `statusChanged`.
 *
 * Not safe for concurrent use: all calls and inbound data are expected on one
 * event loop.
 */
export class FusionFlexDevice implements AmplifierDevice {
  private ev: FlexEventEmitter = new EventEmitter() as FlexEventEmitter;
  private readonly transportFactory: TransportFactory;
  private transport?: Transport;
  private _phase = DevicePhase.IDLE;
  private _status?: FusionFlexStatus;
  private startPromise?: Promise<void>;
  private detachTransport?: () => void;

  private readonly assembler = new FrameAssembler({
    onFrame: (frame) => this.onFrame(frame),
    onOverflow: (dropped) => dbg(`Dropped oversized fragment "${dropped}"`),
    onMalformed: (err) => warn(`Dropped chunk from ${this.descriptor}: ${err.message}`)
  });

  constructor(
    public readonly connection: ConnectionConfig,
    options: FusionFlexDeviceOptions = {}
  ) {
    this.transportFactory = options.transportFactory ?? createTransport;
  }

  get events(): FlexEventEmitter { return this.ev; }

  get phase(): DevicePhase { return this._phase; }

  /** Latest snapshot; undefined before the first report and after teardown */
  get status(): FusionFlexStatus | undefined { return this._status; }

  get connectionType(): ConnectionType { return this.connection.type; }

  get descriptor(): string { return describeConnection(this.connection); }

  /**
   * Register a status listener. Listeners run synchronously, in registration
   * order, after the new snapshot is in place.
   */
  onStatusChanged(listener: (status: FusionFlexStatus) => void): Disposable {
    this.ev.on('statusChanged', listener);
    return { dispose: () => { this.ev.off('statusChanged', listener); } };
  }

  // ============================================================================
  // Connection lifecycle
  // ============================================================================

  private transitionTo(next: DevicePhase, reason: string) {
    const previous = this._phase;
    if (previous === next) return;
    dbg(`State transition: ${previous} → ${next} (${reason})`);
    this._phase = next;
    this.ev.emit('phaseChanged', next, previous);
  }

  /**
   * Open the connection.
   * Idempotent: resolves immediately when CONNECTED and returns the pending
   * attempt when STARTING. Transport failures are not retried.
   * @throws ConnectionFailedError if the transport cannot be opened
   * @throws ConnectionAbortedError if stop() is called before it opens
   */
  async start(): Promise<void> {
    if (this._phase === DevicePhase.CONNECTED) {
      dbg('start() called but already CONNECTED - returning immediately');
      return;
    }
    if (this._phase === DevicePhase.STARTING && this.startPromise) {
      dbg('start() called while STARTING - returning pending attempt');
      return this.startPromise;
    }
    const attempt = this.doStart();
    this.startPromise = attempt;
    try {
      await attempt;
    } finally {
      if (this.startPromise === attempt) this.startPromise = undefined;
    }
  }

  private async doStart() {
    const transport = this.transportFactory(this.connection);
    this.transport = transport;
    this._status = undefined;
    this.assembler.reset();
    this.transitionTo(DevicePhase.STARTING, `start() ${this.descriptor}`);

    try {
      await transport.open();
    } catch (err) {
      if (this.transport === transport) {
        this.transport = undefined;
        this.transitionTo(DevicePhase.STOPPED, 'transport failed to open');
      }
      throw new ConnectionFailedError(this.descriptor, err);
    }

    // stop() ran while the transport was opening
    if (this.transport !== transport || this._phase !== DevicePhase.STARTING) {
      await transport.close();
      throw new ConnectionAbortedError(this.descriptor);
    }

    this.attach(transport);
    this.transitionTo(DevicePhase.CONNECTED, 'transport open');
  }

  private attach(transport: Transport) {
    const onData = (chunk: Buffer) => this.assembler.push(chunk);
    const onClose = (err?: Error) => this.onTransportLost(transport, err);
    const onError = (err: Error) => {
      warn(`Transport error on ${this.descriptor}: ${err.message}`);
      if (this.ev.listenerCount('error') > 0) this.ev.emit('error', err);
      this.onTransportLost(transport, err);
      transport.close().catch((closeErr: unknown) => dbg('close after transport error failed:', closeErr));
    };
    transport.events.on('data', onData);
    transport.events.on('close', onClose);
    transport.events.on('error', onError);
    this.detachTransport = () => {
      transport.events.off('data', onData);
      transport.events.off('close', onClose);
      transport.events.off('error', onError);
    };
  }

  private onTransportLost(transport: Transport, error?: Error) {
    if (this.transport !== transport) return;
    warn(error ? `Connection to ${this.descriptor} was lost: ${error.message}` : `Connection to ${this.descriptor} closed`);
    this.teardown();
    this.transitionTo(DevicePhase.STOPPED, 'transport closed');
    this.ev.emit('connectionLost', { descriptor: this.descriptor, error, timestamp: Date.now() });
  }

  private teardown() {
    this.detachTransport?.();
    this.detachTransport = undefined;
    this.transport = undefined;
    this._status = undefined;
    this.assembler.reset();
  }

  /**
   * Close the connection. A no-op unless STARTING or CONNECTED.
   */
  async stop(): Promise<void> {
    const transport = this.transport;
    const phase = this._phase;
    if (phase !== DevicePhase.STARTING && phase !== DevicePhase.CONNECTED) {
      dbg(`stop() called while ${phase} - no-op`);
      return;
    }
    this.teardown();
    this.startPromise = undefined;
    this.transitionTo(DevicePhase.STOPPED, 'stop() requested');
    // A transport still opening is closed by doStart() once open() settles
    if (transport && phase === DevicePhase.CONNECTED) {
      await transport.close();
    }
  }

  // ============================================================================
  // Inbound
  // ============================================================================

  private onFrame(frame: string) {
    dbg(`Incoming message from device: [${frame}]`);
    const next = applyMessage(this._status, frame);
    if (!next) {
      warn(`Ignoring unknown message: "${frame}"`);
      return;
    }
    this._status = next;
    dbg(`Status: ${formatStatus(next)}`);
    // rawListeners keeps once() wrappers so they still remove themselves
    for (const listener of this.ev.rawListeners('statusChanged')) {
      try {
        listener.call(this.ev, next);
      } catch (err) {
        warn(`statusChanged listener threw: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  // ============================================================================
  // Commands
  // ============================================================================

  private sendRaw(command: string) {
    const transport = this.transport;
    if (this._phase !== DevicePhase.CONNECTED || !transport) {
      throw new NotConnectedError(this._phase);
    }
    dbg(`Outgoing message to device: [${command}]`);
    transport.send(encodeAscii(command));
  }

  private sendCommand(name: FlexCommandName) {
    this.sendRaw(encodeCommand(name));
  }

  turnOn() { this.sendCommand('POWER_ON'); }

  turnOff() { this.sendCommand('POWER_OFF'); }

  muteOn() { this.sendCommand('MUTE_ON'); }

  muteOff() { this.sendCommand('MUTE_OFF'); }

  muteToggle() { this.sendCommand('MUTE_TOGGLE'); }

  /** Raise the volume by 0.5 dB */
  volumeUp() { this.sendCommand('VOLUME_UP'); }

  /** Lower the volume by 0.5 dB */
  volumeDown() { this.sendCommand('VOLUME_DOWN'); }

  /**
   * Set the volume in decibels, rounded to the nearest 0.5 dB.
   * The sign is not transmitted: -30 and 30 both set -30 dB.
   */
  setVolumeLevelDecibels(value: number) {
    const command = encodeSetVolumeDecibels(value);
    this.sendRaw(command);
  }

  /**
   * Set the volume as a fraction of the full range (0 = -95.5 dB, 1 = 0 dB)
   * @throws OutOfRangeError if value is outside [0, 1]
   */
  setVolumeLevelFraction(value: number) {
    this.setVolumeLevelDecibels(volumeFractionToDecibels(value));
  }

  selectInputSource(source: SourceMode) {
    const command = encodeSelectInputSource(source);
    this.sendRaw(command);
  }
}
