import { EventEmitter } from 'events';
import { SerialPort } from 'serialport';
import { BAUD_RATE, DATA_BITS, PARITY, STOP_BITS } from '../core/FlexConstants';
import { dbg, dbgV } from '../utils/debug';
import { Transport, TransportEventEmitter } from './Transport';

export interface SerialTransportOptions {
  path: string;
  baudRate?: number;
}

/**
 * The subset of a serialport handle this transport relies on
 */
export interface SerialPortHandle {
  readonly isOpen: boolean;
  open(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
  write(data: Buffer, callback: (err: Error | null | undefined) => void): boolean;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'close', listener: (err?: Error | null) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  removeAllListeners(): unknown;
}

export type SerialPortFactory = (options: Required<SerialTransportOptions>) => SerialPortHandle;

// 8N1, opened explicitly by open()
export const createSerialPort: SerialPortFactory = ({ path, baudRate }) => new SerialPort({
  path,
  baudRate,
  dataBits: DATA_BITS,
  parity: PARITY,
  stopBits: STOP_BITS,
  autoOpen: false
});

/**
 * RS-232 link to the amplifier
 */
export class SerialTransport implements Transport {
  public readonly events = new EventEmitter() as TransportEventEmitter;
  private port?: SerialPortHandle;
  private closing = false;

  constructor(
    private readonly options: SerialTransportOptions,
    private readonly portFactory: SerialPortFactory = createSerialPort
  ) {}

  get descriptor(): string {
    return `serial://${this.options.path}`;
  }

  async open(): Promise<void> {
    if (this.port) {
      dbgV(`[Serial] ${this.options.path} already open, skipping`);
      return;
    }
    const baudRate = this.options.baudRate ?? BAUD_RATE;
    const port = this.portFactory({ path: this.options.path, baudRate });
    await new Promise<void>((resolve, reject) => {
      port.open((err) => (err ? reject(err) : resolve()));
    });
    dbg(`[Serial] Opened ${this.options.path} at ${baudRate} baud`);

    this.port = port;
    this.closing = false;
    port.on('data', (chunk) => this.events.emit('data', Buffer.from(chunk)));
    port.on('error', (err) => this.events.emit('error', err));
    port.on('close', (err) => {
      const expected = this.closing;
      port.removeAllListeners();
      // serialport can still report errors on a closed handle
      port.on('error', (late) => dbg(`[Serial] error after close on ${this.options.path}: ${late.message}`));
      this.port = undefined;
      this.events.emit('close', expected ? undefined : (err ?? new Error(`Serial port ${this.options.path} closed unexpectedly`)));
    });
  }

  async close(): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) return;
    this.closing = true;
    await new Promise<void>((resolve, reject) => {
      port.close((err) => (err ? reject(err) : resolve()));
    });
  }

  send(buf: Buffer) {
    if (!this.port) {
      throw new Error('Serial port not opened');
    }
    dbgV(`[Serial] write ${buf.length} bytes to ${this.options.path}`);
    this.port.write(buf, (err) => {
      if (err) {
        dbg(`[Serial] write error: ${err.message}`);
        this.events.emit('error', err);
      }
    });
  }
}
