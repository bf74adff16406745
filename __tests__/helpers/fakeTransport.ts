import { EventEmitter } from 'events';
import { Transport, TransportEventEmitter } from '../../src/transport/Transport';

/**
 * In-memory stand-in for a serial port or UDP socket
 */
export class FakeTransport implements Transport {
  public readonly events = new EventEmitter() as TransportEventEmitter;
  public readonly sent: string[] = [];
  public opened = false;
  public closed = false;
  public openError?: Error;
  private gate?: Promise<void>;
  private release?: () => void;

  constructor(public readonly descriptor = 'fake://amp') {}

  /** Make open() wait until the returned function is called */
  holdOpen(): () => void {
    this.gate = new Promise<void>((resolve) => { this.release = resolve; });
    return () => this.release?.();
  }

  async open(): Promise<void> {
    if (this.gate) await this.gate;
    if (this.openError) throw this.openError;
    this.opened = true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  send(data: Buffer) {
    this.sent.push(data.toString('ascii'));
  }

  /** Deliver raw text as if the amplifier had sent it */
  receive(text: string) {
    this.events.emit('data', Buffer.from(text, 'ascii'));
  }
}
