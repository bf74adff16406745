import { EventEmitter } from 'events';

export interface TransportEvents {
  // Raw bytes as read from the link, not aligned to frames
  data: (chunk: Buffer) => void;
  // The link went away; err is set when it was not closed by us
  close: (err?: Error) => void;
  error: (err: Error) => void;
}

export type TransportEventEmitter = EventEmitter & {
  on<U extends keyof TransportEvents>(event: U, listener: TransportEvents[U]): TransportEventEmitter;
  off<U extends keyof TransportEvents>(event: U, listener: TransportEvents[U]): TransportEventEmitter;
  emit<U extends keyof TransportEvents>(event: U, ...args: Parameters<TransportEvents[U]>): boolean;
};

/**
 * Byte link to the amplifier. Writes are fire-and-forget; write failures
 * surface as 'error' events.
 */
export interface Transport {
  /** Human-readable endpoint, e.g. serial:///dev/ttyUSB0 */
  readonly descriptor: string;
  readonly events: TransportEventEmitter;
  open(): Promise<void>;
  close(): Promise<void>;
  send(data: Buffer): void;
}
