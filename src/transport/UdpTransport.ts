import dgram from 'dgram';
import { promises as dns } from 'dns';
import { EventEmitter } from 'events';
import { UdpAddress } from '../types';
import { dbg, dbgV } from '../utils/debug';
import { Transport, TransportEventEmitter } from './Transport';

export interface UdpTransportOptions {
  remote: UdpAddress;
  local?: { ip?: string; port?: number };
}

/**
 * Datagram link to the amplifier. Every command goes to the remote endpoint;
 * datagrams from any other source are dropped before they reach the caller.
 */
export class UdpTransport implements Transport {
  public readonly events = new EventEmitter() as TransportEventEmitter;
  private socket?: dgram.Socket;
  private remoteIp?: string;
  private closing = false;
  private _localPort = 0;
  public get localPort(): number { return this._localPort; }

  constructor(private readonly options: UdpTransportOptions) {}

  get descriptor(): string {
    return `udp://${this.options.remote.host}:${this.options.remote.port}`;
  }

  async open(): Promise<void> {
    if (this.socket) {
      dbgV(`[UDP] Socket already open on port ${this._localPort}, skipping`);
      return;
    }
    // Resolved once so inbound datagrams can be matched by address
    const { address } = await dns.lookup(this.options.remote.host, { family: 4 });
    const localIp = this.options.local?.ip ?? '0.0.0.0';
    const localPort = this.options.local?.port ?? 0;
    dbgV(`[UDP] Opening socket on ${localIp}:${localPort}`);

    const sock = dgram.createSocket('udp4');
    await new Promise<void>((resolve, reject) => {
      const onBindError = (err: Error) => {
        try { sock.close(); } catch (closeErr) { dbgV('[UDP] close after bind failure:', closeErr); }
        reject(err);
      };
      sock.once('error', onBindError);
      sock.bind(localPort, localIp, () => {
        sock.off('error', onBindError);
        resolve();
      });
    });

    this.socket = sock;
    this.remoteIp = address;
    this.closing = false;
    this._localPort = sock.address().port;
    dbg(`[UDP] Socket bound to port ${this._localPort}, remote ${address}:${this.options.remote.port}`);

    sock.on('message', (msg, rinfo) => this.onMessage(msg, rinfo));
    sock.on('error', (err) => this.events.emit('error', err));
    sock.on('close', () => {
      const expected = this.closing;
      this.socket = undefined;
      this._localPort = 0;
      this.events.emit('close', expected ? undefined : new Error('UDP socket closed unexpectedly'));
    });
  }

  async close(): Promise<void> {
    const sock = this.socket;
    if (!sock) return;
    this.closing = true;
    await new Promise<void>((resolve) => sock.close(() => resolve()));
  }

  send(buf: Buffer) {
    if (!this.socket || this.remoteIp === undefined) {
      throw new Error('UDP socket not opened');
    }
    const { port } = this.options.remote;
    dbgV(`[UDP] send to ${this.remoteIp}:${port}, ${buf.length} bytes from port ${this._localPort}`);
    this.socket.send(buf, port, this.remoteIp, (err) => {
      if (err) {
        dbg(`[UDP] send error: ${err.message}`);
        this.events.emit('error', err);
      }
    });
  }

  private onMessage(msg: Buffer, rinfo: dgram.RemoteInfo) {
    if (rinfo.address !== this.remoteIp || rinfo.port !== this.options.remote.port) {
      dbg(`[UDP] Ignoring ${msg.length} bytes from unexpected source ${rinfo.address}:${rinfo.port}`);
      return;
    }
    this.events.emit('data', Buffer.from(msg));
  }
}
