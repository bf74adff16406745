import { ConnectionConfig, ConnectionType } from '../types';
import { SerialTransport } from './SerialTransport';
import { Transport } from './Transport';
import { UdpTransport } from './UdpTransport';

export type TransportFactory = (config: ConnectionConfig) => Transport;

export const createTransport: TransportFactory = (config) => {
  switch (config.type) {
    case ConnectionType.SERIAL:
      return new SerialTransport({ path: config.path, baudRate: config.baudRate });
    case ConnectionType.UDP:
      return new UdpTransport({ remote: config.remote, local: config.local });
  }
};

export function describeConnection(config: ConnectionConfig): string {
  switch (config.type) {
    case ConnectionType.SERIAL:
      return `serial://${config.path}`;
    case ConnectionType.UDP:
      return `udp://${config.remote.host}:${config.remote.port}`;
  }
}

export * from './Transport';
export { SerialTransport, createSerialPort } from './SerialTransport';
export type { SerialTransportOptions, SerialPortHandle, SerialPortFactory } from './SerialTransport';
export { UdpTransport } from './UdpTransport';
export type { UdpTransportOptions } from './UdpTransport';
