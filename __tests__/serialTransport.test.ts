jest.mock('serialport', () => ({ SerialPort: jest.fn() }));

import { EventEmitter } from 'events';
import { SerialPortHandle, SerialTransport, SerialTransportOptions } from '../src/transport/SerialTransport';

class FakePort extends EventEmitter implements SerialPortHandle {
  public isOpen = false;
  public readonly written: string[] = [];
  public openError: Error | null = null;
  public writeError: Error | null = null;

  open(callback: (err: Error | null) => void) {
    this.isOpen = this.openError === null;
    callback(this.openError);
  }

  close(callback: (err: Error | null) => void) {
    this.isOpen = false;
    callback(null);
    this.emit('close', null);
  }

  write(data: Buffer, callback: (err: Error | null | undefined) => void): boolean {
    this.written.push(data.toString('ascii'));
    callback(this.writeError);
    return true;
  }
}

function setup(options: SerialTransportOptions = { path: '/dev/ttyUSB0' }) {
  const port = new FakePort();
  const factory = jest.fn((_opts: Required<SerialTransportOptions>) => port);
  const transport = new SerialTransport(options, factory);
  return { port, factory, transport };
}

describe('SerialTransport', () => {
  test('opens the port at 9600 baud by default', async () => {
    const { transport, factory, port } = setup();
    await transport.open();
    expect(factory).toHaveBeenCalledWith({ path: '/dev/ttyUSB0', baudRate: 9600 });
    expect(port.isOpen).toBe(true);
    expect(transport.descriptor).toBe('serial:///dev/ttyUSB0');
  });

  test('custom baud rate is passed through', async () => {
    const { transport, factory } = setup({ path: 'COM3', baudRate: 19200 });
    await transport.open();
    expect(factory).toHaveBeenCalledWith({ path: 'COM3', baudRate: 19200 });
  });

  test('open failure rejects', async () => {
    const { transport, port } = setup();
    port.openError = new Error('Permission denied');
    await expect(transport.open()).rejects.toThrow('Permission denied');
    expect(() => transport.send(Buffer.from("'@112'"))).toThrow('Serial port not opened');
  });

  test('writes commands and forwards inbound data', async () => {
    const { transport, port } = setup();
    await transport.open();
    const chunks: string[] = [];
    transport.events.on('data', (chunk) => chunks.push(chunk.toString('ascii')));

    transport.send(Buffer.from("'@11Q'", 'ascii'));
    port.emit('data', Buffer.from("'@11", 'ascii'));
    port.emit('data', Buffer.from("Q'", 'ascii'));

    expect(port.written).toEqual(["'@11Q'"]);
    expect(chunks).toEqual(["'@11", "Q'"]);
  });

  test('write failure is reported as an error event', async () => {
    const { transport, port } = setup();
    await transport.open();
    const errors: Error[] = [];
    transport.events.on('error', (err) => errors.push(err));
    port.writeError = new Error('EIO');
    transport.send(Buffer.from("'@112'"));
    expect(errors.map((e) => e.message)).toEqual(['EIO']);
  });

  test('closing the transport emits close without an error', async () => {
    const { transport } = setup();
    await transport.open();
    const closed = jest.fn();
    transport.events.on('close', closed);
    await transport.close();
    expect(closed).toHaveBeenCalledWith(undefined);
  });

  test('unexpected port closure carries an error', async () => {
    const { transport, port } = setup();
    await transport.open();
    const closed = jest.fn();
    transport.events.on('close', closed);
    port.emit('close', null);
    expect(closed).toHaveBeenCalledTimes(1);
    expect(closed.mock.calls[0][0]).toBeInstanceOf(Error);
    expect(closed.mock.calls[0][0].message).toBe('Serial port /dev/ttyUSB0 closed unexpectedly');
  });

  test('a port error after closure does not go unhandled', async () => {
    const { transport, port } = setup();
    await transport.open();
    await transport.close();
    expect(port.listenerCount('error')).toBe(1);
    expect(() => port.emit('error', new Error('late EIO'))).not.toThrow();
  });
});
