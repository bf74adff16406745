import { MalformedChunkError } from './errors';

// The amplifier speaks 7-bit ASCII only

export function decodeAscii(buf: Buffer): string {
  const bad = buf.findIndex(b => b > 0x7f);
  if (bad >= 0) {
    throw new MalformedChunkError(bad, buf[bad]);
  }
  return buf.toString('ascii');
}

export function encodeAscii(str: string): Buffer {
  for (let i = 0; i < str.length; i++) {
    if (str.charCodeAt(i) > 0x7f) {
      throw new TypeError(`Cannot encode non-ASCII character at offset ${i}`);
    }
  }
  return Buffer.from(str, 'ascii');
}

export function hex(buf: Buffer): string {
  return [...buf].map(b => b.toString(16).padStart(2, '0')).join(' ');
}
