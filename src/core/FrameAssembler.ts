import { decodeAscii, hex } from '../utils/codec';
import { dbg, dbgV } from '../utils/debug';
import { MalformedChunkError } from '../utils/errors';
import { MAX_PENDING_LENGTH, MESSAGE_END, MESSAGE_START } from './FlexConstants';

export interface FrameAssemblerHandlers {
  onFrame: (frame: string) => void; // one complete '@...' frame, end token included
  onOverflow?: (dropped: string) => void;
  onMalformed?: (err: MalformedChunkError, chunk: Buffer) => void;
}

/**
 * Rebuilds '@...' frames from transport chunks split at arbitrary points.
 *
 * A partial frame is kept between chunks, capped at MAX_PENDING_LENGTH
 * characters; a fragment that would grow past the cap is dropped and the
 * next start token begins a clean frame. Chunks containing non-ASCII bytes
 * are dropped whole and leave the pending fragment as it was.
 *
 * One instance per connection, not safe for interleaved use.
 */
export class FrameAssembler {
  private buffer = '';

  constructor(
    private readonly handlers: FrameAssemblerHandlers,
    private readonly maxPending = MAX_PENDING_LENGTH
  ) {}

  /** Partial frame waiting for its end token ('' when none) */
  get pending(): string { return this.buffer; }

  push(chunk: Buffer) {
    let text: string;
    try {
      text = decodeAscii(chunk);
    } catch (err) {
      if (!(err instanceof MalformedChunkError)) throw err;
      dbg(`Dropping malformed chunk [${hex(chunk)}]: ${err.message}`);
      this.handlers.onMalformed?.(err, chunk);
      return;
    }
    dbgV(`RX chunk "${text}"`);
    this.consume(text);
  }

  reset() {
    this.buffer = '';
  }

  private consume(text: string) {
    let firstSegment = true;
    for (const segment of text.split(MESSAGE_START)) {
      if (segment.length === 0) {
        firstSegment = false;
        continue;
      }
      // split() removed the start token in front of every later segment
      if (!firstSegment) this.buffer = MESSAGE_START;

      if (this.buffer.startsWith(MESSAGE_START)) {
        const end = segment.indexOf(MESSAGE_END);
        if (end < 0) {
          if (this.buffer.length + segment.length <= this.maxPending) {
            this.buffer += segment;
          } else {
            const dropped = this.buffer + segment;
            this.buffer = '';
            dbg(`Pending frame exceeds ${this.maxPending} chars, dropping "${dropped}"`);
            this.handlers.onOverflow?.(dropped);
          }
          // Later segments of this chunk are not processed
          return;
        }
        const frame = this.buffer + segment.slice(0, end + 1);
        this.buffer = '';
        this.handlers.onFrame(frame);
      } else {
        dbgV(`Ignoring data outside a frame: "${segment}"`);
      }
      firstSegment = false;
    }
  }
}
