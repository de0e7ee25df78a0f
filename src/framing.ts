import { TELEGRAM_LEN } from "./telegram.js";

/** 256 queued telegrams, 32 KiB. */
export const MAX_BUFFER_BYTES = TELEGRAM_LEN * 256;

export interface PushResult {
  frames: Buffer[];
  /** Bytes dropped from the front to stay within capacity. 0 when none. */
  discarded: number;
}

/**
 * Receive-side accumulator: cuts a TCP byte stream into whole telegrams.
 *
 * Chunk boundaries are arbitrary, so bytes are held until 128 of them are
 * available. When a push would grow the buffer past `capacity`, the oldest
 * bytes are discarded; the frame grid may be misaligned afterwards.
 */
export class FrameAssembler {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(readonly capacity: number = MAX_BUFFER_BYTES) {
    if (!Number.isInteger(capacity) || capacity < TELEGRAM_LEN) {
      throw new RangeError(`capacity must be an integer >= ${TELEGRAM_LEN}, got ${capacity}`);
    }
  }

  get pending(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array): PushResult {
    let buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);

    let discarded = 0;
    if (buffer.length > this.capacity) {
      discarded = buffer.length - this.capacity;
      buffer = buffer.subarray(discarded);
    }

    const frames: Buffer[] = [];
    let offset = 0;
    while (buffer.length - offset >= TELEGRAM_LEN) {
      // copy so a frame never pins the whole chunk
      frames.push(Buffer.from(buffer.subarray(offset, offset + TELEGRAM_LEN)));
      offset += TELEGRAM_LEN;
    }

    this.buffer = Buffer.from(buffer.subarray(offset));
    return { frames, discarded };
  }

  /** Drops any partial frame. */
  reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}
