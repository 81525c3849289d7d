import type { Writable } from 'stream';

/** Connection a job streams results over. `false` means the connection is gone for good. */
export interface Transport {
  write(text: string): boolean;
}

export type Framer = (text: string) => string;

export const newlineFramer: Framer = text => text + '\n';

export const DEFAULT_MAX_BUFFERED_BYTES = 16 * 1024 * 1024;

/**
 * Writes framed lines to a stream. Jobs write synchronously, so a peer that
 * stops reading leaves output queued in the stream; once more than
 * `maxBuffered` bytes are queued the connection counts as failed.
 */
export class StreamTransport implements Transport {
  constructor(
    private readonly out: Writable,
    private readonly frame: Framer = newlineFramer,
    private readonly maxBuffered: number = DEFAULT_MAX_BUFFERED_BYTES,
  ) {}

  write(text: string): boolean {
    if (this.out.destroyed || this.out.writableEnded) return false;
    if (this.out.writableLength > this.maxBuffered) return false;
    try {
      this.out.write(this.frame(text));
      return true;
    } catch {
      return false;
    }
  }
}

export class BufferTransport implements Transport {
  readonly lines: string[] = [];
  write(text: string): boolean {
    this.lines.push(text);
    return true;
  }
}
