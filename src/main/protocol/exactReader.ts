import type { Readable } from 'stream';
import { TransferError } from '../utils/errors';

/** Anything that can hand out exactly `length` bytes or fail. */
export interface ByteSource {
  readExact(length: number): Promise<Buffer>;
}

export interface ExactReaderOptions {
  /** Buffered bytes above which the underlying stream is paused. */
  highWaterMark?: number;
}

interface PendingRead {
  length: number;
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
}

const DEFAULT_HIGH_WATER_MARK = 64 * 1024;

/**
 * Exact-length reads over a byte stream that may deliver data in arbitrary
 * fragments.
 *
 * `readExact(n)` resolves with precisely `n` bytes, or rejects with an
 * `IncompleteStream` error once the stream ends or errors first. A short
 * buffer is never returned. Only one read may be outstanding at a time.
 */
export class ExactReader implements ByteSource {
  private buf: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private ended = false;
  private failure: Error | null = null;
  private readonly highWaterMark: number;

  constructor(
    private readonly stream: Readable,
    options: ExactReaderOptions = {}
  ) {
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;

    stream.on('data', this.onData);
    stream.on('end', this.onEnd);
    stream.on('close', this.onEnd);
    stream.on('error', this.onError);
  }

  /** Bytes received from the stream but not yet handed out. */
  get bufferedLength(): number {
    return this.buf.length;
  }

  readExact(length: number): Promise<Buffer> {
    if (!Number.isSafeInteger(length) || length < 0) {
      return Promise.reject(new RangeError(`Invalid read length: ${length}`));
    }
    if (this.pending) {
      return Promise.reject(new Error('readExact called while another read is pending'));
    }
    if (length === 0) {
      return Promise.resolve(Buffer.alloc(0));
    }

    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { length, resolve, reject };
      this.settle();
    });
  }

  /** Detach from the stream. Buffered bytes are discarded. */
  dispose(): void {
    this.stream.off('data', this.onData);
    this.stream.off('end', this.onEnd);
    this.stream.off('close', this.onEnd);
    this.stream.off('error', this.onError);
    this.buf = Buffer.alloc(0);
    if (this.pending) {
      const { length, reject } = this.pending;
      this.pending = null;
      reject(TransferError.incompleteStream(length, 0, 'reader disposed'));
    }
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    this.buf = this.buf.length === 0 ? bytes : Buffer.concat([this.buf, bytes]);
    if (this.buf.length >= this.highWaterMark) {
      this.stream.pause();
    }
    this.settle();
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.settle();
  };

  private readonly onError = (error: Error): void => {
    this.failure = error;
    this.ended = true;
    this.settle();
  };

  private settle(): void {
    const pending = this.pending;

    if (pending && this.buf.length >= pending.length) {
      const data = Buffer.from(this.buf.subarray(0, pending.length));
      this.buf = this.buf.subarray(pending.length);
      this.pending = null;
      pending.resolve(data);
    } else if (pending && this.ended) {
      this.pending = null;
      pending.reject(
        TransferError.incompleteStream(pending.length, this.buf.length, this.failure ?? undefined)
      );
      return;
    }

    const wanted = Math.max(this.highWaterMark, this.pending?.length ?? 0);
    if (!this.ended && this.buf.length < wanted && this.stream.isPaused()) {
      this.stream.resume();
    }
  }
}
