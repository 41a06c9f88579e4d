import type { Duplex } from "node:stream";
import {
  DEFAULT_MAX_IO_ATTEMPTS,
  PeerClosedError,
  retryIo,
  withTimeout,
} from "@wordgate/schemas";

/** What the session engine needs from a transport: one message in, one message out. */
export interface MessageChannel {
  readMessage(): Promise<Buffer>;
  writeMessage(data: Buffer | string): Promise<void>;
}

export interface FramedStreamOptions {
  /**
   * How long the peer must stay quiet before unterminated bytes count as a
   * message. Fragments that arrive inside the window are joined. Default: 50
   */
  coalesceMs?: number;
  /** Reject a read that waits longer than this. Default: no limit */
  readTimeoutMs?: number;
  /** Cap on attempts for a write that keeps failing transiently. Default: 100 */
  maxIoAttempts?: number;
  /** Buffered bytes without a newline are handed over once they reach this size. Default: 4096 */
  maxMessageBytes?: number;
}

interface PendingRead {
  resolve: (message: Buffer) => void;
  reject: (err: Error) => void;
}

const NEWLINE = 0x0a;

/**
 * Turns a byte stream into whole messages. A message ends at a newline, or,
 * for clients that never send one, when the peer goes quiet. Partial writes
 * and backpressure are handled by the stream itself; `writeMessage` resolves
 * once every byte has been handed to the socket.
 */
export class FramedStream implements MessageChannel {
  private readonly stream: Duplex;
  private readonly coalesceMs: number;
  private readonly readTimeoutMs: number | undefined;
  private readonly maxIoAttempts: number;
  private readonly maxMessageBytes: number;

  private buffer: Buffer = Buffer.alloc(0);
  private lastDataAt = 0;
  private ended = false;
  private failure: Error | null = null;
  private pending: PendingRead | null = null;
  private quietTimer: ReturnType<typeof setTimeout> | null = null;
  private detached = false;

  constructor(stream: Duplex, options?: FramedStreamOptions) {
    this.stream = stream;
    this.coalesceMs = options?.coalesceMs ?? 50;
    this.readTimeoutMs = options?.readTimeoutMs;
    this.maxIoAttempts = options?.maxIoAttempts ?? DEFAULT_MAX_IO_ATTEMPTS;
    this.maxMessageBytes = options?.maxMessageBytes ?? 4096;

    stream.on("data", this.onData);
    stream.on("end", this.onEnd);
    stream.on("close", this.onEnd);
    stream.on("error", this.onError);
  }

  readMessage(): Promise<Buffer> {
    if (this.detached) return Promise.reject(new PeerClosedError("framed stream was detached"));
    if (this.pending) return Promise.reject(new Error("a read is already pending on this stream"));

    const read = new Promise<Buffer>((resolve, reject) => {
      this.pending = { resolve, reject };
      this.settle();
    });
    return withTimeout(read, this.readTimeoutMs, "read", () => {
      this.pending = null;
      this.clearQuietTimer();
    });
  }

  async writeMessage(data: Buffer | string): Promise<void> {
    const payload = typeof data === "string" ? Buffer.from(data) : data;
    await retryIo(() => this.writeOnce(payload), {
      operation: "write",
      maxAttempts: this.maxIoAttempts,
    });
  }

  /** Bytes received but not yet returned by `readMessage`. */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  /** Stops listening to the stream and fails any pending read. The stream itself is left alone. */
  detach(): void {
    if (this.detached) return;
    this.detached = true;
    this.clearQuietTimer();
    this.stream.off("data", this.onData);
    this.stream.off("end", this.onEnd);
    this.stream.off("close", this.onEnd);
    // The error listener stays so a late socket error is recorded rather than thrown.
    const pending = this.pending;
    this.pending = null;
    pending?.reject(new PeerClosedError("framed stream was detached"));
  }

  private writeOnce(payload: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.stream.destroyed || !this.stream.writable) {
        reject(new PeerClosedError("cannot write: stream is closed"));
        return;
      }
      // The callback fires once the chunk has reached the socket, after any backpressure.
      this.stream.write(payload, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);
    this.lastDataAt = Date.now();
    this.clearQuietTimer();
    this.settle();
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.settle();
  };

  private readonly onError = (err: Error): void => {
    this.failure = err;
    this.settle();
  };

  private settle(): void {
    const pending = this.pending;
    if (!pending) return;

    const newline = this.buffer.indexOf(NEWLINE);
    if (newline >= 0) {
      this.deliver(pending, this.take(newline + 1));
      return;
    }

    if (this.buffer.length > 0) {
      if (this.ended || this.failure || this.buffer.length >= this.maxMessageBytes) {
        this.deliver(pending, this.take(this.buffer.length));
        return;
      }
      const quietFor = Date.now() - this.lastDataAt;
      if (quietFor >= this.coalesceMs) {
        this.deliver(pending, this.take(this.buffer.length));
        return;
      }
      this.armQuietTimer(this.coalesceMs - quietFor);
      return;
    }

    if (this.failure) {
      this.pending = null;
      pending.reject(this.failure);
    } else if (this.ended) {
      this.pending = null;
      pending.reject(new PeerClosedError());
    }
  }

  private deliver(pending: PendingRead, message: Buffer): void {
    this.pending = null;
    this.clearQuietTimer();
    pending.resolve(message);
  }

  private take(length: number): Buffer {
    const message = this.buffer.subarray(0, length);
    this.buffer = this.buffer.subarray(length);
    return message;
  }

  private armQuietTimer(ms: number): void {
    if (this.quietTimer) return;
    this.quietTimer = setTimeout(() => {
      this.quietTimer = null;
      const pending = this.pending;
      if (pending && this.buffer.length > 0) this.deliver(pending, this.take(this.buffer.length));
    }, ms);
    this.quietTimer.unref();
  }

  private clearQuietTimer(): void {
    if (this.quietTimer) {
      clearTimeout(this.quietTimer);
      this.quietTimer = null;
    }
  }
}
