import { Readable, Writable } from "stream";
import { CancelledError, IoError, UnexpectedEndError } from "./errors";

/**
 * Reads exact byte counts from a stream in paused mode.
 *
 * Bytes beyond what was asked for stay buffered inside the stream itself, so
 * whatever the peer sends right after the handshake is still there for the
 * relay once the reader is done.
 */
export class StreamReader {
  private readonly stream: Readable;
  private readonly signal?: AbortSignal;

  constructor(stream: Readable, signal?: AbortSignal) {
    this.stream = stream;
    this.signal = signal;
  }

  /**
   * Read an 8-bit unsigned integer
   */
  async readUInt8(): Promise<number> {
    const buf = await this.readExact(1);
    return buf.readUInt8(0);
  }

  /**
   * Read a 16-bit unsigned integer in big-endian format
   */
  async readUInt16BE(): Promise<number> {
    const buf = await this.readExact(2);
    return buf.readUInt16BE(0);
  }

  /**
   * Read exactly `length` bytes
   */
  async readExact(length: number): Promise<Buffer> {
    if (length === 0) {
      return Buffer.alloc(0);
    }

    for (;;) {
      this.throwIfAborted();

      const chunk: unknown = this.stream.read(length);
      if (Buffer.isBuffer(chunk)) {
        // an ended stream hands back whatever is left, even if short
        if (chunk.length < length) {
          throw new UnexpectedEndError(
            `stream ended after ${chunk.length} of ${length} bytes`
          );
        }
        return chunk;
      }
      if (chunk !== null) {
        throw new IoError("stream is not in binary mode");
      }

      if (this.stream.readableEnded) {
        throw new UnexpectedEndError(`stream ended before ${length} bytes`);
      }
      if (this.stream.destroyed) {
        throw new IoError("stream destroyed", { cause: this.stream.errored });
      }

      await this.waitReadable(length);
    }
  }

  private throwIfAborted(): void {
    if (this.signal?.aborted) {
      throw new CancelledError(undefined, { cause: this.signal.reason });
    }
  }

  private waitReadable(length: number): Promise<void> {
    const { stream, signal } = this;

    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        stream.removeListener("readable", onReadable);
        stream.removeListener("end", onEnd);
        stream.removeListener("error", onError);
        stream.removeListener("close", onClose);
        signal?.removeEventListener("abort", onAbort);
      };
      const onReadable = () => {
        cleanup();
        resolve();
      };
      const onEnd = () => {
        cleanup();
        reject(new UnexpectedEndError(`stream ended before ${length} bytes`));
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new IoError(err.message, { cause: err }));
      };
      const onClose = () => {
        cleanup();
        reject(new IoError("stream closed", { cause: stream.errored }));
      };
      const onAbort = () => {
        cleanup();
        reject(new CancelledError(undefined, { cause: signal?.reason }));
      };

      stream.on("readable", onReadable);
      stream.once("end", onEnd);
      stream.once("error", onError);
      stream.once("close", onClose);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

/**
 * Utility class for building binary messages
 */
export class BinaryWriter {
  private readonly chunks: Buffer[] = [];

  word8(value: number): this {
    const buf = Buffer.allocUnsafe(1);
    buf.writeUInt8(value, 0);
    this.chunks.push(buf);
    return this;
  }

  word16be(value: number): this {
    const buf = Buffer.allocUnsafe(2);
    buf.writeUInt16BE(value, 0);
    this.chunks.push(buf);
    return this;
  }

  bytes(value: Uint8Array | readonly number[]): this {
    this.chunks.push(Buffer.from(value));
    return this;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Write `data` and settle once the stream has accepted it
 */
export function writeAll(
  stream: Writable,
  data: Uint8Array,
  signal?: AbortSignal
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(undefined, { cause: signal.reason }));
      return;
    }

    const onAbort = () => {
      reject(new CancelledError(undefined, { cause: signal?.reason }));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    stream.write(data, (err) => {
      signal?.removeEventListener("abort", onAbort);
      if (err) {
        reject(new IoError(err.message, { cause: err }));
      } else {
        resolve();
      }
    });
  });
}
