import { Duplex } from "stream";
import { CancelledError, IoError } from "./errors";

export interface RelayResult {
  /** Bytes copied from the client to the upstream */
  uploaded: number;
  /** Bytes copied from the upstream to the client */
  downloaded: number;
}

type Listener = Parameters<Duplex["on"]>[1];

export class RelayError extends IoError {
  readonly uploaded: number;
  readonly downloaded: number;

  constructor(message: string, result: RelayResult, options?: { cause?: unknown }) {
    super(message, options);
    this.uploaded = result.uploaded;
    this.downloaded = result.downloaded;
  }
}

/**
 * Pipes `client` and `upstream` into each other until one side reaches EOF
 * (and the EOF has been flushed to the other side) or either side fails or
 * closes without EOF, then destroys both.
 */
export function relay(
  client: Duplex,
  upstream: Duplex,
  signal?: AbortSignal
): Promise<RelayResult> {
  const result: RelayResult = { uploaded: 0, downloaded: 0 };

  return new Promise<RelayResult>((resolve, reject) => {
    let settled = false;
    const ended = new Set<Duplex>();
    const detach: Array<() => void> = [];

    const listen = (stream: Duplex, event: string, listener: Listener) => {
      stream.on(event, listener);
      detach.push(() => stream.removeListener(event, listener));
    };

    const settle = (err?: Error) => {
      if (settled) return;
      settled = true;

      client.unpipe(upstream);
      upstream.unpipe(client);
      detach.forEach((remove) => remove());
      signal?.removeEventListener("abort", onAbort);

      client.destroy();
      upstream.destroy();

      if (err) {
        reject(err);
      } else {
        resolve({ ...result });
      }
    };

    const onAbort = () => settle(new CancelledError(undefined, { cause: signal?.reason }));

    if (signal?.aborted) {
      onAbort();
      return;
    }

    const wire = (source: Duplex, dest: Duplex, count: (n: number) => void) => {
      listen(source, "data", (chunk: Buffer) => count(chunk.length));
      listen(source, "end", () => {
        ended.add(source);
        // pipe ends `dest`; done once that end has been flushed
        if (dest.writableFinished) {
          settle();
        } else {
          listen(dest, "finish", () => settle());
        }
      });
      listen(source, "error", (err: Error) =>
        settle(new RelayError(err.message, result, { cause: err }))
      );
      listen(source, "close", () => {
        if (!ended.has(source)) {
          settle(new RelayError("stream closed before end of stream", result));
        }
      });
    };

    const gone = [client, upstream].find((stream) => stream.destroyed);
    if (gone) {
      const cause = gone.errored ?? undefined;
      settle(new RelayError(cause ? cause.message : "stream closed before relay", result, { cause }));
      return;
    }

    wire(client, upstream, (n) => (result.uploaded += n));
    wire(upstream, client, (n) => (result.downloaded += n));
    signal?.addEventListener("abort", onAbort, { once: true });

    client.pipe(upstream);
    upstream.pipe(client);
  });
}
