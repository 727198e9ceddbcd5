import * as http from "http";
import net, { AddressInfo } from "net";
import { Duplex } from "stream";
import { createServer, SocksServerOptions } from "../src/server";
import { silentLogger } from "../src/logger";

export const TEST_HOST = "127.0.0.1";

interface TargetServer {
  server: http.Server;
  port: number;
}

interface Socks5Server {
  server: ReturnType<typeof createServer>;
  port: number;
}

interface TcpServer {
  server: net.Server;
  port: number;
  /** Sockets the server has accepted so far */
  sockets: net.Socket[];
}

/**
 * Creates an HTTP server for testing SOCKS5 proxy connections
 */
export async function createTargetServer(): Promise<TargetServer> {
  return new Promise((resolve) => {
    const server = http.createServer((req, res) => {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("Hello from target server!");
    });

    server.listen(0, TEST_HOST, () => {
      const port = (server.address() as AddressInfo).port;
      resolve({ server, port });
    });
  });
}

function listenTcp(onSocket: (socket: net.Socket) => void): Promise<TcpServer> {
  return new Promise((resolve) => {
    const sockets: net.Socket[] = [];
    const server = net.createServer((socket) => {
      sockets.push(socket);
      socket.on("error", () => socket.destroy());
      onSocket(socket);
    });

    server.listen(0, TEST_HOST, () => {
      const port = (server.address() as AddressInfo).port;
      resolve({ server, port, sockets });
    });
  });
}

/**
 * Creates a TCP server that writes back everything it receives
 */
export function createEchoServer(): Promise<TcpServer> {
  return listenTcp((socket) => socket.pipe(socket));
}

/**
 * Creates a TCP server that reads and discards everything and never answers
 */
export function createSilentServer(): Promise<TcpServer> {
  return listenTcp((socket) => socket.resume());
}

export function closeTcpServer({ server, sockets }: TcpServer): Promise<void> {
  sockets.forEach((socket) => socket.destroy());
  return new Promise((resolve) => server.close(() => resolve()));
}

/**
 * Creates a SOCKS5 server for testing
 */
export async function createTestSocks5Server(
  options?: SocksServerOptions
): Promise<Socks5Server> {
  const server = createServer({ logger: silentLogger, ...options });
  const { port } = await server.listen(0, TEST_HOST);
  return { server, port };
}

/**
 * Returns a loopback port nothing is listening on
 */
export async function closedPort(): Promise<number> {
  const { server, port } = await listenTcp(() => undefined);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

/**
 * Two in-memory duplex streams wired to each other: bytes written to one are
 * read from the other, and ending one ends the other's readable side.
 */
export function createDuplexPair(): [Duplex, Duplex] {
  const make = (peer: () => Duplex) =>
    new Duplex({
      read() {
        // data is pushed by the peer
      },
      write(chunk: Buffer, _encoding, callback) {
        peer().push(chunk);
        callback();
      },
      final(callback) {
        peer().push(null);
        callback();
      },
    });

  const left: Duplex = make(() => right);
  const right: Duplex = make(() => left);
  return [left, right];
}

/**
 * Buffers everything a stream emits and hands it out by exact byte counts
 */
export class ByteCollector {
  private buffered = Buffer.alloc(0);
  private ended = false;
  private waiters: Array<() => void> = [];

  constructor(stream: Duplex) {
    stream.on("data", (chunk: Buffer) => {
      this.buffered = Buffer.concat([this.buffered, chunk]);
      this.notify();
    });
    stream.on("end", () => this.finish());
    stream.on("close", () => this.finish());
    stream.on("error", () => this.finish());
  }

  get length(): number {
    return this.buffered.length;
  }

  get closed(): boolean {
    return this.ended;
  }

  async read(length: number): Promise<Buffer> {
    while (this.buffered.length < length) {
      if (this.ended) {
        throw new Error(`stream closed after ${this.buffered.length} of ${length} bytes`);
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    const out = this.buffered.subarray(0, length);
    this.buffered = this.buffered.subarray(length);
    return out;
  }

  /**
   * Resolves with whatever is left once the stream has closed
   */
  async rest(): Promise<Buffer> {
    while (!this.ended) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    const out = this.buffered;
    this.buffered = Buffer.alloc(0);
    return out;
  }

  private finish(): void {
    this.ended = true;
    this.notify();
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((wake) => wake());
  }
}

/**
 * A raw TCP client connected to `port` with a collector on its input
 */
export function connectRaw(port: number): Promise<{ socket: net.Socket; input: ByteCollector }> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection(port, TEST_HOST, () => {
      socket.removeListener("error", reject);
      resolve({ socket, input: new ByteCollector(socket) });
    });
    socket.once("error", reject);
  });
}

/**
 * Greeting offering only "no authentication"
 */
export const NO_AUTH_GREETING = [0x05, 0x01, 0x00];

export function connectRequestIPv4(ip: [number, number, number, number], port: number, cmd = 0x01): number[] {
  return [0x05, cmd, 0x00, 0x01, ...ip, port >> 8, port & 0xff];
}

export function connectRequestDomain(domain: string, port: number, cmd = 0x01): number[] {
  const bytes = Array.from(Buffer.from(domain, "utf8"));
  return [0x05, cmd, 0x00, 0x03, bytes.length, ...bytes, port >> 8, port & 0xff];
}
