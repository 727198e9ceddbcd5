import net, { AddressInfo, Server, Socket } from "net";
import { EventEmitter } from "events";
import { Request } from "./acceptor";
import { Address } from "./address";
import { Connector, directConnector } from "./connector";
import { ConnectionFilter, ConnectionOutcome, Endpoint, handleConnection } from "./connection";
import { Logger, createLogger } from "./logger";
import { Shutdown } from "./shutdown";

export interface SocksServerOptions {
  /** Opens upstream connections; defaults to a direct TCP connect */
  connector?: Connector;
  connectionFilter?: ConnectionFilter;
  logger?: Logger;
}

// Module specific events
export const EVENTS = {
  CONNECTION_FILTER: "connectionFilter",
  HANDSHAKE: "handshake",
  PROXY_CONNECT: "proxyConnect",
  PROXY_DISCONNECT: "proxyDisconnect",
  PROXY_ERROR: "proxyError",
} as const;

export interface SocksServerEvents {
  [EVENTS.CONNECTION_FILTER]: [destination: Endpoint, origin: Endpoint];
  [EVENTS.HANDSHAKE]: [peer: string, request: Request];
  [EVENTS.PROXY_CONNECT]: [request: Request, bound: { address: Address; port: number }];
  [EVENTS.PROXY_DISCONNECT]: [outcome: ConnectionOutcome];
  [EVENTS.PROXY_ERROR]: [outcome: ConnectionOutcome];
}

/**
 * The following RFC may be useful as background:
 *
 * https://www.ietf.org/rfc/rfc1928.txt - NO_AUTH SOCKS5
 *
 * Each accepted socket runs as its own task under a shared shutdown signal.
 * `close()` stops accepting, cancels every live connection and resolves once
 * all of them have finished.
 */
export class SocksServer extends EventEmitter<SocksServerEvents> {
  public readonly server: Server;
  private readonly options: SocksServerOptions;
  private readonly logger: Logger;
  private readonly shutdown: Shutdown;

  constructor(options?: SocksServerOptions) {
    super();

    this.options = options || {};
    this.logger = this.options.logger ?? createLogger();
    this.shutdown = new Shutdown((err) => {
      this.logger.error(`Connection task failed: ${String(err)}`);
    });

    this.server = net.createServer((socket: Socket) => this.accept(socket));

    // stop accepting as soon as shutdown starts
    this.shutdown.signal.addEventListener(
      "abort",
      () => {
        if (this.server.listening) {
          this.server.close();
        }
      },
      { once: true }
    );
  }

  /**
   * Number of connection tasks still running
   */
  get connections(): number {
    return this.shutdown.running;
  }

  private accept(socket: Socket): void {
    if (this.shutdown.requested) {
      socket.destroy();
      return;
    }

    this.logger.debug(`Accepted connection from ${socket.remoteAddress}:${socket.remotePort}`);

    this.shutdown.spawn(async (signal) => {
      const outcome = await handleConnection(
        socket,
        {
          connector: this.options.connector ?? directConnector,
          connectionFilter: this.options.connectionFilter,
          logger: this.logger,
          onHandshake: (peer, request) => this.emit(EVENTS.HANDSHAKE, peer, request),
          onConnect: (request, bound) => this.emit(EVENTS.PROXY_CONNECT, request, bound),
          onFiltered: (destination, origin) =>
            this.emit(EVENTS.CONNECTION_FILTER, destination, origin),
        },
        signal
      );

      if (outcome.error !== undefined) {
        this.emit(EVENTS.PROXY_ERROR, outcome);
      }
      this.emit(EVENTS.PROXY_DISCONNECT, outcome);
    });
  }

  /**
   * Start listening for connections on the given port and host. Rejects if
   * the address cannot be bound.
   */
  listen(port: number, host?: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.server.removeListener("listening", onListening);
        reject(err);
      };
      const onListening = () => {
        this.server.removeListener("error", onError);
        const address = this.address();
        if (address === null) {
          reject(new Error("server is not listening"));
          return;
        }
        this.logger.info(`Listening on ${address.address}:${address.port}`);
        resolve(address);
      };

      this.server.once("error", onError);
      this.server.once("listening", onListening);
      this.server.listen(port, host);
    });
  }

  /**
   * Closes the server and all active sessions
   */
  async close(): Promise<void> {
    const closed = this.server.listening
      ? new Promise<void>((resolve) => this.server.once("close", () => resolve()))
      : Promise.resolve();

    this.shutdown.shutdown();
    await this.shutdown.waitShutdownComplete();
    await closed;
  }

  /**
   * Returns the address the server is listening on
   */
  address(): AddressInfo | null {
    const address = this.server.address();
    return address !== null && typeof address === "object" ? address : null;
  }
}

/**
 * Creates a new SOCKS5 server instance
 */
export function createServer(options?: SocksServerOptions): SocksServer {
  return new SocksServer(options);
}
