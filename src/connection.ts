import { Socket } from "net";
import { Acceptor, Request, formatRequest } from "./acceptor";
import { Address, formatAddress } from "./address";
import { RFC_1928_COMMANDS, failStatusName } from "./constants";
import { Connector, Upstream } from "./connector";
import {
  ConnectionNotAllowedError,
  UnsupportedCommandError,
  failStatusFor,
} from "./errors";
import { Logger } from "./logger";
import { RelayError, relay } from "./relay";

export interface Endpoint {
  address: string;
  port: number;
}

export type ConnectionFilter = (
  destination: Endpoint,
  origin: Endpoint,
  callback: (err?: Error) => void
) => void;

/**
 * What happened to one proxied connection, produced once for logging
 */
export interface ConnectionOutcome {
  peer: string;
  request?: Request;
  uploaded: number;
  downloaded: number;
  error?: unknown;
}

export interface ConnectionHooks {
  connector: Connector;
  connectionFilter?: ConnectionFilter;
  logger: Logger;
  onHandshake?(peer: string, request: Request): void;
  onConnect?(request: Request, bound: { address: Address; port: number }): void;
  onFiltered?(destination: Endpoint, origin: Endpoint): void;
}

function checkFilter(
  filter: ConnectionFilter,
  destination: Endpoint,
  origin: Endpoint
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    filter(destination, origin, (err) => {
      if (err) {
        reject(new ConnectionNotAllowedError(err.message, { cause: err }));
      } else {
        resolve();
      }
    });
  });
}

/**
 * Connects upstream for `request`. Any failure is answered with a failure
 * reply before it is rethrown.
 */
async function openUpstream(
  socket: Socket,
  request: Request,
  acceptor: Acceptor<Socket>,
  hooks: ConnectionHooks,
  signal: AbortSignal
): Promise<Upstream> {
  try {
    if (request.command !== RFC_1928_COMMANDS.CONNECT) {
      throw new UnsupportedCommandError(request.command);
    }

    if (hooks.connectionFilter) {
      const destination = { address: request.address.host, port: request.port };
      const origin = { address: socket.remoteAddress ?? "", port: socket.remotePort ?? 0 };
      try {
        await checkFilter(hooks.connectionFilter, destination, origin);
      } catch (err) {
        hooks.onFiltered?.(destination, origin);
        throw err;
      }
    }

    return await hooks.connector(request, signal);
  } catch (err) {
    const status = failStatusFor(err);
    hooks.logger.debug(`Replying ${failStatusName(status)} to ${formatRequest(request)}`);
    const replied = await acceptor.replyFailure(status, signal);
    if (!replied.ok) {
      hooks.logger.debug(`Failure reply not delivered: ${String(replied.error)}`);
    }
    throw err;
  }
}

/**
 * Handles one accepted connection end to end: handshake, upstream connect,
 * reply, relay. Never rejects; the socket is destroyed on every path.
 */
export async function handleConnection(
  socket: Socket,
  hooks: ConnectionHooks,
  signal: AbortSignal
): Promise<ConnectionOutcome> {
  const peer = `${socket.remoteAddress}:${socket.remotePort}`;
  const outcome: ConnectionOutcome = { peer, uploaded: 0, downloaded: 0 };
  const { logger } = hooks;

  // errors surface through the awaited reads and writes below
  const onSocketError = (err: Error) => {
    logger.debug(`Socket error from ${peer}: ${err.message}`);
  };
  socket.on("error", onSocketError);

  let upstream: Upstream | undefined;

  try {
    const { request, acceptor } = await Acceptor.accept(socket, signal);
    outcome.request = request;
    hooks.onHandshake?.(peer, request);
    logger.info(`Proxying ${formatRequest(request)} for ${peer}`);

    upstream = await openUpstream(socket, request, acceptor, hooks, signal);
    // connectors drop their own error handlers once connected; the relay reports it
    upstream.socket.on("error", (err: Error) => {
      logger.debug(`Upstream error for ${peer}: ${err.message}`);
    });
    const { bound } = upstream;
    logger.info(
      `Connected to ${formatRequest(request)}, bound ${formatAddress(bound.address, bound.port)}`
    );
    hooks.onConnect?.(request, bound);

    const client = await acceptor.replySuccess(bound.address, bound.port, signal);
    const { uploaded, downloaded } = await relay(client, upstream.socket, signal);
    outcome.uploaded = uploaded;
    outcome.downloaded = downloaded;

    logger.debug(
      `Disconnecting from ${formatRequest(request)}, uploaded ${uploaded} bytes, downloaded ${downloaded} bytes`
    );
  } catch (err) {
    if (err instanceof RelayError) {
      outcome.uploaded = err.uploaded;
      outcome.downloaded = err.downloaded;
    }
    outcome.error = err;

    const context = outcome.request ? formatRequest(outcome.request) : "handshake";
    const detail = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    logger.error(`Error handling connection from ${peer} (${context}): ${detail}`);
  } finally {
    upstream?.socket.destroy();
    socket.destroy();
    logger.debug(`Disconnected: ${peer}`);
  }

  return outcome;
}
