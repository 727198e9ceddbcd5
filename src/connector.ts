import net from "net";
import { Duplex } from "stream";
import { Request } from "./acceptor";
import { Address, addressFromHost } from "./address";
import { RFC_1928_ATYP, RFC_1928_COMMANDS } from "./constants";
import { CancelledError, UnsupportedCommandError } from "./errors";

export interface Upstream {
  socket: Duplex;
  /** Local endpoint of the upstream connection, echoed in the success reply */
  bound: { address: Address; port: number };
}

/**
 * Opens the outbound connection for a request
 */
export type Connector = (request: Request, signal: AbortSignal) => Promise<Upstream>;

/**
 * Connects directly over TCP. Domain names are resolved by the platform
 * resolver as part of the connect.
 */
export const directConnector: Connector = (request, signal) => {
  if (request.command !== RFC_1928_COMMANDS.CONNECT) {
    return Promise.reject(new UnsupportedCommandError(request.command));
  }

  // net takes IPv6 literals without brackets
  const host = request.address.host;
  const { port } = request;

  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new CancelledError(undefined, { cause: signal.reason }));
      return;
    }

    const socket = net.createConnection({ host, port }, () => {
      cleanup();
      resolve({
        socket,
        bound: {
          address: localAddressOf(socket),
          port: socket.localPort ?? 0,
        },
      });
    });

    const handleError = (err: Error) => {
      cleanup();
      socket.destroy();
      reject(err);
    };
    const handleAbort = () => {
      cleanup();
      socket.destroy();
      reject(new CancelledError(undefined, { cause: signal.reason }));
    };
    const cleanup = () => {
      socket.removeListener("error", handleError);
      signal.removeEventListener("abort", handleAbort);
    };

    socket.once("error", handleError);
    signal.addEventListener("abort", handleAbort, { once: true });
  });
};

function localAddressOf(socket: net.Socket): Address {
  const host = socket.localAddress;
  if (host === undefined) {
    return { type: RFC_1928_ATYP.IPV4, host: "0.0.0.0" };
  }
  return addressFromHost(host);
}
