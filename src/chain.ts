import { SocksClient } from "socks";
import { ConnectRequest } from "./acceptor";
import { addressFromHost } from "./address";
import { ProxyConfig } from "./config";
import { RFC_1928_COMMANDS } from "./constants";
import { Connector, Upstream, directConnector } from "./connector";
import { CancelledError, IoError, UnsupportedCommandError } from "./errors";
import { cancellable } from "./shutdown";

/**
 * Opens the TCP leg to the chained proxy. Failures are reported as plain I/O
 * errors so they are not mistaken for the destination's.
 */
async function connectProxy(proxy: ProxyConfig, signal: AbortSignal): Promise<Upstream> {
  const request: ConnectRequest = {
    command: RFC_1928_COMMANDS.CONNECT,
    address: addressFromHost(proxy.host),
    port: proxy.port,
  };
  try {
    return await directConnector(request, signal);
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    const detail = err instanceof Error ? err.message : String(err);
    throw new IoError(`upstream proxy ${proxy.host}:${proxy.port} unreachable: ${detail}`, {
      cause: err,
    });
  }
}

/**
 * Creates a connector that reaches every destination through another SOCKS5
 * proxy. The bound endpoint echoed to the client is the one the chained
 * proxy reported.
 */
export function createChainConnector(proxy: ProxyConfig): Connector {
  return async (request, signal) => {
    if (request.command !== RFC_1928_COMMANDS.CONNECT) {
      throw new UnsupportedCommandError(request.command);
    }

    const leg = await connectProxy(proxy, signal);
    // the socks client has no cancellation of its own; tearing down the leg ends its handshake
    const onAbort = () => leg.socket.destroy();
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      const { remoteHost } = await cancellable(
        SocksClient.createConnection({
          proxy: {
            host: proxy.host,
            port: proxy.port,
            type: 5,
            userId: proxy.auth?.username,
            password: proxy.auth?.password,
          },
          command: "connect",
          destination: {
            host: request.address.host,
            port: request.port,
          },
          existing_socket: leg.socket,
        }),
        signal
      );

      return {
        socket: leg.socket,
        bound: remoteHost
          ? { address: addressFromHost(remoteHost.host), port: remoteHost.port }
          : leg.bound,
      };
    } catch (err) {
      leg.socket.destroy();
      throw err;
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  };
}
