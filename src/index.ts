export { Acceptor, formatRequest } from "./acceptor";
export type { BestEffort, BindRequest, ConnectRequest, Request, UdpAssociateRequest } from "./acceptor";
export {
  MAX_DOMAIN_LENGTH,
  addressFromHost,
  defaultAddress,
  domainAddress,
  formatAddress,
  ipv4Address,
  ipv6Address,
  parseAddress,
  serializeAddress,
  writeAddress,
} from "./address";
export type { Address } from "./address";
export { BinaryWriter, StreamReader, writeAll } from "./binary";
export { createChainConnector } from "./chain";
export { DEFAULT_HOST, DEFAULT_PORT, loadConfig, loadEnvFile, parseProxyUrl } from "./config";
export type { Config, ProxyConfig } from "./config";
export { handleConnection } from "./connection";
export type { ConnectionFilter, ConnectionOutcome, Endpoint } from "./connection";
export { directConnector } from "./connector";
export type { Connector, Upstream } from "./connector";
export * from "./constants";
export * from "./errors";
export { createLogger, silentLogger } from "./logger";
export type { LogLevel, Logger } from "./logger";
export { RelayError, relay } from "./relay";
export type { RelayResult } from "./relay";
export { Shutdown, cancellable } from "./shutdown";
export { EVENTS, SocksServer, createServer } from "./server";
export type { SocksServerEvents, SocksServerOptions } from "./server";
