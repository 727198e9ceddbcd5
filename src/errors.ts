import { Command, FailStatus, RFC_1928_REPLIES } from "./constants";

export class SocksError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or unsupported handshake bytes
 */
export class ProtocolError extends SocksError {}

export class IoError extends SocksError {}

/**
 * The peer closed the stream before the expected bytes arrived
 */
export class UnexpectedEndError extends IoError {}

/**
 * The operation was interrupted by the shutdown signal
 */
export class CancelledError extends SocksError {
  constructor(message = "cancelled by shutdown", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UnsupportedCommandError extends SocksError {
  readonly command: Command;

  constructor(command: Command) {
    super(`command not supported: ${command}`);
    this.command = command;
  }
}

export class ConnectionNotAllowedError extends SocksError {}

export class ConfigError extends SocksError {}

const ERRNO_STATUS: Record<string, FailStatus> = {
  ECONNREFUSED: RFC_1928_REPLIES.CONNECTION_REFUSED,
  ENETUNREACH: RFC_1928_REPLIES.NETWORK_UNREACHABLE,
  EHOSTUNREACH: RFC_1928_REPLIES.HOST_UNREACHABLE,
  EHOSTDOWN: RFC_1928_REPLIES.HOST_UNREACHABLE,
  ENOTFOUND: RFC_1928_REPLIES.HOST_UNREACHABLE,
  EAI_AGAIN: RFC_1928_REPLIES.HOST_UNREACHABLE,
  ETIMEDOUT: RFC_1928_REPLIES.TTL_EXPIRED,
  EACCES: RFC_1928_REPLIES.CONNECTION_NOT_ALLOWED,
  EPERM: RFC_1928_REPLIES.CONNECTION_NOT_ALLOWED,
  EAFNOSUPPORT: RFC_1928_REPLIES.ADDRESS_TYPE_NOT_SUPPORTED,
};

// socks client rejections read "Socks5 proxy rejected connection - <reply name>"
const CHAINED_REJECTION = /^Socks5 proxy rejected connection - (\w+)$/;

const CHAINED_REPLY_STATUS: Record<string, FailStatus> = {
  Failure: RFC_1928_REPLIES.GENERAL_FAILURE,
  NotAllowed: RFC_1928_REPLIES.CONNECTION_NOT_ALLOWED,
  NetworkUnreachable: RFC_1928_REPLIES.NETWORK_UNREACHABLE,
  HostUnreachable: RFC_1928_REPLIES.HOST_UNREACHABLE,
  ConnectionRefused: RFC_1928_REPLIES.CONNECTION_REFUSED,
  TTLExpired: RFC_1928_REPLIES.TTL_EXPIRED,
  CommandNotSupported: RFC_1928_REPLIES.COMMAND_NOT_SUPPORTED,
  AddressNotSupported: RFC_1928_REPLIES.ADDRESS_TYPE_NOT_SUPPORTED,
};

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Maps an upstream connection error to the reply status sent to the client
 */
export function failStatusFor(err: unknown): FailStatus {
  if (err instanceof UnsupportedCommandError) {
    return RFC_1928_REPLIES.COMMAND_NOT_SUPPORTED;
  }
  if (err instanceof ConnectionNotAllowedError) {
    return RFC_1928_REPLIES.CONNECTION_NOT_ALLOWED;
  }

  // dual-stack connects fail with every attempt's error; a refusal means the host was reached
  if (err instanceof AggregateError) {
    const attempts: unknown[] = Array.from(err.errors);
    if (attempts.some((attempt) => errorCode(attempt) === "ECONNREFUSED")) {
      return RFC_1928_REPLIES.CONNECTION_REFUSED;
    }
    const first = attempts.find((attempt) => errorCode(attempt) !== undefined);
    if (first !== undefined) {
      return failStatusFor(first);
    }
  }

  const code = errorCode(err);
  if (code !== undefined && code in ERRNO_STATUS) {
    return ERRNO_STATUS[code];
  }

  if (err instanceof Error) {
    const rejected = CHAINED_REJECTION.exec(err.message);
    if (rejected && rejected[1] in CHAINED_REPLY_STATUS) {
      return CHAINED_REPLY_STATUS[rejected[1]];
    }
  }

  return RFC_1928_REPLIES.GENERAL_FAILURE;
}
