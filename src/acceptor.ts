import { Duplex } from "stream";
import {
  Address,
  defaultAddress,
  formatAddress,
  isIPv6,
  parseAddress,
  writeAddress,
} from "./address";
import { BinaryWriter, StreamReader, writeAll } from "./binary";
import {
  Command,
  FailStatus,
  RESERVED,
  RFC_1928_COMMANDS,
  RFC_1928_METHODS,
  RFC_1928_REPLIES,
  RFC_1928_VERSION,
} from "./constants";
import { ProtocolError } from "./errors";

interface RequestOf<C extends Command> {
  readonly command: C;
  readonly address: Address;
  readonly port: number;
}

export type ConnectRequest = RequestOf<typeof RFC_1928_COMMANDS.CONNECT>;
export type BindRequest = RequestOf<typeof RFC_1928_COMMANDS.BIND>;
export type UdpAssociateRequest = RequestOf<typeof RFC_1928_COMMANDS.UDP_ASSOCIATE>;

export type Request = ConnectRequest | BindRequest | UdpAssociateRequest;

export function formatRequest(request: Request): string {
  const target = formatAddress(request.address, request.port);
  switch (request.command) {
    case RFC_1928_COMMANDS.CONNECT:
      return `Connect(${target})`;
    case RFC_1928_COMMANDS.BIND:
      return `Bind(${target})`;
    case RFC_1928_COMMANDS.UDP_ASSOCIATE:
      return `UdpAssociate(${target})`;
  }
}

/**
 * Outcome of a reply whose failure is not escalated to the caller
 */
export type BestEffort = { ok: true } | { ok: false; error: unknown };

/**
 * Server side of one SOCKS5 negotiation.
 *
 * `accept` runs the greeting and reads the request; the returned acceptor then
 * owns the stream until exactly one of `replySuccess` or `replyFailure` is
 * called. `replySuccess` hands the stream back for relaying and rejects if the
 * reply cannot be written; `replyFailure` never rejects.
 */
export class Acceptor<S extends Duplex = Duplex> {
  private readonly stream: S;
  private readonly isV6: boolean;
  private replied = false;

  private constructor(stream: S, isV6: boolean) {
    this.stream = stream;
    this.isV6 = isV6;
  }

  /**
   * +----+----------+----------+
   * |VER | NMETHODS | METHODS  |
   * +----+----------+----------+
   * | 1  |    1     | 1 to 255 |
   * +----+----------+----------+
   *
   * +----+-----+-------+------+----------+----------+
   * |VER | CMD |  RSV  | ATYP | DST.ADDR | DST.PORT |
   * +----+-----+-------+------+----------+----------+
   * | 1  |  1  | X'00' |  1   | Variable |    2     |
   * +----+-----+-------+------+----------+----------+
   */
  static async accept<S extends Duplex>(
    stream: S,
    signal?: AbortSignal
  ): Promise<{ request: Request; acceptor: Acceptor<S> }> {
    const reader = new StreamReader(stream, signal);

    const version = await reader.readUInt8();
    if (version !== RFC_1928_VERSION) {
      throw new ProtocolError(`invalid socks version: ${version}`);
    }

    const nmethods = await reader.readUInt8();
    const methods = await reader.readExact(nmethods);
    if (!methods.includes(RFC_1928_METHODS.NO_AUTHENTICATION_REQUIRED)) {
      throw new ProtocolError("only no authentication is supported");
    }

    await writeAll(
      stream,
      Buffer.from([RFC_1928_VERSION, RFC_1928_METHODS.NO_AUTHENTICATION_REQUIRED]),
      signal
    );

    const requestVersion = await reader.readUInt8();
    if (requestVersion !== RFC_1928_VERSION) {
      throw new ProtocolError(`invalid request socks version: ${requestVersion}`);
    }

    const cmd = await reader.readUInt8();
    await reader.readUInt8(); // RSV
    const address = await parseAddress(reader);
    const port = await reader.readUInt16BE();

    const acceptor = new Acceptor(stream, isIPv6(address));
    switch (cmd) {
      case RFC_1928_COMMANDS.CONNECT:
        return { request: { command: RFC_1928_COMMANDS.CONNECT, address, port }, acceptor };
      case RFC_1928_COMMANDS.BIND:
        return { request: { command: RFC_1928_COMMANDS.BIND, address, port }, acceptor };
      case RFC_1928_COMMANDS.UDP_ASSOCIATE:
        return {
          request: { command: RFC_1928_COMMANDS.UDP_ASSOCIATE, address, port },
          acceptor,
        };
      default:
        throw new ProtocolError(`invalid command: ${cmd}`);
    }
  }

  /**
   * Reports the bound endpoint and returns the stream, ready for relaying
   */
  async replySuccess(bound: Address, port: number, signal?: AbortSignal): Promise<S> {
    await this.reply(RFC_1928_REPLIES.SUCCEEDED, bound, port, signal);
    return this.stream;
  }

  async replyFailure(status: FailStatus, signal?: AbortSignal): Promise<BestEffort> {
    try {
      await this.reply(status, defaultAddress(this.isV6), 0, signal);
      return { ok: true };
    } catch (error) {
      return { ok: false, error };
    }
  }

  /**
   * +----+-----+-------+------+----------+----------+
   * |VER | REP |  RSV  | ATYP | BND.ADDR | BND.PORT |
   * +----+-----+-------+------+----------+----------+
   * | 1  |  1  | X'00' |  1   | Variable |    2     |
   * +----+-----+-------+------+----------+----------+
   */
  private async reply(
    status: number,
    bound: Address,
    port: number,
    signal?: AbortSignal
  ): Promise<void> {
    if (this.replied) {
      throw new Error("socks5 request already replied to");
    }
    this.replied = true;

    const writer = new BinaryWriter().word8(RFC_1928_VERSION).word8(status).word8(RESERVED);
    writeAddress(writer, bound);
    writer.word16be(port);

    await writeAll(this.stream, writer.toBuffer(), signal);
  }
}
