import * as ipaddr from "ipaddr.js";
import { BinaryWriter, StreamReader } from "./binary";
import { RFC_1928_ATYP } from "./constants";
import { ProtocolError, UnexpectedEndError } from "./errors";

/**
 * A SOCKS5 address: an IP literal or a domain name still to be resolved.
 * IP hosts are kept in their canonical text form ("10.0.0.1", "::1").
 */
export type Address =
  | { readonly type: typeof RFC_1928_ATYP.IPV4; readonly host: string }
  | { readonly type: typeof RFC_1928_ATYP.IPV6; readonly host: string }
  | { readonly type: typeof RFC_1928_ATYP.DOMAINNAME; readonly host: string };

export const MAX_DOMAIN_LENGTH = 255;

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function ipv4Address(host: string): Address {
  return { type: RFC_1928_ATYP.IPV4, host: ipaddr.IPv4.parse(host).toString() };
}

export function ipv6Address(host: string): Address {
  return { type: RFC_1928_ATYP.IPV6, host: ipaddr.IPv6.parse(host).toString() };
}

export function domainAddress(host: string): Address {
  return { type: RFC_1928_ATYP.DOMAINNAME, host };
}

/**
 * Builds an address from a socket's address text. IPv4-mapped IPv6
 * addresses (as reported by dual-stack sockets) come back as IPv4.
 */
export function addressFromHost(host: string): Address {
  if (!ipaddr.isValid(host)) {
    return domainAddress(host);
  }

  const ip = ipaddr.process(host);
  return ip.kind() === "ipv4"
    ? { type: RFC_1928_ATYP.IPV4, host: ip.toString() }
    : { type: RFC_1928_ATYP.IPV6, host: ip.toString() };
}

/**
 * The unspecified address of the given family, sent in failure replies
 */
export function defaultAddress(isV6: boolean): Address {
  return isV6
    ? { type: RFC_1928_ATYP.IPV6, host: "::" }
    : { type: RFC_1928_ATYP.IPV4, host: "0.0.0.0" };
}

export function isIPv6(address: Address): boolean {
  return address.type === RFC_1928_ATYP.IPV6;
}

export function formatAddress(address: Address, port: number): string {
  return address.type === RFC_1928_ATYP.IPV6
    ? `[${address.host}]:${port}`
    : `${address.host}:${port}`;
}

/**
 * +------+----------+
 * | ATYP | DST.ADDR |
 * +------+----------+
 * |  1   | Variable |
 * +------+----------+
 */
export async function parseAddress(reader: StreamReader): Promise<Address> {
  const atyp = await reader.readUInt8();

  switch (atyp) {
    case RFC_1928_ATYP.IPV4: {
      const bytes = await reader.readExact(4);
      return {
        type: RFC_1928_ATYP.IPV4,
        host: ipaddr.fromByteArray(Array.from(bytes)).toString(),
      };
    }

    case RFC_1928_ATYP.IPV6: {
      const bytes = await reader.readExact(16);
      return {
        type: RFC_1928_ATYP.IPV6,
        host: ipaddr.fromByteArray(Array.from(bytes)).toString(),
      };
    }

    case RFC_1928_ATYP.DOMAINNAME: {
      const length = await reader.readUInt8();
      let bytes: Buffer;
      try {
        bytes = await reader.readExact(length);
      } catch (err) {
        if (err instanceof UnexpectedEndError) {
          throw new ProtocolError(
            `domain name shorter than its declared ${length} bytes`,
            { cause: err }
          );
        }
        throw err;
      }

      try {
        return domainAddress(utf8.decode(bytes));
      } catch (err) {
        throw new ProtocolError("domain name is not valid UTF-8", {
          cause: err,
        });
      }
    }

    default:
      throw new ProtocolError(`unsupported address type: ${atyp}`);
  }
}

export function writeAddress(writer: BinaryWriter, address: Address): void {
  switch (address.type) {
    case RFC_1928_ATYP.IPV4:
      writer
        .word8(RFC_1928_ATYP.IPV4)
        .bytes(ipaddr.IPv4.parse(address.host).toByteArray());
      return;

    case RFC_1928_ATYP.IPV6:
      writer
        .word8(RFC_1928_ATYP.IPV6)
        .bytes(ipaddr.IPv6.parse(address.host).toByteArray());
      return;

    case RFC_1928_ATYP.DOMAINNAME: {
      const bytes = Buffer.from(address.host, "utf8");
      if (bytes.length > MAX_DOMAIN_LENGTH) {
        throw new RangeError(
          `domain name is ${bytes.length} bytes, at most ${MAX_DOMAIN_LENGTH} fit`
        );
      }
      writer.word8(RFC_1928_ATYP.DOMAINNAME).word8(bytes.length).bytes(bytes);
      return;
    }

    default: {
      const unreachable: never = address;
      throw new Error(`unknown address ${JSON.stringify(unreachable)}`);
    }
  }
}

export function serializeAddress(address: Address): Buffer {
  const writer = new BinaryWriter();
  writeAddress(writer, address);
  return writer.toBuffer();
}
