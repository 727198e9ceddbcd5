/// <reference types="jest" />
import { RFC_1928_REPLIES, failStatusFromCode, failStatusName } from "../src/constants";
import {
  ConnectionNotAllowedError,
  ProtocolError,
  UnsupportedCommandError,
  failStatusFor,
} from "../src/errors";

function errno(code: string): Error {
  return Object.assign(new Error(`connect ${code}`), { code });
}

describe("FailStatus", () => {
  it("should round trip every status through its wire value", () => {
    for (let code = 1; code <= 8; code++) {
      const status = failStatusFromCode(code);
      expect(status).toBe(code);
    }
  });

  it("should not map success or unknown bytes to a failure", () => {
    expect(failStatusFromCode(0)).toBeUndefined();
    expect(failStatusFromCode(9)).toBeUndefined();
    expect(failStatusFromCode(0xff)).toBeUndefined();
  });

  it("should name statuses in wire order", () => {
    expect(failStatusName(RFC_1928_REPLIES.GENERAL_FAILURE)).toBe("GeneralFailure");
    expect(failStatusName(RFC_1928_REPLIES.CONNECTION_REFUSED)).toBe("ConnectionRefused");
    expect(failStatusName(RFC_1928_REPLIES.ADDRESS_TYPE_NOT_SUPPORTED)).toBe(
      "AddressTypeNotSupported"
    );
  });
});

describe("failStatusFor", () => {
  it.each([
    ["ECONNREFUSED", RFC_1928_REPLIES.CONNECTION_REFUSED],
    ["ENETUNREACH", RFC_1928_REPLIES.NETWORK_UNREACHABLE],
    ["EHOSTUNREACH", RFC_1928_REPLIES.HOST_UNREACHABLE],
    ["ENOTFOUND", RFC_1928_REPLIES.HOST_UNREACHABLE],
    ["ETIMEDOUT", RFC_1928_REPLIES.TTL_EXPIRED],
    ["EACCES", RFC_1928_REPLIES.CONNECTION_NOT_ALLOWED],
    ["EAFNOSUPPORT", RFC_1928_REPLIES.ADDRESS_TYPE_NOT_SUPPORTED],
    ["ECONNRESET", RFC_1928_REPLIES.GENERAL_FAILURE],
  ])("should map %s to status %d", (code, status) => {
    expect(failStatusFor(errno(code))).toBe(status);
  });

  it("should report a refusal when any dual-stack attempt was refused", () => {
    const err = new AggregateError([errno("ENETUNREACH"), errno("ECONNREFUSED")]);
    expect(failStatusFor(err)).toBe(RFC_1928_REPLIES.CONNECTION_REFUSED);
  });

  it("should fall back to the first coded attempt otherwise", () => {
    const err = new AggregateError([new Error("no code"), errno("EHOSTUNREACH")]);
    expect(failStatusFor(err)).toBe(RFC_1928_REPLIES.HOST_UNREACHABLE);
  });

  it("should map unsupported commands and filtered destinations", () => {
    expect(failStatusFor(new UnsupportedCommandError(0x02))).toBe(
      RFC_1928_REPLIES.COMMAND_NOT_SUPPORTED
    );
    expect(failStatusFor(new ConnectionNotAllowedError("blocked"))).toBe(
      RFC_1928_REPLIES.CONNECTION_NOT_ALLOWED
    );
  });

  it("should carry over the status a chained proxy replied with", () => {
    const err = new Error("Socks5 proxy rejected connection - HostUnreachable");
    expect(failStatusFor(err)).toBe(RFC_1928_REPLIES.HOST_UNREACHABLE);
  });

  it("should treat anything else as a general failure", () => {
    expect(failStatusFor(new ProtocolError("bad"))).toBe(RFC_1928_REPLIES.GENERAL_FAILURE);
    expect(failStatusFor("not an error")).toBe(RFC_1928_REPLIES.GENERAL_FAILURE);
  });

  it("should name errors after their class", () => {
    expect(new UnsupportedCommandError(0x03).name).toBe("UnsupportedCommandError");
    expect(new UnsupportedCommandError(0x03).message).toBe("command not supported: 3");
  });
});
