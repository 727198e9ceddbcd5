/**
 * https://www.ietf.org/rfc/rfc1928.txt
 */
export const RFC_1928_VERSION = 0x05;

export const RESERVED = 0x00;

export const RFC_1928_METHODS = {
  NO_AUTHENTICATION_REQUIRED: 0x00,
  GSSAPI: 0x01,
  BASIC_AUTHENTICATION: 0x02,
  NO_ACCEPTABLE_METHODS: 0xff,
} as const;

export const RFC_1928_COMMANDS = {
  CONNECT: 0x01,
  BIND: 0x02,
  UDP_ASSOCIATE: 0x03,
} as const;

export const RFC_1928_ATYP = {
  IPV4: 0x01,
  DOMAINNAME: 0x03,
  IPV6: 0x04,
} as const;

export const RFC_1928_REPLIES = {
  SUCCEEDED: 0x00,
  GENERAL_FAILURE: 0x01,
  CONNECTION_NOT_ALLOWED: 0x02,
  NETWORK_UNREACHABLE: 0x03,
  HOST_UNREACHABLE: 0x04,
  CONNECTION_REFUSED: 0x05,
  TTL_EXPIRED: 0x06,
  COMMAND_NOT_SUPPORTED: 0x07,
  ADDRESS_TYPE_NOT_SUPPORTED: 0x08,
} as const;

export type Command = (typeof RFC_1928_COMMANDS)[keyof typeof RFC_1928_COMMANDS];

export type AddressType = (typeof RFC_1928_ATYP)[keyof typeof RFC_1928_ATYP];

/**
 * Reply codes that report why a request could not be satisfied.
 */
export type FailStatus = Exclude<
  (typeof RFC_1928_REPLIES)[keyof typeof RFC_1928_REPLIES],
  typeof RFC_1928_REPLIES.SUCCEEDED
>;

const FAIL_STATUS_NAMES: Record<FailStatus, string> = {
  [RFC_1928_REPLIES.GENERAL_FAILURE]: "GeneralFailure",
  [RFC_1928_REPLIES.CONNECTION_NOT_ALLOWED]: "NotAllowed",
  [RFC_1928_REPLIES.NETWORK_UNREACHABLE]: "NetworkUnreachable",
  [RFC_1928_REPLIES.HOST_UNREACHABLE]: "HostUnreachable",
  [RFC_1928_REPLIES.CONNECTION_REFUSED]: "ConnectionRefused",
  [RFC_1928_REPLIES.TTL_EXPIRED]: "TtlExpired",
  [RFC_1928_REPLIES.COMMAND_NOT_SUPPORTED]: "CommandNotSupported",
  [RFC_1928_REPLIES.ADDRESS_TYPE_NOT_SUPPORTED]: "AddressTypeNotSupported",
};

const FAIL_STATUSES: readonly FailStatus[] = [
  RFC_1928_REPLIES.GENERAL_FAILURE,
  RFC_1928_REPLIES.CONNECTION_NOT_ALLOWED,
  RFC_1928_REPLIES.NETWORK_UNREACHABLE,
  RFC_1928_REPLIES.HOST_UNREACHABLE,
  RFC_1928_REPLIES.CONNECTION_REFUSED,
  RFC_1928_REPLIES.TTL_EXPIRED,
  RFC_1928_REPLIES.COMMAND_NOT_SUPPORTED,
  RFC_1928_REPLIES.ADDRESS_TYPE_NOT_SUPPORTED,
];

export function failStatusName(status: FailStatus): string {
  return FAIL_STATUS_NAMES[status];
}

export function failStatusFromCode(code: number): FailStatus | undefined {
  return FAIL_STATUSES.find((status) => status === code);
}
