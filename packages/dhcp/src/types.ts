import type { IPv4Address } from '@dhcp-lease/wire';
import type { DhcpMessageTypes } from './constants.js';
import type {
  HardwareAddressInvalidError,
  PoolExhaustedError,
  ReservedAddressInvalidError,
} from './errors.js';

export type DhcpMessageType = keyof typeof DhcpMessageTypes;
export type DhcpReplyType = Extract<DhcpMessageType, 'OFFER' | 'ACK'>;

export type DhcpLease = {
  ip: IPv4Address;

  /**
   * Normalized client hardware address.
   */
  mac: string;
  expiresAt: number;
};

/**
 * A client message, already decoded by the packet layer.
 */
export type DhcpRequest = {
  type: DhcpMessageType;
  xid: number;
  mac: string;
};

/**
 * A server reply for the packet layer to encode and send.
 */
export type DhcpReply = {
  type: DhcpReplyType;
  xid: number;
  mac: string;
  yiaddr: IPv4Address;
  subnetMask: IPv4Address;

  /**
   * Lease time in seconds.
   */
  leaseTime: number;
  router?: IPv4Address;
  dnsServers?: IPv4Address[];
};

/**
 * Transport that decodes inbound requests and encodes outbound replies.
 */
export type DhcpPacketLayer = AsyncIterable<DhcpRequest> & {
  send(reply: DhcpReply): Promise<void>;
};

export type ResolveError =
  | PoolExhaustedError
  | ReservedAddressInvalidError
  | HardwareAddressInvalidError;

export type ResolveResult =
  | { ok: true; ip: IPv4Address }
  | { ok: false; error: ResolveError };

export type LeaseStats = {
  /**
   * Number of addresses in the dynamic range.
   */
  total: number;
  available: number;
  leased: number;
  reserved: number;
};
