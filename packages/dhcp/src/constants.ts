export const DEFAULT_INTERFACE = 'en5';
export const DEFAULT_CONFIG_PATH = 'dhcp_config.yaml';

/**
 * Default lease duration in seconds.
 */
export const DEFAULT_LEASE_DURATION = 86400;

/**
 * Largest dynamic range the server will expand into a pool.
 */
export const MAX_RANGE_SIZE = 65536;

// DHCP message types as per RFC 2132
export const DhcpMessageTypes = {
  DISCOVER: 1,
  OFFER: 2,
  REQUEST: 3,
  DECLINE: 4,
  ACK: 5,
  NAK: 6,
  RELEASE: 7,
  INFORM: 8,
} as const;
