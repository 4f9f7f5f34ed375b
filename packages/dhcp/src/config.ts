import {
  isIPv4Address,
  normalizeHardwareAddress,
  parseIPv4Cidr,
  type IPv4Address,
} from '@dhcp-lease/wire';
import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { MAX_RANGE_SIZE } from './constants.js';
import { ConfigInvalidError } from './errors.js';
import type { DhcpServerOptions } from './dhcp-server.js';
import { ipv4RangeSize, ipv4ToNumber } from './util.js';

/**
 * Validated server configuration.
 */
export type DhcpConfig = {
  /**
   * Network interface for the packet layer to bind to.
   */
  interface?: string;

  /**
   * Subnet in CIDR notation.
   */
  network: string;

  /**
   * Subnet mask derived from `network`.
   */
  netmask: IPv4Address;

  /**
   * Inclusive range of dynamically leased addresses.
   */
  range: {
    start: IPv4Address;
    end: IPv4Address;
  };

  /**
   * Duration of a lease in seconds.
   */
  leaseDuration: number;

  gateway?: IPv4Address;
  dnsServers: IPv4Address[];
  reservedAddresses: Record<string, IPv4Address>;

  /**
   * Interval in seconds between background expiry sweeps.
   */
  sweepInterval?: number;
};

/**
 * Reads and validates a YAML configuration file.
 */
export async function loadConfig(path: string): Promise<DhcpConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigInvalidError(`failed to read ${path}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    throw new ConfigInvalidError(`failed to parse ${path}`, { cause: err });
  }

  return parseConfig(raw);
}

/**
 * Validates a parsed configuration document.
 *
 * Keys follow the file format (`lease_duration`, `dns_servers`,
 * `reserved_addresses`, ...). Unknown keys are ignored.
 */
export function parseConfig(raw: unknown): DhcpConfig {
  if (!isRecord(raw)) {
    throw new ConfigInvalidError('expected a mapping at the top level');
  }

  const network = raw['network'];
  if (typeof network !== 'string' || network.length === 0) {
    throw new ConfigInvalidError('no network configured');
  }

  let netmask: IPv4Address;
  try {
    netmask = parseIPv4Cidr(network).netmask;
  } catch (err) {
    throw new ConfigInvalidError(`invalid network cidr: ${network}`, {
      cause: err,
    });
  }

  const config: DhcpConfig = {
    network,
    netmask,
    range: parseRange(raw['range']),
    leaseDuration: parsePositiveInteger(
      raw['lease_duration'],
      'lease_duration'
    ),
    dnsServers: parseDnsServers(raw['dns_servers']),
    reservedAddresses: parseReservedAddresses(raw['reserved_addresses']),
  };

  const iface = raw['interface'];
  if (iface !== undefined && iface !== null) {
    if (typeof iface !== 'string' || iface.length === 0) {
      throw new ConfigInvalidError('interface must be a non-empty string');
    }
    config.interface = iface;
  }

  const gateway = raw['gateway'];
  if (gateway !== undefined && gateway !== null) {
    config.gateway = parseAddress(gateway, 'gateway');
  }

  const sweepInterval = raw['sweep_interval'];
  if (sweepInterval !== undefined && sweepInterval !== null) {
    config.sweepInterval = parsePositiveInteger(
      sweepInterval,
      'sweep_interval'
    );
  }

  return config;
}

/**
 * Maps a validated configuration onto `DhcpServer` options.
 */
export function toServerOptions(config: DhcpConfig): DhcpServerOptions {
  return {
    leaseRange: config.range,
    leaseDuration: config.leaseDuration,
    reservedAddresses: config.reservedAddresses,
    netmask: config.netmask,
    router: config.gateway,
    dnsServers: config.dnsServers,
    sweepInterval: config.sweepInterval,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseAddress(value: unknown, field: string): IPv4Address {
  if (typeof value !== 'string' || !isIPv4Address(value)) {
    throw new ConfigInvalidError(`invalid ${field}: ${String(value)}`);
  }
  return value;
}

function parsePositiveInteger(value: unknown, field: string) {
  if (value === undefined || value === null) {
    throw new ConfigInvalidError(`${field} is required`);
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigInvalidError(
      `${field} must be a positive integer, got ${String(value)}`
    );
  }
  return value;
}

function parseRange(value: unknown): DhcpConfig['range'] {
  if (typeof value !== 'string') {
    throw new ConfigInvalidError('no range configured');
  }

  const parts = value.split('-');
  const [start, end] = parts.map((part) => part.trim());

  if (
    parts.length !== 2 ||
    start === undefined ||
    end === undefined ||
    !isIPv4Address(start) ||
    !isIPv4Address(end)
  ) {
    throw new ConfigInvalidError(`invalid range: ${value}`);
  }

  if (ipv4ToNumber(start) > ipv4ToNumber(end)) {
    throw new ConfigInvalidError(`range start is after range end: ${value}`);
  }

  if (ipv4RangeSize(start, end) > MAX_RANGE_SIZE) {
    throw new ConfigInvalidError(
      `range is larger than ${MAX_RANGE_SIZE} addresses: ${value}`
    );
  }

  return { start, end };
}

function parseDnsServers(value: unknown): IPv4Address[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigInvalidError('dns_servers must be a list');
  }
  return value.map((server: unknown) => parseAddress(server, 'dns server'));
}

function parseReservedAddresses(
  value: unknown
): Record<string, IPv4Address> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigInvalidError('reserved_addresses must be a mapping');
  }

  const reservations: Record<string, IPv4Address> = {};
  const seenIPs = new Set<string>();

  for (const [key, ip] of Object.entries(value)) {
    let mac: string;
    try {
      mac = normalizeHardwareAddress(key);
    } catch (err) {
      throw new ConfigInvalidError(`invalid reserved mac address: ${key}`, {
        cause: err,
      });
    }

    const address = parseAddress(ip, `reserved ip for ${mac}`);

    if (mac in reservations) {
      throw new ConfigInvalidError(`duplicate reservation for ${mac}`);
    }
    if (seenIPs.has(address)) {
      throw new ConfigInvalidError(`duplicate reserved ip: ${address}`);
    }

    reservations[mac] = address;
    seenIPs.add(address);
  }

  return reservations;
}
