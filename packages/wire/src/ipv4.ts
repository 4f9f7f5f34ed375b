import { parseUint } from './util.js';

export type IPv4Address = `${number}.${number}.${number}.${number}`;
export type IPv4Cidr = `${IPv4Address}/${number}`;

export type ParsedIPv4Cidr = {
  ipAddress: IPv4Address;
  prefixLength: number;
  netmask: IPv4Address;
};

/**
 * Parses an IPv4 address Uint8Array into a string.
 */
export function parseIPv4Address(data: Uint8Array): IPv4Address {
  const [a, b, c, d] = data;

  if (
    data.length !== 4 ||
    a === undefined ||
    b === undefined ||
    c === undefined ||
    d === undefined
  ) {
    throw new Error('invalid ipv4 address');
  }

  return `${a}.${b}.${c}.${d}`;
}

/**
 * Serialize an IPv4 address string into a Uint8Array.
 *
 * Only accepts the dotted-quad form with decimal octets
 * (no leading zeros, no shorthand like `10.1`).
 */
export function serializeIPv4Address(ip: string) {
  const segments = ip.split('.');

  if (segments.length !== 4) {
    throw new Error(`invalid ipv4 address: ${ip}`);
  }

  return new Uint8Array(
    segments.map((segment) => {
      if (segment.length > 1 && segment.startsWith('0')) {
        throw new Error(`invalid ipv4 address: ${ip}`);
      }

      let octet: number;
      try {
        octet = parseUint(segment);
      } catch (err) {
        throw new Error(`invalid ipv4 address: ${ip}`, { cause: err });
      }

      if (octet > 255) {
        throw new Error(`invalid ipv4 address: ${ip}`);
      }
      return octet;
    })
  );
}

/**
 * Checks whether a string is a well-formed IPv4 address.
 */
export function isIPv4Address(ip: string): ip is IPv4Address {
  try {
    serializeIPv4Address(ip);
    return true;
  } catch {
    return false;
  }
}

/**
 * Canonical string form of an IPv4 address.
 */
export function normalizeIPv4Address(ip: string) {
  return parseIPv4Address(serializeIPv4Address(ip));
}

/**
 * Parses a CIDR notation string into its address, prefix length
 * and dotted-quad netmask.
 */
export function parseIPv4Cidr(cidr: string): ParsedIPv4Cidr {
  const [ipString, maskSizeString, ...rest] = cidr.split('/');

  if (!ipString || !maskSizeString || rest.length > 0) {
    throw new Error(`invalid cidr: ${cidr}`);
  }

  let prefixLength: number;
  let ipAddress: IPv4Address;
  try {
    prefixLength = parseUint(maskSizeString);
    ipAddress = normalizeIPv4Address(ipString);
  } catch (err) {
    throw new Error(`invalid cidr: ${cidr}`, { cause: err });
  }

  if (prefixLength > 32) {
    throw new Error(`invalid cidr: ${cidr}`);
  }

  return {
    ipAddress,
    prefixLength,
    netmask: parseIPv4Address(generateNetmask(prefixLength)),
  };
}

/**
 * Generates a netmask from a mask size.
 */
export function generateNetmask(maskSize: number) {
  if (!Number.isInteger(maskSize) || maskSize < 0 || maskSize > 32) {
    throw new Error('invalid mask size');
  }

  const mask = new Uint8Array(4);

  for (let i = 0; i < maskSize; i++) {
    const byteIndex = Math.floor(i / 8);
    const bitIndex = 7 - (i % 8);
    mask[byteIndex] = (mask[byteIndex] ?? 0) | (1 << bitIndex);
  }

  return mask;
}
