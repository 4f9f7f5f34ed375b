import {
  parseIPv4Address,
  serializeIPv4Address,
  type IPv4Address,
} from '@dhcp-lease/wire';

/**
 * Converts an IPv4 address to a 32-bit number.
 */
export function ipv4ToNumber(ip: string): number {
  const [a = 0, b = 0, c = 0, d = 0] = serializeIPv4Address(ip);
  return ((a << 24) | (b << 16) | (c << 8) | d) >>> 0;
}

/**
 * Converts a 32-bit number to an IPv4 address.
 */
export function numberToIPv4(num: number): IPv4Address {
  if (!Number.isInteger(num) || num < 0 || num > 0xffffffff) {
    throw new Error('invalid ipv4 number');
  }

  const bytes = new Uint8Array([
    (num >>> 24) & 0xff,
    (num >>> 16) & 0xff,
    (num >>> 8) & 0xff,
    num & 0xff,
  ]);

  return parseIPv4Address(bytes);
}

/**
 * Expands an inclusive range of IPv4 addresses in ascending order.
 */
export function expandIPv4Range(start: string, end: string): IPv4Address[] {
  const first = ipv4ToNumber(start);
  const last = ipv4ToNumber(end);

  if (first > last) {
    throw new Error(`invalid ipv4 range: ${start}-${end}`);
  }

  const addresses: IPv4Address[] = [];
  for (let i = first; i <= last; i++) {
    addresses.push(numberToIPv4(i));
  }
  return addresses;
}

/**
 * Number of addresses in an inclusive IPv4 range.
 */
export function ipv4RangeSize(start: string, end: string) {
  return ipv4ToNumber(end) - ipv4ToNumber(start) + 1;
}
