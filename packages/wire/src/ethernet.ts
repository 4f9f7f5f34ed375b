import { parseHex } from './util.js';

export type MacAddress =
  `${string}:${string}:${string}:${string}:${string}:${string}`;

/**
 * Parses a MAC address Uint8Array into a string.
 */
export function parseMacAddress(mac: Uint8Array): MacAddress {
  const [a, b, c, d, e, f] = Array.from(mac).map((byte) =>
    byte.toString(16).padStart(2, '0')
  );

  if (
    mac.length !== 6 ||
    a === undefined ||
    b === undefined ||
    c === undefined ||
    d === undefined ||
    e === undefined ||
    f === undefined
  ) {
    throw new Error('invalid mac address');
  }

  return `${a}:${b}:${c}:${d}:${e}:${f}`;
}

/**
 * Serializes a MAC address string into a Uint8Array.
 *
 * Accepts `:` or `-` separated hex octets in any case.
 */
export function serializeMacAddress(mac: string) {
  const segments = mac.split(/[:-]/);

  if (segments.length !== 6) {
    throw new Error(`invalid mac address: ${mac}`);
  }

  return new Uint8Array(
    segments.map((segment) => {
      if (segment.length !== 2) {
        throw new Error(`invalid mac address: ${mac}`);
      }
      try {
        return parseHex(segment);
      } catch (err) {
        throw new Error(`invalid mac address: ${mac}`, { cause: err });
      }
    })
  );
}

/**
 * Canonical (lowercase, colon separated) form of a MAC address.
 */
export function normalizeMacAddress(mac: string) {
  return parseMacAddress(serializeMacAddress(mac));
}

/**
 * Canonical (lowercase, colon separated) form of a link-layer hardware
 * address of any length, such as a 6 octet MAC or a 20 octet InfiniBand
 * address.
 *
 * Accepts `:` or `-` separated hex octets in any case.
 */
export function normalizeHardwareAddress(address: string) {
  const octets = address.split(/[:-]/).map((segment) => {
    if (segment.length !== 2) {
      throw new Error(`invalid hardware address: ${address}`);
    }
    try {
      parseHex(segment);
    } catch (err) {
      throw new Error(`invalid hardware address: ${address}`, { cause: err });
    }
    return segment.toLowerCase();
  });

  return octets.join(':');
}
