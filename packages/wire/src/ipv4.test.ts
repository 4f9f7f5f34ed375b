import { expect, test } from 'vitest';
import {
  generateNetmask,
  isIPv4Address,
  normalizeIPv4Address,
  parseIPv4Address,
  parseIPv4Cidr,
  serializeIPv4Address,
} from './ipv4.js';

test('parses an IPv4 address string into a Uint8Array', () => {
  expect(serializeIPv4Address('192.168.1.1')).toEqual(
    Uint8Array.from([192, 168, 1, 1])
  );
  expect(serializeIPv4Address('10.0.0.1')).toEqual(
    Uint8Array.from([10, 0, 0, 1])
  );
  expect(serializeIPv4Address('255.255.255.255')).toEqual(
    Uint8Array.from([255, 255, 255, 255])
  );
  expect(serializeIPv4Address('0.0.0.0')).toEqual(
    Uint8Array.from([0, 0, 0, 0])
  );
});

test('rejects malformed IPv4 address strings', () => {
  expect(() => serializeIPv4Address('256.1.2.3')).toThrow(
    'invalid ipv4 address: 256.1.2.3'
  );
  expect(() => serializeIPv4Address('1.2.3')).toThrow(
    'invalid ipv4 address: 1.2.3'
  );
  expect(() => serializeIPv4Address('1.2.3.4.5')).toThrow();
  expect(() => serializeIPv4Address('1.2.3.-4')).toThrow();
  expect(() => serializeIPv4Address('1.2..4')).toThrow();
  expect(() => serializeIPv4Address('01.2.3.4')).toThrow();
  expect(() => serializeIPv4Address(' 1.2.3.4')).toThrow();
  expect(() => serializeIPv4Address('invalid')).toThrow();
});

test('checks whether a string is an IPv4 address', () => {
  expect(isIPv4Address('10.0.0.50')).toBe(true);
  expect(isIPv4Address('10.0.0.500')).toBe(false);
  expect(isIPv4Address('not-an-ip')).toBe(false);
  expect(isIPv4Address('')).toBe(false);
});

test('normalizes an IPv4 address', () => {
  expect(normalizeIPv4Address('192.168.0.1')).toBe('192.168.0.1');
  expect(() => normalizeIPv4Address('192.168.000.1')).toThrow();
});

test('parses a cidr notation string', () => {
  expect(parseIPv4Cidr('192.168.1.0/24')).toEqual({
    ipAddress: '192.168.1.0',
    prefixLength: 24,
    netmask: '255.255.255.0',
  });
  expect(parseIPv4Cidr('10.0.0.0/8').netmask).toBe('255.0.0.0');
  expect(parseIPv4Cidr('10.0.0.0/30').netmask).toBe('255.255.255.252');
  expect(parseIPv4Cidr('0.0.0.0/0').netmask).toBe('0.0.0.0');
  expect(parseIPv4Cidr('10.0.0.1/32').netmask).toBe('255.255.255.255');
});

test('rejects malformed cidr notation strings', () => {
  expect(() => parseIPv4Cidr('192.168.1.0')).toThrow(
    'invalid cidr: 192.168.1.0'
  );
  expect(() => parseIPv4Cidr('192.168.1.0/33')).toThrow(
    'invalid cidr: 192.168.1.0/33'
  );
  expect(() => parseIPv4Cidr('192.168.1.0/2a')).toThrow();
  expect(() => parseIPv4Cidr('192.168.1/24')).toThrow();
  expect(() => parseIPv4Cidr('192.168.1.0/24/8')).toThrow();
});

test('generates a netmask from a mask size', () => {
  expect(generateNetmask(24)).toEqual(Uint8Array.from([255, 255, 255, 0]));
  expect(generateNetmask(16)).toEqual(Uint8Array.from([255, 255, 0, 0]));
  expect(generateNetmask(8)).toEqual(Uint8Array.from([255, 0, 0, 0]));
  expect(generateNetmask(20)).toEqual(Uint8Array.from([255, 255, 240, 0]));
});

test('throws an error for invalid mask sizes', () => {
  expect(() => generateNetmask(33)).toThrow('invalid mask size');
  expect(() => generateNetmask(-1)).toThrow('invalid mask size');
});

test('formats a Uint8Array into an IPv4 address string', () => {
  expect(parseIPv4Address(Uint8Array.from([192, 168, 1, 1]))).toBe(
    '192.168.1.1'
  );
  expect(parseIPv4Address(Uint8Array.from([10, 0, 0, 1]))).toBe('10.0.0.1');
  expect(parseIPv4Address(Uint8Array.from([255, 255, 255, 255]))).toBe(
    '255.255.255.255'
  );
  expect(parseIPv4Address(Uint8Array.from([0, 0, 0, 0]))).toBe('0.0.0.0');
  expect(() => parseIPv4Address(Uint8Array.from([1, 2, 3]))).toThrow(
    'invalid ipv4 address'
  );
});
