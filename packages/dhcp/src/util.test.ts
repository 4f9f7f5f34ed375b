import { describe, expect, test } from 'vitest';
import {
  expandIPv4Range,
  ipv4RangeSize,
  ipv4ToNumber,
  numberToIPv4,
} from './util.js';

describe('ipv4ToNumber', () => {
  test('should convert valid IPv4 addresses to numbers', () => {
    expect(ipv4ToNumber('0.0.0.0')).toBe(0x000000);
    expect(ipv4ToNumber('192.168.1.1')).toBe(0xc0a80101);
    expect(ipv4ToNumber('255.255.255.255')).toBe(0xffffffff);
    expect(ipv4ToNumber('10.0.0.1')).toBe(0x0a000001);
  });

  test('should handle single digit octets', () => {
    expect(ipv4ToNumber('1.2.3.4')).toBe(16909060);
  });

  test('throws error for invalid IPv4 addresses', () => {
    expect(() => ipv4ToNumber('256.1.2.3')).toThrow();
    expect(() => ipv4ToNumber('1.2.3.256')).toThrow();
    expect(() => ipv4ToNumber('1.2.3')).toThrow();
    expect(() => ipv4ToNumber('1.2.3.4.5')).toThrow();
    expect(() => ipv4ToNumber('invalid')).toThrow();
  });
});

describe('numberToIPv4', () => {
  test('should convert numbers to valid IPv4 addresses', () => {
    expect(numberToIPv4(0)).toBe('0.0.0.0');
    expect(numberToIPv4(3232235777)).toBe('192.168.1.1');
    expect(numberToIPv4(4294967295)).toBe('255.255.255.255');
    expect(numberToIPv4(167772161)).toBe('10.0.0.1');
  });

  test('should throw error for invalid numbers', () => {
    expect(() => numberToIPv4(-1)).toThrow('invalid ipv4 number');
    expect(() => numberToIPv4(4294967296)).toThrow('invalid ipv4 number');
    expect(() => numberToIPv4(NaN)).toThrow('invalid ipv4 number');
    expect(() => numberToIPv4(1.5)).toThrow('invalid ipv4 number');
  });
});

describe('expandIPv4Range', () => {
  test('includes both ends of the range', () => {
    expect(expandIPv4Range('10.0.0.2', '10.0.0.4')).toEqual([
      '10.0.0.2',
      '10.0.0.3',
      '10.0.0.4',
    ]);
  });

  test('carries across octet boundaries', () => {
    expect(expandIPv4Range('10.0.0.254', '10.0.1.1')).toEqual([
      '10.0.0.254',
      '10.0.0.255',
      '10.0.1.0',
      '10.0.1.1',
    ]);
  });

  test('handles a single address range', () => {
    expect(expandIPv4Range('10.0.0.9', '10.0.0.9')).toEqual(['10.0.0.9']);
  });

  test('throws when start is after end', () => {
    expect(() => expandIPv4Range('10.0.0.5', '10.0.0.4')).toThrow(
      'invalid ipv4 range: 10.0.0.5-10.0.0.4'
    );
  });
});

describe('ipv4RangeSize', () => {
  test('counts addresses inclusively', () => {
    expect(ipv4RangeSize('10.0.0.2', '10.0.0.4')).toBe(3);
    expect(ipv4RangeSize('10.0.0.0', '10.0.255.255')).toBe(65536);
  });
});
