import type { IPv4Address } from '@dhcp-lease/wire';
import { PoolExhaustedError } from './errors.js';

/**
 * FIFO queue of unassigned dynamic addresses.
 *
 * Addresses are handed out from the head and returned to the tail, so the
 * address that has been free the longest is always assigned first. An address
 * is never queued twice.
 */
export class AddressPool implements Iterable<IPv4Address> {
  #queue: IPv4Address[] = [];
  #members = new Set<IPv4Address>();

  constructor(addresses: Iterable<IPv4Address> = []) {
    for (const ip of addresses) {
      this.release(ip);
    }
  }

  get size() {
    return this.#queue.length;
  }

  has(ip: IPv4Address) {
    return this.#members.has(ip);
  }

  /**
   * Removes and returns the address at the head of the pool.
   */
  take(): IPv4Address {
    const ip = this.#queue.shift();

    if (ip === undefined) {
      throw new PoolExhaustedError();
    }

    this.#members.delete(ip);
    return ip;
  }

  /**
   * Appends an address to the tail of the pool.
   *
   * Returns `false` if the address was already in the pool.
   */
  release(ip: IPv4Address) {
    if (this.#members.has(ip)) {
      return false;
    }

    this.#queue.push(ip);
    this.#members.add(ip);
    return true;
  }

  [Symbol.iterator](): Iterator<IPv4Address> {
    return this.#queue[Symbol.iterator]();
  }
}
