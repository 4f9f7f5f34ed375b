import {
  isIPv4Address,
  normalizeHardwareAddress,
  type IPv4Address,
} from '@dhcp-lease/wire';
import { AddressPool } from './address-pool.js';
import { DEFAULT_LEASE_DURATION, MAX_RANGE_SIZE } from './constants.js';
import {
  HardwareAddressInvalidError,
  PoolExhaustedError,
  ReservedAddressInvalidError,
} from './errors.js';
import type { DhcpLease, LeaseStats, ResolveResult } from './types.js';
import { expandIPv4Range, ipv4RangeSize } from './util.js';

export type LeaseAllocatorOptions = {
  /**
   * Range of IP addresses to lease dynamically (inclusive).
   */
  leaseRange: {
    start: string;
    end: string;
  };

  /**
   * Duration of a lease in seconds.
   *
   * @default 86400
   */
  leaseDuration?: number;

  /**
   * Fixed IP addresses keyed by client hardware address.
   *
   * Reserved addresses inside `leaseRange` are never leased dynamically.
   */
  reservedAddresses?: Record<string, string>;
};

/**
 * Decides which IP address each client receives.
 *
 * Owns the pool of free dynamic addresses and the lease table. Every public
 * method runs synchronously, so each call completes as a single atomic step
 * even when requests are handled concurrently.
 *
 * Expired leases are reclaimed lazily: only when a new address has to be
 * drawn from the pool, or when `sweep()` is called.
 */
export class LeaseAllocator {
  #pool: AddressPool;
  #leases = new Map<string, DhcpLease>();
  #reservations = new Map<string, string>();
  #reservedIPs = new Set<string>();
  #leaseDuration: number;
  #rangeSize: number;

  constructor(options: LeaseAllocatorOptions) {
    const leaseDuration = options.leaseDuration ?? DEFAULT_LEASE_DURATION;

    if (!Number.isInteger(leaseDuration) || leaseDuration <= 0) {
      throw new Error(`invalid lease duration: ${leaseDuration}`);
    }

    this.#leaseDuration = leaseDuration * 1000;

    for (const [key, ip] of Object.entries(options.reservedAddresses ?? {})) {
      const mac = normalizeHardwareAddress(key);

      if (this.#reservations.has(mac)) {
        throw new Error(`duplicate reservation for ${mac}`);
      }
      if (this.#reservedIPs.has(ip)) {
        throw new Error(`duplicate reserved ip: ${ip}`);
      }
      this.#reservations.set(mac, ip);
      this.#reservedIPs.add(ip);
    }

    const { start, end } = options.leaseRange;

    this.#rangeSize = ipv4RangeSize(start, end);
    if (this.#rangeSize > MAX_RANGE_SIZE) {
      throw new Error(
        `ipv4 range is larger than ${MAX_RANGE_SIZE} addresses: ${start}-${end}`
      );
    }

    const range = expandIPv4Range(start, end);
    this.#pool = new AddressPool(
      range.filter((ip) => !this.#reservedIPs.has(ip))
    );
  }

  /**
   * Resolves the IP address for a client, creating or renewing its lease.
   *
   * Called identically for DISCOVER and REQUEST. Failures are returned
   * rather than thrown.
   */
  resolve(mac: string): ResolveResult {
    let clientMac: string;
    try {
      clientMac = normalizeHardwareAddress(mac);
    } catch (err) {
      return {
        ok: false,
        error: new HardwareAddressInvalidError(mac, { cause: err }),
      };
    }

    const now = Date.now();
    const expiresAt = now + this.#leaseDuration;

    // Reservations always win over dynamic history
    const reservedIP = this.#reservations.get(clientMac);
    if (reservedIP !== undefined) {
      if (!isIPv4Address(reservedIP)) {
        return {
          ok: false,
          error: new ReservedAddressInvalidError(clientMac, reservedIP),
        };
      }

      this.#leases.set(clientMac, {
        ip: reservedIP,
        mac: clientMac,
        expiresAt,
      });
      return { ok: true, ip: reservedIP };
    }

    // Reuse the client's previous address (even if expired) unless
    // another client now actively holds it
    const existingLease = this.#leases.get(clientMac);
    if (existingLease) {
      if (!this.#isHeldByOther(existingLease.ip, clientMac, now)) {
        existingLease.expiresAt = expiresAt;
        return { ok: true, ip: existingLease.ip };
      }

      this.#leases.delete(clientMac);
    }

    this.#reclaimExpired(now);

    let ip: IPv4Address;
    try {
      ip = this.#pool.take();
    } catch (err) {
      if (err instanceof PoolExhaustedError) {
        return { ok: false, error: err };
      }
      throw err;
    }

    this.#leases.set(clientMac, { ip, mac: clientMac, expiresAt });
    return { ok: true, ip };
  }

  /**
   * Ends a client's dynamic lease and returns its address to the pool.
   *
   * Reserved clients keep their lease record. Returns the released
   * address, if any.
   */
  release(mac: string): IPv4Address | undefined {
    const clientMac = toLeaseKey(mac);
    const lease =
      clientMac === undefined ? undefined : this.#leases.get(clientMac);

    if (!lease || this.#reservations.has(lease.mac)) {
      return undefined;
    }

    this.#leases.delete(lease.mac);

    if (
      !this.#reservedIPs.has(lease.ip) &&
      !this.#isHeldByOther(lease.ip, lease.mac, Date.now())
    ) {
      this.#pool.release(lease.ip);
    }

    return lease.ip;
  }

  /**
   * Reclaims every expired dynamic lease into the pool.
   *
   * Returns the addresses that re-entered the pool.
   */
  sweep() {
    return this.#reclaimExpired(Date.now());
  }

  /**
   * Looks up the lease record for a client.
   */
  lease(mac: string): DhcpLease | undefined {
    const lease = this.#findLease(mac);
    return lease ? { ...lease } : undefined;
  }

  /**
   * Snapshot of every lease record, including expired ones not yet reclaimed.
   */
  leases(): DhcpLease[] {
    return Array.from(this.#leases.values(), (lease) => ({ ...lease }));
  }

  /**
   * Whether a client has an unexpired lease.
   */
  isActive(mac: string) {
    const lease = this.#findLease(mac);
    return lease !== undefined && !isExpired(lease, Date.now());
  }

  stats(): LeaseStats {
    const now = Date.now();
    let leased = 0;

    for (const lease of this.#leases.values()) {
      if (!this.#reservedIPs.has(lease.ip) && !isExpired(lease, now)) {
        leased++;
      }
    }

    return {
      total: this.#rangeSize,
      available: this.#pool.size,
      leased,
      reserved: this.#reservations.size,
    };
  }

  #findLease(mac: string) {
    const key = toLeaseKey(mac);
    return key === undefined ? undefined : this.#leases.get(key);
  }

  #isHeldByOther(ip: IPv4Address, mac: string, now: number) {
    for (const [otherMac, otherLease] of this.#leases) {
      if (
        otherMac !== mac &&
        otherLease.ip === ip &&
        !isExpired(otherLease, now)
      ) {
        return true;
      }
    }
    return false;
  }

  #reclaimExpired(now: number) {
    const reclaimed: IPv4Address[] = [];

    for (const [mac, lease] of this.#leases) {
      // Reserved clients keep their record indefinitely
      if (!isExpired(lease, now) || this.#reservedIPs.has(lease.ip)) {
        continue;
      }

      this.#leases.delete(mac);

      if (
        !this.#isHeldByOther(lease.ip, mac, now) &&
        this.#pool.release(lease.ip)
      ) {
        reclaimed.push(lease.ip);
      }
    }

    return reclaimed;
  }
}

/**
 * Normalized hardware address, or `undefined` when `mac` cannot be one.
 */
function toLeaseKey(mac: string) {
  try {
    return normalizeHardwareAddress(mac);
  } catch {
    return undefined;
  }
}

function isExpired(lease: DhcpLease, now: number) {
  return now >= lease.expiresAt;
}
