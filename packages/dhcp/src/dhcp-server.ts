import {
  normalizeHardwareAddress,
  normalizeIPv4Address,
  type IPv4Address,
} from '@dhcp-lease/wire';
import { EventEmitter } from 'eventemitter3';
import { DEFAULT_LEASE_DURATION } from './constants.js';
import { LeaseAllocator } from './lease-allocator.js';
import type {
  DhcpPacketLayer,
  DhcpReply,
  DhcpReplyType,
  DhcpRequest,
  ResolveError,
} from './types.js';

export type DhcpServerOptions = {
  /**
   * Range of IP addresses to lease.
   */
  leaseRange: {
    start: string;
    end: string;
  };

  /**
   * Duration of a lease in seconds.
   */
  leaseDuration?: number;

  /**
   * Fixed IP addresses keyed by client hardware address.
   */
  reservedAddresses?: Record<string, string>;

  /**
   * Subnet mask to assign to clients.
   */
  netmask: string;

  /**
   * IP address of the router to assign to clients.
   */
  router?: string;

  /**
   * IP addresses of DNS servers to assign to clients.
   */
  dnsServers?: string[];

  /**
   * Seconds between background sweeps of expired leases.
   *
   * Expired leases are otherwise only reclaimed when a new address
   * has to be allocated.
   */
  sweepInterval?: number;
};

export interface DhcpServerEventTypes {
  offer: (reply: DhcpReply) => void;
  ack: (reply: DhcpReply) => void;
  release: (mac: string, ip: IPv4Address) => void;
  drop: (request: DhcpRequest, error: ResolveError) => void;
  sweep: (reclaimed: IPv4Address[]) => void;
  error: (err: unknown) => void;
}

/**
 * Answers DISCOVER and REQUEST messages delivered by a packet layer.
 *
 * DISCOVER and REQUEST both re-resolve the client's address through the
 * same allocator call; REQUEST does not check the requested address
 * against the previous offer. No NAK is ever sent: when no address can be
 * assigned the request is dropped and the client retries.
 */
export class DhcpServer extends EventEmitter<DhcpServerEventTypes> {
  #packetLayer: DhcpPacketLayer;
  #allocator: LeaseAllocator;
  #leaseDuration: number;
  #netmask: IPv4Address;
  #router?: IPv4Address;
  #dnsServers: IPv4Address[];
  #sweepInterval?: number;
  #sweepTimer?: ReturnType<typeof setInterval>;
  #listening = false;
  #closed = false;

  constructor(packetLayer: DhcpPacketLayer, options: DhcpServerOptions) {
    super();

    const { sweepInterval } = options;
    if (
      sweepInterval !== undefined &&
      (!Number.isInteger(sweepInterval) || sweepInterval <= 0)
    ) {
      throw new Error(`invalid sweep interval: ${sweepInterval}`);
    }

    this.#packetLayer = packetLayer;
    this.#leaseDuration = options.leaseDuration ?? DEFAULT_LEASE_DURATION;
    this.#allocator = new LeaseAllocator({
      leaseRange: options.leaseRange,
      leaseDuration: this.#leaseDuration,
      reservedAddresses: options.reservedAddresses,
    });
    this.#netmask = normalizeIPv4Address(options.netmask);
    this.#router = options.router
      ? normalizeIPv4Address(options.router)
      : undefined;
    this.#dnsServers = (options.dnsServers ?? []).map(normalizeIPv4Address);
    this.#sweepInterval = sweepInterval;
  }

  get allocator() {
    return this.#allocator;
  }

  async listen() {
    if (this.#listening) {
      throw new Error('dhcp server is already listening');
    }
    this.#listening = true;

    if (this.#sweepInterval) {
      this.#sweepTimer = setInterval(
        () => this.#sweep(),
        this.#sweepInterval * 1000
      );
      this.#sweepTimer.unref();
    }

    void this.#processDhcpRequests();
  }

  /**
   * Stops the background sweep and stops taking requests from the
   * packet layer.
   */
  async close() {
    this.#closed = true;
    clearInterval(this.#sweepTimer);
    this.#sweepTimer = undefined;
  }

  async #processDhcpRequests() {
    try {
      for await (const request of this.#packetLayer) {
        if (this.#closed) {
          break;
        }

        // Process each request without blocking
        void this.#processDhcpRequest(request);
      }
    } catch (err) {
      console.error('error reading dhcp requests:', err);
      this.emit('error', err);
    }
  }

  async #processDhcpRequest(request: DhcpRequest) {
    try {
      const reply = this.handleRequest(request);
      if (reply) {
        await this.#packetLayer.send(reply);
      }
    } catch (err) {
      console.error('error processing dhcp request:', err);
      this.emit('error', err);
    }
  }

  /**
   * Handles a single client message and returns the reply to send, if any.
   */
  handleRequest(request: DhcpRequest): DhcpReply | undefined {
    console.log(`received ${request.type} from ${request.mac}`);

    switch (request.type) {
      case 'DISCOVER':
        return this.#handleDiscover(request);
      case 'REQUEST':
        return this.#handleRequest(request);
      case 'RELEASE':
        return this.#handleRelease(request);
      default:
        throw new Error(
          `received unsupported dhcp client message type: ${request.type}`
        );
    }
  }

  #handleDiscover(request: DhcpRequest) {
    const reply = this.#createReply(request, 'OFFER');
    if (reply) {
      console.log(`offering ip ${reply.yiaddr} to ${reply.mac}`);
      this.emit('offer', reply);
    }
    return reply;
  }

  #handleRequest(request: DhcpRequest) {
    const reply = this.#createReply(request, 'ACK');
    if (reply) {
      console.log(`assigned ip ${reply.yiaddr} to ${reply.mac}`);
      this.emit('ack', reply);
    }
    return reply;
  }

  #handleRelease(request: DhcpRequest) {
    const ip = this.#allocator.release(request.mac);
    if (ip) {
      const mac = normalizeHardwareAddress(request.mac);
      console.log(`released ip ${ip} from ${mac}`);
      this.emit('release', mac, ip);
    }
    return undefined;
  }

  #createReply(
    request: DhcpRequest,
    type: DhcpReplyType
  ): DhcpReply | undefined {
    const result = this.#allocator.resolve(request.mac);

    if (!result.ok) {
      console.error(
        `error getting ip for ${request.mac}: ${result.error.message}`
      );
      this.emit('drop', request, result.error);
      return undefined;
    }

    const reply: DhcpReply = {
      type,
      xid: request.xid,
      mac: normalizeHardwareAddress(request.mac),
      yiaddr: result.ip,
      subnetMask: this.#netmask,
      leaseTime: this.#leaseDuration,
    };

    if (this.#router) {
      reply.router = this.#router;
    }

    if (this.#dnsServers.length > 0) {
      reply.dnsServers = [...this.#dnsServers];
    }

    return reply;
  }

  #sweep() {
    const reclaimed = this.#allocator.sweep();
    if (reclaimed.length > 0) {
      console.log(`reclaimed ${reclaimed.length} expired leases`);
      this.emit('sweep', reclaimed);
    }
  }
}
