import { DhcpServer, type DhcpServerOptions } from './dhcp-server.js';
import type { DhcpPacketLayer } from './types.js';

export * from './address-pool.js';
export * from './config.js';
export * from './dhcp-server.js';
export * from './errors.js';
export * from './lease-allocator.js';
export type {
  DhcpLease,
  DhcpMessageType,
  DhcpPacketLayer,
  DhcpReply,
  DhcpReplyType,
  DhcpRequest,
  LeaseStats,
  ResolveError,
  ResolveResult,
} from './types.js';

/**
 * Creates a DHCP server function on top of a packet layer that
 * decodes client requests and encodes server replies.
 *
 * @example
 * const config = await loadConfig('dhcp_config.yaml');
 * const { serve } = await createDhcp(packetLayer);
 * const dhcpServer = await serve(toServerOptions(config));
 */
export async function createDhcp(packetLayer: DhcpPacketLayer) {
  return {
    serve: async (options: DhcpServerOptions) => {
      const server = new DhcpServer(packetLayer, options);
      await server.listen();
      return server;
    },
  };
}
