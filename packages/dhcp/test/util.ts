import { fileURLToPath } from 'node:url';
import type { DhcpPacketLayer, DhcpReply, DhcpRequest } from '../src/types.js';

export type TestPacketLayer = DhcpPacketLayer & {
  replies: DhcpReply[];
};

/**
 * In-memory packet layer that delivers a fixed list of requests
 * and records every reply sent.
 */
export function createTestPacketLayer(
  requests: DhcpRequest[] = []
): TestPacketLayer {
  const replies: DhcpReply[] = [];

  return {
    replies,
    async send(reply) {
      replies.push(reply);
    },
    async *[Symbol.asyncIterator]() {
      for (const request of requests) {
        yield request;
      }
    },
  };
}

/**
 * Absolute path of a file under `test/fixtures`.
 */
export function fixturePath(name: string) {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}
