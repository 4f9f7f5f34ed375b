import { parseArgs } from 'node:util';
import { loadConfig, type DhcpConfig } from './config.js';
import { DEFAULT_CONFIG_PATH, DEFAULT_INTERFACE } from './constants.js';
import { ConfigInvalidError } from './errors.js';
import { LeaseAllocator } from './lease-allocator.js';

const usage = `usage: dhcpd-check [--config <file>] [--iface <name>]

Validates a DHCP server configuration and prints the effective settings.

options:
  -c, --config <file>  configuration file (default: ${DEFAULT_CONFIG_PATH})
  -i, --iface <name>   network interface, overrides the configuration file
  -h, --help           show this message`;

/**
 * Runs the configuration check and returns the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  let values: { config?: string; iface?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        config: { type: 'string', short: 'c' },
        iface: { type: 'string', short: 'i' },
        help: { type: 'boolean', short: 'h' },
      },
    }));
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    console.error(usage);
    return 1;
  }

  if (values.help) {
    console.log(usage);
    return 0;
  }

  const configPath = values.config ?? DEFAULT_CONFIG_PATH;

  let config: DhcpConfig;
  try {
    config = await loadConfig(configPath);
  } catch (err) {
    if (err instanceof ConfigInvalidError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  // Precedence: command-line > config file > default
  const iface = values.iface ?? config.interface ?? DEFAULT_INTERFACE;

  const allocator = new LeaseAllocator({
    leaseRange: config.range,
    leaseDuration: config.leaseDuration,
    reservedAddresses: config.reservedAddresses,
  });
  const stats = allocator.stats();

  console.log(`configuration ok: ${configPath}`);
  console.log(`interface: ${iface}`);
  console.log(`network: ${config.network} (netmask ${config.netmask})`);
  console.log(
    `range: ${config.range.start}-${config.range.end} (${stats.total} addresses, ${stats.available} available)`
  );
  console.log(`lease duration: ${config.leaseDuration}s`);

  if (config.gateway) {
    console.log(`gateway: ${config.gateway}`);
  }

  if (config.dnsServers.length > 0) {
    console.log(`dns servers: ${config.dnsServers.join(', ')}`);
  }

  for (const [mac, ip] of Object.entries(config.reservedAddresses)) {
    console.log(`reserved: ${mac} -> ${ip}`);
  }

  return 0;
}
