export type DhcpErrorCode =
  | 'CONFIG_INVALID'
  | 'POOL_EXHAUSTED'
  | 'RESERVED_ADDRESS_INVALID'
  | 'HARDWARE_ADDRESS_INVALID';

export class DhcpError extends Error {
  readonly code: DhcpErrorCode;

  constructor(code: DhcpErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The configuration is malformed. Fatal at startup.
 */
export class ConfigInvalidError extends DhcpError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_INVALID', `invalid config: ${message}`, options);
  }
}

/**
 * No free dynamic address is left for a new client.
 */
export class PoolExhaustedError extends DhcpError {
  constructor() {
    super('POOL_EXHAUSTED', 'no available ip addresses');
  }
}

/**
 * A reservation maps a client to a value that is not an IPv4 address.
 */
export class ReservedAddressInvalidError extends DhcpError {
  readonly mac: string;
  readonly value: string;

  constructor(mac: string, value: string) {
    super(
      'RESERVED_ADDRESS_INVALID',
      `invalid reserved ip for ${mac}: ${value}`
    );
    this.mac = mac;
    this.value = value;
  }
}

/**
 * A client hardware address is not a sequence of hex octets.
 */
export class HardwareAddressInvalidError extends DhcpError {
  readonly value: string;

  constructor(value: string, options?: ErrorOptions) {
    super(
      'HARDWARE_ADDRESS_INVALID',
      `invalid hardware address: ${value}`,
      options
    );
    this.value = value;
  }
}
