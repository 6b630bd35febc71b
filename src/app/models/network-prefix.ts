// Network and address type share the first byte of an encoded address:
// prefix byte = network prefix + address type. The two canonical networks are
// split at 16, so decoding only checks which side of 16 the head byte falls on.

export type NetworkPrefix = number;

export const MAINNET_NETWORK_PREFIX: NetworkPrefix = 0;
export const TESTNET_NETWORK_PREFIX: NetworkPrefix = 16;

export type NetworkName = "mainnet" | "testnet" | "custom";

export function toNetworkPrefix(value: number): NetworkPrefix {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError("Network prefix must be an integer byte (0-255), got " + value);
  }
  return value;
}

export function isTestnetAddress(addrHeadByte: number): boolean {
  return addrHeadByte > TESTNET_NETWORK_PREFIX;
}

export function isMainnetAddress(addrHeadByte: number): boolean {
  return addrHeadByte < TESTNET_NETWORK_PREFIX;
}

/** True when addresses of this prefix are expected in the testnet byte range. */
export function usesTestnetRange(prefix: NetworkPrefix): boolean {
  return prefix >= TESTNET_NETWORK_PREFIX;
}

export function networkName(prefix: NetworkPrefix): NetworkName {
  if (prefix === MAINNET_NETWORK_PREFIX) return "mainnet";
  if (prefix === TESTNET_NETWORK_PREFIX) return "testnet";
  return "custom";
}
