import { InvalidInputError, NetworkAddressBlock } from '../types';

const CIDR_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

function fail(raw: string, reason: string): never {
  throw new InvalidInputError([{ field: 'cidr', message: `${JSON.stringify(raw)} ${reason}` }]);
}

/**
 * Parse an IPv4 CIDR block such as `10.0.0.0/16`.
 *
 * Octets and prefix are plain decimal without leading zeros, and the address
 * must be the network address of the block (no host bits set).
 */
export function validateAddressBlock(raw: string): NetworkAddressBlock {
  const match = CIDR_PATTERN.exec(raw);
  if (!match) {
    fail(raw, 'is not of the form a.b.c.d/n');
  }

  const [, a, b, c, d, prefix] = match;
  const parts = [a, b, c, d];
  for (const part of [...parts, prefix]) {
    if (part.length > 1 && part.startsWith('0')) {
      fail(raw, `has a leading zero in "${part}"`);
    }
  }

  const [o1, o2, o3, o4] = parts.map(Number);
  for (const octet of [o1, o2, o3, o4]) {
    if (octet > 255) {
      fail(raw, `has octet ${octet} out of range 0-255`);
    }
  }

  const prefixLength = Number(prefix);
  if (prefixLength > 32) {
    fail(raw, `has prefix /${prefixLength} out of range 0-32`);
  }

  const octets = [o1, o2, o3, o4] as const;
  const value = toUint32(octets);
  if ((value & ~prefixMask(prefixLength)) >>> 0 !== 0) {
    fail(raw, `has host bits set beyond /${prefixLength}`);
  }

  const address = octets.join('.');
  return Object.freeze({
    block: `${address}/${prefixLength}`,
    address,
    prefixLength,
    octets
  });
}

/** True when every address of `inner` is also in `outer`. */
export function containsBlock(outer: NetworkAddressBlock, inner: NetworkAddressBlock): boolean {
  if (inner.prefixLength < outer.prefixLength) {
    return false;
  }
  const mask = prefixMask(outer.prefixLength);
  return ((toUint32(inner.octets) & mask) >>> 0) === ((toUint32(outer.octets) & mask) >>> 0);
}

export function blocksOverlap(a: NetworkAddressBlock, b: NetworkAddressBlock): boolean {
  return containsBlock(a, b) || containsBlock(b, a);
}

function toUint32(octets: readonly [number, number, number, number]): number {
  return ((octets[0] << 24) | (octets[1] << 16) | (octets[2] << 8) | octets[3]) >>> 0;
}

function prefixMask(prefixLength: number): number {
  // a shift by 32 is a no-op in JS, so /0 is special-cased
  return prefixLength === 0 ? 0 : (~0 << (32 - prefixLength)) >>> 0;
}
