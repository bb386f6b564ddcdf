import {ADDRESS_SPACE, blockSize} from '../vpc/cidr';
import {CapacityUnsatisfiableError} from './errors';

// AWS keeps the network, router, DNS, reserved and broadcast addresses
const DEFAULT_RESERVED_PER_SUBNET = 5;

/**
 * Smallest prefix length whose block holds at least `total` addresses.
 */
function prefixLengthForAddresses(total: number): number {
  if (!Number.isInteger(total) || total < 1) {
    throw new CapacityUnsatisfiableError(
      total,
      'address count must be a positive integer'
    );
  }
  if (total > ADDRESS_SPACE) {
    throw new CapacityUnsatisfiableError(total, 'larger than a /0');
  }

  let prefix = 32;

  while (blockSize(prefix) < total) {
    prefix--;
  }

  return prefix;
}

/**
 * Smallest prefix length leaving at least `usable` host addresses once the
 * platform has taken `reserved` of them.
 */
function prefixLengthForUsable(
  usable: number,
  reserved = DEFAULT_RESERVED_PER_SUBNET
): number {
  if (!Number.isInteger(reserved) || reserved < 0) {
    throw new CapacityUnsatisfiableError(
      usable,
      `reserved address count ${reserved} must be a non-negative integer`
    );
  }
  if (!Number.isInteger(usable) || usable < 0) {
    throw new CapacityUnsatisfiableError(
      usable,
      'usable address count must be a non-negative integer'
    );
  }
  if (usable + reserved > ADDRESS_SPACE) {
    throw new CapacityUnsatisfiableError(
      usable,
      `a /0 leaves only ${ADDRESS_SPACE - reserved} usable addresses`
    );
  }

  // Nothing usable and nothing reserved still takes a single address
  return prefixLengthForAddresses(Math.max(1, usable + reserved));
}

function usableAddresses(
  prefix: number,
  reserved = DEFAULT_RESERVED_PER_SUBNET
): number {
  return Math.max(0, blockSize(prefix) - reserved);
}

export {
  DEFAULT_RESERVED_PER_SUBNET,
  prefixLengthForAddresses,
  prefixLengthForUsable,
  usableAddresses,
};
