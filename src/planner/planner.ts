import {CIDR, alignUp, blockSize, createCIDR, createCIDRFromAddress} from '../vpc/cidr';
import {
  DEFAULT_RESERVED_PER_SUBNET,
  prefixLengthForAddresses,
  prefixLengthForUsable,
  usableAddresses,
} from './capacity';
import {
  InvalidRequestError,
  PlannerError,
  SubnetOverflowError,
  isPlannerError,
} from './errors';
import {toVariableName} from './render';
import {ReservationSet, createReservationSet} from './reservations';
import {
  ExpandingSearchOptions,
  SearchStrategy,
  findExpanding,
  findInBase,
  isSearchStrategy,
} from './search';

const DEFAULT_REGION = '172.16.0.0/12';

interface UsableSubnetRequest {
  role: string;
  usableIps: number;
}

interface PrefixSubnetRequest {
  role: string;
  prefix: number;
}

type SubnetRequest = UsableSubnetRequest | PrefixSubnetRequest;

interface PlanRequest {
  subnets: SubnetRequest[];
  // Defaults to 'expanding'
  strategy?: SearchStrategy;
  // Region searched for the network block, defaults to 172.16.0.0/12
  region?: string;
  // Explicit network size, either as a prefix or a total address count
  networkPrefix?: number;
  networkAddresses?: number;
  reservedPerSubnet?: number;
  expanding?: ExpandingSearchOptions;
}

interface AllocatedSubnet {
  role: string;
  block: CIDR;
  usableIps: number;
}

interface AllocationPlan {
  network: CIDR;
  subnets: AllocatedSubnet[];
  strategy: SearchStrategy;
  candidatesTried: number;
  // Existing reservations plus everything this plan allocated
  reservations: ReservationSet;
}

type PlanResult =
  | {ok: true; plan: AllocationPlan}
  | {ok: false; error: PlannerError};

interface SizedSubnet {
  role: string;
  prefix: number;
}

function isPrefixRequest(request: SubnetRequest): request is PrefixSubnetRequest {
  return 'prefix' in request;
}

function checkPrefix(name: string, prefix: number) {
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > 32) {
    throw new InvalidRequestError(`${name} /${prefix} is outside 0-32`);
  }
}

function sizeSubnets(request: PlanRequest, reserved: number): SizedSubnet[] {
  if (request.subnets.length === 0) {
    throw new InvalidRequestError('at least one subnet is required');
  }

  const roles = new Set<string>();
  // Output names derived from each role, e.g. webApp and web-app both give web_app
  const names = new Map<string, string>();

  return request.subnets.map(subnet => {
    if (subnet.role.trim() === '') {
      throw new InvalidRequestError('subnet role must not be empty');
    }
    if (roles.has(subnet.role)) {
      throw new InvalidRequestError(`duplicate subnet role ${subnet.role}`);
    }
    roles.add(subnet.role);

    const name = toVariableName(subnet.role);
    const clash = names.get(name);

    if (name === '') {
      throw new InvalidRequestError(
        `subnet role ${subnet.role} has no letters or digits to name its outputs`
      );
    }
    if (clash !== undefined) {
      throw new InvalidRequestError(
        `subnet roles ${clash} and ${subnet.role} both map to ${name}`
      );
    }
    names.set(name, subnet.role);

    if (isPrefixRequest(subnet)) {
      checkPrefix(`prefix of subnet ${subnet.role}`, subnet.prefix);
      return {role: subnet.role, prefix: subnet.prefix};
    }

    return {
      role: subnet.role,
      prefix: prefixLengthForUsable(subnet.usableIps, reserved),
    };
  });
}

/*
Space taken when the subnets are laid out from offset 0 in request order,
each aligned to its own size
*/
function packedExtent(subnets: SizedSubnet[]): number {
  let cursor = 0;

  for (const subnet of subnets) {
    cursor = alignUp(cursor, subnet.prefix) + blockSize(subnet.prefix);
  }

  return cursor;
}

function networkPrefixFor(request: PlanRequest, subnets: SizedSubnet[]): number {
  if (request.networkPrefix !== undefined) {
    checkPrefix('networkPrefix', request.networkPrefix);
    return request.networkPrefix;
  }
  if (request.networkAddresses !== undefined) {
    return prefixLengthForAddresses(request.networkAddresses);
  }

  return prefixLengthForAddresses(packedExtent(subnets));
}

function packSubnets(
  network: CIDR,
  subnets: SizedSubnet[],
  reservations: ReservationSet,
  reserved: number
): {subnets: AllocatedSubnet[]; reservations: ReservationSet} {
  const allocated: AllocatedSubnet[] = [];
  // The network itself is not part of this set, its subnets live inside it
  let taken = reservations;
  let cursor = network.value;

  for (const subnet of subnets) {
    if (subnet.prefix < network.prefix) {
      throw new SubnetOverflowError(
        subnet.role,
        network.toCidrString(),
        `a /${subnet.prefix} is larger than the network`
      );
    }

    const address = alignUp(cursor, subnet.prefix);

    if (address > network.lastAddress()) {
      throw new SubnetOverflowError(
        subnet.role,
        network.toCidrString(),
        'no space left after the preceding subnets'
      );
    }

    const block = createCIDRFromAddress(address, subnet.prefix);

    if (!network.contains(block)) {
      throw new SubnetOverflowError(
        subnet.role,
        network.toCidrString(),
        `${block.toCidrString()} runs past the end of the network`
      );
    }

    const collision = taken.overlapping(block);

    if (collision) {
      throw new SubnetOverflowError(
        subnet.role,
        network.toCidrString(),
        `${block.toCidrString()} collides with ${collision.toCidrString()}`
      );
    }

    allocated.push({
      role: subnet.role,
      block,
      usableIps: usableAddresses(subnet.prefix, reserved),
    });
    taken = taken.with(block);
    cursor = block.lastAddress() + 1;
  }

  return {subnets: allocated, reservations: taken};
}

/**
 * Picks a network block clear of every existing reservation and packs the
 * requested subnets into it, in request order.
 *
 * Throws one of the planner errors on failure; the input set is left as is.
 */
function buildPlan(
  existing: Iterable<string> | ReservationSet,
  request: PlanRequest
): AllocationPlan {
  const reservations =
    existing instanceof ReservationSet
      ? existing
      : createReservationSet(existing);
  const strategy = request.strategy ?? 'expanding';

  if (!isSearchStrategy(strategy)) {
    throw new InvalidRequestError(`unknown search strategy ${strategy}`);
  }

  const reserved = request.reservedPerSubnet ?? DEFAULT_RESERVED_PER_SUBNET;
  const region = createCIDR(request.region ?? DEFAULT_REGION, true);
  const subnets = sizeSubnets(request, reserved);
  const networkPrefix = networkPrefixFor(request, subnets);

  const outcome =
    strategy === 'base'
      ? findInBase(region, networkPrefix, reservations)
      : findExpanding(region, networkPrefix, reservations, request.expanding);

  const packed = packSubnets(outcome.block, subnets, reservations, reserved);

  return {
    network: outcome.block,
    subnets: packed.subnets,
    strategy,
    candidatesTried: outcome.candidatesTried,
    reservations: packed.reservations.with(outcome.block),
  };
}

function planAllocation(
  existing: Iterable<string> | ReservationSet,
  request: PlanRequest
): PlanResult {
  try {
    return {ok: true, plan: buildPlan(existing, request)};
  } catch (e) {
    if (isPlannerError(e)) {
      return {ok: false, error: e};
    }
    throw e;
  }
}

export {
  DEFAULT_REGION,
  SubnetRequest,
  UsableSubnetRequest,
  PrefixSubnetRequest,
  PlanRequest,
  AllocatedSubnet,
  AllocationPlan,
  PlanResult,
  buildPlan,
  planAllocation,
};
