import {CIDR, createCIDRFromAddress} from '../vpc/cidr';
import {InvalidRequestError, SearchExhaustedError} from './errors';
import {ReservationSet} from './reservations';

type SearchStrategy = 'expanding' | 'base';

const SEARCH_STRATEGIES: readonly SearchStrategy[] = ['expanding', 'base'];

interface ExpandingSearchOptions {
  // Second-octet bounds, inclusive. Default to the region's own span.
  outerMin?: number;
  outerMax?: number;
  // Third octet the first outer value starts from
  startInner?: number;
}

interface SearchOutcome {
  block: CIDR;
  candidatesTried: number;
}

function exhausted(
  region: CIDR,
  prefix: number,
  reservations: ReservationSet,
  candidatesTried: number
): SearchExhaustedError {
  const cover = reservations.covering(region);

  return new SearchExhaustedError(
    region.toCidrString(),
    prefix,
    candidatesTried,
    cover ? cover.toCidrString() : undefined
  );
}

function firstFree(
  candidates: Iterable<CIDR>,
  reservations: ReservationSet
): SearchOutcome | number {
  let candidatesTried = 0;

  for (const candidate of candidates) {
    candidatesTried++;
    if (!reservations.overlapsAny(candidate)) {
      return {block: candidate, candidatesTried};
    }
  }

  return candidatesTried;
}

function* baseCandidates(base: CIDR, prefix: number): Generator<CIDR> {
  if (prefix < base.prefix) {
    return;
  }

  let candidate: CIDR | undefined = base.withPrefix(prefix);

  while (candidate) {
    yield candidate;
    candidate = candidate.next(base);
  }
}

function checkOctet(name: string, value: number) {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new InvalidRequestError(`${name} must be between 0 and 255`);
  }
}

function* expandingCandidates(
  region: CIDR,
  prefix: number,
  options: ExpandingSearchOptions
): Generator<CIDR> {
  if (!Number.isInteger(prefix) || prefix < 16 || prefix > 32) {
    throw new InvalidRequestError(
      `expanding search needs a prefix between /16 and /32, got /${prefix}`
    );
  }

  const last = createCIDRFromAddress(region.lastAddress(), 32);
  const outerMin = options.outerMin ?? region.octet(1);
  const outerMax = options.outerMax ?? last.octet(1);
  const startInner = options.startInner ?? 0;

  checkOctet('outerMin', outerMin);
  checkOctet('outerMax', outerMax);
  checkOctet('startInner', startInner);

  if (outerMin > outerMax) {
    throw new InvalidRequestError(
      `outerMin ${outerMin} is greater than outerMax ${outerMax}`
    );
  }

  const first = region.octet(0) * Math.pow(256, 3);
  // Prefixes up to /24 span whole third-octet values
  const innerStep = prefix <= 24 ? Math.pow(2, 24 - prefix) : 1;

  for (let outer = outerMin; outer <= outerMax; outer++) {
    const innerStart = outer === outerMin ? startInner : 0;

    for (let inner = innerStart; inner < 256; inner++) {
      if (inner % innerStep !== 0) {
        continue;
      }

      const bucket = createCIDRFromAddress(
        first + outer * Math.pow(256, 2) + inner * 256,
        Math.min(prefix, 24)
      );

      for (const candidate of baseCandidates(bucket, prefix)) {
        if (region.contains(candidate)) {
          yield candidate;
        }
      }
    }
  }
}

/**
 * Returns the lowest `/prefix` block inside `base` that overlaps nothing
 * reserved.
 */
function findInBase(
  base: CIDR,
  prefix: number,
  reservations: ReservationSet
): SearchOutcome {
  const outcome = firstFree(baseCandidates(base, prefix), reservations);

  if (typeof outcome === 'number') {
    throw exhausted(base, prefix, reservations, outcome);
  }

  return outcome;
}

/**
 * Walks `first.outer.inner.0` buckets of the region, exhausting the third
 * octet before moving the second, and returns the first free `/prefix`.
 *
 * With a /24 target in 172.16.0.0/16 the order is 172.16.0.0/24,
 * 172.16.1.0/24, ... 172.16.255.0/24. Targets longer than /24 are tried
 * low to high inside each bucket.
 */
function findExpanding(
  region: CIDR,
  prefix: number,
  reservations: ReservationSet,
  options: ExpandingSearchOptions = {}
): SearchOutcome {
  const outcome = firstFree(
    expandingCandidates(region, prefix, options),
    reservations
  );

  if (typeof outcome === 'number') {
    throw exhausted(region, prefix, reservations, outcome);
  }

  return outcome;
}

function isSearchStrategy(value: unknown): value is SearchStrategy {
  return SEARCH_STRATEGIES.some(s => s === value);
}

export {
  SearchStrategy,
  SEARCH_STRATEGIES,
  ExpandingSearchOptions,
  SearchOutcome,
  findInBase,
  findExpanding,
  isSearchStrategy,
};
