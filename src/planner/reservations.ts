import {CIDR, createCIDR} from '../vpc/cidr';

/*
Immutable snapshot of blocks that are already taken. Adding a block returns
a new set, so a caller's set never changes underneath it.
*/
class ReservationSet {
  private readonly reserved: ReadonlyMap<string, CIDR>;

  constructor(blocks: Iterable<CIDR> = []) {
    const reserved = new Map<string, CIDR>();

    for (const block of blocks) {
      reserved.set(block.key(), block);
    }

    this.reserved = reserved;
  }

  get size(): number {
    return this.reserved.size;
  }

  blocks(): CIDR[] {
    return [...this.reserved.values()];
  }

  has(block: CIDR): boolean {
    return this.reserved.has(block.key());
  }

  /*
  Returns the first reserved block intersecting the candidate
  */
  overlapping(candidate: CIDR): CIDR | undefined {
    for (const block of this.reserved.values()) {
      if (block.overlaps(candidate)) {
        return block;
      }
    }

    return undefined;
  }

  overlapsAny(candidate: CIDR): boolean {
    return this.overlapping(candidate) !== undefined;
  }

  /*
  Returns a reserved block that holds the whole candidate, if any
  */
  covering(candidate: CIDR): CIDR | undefined {
    for (const block of this.reserved.values()) {
      if (block.contains(candidate)) {
        return block;
      }
    }

    return undefined;
  }

  with(...blocks: CIDR[]): ReservationSet {
    return new ReservationSet([...this.reserved.values(), ...blocks]);
  }
}

/*
Builds a set from inventory literals. Each literal is canonicalized; the
first malformed one aborts with InvalidCidrError naming it. Blank entries
are ignored.
*/
function createReservationSet(literals: Iterable<string>): ReservationSet {
  const blocks: CIDR[] = [];

  for (const literal of literals) {
    if (literal.trim() === '') {
      continue;
    }
    blocks.push(createCIDR(literal));
  }

  return new ReservationSet(blocks);
}

export {ReservationSet, createReservationSet};
