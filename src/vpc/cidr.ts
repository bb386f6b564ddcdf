import {InvalidCidrError} from '../planner/errors';

const FACTORS = [Math.pow(256, 3), Math.pow(256, 2), 256, 1];
const ADDRESS_SPACE = Math.pow(2, 32);

function blockSize(prefix: number): number {
  return Math.pow(2, 32 - prefix);
}

function isPrefix(prefix: number): boolean {
  return Number.isInteger(prefix) && prefix >= 0 && prefix <= 32;
}

function formatAddress(address: number): string {
  const octets: number[] = [];
  let _value = address;

  for (let i = 0; i < 4; i++) {
    octets.push(Math.floor(_value / FACTORS[i]));
    _value = _value % FACTORS[i];
  }

  return octets.join('.');
}

/*
An IPv4 block held in canonical form: value is always the first address of
the block.
*/
class CIDR {
  public readonly value: number;
  public readonly prefix: number;

  constructor(address: number, prefix: number) {
    if (!isPrefix(prefix)) {
      throw new RangeError(`invalid prefix length ${prefix}`);
    }
    if (!Number.isInteger(address) || address < 0 || address >= ADDRESS_SPACE) {
      throw new RangeError(`invalid address ${address}`);
    }

    this.prefix = prefix;
    this.value = address - (address % blockSize(prefix));
  }

  size(): number {
    return blockSize(this.prefix);
  }

  lastAddress(): number {
    return this.value + this.size() - 1;
  }

  octet(index: number): number {
    if (index < 0 || index > 3) {
      throw new RangeError('invalid index');
    }

    return Math.floor(this.value / FACTORS[index]) % 256;
  }

  contains(other: CIDR): boolean {
    return (
      this.value <= other.value && other.lastAddress() <= this.lastAddress()
    );
  }

  overlaps(other: CIDR): boolean {
    return (
      this.value <= other.lastAddress() && other.value <= this.lastAddress()
    );
  }

  equals(other: CIDR): boolean {
    return this.value === other.value && this.prefix === other.prefix;
  }

  /*
  Returns the first block of the given prefix inside this one
  */
  withPrefix(prefix: number): CIDR {
    return new CIDR(this.value, prefix);
  }

  /*
  Returns the next block of the same size, or undefined once it leaves the
  bound (or the address space)
  */
  next(bound?: CIDR): CIDR | undefined {
    const address = this.value + this.size();

    if (address >= ADDRESS_SPACE) {
      return undefined;
    }

    const result = new CIDR(address, this.prefix);

    if (bound && !bound.contains(result)) {
      return undefined;
    }

    return result;
  }

  key(): string {
    return `${this.value}/${this.prefix}`;
  }

  toAddressString(): string {
    return formatAddress(this.value);
  }

  toCidrString(): string {
    return `${formatAddress(this.value)}/${this.prefix}`;
  }

  toString(): string {
    return this.toCidrString();
  }
}

/*
Parses a.b.c.d/p. Host bits are masked off unless strict is set, in which
case they are rejected.
*/
function createCIDR(input: string, strict = false): CIDR {
  const regexp = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;
  const match = input.trim().match(regexp);

  if (match === null) {
    throw new InvalidCidrError(input);
  }

  let address = 0;

  for (let i = 0; i < 4; i++) {
    const part = parseInt(match[i + 1], 10);

    if (part > 255) {
      throw new InvalidCidrError(input, `octet ${part} out of range`);
    }

    address = address + part * FACTORS[i];
  }

  const prefix = parseInt(match[5], 10);

  if (!isPrefix(prefix)) {
    throw new InvalidCidrError(input, `prefix /${prefix} out of range`);
  }

  if (strict && address % blockSize(prefix) !== 0) {
    throw new InvalidCidrError(input, 'host bits set');
  }

  return new CIDR(address, prefix);
}

function createCIDRFromAddress(address: number, prefix: number): CIDR {
  return new CIDR(address, prefix);
}

/*
Rounds address up to the next boundary of a block with the given prefix
*/
function alignUp(address: number, prefix: number): number {
  const size = blockSize(prefix);

  return Math.ceil(address / size) * size;
}

export {
  CIDR,
  ADDRESS_SPACE,
  alignUp,
  blockSize,
  createCIDR,
  createCIDRFromAddress,
  formatAddress,
};
