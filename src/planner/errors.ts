type PlannerErrorKind =
  | 'InvalidCIDR'
  | 'CapacityUnsatisfiable'
  | 'SearchExhausted'
  | 'SubnetOverflow'
  | 'InvalidRequest';

abstract class PlanningError extends Error {
  abstract readonly kind: PlannerErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

class InvalidCidrError extends PlanningError {
  readonly kind = 'InvalidCIDR';

  constructor(
    public readonly literal: string,
    reason?: string
  ) {
    super(reason ? `invalid cidr ${literal}: ${reason}` : `invalid cidr ${literal}`);
  }
}

class CapacityUnsatisfiableError extends PlanningError {
  readonly kind = 'CapacityUnsatisfiable';

  constructor(public readonly requested: number, detail: string) {
    super(`cannot size a block for ${requested} addresses: ${detail}`);
  }
}

class SearchExhaustedError extends PlanningError {
  readonly kind = 'SearchExhausted';

  constructor(
    public readonly region: string,
    public readonly prefix: number,
    public readonly candidatesTried: number,
    public readonly coveredBy?: string
  ) {
    super(
      coveredBy
        ? `no free /${prefix} in ${region}: existing reservation ${coveredBy} covers the whole region`
        : `no free /${prefix} in ${region} after trying ${candidatesTried} candidates`
    );
  }
}

class SubnetOverflowError extends PlanningError {
  readonly kind = 'SubnetOverflow';

  constructor(
    public readonly role: string,
    public readonly network: string,
    detail: string
  ) {
    super(`subnet ${role} does not fit in ${network}: ${detail}`);
  }
}

class InvalidRequestError extends PlanningError {
  readonly kind = 'InvalidRequest';
}

type PlannerError =
  | InvalidCidrError
  | CapacityUnsatisfiableError
  | SearchExhaustedError
  | SubnetOverflowError
  | InvalidRequestError;

function isPlannerError(e: unknown): e is PlannerError {
  return e instanceof PlanningError;
}

export {
  PlannerErrorKind,
  PlanningError,
  PlannerError,
  InvalidCidrError,
  CapacityUnsatisfiableError,
  SearchExhaustedError,
  SubnetOverflowError,
  InvalidRequestError,
  isPlannerError,
};
