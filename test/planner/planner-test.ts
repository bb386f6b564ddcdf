import {
  InvalidCidrError,
  SubnetOverflowError,
} from '../../src/planner/errors';
import {
  AllocationPlan,
  PlanRequest,
  PlanResult,
  buildPlan,
  planAllocation,
} from '../../src/planner/planner';
import {planToOutputs} from '../../src/planner/render';
import {createReservationSet} from '../../src/planner/reservations';
import {createCIDR} from '../../src/vpc/cidr';

const EXISTING = ['172.16.0.0/24', '172.16.1.0/24'];

const REQUEST: PlanRequest = {
  region: '172.16.0.0/16',
  subnets: [
    {role: 'web', usableIps: 20},
    {role: 'endpoints', usableIps: 10},
  ],
};

function planOf(result: PlanResult): AllocationPlan {
  if (!result.ok) {
    throw new Error(`expected a plan, got ${result.error.message}`);
  }
  return result.plan;
}

function errorOf(result: PlanResult) {
  if (result.ok) {
    throw new Error('expected an error');
  }
  return result.error;
}

function expectInvariants(plan: AllocationPlan, existing: string[]) {
  const reserved = createReservationSet(existing);
  const blocks = [plan.network, ...plan.subnets.map(s => s.block)];

  blocks.forEach(block => {
    expect(reserved.overlapsAny(block)).toBe(false);
  });
  plan.subnets.forEach((a, i) => {
    expect(plan.network.contains(a.block)).toBe(true);
    plan.subnets.slice(i + 1).forEach(b => {
      expect(a.block.overlaps(b.block)).toBe(false);
    });
  });
}

describe('planAllocation', () => {
  it('sizes the network from the subnets and packs them in order', () => {
    const plan = planOf(planAllocation(EXISTING, REQUEST));

    expect(plan.network.toCidrString()).toEqual('172.16.2.0/26');
    expect(plan.strategy).toEqual('expanding');
    expect(plan.candidatesTried).toEqual(9);
    expect(
      plan.subnets.map(s => [s.role, s.block.toCidrString(), s.usableIps])
    ).toEqual([
      ['web', '172.16.2.0/27', 27],
      ['endpoints', '172.16.2.32/28', 11],
    ]);
    expectInvariants(plan, EXISTING);
  });

  it('uses an explicit network prefix', () => {
    const plan = planOf(
      planAllocation(EXISTING, {...REQUEST, networkPrefix: 24})
    );

    expect(planToOutputs(plan)).toEqual({
      vpcCidr: '172.16.2.0/24',
      subnets: {web: '172.16.2.0/27', endpoints: '172.16.2.32/28'},
    });
  });

  it('sizes the network from a total address count', () => {
    const plan = planOf(
      planAllocation([], {...REQUEST, networkAddresses: 200})
    );

    expect(plan.network.toCidrString()).toEqual('172.16.0.0/24');
  });

  it('keeps the invariants when the subnets are reordered', () => {
    const plan = planOf(
      planAllocation(EXISTING, {
        region: '172.16.0.0/16',
        networkPrefix: 24,
        subnets: [
          {role: 'endpoints', usableIps: 10},
          {role: 'web', usableIps: 20},
        ],
      })
    );

    expect(planToOutputs(plan).subnets).toEqual({
      endpoints: '172.16.2.0/28',
      web: '172.16.2.32/27',
    });
    expectInvariants(plan, EXISTING);
  });

  it('leaves room for alignment when deriving the network size', () => {
    const plan = planOf(
      planAllocation([], {
        subnets: [
          {role: 'a', usableIps: 10},
          {role: 'b', usableIps: 20},
          {role: 'c', usableIps: 10},
        ],
      })
    );

    expect(planToOutputs(plan)).toEqual({
      vpcCidr: '172.16.0.0/25',
      subnets: {a: '172.16.0.0/28', b: '172.16.0.32/27', c: '172.16.0.64/28'},
    });
  });

  it('accepts explicit subnet prefixes', () => {
    const plan = planOf(
      planAllocation([], {
        networkPrefix: 25,
        subnets: [
          {role: 'app', prefix: 26},
          {role: 'db', prefix: 28},
        ],
      })
    );

    expect(planToOutputs(plan)).toEqual({
      vpcCidr: '172.16.0.0/25',
      subnets: {app: '172.16.0.0/26', db: '172.16.0.64/28'},
    });
  });

  it('searches a literal base block', () => {
    const plan = planOf(
      planAllocation(['10.0.0.0/23'], {
        strategy: 'base',
        region: '10.0.0.0/16',
        networkPrefix: 24,
        subnets: [{role: 'web', prefix: 27}],
      })
    );

    expect(plan.network.toCidrString()).toEqual('10.0.2.0/24');
    expect(plan.strategy).toEqual('base');
  });

  it('passes expanding options through', () => {
    const plan = planOf(
      planAllocation([], {
        ...REQUEST,
        region: '172.16.0.0/12',
        networkPrefix: 24,
        expanding: {outerMin: 18, startInner: 4},
      })
    );

    expect(plan.network.toCidrString()).toEqual('172.18.4.0/24');
  });

  it('gives the same plan for the same input', () => {
    const first = planOf(planAllocation(EXISTING, REQUEST));
    const second = planOf(planAllocation(EXISTING, REQUEST));

    expect(planToOutputs(second)).toEqual(planToOutputs(first));
  });

  it('does not change the caller reservation set', () => {
    const existing = createReservationSet(EXISTING);

    const plan = planOf(planAllocation(existing, REQUEST));

    expect(existing.size).toEqual(2);
    expect(plan.reservations.size).toEqual(5);
    expect(plan.reservations.has(plan.network)).toBe(true);
  });

  it('reports subnets that do not fit', () => {
    const error = errorOf(
      planAllocation([], {
        networkPrefix: 26,
        subnets: [
          {role: 'a', prefix: 27},
          {role: 'b', prefix: 27},
          {role: 'c', prefix: 28},
        ],
      })
    );

    expect(error).toBeInstanceOf(SubnetOverflowError);
    expect(error.kind).toEqual('SubnetOverflow');
    expect(error.message).toEqual(
      'subnet c does not fit in 172.16.0.0/26: no space left after the preceding subnets'
    );
  });

  it('reports subnets larger than the network', () => {
    const error = errorOf(
      planAllocation([], {
        networkPrefix: 28,
        subnets: [{role: 'big', prefix: 27}],
      })
    );

    expect(error.message).toEqual(
      'subnet big does not fit in 172.16.0.0/28: a /27 is larger than the network'
    );
  });

  it('reports the malformed reservation', () => {
    const error = errorOf(planAllocation(['10.0.0.0/8', '10.0.0.0/40'], REQUEST));

    expect(error.kind).toEqual('InvalidCIDR');
    expect(error instanceof InvalidCidrError && error.literal).toEqual(
      '10.0.0.0/40'
    );
  });

  it('reports unsatisfiable capacity', () => {
    const error = errorOf(
      planAllocation([], {subnets: [{role: 'web', usableIps: -1}]})
    );

    expect(error.kind).toEqual('CapacityUnsatisfiable');
  });

  it('plans a subnet that needs no usable addresses', () => {
    const plan = planOf(
      planAllocation([], {subnets: [{role: 'web', usableIps: 0}]})
    );

    expect(plan.network.toCidrString()).toEqual('172.16.0.0/29');
    expect(plan.subnets).toHaveLength(1);
    expect(plan.subnets[0].block.toCidrString()).toEqual('172.16.0.0/29');
    expect(plan.subnets[0].usableIps).toEqual(3);
  });

  it('reports an exhausted search', () => {
    const error = errorOf(
      planAllocation(['172.16.0.0/12'], {subnets: [{role: 'web', prefix: 24}]})
    );

    expect(error.kind).toEqual('SearchExhausted');
    expect(error.message).toEqual(
      'no free /24 in 172.16.0.0/12: existing reservation 172.16.0.0/12 covers the whole region'
    );
  });

  it('rejects malformed requests', () => {
    expect(errorOf(planAllocation([], {subnets: []})).message).toEqual(
      'at least one subnet is required'
    );
    expect(
      errorOf(
        planAllocation([], {
          subnets: [
            {role: 'web', prefix: 27},
            {role: 'web', prefix: 28},
          ],
        })
      ).message
    ).toEqual('duplicate subnet role web');
    expect(
      errorOf(
        planAllocation([], {
          subnets: [
            {role: 'webApp', prefix: 27},
            {role: 'web-app', prefix: 28},
          ],
        })
      ).message
    ).toEqual('subnet roles webApp and web-app both map to web_app');
    expect(
      errorOf(
        planAllocation([], {
          subnets: [{role: '---', prefix: 27}],
        })
      ).message
    ).toEqual('subnet role --- has no letters or digits to name its outputs');
    expect(
      errorOf(
        planAllocation([], {
          networkPrefix: 33,
          subnets: [{role: 'web', prefix: 27}],
        })
      ).kind
    ).toEqual('InvalidRequest');
    expect(
      errorOf(
        planAllocation([], {
          region: '172.16.0.1/12',
          subnets: [{role: 'web', prefix: 27}],
        })
      ).kind
    ).toEqual('InvalidCIDR');
  });
});

describe('buildPlan', () => {
  it('throws instead of returning a result', () => {
    expect(() =>
      buildPlan(['172.16.0.0/12'], {subnets: [{role: 'web', prefix: 24}]})
    ).toThrow('covers the whole region');
  });

  it('returns the plan directly', () => {
    const plan = buildPlan([], {subnets: [{role: 'web', prefix: 24}]});

    expect(plan.network.equals(createCIDR('172.16.0.0/24'))).toBe(true);
  });
});
