import {Construct} from 'constructs';
import {Vpc} from '@cdktf/provider-aws/lib/vpc';
import {Subnet} from '@cdktf/provider-aws/lib/subnet';
import {AllocationPlan} from '../planner/planner';

interface PlannedVpcProps {
  plan: AllocationPlan;
  // Subnets are spread over these round robin, in plan order
  availabilityZones?: string[];
  tags?: {[key: string]: string};
}

/**
 * A VPC laid out from an allocation plan: the network block becomes the VPC
 * and every planned role becomes one subnet.
 */
class PlannedVpc extends Construct {
  public readonly vpc: Vpc;
  public readonly subnets: {[role: string]: Subnet} = {};

  constructor(scope: Construct, id: string, props: PlannedVpcProps) {
    super(scope, id);

    const tags = props.tags ?? {};
    const zones = props.availabilityZones ?? [];

    this.vpc = new Vpc(this, id, {
      cidrBlock: props.plan.network.toCidrString(),
      enableDnsHostnames: true,
      enableDnsSupport: true,
      tags: {...tags, Name: id},
    });

    props.plan.subnets.forEach((allocated, i) => {
      const _name = `${id}-${allocated.role}`;

      this.subnets[allocated.role] = new Subnet(this, _name, {
        vpcId: this.vpc.id,
        cidrBlock: allocated.block.toCidrString(),
        availabilityZone: zones.length > 0 ? zones[i % zones.length] : undefined,
        tags: {...tags, Name: _name, role: allocated.role},
      });
    });
  }
}

export {PlannedVpc, PlannedVpcProps};
