import {Construct} from 'constructs';
import {TerraformOutput, TerraformStack} from 'cdktf';
import {AwsProvider} from '@cdktf/provider-aws/lib/provider';
import {AllocationPlan} from '../planner/planner';
import {toVariableName} from '../planner/render';
import {PlannedVpc} from '../vpc/planned-vpc';

interface PlannerStackProps {
  plan: AllocationPlan;
  awsRegion?: string;
  availabilityZones?: string[];
  tags?: {[key: string]: string};
}

class PlannerStack extends TerraformStack {
  public readonly plannedVpc: PlannedVpc;
  public readonly vpcCidrOutput: TerraformOutput;
  public readonly subnetCidrOutputs: {[role: string]: TerraformOutput} = {};

  constructor(scope: Construct, id: string, props: PlannerStackProps) {
    super(scope, id);

    new AwsProvider(this, 'AWS', {
      region: props.awsRegion,
    });

    this.plannedVpc = new PlannedVpc(this, 'vpc', {
      plan: props.plan,
      availabilityZones: props.availabilityZones,
      tags: props.tags,
    });

    this.vpcCidrOutput = new TerraformOutput(this, 'vpc_cidr', {
      value: props.plan.network.toCidrString(),
    });

    props.plan.subnets.forEach(s => {
      this.subnetCidrOutputs[s.role] = new TerraformOutput(
        this,
        `${toVariableName(s.role)}_subnet_cidr`,
        {
          value: s.block.toCidrString(),
          description: `${s.role} subnet (${s.usableIps} usable addresses)`,
        }
      );
    });
  }
}

export {PlannerStack, PlannerStackProps};
