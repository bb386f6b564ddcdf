import {
  DescribeVpcsCommand,
  DescribeVpcsCommandOutput,
  Filter,
  Vpc,
} from '@aws-sdk/client-ec2';
import {ReservationSource} from './source';

// The slice of EC2Client this source calls
interface VpcDescriber {
  send(command: DescribeVpcsCommand): Promise<DescribeVpcsCommandOutput>;
}

interface Ec2ReservationSourceProps {
  filters?: Filter[];
  pageSize?: number;
}

const ACTIVE_ASSOCIATION_STATES = ['associated', 'associating'];

function vpcCidrs(vpc: Vpc): string[] {
  const cidrs: string[] = [];

  (vpc.CidrBlockAssociationSet ?? []).forEach(association => {
    const state = association.CidrBlockState?.State;

    if (
      association.CidrBlock &&
      (!state || ACTIVE_ASSOCIATION_STATES.includes(state))
    ) {
      cidrs.push(association.CidrBlock);
    }
  });

  if (vpc.CidrBlock && !cidrs.includes(vpc.CidrBlock)) {
    cidrs.unshift(vpc.CidrBlock);
  }

  return cidrs;
}

/*
Lists the primary and secondary IPv4 blocks of every VPC visible to the
client, following DescribeVpcs pagination.
*/
class Ec2ReservationSource implements ReservationSource {
  constructor(
    private readonly client: VpcDescriber,
    private readonly props: Ec2ReservationSourceProps = {}
  ) {}

  async fetch(): Promise<string[]> {
    const cidrs: string[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.client.send(
        new DescribeVpcsCommand({
          Filters: this.props.filters,
          MaxResults: this.props.pageSize,
          NextToken: nextToken,
        })
      );

      (response.Vpcs ?? []).forEach(vpc => {
        cidrs.push(...vpcCidrs(vpc));
      });

      nextToken = response.NextToken;
    } while (nextToken);

    return cidrs;
  }
}

export {Ec2ReservationSource, Ec2ReservationSourceProps, VpcDescriber};
