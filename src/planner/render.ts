import {AllocationPlan} from './planner';

type PlanFormat = 'tfvars' | 'json';

const PLAN_FORMATS: readonly PlanFormat[] = ['tfvars', 'json'];

interface PlanOutputs {
  vpcCidr: string;
  subnets: {[role: string]: string};
}

function planToOutputs(plan: AllocationPlan): PlanOutputs {
  const subnets: {[role: string]: string} = {};

  plan.subnets.forEach(s => {
    subnets[s.role] = s.block.toCidrString();
  });

  return {vpcCidr: plan.network.toCidrString(), subnets};
}

/*
privateEndpoint, private-endpoint and "Private Endpoint" all become
private_endpoint
*/
function toVariableName(role: string): string {
  return role
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

function renderTfvars(plan: AllocationPlan): string {
  const lines = [
    '# terraform variable values',
    `vpc_cidr = "${plan.network.toCidrString()}"`,
  ];

  plan.subnets.forEach(s => {
    lines.push(
      `${toVariableName(s.role)}_subnet_cidr = "${s.block.toCidrString()}"`
    );
  });

  return lines.join('\n');
}

function renderPlan(plan: AllocationPlan, format: PlanFormat): string {
  if (format === 'json') {
    return JSON.stringify(planToOutputs(plan), null, 2);
  }

  return renderTfvars(plan);
}

function isPlanFormat(value: unknown): value is PlanFormat {
  return PLAN_FORMATS.some(f => f === value);
}

export {
  PlanFormat,
  PLAN_FORMATS,
  PlanOutputs,
  isPlanFormat,
  planToOutputs,
  renderPlan,
  toVariableName,
};
