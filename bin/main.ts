import {App} from 'cdktf';
import {EC2Client} from '@aws-sdk/client-ec2';
import {
  CONTEXT_KEY,
  Ec2ReservationSource,
  FileReservationSource,
  PlannerStack,
  ReservationSource,
  planAllocation,
  readPlannerConfig,
  renderPlan,
} from '../src';

async function main(): Promise<void> {
  const app = new App();
  const config = readPlannerConfig(app.node.tryGetContext(CONTEXT_KEY));

  const source: ReservationSource = config.existing
    ? new FileReservationSource(config.existing)
    : new Ec2ReservationSource(new EC2Client({region: config.awsRegion}));

  const result = planAllocation(await source.fetch(), config.request);

  if (!result.ok) {
    console.error(`ERROR: ${result.error.message}`);
    process.exitCode = 1;
    return;
  }

  console.log(renderPlan(result.plan, config.format));

  new PlannerStack(app, config.stackName, {
    plan: result.plan,
    awsRegion: config.awsRegion,
    availabilityZones: config.availabilityZones,
    tags: config.tags,
  });

  app.synth();
}

main().catch((e: unknown) => {
  console.error(`ERROR: ${e instanceof Error ? e.message : String(e)}`);
  process.exitCode = 1;
});
