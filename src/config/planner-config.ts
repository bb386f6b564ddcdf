import {InvalidRequestError} from '../planner/errors';
import {PlanRequest, SubnetRequest} from '../planner/planner';
import {PlanFormat, isPlanFormat} from '../planner/render';
import {ExpandingSearchOptions, isSearchStrategy} from '../planner/search';

const CONTEXT_KEY = 'ip-planner';

interface PlannerConfig {
  request: PlanRequest;
  // Path to a JSON snapshot of existing CIDRs. When unset, EC2 is queried.
  existing?: string;
  awsRegion?: string;
  format: PlanFormat;
  stackName: string;
  availabilityZones?: string[];
  tags?: {[key: string]: string};
}

type ContextObject = {[key: string]: unknown};

function isContextObject(value: unknown): value is ContextObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateRequiredKeys(json: ContextObject, keys: string[]): void {
  const missingKeys = keys.filter(key => json[key] === undefined);

  if (missingKeys.length > 0) {
    throw new InvalidRequestError(
      `Missing required context variables: ${missingKeys.join(', ')}`
    );
  }
}

function optionalNumber(json: ContextObject, key: string): number | undefined {
  const value = json[key];

  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidRequestError(`${key} must be an integer`);
  }

  return value;
}

function optionalString(json: ContextObject, key: string): string | undefined {
  const value = json[key];

  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value === '') {
    throw new InvalidRequestError(`${key} must be a non-empty string`);
  }

  return value;
}

function optionalStringList(
  json: ContextObject,
  key: string
): string[] | undefined {
  const value = json[key];

  if (value === undefined) {
    return undefined;
  }

  const items: unknown[] = Array.isArray(value) ? value : [];
  const strings = items.filter((v): v is string => typeof v === 'string');

  if (!Array.isArray(value) || strings.length !== items.length) {
    throw new InvalidRequestError(`${key} must be a list of strings`);
  }

  return strings;
}

function readTags(json: ContextObject): {[key: string]: string} | undefined {
  const value = json.tags;

  if (value === undefined) {
    return undefined;
  }
  if (!isContextObject(value)) {
    throw new InvalidRequestError('tags must be an object');
  }

  const tags: {[key: string]: string} = {};

  for (const key in value) {
    const tag = value[key];

    if (typeof tag !== 'string') {
      throw new InvalidRequestError(`tag ${key} must be a string`);
    }
    tags[key] = tag;
  }

  return tags;
}

function readSubnet(value: unknown, index: number): SubnetRequest {
  if (!isContextObject(value)) {
    throw new InvalidRequestError(`subnets[${index}] must be an object`);
  }

  validateRequiredKeys(value, ['role']);

  const role = optionalString(value, 'role') ?? '';
  const usableIps = optionalNumber(value, 'usableIps');
  const prefix = optionalNumber(value, 'prefix');

  if (usableIps !== undefined && prefix !== undefined) {
    throw new InvalidRequestError(
      `subnet ${role} sets both usableIps and prefix`
    );
  }
  if (prefix !== undefined) {
    return {role, prefix};
  }
  if (usableIps !== undefined) {
    return {role, usableIps};
  }

  throw new InvalidRequestError(`subnet ${role} needs usableIps or prefix`);
}

function readExpanding(json: ContextObject): ExpandingSearchOptions | undefined {
  const options: ExpandingSearchOptions = {
    outerMin: optionalNumber(json, 'outerMin'),
    outerMax: optionalNumber(json, 'outerMax'),
    startInner: optionalNumber(json, 'startInner'),
  };

  if (
    options.outerMin === undefined &&
    options.outerMax === undefined &&
    options.startInner === undefined
  ) {
    return undefined;
  }

  return options;
}

/**
 * Validates the `ip-planner` context block and turns it into a planner
 * configuration.
 */
function readPlannerConfig(raw: unknown): PlannerConfig {
  if (!isContextObject(raw)) {
    throw new InvalidRequestError(
      `Missing required context variables: ${CONTEXT_KEY}`
    );
  }

  validateRequiredKeys(raw, ['subnets']);

  const subnetList = raw.subnets;

  if (!Array.isArray(subnetList)) {
    throw new InvalidRequestError('subnets must be a list');
  }

  const strategy = raw.strategy ?? 'expanding';

  if (!isSearchStrategy(strategy)) {
    throw new InvalidRequestError(`unknown search strategy ${String(strategy)}`);
  }

  const format = raw.format ?? 'tfvars';

  if (!isPlanFormat(format)) {
    throw new InvalidRequestError(`unknown format ${String(format)}`);
  }

  const subnets: unknown[] = subnetList;

  return {
    request: {
      subnets: subnets.map(readSubnet),
      strategy,
      region: optionalString(raw, 'region'),
      networkPrefix: optionalNumber(raw, 'networkPrefix'),
      networkAddresses: optionalNumber(raw, 'networkAddresses'),
      reservedPerSubnet: optionalNumber(raw, 'reservedPerSubnet'),
      expanding: readExpanding(raw),
    },
    existing: optionalString(raw, 'existing'),
    awsRegion: optionalString(raw, 'awsRegion'),
    format,
    stackName: optionalString(raw, 'stackName') ?? CONTEXT_KEY,
    availabilityZones: optionalStringList(raw, 'availabilityZones'),
    tags: readTags(raw),
  };
}

export {CONTEXT_KEY, PlannerConfig, readPlannerConfig};
