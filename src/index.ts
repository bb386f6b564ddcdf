export * from './vpc/cidr';
export * from './vpc/planned-vpc';
export * from './planner/errors';
export * from './planner/capacity';
export * from './planner/reservations';
export * from './planner/search';
export * from './planner/planner';
export * from './planner/render';
export * from './inventory/source';
export * from './inventory/file';
export * from './inventory/ec2';
export * from './config/planner-config';
export * from './stack/planner-stack';
