export * from './address-block';
export * from './topology-planner';
