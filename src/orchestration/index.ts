export * from './types';
export * from './steps';
export * from './provisioning-executor';
