// Main entry point for the VPC topology provisioner
export * from './types';
export * from './config';
export * from './planning';
export * from './provisioning';
export * from './orchestration';

// Main provisioning function
export { execute } from './orchestration/provisioning-executor';
