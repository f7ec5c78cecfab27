export * from './types';
export * from './ec2-network-client';
