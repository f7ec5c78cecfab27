// Core type definitions for the VPC topology provisioner
import type { RemoteOperationError } from './errors';

export * from './errors';

export type ResourceKind = 'vpc' | 'internet-gateway' | 'subnet' | 'route-table';

export interface ResourceHandle<K extends ResourceKind = ResourceKind> {
  kind: K;
  id: string;
}

export type NetworkHandle = ResourceHandle<'vpc'>;
export type GatewayHandle = ResourceHandle<'internet-gateway'>;
export type SubnetHandle = ResourceHandle<'subnet'>;
export type RouteTableHandle = ResourceHandle<'route-table'>;

export interface NetworkAddressBlock {
  /** Canonical `a.b.c.d/n` form */
  block: string;
  address: string;
  prefixLength: number;
  octets: readonly [number, number, number, number];
}

export interface TopologyInput {
  vpcCidr: string;
  vpcName: string;
  publicCidr: string;
  privateCidr: string;
  availabilityZone: string;
  tags?: Record<string, string>;
}

export interface PlanOptions {
  /** Require both subnets inside the VPC block and apart from each other. Defaults to true. */
  enforceSubnetContainment?: boolean;
}

/**
 * Slots a step can fill. Every step produces exactly one slot and may only
 * read slots filled by earlier steps.
 */
export interface ProvisionedHandles {
  vpc?: NetworkHandle;
  internetGateway?: GatewayHandle;
  publicSubnet?: SubnetHandle;
  privateSubnet?: SubnetHandle;
  publicRouteTable?: RouteTableHandle;
  privateRouteTable?: RouteTableHandle;
}

export type HandleSlot = keyof ProvisionedHandles;

export type StepName =
  | 'create-vpc'
  | 'create-internet-gateway'
  | 'create-public-subnet'
  | 'create-private-subnet'
  | 'create-public-route-table'
  | 'create-private-route-table';

interface PlannedStepBase {
  name: StepName;
  description: string;
  requires: readonly HandleSlot[];
  nameTag: string;
}

export interface CreateVpcStep extends PlannedStepBase {
  action: 'create-vpc';
  produces: 'vpc';
  cidr: NetworkAddressBlock;
}

export interface CreateInternetGatewayStep extends PlannedStepBase {
  action: 'create-internet-gateway';
  produces: 'internetGateway';
}

export interface CreateSubnetStep extends PlannedStepBase {
  action: 'create-subnet';
  produces: 'publicSubnet' | 'privateSubnet';
  cidr: NetworkAddressBlock;
  availabilityZone: string;
}

export interface CreateRouteTableStep extends PlannedStepBase {
  action: 'create-route-table';
  produces: 'publicRouteTable' | 'privateRouteTable';
  subnet: 'publicSubnet' | 'privateSubnet';
  /** Set only for the public table: the default route target */
  gateway?: 'internetGateway';
}

export type PlannedStep =
  | CreateVpcStep
  | CreateInternetGatewayStep
  | CreateSubnetStep
  | CreateRouteTableStep;

export interface ProvisioningPlan {
  vpcCidr: NetworkAddressBlock;
  vpcName: string;
  publicCidr: NetworkAddressBlock;
  privateCidr: NetworkAddressBlock;
  availabilityZone: string;
  /** Applied to every resource after its Name tag */
  tags: Readonly<Record<string, string>>;
  steps: readonly PlannedStep[];
}

export const DEFAULT_ROUTE_DESTINATION = '0.0.0.0/0';

export interface DefaultRoute {
  destination: typeof DEFAULT_ROUTE_DESTINATION;
  gateway: GatewayHandle;
}

export interface StepResult {
  step: StepName;
  status: 'succeeded' | 'failed';
  handle?: ResourceHandle;
  /** Present for route table steps */
  routes?: DefaultRoute[];
  error?: RemoteOperationError;
  duration: number;
}

export interface StepFailure {
  step: StepName;
  error: RemoteOperationError;
  /** Created by the failing step before one of its later sub-operations failed */
  partialHandle?: ResourceHandle;
}

export interface ExecutionMetadata {
  executionId: string;
  timestamp: Date;
  duration?: number;
}

export interface ExecutionResult {
  success: boolean;
  status: 'succeeded' | 'failed' | 'cancelled';
  steps: StepResult[];
  handles: ProvisionedHandles;
  /** Handles of fully successful steps, in creation order. Nothing is rolled back. */
  completedHandles: ResourceHandle[];
  /** Steps never started, because of a failure or cancellation */
  remainingSteps: StepName[];
  failure?: StepFailure;
  metadata: ExecutionMetadata;
}
