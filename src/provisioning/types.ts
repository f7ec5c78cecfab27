// Provisioning-specific types
import type {
  GatewayHandle,
  NetworkHandle,
  ResourceHandle,
  RouteTableHandle,
  SubnetHandle
} from '../types';

/**
 * The remote resource API the executor drives. Every method rejects with a
 * provider error on any API-level failure.
 */
export interface CloudResourceClient {
  createNetwork(cidr: string): Promise<NetworkHandle>;
  /** Blocks until the network is available. Rejects once the bounded wait times out or `signal` aborts */
  awaitNetworkAvailable(network: NetworkHandle, signal?: AbortSignal): Promise<void>;
  tagResource(handle: ResourceHandle, key: string, value: string): Promise<void>;
  createInternetGateway(): Promise<GatewayHandle>;
  attachGateway(gateway: GatewayHandle, network: NetworkHandle): Promise<void>;
  createSubnet(network: NetworkHandle, cidr: string, availabilityZone: string): Promise<SubnetHandle>;
  createRouteTable(network: NetworkHandle): Promise<RouteTableHandle>;
  associateRouteTable(table: RouteTableHandle, subnet: SubnetHandle): Promise<void>;
  addDefaultRoute(table: RouteTableHandle, gateway: GatewayHandle): Promise<void>;
}

export type CloudOperation = keyof CloudResourceClient;
