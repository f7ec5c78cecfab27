import {
  EC2Client,
  CreateVpcCommand,
  CreateTagsCommand,
  CreateInternetGatewayCommand,
  AttachInternetGatewayCommand,
  CreateSubnetCommand,
  CreateRouteTableCommand,
  AssociateRouteTableCommand,
  CreateRouteCommand,
  waitUntilVpcAvailable
} from '@aws-sdk/client-ec2';
import { DEFAULT_ROUTE_DESTINATION } from '../types';
import type {
  GatewayHandle,
  NetworkHandle,
  ResourceHandle,
  RouteTableHandle,
  SubnetHandle
} from '../types';
import type { CloudResourceClient } from './types';

export interface Ec2NetworkClientOptions {
  region?: string;
  /** Upper bound for the VPC availability wait; must exceed the waiter's polling delay */
  waitTimeoutSeconds?: number;
}

// Fixed first polling delay of waitUntilVpcAvailable
export const VPC_WAITER_MIN_DELAY_SECONDS = 15;

export class Ec2NetworkClient implements CloudResourceClient {
  private client: EC2Client;
  private region: string;
  private waitTimeoutSeconds: number;

  constructor(options: Ec2NetworkClientOptions = {}) {
    this.region = options.region || 'us-east-1';
    this.waitTimeoutSeconds = options.waitTimeoutSeconds ?? 300;
    if (this.waitTimeoutSeconds <= VPC_WAITER_MIN_DELAY_SECONDS) {
      throw new Error(
        `waitTimeoutSeconds must be greater than ${VPC_WAITER_MIN_DELAY_SECONDS}, got ${this.waitTimeoutSeconds}`
      );
    }
    this.client = new EC2Client({ region: this.region });
  }

  async createNetwork(cidr: string): Promise<NetworkHandle> {
    try {
      const result = await this.client.send(new CreateVpcCommand({ CidrBlock: cidr }));
      return { kind: 'vpc', id: requireId(result.Vpc?.VpcId, 'CreateVpc', 'VpcId') };
    } catch (error) {
      throw new Error(`Failed to create VPC ${cidr}: ${error}`, { cause: error });
    }
  }

  /**
   * Poll until the VPC is available. Rejects when the wait runs out or when
   * `signal` aborts; the VPC itself is left as it is.
   */
  async awaitNetworkAvailable(network: NetworkHandle, signal?: AbortSignal): Promise<void> {
    try {
      await waitUntilVpcAvailable(
        { client: this.client, maxWaitTime: this.waitTimeoutSeconds, abortSignal: signal },
        { VpcIds: [network.id] }
      );
    } catch (error) {
      if (signal?.aborted) {
        throw new Error(`Stopped waiting for VPC ${network.id} to become available: ${error}`, { cause: error });
      }
      throw new Error(
        `VPC ${network.id} did not become available within ${this.waitTimeoutSeconds} seconds: ${error}`,
        { cause: error }
      );
    }
  }

  async tagResource(handle: ResourceHandle, key: string, value: string): Promise<void> {
    try {
      await this.client.send(new CreateTagsCommand({
        Resources: [handle.id],
        Tags: [{ Key: key, Value: value }]
      }));
    } catch (error) {
      throw new Error(`Failed to tag ${handle.kind} ${handle.id} with ${key}=${value}: ${error}`, { cause: error });
    }
  }

  async createInternetGateway(): Promise<GatewayHandle> {
    try {
      const result = await this.client.send(new CreateInternetGatewayCommand({}));
      return {
        kind: 'internet-gateway',
        id: requireId(result.InternetGateway?.InternetGatewayId, 'CreateInternetGateway', 'InternetGatewayId')
      };
    } catch (error) {
      throw new Error(`Failed to create internet gateway: ${error}`, { cause: error });
    }
  }

  async attachGateway(gateway: GatewayHandle, network: NetworkHandle): Promise<void> {
    try {
      await this.client.send(new AttachInternetGatewayCommand({
        InternetGatewayId: gateway.id,
        VpcId: network.id
      }));
    } catch (error) {
      throw new Error(`Failed to attach internet gateway ${gateway.id} to VPC ${network.id}: ${error}`, { cause: error });
    }
  }

  async createSubnet(network: NetworkHandle, cidr: string, availabilityZone: string): Promise<SubnetHandle> {
    try {
      const result = await this.client.send(new CreateSubnetCommand({
        VpcId: network.id,
        CidrBlock: cidr,
        AvailabilityZone: availabilityZone
      }));
      return { kind: 'subnet', id: requireId(result.Subnet?.SubnetId, 'CreateSubnet', 'SubnetId') };
    } catch (error) {
      throw new Error(`Failed to create subnet ${cidr} in VPC ${network.id}: ${error}`, { cause: error });
    }
  }

  async createRouteTable(network: NetworkHandle): Promise<RouteTableHandle> {
    try {
      const result = await this.client.send(new CreateRouteTableCommand({ VpcId: network.id }));
      return {
        kind: 'route-table',
        id: requireId(result.RouteTable?.RouteTableId, 'CreateRouteTable', 'RouteTableId')
      };
    } catch (error) {
      throw new Error(`Failed to create route table in VPC ${network.id}: ${error}`, { cause: error });
    }
  }

  async associateRouteTable(table: RouteTableHandle, subnet: SubnetHandle): Promise<void> {
    try {
      await this.client.send(new AssociateRouteTableCommand({
        RouteTableId: table.id,
        SubnetId: subnet.id
      }));
    } catch (error) {
      throw new Error(`Failed to associate route table ${table.id} with subnet ${subnet.id}: ${error}`, { cause: error });
    }
  }

  async addDefaultRoute(table: RouteTableHandle, gateway: GatewayHandle): Promise<void> {
    try {
      const result = await this.client.send(new CreateRouteCommand({
        RouteTableId: table.id,
        DestinationCidrBlock: DEFAULT_ROUTE_DESTINATION,
        GatewayId: gateway.id
      }));
      if (result.Return === false) {
        throw new Error('CreateRoute returned false');
      }
    } catch (error) {
      throw new Error(`Failed to add default route to ${gateway.id} in route table ${table.id}: ${error}`, { cause: error });
    }
  }
}

function requireId(id: string | undefined, operation: string, field: string): string {
  if (!id) {
    throw new Error(`${operation} response did not include ${field}`);
  }
  return id;
}
