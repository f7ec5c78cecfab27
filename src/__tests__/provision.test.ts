import { describe, it, expect } from 'vitest';
import { buildPlan, execute, InvalidInputError } from '../index';
import { FakeCloudClient } from './fake-cloud-client';

describe('provisioning a demo topology', () => {
  const input = {
    vpcCidr: '10.0.0.0/16',
    vpcName: 'demo',
    publicCidr: '10.0.1.0/24',
    privateCidr: '10.0.2.0/24',
    availabilityZone: 'us-east-1a'
  };

  it('should create all six resources with routing for the public subnet only', async () => {
    const client = new FakeCloudClient();

    const result = await execute(buildPlan(input), client);

    expect(result.success).toBe(true);
    expect(result.steps.filter(step => step.status === 'succeeded')).toHaveLength(6);
    expect(result.handles.publicRouteTable).toEqual({ kind: 'route-table', id: 'rtb-1' });
    expect(result.handles.privateRouteTable).toEqual({ kind: 'route-table', id: 'rtb-2' });
    expect(client.routes.get('rtb-1')).toEqual(['igw-1']);
    expect(client.routes.get('rtb-2')).toEqual([]);
  });

  it('should report steps 1-5 and the created handles when the private association fails', async () => {
    const client = new FakeCloudClient({ operation: 'associateRouteTable', occurrence: 2 });

    const result = await execute(buildPlan(input), client);

    expect(result.success).toBe(false);
    expect(result.steps.map(step => [step.step, step.status])).toEqual([
      ['create-vpc', 'succeeded'],
      ['create-internet-gateway', 'succeeded'],
      ['create-public-subnet', 'succeeded'],
      ['create-private-subnet', 'succeeded'],
      ['create-public-route-table', 'succeeded'],
      ['create-private-route-table', 'failed']
    ]);
    expect(result.handles).toEqual({
      vpc: { kind: 'vpc', id: 'vpc-1' },
      internetGateway: { kind: 'internet-gateway', id: 'igw-1' },
      publicSubnet: { kind: 'subnet', id: 'subnet-1' },
      privateSubnet: { kind: 'subnet', id: 'subnet-2' },
      publicRouteTable: { kind: 'route-table', id: 'rtb-1' }
    });
    expect(result.failure?.step).toBe('create-private-route-table');
    expect(result.failure?.error.message).toBe(
      'Step create-private-route-table failed during associateRouteTable: associateRouteTable rejected'
    );
  });

  it('should reject an out-of-range public CIDR before touching the client', async () => {
    const client = new FakeCloudClient();
    const run = async () => execute(buildPlan({ ...input, publicCidr: '999.0.0.0/24' }), client);

    await expect(run()).rejects.toBeInstanceOf(InvalidInputError);
    await expect(run()).rejects.toMatchObject({ issues: [{ field: 'publicCidr' }] });
    expect(client.calls).toHaveLength(0);
  });
});
