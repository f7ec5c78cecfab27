import { describe, it, expect } from 'vitest';
import { buildPlan } from '../topology-planner';
import { InvalidInputError, TopologyInput } from '../../types';

const validInput: TopologyInput = {
  vpcCidr: '10.0.0.0/16',
  vpcName: 'demo',
  publicCidr: '10.0.1.0/24',
  privateCidr: '10.0.2.0/24',
  availabilityZone: 'us-east-1a'
};

function issuesFor(input: TopologyInput, enforceSubnetContainment?: boolean) {
  try {
    buildPlan(input, { enforceSubnetContainment });
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected buildPlan to fail');
}

describe('buildPlan', () => {
  it('should build a plan with validated address blocks', () => {
    const plan = buildPlan(validInput);

    expect(plan.vpcCidr.block).toBe('10.0.0.0/16');
    expect(plan.publicCidr.block).toBe('10.0.1.0/24');
    expect(plan.privateCidr.block).toBe('10.0.2.0/24');
    expect(plan.vpcName).toBe('demo');
    expect(plan.availabilityZone).toBe('us-east-1a');
    expect(plan.tags).toEqual({});
  });

  it('should order the six steps with their dependencies', () => {
    const plan = buildPlan(validInput);

    expect(plan.steps.map(step => [step.name, step.requires, step.produces])).toEqual([
      ['create-vpc', [], 'vpc'],
      ['create-internet-gateway', ['vpc'], 'internetGateway'],
      ['create-public-subnet', ['vpc'], 'publicSubnet'],
      ['create-private-subnet', ['vpc'], 'privateSubnet'],
      ['create-public-route-table', ['vpc', 'publicSubnet', 'internetGateway'], 'publicRouteTable'],
      ['create-private-route-table', ['vpc', 'privateSubnet'], 'privateRouteTable']
    ]);
  });

  it('should give only the public route table a gateway', () => {
    const [, , , , publicTable, privateTable] = buildPlan(validInput).steps;

    expect(publicTable).toMatchObject({ action: 'create-route-table', subnet: 'publicSubnet', gateway: 'internetGateway' });
    expect(privateTable).toMatchObject({ action: 'create-route-table', subnet: 'privateSubnet' });
    expect('gateway' in privateTable).toBe(false);
  });

  it('should assign the Name tags of each resource', () => {
    const plan = buildPlan(validInput);

    expect(plan.steps.map(step => step.nameTag)).toEqual([
      'demo',
      'demo-igw',
      'PublicSubnet',
      'PrivateSubnet',
      'PublicRouteTable',
      'PrivateRouteTable'
    ]);
  });

  it('should trim surrounding whitespace from text inputs', () => {
    const plan = buildPlan({ ...validInput, vpcName: '  demo  ', availabilityZone: ' us-east-1a ' });

    expect(plan.vpcName).toBe('demo');
    expect(plan.availabilityZone).toBe('us-east-1a');
  });

  it('should return a frozen plan', () => {
    const plan = buildPlan(validInput);

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.steps)).toBe(true);
    expect(Object.isFrozen(plan.steps[0])).toBe(true);
    expect(Object.isFrozen(plan.tags)).toBe(true);
  });

  it('should copy extra tags into the plan', () => {
    const tags = { Project: 'demo', Owner: 'platform' };
    const plan = buildPlan({ ...validInput, tags });

    expect(plan.tags).toEqual({ Project: 'demo', Owner: 'platform' });
    expect(plan.tags).not.toBe(tags);
  });

  describe('validation', () => {
    it('should report every invalid field at once', () => {
      const issues = issuesFor({
        vpcCidr: 'abc',
        vpcName: '',
        publicCidr: '999.0.0.0/24',
        privateCidr: '10.0.2.0/33',
        availabilityZone: '   '
      });

      expect(issues.map(issue => issue.field)).toEqual([
        'vpcCidr',
        'vpcName',
        'publicCidr',
        'privateCidr',
        'availabilityZone'
      ]);
      expect(issues[1].message).toBe('must not be empty');
      expect(issues[2].message).toContain('has octet 999 out of range 0-255');
      expect(issues[3].message).toContain('has prefix /33 out of range 0-32');
      expect(issues[4].message).toBe('must not be empty');
    });

    it('should report a single bad CIDR on its own field', () => {
      const issues = issuesFor({ ...validInput, publicCidr: '999.0.0.0/24' });

      expect(issues).toHaveLength(1);
      expect(issues[0].field).toBe('publicCidr');
    });

    it('should not trim whitespace around CIDR blocks', () => {
      const issues = issuesFor({ ...validInput, publicCidr: ' 10.0.1.0/24' });

      expect(issues).toHaveLength(1);
      expect(issues[0].field).toBe('publicCidr');
      expect(issues[0].message).toContain('is not of the form a.b.c.d/n');
    });

    it('should reject a subnet outside the VPC block', () => {
      const issues = issuesFor({ ...validInput, publicCidr: '10.1.1.0/24' });

      expect(issues).toEqual([
        { field: 'publicCidr', message: '10.1.1.0/24 is not within the VPC block 10.0.0.0/16' }
      ]);
    });

    it('should reject overlapping subnets', () => {
      const issues = issuesFor({ ...validInput, publicCidr: '10.0.1.0/24', privateCidr: '10.0.1.128/25' });

      expect(issues).toEqual([
        { field: 'privateCidr', message: '10.0.1.128/25 overlaps the public subnet 10.0.1.0/24' }
      ]);
    });

    it('should leave subnet placement to the provider when containment is off', () => {
      const plan = buildPlan(
        { ...validInput, publicCidr: '192.168.0.0/24' },
        { enforceSubnetContainment: false }
      );

      expect(plan.publicCidr.block).toBe('192.168.0.0/24');
    });

    it('should reject tag keys with the reserved aws: prefix', () => {
      const issues = issuesFor({ ...validInput, tags: { 'aws:owner': 'me' } });

      expect(issues.map(issue => issue.field)).toEqual(['tags.aws:owner']);
    });

    it('should throw an InvalidInputError with a readable message', () => {
      expect(() => buildPlan({ ...validInput, vpcName: '' })).toThrow('Invalid input: vpcName: must not be empty');
    });
  });
});
