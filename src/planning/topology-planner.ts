import Joi from 'joi';
import { gatewayName, ResourceNames } from '../config/naming';
import { tagsSchema } from '../config/validator';
import {
  InputIssue,
  InvalidInputError,
  NetworkAddressBlock,
  PlannedStep,
  PlanOptions,
  ProvisioningPlan,
  TopologyInput
} from '../types';
import { blocksOverlap, containsBlock, validateAddressBlock } from './address-block';

type CidrField = 'vpcCidr' | 'publicCidr' | 'privateCidr';

const cidrSchema = Joi.string()
  .required()
  .custom((value: string, helpers) => {
    try {
      return validateAddressBlock(value).block;
    } catch (error) {
      const reason = error instanceof InvalidInputError ? error.issues[0].message : String(error);
      return helpers.error('cidr.invalid', { reason });
    }
  })
  .messages({
    'cidr.invalid': '{{#reason}}',
    'string.empty': 'is required',
    'any.required': 'is required'
  });

const requiredText = Joi.string()
  .trim()
  .required()
  .messages({
    'string.empty': 'must not be empty',
    'any.required': 'is required'
  });

const topologyInputSchema = Joi.object<TopologyInput>({
  vpcCidr: cidrSchema,
  vpcName: requiredText.max(255).messages({
    'string.max': 'must be no more than 255 characters long'
  }),
  publicCidr: cidrSchema,
  privateCidr: cidrSchema,
  availabilityZone: requiredText,
  tags: tagsSchema.default({})
});

/**
 * Validate the requested topology and derive its provisioning plan.
 *
 * Every invalid field is reported in one {@link InvalidInputError}. Nothing
 * remote is called here.
 */
export function buildPlan(input: TopologyInput, options: PlanOptions = {}): ProvisioningPlan {
  const result = topologyInputSchema.validate(input, { abortEarly: false });

  if (result.error) {
    throw new InvalidInputError(result.error.details.map(detail => ({
      field: detail.path.map(String).join('.') || 'input',
      message: detail.message
    })));
  }

  const value = result.value;
  const blocks = {
    vpcCidr: validateAddressBlock(value.vpcCidr),
    publicCidr: validateAddressBlock(value.publicCidr),
    privateCidr: validateAddressBlock(value.privateCidr)
  } satisfies Record<CidrField, NetworkAddressBlock>;

  if (options.enforceSubnetContainment ?? true) {
    const issues = checkSubnetLayout(blocks);
    if (issues.length > 0) {
      throw new InvalidInputError(issues);
    }
  }

  const tags = Object.freeze({ ...value.tags });

  return Object.freeze({
    vpcCidr: blocks.vpcCidr,
    vpcName: value.vpcName,
    publicCidr: blocks.publicCidr,
    privateCidr: blocks.privateCidr,
    availabilityZone: value.availabilityZone,
    tags,
    steps: planSteps(value.vpcName, blocks, value.availabilityZone)
  });
}

function checkSubnetLayout(blocks: Record<CidrField, NetworkAddressBlock>): InputIssue[] {
  const issues: InputIssue[] = [];

  for (const field of ['publicCidr', 'privateCidr'] as const) {
    if (!containsBlock(blocks.vpcCidr, blocks[field])) {
      issues.push({
        field,
        message: `${blocks[field].block} is not within the VPC block ${blocks.vpcCidr.block}`
      });
    }
  }

  if (blocksOverlap(blocks.publicCidr, blocks.privateCidr)) {
    issues.push({
      field: 'privateCidr',
      message: `${blocks.privateCidr.block} overlaps the public subnet ${blocks.publicCidr.block}`
    });
  }

  return issues;
}

function planSteps(
  vpcName: string,
  blocks: Record<CidrField, NetworkAddressBlock>,
  availabilityZone: string
): readonly PlannedStep[] {
  const steps: PlannedStep[] = [
    {
      name: 'create-vpc',
      action: 'create-vpc',
      description: `Create VPC ${vpcName} (${blocks.vpcCidr.block})`,
      requires: [],
      produces: 'vpc',
      nameTag: vpcName,
      cidr: blocks.vpcCidr
    },
    {
      name: 'create-internet-gateway',
      action: 'create-internet-gateway',
      description: 'Create and attach internet gateway',
      requires: ['vpc'],
      produces: 'internetGateway',
      nameTag: gatewayName(vpcName)
    },
    {
      name: 'create-public-subnet',
      action: 'create-subnet',
      description: `Create public subnet ${blocks.publicCidr.block} in ${availabilityZone}`,
      requires: ['vpc'],
      produces: 'publicSubnet',
      nameTag: ResourceNames.publicSubnet,
      cidr: blocks.publicCidr,
      availabilityZone
    },
    {
      name: 'create-private-subnet',
      action: 'create-subnet',
      description: `Create private subnet ${blocks.privateCidr.block} in ${availabilityZone}`,
      requires: ['vpc'],
      produces: 'privateSubnet',
      nameTag: ResourceNames.privateSubnet,
      cidr: blocks.privateCidr,
      availabilityZone
    },
    {
      name: 'create-public-route-table',
      action: 'create-route-table',
      description: 'Create public route table with a default route to the gateway',
      requires: ['vpc', 'publicSubnet', 'internetGateway'],
      produces: 'publicRouteTable',
      nameTag: ResourceNames.publicRouteTable,
      subnet: 'publicSubnet',
      gateway: 'internetGateway'
    },
    {
      name: 'create-private-route-table',
      action: 'create-route-table',
      description: 'Create private route table without a default route',
      requires: ['vpc', 'privateSubnet'],
      produces: 'privateRouteTable',
      nameTag: ResourceNames.privateRouteTable,
      subnet: 'privateSubnet'
    }
  ];

  return Object.freeze(steps.map(step => Object.freeze({ ...step, requires: Object.freeze([...step.requires]) })));
}
