import { resourceTags } from '../config/naming';
import { DEFAULT_ROUTE_DESTINATION } from '../types';
import type {
  CreateInternetGatewayStep,
  CreateRouteTableStep,
  CreateSubnetStep,
  CreateVpcStep,
  DefaultRoute,
  PlannedStep,
  ResourceHandle
} from '../types';
import type { StepAdapter, StepContext, StepOutcome } from './types';

// Tagging is part of each creation step: an untagged resource fails its step.
async function tag(context: StepContext, handle: ResourceHandle, name: string): Promise<void> {
  for (const { key, value } of resourceTags(name, context.plan.tags)) {
    await context.call('tagResource', () => context.client.tagResource(handle, key, value));
  }
}

export const createVpc: StepAdapter<CreateVpcStep> = async (step, context) => {
  const network = await context.call('createNetwork', () => context.client.createNetwork(step.cidr.block));
  context.produce(step.produces, network);

  await context.call('awaitNetworkAvailable', () => context.client.awaitNetworkAvailable(network, context.signal));
  await tag(context, network, step.nameTag);
  return {};
};

export const createInternetGateway: StepAdapter<CreateInternetGatewayStep> = async (step, context) => {
  const network = context.handle('vpc');
  const gateway = await context.call('createInternetGateway', () => context.client.createInternetGateway());
  context.produce(step.produces, gateway);

  await tag(context, gateway, step.nameTag);
  await context.call('attachGateway', () => context.client.attachGateway(gateway, network));
  return {};
};

export const createSubnet: StepAdapter<CreateSubnetStep> = async (step, context) => {
  const network = context.handle('vpc');
  const subnet = await context.call('createSubnet', () =>
    context.client.createSubnet(network, step.cidr.block, step.availabilityZone)
  );
  context.produce(step.produces, subnet);

  await tag(context, subnet, step.nameTag);
  return {};
};

/**
 * Create, tag and associate a route table. The default route is added only
 * when the step names a gateway; that is what makes a table public.
 */
export const createRouteTable: StepAdapter<CreateRouteTableStep> = async (step, context) => {
  const network = context.handle('vpc');
  const subnet = context.handle(step.subnet);

  const table = await context.call('createRouteTable', () => context.client.createRouteTable(network));
  context.produce(step.produces, table);

  await tag(context, table, step.nameTag);
  await context.call('associateRouteTable', () => context.client.associateRouteTable(table, subnet));

  const routes: DefaultRoute[] = [];
  if (step.gateway) {
    const gateway = context.handle(step.gateway);
    await context.call('addDefaultRoute', () => context.client.addDefaultRoute(table, gateway));
    routes.push({ destination: DEFAULT_ROUTE_DESTINATION, gateway });
  }

  return { routes };
};

export function runStep(step: PlannedStep, context: StepContext): Promise<StepOutcome> {
  switch (step.action) {
    case 'create-vpc':
      return createVpc(step, context);
    case 'create-internet-gateway':
      return createInternetGateway(step, context);
    case 'create-subnet':
      return createSubnet(step, context);
    case 'create-route-table':
      return createRouteTable(step, context);
  }
}
