// Orchestration-specific types
import type {
  DefaultRoute,
  HandleSlot,
  PlannedStep,
  ProvisionedHandles,
  ProvisioningPlan,
  StepResult
} from '../types';
import type { CloudOperation, CloudResourceClient } from '../provisioning/types';

export interface ExecutionOptions {
  /**
   * Checked before each step and passed to the VPC availability wait. A step
   * already running is never undone.
   */
  signal?: AbortSignal;
  onStepStart?: (step: PlannedStep, index: number) => void;
  onStepComplete?: (result: StepResult, step: PlannedStep) => void;
}

/**
 * What a step adapter sees: the plan, the client, handles from earlier steps,
 * and a way to report the resource it creates.
 */
export interface StepContext {
  readonly plan: ProvisioningPlan;
  readonly client: CloudResourceClient;
  /** The execution's abort signal, for client calls that block */
  readonly signal?: AbortSignal;
  handle<K extends HandleSlot>(slot: K): NonNullable<ProvisionedHandles[K]>;
  /** Record the step's resource as soon as it exists remotely */
  produce<K extends HandleSlot>(slot: K, handle: NonNullable<ProvisionedHandles[K]>): void;
  /** Run one client operation, turning any rejection into a RemoteOperationError */
  call<T>(operation: CloudOperation, run: () => Promise<T>): Promise<T>;
}

export interface StepOutcome {
  routes?: DefaultRoute[];
}

export type StepAdapter<S extends PlannedStep = PlannedStep> = (
  step: S,
  context: StepContext
) => Promise<StepOutcome>;
