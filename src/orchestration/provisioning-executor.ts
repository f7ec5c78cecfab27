import { v4 as uuidv4 } from 'uuid';
import {
  ExecutionMetadata,
  ExecutionResult,
  HandleSlot,
  PlannedStep,
  ProvisionedHandles,
  ProvisioningPlan,
  RemoteOperationError,
  ResourceHandle,
  StepFailure,
  StepResult
} from '../types';
import type { CloudOperation, CloudResourceClient } from '../provisioning/types';
import { runStep } from './steps';
import type { ExecutionOptions, StepContext } from './types';

/**
 * Per-step context. Holds the resource the step created until the executor
 * decides whether the step succeeded.
 */
class ExecutionStepContext implements StepContext {
  produced?: ResourceHandle;
  private commitProduced?: (handles: ProvisionedHandles) => void;

  constructor(
    readonly plan: ProvisioningPlan,
    readonly client: CloudResourceClient,
    private readonly step: PlannedStep,
    private readonly handles: ProvisionedHandles,
    readonly signal?: AbortSignal
  ) {}

  handle<K extends HandleSlot>(slot: K): NonNullable<ProvisionedHandles[K]> {
    const handle = this.handles[slot];
    if (!handle) {
      throw new Error(`Step ${this.step.name} needs ${slot}, which no earlier step produced`);
    }
    return handle;
  }

  produce<K extends HandleSlot>(slot: K, handle: NonNullable<ProvisionedHandles[K]>): void {
    this.produced = handle;
    this.commitProduced = handles => {
      handles[slot] = handle;
    };
  }

  async call<T>(operation: CloudOperation, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new RemoteOperationError(this.step.name, operation, error);
    }
  }

  commit(handles: ProvisionedHandles): ResourceHandle {
    if (!this.produced || !this.commitProduced) {
      throw new Error(`Step ${this.step.name} completed without producing ${this.step.produces}`);
    }
    this.commitProduced(handles);
    return this.produced;
  }
}

/**
 * Walks a provisioning plan against a cloud client, one step at a time.
 *
 * There is no rollback: when a step fails, everything created before it stays
 * in place and is listed in the result so it can be cleaned up or resumed.
 */
export class ProvisioningExecutor {
  private client: CloudResourceClient;

  constructor(client: CloudResourceClient) {
    this.client = client;
  }

  async execute(plan: ProvisioningPlan, options: ExecutionOptions = {}): Promise<ExecutionResult> {
    this.checkDependencies(plan);

    const startTime = Date.now();
    const metadata: ExecutionMetadata = {
      executionId: uuidv4(),
      timestamp: new Date()
    };

    const steps: StepResult[] = [];
    const handles: ProvisionedHandles = {};
    const completedHandles: ResourceHandle[] = [];

    const finish = (
      status: ExecutionResult['status'],
      nextIndex: number,
      failure?: StepFailure
    ): ExecutionResult => {
      metadata.duration = Date.now() - startTime;
      return {
        success: status === 'succeeded',
        status,
        steps,
        handles,
        completedHandles,
        remainingSteps: plan.steps.slice(nextIndex).map(step => step.name),
        failure,
        metadata
      };
    };

    for (const [index, step] of plan.steps.entries()) {
      if (options.signal?.aborted) {
        return finish('cancelled', index);
      }

      options.onStepStart?.(step, index);
      const stepStart = Date.now();
      const context = new ExecutionStepContext(plan, this.client, step, handles, options.signal);

      try {
        const outcome = await runStep(step, context);
        const handle = context.commit(handles);
        completedHandles.push(handle);

        const result: StepResult = {
          step: step.name,
          status: 'succeeded',
          handle,
          ...(outcome.routes ? { routes: outcome.routes } : {}),
          duration: Date.now() - stepStart
        };
        steps.push(result);
        options.onStepComplete?.(result, step);
      } catch (caught) {
        const error = caught instanceof RemoteOperationError
          ? caught
          : new RemoteOperationError(step.name, 'step', caught);

        const result: StepResult = {
          step: step.name,
          status: 'failed',
          error,
          duration: Date.now() - stepStart
        };
        steps.push(result);
        options.onStepComplete?.(result, step);

        return finish('failed', index + 1, {
          step: step.name,
          error,
          ...(context.produced ? { partialHandle: context.produced } : {})
        });
      }
    }

    return finish('succeeded', plan.steps.length);
  }

  /** Every slot a step reads must be produced by an earlier step. */
  private checkDependencies(plan: ProvisioningPlan): void {
    const available = new Set<HandleSlot>();

    for (const step of plan.steps) {
      const missing = step.requires.filter(slot => !available.has(slot));
      if (missing.length > 0) {
        throw new Error(`Step ${step.name} depends on ${missing.join(', ')} before it is produced`);
      }
      available.add(step.produces);
    }
  }
}

/**
 * Every resource an execution created remotely: the completed steps' handles,
 * then the failing step's own resource when it got that far.
 */
export function resourcesLeftInPlace(result: ExecutionResult): ResourceHandle[] {
  const handles = [...result.completedHandles];
  if (result.failure?.partialHandle) {
    handles.push(result.failure.partialHandle);
  }
  return handles;
}

export async function execute(
  plan: ProvisioningPlan,
  client: CloudResourceClient,
  options?: ExecutionOptions
): Promise<ExecutionResult> {
  const executor = new ProvisioningExecutor(client);
  return executor.execute(plan, options);
}
