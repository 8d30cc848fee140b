/**
 * State-machine compiler.
 *
 * Translates a resolved flow graph into a state-machine document for the
 * managed orchestrator. Pure: the same graph and configuration always give
 * the same document.
 */

import { errorEquals } from '../steps/retry.js';
import type { StepConfig } from '../types/config.js';
import type { FanOutOpenEntry, FlowGraph, ResolvedStep } from '../types/graph.js';
import type {
  MapState,
  RetryRule,
  State,
  StateMachineDefinition,
  TaskState,
} from '../types/stateMachine.js';
import { FlowDefinitionError } from '../errors.js';
import { mapStateName, stateName } from './names.js';
import {
  BATCH_SUBMIT_JOB_RESOURCE,
  S3_GET_OBJECT_RESOURCE,
  S3_PUT_OBJECT_RESOURCE,
  batchJobDefinition,
  batchJobQueue,
  lambdaArn,
  resultPrefixExpression,
} from './resources.js';

export { mapStateName, stateName };

/**
 * Compile a flow graph into `{ StartAt, States }`.
 */
export function compileStateMachine(graph: FlowGraph, config: StepConfig): StateMachineDefinition {
  const order: string[] = [];
  const states: Record<string, State> = {};

  for (const entry of graph.entries) {
    switch (entry.kind) {
      case 'task':
        add(stateName(entry.step.name), taskState(entry.step, graph.name, config));
        break;
      case 'fan-out-open':
        add(mapStateName(entry.source.name), mapState(entry, graph.name, config));
        break;
      case 'fan-out-close':
        add(stateName(entry.aggregate.name), taskState(entry.aggregate, graph.name, config));
        break;
    }
  }

  function add(name: string, state: State): void {
    if (name in states) {
      throw new FlowDefinitionError(
        'DUPLICATE_STEP',
        `State '${name}' is produced twice in flow '${graph.name}'`
      );
    }
    order.push(name);
    states[name] = state;
  }

  order.forEach((name, index) => {
    const state = states[name];
    if (index < order.length - 1) {
      state.Next = order[index + 1];
    } else {
      state.End = true;
    }
  });

  return {
    StartAt: order[0],
    States: states,
  };
}

/**
 * Task state for a single step, without chaining.
 */
export function taskState(step: ResolvedStep, flowName: string, config: StepConfig): TaskState {
  const state: TaskState = step.definition.isHeavyweight
    ? batchTaskState(step, flowName, config)
    : {
        Type: 'Task',
        Resource: lambdaArn(config, flowName, step.name),
        ResultPath: '$.result',
      };

  const retry = retryRules(step, config);
  if (retry) {
    state.Retry = retry;
  }
  return state;
}

function batchTaskState(step: ResolvedStep, flowName: string, config: StepConfig): TaskState {
  const { job } = step.definition;
  const environment = [
    { Name: 'STEPLINE_FLOW_NAME', Value: flowName },
    { Name: 'STEPLINE_STEP_NAME', Value: step.name },
    { Name: 'STEPLINE_RUN_ID', 'Value.$': '$.run_id' },
    ...Object.entries(config.batch.env).map(([Name, Value]) => ({ Name, Value })),
  ];

  return {
    Type: 'Task',
    Resource: BATCH_SUBMIT_JOB_RESOURCE,
    Parameters: {
      JobName: `${flowName}-${step.name}`,
      JobQueue: batchJobQueue(config, flowName),
      JobDefinition: batchJobDefinition(config, flowName, step.name),
      ContainerOverrides: {
        ResourceRequirements: [
          { Type: 'VCPU', Value: String(job.vcpu ?? config.batch.vcpu) },
          { Type: 'MEMORY', Value: String(job.memoryMb ?? config.batch.memoryMb) },
        ],
        Environment: environment,
      },
    },
    ResultPath: '$.result',
    TimeoutSeconds: job.timeoutSeconds ?? config.batch.timeoutSeconds,
  };
}

/**
 * Retry block for a step, or undefined when the effective policy allows no retries.
 * The orchestrator takes whole seconds, so the interval is rounded up.
 */
export function retryRules(step: ResolvedStep, config: StepConfig): RetryRule[] | undefined {
  const policy = step.definition.retry ?? config.retry;
  if (policy.maxRetries <= 0) {
    return undefined;
  }
  return [
    {
      ErrorEquals: errorEquals(policy),
      IntervalSeconds: Math.max(1, Math.ceil(policy.initialDelay)),
      MaxAttempts: policy.maxRetries + 1,
      BackoffRate: policy.backoffMultiplier,
    },
  ];
}

function mapState(entry: FanOutOpenEntry, flowName: string, config: StepConfig): MapState {
  const bucket: Record<string, string> = config.aws.artifactBucket
    ? { Bucket: config.aws.artifactBucket }
    : { 'Bucket.$': '$.bucket' };

  const innerNames = entry.innerSteps.map(step => stateName(step.name));
  const innerStates: Record<string, TaskState> = {};
  entry.innerSteps.forEach((step, index) => {
    const state = taskState(step, flowName, config);
    if (index < innerNames.length - 1) {
      state.Next = innerNames[index + 1];
    } else {
      state.End = true;
    }
    innerStates[innerNames[index]] = state;
  });

  const state: MapState = {
    Type: 'Map',
    ItemReader: {
      Resource: S3_GET_OBJECT_RESOURCE,
      ReaderConfig: { InputType: 'JSON' },
      Parameters: {
        ...bucket,
        'Key.$': '$.result.map_manifest_key',
      },
    },
    ItemSelector: {
      'item.$': '$$.Map.Item.Value',
      'bucket.$': '$.bucket',
      'run_id.$': '$.run_id',
      flow: {
        name: flowName,
        'run_id.$': '$$.Execution.Id',
        'params.$': '$$.Execution.Input',
      },
    },
    ItemProcessor: {
      ProcessorConfig: { Mode: 'DISTRIBUTED', ExecutionType: 'STANDARD' },
      StartAt: innerNames[0],
      States: innerStates,
    },
    ResultWriter: {
      Resource: S3_PUT_OBJECT_RESOURCE,
      Parameters: {
        ...bucket,
        'Prefix.$': resultPrefixExpression(config, flowName),
      },
    },
    ResultPath: '$.result',
  };

  if (entry.concurrencyLimit !== undefined) {
    state.MaxConcurrency = entry.concurrencyLimit;
  }
  return state;
}

export function serializeStateMachine(definition: StateMachineDefinition): string {
  return JSON.stringify(definition, null, 2);
}
