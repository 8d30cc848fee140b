/**
 * Centralized type exports.
 *
 * - Step types: step functions, retry policies, execution placement
 * - Graph types: resolved steps and graph entries
 * - Config types: the settings consumed by the compiler and the engine
 * - State-machine types: the compiled document
 */

export type {
  FlowParams,
  StepFunction,
  ErrorClass,
  ErrorKind,
  RetryPolicyInput,
  RetryPolicy,
  ExecutionClass,
  JobOptionsInput,
  JobOptions,
  ParamSelection,
  StepOptions,
  StepDefaults,
} from './step.js';

export {
  DelaySchema,
  RetryPolicySchema,
  ExecutionClassSchema,
  JobOptionsSchema,
  ParamSelectionSchema,
  StepNameSchema,
} from './step.js';

export type {
  ResolvedStep,
  TaskEntry,
  FanOutOpenEntry,
  FanOutCloseEntry,
  GraphEntry,
  GraphEntryKind,
  FlowGraph,
} from './graph.js';

export type { LogLevel, LoggingConfig, StepConfigInput, StepConfig } from './config.js';

export {
  LogLevelSchema,
  LoggingConfigSchema,
  AwsConfigSchema,
  LambdaConfigSchema,
  BatchConfigSchema,
  LocalConfigSchema,
  StepConfigSchema,
} from './config.js';

export type { RetryRule, TaskState, MapState, State, StateMachineDefinition } from './stateMachine.js';
