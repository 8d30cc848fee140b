/**
 * stepline: declare data pipelines as chained steps, run them locally or
 * compile them to a state-machine document.
 */

export { step, StepDefinition, isStepDefinition, type ElementOf } from './steps/step.js';
export { DEFAULT_RETRY_POLICY, normalizeRetryPolicy, retryDelay, isRetryable, errorEquals } from './steps/retry.js';
export {
  ChainArena,
  ChainHandle,
  StepHandle,
  MapHandle,
  isChainHandle,
  type ChainNode,
  type MapBlock,
  type MapOptions,
} from './steps/chain.js';
export { flow, isFlow, type Flow, type FlowBuilder, type FlowOptions } from './flow.js';
export { validateSchedule } from './schedule.js';
export { resolveChain, getStepNames, formatGraph } from './graph/resolver.js';
export { FlowDAG } from './graph/dag.js';
export {
  compileStateMachine,
  serializeStateMachine,
  taskState,
  retryRules,
  stateName,
  mapStateName,
} from './compiler/stateMachine.js';
export { lambdaArn, lambdaFunctionName, batchJobQueue, batchJobDefinition, renderName } from './compiler/resources.js';
export * from './runtime/index.js';
export { LocalStore } from './store/LocalStore.js';
export { elementKey, type DataStore, type ManifestItem, type StoreKey, type StoredKind } from './store/types.js';
export { loadConfig, parseConfig, readConfigFile, envOverrides, type LoadConfigOptions } from './config.js';
export { createLogger, silentLogger, StepLogger, FanOutProgressLogger, type Logger, type LogSink } from './logging.js';
export { FlowDefinitionError, StoreError, ConfigError, type FlowDefinitionErrorCode, type StoreErrorCode } from './errors.js';
export * from './types/index.js';
