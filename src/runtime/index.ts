export { FlowExecutor, runFlow, type RunOptions } from './FlowExecutor.js';
export { StepExecutor, getFailureDetails, type FailureDetails, type Sleep } from './StepExecutor.js';
export { defaultWorkerCount, runBounded, settleBounded, type Settled } from './pool.js';
