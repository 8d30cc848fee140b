/**
 * State-machine document types (Amazon States Language subset).
 */

export interface RetryRule {
  ErrorEquals: string[];
  IntervalSeconds: number;
  MaxAttempts: number;
  BackoffRate: number;
}

interface ChainedState {
  Next?: string;
  End?: true;
}

export interface TaskState extends ChainedState {
  Type: 'Task';
  Resource: string;
  Parameters?: Record<string, unknown>;
  ResultPath: string;
  TimeoutSeconds?: number;
  Retry?: RetryRule[];
}

export interface MapState extends ChainedState {
  Type: 'Map';
  ItemReader: {
    Resource: string;
    ReaderConfig: { InputType: 'JSON' };
    Parameters: Record<string, string>;
  };
  ItemSelector: Record<string, unknown>;
  ItemProcessor: {
    ProcessorConfig: { Mode: 'DISTRIBUTED'; ExecutionType: 'STANDARD' };
    StartAt: string;
    States: Record<string, TaskState>;
  };
  ResultWriter: {
    Resource: string;
    Parameters: Record<string, string>;
  };
  ResultPath: string;
  MaxConcurrency?: number;
}

export type State = TaskState | MapState;

export interface StateMachineDefinition {
  StartAt: string;
  States: Record<string, State>;
}
