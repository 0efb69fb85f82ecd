export type TaskKind = 'mining' | 'backtest';
export type TaskStatus = 'running' | 'completed' | 'failed' | 'cancelled';
export type TrialPhase = 'planning' | 'evolving' | 'backtesting' | 'analyzing' | 'completed';
export type LogLevel = 'info' | 'warning' | 'error' | 'success';

export const TRIAL_PHASES: readonly TrialPhase[] = ['planning', 'evolving', 'backtesting', 'analyzing', 'completed'];

export interface TaskProgress {
  phase: TrialPhase;
  currentRound: number;
  totalRounds: number;
  percent: number;
  message: string;
  timestamp: string;
}

export interface LogEntry {
  id: string;
  timestamp: string;
  level: LogLevel;
  message: string;
}

export interface ProcessHandle {
  pids: number[];
}

export interface Branch {
  index: number;
  direction?: string;
  logPath?: string;
}

export interface BranchOutcome extends Branch {
  status: 'succeeded' | 'failed';
  exitCode?: number;
  error?: string;
}

export type TaskMetrics = Record<string, number>;

export interface TaskRecord {
  id: string;
  kind: TaskKind;
  status: TaskStatus;
  progress: TaskProgress;
  metrics: TaskMetrics;
  logs: LogEntry[];
  processHandle?: ProcessHandle;
  config: Record<string, unknown>;
  error?: string;
  branches?: BranchOutcome[];
  createdAt: string;
  updatedAt: string;
  finishedAt?: string;
}

export type TaskEventType = 'progress' | 'log' | 'metrics' | 'result' | 'error' | 'heartbeat';

export interface TaskResultData {
  status: TaskStatus;
  metrics?: TaskMetrics;
  message?: string;
  branches?: BranchOutcome[];
}

export interface TaskEventDataMap {
  progress: TaskProgress;
  log: LogEntry;
  metrics: TaskMetrics;
  result: TaskResultData;
  error: { error: string };
  heartbeat: Record<string, never>;
}

export type TaskEventPayload = {
  [K in TaskEventType]: {
    type: K;
    taskId: string;
    data: TaskEventDataMap[K];
  };
}[TaskEventType];

export type TaskEvent = TaskEventPayload & { timestamp: string };
