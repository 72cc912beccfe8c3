export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';
export type StageStatus = 'idle' | 'running' | 'completed' | 'failed';

export const isTaskStatus = (value: unknown): value is TaskStatus =>
  value === 'pending' || value === 'running' || value === 'completed' || value === 'failed';

export const isTerminalTaskStatus = (status: TaskStatus) => status === 'completed' || status === 'failed';

export interface InputArtifact {
  name: string;
  content: string;
  bytes: number;
  path?: string;
}

export interface DerivedArtifact {
  name: string;
  content: string;
  bytes: number;
  path?: string;
  sha256?: string;
}

export interface StageDefinition {
  name: string;
  label: string;
}

export interface StageRecord {
  index: number;
  name: string;
  label: string;
  status: StageStatus;
  attempt: number;
  startedAt?: string;
  finishedAt?: string;
  output?: string;
  error?: string;
}

export interface Task {
  id: string;
  status: TaskStatus;
  stages: StageRecord[];
  inputArtifact: InputArtifact;
  outputArtifact?: DerivedArtifact;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  finishedAt?: string;
  error?: string;
  revision: number;
}

export interface TaskFields {
  error?: string;
  outputArtifact?: DerivedArtifact;
}

export interface StageFields {
  attempt?: number;
  output?: string;
  error?: string;
}

export interface TaskListFilter {
  status?: TaskStatus | TaskStatus[];
  createdAfter?: string;
  updatedAfter?: string;
  offset?: number;
  limit?: number;
}

export interface RetentionPolicy {
  maxTasks?: number;
  maxAgeMs?: number;
}

export type TaskEventType =
  | 'task_running'
  | 'stage_running'
  | 'stage_retry'
  | 'stage_completed'
  | 'stage_failed'
  | 'task_completed'
  | 'task_failed';

export interface TaskEvent {
  type: TaskEventType;
  taskId: string;
  revision: number;
  stageIndex: number | null;
  stageName?: string;
  status: TaskStatus | StageStatus;
  at: string;
  attempt?: number;
  output?: string;
  error?: string;
  result?: ReviewResult;
}

export interface SubscriberOverflowNotice {
  type: 'subscriber_overflow';
  taskId: string;
  at: string;
  queueDepth: number;
  lastQueuedRevision: number | null;
}

export type BroadcastMessage = TaskEvent | SubscriberOverflowNotice;

export interface ReviewSection {
  index: number;
  name: string;
  label: string;
  status: StageStatus;
  attempts: number;
  report?: string;
  error?: string;
}

export interface ReviewArtifactSummary {
  name: string;
  path?: string;
  sha256?: string;
  bytes: number;
  lineCount: number;
}

export interface ReviewResult {
  taskId: string;
  status: 'completed' | 'failed';
  fileName: string;
  sections: ReviewSection[];
  report: string;
  artifact?: ReviewArtifactSummary;
  error?: string;
  finishedAt: string;
}
