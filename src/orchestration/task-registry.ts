import { randomUUID } from 'node:crypto';
import { InvalidTransitionError } from './errors.js';
import {
  isTerminalTaskStatus,
  type InputArtifact,
  type RetentionPolicy,
  type StageDefinition,
  type StageFields,
  type StageStatus,
  type Task,
  type TaskFields,
  type TaskListFilter,
  type TaskStatus,
} from './types.js';

const ALLOWED_TASK_TRANSITIONS: Record<TaskStatus, Set<TaskStatus>> = {
  pending: new Set(['running']),
  running: new Set(['completed', 'failed']),
  completed: new Set(),
  failed: new Set(),
};

// running -> running is a retry and must raise the attempt counter.
const ALLOWED_STAGE_TRANSITIONS: Record<StageStatus, Set<StageStatus>> = {
  idle: new Set(['running']),
  running: new Set(['running', 'completed', 'failed']),
  completed: new Set(),
  failed: new Set(),
};

interface TaskEntry {
  seq: number;
  task: Task;
}

export interface TaskRegistryOptions {
  now?: () => Date;
  idFactory?: () => string;
}

const snapshot = (task: Task): Task => structuredClone(task);

/**
 * Owns every task record. Each operation runs to completion synchronously, so
 * updates to one task are totally ordered without a lock, and callers only
 * ever see deep copies.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskEntry>();
  private sequence = 0;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(options: TaskRegistryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? (() => `task-${randomUUID()}`);
  }

  get size() {
    return this.tasks.size;
  }

  /** Returns an id no live task uses, for callers that must key storage before `create`. */
  nextId() {
    let id = this.idFactory();
    while (this.tasks.has(id)) {
      id = this.idFactory();
    }
    return id;
  }

  create(inputArtifact: InputArtifact, stages: readonly StageDefinition[], presetId?: string): Task {
    if (presetId !== undefined && this.tasks.has(presetId)) {
      throw new Error(`task id ${presetId} is already in use`);
    }
    const id = presetId ?? this.nextId();

    const at = this.now().toISOString();
    const task: Task = {
      id,
      status: 'pending',
      stages: stages.map((stage, index) => ({
        index,
        name: stage.name,
        label: stage.label,
        status: 'idle',
        attempt: 0,
      })),
      inputArtifact: { ...inputArtifact },
      createdAt: at,
      updatedAt: at,
      revision: 0,
    };

    this.sequence += 1;
    this.tasks.set(id, { seq: this.sequence, task });
    return snapshot(task);
  }

  get(taskId: string): Task | null {
    const entry = this.tasks.get(taskId);
    return entry ? snapshot(entry.task) : null;
  }

  transitionTask(taskId: string, to: TaskStatus, fields: TaskFields = {}): Task | null {
    const entry = this.tasks.get(taskId);
    if (!entry) return null;

    const task = entry.task;
    const from = task.status;
    const reject = (detail: string) => new InvalidTransitionError(taskId, from, to, detail);

    if (!ALLOWED_TASK_TRANSITIONS[from].has(to)) {
      throw reject('task status only moves forward');
    }

    if (fields.outputArtifact && to !== 'completed') {
      throw reject('an output artifact is only recorded on completion');
    }

    if (to === 'completed' && task.stages.some((stage) => stage.status !== 'completed')) {
      throw reject('every stage must be completed first');
    }

    if (to === 'failed') {
      const failed = task.stages.filter((stage) => stage.status === 'failed');
      if (failed.length !== 1) {
        throw reject(`expected exactly one failed stage, found ${failed.length}`);
      }
      if (task.stages.slice(failed[0].index + 1).some((stage) => stage.status !== 'idle')) {
        throw reject('stages after the failed stage must stay idle');
      }
      if (!fields.error?.trim()) {
        throw reject('a failed task needs an error description');
      }
    }

    const at = this.stamp(task);
    task.status = to;
    task.updatedAt = at;
    task.revision += 1;

    if (to === 'running') {
      task.startedAt = at;
    }
    if (isTerminalTaskStatus(to)) {
      task.finishedAt = at;
    }
    if (to === 'failed') {
      task.error = fields.error;
    }
    if (fields.outputArtifact) {
      task.outputArtifact = { ...fields.outputArtifact };
    }

    return snapshot(task);
  }

  transitionStage(taskId: string, stageIndex: number, to: StageStatus, fields: StageFields = {}): Task | null {
    const entry = this.tasks.get(taskId);
    if (!entry) return null;

    const task = entry.task;
    const stage = task.stages[stageIndex];
    const from = stage?.status ?? 'missing';
    const reject = (detail: string) => new InvalidTransitionError(taskId, from, to, detail, stageIndex);

    if (!stage) {
      throw reject(`task has ${task.stages.length} stage(s)`);
    }

    if (task.status !== 'running') {
      throw reject(`task is ${task.status}`);
    }

    if (!ALLOWED_STAGE_TRANSITIONS[stage.status].has(to)) {
      throw reject('stage status only moves forward');
    }

    let attempt = stage.attempt;
    if (stage.status === 'idle') {
      const blocker = task.stages.find((other) => other.index < stageIndex && other.status !== 'completed');
      if (blocker) {
        throw reject(`stage ${blocker.index} (${blocker.name}) is ${blocker.status}`);
      }
      const active = task.stages.find((other) => other.status === 'running');
      if (active) {
        throw reject(`stage ${active.index} (${active.name}) is already running`);
      }
      attempt = fields.attempt ?? stage.attempt + 1;
    } else if (to === 'running') {
      if (fields.attempt === undefined || fields.attempt <= stage.attempt) {
        throw reject(`a retry must raise the attempt counter past ${stage.attempt}`);
      }
      attempt = fields.attempt;
    }

    if (to === 'completed' && typeof fields.output !== 'string') {
      throw reject('a completed stage needs its output');
    }

    if (to === 'failed' && !fields.error?.trim()) {
      throw reject('a failed stage needs an error description');
    }

    const at = this.stamp(task);
    stage.status = to;
    stage.attempt = attempt;
    if (from === 'idle') {
      stage.startedAt = at;
    }
    if (to === 'completed') {
      stage.output = fields.output;
      stage.finishedAt = at;
    }
    if (to === 'failed') {
      stage.error = fields.error;
      stage.finishedAt = at;
    }

    task.updatedAt = at;
    task.revision += 1;
    return snapshot(task);
  }

  list(filter: TaskListFilter = {}): Task[] {
    const statuses = filter.status === undefined ? null : new Set(Array.isArray(filter.status) ? filter.status : [filter.status]);
    const offset = Math.max(0, filter.offset ?? 0);

    const matching = Array.from(this.tasks.values())
      .filter(({ task }) => {
        if (statuses && !statuses.has(task.status)) return false;
        if (filter.createdAfter && task.createdAt <= filter.createdAfter) return false;
        if (filter.updatedAfter && task.updatedAt <= filter.updatedAfter) return false;
        return true;
      })
      .sort((a, b) => b.task.createdAt.localeCompare(a.task.createdAt) || b.seq - a.seq);

    const end = filter.limit === undefined ? undefined : offset + Math.max(0, filter.limit);
    return matching.slice(offset, end).map(({ task }) => snapshot(task));
  }

  counts(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0 };
    for (const { task } of this.tasks.values()) {
      counts[task.status] += 1;
    }
    return counts;
  }

  /** Drops terminal tasks past the age or count bound; live tasks are never removed. */
  prune(policy: RetentionPolicy): string[] {
    const removed: string[] = [];
    const nowMs = this.now().getTime();

    if (policy.maxAgeMs && policy.maxAgeMs > 0) {
      for (const [taskId, { task }] of this.tasks) {
        if (!isTerminalTaskStatus(task.status)) continue;
        const finishedMs = Date.parse(task.finishedAt ?? task.updatedAt);
        if (nowMs - finishedMs > policy.maxAgeMs) {
          this.tasks.delete(taskId);
          removed.push(taskId);
        }
      }
    }

    if (policy.maxTasks && policy.maxTasks > 0 && this.tasks.size > policy.maxTasks) {
      const evictable = Array.from(this.tasks.values())
        .filter(({ task }) => isTerminalTaskStatus(task.status))
        .sort((a, b) => a.seq - b.seq);

      for (const { task } of evictable) {
        if (this.tasks.size <= policy.maxTasks) break;
        this.tasks.delete(task.id);
        removed.push(task.id);
      }
    }

    return removed;
  }

  private stamp(task: Task) {
    const at = this.now().toISOString();
    return at < task.updatedAt ? task.updatedAt : at;
  }
}
