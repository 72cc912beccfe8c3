import type { LoggerLike } from '../utils/logger.js';
import { StageFailure, StageTimeoutError, classifyStageError, errorMessage } from './errors.js';
import type { EventBroadcaster } from './event-broadcaster.js';
import { assembleResult } from './result-assembler.js';
import type { PipelineStage, PriorOutput, StageContext, StageResult } from './review-stages.js';
import type { TaskRegistry } from './task-registry.js';
import { isTerminalTaskStatus, type DerivedArtifact, type Task, type TaskEvent, type TaskEventType } from './types.js';

export type StartOutcome = 'started' | 'already_running' | 'already_finished' | 'not_found';

export interface PipelineExecutorOptions {
  stageTimeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
  logger: LoggerLike;
  sleep?: (ms: number) => Promise<void>;
}

type AttemptOutcome = { ok: true; result: StageResult } | { ok: false; failure: StageFailure };

export const backoffMs = (attempt: number, baseMs: number, maxMs: number) => {
  const power = Math.max(0, attempt - 1);
  return Math.min(maxMs, baseMs * 2 ** power);
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const present = (task: Task | null, taskId: string): Task => {
  if (!task) {
    throw new Error(`task ${taskId} disappeared from the registry mid-run`);
  }
  return task;
};

/**
 * Drives tasks through the configured stages. Every registry mutation is
 * followed by its publish in the same tick, so subscribers see transitions in
 * exactly the order the registry applied them.
 */
export class PipelineExecutor {
  private readonly runs = new Map<string, Promise<void>>();
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly registry: TaskRegistry,
    private readonly broadcaster: EventBroadcaster,
    private readonly stages: readonly PipelineStage[],
    private readonly options: PipelineExecutorOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  get activeRuns() {
    return this.runs.size;
  }

  start(taskId: string): StartOutcome {
    const task = this.registry.get(taskId);
    if (!task) return 'not_found';
    if (isTerminalTaskStatus(task.status)) return 'already_finished';
    if (task.status === 'running' || this.runs.has(taskId)) return 'already_running';

    const running = present(this.registry.transitionTask(taskId, 'running'), taskId);
    this.emit(running, 'task_running', null);

    const run = this.runTask(running);
    this.runs.set(taskId, run);
    void run
      .then(
        () => undefined,
        (error: unknown) => {
          this.options.logger.error('pipeline run aborted by an internal consistency error', {
            taskId,
            error: errorMessage(error),
          });
        },
      )
      .finally(() => {
        this.runs.delete(taskId);
      });

    return 'started';
  }

  /** Resolves once the in-flight run of the task ends; rejects if it aborted. */
  settled(taskId: string): Promise<void> {
    return this.runs.get(taskId) ?? Promise.resolve();
  }

  async stop(timeoutMs = 5000) {
    const pending = Array.from(this.runs.values());
    if (pending.length === 0) return;

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    let drained: boolean;
    try {
      drained = await Promise.race([Promise.allSettled(pending).then(() => true), deadline]);
    } finally {
      clearTimeout(timer);
    }

    if (!drained) {
      this.options.logger.warn('pipeline runs still in flight after stop deadline', { runs: this.runs.size });
    }
  }

  private async runTask(task: Task) {
    const taskId = task.id;
    if (task.stages.length !== this.stages.length) {
      throw new Error(`task ${taskId} has ${task.stages.length} stage(s) but the pipeline has ${this.stages.length}`);
    }

    const priorOutputs: PriorOutput[] = [];
    let derived: DerivedArtifact | undefined;

    for (const [index, stage] of this.stages.entries()) {
      const terminal = index === this.stages.length - 1;
      let attempt = 1;
      let snapshot = present(this.registry.transitionStage(taskId, index, 'running', { attempt }), taskId);
      this.emit(snapshot, 'stage_running', index, { attempt });

      for (;;) {
        const outcome = await this.attempt(stage, terminal, {
          taskId,
          stageIndex: index,
          attempt,
          input: task.inputArtifact,
          priorOutputs: priorOutputs.map((prior) => ({ ...prior })),
        });

        if (outcome.ok) {
          const { result } = outcome;
          snapshot = present(this.registry.transitionStage(taskId, index, 'completed', { output: result.report }), taskId);
          this.emit(snapshot, 'stage_completed', index, { attempt, output: result.report });
          priorOutputs.push({ index, name: stage.name, label: stage.label, report: result.report });
          if (result.kind === 'report_with_artifact') {
            derived = result.artifact;
          }
          break;
        }

        const { failure } = outcome;
        if (failure.kind === 'transient' && attempt <= this.options.maxRetries) {
          const waitMs = backoffMs(attempt, this.options.retryBaseMs, this.options.retryMaxMs);
          this.options.logger.warn('stage attempt failed; retrying', {
            taskId,
            stage: stage.name,
            attempt,
            waitMs,
            error: failure.reason,
          });
          await this.sleep(waitMs);
          attempt += 1;
          snapshot = present(this.registry.transitionStage(taskId, index, 'running', { attempt }), taskId);
          this.emit(snapshot, 'stage_retry', index, { attempt, error: failure.reason });
          continue;
        }

        const reason =
          failure.kind === 'transient' ? `${failure.reason} (gave up after ${attempt} attempt(s))` : failure.reason;
        snapshot = present(this.registry.transitionStage(taskId, index, 'failed', { error: reason }), taskId);
        this.emit(snapshot, 'stage_failed', index, { attempt, error: reason });

        const error = `${stage.name}: ${reason}`;
        const failed = present(this.registry.transitionTask(taskId, 'failed', { error }), taskId);
        this.emit(failed, 'task_failed', null, { error, result: assembleResult(failed) ?? undefined });
        this.options.logger.warn('task failed', { taskId, stage: stage.name, attempt, error: reason });
        return;
      }
    }

    const completed = present(this.registry.transitionTask(taskId, 'completed', { outputArtifact: derived }), taskId);
    this.emit(completed, 'task_completed', null, { result: assembleResult(completed) ?? undefined });
    this.options.logger.info('task completed', { taskId, artifact: derived?.path });
  }

  private async attempt(
    stage: PipelineStage,
    terminal: boolean,
    context: Omit<StageContext, 'signal'>,
  ): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new StageTimeoutError(this.options.stageTimeoutMs);
        controller.abort(error);
        reject(error);
      }, this.options.stageTimeoutMs);
    });

    try {
      const result = await Promise.race([stage.run({ ...context, signal: controller.signal }), timeout]);
      if (result.kind === 'report_with_artifact' && !terminal) {
        return { ok: false, failure: StageFailure.permanent(`stage ${stage.name} returned an artifact but is not the terminal stage`) };
      }
      return { ok: true, result };
    } catch (error) {
      return { ok: false, failure: classifyStageError(error) };
    } finally {
      clearTimeout(timer);
    }
  }

  private emit(
    task: Task,
    type: TaskEventType,
    stageIndex: number | null,
    fields: Pick<TaskEvent, 'attempt' | 'output' | 'error' | 'result'> = {},
  ) {
    const stage = stageIndex === null ? undefined : task.stages[stageIndex];
    const event: TaskEvent = {
      type,
      taskId: task.id,
      revision: task.revision,
      stageIndex,
      stageName: stage?.name,
      status: stage ? stage.status : task.status,
      at: task.updatedAt,
      ...fields,
    };
    this.broadcaster.publish(task.id, event);
  }
}
