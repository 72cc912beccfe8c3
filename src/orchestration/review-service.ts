import path from 'node:path';
import type { AppConfig } from '../config.js';
import { buildEngine } from '../engine/index.js';
import type { ReasoningEngine } from '../engine/types.js';
import { FileArtifactStore, type ArtifactStore } from '../storage/artifact-store.js';
import { createLogger, type LoggerLike } from '../utils/logger.js';
import { ValidationError } from './errors.js';
import { EventBroadcaster, type SubscribeOptions, type Subscription } from './event-broadcaster.js';
import { PipelineExecutor, type StartOutcome } from './pipeline-executor.js';
import { assembleResult } from './result-assembler.js';
import { buildReviewStages, type PipelineStage } from './review-stages.js';
import { TaskRegistry } from './task-registry.js';
import type { RetentionPolicy, ReviewResult, Task, TaskListFilter, TaskStatus } from './types.js';

export interface Submission {
  name: string;
  content: string;
}

export interface ReviewServiceOptions {
  maxFileBytes: number;
  allowedExtensions: readonly string[];
  retention: RetentionPolicy;
  logger: LoggerLike;
}

export interface ServiceHealth {
  status: 'ok' | 'degraded';
  uptimeSeconds: number;
  engine: { reachable: boolean };
  tasks: Record<TaskStatus, number> & { total: number };
  activeRuns: number;
  subscribers: number;
}

export const normalizeFileName = (name: string) => path.posix.basename(name.trim().replace(/\\/g, '/'));

/**
 * Transport-facing entry point: validates submissions, keeps uploads in the
 * artifact store and hands execution to the pipeline executor.
 */
export class ReviewService {
  constructor(
    private readonly registry: TaskRegistry,
    private readonly broadcaster: EventBroadcaster,
    private readonly executor: PipelineExecutor,
    private readonly stages: readonly PipelineStage[],
    private readonly store: ArtifactStore,
    private readonly engine: ReasoningEngine,
    private readonly options: ReviewServiceOptions,
  ) {}

  async createTask(submission: Submission): Promise<Task> {
    const { name, content, bytes } = this.validate(submission);

    const taskId = this.registry.nextId();
    const storedPath = await this.store.putUploaded(taskId, name, content);
    const task = this.registry.create(
      { name, content, bytes, path: storedPath },
      this.stages.map((stage) => ({ name: stage.name, label: stage.label })),
      taskId,
    );
    this.options.logger.info('task created', { taskId, fileName: name, bytes });

    for (const removed of this.registry.prune(this.options.retention)) {
      this.broadcaster.release(removed);
      this.options.logger.debug?.('task pruned', { taskId: removed });
    }

    return task;
  }

  startTask(taskId: string): StartOutcome {
    return this.executor.start(taskId);
  }

  getTask(taskId: string) {
    return this.registry.get(taskId);
  }

  listTasks(filter: TaskListFilter = {}) {
    return this.registry.list(filter);
  }

  subscribe(taskId: string, options: SubscribeOptions = {}): Subscription | null {
    return this.broadcaster.subscribe(taskId, options);
  }

  /** `null` while the task is unknown or still unfinished. */
  getResult(taskId: string): ReviewResult | null {
    const task = this.registry.get(taskId);
    return task ? assembleResult(task) : null;
  }

  settled(taskId: string) {
    return this.executor.settled(taskId);
  }

  async health(): Promise<ServiceHealth> {
    const reachable = await this.engine.ping();
    const counts = this.registry.counts();
    return {
      status: reachable ? 'ok' : 'degraded',
      uptimeSeconds: process.uptime(),
      engine: { reachable },
      tasks: { ...counts, total: this.registry.size },
      activeRuns: this.executor.activeRuns,
      subscribers: this.broadcaster.subscriberCount(),
    };
  }

  async stop() {
    await this.executor.stop();
  }

  private validate(submission: Submission) {
    const name = typeof submission.name === 'string' ? normalizeFileName(submission.name) : '';
    if (!name || name === '.' || name === '..') {
      throw new ValidationError('a file name is required', 'missing_file_name');
    }

    if (typeof submission.content !== 'string') {
      throw new ValidationError('file content must be text', 'invalid_content');
    }

    const extension = path.extname(name).toLowerCase();
    if (!extension || !this.options.allowedExtensions.includes(extension)) {
      throw new ValidationError(
        `unsupported file type ${extension || '(none)'}; allowed: ${this.options.allowedExtensions.join(', ')}`,
        'unsupported_extension',
      );
    }

    const bytes = Buffer.byteLength(submission.content, 'utf8');
    if (!submission.content.trim()) {
      throw new ValidationError('file has no content to review', 'empty_file');
    }
    if (bytes > this.options.maxFileBytes) {
      throw new ValidationError(`file is ${bytes} bytes; the limit is ${this.options.maxFileBytes}`, 'file_too_large');
    }

    return { name, content: submission.content, bytes };
  }
}

export interface ReviewServiceOverrides {
  engine?: ReasoningEngine;
  store?: ArtifactStore;
  stages?: readonly PipelineStage[];
  registry?: TaskRegistry;
  logger?: LoggerLike;
  sleep?: (ms: number) => Promise<void>;
}

export const createReviewService = (config: AppConfig, overrides: ReviewServiceOverrides = {}) => {
  const logger = overrides.logger ?? createLogger('codewarden', config.LOG_LEVEL);
  const child = (suffix: string) => overrides.logger ?? createLogger(`codewarden.${suffix}`, config.LOG_LEVEL);

  const engine = overrides.engine ?? buildEngine(config);
  const store = overrides.store ?? new FileArtifactStore(config.UPLOAD_DIR, config.FIXED_DIR);
  const stages = overrides.stages ?? buildReviewStages(engine, store);
  const registry = overrides.registry ?? new TaskRegistry();

  const broadcaster = new EventBroadcaster((taskId) => registry.get(taskId), {
    queueDepth: config.SUBSCRIBER_QUEUE_DEPTH,
    replayBufferSize: config.REPLAY_BUFFER_SIZE,
    logger: child('broadcast'),
  });

  const executor = new PipelineExecutor(registry, broadcaster, stages, {
    stageTimeoutMs: config.STAGE_TIMEOUT_MS,
    maxRetries: config.STAGE_MAX_RETRIES,
    retryBaseMs: config.STAGE_RETRY_BASE_MS,
    retryMaxMs: config.STAGE_RETRY_MAX_MS,
    logger: child('pipeline'),
    sleep: overrides.sleep,
  });

  return new ReviewService(registry, broadcaster, executor, stages, store, engine, {
    maxFileBytes: config.MAX_FILE_BYTES,
    allowedExtensions: config.ALLOWED_EXTENSIONS,
    retention: {
      maxTasks: config.TASK_RETENTION_MAX,
      maxAgeMs: config.TASK_RETENTION_HOURS * 60 * 60 * 1000,
    },
    logger,
  });
};
