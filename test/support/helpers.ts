import path from 'node:path';
import { config as defaultConfig } from '../../src/config.js';
import type { AppConfig } from '../../src/config.js';
import type { PipelineStage, StageContext, StageResult } from '../../src/orchestration/review-stages.js';
import type { BroadcastMessage } from '../../src/orchestration/types.js';

export const waitFor = async (predicate: () => boolean | Promise<boolean>, timeoutMs = 10000, intervalMs = 10) => {
  const started = Date.now();
  while (Date.now() - started <= timeoutMs) {
    if (await predicate()) return;
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
  throw new Error('timed out waiting for condition');
};

export const buildConfig = (sandbox: string, overrides: Partial<AppConfig> = {}): AppConfig => ({
  ...defaultConfig,
  DATA_DIR: path.join(sandbox, 'data'),
  UPLOAD_DIR: path.join(sandbox, 'uploads'),
  FIXED_DIR: path.join(sandbox, 'fixed'),
  ENGINE_MODE: 'mock',
  ENGINE_COMMAND: '',
  CONTROL_AUTH_TOKEN: '',
  STAGE_TIMEOUT_MS: 2000,
  STAGE_MAX_RETRIES: 2,
  STAGE_RETRY_BASE_MS: 1,
  STAGE_RETRY_MAX_MS: 5,
  SUBSCRIBER_QUEUE_DEPTH: 64,
  REPLAY_BUFFER_SIZE: 32,
  TASK_RETENTION_MAX: 0,
  TASK_RETENTION_HOURS: 0,
  ...overrides,
});

export const collect = async (events: AsyncIterable<BroadcastMessage> | undefined) => {
  const seen: BroadcastMessage[] = [];
  if (!events) return seen;
  for await (const message of events) {
    seen.push(message);
  }
  return seen;
};

export type StageBehaviour = (context: StageContext) => Promise<StageResult> | StageResult;

/** A stage whose every attempt is delegated to `behaviour`, with the contexts it saw recorded. */
export class ScriptedStage implements PipelineStage {
  readonly contexts: StageContext[] = [];

  constructor(readonly name: string, readonly label: string, private readonly behaviour: StageBehaviour) {}

  async run(context: StageContext) {
    this.contexts.push(context);
    return this.behaviour(context);
  }
}

export const reportStage = (name: string, report = `${name} report`) =>
  new ScriptedStage(name, name.replace(/_/g, ' '), () => ({ kind: 'report', report }));

export const deferred = <T = void>() => {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};
