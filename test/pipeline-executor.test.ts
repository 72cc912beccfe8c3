import { describe, expect, it } from 'vitest';
import { EngineInvocationError } from '../src/engine/types.js';
import { StageFailure } from '../src/orchestration/errors.js';
import { EventBroadcaster } from '../src/orchestration/event-broadcaster.js';
import { PipelineExecutor, backoffMs } from '../src/orchestration/pipeline-executor.js';
import type { PipelineStage, StageResult } from '../src/orchestration/review-stages.js';
import { TaskRegistry } from '../src/orchestration/task-registry.js';
import type { BroadcastMessage, TaskEvent } from '../src/orchestration/types.js';
import { silentLogger, type LoggerLike } from '../src/utils/logger.js';
import { ScriptedStage, collect, deferred, reportStage, waitFor } from './support/helpers.js';

interface HarnessOptions {
  queueDepth?: number;
  timeoutMs?: number;
  logger?: LoggerLike;
}

const harness = (stages: PipelineStage[], options: HarnessOptions = {}) => {
  const registry = new TaskRegistry();
  const broadcaster = new EventBroadcaster((taskId) => registry.get(taskId), {
    queueDepth: options.queueDepth ?? 64,
    replayBufferSize: 32,
    logger: silentLogger,
  });
  const sleeps: number[] = [];
  const executor = new PipelineExecutor(registry, broadcaster, stages, {
    stageTimeoutMs: options.timeoutMs ?? 1000,
    maxRetries: 2,
    retryBaseMs: 10,
    retryMaxMs: 15,
    logger: options.logger ?? silentLogger,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  const create = (name = 'a.py') =>
    registry.create(
      { name, content: 'x = 1\n', bytes: 6 },
      stages.map((stage) => ({ name: stage.name, label: stage.label })),
    );
  return { registry, broadcaster, executor, sleeps, create };
};

const taskEvents = (messages: BroadcastMessage[]) =>
  messages.filter((message): message is TaskEvent => message.type !== 'subscriber_overflow');

const shape = (messages: BroadcastMessage[]) =>
  taskEvents(messages).map((message) => [message.type, message.stageIndex, message.attempt ?? null]);

const fixStage = () =>
  new ScriptedStage('fix_generation', 'Fix generation', () => ({
    kind: 'report_with_artifact',
    report: 'tidied whitespace',
    artifact: { name: 'fixed_a.py', content: 'x = 1\n', bytes: 6, path: '/srv/fixed/task/fixed_a.py', sha256: 'abc' },
  }));

describe('pipeline executor', () => {
  it('computes capped exponential backoff', () => {
    expect([1, 2, 3, 4].map((attempt) => backoffMs(attempt, 500, 5000))).toEqual([500, 1000, 2000, 4000]);
    expect(backoffMs(6, 500, 5000)).toBe(5000);
  });

  it('runs every stage in order and completes with the derived artifact', async () => {
    const structure = reportStage('structure_analysis');
    const defects = reportStage('defect_review');
    const fix = fixStage();
    const { registry, broadcaster, executor, create } = harness([structure, defects, fix]);
    const task = create();
    const subscription = broadcaster.subscribe(task.id);

    expect(executor.start(task.id)).toBe('started');
    const seen = await collect(subscription?.events);
    await executor.settled(task.id);

    expect(shape(seen)).toEqual([
      ['task_running', null, null],
      ['stage_running', 0, 1],
      ['stage_completed', 0, 1],
      ['stage_running', 1, 1],
      ['stage_completed', 1, 1],
      ['stage_running', 2, 1],
      ['stage_completed', 2, 1],
      ['task_completed', null, null],
    ]);
    expect(taskEvents(seen).map((message) => message.revision)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);

    const done = registry.get(task.id);
    expect(done?.status).toBe('completed');
    expect(done?.revision).toBe(8);
    expect(done?.outputArtifact?.name).toBe('fixed_a.py');
    expect(done?.stages.map((stage) => stage.output)).toEqual([
      'structure_analysis report',
      'defect_review report',
      'tidied whitespace',
    ]);

    expect(defects.contexts[0].priorOutputs).toEqual([
      { index: 0, name: 'structure_analysis', label: 'structure analysis', report: 'structure_analysis report' },
    ]);
    expect(fix.contexts[0].priorOutputs.map((prior) => prior.name)).toEqual(['structure_analysis', 'defect_review']);
    expect(structure.contexts[0].input.name).toBe('a.py');

    const last = taskEvents(seen).at(-1);
    expect(last?.result?.status).toBe('completed');
    expect(last?.result?.artifact).toEqual({
      name: 'fixed_a.py',
      path: '/srv/fixed/task/fixed_a.py',
      sha256: 'abc',
      bytes: 6,
      lineCount: 1,
    });
  });

  it('runs independent tasks concurrently', async () => {
    const gate = deferred();
    const entered: string[] = [];
    const gated = new ScriptedStage('structure_analysis', 'Structure analysis', async (context) => {
      entered.push(context.taskId);
      await gate.promise;
      return { kind: 'report', report: `report for ${context.taskId}` };
    });
    const { registry, executor, create } = harness([gated, reportStage('defect_review')]);
    const first = create('a.py');
    const second = create('b.py');

    executor.start(first.id);
    executor.start(second.id);
    await waitFor(() => entered.length === 2);
    expect(executor.activeRuns).toBe(2);

    gate.resolve();
    await Promise.all([executor.settled(first.id), executor.settled(second.id)]);

    expect(registry.get(first.id)?.status).toBe('completed');
    expect(registry.get(second.id)?.status).toBe('completed');
    expect(registry.get(second.id)?.stages[0].output).toBe(`report for ${second.id}`);
  });

  it('halts on a permanent failure and leaves later stages idle', async () => {
    const fix = fixStage();
    const failing = new ScriptedStage('defect_review', 'Defect review', () => {
      throw StageFailure.permanent('unparseable input');
    });
    const { registry, broadcaster, executor, sleeps, create } = harness([reportStage('structure_analysis'), failing, fix]);
    const task = create();
    const subscription = broadcaster.subscribe(task.id);

    executor.start(task.id);
    const seen = await collect(subscription?.events);
    await executor.settled(task.id);

    expect(shape(seen)).toEqual([
      ['task_running', null, null],
      ['stage_running', 0, 1],
      ['stage_completed', 0, 1],
      ['stage_running', 1, 1],
      ['stage_failed', 1, 1],
      ['task_failed', null, null],
    ]);
    const failed = registry.get(task.id);
    expect(failed?.status).toBe('failed');
    expect(failed?.error).toBe('defect_review: unparseable input');
    expect(failed?.stages.map((stage) => stage.status)).toEqual(['completed', 'failed', 'idle']);
    expect(failed?.outputArtifact).toBeUndefined();
    expect(fix.contexts).toHaveLength(0);
    expect(sleeps).toEqual([]);
    expect(taskEvents(seen).at(-1)?.result?.status).toBe('failed');
  });

  it('retries transient failures with backoff and counts every attempt', async () => {
    let calls = 0;
    const flaky = new ScriptedStage('structure_analysis', 'Structure analysis', () => {
      calls += 1;
      if (calls < 3) throw StageFailure.transient('rate limited');
      return { kind: 'report', report: 'fine' };
    });
    const { registry, broadcaster, executor, sleeps, create } = harness([flaky, reportStage('defect_review')]);
    const task = create();
    const subscription = broadcaster.subscribe(task.id);

    executor.start(task.id);
    const seen = await collect(subscription?.events);

    expect(shape(seen).slice(0, 5)).toEqual([
      ['task_running', null, null],
      ['stage_running', 0, 1],
      ['stage_retry', 0, 2],
      ['stage_retry', 0, 3],
      ['stage_completed', 0, 3],
    ]);
    expect(taskEvents(seen)[2].error).toBe('rate limited');
    expect(sleeps).toEqual([10, 15]);
    expect(flaky.contexts.map((context) => context.attempt)).toEqual([1, 2, 3]);
    expect(registry.get(task.id)?.stages[0].attempt).toBe(3);
    expect(registry.get(task.id)?.status).toBe('completed');
  });

  it('escalates once retries are exhausted', async () => {
    const flaky = new ScriptedStage('structure_analysis', 'Structure analysis', () => {
      throw StageFailure.transient('rate limited');
    });
    const { registry, executor, sleeps, create } = harness([flaky, reportStage('defect_review')]);
    const task = create();

    executor.start(task.id);
    await executor.settled(task.id);

    const failed = registry.get(task.id);
    expect(flaky.contexts).toHaveLength(3);
    expect(sleeps).toEqual([10, 15]);
    expect(failed?.stages[0]).toMatchObject({ status: 'failed', attempt: 3, error: 'rate limited (gave up after 3 attempt(s))' });
    expect(failed?.error).toBe('structure_analysis: rate limited (gave up after 3 attempt(s))');
  });

  it('treats a timed-out attempt as transient and aborts its signal', async () => {
    const hanging = new ScriptedStage(
      'structure_analysis',
      'Structure analysis',
      (context) =>
        new Promise<StageResult>((_, reject) => {
          context.signal.addEventListener('abort', () => reject(context.signal.reason));
        }),
    );
    const { registry, executor, create } = harness([hanging], { timeoutMs: 20 });
    const task = create();

    executor.start(task.id);
    await executor.settled(task.id);

    expect(hanging.contexts).toHaveLength(3);
    expect(hanging.contexts.every((context) => context.signal.aborted)).toBe(true);
    expect(registry.get(task.id)?.error).toBe(
      'structure_analysis: stage attempt timed out after 20ms (gave up after 3 attempt(s))',
    );
  });

  it('classifies collaborator errors by their retryable flag', async () => {
    let calls = 0;
    const engineBacked = new ScriptedStage('structure_analysis', 'Structure analysis', () => {
      calls += 1;
      if (calls === 1) throw new EngineInvocationError('engine busy', true);
      return { kind: 'report', report: 'ok' };
    });
    const broken = new ScriptedStage('defect_review', 'Defect review', () => {
      throw new Error('unexpected shape');
    });
    const { registry, executor, create } = harness([engineBacked, broken]);
    const task = create();

    executor.start(task.id);
    await executor.settled(task.id);

    const failed = registry.get(task.id);
    expect(failed?.stages[0]).toMatchObject({ status: 'completed', attempt: 2 });
    expect(failed?.stages[1]).toMatchObject({ status: 'failed', attempt: 1 });
    expect(failed?.error).toBe('defect_review: unexpected shape');
  });

  it('fails a non-terminal stage that returns an artifact', async () => {
    const early = new ScriptedStage('structure_analysis', 'Structure analysis', () => ({
      kind: 'report_with_artifact',
      report: 'too soon',
      artifact: { name: 'x.py', content: 'x', bytes: 1 },
    }));
    const { registry, executor, create } = harness([early, reportStage('defect_review')]);
    const task = create();

    executor.start(task.id);
    await executor.settled(task.id);

    expect(registry.get(task.id)?.error).toBe(
      'structure_analysis: stage structure_analysis returned an artifact but is not the terminal stage',
    );
    expect(early.contexts).toHaveLength(1);
  });

  it('starts each task at most once', async () => {
    const gate = deferred();
    const gated = new ScriptedStage('structure_analysis', 'Structure analysis', async () => {
      await gate.promise;
      return { kind: 'report', report: 'done' };
    });
    const { executor, create } = harness([gated]);
    const task = create();

    expect(executor.start('task-missing')).toBe('not_found');
    expect(executor.start(task.id)).toBe('started');
    expect(executor.start(task.id)).toBe('already_running');
    gate.resolve();
    await executor.settled(task.id);

    expect(executor.start(task.id)).toBe('already_finished');
    expect(gated.contexts).toHaveLength(1);
  });

  it('gives late subscribers a gap-free snapshot and stream', async () => {
    const gate = deferred();
    const gated = new ScriptedStage('defect_review', 'Defect review', async () => {
      await gate.promise;
      return { kind: 'report', report: 'late' };
    });
    const { registry, broadcaster, executor, create } = harness([reportStage('structure_analysis'), gated, reportStage('fix_generation')]);
    const task = create();

    executor.start(task.id);
    await waitFor(() => gated.contexts.length === 1);
    const subscription = broadcaster.subscribe(task.id);
    const snapshotRevision = subscription?.snapshot.revision ?? -1;
    expect(subscription?.snapshot.stages[0].status).toBe('completed');
    expect(subscription?.snapshot.stages[1].status).toBe('running');

    gate.resolve();
    const seen = taskEvents(await collect(subscription?.events));
    const revisions = seen.map((message) => message.revision);

    expect(revisions[0]).toBe(snapshotRevision + 1);
    expect(revisions).toEqual(revisions.map((_, index) => snapshotRevision + 1 + index));
    expect(revisions.at(-1)).toBe(registry.get(task.id)?.revision);
  });

  it('detaches an overflowing subscriber while the task still finishes', async () => {
    const { registry, broadcaster, executor, create } = harness(
      [reportStage('structure_analysis'), reportStage('defect_review'), fixStage()],
      { queueDepth: 4 },
    );
    const task = create();
    const slow = broadcaster.subscribe(task.id);
    const fast = broadcaster.subscribe(task.id);
    const fastSeen = collect(fast?.events);

    executor.start(task.id);
    await executor.settled(task.id);
    const slowSeen = await collect(slow?.events);

    expect(registry.get(task.id)?.status).toBe('completed');
    expect(taskEvents(await fastSeen)).toHaveLength(8);
    expect(slowSeen).toHaveLength(5);
    expect(slowSeen[4]).toMatchObject({ type: 'subscriber_overflow', queueDepth: 4, lastQueuedRevision: 4 });
  });

  it('rejects the run promise on an internal consistency error', async () => {
    const errors: unknown[][] = [];
    const logger: LoggerLike = {
      info: () => {},
      warn: () => {},
      error: (...args: unknown[]) => {
        errors.push(args);
      },
    };
    const { registry, executor } = harness([reportStage('structure_analysis'), reportStage('defect_review')], { logger });
    const task = registry.create({ name: 'a.py', content: 'x', bytes: 1 }, [{ name: 'structure_analysis', label: 'S' }]);

    expect(executor.start(task.id)).toBe('started');
    await expect(executor.settled(task.id)).rejects.toThrow(/has 1 stage\(s\) but the pipeline has 2/);
    await waitFor(() => errors.length === 1);
    expect(errors[0][0]).toBe('pipeline run aborted by an internal consistency error');
  });

  it('waits for in-flight runs on stop, bounded by the deadline', async () => {
    const gate = deferred();
    const gated = new ScriptedStage('structure_analysis', 'Structure analysis', async () => {
      await gate.promise;
      return { kind: 'report', report: 'done' };
    });
    const { registry, executor, create } = harness([gated]);
    const task = create();
    executor.start(task.id);

    await executor.stop(20);
    expect(registry.get(task.id)?.status).toBe('running');

    gate.resolve();
    await executor.stop(1000);
    expect(registry.get(task.id)?.status).toBe('completed');
  });
});
