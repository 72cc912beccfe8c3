import { describe, expect, it } from 'vitest';
import { assembleResult } from '../src/orchestration/result-assembler.js';
import { TaskRegistry } from '../src/orchestration/task-registry.js';

const STAGES = [
  { name: 'structure_analysis', label: 'Structure analysis' },
  { name: 'defect_review', label: 'Defect review' },
  { name: 'fix_generation', label: 'Fix generation' },
];

const build = () => {
  const registry = new TaskRegistry({ now: () => new Date('2026-03-01T12:00:00.000Z') });
  const task = registry.create({ name: 'a.py', content: 'a \nb\n', bytes: 5 }, STAGES);
  registry.transitionTask(task.id, 'running');
  return { registry, taskId: task.id };
};

describe('result assembler', () => {
  it('returns null until the task is terminal', () => {
    const { registry, taskId } = build();
    const task = registry.get(taskId);
    expect(task && assembleResult(task)).toBeNull();
  });

  it('composes a completed review with the artifact summary', () => {
    const { registry, taskId } = build();
    STAGES.forEach((_, index) => {
      registry.transitionStage(taskId, index, 'running');
      registry.transitionStage(taskId, index, 'completed', { output: `report ${index}\n` });
    });
    const done = registry.transitionTask(taskId, 'completed', {
      outputArtifact: { name: 'fixed_a.py', content: 'a\nb\n', bytes: 4, path: '/srv/fixed/fixed_a.py', sha256: 'abc123' },
    });
    if (!done) throw new Error('task missing');

    const result = assembleResult(done);

    expect(result).toEqual({
      taskId,
      status: 'completed',
      fileName: 'a.py',
      sections: STAGES.map((stage, index) => ({
        index,
        name: stage.name,
        label: stage.label,
        status: 'completed',
        attempts: 1,
        report: `report ${index}\n`,
        error: undefined,
      })),
      report: [
        '# Review of a.py',
        '## 1. Structure analysis\n\nreport 0',
        '## 2. Defect review\n\nreport 1',
        '## 3. Fix generation\n\nreport 2',
      ].join('\n\n') + '\n',
      artifact: { name: 'fixed_a.py', path: '/srv/fixed/fixed_a.py', sha256: 'abc123', bytes: 4, lineCount: 2 },
      error: undefined,
      finishedAt: '2026-03-01T12:00:00.000Z',
    });
    expect(assembleResult(done)).toEqual(result);
  });

  it('renders failures and stages that never ran', () => {
    const { registry, taskId } = build();
    registry.transitionStage(taskId, 0, 'running');
    registry.transitionStage(taskId, 0, 'completed', { output: '   ' });
    registry.transitionStage(taskId, 1, 'running');
    registry.transitionStage(taskId, 1, 'running', { attempt: 2 });
    registry.transitionStage(taskId, 1, 'running', { attempt: 3 });
    registry.transitionStage(taskId, 1, 'failed', { error: 'engine down' });
    const failed = registry.transitionTask(taskId, 'failed', { error: 'defect_review: engine down' });
    if (!failed) throw new Error('task missing');

    const result = assembleResult(failed);

    expect(result?.status).toBe('failed');
    expect(result?.error).toBe('defect_review: engine down');
    expect(result?.artifact).toBeUndefined();
    expect(result?.sections.map((section) => [section.status, section.attempts])).toEqual([
      ['completed', 1],
      ['failed', 3],
      ['idle', 0],
    ]);
    expect(result?.report).toBe(
      [
        '# Review of a.py',
        '## 1. Structure analysis\n\n(no findings reported)',
        '## 2. Defect review\n\nFailed after 3 attempt(s): engine down',
        '## 3. Fix generation\n\nNot run.',
      ].join('\n\n') + '\n',
    );
  });
});
