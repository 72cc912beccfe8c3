import type { DerivedArtifact, ReviewArtifactSummary, ReviewResult, ReviewSection, Task } from './types.js';

const countLines = (content: string) => {
  if (!content) return 0;
  const lines = content.split('\n').length;
  return content.endsWith('\n') ? lines - 1 : lines;
};

const summarizeArtifact = (artifact: DerivedArtifact): ReviewArtifactSummary => ({
  name: artifact.name,
  path: artifact.path,
  sha256: artifact.sha256,
  bytes: artifact.bytes,
  lineCount: countLines(artifact.content),
});

const renderReport = (task: Task, sections: ReviewSection[]) => {
  const blocks = [`# Review of ${task.inputArtifact.name}`];

  for (const section of sections) {
    const heading = `## ${section.index + 1}. ${section.label}`;
    if (section.status === 'completed') {
      blocks.push(`${heading}\n\n${section.report?.trim() || '(no findings reported)'}`);
    } else if (section.status === 'failed') {
      blocks.push(`${heading}\n\nFailed after ${section.attempts} attempt(s): ${section.error ?? 'unknown error'}`);
    } else {
      blocks.push(`${heading}\n\nNot run.`);
    }
  }

  return `${blocks.join('\n\n')}\n`;
};

/**
 * Composes the outcome bundle of a finished task. Pure: the same snapshot
 * always yields the same bundle, and unfinished tasks yield `null`.
 */
export const assembleResult = (task: Task): ReviewResult | null => {
  if (task.status !== 'completed' && task.status !== 'failed') {
    return null;
  }

  const sections: ReviewSection[] = task.stages.map((stage) => ({
    index: stage.index,
    name: stage.name,
    label: stage.label,
    status: stage.status,
    attempts: stage.attempt,
    report: stage.output,
    error: stage.error,
  }));

  return {
    taskId: task.id,
    status: task.status,
    fileName: task.inputArtifact.name,
    sections,
    report: renderReport(task, sections),
    artifact: task.status === 'completed' && task.outputArtifact ? summarizeArtifact(task.outputArtifact) : undefined,
    error: task.error,
    finishedAt: task.finishedAt ?? task.updatedAt,
  };
};
