import path from 'node:path';
import type { ReasoningEngine, ReasoningOutput } from '../engine/types.js';
import type { ArtifactStore, StoredArtifact } from '../storage/artifact-store.js';
import { StageFailure, classifyStageError } from './errors.js';
import type { DerivedArtifact, InputArtifact, StageDefinition } from './types.js';

export interface PriorOutput {
  index: number;
  name: string;
  label: string;
  report: string;
}

export interface StageContext {
  taskId: string;
  stageIndex: number;
  attempt: number;
  input: InputArtifact;
  priorOutputs: PriorOutput[];
  signal: AbortSignal;
}

export type StageResult =
  | { kind: 'report'; report: string }
  | { kind: 'report_with_artifact'; report: string; artifact: DerivedArtifact };

export interface PipelineStage extends StageDefinition {
  run(context: StageContext): Promise<StageResult>;
}

export interface ReviewStageDefinition extends StageDefinition {
  instructions: string;
}

export const REVIEW_STAGES: readonly ReviewStageDefinition[] = [
  {
    name: 'structure_analysis',
    label: 'Structure analysis',
    instructions: 'Describe the architecture of the file: its modules, definitions and how they depend on each other.',
  },
  {
    name: 'defect_review',
    label: 'Defect review',
    instructions: 'Using the structure report, list defects, risky constructs and style problems with their line numbers.',
  },
  {
    name: 'fix_generation',
    label: 'Fix generation',
    instructions: 'Return a corrected version of the whole file as the artifact, and summarize the changes in the report.',
  },
];

const askEngine = async (
  engine: ReasoningEngine,
  definition: ReviewStageDefinition,
  context: StageContext,
  expectArtifact: boolean,
): Promise<ReasoningOutput> => {
  try {
    return await engine.invoke(
      {
        taskId: context.taskId,
        stage: definition.name,
        instructions: definition.instructions,
        fileName: context.input.name,
        content: context.input.content,
        priorReports: context.priorOutputs.map((prior) => ({ stage: prior.name, label: prior.label, report: prior.report })),
        expectArtifact,
        attempt: context.attempt,
      },
      context.signal,
    );
  } catch (error) {
    throw classifyStageError(error);
  }
};

/** A stage that only asks the engine for a report. */
export class ReasoningStage implements PipelineStage {
  readonly name: string;
  readonly label: string;

  constructor(private readonly engine: ReasoningEngine, private readonly definition: ReviewStageDefinition) {
    this.name = definition.name;
    this.label = definition.label;
  }

  async run(context: StageContext): Promise<StageResult> {
    const output = await askEngine(this.engine, this.definition, context, false);
    return { kind: 'report', report: output.report };
  }
}

export const fixedArtifactName = (inputName: string) => `fixed_${path.basename(inputName)}`;

/**
 * Terminal stage: sends the stored upload to the engine and persists the
 * corrected file as `fixed_<upload name>` through the artifact store.
 */
export class FixGenerationStage implements PipelineStage {
  readonly name: string;
  readonly label: string;

  constructor(
    private readonly engine: ReasoningEngine,
    private readonly store: ArtifactStore,
    private readonly definition: ReviewStageDefinition,
  ) {
    this.name = definition.name;
    this.label = definition.label;
  }

  async run(context: StageContext): Promise<StageResult> {
    let uploaded: string | null;
    try {
      uploaded = await this.store.getUploaded(context.taskId);
    } catch (error) {
      throw classifyStageError(error);
    }
    if (uploaded === null) {
      throw StageFailure.permanent(`uploaded file for ${context.taskId} is missing`);
    }

    const source = { ...context, input: { ...context.input, content: uploaded } };
    const output = await askEngine(this.engine, this.definition, source, true);
    if (!output.artifact?.content.trim()) {
      throw StageFailure.permanent('engine returned no fixed content');
    }

    const name = fixedArtifactName(context.input.name);
    let stored: StoredArtifact;
    try {
      stored = await this.store.putDerived(`${context.taskId}/${name}`, output.artifact.content);
    } catch (error) {
      throw classifyStageError(error);
    }

    return {
      kind: 'report_with_artifact',
      report: output.report,
      artifact: {
        name,
        content: output.artifact.content,
        bytes: stored.bytes,
        path: stored.path,
        sha256: stored.sha256,
      },
    };
  }
}

export const buildReviewStages = (engine: ReasoningEngine, store: ArtifactStore): PipelineStage[] =>
  REVIEW_STAGES.map((definition, index) =>
    index === REVIEW_STAGES.length - 1 ? new FixGenerationStage(engine, store, definition) : new ReasoningStage(engine, definition),
  );
