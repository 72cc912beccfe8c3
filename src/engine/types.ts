export interface PriorReport {
  stage: string;
  label: string;
  report: string;
}

export interface ReasoningRequest {
  taskId: string;
  stage: string;
  instructions: string;
  fileName: string;
  content: string;
  priorReports: PriorReport[];
  expectArtifact: boolean;
  attempt: number;
}

export interface ReasoningOutput {
  report: string;
  artifact?: {
    name: string;
    content: string;
  };
}

export interface ReasoningEngine {
  invoke(request: ReasoningRequest, signal?: AbortSignal): Promise<ReasoningOutput>;
  ping(): Promise<boolean>;
}

export class EngineInvocationError extends Error {
  constructor(message: string, readonly retryable: boolean, readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'EngineInvocationError';
  }
}
