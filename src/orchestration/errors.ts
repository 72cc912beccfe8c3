export type StageFailureKind = 'transient' | 'permanent';

export class InvalidTransitionError extends Error {
  constructor(
    readonly taskId: string,
    readonly from: string,
    readonly to: string,
    detail: string,
    readonly stageIndex: number | null = null,
  ) {
    const scope = stageIndex === null ? 'task' : `stage ${stageIndex}`;
    super(`invalid_transition:${taskId}:${scope}:${from}->${to} (${detail})`);
    this.name = 'InvalidTransitionError';
  }
}

export class StageFailure extends Error {
  constructor(readonly kind: StageFailureKind, readonly reason: string, options?: { cause?: unknown }) {
    super(reason, options);
    this.name = 'StageFailure';
  }

  static transient(reason: string, cause?: unknown) {
    return new StageFailure('transient', reason, { cause });
  }

  static permanent(reason: string, cause?: unknown) {
    return new StageFailure('permanent', reason, { cause });
  }
}

export class StageTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`stage attempt timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
  }
}

export class ValidationError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

const hasRetryableFlag = (error: unknown): error is { retryable: boolean; message?: unknown } =>
  typeof error === 'object' && error !== null && 'retryable' in error && typeof error.retryable === 'boolean';

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Maps anything a stage may throw onto the retry taxonomy. Collaborator errors
 * carry a `retryable` flag; timeouts are transient; the rest is permanent.
 */
export const classifyStageError = (error: unknown): StageFailure => {
  if (error instanceof StageFailure) {
    return error;
  }

  if (error instanceof StageTimeoutError) {
    return StageFailure.transient(error.message, error);
  }

  if (hasRetryableFlag(error)) {
    return new StageFailure(error.retryable ? 'transient' : 'permanent', errorMessage(error), { cause: error });
  }

  return StageFailure.permanent(errorMessage(error), error);
};
