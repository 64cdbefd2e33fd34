import type { StageName } from './types.js';

export type PipelineErrorKind =
  | 'SourceUnavailable'
  | 'MalformedAnalysis'
  | 'MissingNamespace'
  | 'DuplicateNamespace'
  | 'AnalysisUnavailable'
  | 'AnalysisTimeout'
  | 'InvalidTransition'
  | 'Unexpected';

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.kind = kind;
  }
}

/**
 * What the orchestrator throws when a stage fails: the originating error
 * kind plus the identity of the stage that raised it.
 */
export class StageFailure extends PipelineError {
  readonly stage: StageName;

  constructor(stage: StageName, cause: unknown) {
    const kind: PipelineErrorKind = cause instanceof PipelineError ? cause.kind : 'Unexpected';
    const message = cause instanceof Error ? cause.message : String(cause);
    super(kind, `[${stage}] ${kind}: ${message}`, { cause });
    this.name = 'StageFailure';
    this.stage = stage;
  }
}
