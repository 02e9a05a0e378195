export type PipelineErrorCode =
  | "store_unavailable"
  | "source_unavailable"
  | "source_malformed";

/**
 * Base for cycle-level failures. Per-item dispatch failures are values,
 * not exceptions (see DispatchResult).
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class StoreUnavailable extends PipelineError {
  readonly code = "store_unavailable";
}

export class SourceUnavailable extends PipelineError {
  readonly code = "source_unavailable";
}

export class SourceMalformed extends PipelineError {
  readonly code = "source_malformed";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
