// =============================================================================
// Pipeline error taxonomy
//
//   data_unavailable     — empty window; callers take the fallback path
//   malformed_record     — one observation is unusable; skipped and counted
//   external_capability  — text generation / provider call failed; degraded
//   store_failure        — persistence failed; aborts the run
// =============================================================================

export type PipelineErrorKind =
  | 'data_unavailable'
  | 'malformed_record'
  | 'external_capability'
  | 'store_failure';

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

export class DataUnavailableError extends PipelineError {
  constructor(message: string) {
    super('data_unavailable', message);
  }
}

export class MalformedRecordError extends PipelineError {
  readonly recordId: number;

  constructor(recordId: number, reason: string) {
    super('malformed_record', `Observation ${recordId}: ${reason}`);
    this.recordId = recordId;
  }
}

export class ExternalCapabilityError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('external_capability', message, { cause });
  }
}

export class StoreFailureError extends PipelineError {
  constructor(operation: string, cause: unknown) {
    super('store_failure', `Store ${operation} failed: ${describeError(cause)}`, { cause });
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Shape every outward operation reports on failure. */
export type FailureResult = {
  ok: false;
  error: { kind: PipelineErrorKind | 'internal'; message: string };
};

export function toFailure(err: unknown): FailureResult {
  if (err instanceof PipelineError) {
    return { ok: false, error: { kind: err.kind, message: err.message } };
  }
  return { ok: false, error: { kind: 'internal', message: describeError(err) } };
}
