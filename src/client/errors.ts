export type PipelineStep = 'session' | 'request' | 'upload' | 'effect' | 'result' | 'download';

export type FailureReason = 'network' | 'timeout' | 'cancelled' | 'status' | 'decode' | 'read' | 'missing-cookie';

/**
 * Base class for every error the client raises. `step` names the stage of the
 * effect pipeline that failed.
 */
export class PhotoFuniaError extends Error {
  constructor(
    readonly step: PipelineStep,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Transport failures. These never reach callers directly; step errors keep
// them as `cause`.

export class TransportError extends Error {
  readonly reason: 'network' | 'timeout' | 'cancelled' = 'network';

  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkError extends TransportError {
  override readonly reason = 'network';
}

export class RequestTimeoutError extends TransportError {
  override readonly reason = 'timeout';

  constructor(url: string, readonly timeoutMs: number, options?: { cause?: unknown }) {
    super(url, `request to ${url} timed out after ${timeoutMs}ms`, options);
  }
}

export class RequestCancelledError extends TransportError {
  override readonly reason = 'cancelled';

  constructor(url: string, options?: { cause?: unknown }) {
    super(url, `request to ${url} was cancelled`, options);
  }
}

export interface StepFailure {
  reason: FailureReason;
  status?: number;
  cause?: unknown;
}

/** A pipeline step that failed on I/O, status or decoding. */
export abstract class StepError extends PhotoFuniaError {
  readonly reason: FailureReason;
  readonly status?: number;

  constructor(step: PipelineStep, message: string, failure: StepFailure) {
    super(step, message, { cause: failure.cause });
    this.reason = failure.reason;
    this.status = failure.status;
  }
}

export class SessionError extends StepError {
  constructor(message: string, failure: StepFailure) {
    super('session', message, failure);
  }
}

export class RequestConstructionError extends PhotoFuniaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('request', message, options);
  }
}

export class UploadError extends StepError {
  constructor(message: string, failure: StepFailure) {
    super('upload', message, failure);
  }
}

export class EmptyKeyError extends PhotoFuniaError {
  constructor() {
    super('upload', 'image key is empty in the upload response');
  }
}

export class EffectRequestError extends StepError {
  constructor(message: string, failure: StepFailure) {
    super('effect', message, failure);
  }
}

export class ResultFetchError extends StepError {
  constructor(message: string, failure: StepFailure) {
    super('result', message, failure);
  }
}

/** The result page was fetched but its markup did not yield an image URL. */
export class ResultPageError extends PhotoFuniaError {
  constructor(message: string) {
    super('result', message);
  }
}

export class ImageNotFoundError extends ResultPageError {
  constructor() {
    super('could not find result image in HTML');
  }
}

export class SrcAttributeError extends ResultPageError {
  constructor() {
    super('could not find src attribute in image tag');
  }
}

export class UnterminatedAttributeError extends ResultPageError {
  constructor() {
    super('could not find end of src attribute');
  }
}

export class ImageDownloadError extends StepError {
  constructor(message: string, failure: StepFailure) {
    super('download', message, failure);
  }
}

/**
 * Maps a failure thrown by the HTTP executor onto the fields a step error
 * carries.
 */
export function transportFailure(err: unknown): StepFailure {
  if (err instanceof TransportError) return { reason: err.reason, cause: err };
  return { reason: 'network', cause: err };
}

export function describeError(err: unknown): string {
  if (err instanceof PhotoFuniaError) {
    const detail = err instanceof StepError ? ` (${err.reason}${err.status !== undefined ? ` ${err.status}` : ''})` : '';
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `[${err.step}] ${err.message}${detail}${cause}`;
  }
  return err instanceof Error ? err.message : String(err);
}
