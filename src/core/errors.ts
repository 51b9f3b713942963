/**
 * @fileoverview Error taxonomy.
 *
 * Every error raised on purpose derives from {@link JobweaveError}. Fatal
 * errors about a job record carry the job directory so the message alone
 * points at the files to inspect.
 *
 * @module core/errors
 */

/** Options shared by all jobweave errors. */
export interface JobweaveErrorOptions {
  /** Job directory the error refers to, if any */
  jobDir?: string;
  /** Underlying error */
  cause?: unknown;
}

/**
 * Base class for all jobweave errors.
 */
export class JobweaveError extends Error {
  readonly jobDir?: string;

  constructor(message: string, options: JobweaveErrorOptions = {}) {
    super(options.jobDir ? `${message} (job: ${options.jobDir})` : message, { cause: options.cause });
    this.name = 'JobweaveError';
    this.jobDir = options.jobDir;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Graph / futures
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Registering a dependency would close a cycle in the wait graph.
 */
export class DependencyCycleError extends JobweaveError {
  constructor(message: string, public readonly cycle: string[]) {
    super(message);
    this.name = 'DependencyCycleError';
  }
}

/**
 * A dependency failed; the dependent fails with this error without running.
 * All transitive dependents share the same instance.
 */
export class UpstreamFailureError extends JobweaveError {
  constructor(public readonly upstreamLabel: string, cause: unknown) {
    super(`Upstream future '${upstreamLabel}' failed: ${describeError(cause)}`, { cause });
    this.name = 'UpstreamFailureError';
  }
}

/** A future was written twice. */
export class FutureStateError extends JobweaveError {
  constructor(message: string) {
    super(message);
    this.name = 'FutureStateError';
  }
}

/** A value was read from a future that is not terminal. */
export class FutureNotDoneError extends JobweaveError {
  constructor(label: string) {
    super(`Future '${label}' is not done`);
    this.name = 'FutureNotDoneError';
  }
}

/** Work was submitted after shutdown. */
export class SchedulerClosedError extends JobweaveError {
  constructor() {
    super('Scheduler has been shut down');
    this.name = 'SchedulerClosedError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Job records
// ─────────────────────────────────────────────────────────────────────────────

/** Why a stored record was rejected. */
export type RecordRejectReason = 'hash-mismatch' | 'file-hash-mismatch' | 'missing-result';

const REJECT_MESSAGES: Record<RecordRejectReason, string> = {
  'hash-mismatch': 'Stored kwargs do not match the requested kwargs',
  'file-hash-mismatch': 'Files referenced by the kwargs changed since the record was written',
  'missing-result': 'Job record has no result and the job cannot resume',
};

/**
 * The stored job record does not match the request and the job cannot
 * resume. The caller must not resubmit: work may still be running remotely.
 */
export class HashMismatchWithoutResumeError extends JobweaveError {
  constructor(jobDir: string, public readonly reason: RecordRejectReason) {
    super(REJECT_MESSAGES[reason], { jobDir });
    this.name = 'HashMismatchWithoutResumeError';
  }
}

/** Inconsistent job directory contents, e.g. a result with no kwargs. */
export class JobRecordError extends JobweaveError {
  constructor(message: string, jobDir: string) {
    super(message, { jobDir });
    this.name = 'JobRecordError';
  }
}

/** A file referenced from the kwargs cannot be read. */
export class FileReferenceError extends JobweaveError {
  constructor(message: string, jobDir: string, cause?: unknown) {
    super(message, { jobDir, cause });
    this.name = 'FileReferenceError';
  }
}

/** A job finished but left no `result.json`. */
export class JobResultMissingError extends JobweaveError {
  constructor(jobDir: string) {
    super('No result.json after completion', { jobDir });
    this.name = 'JobResultMissingError';
  }
}

/** A job's script or target reported failure. */
export class JobFailedError extends JobweaveError {
  constructor(message: string, options: JobweaveErrorOptions = {}) {
    super(message, options);
    this.name = 'JobFailedError';
  }
}

/** A value cannot be written to or read from canonical JSON. */
export class SerializationError extends JobweaveError {
  constructor(message: string, options: JobweaveErrorOptions = {}) {
    super(message, options);
    this.name = 'SerializationError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Cluster
// ─────────────────────────────────────────────────────────────────────────────

/** A status query failed in a way worth retrying. */
export class TransientQueryError extends JobweaveError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransientQueryError';
  }
}

/** The shared status cache could not be read; the poll is retried. */
export class StatusCacheError extends JobweaveError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StatusCacheError';
  }
}

/** The cluster scheduler refused or failed a submission. */
export class ClusterSubmissionError extends JobweaveError {
  constructor(message: string, jobDir: string, cause?: unknown) {
    super(message, { jobDir, cause });
    this.name = 'ClusterSubmissionError';
  }
}

/** The caller's wait deadline passed before the job finished. */
export class ClusterWaitTimeoutError extends JobweaveError {
  constructor(jobId: string, timeoutMs: number, jobDir?: string) {
    super(`Cluster job ${jobId} did not finish within ${timeoutMs}ms`, { jobDir });
    this.name = 'ClusterWaitTimeoutError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation / configuration
// ─────────────────────────────────────────────────────────────────────────────

/** Parameters or a result failed schema validation. */
export class ValidationError extends JobweaveError {
  constructor(message: string, public readonly details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'ValidationError';
  }
}

/** Missing backend, malformed template or bad setting. */
export class ConfigurationError extends JobweaveError {
  constructor(message: string, options: JobweaveErrorOptions = {}) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/** A lock file could not be acquired in time. */
export class LockTimeoutError extends JobweaveError {
  constructor(lockPath: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`);
    this.name = 'LockTimeoutError';
  }
}

/**
 * Render any thrown value as a one-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrow a caught value to a Node.js system error code, if it has one.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
