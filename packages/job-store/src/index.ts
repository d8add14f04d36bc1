import type { DocwatchJob } from "@docwatch/shared-types";

/**
 * Default cap on jobs waiting for the worker.
 */
export const DEFAULT_MAX_PENDING_JOBS = 1000;

/**
 * Error raised when the queue is at capacity.
 */
export class JobQueueFullError extends Error {
  /**
   * Capacity that was exceeded.
   */
  public readonly capacity: number;

  public constructor(capacity: number) {
    super(`Job queue is full (capacity ${capacity})`);
    this.name = "JobQueueFullError";
    this.capacity = capacity;
  }
}

/**
 * Determines whether a value matches one of the job payload shapes.
 *
 * @param value - Candidate job.
 * @returns `true` when the value satisfies the required job fields.
 */
export function isDocwatchJob(value: unknown): value is DocwatchJob {
  if (!value || typeof value !== "object") {
    return false;
  }

  const candidate = value as Partial<Record<string, unknown>>;
  if (
    typeof candidate.job_id !== "string" ||
    typeof candidate.installation_id !== "number" ||
    typeof candidate.queued_at !== "string"
  ) {
    return false;
  }

  switch (candidate.kind) {
    case "check_pull_request":
      return (
        typeof candidate.repo_full_name === "string" &&
        typeof candidate.pr_number === "number" &&
        typeof candidate.updated_at === "string"
      );
    case "register_installation":
      return (
        typeof candidate.account_id === "number" &&
        typeof candidate.account_login === "string" &&
        typeof candidate.app_id === "number"
      );
    case "remove_installation":
      return true;
    default:
      return false;
  }
}

/**
 * FIFO hand-over between the webhook intake and the worker.
 *
 * @remarks
 * Jobs live in process memory only and are lost on restart; GitHub
 * redelivery and installation discovery at startup cover that gap.
 */
export class InMemoryJobQueue {
  private readonly pending: DocwatchJob[] = [];
  private readonly capacity: number;

  /**
   * @param capacity - Maximum number of pending jobs.
   */
  public constructor(capacity = DEFAULT_MAX_PENDING_JOBS) {
    this.capacity = capacity;
  }

  /**
   * Appends a job.
   *
   * @throws {@link JobQueueFullError} when the queue is at capacity.
   * @throws When the value is not a well-formed job.
   */
  public enqueue(job: DocwatchJob): void {
    if (!isDocwatchJob(job)) {
      throw new Error("Refusing to enqueue malformed job");
    }

    if (this.pending.length >= this.capacity) {
      throw new JobQueueFullError(this.capacity);
    }

    this.pending.push(job);
  }

  /**
   * Removes and returns every pending job in arrival order.
   */
  public drain(): DocwatchJob[] {
    return this.pending.splice(0, this.pending.length);
  }

  public get size(): number {
    return this.pending.length;
  }
}
