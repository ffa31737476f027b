import type {
  EnqueueResult,
  IngestionJob,
  IngestionJobStatus,
  JobState,
} from "@kindex/types";
import { TERMINAL_JOB_STATES } from "@kindex/types";

export const DEFAULT_QUEUE_CAPACITY = 1000;

export interface IngestionQueueOptions {
  capacity?: number;
  now?: () => Date;
}

export interface EnqueueWaitOptions {
  /** How long to wait for a free slot before reporting `queue_full`. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type StatusPatch = Partial<
  Pick<
    IngestionJobStatus,
    "state" | "phase" | "percentComplete" | "errorMessage" | "startedAt" | "completedAt"
  >
>;

interface RunningEntry {
  jobId: string;
  controller: AbortController;
}

function isTerminal(state: JobState): boolean {
  return TERMINAL_JOB_STATES.has(state);
}

/**
 * Bounded FIFO of ingestion jobs plus the shared job bookkeeping: status by job
 * id, the job currently running for each document, and the abort handles used
 * to cancel it.
 *
 * Everything here is mutated synchronously between awaits, so no locking is
 * needed on the single event loop.
 */
export class IngestionQueue {
  readonly capacity: number;
  private readonly now: () => Date;
  private readonly items: IngestionJob[] = [];
  private readonly statuses = new Map<string, IngestionJobStatus>();
  private readonly runningByDocument = new Map<string, RunningEntry>();
  /** Jobs taken off the queue and not yet released. */
  private readonly taken = new Set<string>();
  /** Taken jobs not yet registered as running, by document. */
  private readonly startingByDocument = new Map<string, string>();
  private takers: Array<() => void> = [];
  private spaceWaiters: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];
  private releaseWaiters = new Map<string, Array<() => void>>();
  private closed = false;

  constructor(options: IngestionQueueOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_QUEUE_CAPACITY;
    this.now = options.now ?? (() => new Date());
  }

  get depth(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isIdle(): boolean {
    return this.items.length === 0 && this.taken.size === 0;
  }

  tryEnqueue(job: IngestionJob): EnqueueResult {
    if (this.closed || this.items.length >= this.capacity) {
      return {
        accepted: false,
        reason: "queue_full",
        queueDepth: this.items.length,
        capacity: this.capacity,
      };
    }

    this.items.push(job);
    this.statuses.set(job.jobId, {
      jobId: job.jobId,
      documentId: job.documentId,
      state: "queued",
      phase: null,
      percentComplete: 0,
      errorMessage: null,
      queuedAt: this.now(),
      startedAt: null,
      completedAt: null,
    });
    this.wake("takers");

    return { accepted: true, jobId: job.jobId, queueDepth: this.items.length };
  }

  /**
   * Like {@link tryEnqueue}, but waits up to `timeoutMs` for a slot to free up.
   */
  async enqueue(job: IngestionJob, options: EnqueueWaitOptions = {}): Promise<EnqueueResult> {
    const deadline = Date.now() + (options.timeoutMs ?? 0);

    for (;;) {
      const result = this.tryEnqueue(job);
      const remaining = deadline - Date.now();
      if (result.accepted || this.closed || remaining <= 0 || options.signal?.aborted) {
        return result;
      }
      await this.waitFor("space", remaining, options.signal);
    }
  }

  /**
   * Next job in FIFO order; waits while the queue is empty. Resolves `null` once
   * the queue is closed or `signal` aborts.
   */
  async dequeue(signal?: AbortSignal): Promise<IngestionJob | null> {
    for (;;) {
      const job = this.items.shift();
      if (job) {
        this.taken.add(job.jobId);
        this.startingByDocument.set(job.documentId, job.jobId);
        this.wake("space");
        return job;
      }
      if (this.closed || signal?.aborted) return null;
      await this.waitFor("takers", undefined, signal);
    }
  }

  getStatus(jobId: string): IngestionJobStatus | undefined {
    const status = this.statuses.get(jobId);
    return status ? { ...status } : undefined;
  }

  listStatuses(): IngestionJobStatus[] {
    return [...this.statuses.values()].map((s) => ({ ...s }));
  }

  /**
   * Applies `patch` unless the job already reached a terminal state; the first
   * terminal outcome recorded for a job is final.
   */
  updateStatus(jobId: string, patch: StatusPatch): IngestionJobStatus | undefined {
    const current = this.statuses.get(jobId);
    if (!current) return undefined;
    if (isTerminal(current.state)) return { ...current };

    const next = { ...current, ...patch };
    this.statuses.set(jobId, next);
    return { ...next };
  }

  registerRunning(job: IngestionJob, controller: AbortController): void {
    this.clearStarting(job);
    this.runningByDocument.set(job.documentId, { jobId: job.jobId, controller });
  }

  /** True once the job reached a terminal state, e.g. cancelled before it started. */
  isFinished(jobId: string): boolean {
    const status = this.statuses.get(jobId);
    return status !== undefined && isTerminal(status.state);
  }

  /** Releases the job's slot; a newer job's registration for the same document is left alone. */
  releaseRunning(job: IngestionJob): void {
    const entry = this.runningByDocument.get(job.documentId);
    if (entry?.jobId === job.jobId) {
      this.runningByDocument.delete(job.documentId);
      const waiters = this.releaseWaiters.get(job.documentId) ?? [];
      this.releaseWaiters.delete(job.documentId);
      for (const resolve of waiters) resolve();
    }
    this.clearStarting(job);
    this.taken.delete(job.jobId);
    this.notifyIfIdle();
  }

  /** Resolves once no job is registered as running for the document. */
  whenDocumentReleased(documentId: string): Promise<void> {
    if (!this.runningByDocument.has(documentId)) return Promise.resolve();
    return new Promise((resolve) => {
      const waiters = this.releaseWaiters.get(documentId) ?? [];
      waiters.push(resolve);
      this.releaseWaiters.set(documentId, waiters);
    });
  }

  /**
   * Cancels the document's queued jobs, marks a job taken but not yet started as
   * cancelled, and aborts its running job if that job is not yet terminal.
   * Returns the number of jobs cancelled.
   */
  cancelForDocument(documentId: string, reason = "Superseded by a newer ingestion"): number {
    let cancelled = 0;

    for (let i = this.items.length - 1; i >= 0; i--) {
      const queued = this.items[i];
      if (queued?.documentId !== documentId) continue;
      this.items.splice(i, 1);
      this.updateStatus(queued.jobId, {
        state: "cancelled",
        errorMessage: reason,
        completedAt: this.now(),
      });
      cancelled++;
    }
    if (cancelled > 0) {
      this.wake("space");
    }

    const startingJobId = this.startingByDocument.get(documentId);
    if (startingJobId !== undefined && !this.isFinished(startingJobId)) {
      this.updateStatus(startingJobId, {
        state: "cancelled",
        errorMessage: reason,
        completedAt: this.now(),
      });
      cancelled++;
    }

    const entry = this.runningByDocument.get(documentId);
    if (entry) {
      const status = this.statuses.get(entry.jobId);
      if (status && !isTerminal(status.state) && !entry.controller.signal.aborted) {
        entry.controller.abort(reason);
        cancelled++;
      }
    }

    this.notifyIfIdle();
    return cancelled;
  }

  /** Drops terminal statuses completed more than `maxAgeMs` ago. */
  cleanupOldStatuses(maxAgeMs: number): number {
    const cutoff = this.now().getTime() - maxAgeMs;
    let removed = 0;
    for (const [jobId, status] of this.statuses) {
      if (isTerminal(status.state) && status.completedAt && status.completedAt.getTime() < cutoff) {
        this.statuses.delete(jobId);
        removed++;
      }
    }
    return removed;
  }

  /** Resolves once nothing is queued and every taken job has been released. */
  whenIdle(): Promise<void> {
    if (this.isIdle) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stops accepting jobs and releases blocked `dequeue` and `enqueue` callers. */
  close(): void {
    this.closed = true;
    this.wake("takers");
    this.wake("space");
  }

  private clearStarting(job: IngestionJob): void {
    if (this.startingByDocument.get(job.documentId) === job.jobId) {
      this.startingByDocument.delete(job.documentId);
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private wake(kind: "takers" | "space"): void {
    if (kind === "takers") {
      const waiters = this.takers;
      this.takers = [];
      for (const resolve of waiters) resolve();
    } else {
      const waiters = this.spaceWaiters;
      this.spaceWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private waitFor(kind: "takers" | "space", timeoutMs?: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const done = (): void => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", done);
        resolve();
      };

      if (kind === "takers") {
        this.takers.push(done);
      } else {
        this.spaceWaiters.push(done);
      }
      if (timeoutMs !== undefined) {
        timer = setTimeout(done, timeoutMs);
      }
      signal?.addEventListener("abort", done, { once: true });
    });
  }
}
