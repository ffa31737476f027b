import type {
  IngestionJob,
  IngestionPhase,
  IngestionProgressUpdate,
  IProgressObserver,
  JobOutcome,
} from "@kindex/types";
import { errorMessage, isCancellation } from "@kindex/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@kindex/logger";
import type { IngestionQueue } from "./ingestion-queue.js";

export interface JobContext {
  /** Aborted when the job is cancelled or the pool shuts down. */
  signal: AbortSignal;
  reportProgress(phase: IngestionPhase, percentComplete: number): void;
  logger: Logger;
}

export type JobProcessor = (job: IngestionJob, context: JobContext) => Promise<JobOutcome>;

export interface WorkerPoolOptions {
  queue: IngestionQueue;
  concurrency: number;
  processor: JobProcessor;
  observer?: IProgressObserver;
  /** Re-publish the running job's status on this interval; 0 disables it. */
  progressIntervalMs?: number;
  logger?: Logger;
}

const SHUTDOWN_MESSAGE = "Cancelled by shutdown";

export class WorkerPool {
  private readonly queue: IngestionQueue;
  private readonly concurrency: number;
  private readonly processor: JobProcessor;
  private readonly observer?: IProgressObserver;
  private readonly progressIntervalMs: number;
  private readonly logger: Logger;
  private shutdown = new AbortController();
  private workers: Promise<void>[] = [];

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${String(options.concurrency)}`);
    }
    this.queue = options.queue;
    this.concurrency = options.concurrency;
    this.processor = options.processor;
    this.observer = options.observer;
    this.progressIntervalMs = options.progressIntervalMs ?? 0;
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), {
      component: "worker-pool",
    });
  }

  get isRunning(): boolean {
    return this.workers.length > 0;
  }

  start(): void {
    if (this.isRunning) return;
    this.shutdown = new AbortController();
    for (let i = 0; i < this.concurrency; i++) {
      this.workers.push(this.runWorker(i));
    }
    this.logger.info({ concurrency: this.concurrency }, "Worker pool started");
  }

  /** Aborts running jobs and waits for every worker loop to exit. */
  async stop(): Promise<void> {
    if (!this.isRunning) return;
    this.shutdown.abort(SHUTDOWN_MESSAGE);
    await Promise.all(this.workers);
    this.workers = [];
    this.logger.info("Worker pool stopped");
  }

  whenIdle(): Promise<void> {
    return this.queue.whenIdle();
  }

  private async runWorker(workerId: number): Promise<void> {
    const signal = this.shutdown.signal;
    while (!signal.aborted) {
      const job = await this.queue.dequeue(signal);
      if (!job) break;
      await this.runJob(job, workerId, signal);
    }
  }

  private async runJob(job: IngestionJob, workerId: number, shutdownSignal: AbortSignal): Promise<void> {
    const log = createChildLogger(this.logger, {
      workerId,
      jobId: job.jobId,
      documentId: job.documentId,
    });
    if (this.queue.isFinished(job.jobId)) {
      log.info({ state: this.queue.getStatus(job.jobId)?.state }, "Job ended before it started");
      this.publish(job.jobId, log);
      this.queue.releaseRunning(job);
      return;
    }

    const controller = new AbortController();
    const onShutdown = (): void => controller.abort(shutdownSignal.reason);
    shutdownSignal.addEventListener("abort", onShutdown, { once: true });
    if (shutdownSignal.aborted) onShutdown();

    this.queue.registerRunning(job, controller);
    this.queue.updateStatus(job.jobId, {
      state: "processing",
      phase: null,
      percentComplete: 0,
      startedAt: new Date(),
    });
    this.publish(job.jobId, log);

    const timer =
      this.progressIntervalMs > 0
        ? setInterval(() => this.publish(job.jobId, log), this.progressIntervalMs)
        : undefined;

    const context: JobContext = {
      signal: controller.signal,
      logger: log,
      reportProgress: (phase, percentComplete) => {
        this.queue.updateStatus(job.jobId, { phase, percentComplete });
      },
    };

    try {
      const outcome = await this.processor(job, context);
      this.queue.updateStatus(job.jobId, {
        state: outcome.state,
        errorMessage: outcome.errorMessage ?? null,
        ...(outcome.state === "completed" ? { phase: "complete", percentComplete: 100 } : {}),
        completedAt: new Date(),
      });
      log.info({ state: outcome.state }, "Job finished");
    } catch (err) {
      if (isCancellation(err)) {
        const reason = shutdownSignal.aborted ? SHUTDOWN_MESSAGE : cancelReason(controller.signal, err);
        this.queue.updateStatus(job.jobId, {
          state: "cancelled",
          errorMessage: reason,
          completedAt: new Date(),
        });
        log.info({ reason }, "Job cancelled");
      } else {
        this.queue.updateStatus(job.jobId, {
          state: "failed",
          errorMessage: errorMessage(err),
          completedAt: new Date(),
        });
        log.error({ err }, "Job failed unexpectedly");
      }
    } finally {
      if (timer) clearInterval(timer);
      shutdownSignal.removeEventListener("abort", onShutdown);
      this.publish(job.jobId, log);
      this.queue.releaseRunning(job);
    }
  }

  private publish(jobId: string, log: Logger): void {
    const observer = this.observer;
    const status = this.queue.getStatus(jobId);
    if (!observer || !status) return;

    const update: IngestionProgressUpdate = {
      jobId: status.jobId,
      documentId: status.documentId,
      state: status.state,
      phase: status.phase,
      percentComplete: status.percentComplete,
      errorMessage: status.errorMessage,
      startedAt: status.startedAt,
      completedAt: status.completedAt,
    };
    void Promise.resolve()
      .then(() => observer.publish(update))
      .catch((err: unknown) => {
        log.warn({ err }, "Progress observer failed");
      });
  }
}

function cancelReason(signal: AbortSignal, err: unknown): string {
  const reason: unknown = signal.reason;
  if (typeof reason === "string") return reason;
  return errorMessage(err);
}
