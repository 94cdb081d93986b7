import { Inject, Injectable, OnModuleDestroy } from "@nestjs/common";
import { JOB_STORE } from "@mailq/queue";
import type { Job, JobStore } from "@mailq/queue";
import { CLOCK, DeliveryError, errorMessage, logger, sleep } from "@mailq/shared";
import type { Clock } from "@mailq/shared";
import { AsyncSemaphore } from "./concurrency/async-semaphore";
import { classifyFailure } from "./retry/failure-classifier";
import { decideRetry } from "./retry/retry.policy";
import { TEMPLATE_RENDERER } from "./templates/template.renderer";
import type { TemplateRenderer } from "./templates/template.renderer";
import {
  contentOf,
  recipientsOf,
  TRANSPORT,
} from "./transport/transport.types";
import type {
  MessageContent,
  SendResult,
  Transport,
} from "./transport/transport.types";
import { WORKER_OPTIONS } from "./worker.options";
import type { WorkerOptions } from "./worker.options";
import { emptyOutcome } from "./worker.types";
import type {
  BatchOutcome,
  DeliveryOutcome,
  DispatcherStats,
} from "./worker.types";

export const MAX_ERROR_LENGTH = 500;

type SendAttempt =
  | { ok: true; result: SendResult }
  | { ok: false; error: unknown };

@Injectable()
export class WorkerService implements OnModuleDestroy {
  private readonly semaphore: AsyncSemaphore;
  private readonly abort = new AbortController();
  private readonly batches = new Set<Promise<BatchOutcome>>();
  private readonly stats: DispatcherStats = {
    attempted: 0,
    sent: 0,
    retryScheduled: 0,
    permanentlyFailed: 0,
  };
  private loop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private isIdle = false;
  private isErrorIdle = false;
  // Set once the transport and store are closed; queued deliveries must not start.
  private released = false;

  constructor(
    @Inject(JOB_STORE) private readonly store: JobStore,
    @Inject(TRANSPORT) private readonly transport: Transport,
    @Inject(TEMPLATE_RENDERER) private readonly renderer: TemplateRenderer,
    @Inject(WORKER_OPTIONS) private readonly options: WorkerOptions,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.semaphore = new AsyncSemaphore(options.concurrency);
  }

  get isRunning(): boolean {
    return this.loop !== null && !this.abort.signal.aborted;
  }

  getStats(): DispatcherStats {
    return { ...this.stats };
  }

  start(): void {
    if (this.loop || this.abort.signal.aborted) {
      return;
    }
    logger.info(
      {
        service: "worker",
        concurrency: this.options.concurrency,
        batch_size: this.options.batchSize,
        poll_interval_ms: this.options.pollIntervalMs,
      },
      "worker started"
    );
    this.loop = this.poll().catch((error: unknown) => {
      logger.fatal(
        { service: "worker", error: errorMessage(error) },
        "poll loop crashed"
      );
    });
  }

  /**
   * Claims one batch and delivers it, at most `concurrency` jobs at a time.
   * Resolves once every claimed job has reached its next state.
   * A failed claim rejects with the store's error.
   */
  async runOnce(): Promise<BatchOutcome> {
    if (this.abort.signal.aborted) {
      return emptyOutcome();
    }
    const batch = this.claimAndDeliver();
    this.batches.add(batch);
    try {
      return await batch;
    } finally {
      this.batches.delete(batch);
    }
  }

  /**
   * Stops claiming, waits up to the grace period for in-flight deliveries,
   * then releases the transport and the store. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  async onModuleDestroy() {
    await this.stop();
  }

  private async poll() {
    const { signal } = this.abort;
    while (!signal.aborted) {
      try {
        const outcome = await this.runOnce();
        if (outcome.claimed > 0) {
          this.isIdle = false;
          this.isErrorIdle = false;
          continue;
        }
        if (!this.isIdle) {
          logger.info({ service: "worker" }, "no jobs available");
          this.isIdle = true;
        }
        this.isErrorIdle = false;
      } catch (error) {
        if (!this.isErrorIdle) {
          logger.error(
            { service: "worker", error: errorMessage(error) },
            "error in poll loop"
          );
          this.isErrorIdle = true;
        }
        this.isIdle = false;
      }
      await sleep(this.options.pollIntervalMs, signal);
    }
  }

  private async claimAndDeliver(): Promise<BatchOutcome> {
    const jobs = await this.store.claimBatch(this.options.batchSize);
    const outcome = emptyOutcome(jobs.length);
    if (jobs.length === 0) {
      return outcome;
    }

    const results = await Promise.allSettled(
      jobs.map((job) => this.semaphore.run(() => this.deliver(job)))
    );
    for (const result of results) {
      // deliver() resolves on every path; a rejection here is a bug worth counting.
      const delivered = result.status === "fulfilled" ? result.value : "store_error";
      switch (delivered) {
        case "sent":
          outcome.sent += 1;
          break;
        case "scheduled":
          outcome.retryScheduled += 1;
          break;
        case "failed":
          outcome.permanentlyFailed += 1;
          break;
        case "store_error":
          outcome.storeErrors += 1;
          break;
        case "skipped":
          outcome.skipped += 1;
          break;
      }
    }
    return outcome;
  }

  private async deliver(job: Job): Promise<DeliveryOutcome> {
    if (this.released) {
      logger.warn(
        { service: "worker", job_id: job.id },
        "worker released, delivery not started; job left in processing"
      );
      return "skipped";
    }
    this.stats.attempted += 1;
    const startedAt = Date.now();
    const attempt: SendAttempt = await this.attemptSend(job).then(
      (result) => ({ ok: true as const, result }),
      (error: unknown) => ({ ok: false as const, error })
    );

    try {
      if (attempt.ok) {
        await this.store.markSent(job.id, this.clock());
        this.stats.sent += 1;
        logger.info(
          {
            service: "worker",
            job_id: job.id,
            message_id: attempt.result.messageId,
            retry_count: job.retry_count,
            duration_ms: Date.now() - startedAt,
          },
          "email sent"
        );
        return "sent";
      }
      return await this.recordFailure(job, attempt.error);
    } catch (error) {
      logger.error(
        { service: "worker", job_id: job.id, error: errorMessage(error) },
        "failed to record delivery outcome"
      );
      return "store_error";
    }
  }

  private async attemptSend(job: Job): Promise<SendResult> {
    const timeoutMs = this.options.deliveryTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new DeliveryError(
              `delivery timed out after ${timeoutMs}ms`,
              true,
              "ETIMEOUT"
            )
          ),
        timeoutMs
      );
    });
    try {
      return await Promise.race([this.renderAndSend(job), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async renderAndSend(job: Job): Promise<SendResult> {
    const content = await this.prepareContent(job);
    return this.transport.send(recipientsOf(job), content);
  }

  /** Renders the stored template when the job carries no inline body. */
  private async prepareContent(job: Job): Promise<MessageContent> {
    const content = contentOf(job);
    if (content.html || content.text || !content.templateId) {
      return content;
    }
    try {
      const rendered = await this.renderer.render(
        content.templateId,
        content.templateVars ?? {}
      );
      return { ...content, html: rendered.html, text: rendered.text };
    } catch (error) {
      if (error instanceof DeliveryError) {
        throw error;
      }
      throw new DeliveryError(
        `template ${content.templateId} failed to render: ${errorMessage(error)}`,
        false,
        "ETEMPLATE",
        { cause: error }
      );
    }
  }

  private async recordFailure(
    job: Job,
    error: unknown
  ): Promise<DeliveryOutcome> {
    const failureType = classifyFailure(error);
    const lastError = truncate(errorMessage(error), MAX_ERROR_LENGTH);

    const decision = decideRetry({
      failureType,
      retryCount: job.retry_count,
      maxRetries: job.max_retries,
      baseBackoffSeconds: this.options.baseBackoffSeconds,
      now: this.clock(),
    });

    if (decision.kind === "retry") {
      await this.store.markScheduled(
        job.id,
        lastError,
        decision.nextRetryAt,
        decision.retryCount
      );
      this.stats.retryScheduled += 1;
      logger.warn(
        {
          service: "worker",
          job_id: job.id,
          retry_count: decision.retryCount,
          max_retries: job.max_retries,
          next_retry_at: decision.nextRetryAt.toISOString(),
          error: lastError,
        },
        "delivery failed, retry scheduled"
      );
      return "scheduled";
    }

    await this.store.markFailed(job.id, lastError);
    this.stats.permanentlyFailed += 1;
    logger.error(
      {
        service: "worker",
        job_id: job.id,
        failure_type: failureType,
        retry_count: job.retry_count,
        error: lastError,
      },
      failureType === "permanent"
        ? "delivery failed permanently"
        : "retries exhausted, job failed"
    );
    return "failed";
  }

  private async shutdown() {
    logger.info({ service: "worker" }, "worker stopping");
    this.abort.abort();
    this.isIdle = false;
    this.isErrorIdle = false;

    const drained = await this.drain();
    if (!drained) {
      logger.warn(
        {
          service: "worker",
          in_flight: this.semaphore.inFlight,
          waiting: this.semaphore.waiting,
          grace_period_ms: this.options.gracePeriodMs,
        },
        "grace period elapsed with deliveries in flight"
      );
    }

    this.released = true;
    await this.release("transport", () => this.transport.close());
    await this.release("store", () => this.store.close());

    const { attempted, sent } = this.stats;
    logger.info(
      {
        service: "worker",
        ...this.stats,
        success_rate:
          attempted > 0 ? Number(((sent / attempted) * 100).toFixed(1)) : 0,
      },
      "worker stopped"
    );
  }

  /** true when the current work finished inside the grace period. */
  private async drain(): Promise<boolean> {
    const work: Promise<unknown>[] = [...this.batches];
    if (this.loop) {
      work.push(this.loop);
    }
    if (work.length === 0) {
      return true;
    }

    const grace = new AbortController();
    try {
      return await Promise.race([
        Promise.allSettled(work).then(() => true),
        sleep(this.options.gracePeriodMs, grace.signal).then(() => false),
      ]);
    } finally {
      grace.abort();
    }
  }

  private async release(name: string, close: () => Promise<void>) {
    try {
      await close();
    } catch (error) {
      logger.error(
        { service: "worker", resource: name, error: errorMessage(error) },
        "failed to release resource"
      );
    }
  }
}

function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max) : value;
}
