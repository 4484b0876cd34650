import { Inject, Injectable } from "@nestjs/common";
import { logger, sleep } from "@pkg/shared";
import type { AppConfig } from "@pkg/shared";
import type { BrokerChannel } from "@pkg/jobs";
import { JobExecutor } from "./executor/job-executor";
import { Failpoint } from "./dev/failpoint.dev";
import { FailpointError } from "./errors";
import { APP_CONFIG, BROKER_CHANNEL } from "./tokens";

/**
 * Single-job-at-a-time consumer. Run several worker processes to get
 * parallelism; the broker keeps them from taking the same job.
 */
@Injectable()
export class WorkerService {
  private isRunning = false;
  private isIdle = false;
  private isErrorIdle = false;
  private loop: Promise<void> | null = null;
  private readonly pollIntervalMs: number;

  constructor(
    @Inject(BROKER_CHANNEL) private readonly broker: BrokerChannel,
    private readonly executor: JobExecutor,
    private readonly failpoint: Failpoint,
    @Inject(APP_CONFIG) config: AppConfig,
  ) {
    this.pollIntervalMs = config.worker.pollIntervalMs;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    this.isRunning = true;
    logger.info(
      { service: "worker", failpoint: this.failpoint.isEnabled() },
      "worker started",
    );
    this.loop = this.poll();
  }

  /**
   * Takes at most one job from the broker and runs it to settlement.
   * Resolves false when the queue was empty.
   */
  runOnce(): Promise<boolean> {
    return this.broker.consume(async (job) => {
      if (this.failpoint.shouldFailNow()) {
        logger.warn(
          { service: "worker", job_id: job.jobId },
          "failpoint triggered",
        );
        throw new FailpointError();
      }
      await this.executor.execute(job);
    });
  }

  private async poll() {
    while (this.isRunning) {
      try {
        const handled = await this.runOnce();
        if (handled) {
          this.isIdle = false;
          this.isErrorIdle = false;
        } else {
          if (!this.isIdle) {
            logger.info({ service: "worker" }, "no jobs available");
            this.isIdle = true;
          }
          this.isErrorIdle = false;
          await sleep(this.pollIntervalMs);
        }
      } catch (error) {
        if (!this.isErrorIdle) {
          logger.error({ service: "worker", error }, "error in poll loop");
          this.isErrorIdle = true;
        }
        this.isIdle = false;
        await sleep(this.pollIntervalMs);
      }
    }
  }

  /** Lets the in-flight job finish, then resolves. */
  async stop() {
    this.isRunning = false;
    this.isErrorIdle = false;
    this.isIdle = false;
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
  }
}
