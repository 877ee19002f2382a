import { logErrorEvent } from "@/monitoring/errorLogService";
import { recordJobRun } from "@/monitoring/prometheus";
import type { DataSourceFetcher } from "@/services/fetcher/dataSourceFetcher";
import { formatResult } from "@/services/formatter/resultFormatter";
import type { Notifier } from "@/services/notification/notificationService";
import type { JobRegistry } from "@/services/registry/jobRegistry";
import type { TransformRunner } from "@/services/transform/transformRunner";
import type { Dataset } from "@/types/dataset";
import type { JobDefinition } from "@/types/job";
import { AppError, describeError } from "@/utils/errors";
import { logger } from "@/utils/logger";

export type RunStage = "Fetch" | "Transform" | "Format" | "Delivery";

export type RunOutcome =
  | { status: "success"; dataset: Dataset; content: string }
  | { status: "failure"; stage: RunStage; message: string; error: unknown };

export type RunFailure = Extract<RunOutcome, { status: "failure" }>;

export interface JobRunnerDependencies {
  fetcher: Pick<DataSourceFetcher, "fetch">;
  transformer: Pick<TransformRunner, "run">;
  notifier: Pick<Notifier, "deliverSuccess" | "deliverFailure">;
  registry: Pick<JobRegistry, "recordLastRun">;
  now?: () => Date;
}

/**
 * Runs the fetch, transform, format and deliver pipeline for one job.
 * `run` never rejects: every failure ends in a failure notice or a log line.
 */
export class JobRunner {
  private readonly deps: JobRunnerDependencies;
  private readonly now: () => Date;

  constructor(deps: JobRunnerDependencies) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  async run(job: JobDefinition): Promise<void> {
    const startedAt = process.hrtime.bigint();
    logger.info("Job run started", { jobName: job.name, sourceType: job.source.type });

    try {
      let outcome = await this.execute(job);

      if (outcome.status === "success") {
        try {
          await this.deps.notifier.deliverSuccess(job.name, job.recipients, outcome.content);
        } catch (error) {
          outcome = this.failure(job, "Delivery", error);
        }
      }

      const durationSeconds = Number(process.hrtime.bigint() - startedAt) / 1_000_000_000;
      recordJobRun(job.name, outcome.status, durationSeconds);

      if (outcome.status === "success") {
        await this.persistLastRun(job);
        logger.info("Job run completed", { jobName: job.name, rows: outcome.dataset.rows.length, durationSeconds });
        return;
      }

      await this.notifyFailure(job, outcome);
    } catch (error) {
      logErrorEvent(error, { message: "Unexpected error during job run", jobName: job.name, service: "job-runner" });
    }
  }

  /** Fetch, transform and format without delivering anything. */
  async execute(job: JobDefinition): Promise<RunOutcome> {
    let input: Dataset;
    try {
      input = await this.deps.fetcher.fetch(job.source);
    } catch (error) {
      return this.failure(job, "Fetch", error);
    }

    let output: Dataset;
    try {
      output = await this.deps.transformer.run(job.transform, input, { jobName: job.name });
    } catch (error) {
      return this.failure(job, "Transform", error);
    }

    try {
      return { status: "success", dataset: output, content: formatResult(output) };
    } catch (error) {
      return this.failure(job, "Format", error);
    }
  }

  private failure(job: JobDefinition, stage: RunStage, error: unknown): RunFailure {
    const message = `${stage} failed: ${describeError(error)}`;
    logErrorEvent(error, {
      message: "Job run stage failed",
      jobName: job.name,
      service: "job-runner",
      errorCode: error instanceof AppError ? error.code : undefined,
      context: { stage, reason: message },
      severity: stage === "Transform" || stage === "Fetch" ? "warn" : "error",
    });
    return { status: "failure", stage, message, error };
  }

  private async notifyFailure(job: JobDefinition, failure: RunFailure): Promise<void> {
    try {
      await this.deps.notifier.deliverFailure(job.name, job.recipients, failure.message);
      logger.info("Failure notification sent", { jobName: job.name, stage: failure.stage });
    } catch (error) {
      logErrorEvent(error, {
        message: "Failed to send failure notification",
        jobName: job.name,
        service: "job-runner",
        context: { stage: failure.stage },
      });
    }
  }

  private async persistLastRun(job: JobDefinition): Promise<void> {
    const at = this.now();

    try {
      const recorded = await this.deps.registry.recordLastRun(job.name, at);
      if (recorded) {
        logger.info("Last run recorded", { jobName: job.name, lastRun: at.toISOString() });
      } else {
        logger.warn("Job no longer stored, last run not recorded", { jobName: job.name });
      }
    } catch (error) {
      logErrorEvent(error, { message: "Failed to record last run", jobName: job.name, service: "job-runner" });
    }
  }
}
