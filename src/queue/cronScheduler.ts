import type { Cron } from "croner";

import { parseCronExpression } from "@/jobs/cron/cronExpression";
import { recordFireEvent, scheduledJobsGauge } from "@/monitoring/prometheus";
import type { JobDefinition } from "@/types/job";
import { describeError } from "@/utils/errors";
import { logger } from "@/utils/logger";

export type JobHandler = (job: JobDefinition) => Promise<void>;

export type TriggerState = "idle" | "running";

export interface TriggerInfo {
  name: string;
  schedule: string;
  nextFireAt: Date | null;
  state: TriggerState;
}

export interface CronSchedulerOptions {
  handler: JobHandler;
  timezone: string;
  pollIntervalMs: number;
  misfireGraceMs: number;
  now?: () => Date;
}

interface Trigger {
  job: JobDefinition;
  cron: Cron;
  nextFireAt: Date | null;
}

/**
 * In-process cron scheduler with one trigger per job name.
 *
 * A fire that arrives while the previous run of the same job is still going is
 * dropped. A fire evaluated later than the misfire grace window is dropped
 * too, and the next fire time is always computed from the evaluation time so
 * missed occurrences never pile up.
 */
export class CronScheduler {
  private readonly handler: JobHandler;
  private readonly timezone: string;
  private readonly pollIntervalMs: number;
  private readonly misfireGraceMs: number;
  private readonly now: () => Date;
  private readonly triggers = new Map<string, Trigger>();
  private readonly running = new Map<string, Promise<void>>();
  private timer: NodeJS.Timeout | null = null;

  constructor(options: CronSchedulerOptions) {
    this.handler = options.handler;
    this.timezone = options.timezone;
    this.pollIntervalMs = options.pollIntervalMs;
    this.misfireGraceMs = options.misfireGraceMs;
    this.now = options.now ?? (() => new Date());
  }

  get isStarted(): boolean {
    return this.timer !== null;
  }

  schedule(job: JobDefinition): void {
    const cron = parseCronExpression(job.schedule, this.timezone);
    const replaced = this.triggers.has(job.name);
    const nextFireAt = cron.nextRun(this.now());

    this.triggers.set(job.name, { job, cron, nextFireAt });
    scheduledJobsGauge.set(this.triggers.size);

    logger.info(replaced ? "Job rescheduled" : "Job scheduled", {
      jobName: job.name,
      schedule: job.schedule,
      timezone: this.timezone,
      nextFireAt: nextFireAt?.toISOString() ?? null,
    });
  }

  unschedule(name: string): boolean {
    const trigger = this.triggers.get(name);
    if (!trigger) {
      logger.warn("Job not found in scheduler", { jobName: name });
      return false;
    }

    trigger.cron.stop();
    this.triggers.delete(name);
    scheduledJobsGauge.set(this.triggers.size);
    logger.info("Job unscheduled", { jobName: name });
    return true;
  }

  has(name: string): boolean {
    return this.triggers.has(name);
  }

  isRunning(name: string): boolean {
    return this.running.has(name);
  }

  getTriggers(): TriggerInfo[] {
    return [...this.triggers.values()].map((trigger) => ({
      name: trigger.job.name,
      schedule: trigger.job.schedule,
      nextFireAt: trigger.nextFireAt,
      state: this.running.has(trigger.job.name) ? "running" : "idle",
    }));
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => this.tick(this.now()), this.pollIntervalMs);
    logger.info("Scheduler started", { triggers: this.triggers.size, pollIntervalMs: this.pollIntervalMs });
  }

  /** Stops the timer loop; with `wait` it also resolves only after in-flight runs finish. */
  async stop(wait = true): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (wait) {
      logger.info("Scheduler stopping, waiting for running jobs", { running: this.running.size });
      await this.waitForIdle();
    } else if (this.running.size > 0) {
      logger.warn("Scheduler stopped without waiting for running jobs", { running: [...this.running.keys()] });
    }

    logger.info("Scheduler stopped");
  }

  async waitForIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()]);
    }
  }

  /** Evaluates every trigger against `now` once. */
  tick(now: Date): void {
    for (const trigger of this.triggers.values()) {
      const dueAt = trigger.nextFireAt;
      if (!dueAt || dueAt.getTime() > now.getTime()) {
        continue;
      }

      trigger.nextFireAt = trigger.cron.nextRun(now);
      const latenessMs = now.getTime() - dueAt.getTime();

      if (latenessMs > this.misfireGraceMs) {
        recordFireEvent(trigger.job.name, "misfired");
        logger.warn("Run time missed beyond grace window, skipping", {
          jobName: trigger.job.name,
          scheduledFor: dueAt.toISOString(),
          latenessMs,
          misfireGraceMs: this.misfireGraceMs,
        });
        continue;
      }

      this.fire(trigger.job, dueAt);
    }
  }

  private fire(job: JobDefinition, scheduledFor: Date): void {
    if (this.running.has(job.name)) {
      recordFireEvent(job.name, "coalesced");
      logger.warn("Previous run still in progress, skipping fire", {
        jobName: job.name,
        scheduledFor: scheduledFor.toISOString(),
      });
      return;
    }

    recordFireEvent(job.name, "started");
    logger.info("Firing scheduled job", { jobName: job.name, scheduledFor: scheduledFor.toISOString() });

    const run: Promise<void> = this.runJob(job).then(() => {
      if (this.running.get(job.name) === run) {
        this.running.delete(job.name);
      }
    });
    this.running.set(job.name, run);
  }

  private async runJob(job: JobDefinition): Promise<void> {
    try {
      await this.handler(job);
    } catch (error) {
      logger.error("Scheduled job handler failed", { jobName: job.name, error: describeError(error) });
    }
  }
}
