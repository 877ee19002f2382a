import {
  applyJobUpdate,
  createJobDefinition,
  type JobCreateInput,
  type JobUpdateInput,
} from "@/jobs/jobDefinition";
import type { CronScheduler } from "@/queue/cronScheduler";
import type { JobRegistry } from "@/services/registry/jobRegistry";
import type { JobDefinition } from "@/types/job";
import { NotFoundError, describeError } from "@/utils/errors";
import { logger } from "@/utils/logger";

import type { JobRunner, RunOutcome } from "./jobRunner";

export interface JobServiceDependencies {
  registry: JobRegistry;
  scheduler: Pick<CronScheduler, "schedule" | "unschedule">;
  runner: Pick<JobRunner, "execute">;
  now?: () => Date;
}

export class JobService {
  private readonly registry: JobRegistry;
  private readonly scheduler: JobServiceDependencies["scheduler"];
  private readonly runner: JobServiceDependencies["runner"];
  private readonly now: () => Date;

  constructor(deps: JobServiceDependencies) {
    this.registry = deps.registry;
    this.scheduler = deps.scheduler;
    this.runner = deps.runner;
    this.now = deps.now ?? (() => new Date());
  }

  async createJob(input: JobCreateInput): Promise<JobDefinition> {
    const job = createJobDefinition(input, this.now());
    await this.registry.insert(job);

    try {
      this.scheduler.schedule(job);
    } catch (error) {
      await this.registry.delete(job.name);
      throw error;
    }

    logger.info("Job created", { jobName: job.name, schedule: job.schedule });
    return job;
  }

  listJobs(): Promise<JobDefinition[]> {
    return this.registry.list();
  }

  async getJob(name: string): Promise<JobDefinition> {
    const job = await this.registry.get(name);
    if (!job) {
      throw new NotFoundError(`Job '${name}' not found`);
    }
    return job;
  }

  async updateJob(name: string, input: JobUpdateInput): Promise<JobDefinition> {
    const existing = await this.getJob(name);
    const updated = applyJobUpdate(existing, input);

    this.scheduler.schedule(updated);
    try {
      await this.registry.save(updated);
    } catch (error) {
      logger.error("Failed to store updated job, restoring previous schedule", {
        jobName: name,
        error: describeError(error),
      });
      this.scheduler.schedule(existing);
      throw error;
    }

    logger.info("Job updated", { jobName: name, schedule: updated.schedule });
    return updated;
  }

  async deleteJob(name: string): Promise<void> {
    await this.getJob(name);
    this.scheduler.unschedule(name);

    const deleted = await this.registry.delete(name);
    if (!deleted) {
      throw new NotFoundError(`Job '${name}' not found`);
    }

    logger.info("Job deleted", { jobName: name });
  }

  async testJob(name: string): Promise<RunOutcome> {
    const job = await this.getJob(name);
    logger.info("Test run requested", { jobName: name });
    return this.runner.execute(job);
  }

  /** Schedules every stored job; definitions the scheduler rejects are skipped. */
  async scheduleStoredJobs(): Promise<number> {
    const jobs = await this.registry.list();
    let scheduled = 0;

    for (const job of jobs) {
      try {
        this.scheduler.schedule(job);
        scheduled += 1;
      } catch (error) {
        logger.error("Failed to schedule stored job", { jobName: job.name, error: describeError(error) });
      }
    }

    logger.info("Stored jobs scheduled", { total: jobs.length, scheduled });
    return scheduled;
  }
}
