import { promises as fs } from "node:fs";
import path from "node:path";

import { fromJobRecord, jobRecordSchema, toJobRecord } from "@/jobs/jobDefinition";
import type { JobDefinition } from "@/types/job";
import { ConflictError, RegistryError, describeError } from "@/utils/errors";
import { logger } from "@/utils/logger";
import { Mutex } from "@/utils/mutex";

export interface JobRegistry {
  list(): Promise<JobDefinition[]>;
  get(name: string): Promise<JobDefinition | null>;
  /** Adds a new job; throws ConflictError when the name is taken. */
  insert(job: JobDefinition): Promise<void>;
  /** Adds or replaces the job with the same name. */
  save(job: JobDefinition): Promise<void>;
  delete(name: string): Promise<boolean>;
  /** Returns false when the job no longer exists. */
  recordLastRun(name: string, at: Date): Promise<boolean>;
}

/**
 * Keeps every job in one JSON array on disk. Each operation reads, modifies and
 * rewrites the whole file while holding the registry lock.
 */
export class FileJobRegistry implements JobRegistry {
  private readonly mutex = new Mutex();

  constructor(private readonly filePath: string) {}

  list(): Promise<JobDefinition[]> {
    return this.mutex.runExclusive(() => this.readAll());
  }

  get(name: string): Promise<JobDefinition | null> {
    return this.mutex.runExclusive(async () => {
      const jobs = await this.readAll();
      return jobs.find((job) => job.name === name) ?? null;
    });
  }

  insert(job: JobDefinition): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const jobs = await this.readAll();
      if (jobs.some((existing) => existing.name === job.name)) {
        throw new ConflictError(`Job with name '${job.name}' already exists`);
      }

      await this.writeAll([...jobs, job]);
      logger.info("Added job to storage", { jobName: job.name });
    });
  }

  save(job: JobDefinition): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const jobs = await this.readAll();
      const index = jobs.findIndex((existing) => existing.name === job.name);

      if (index === -1) {
        jobs.push(job);
      } else {
        jobs[index] = job;
      }

      await this.writeAll(jobs);
      logger.info(index === -1 ? "Added job to storage" : "Updated job in storage", { jobName: job.name });
    });
  }

  delete(name: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const jobs = await this.readAll();
      const remaining = jobs.filter((job) => job.name !== name);

      if (remaining.length === jobs.length) {
        logger.warn("Job not found in storage for deletion", { jobName: name });
        return false;
      }

      await this.writeAll(remaining);
      logger.info("Deleted job from storage", { jobName: name });
      return true;
    });
  }

  recordLastRun(name: string, at: Date): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const jobs = await this.readAll();
      const job = jobs.find((existing) => existing.name === name);
      if (!job) {
        return false;
      }

      job.lastRun = at;
      await this.writeAll(jobs);
      return true;
    });
  }

  private async readAll(): Promise<JobDefinition[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        await this.writeAll([]);
        logger.info("Created job storage file", { path: this.filePath });
        return [];
      }
      throw new RegistryError(`Failed to read job storage ${this.filePath}: ${describeError(error)}`, { cause: error });
    }

    if (content.trim().length === 0) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logger.error("Job storage is not valid JSON, treating as empty", { path: this.filePath, error: describeError(error) });
      return [];
    }

    if (!Array.isArray(parsed)) {
      logger.error("Job storage does not hold a list, treating as empty", { path: this.filePath });
      return [];
    }

    const jobs: JobDefinition[] = [];
    parsed.forEach((entry: unknown, index) => {
      const record = jobRecordSchema.safeParse(entry);
      if (record.success) {
        jobs.push(fromJobRecord(record.data));
      } else {
        logger.warn("Skipping invalid job record", { path: this.filePath, index, error: record.error.issues[0]?.message });
      }
    });

    return jobs;
  }

  private async writeAll(jobs: JobDefinition[]): Promise<void> {
    const temporaryPath = `${this.filePath}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(temporaryPath, `${JSON.stringify(jobs.map(toJobRecord), null, 2)}\n`, "utf8");
      await fs.rename(temporaryPath, this.filePath);
    } catch (error) {
      throw new RegistryError(`Failed to write job storage ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
  }
}
