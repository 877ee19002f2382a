import { z } from "zod";

import { validateCronExpression } from "@/jobs/cron/cronExpression";
import type { DataSource, JobDefinition } from "@/types/job";

export const JOB_NAME_MAX_LENGTH = 100;

const cronSchema = z.string().superRefine((value, ctx) => {
  const problem = validateCronExpression(value);
  if (problem) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
  }
});

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

export const dataSourceSchema = z
  .object({
    source_type: z.enum(["api", "file"]),
    location: z.string().trim().min(1, "location cannot be empty"),
    file_type: z.enum(["csv", "json"]).nullish(),
  })
  .superRefine((value, ctx) => {
    if (value.source_type === "file" && !value.file_type) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "file_type is required when source_type is 'file'",
        path: ["file_type"],
      });
    }

    if (value.source_type === "api") {
      if (value.file_type) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "file_type should not be provided when source_type is 'api'",
          path: ["file_type"],
        });
      }

      if (!isHttpUrl(value.location)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "location must be an http(s) URL when source_type is 'api'",
          path: ["location"],
        });
      }
    }
  })
  .transform((value): DataSource => {
    if (value.source_type === "file") {
      return { type: "file", location: value.location, fileType: value.file_type ?? "csv" };
    }
    return { type: "api", location: value.location };
  });

const jobFieldsSchema = z.object({
  schedule_time: cronSchema,
  data_source: dataSourceSchema,
  processing_script: z.string().refine((value) => value.trim().length > 0, "processing_script cannot be empty"),
  consumer_emails: z
    .array(z.string().trim().email("Invalid email address"))
    .min(1, "At least one consumer email is required"),
});

export const jobCreateSchema = jobFieldsSchema.extend({
  job_name: z
    .string()
    .trim()
    .min(1, "job_name cannot be empty")
    .max(JOB_NAME_MAX_LENGTH, `job_name cannot exceed ${JOB_NAME_MAX_LENGTH} characters`),
});

/** Replacement body for an existing job; the name and creation time are kept. */
export const jobUpdateSchema = jobFieldsSchema;

export type JobCreateInput = z.infer<typeof jobCreateSchema>;
export type JobUpdateInput = z.infer<typeof jobUpdateSchema>;

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), "Invalid timestamp");

/** Persisted and API form of a job definition. */
export const jobRecordSchema = z.object({
  job_name: z.string().min(1),
  schedule_time: z.string().min(1),
  data_source: dataSourceSchema,
  processing_script: z.string(),
  consumer_emails: z.array(z.string()),
  created_at: isoTimestamp,
  last_run: isoTimestamp.nullish(),
});

export interface JobRecord {
  job_name: string;
  schedule_time: string;
  data_source: {
    source_type: DataSource["type"];
    location: string;
    file_type?: "csv" | "json";
  };
  processing_script: string;
  consumer_emails: string[];
  created_at: string;
  last_run: string | null;
}

export function createJobDefinition(input: JobCreateInput, createdAt: Date = new Date()): JobDefinition {
  return {
    name: input.job_name,
    schedule: input.schedule_time,
    source: input.data_source,
    transform: input.processing_script,
    recipients: input.consumer_emails,
    createdAt,
    lastRun: null,
  };
}

export function applyJobUpdate(job: JobDefinition, update: JobUpdateInput): JobDefinition {
  return {
    ...job,
    schedule: update.schedule_time,
    source: update.data_source,
    transform: update.processing_script,
    recipients: update.consumer_emails,
  };
}

export function toJobRecord(job: JobDefinition): JobRecord {
  return {
    job_name: job.name,
    schedule_time: job.schedule,
    data_source:
      job.source.type === "file"
        ? { source_type: "file", location: job.source.location, file_type: job.source.fileType }
        : { source_type: "api", location: job.source.location },
    processing_script: job.transform,
    consumer_emails: [...job.recipients],
    created_at: job.createdAt.toISOString(),
    last_run: job.lastRun ? job.lastRun.toISOString() : null,
  };
}

export function fromJobRecord(record: z.infer<typeof jobRecordSchema>): JobDefinition {
  return {
    name: record.job_name,
    schedule: record.schedule_time,
    source: record.data_source,
    transform: record.processing_script,
    recipients: record.consumer_emails,
    createdAt: new Date(record.created_at),
    lastRun: record.last_run ? new Date(record.last_run) : null,
  };
}
