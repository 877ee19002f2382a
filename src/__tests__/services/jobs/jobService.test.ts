import { describe, expect, it, vi } from "vitest";

import { InMemoryJobRegistry, buildJob } from "@/__tests__/helpers/fakes";
import { jobCreateSchema, jobUpdateSchema } from "@/jobs/jobDefinition";
import { CronScheduler } from "@/queue/cronScheduler";
import { JobService } from "@/services/jobs/jobService";
import { ConflictError, NotFoundError } from "@/utils/errors";

const CREATED_AT = new Date("2024-03-01T12:00:00.000Z");

const createInput = jobCreateSchema.parse({
  job_name: "daily-sales",
  schedule_time: "0 9 * * *",
  data_source: { source_type: "api", location: "http://data.test.local/sales" },
  processing_script: "output = input",
  consumer_emails: ["ops@example.com"],
});

function buildService() {
  const registry = new InMemoryJobRegistry();
  const scheduler = new CronScheduler({
    handler: vi.fn(),
    timezone: "UTC",
    pollIntervalMs: 1000,
    misfireGraceMs: 60_000,
    now: () => new Date("2024-03-01T12:00:00.000Z"),
  });
  const runner = {
    execute: vi.fn().mockResolvedValue({ status: "success", dataset: { columns: ["a"], rows: [[1]] }, content: "a\n1\n" }),
  };
  const service = new JobService({ registry, scheduler, runner, now: () => CREATED_AT });
  return { service, registry, scheduler, runner };
}

describe("JobService", () => {
  it("stores and schedules a new job", async () => {
    const { service, registry, scheduler } = buildService();

    const job = await service.createJob(createInput);

    expect(job.createdAt).toEqual(CREATED_AT);
    expect(registry.jobs.get("daily-sales")).toEqual(job);
    expect(scheduler.getTriggers()).toEqual([
      {
        name: "daily-sales",
        schedule: "0 9 * * *",
        nextFireAt: new Date("2024-03-02T09:00:00.000Z"),
        state: "idle",
      },
    ]);
  });

  it("rejects a duplicate name without touching the existing trigger", async () => {
    const { service, scheduler } = buildService();
    await service.createJob(createInput);

    await expect(service.createJob({ ...createInput, schedule_time: "0 10 * * *" })).rejects.toBeInstanceOf(
      ConflictError,
    );
    expect(scheduler.getTriggers()[0]?.schedule).toBe("0 9 * * *");
  });

  it("removes the stored job when scheduling fails", async () => {
    const { registry, runner } = buildService();
    const scheduler = {
      schedule: vi.fn(() => {
        throw new Error("scheduler offline");
      }),
      unschedule: vi.fn(),
    };
    const service = new JobService({ registry, scheduler, runner });

    await expect(service.createJob(createInput)).rejects.toThrow("scheduler offline");
    expect(registry.jobs.size).toBe(0);
  });

  it("replaces a job's definition and trigger", async () => {
    const { service, registry, scheduler } = buildService();
    await service.createJob(createInput);

    const updated = await service.updateJob(
      "daily-sales",
      jobUpdateSchema.parse({
        schedule_time: "30 6 * * 1",
        data_source: { source_type: "file", location: "/data/sales.json", file_type: "json" },
        processing_script: "output = input.slice(0, 1)",
        consumer_emails: ["finance@example.com"],
      }),
    );

    expect(updated).toMatchObject({
      name: "daily-sales",
      schedule: "30 6 * * 1",
      source: { type: "file", location: "/data/sales.json", fileType: "json" },
      recipients: ["finance@example.com"],
      createdAt: CREATED_AT,
    });
    expect(registry.jobs.get("daily-sales")?.schedule).toBe("30 6 * * 1");
    expect(scheduler.getTriggers()[0]?.nextFireAt).toEqual(new Date("2024-03-04T06:30:00.000Z"));
  });

  it("restores the previous trigger when the update cannot be stored", async () => {
    const { service, registry, scheduler } = buildService();
    await service.createJob(createInput);
    vi.spyOn(registry, "save").mockRejectedValueOnce(new Error("disk full"));

    await expect(
      service.updateJob("daily-sales", { ...createInput, schedule_time: "30 6 * * 1" }),
    ).rejects.toThrow("disk full");
    expect(scheduler.getTriggers()[0]?.schedule).toBe("0 9 * * *");
  });

  it("deletes a job and its trigger", async () => {
    const { service, registry, scheduler } = buildService();
    await service.createJob(createInput);

    await service.deleteJob("daily-sales");

    expect(registry.jobs.size).toBe(0);
    expect(scheduler.has("daily-sales")).toBe(false);
    await expect(service.deleteJob("daily-sales")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("reports unknown jobs as not found", async () => {
    const { service } = buildService();

    await expect(service.getJob("missing")).rejects.toThrow("Job 'missing' not found");
    await expect(service.testJob("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("runs a test execution through the runner", async () => {
    const { service, runner } = buildService();
    const job = await service.createJob(createInput);

    await expect(service.testJob("daily-sales")).resolves.toMatchObject({ status: "success", content: "a\n1\n" });
    expect(runner.execute).toHaveBeenCalledWith(job);
  });

  it("schedules stored jobs and skips invalid ones", async () => {
    const { service, registry, scheduler } = buildService();
    await registry.insert(buildJob({ name: "hourly", schedule: "0 * * * *" }));
    await registry.insert(buildJob({ name: "broken", schedule: "not a cron" }));

    await expect(service.scheduleStoredJobs()).resolves.toBe(1);
    expect(scheduler.getTriggers().map((trigger) => trigger.name)).toEqual(["hourly"]);
  });
});
