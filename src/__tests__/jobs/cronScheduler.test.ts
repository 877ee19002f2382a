import { afterEach, describe, expect, it, vi } from "vitest";

import { buildJob } from "@/__tests__/helpers/fakes";
import { CronScheduler, type JobHandler } from "@/queue/cronScheduler";
import { InvalidScheduleError } from "@/utils/errors";

const at = (iso: string) => new Date(iso);

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function buildScheduler(handler: JobHandler, now: () => Date) {
  return new CronScheduler({
    handler,
    timezone: "UTC",
    pollIntervalMs: 1000,
    misfireGraceMs: 5 * 60 * 1000,
    now,
  });
}

describe("CronScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("leaves nothing behind after schedule and unschedule", () => {
    const scheduler = buildScheduler(vi.fn(), () => at("2024-01-01T08:59:30Z"));

    scheduler.schedule(buildJob());
    expect(scheduler.unschedule("daily-sales")).toBe(true);

    expect(scheduler.getTriggers()).toEqual([]);
    expect(scheduler.has("daily-sales")).toBe(false);
    expect(scheduler.unschedule("daily-sales")).toBe(false);
  });

  it("rejects expressions that are not five valid fields", () => {
    const scheduler = buildScheduler(vi.fn(), () => at("2024-01-01T08:59:30Z"));

    expect(() => scheduler.schedule(buildJob({ schedule: "* * * *" }))).toThrow(
      "Invalid cron expression: * * * *. Expected 5 fields, got 4",
    );
    expect(() => scheduler.schedule(buildJob({ schedule: "0 * * * * *" }))).toThrow(InvalidScheduleError);
    expect(() => scheduler.schedule(buildJob({ schedule: "61 * * * *" }))).toThrow(InvalidScheduleError);
    expect(scheduler.getTriggers()).toEqual([]);
  });

  it("fires a job when its time arrives and computes the next fire time", () => {
    const handler = vi.fn().mockResolvedValue(undefined);
    const scheduler = buildScheduler(handler, () => at("2024-01-01T08:59:30Z"));
    const job = buildJob();
    scheduler.schedule(job);

    expect(scheduler.getTriggers()[0]?.nextFireAt).toEqual(at("2024-01-01T09:00:00Z"));

    scheduler.tick(at("2024-01-01T08:59:59Z"));
    expect(handler).not.toHaveBeenCalled();

    scheduler.tick(at("2024-01-01T09:00:00.500Z"));
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(job);
    expect(scheduler.getTriggers()[0]?.nextFireAt).toEqual(at("2024-01-02T09:00:00Z"));
  });

  it("coalesces a fire while the previous run is still going", async () => {
    const run = deferred();
    const handler = vi.fn().mockReturnValue(run.promise);
    const scheduler = buildScheduler(handler, () => at("2024-01-01T10:00:30Z"));
    scheduler.schedule(buildJob({ schedule: "* * * * *" }));

    scheduler.tick(at("2024-01-01T10:01:00Z"));
    expect(scheduler.isRunning("daily-sales")).toBe(true);
    expect(scheduler.getTriggers()[0]?.state).toBe("running");

    scheduler.tick(at("2024-01-01T10:02:00Z"));
    expect(handler).toHaveBeenCalledTimes(1);

    run.resolve();
    await scheduler.waitForIdle();
    expect(scheduler.isRunning("daily-sales")).toBe(false);

    scheduler.tick(at("2024-01-01T10:03:00Z"));
    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("drops a fire evaluated after the grace window", () => {
    const handler = vi.fn().mockResolvedValue(undefined);
    const scheduler = buildScheduler(handler, () => at("2024-01-01T08:59:30Z"));
    scheduler.schedule(buildJob());

    scheduler.tick(at("2024-01-01T09:06:00Z"));

    expect(handler).not.toHaveBeenCalled();
    expect(scheduler.getTriggers()[0]?.nextFireAt).toEqual(at("2024-01-02T09:00:00Z"));
  });

  it("fires once for a late evaluation inside the grace window without catching up", () => {
    const handler = vi.fn().mockResolvedValue(undefined);
    const scheduler = buildScheduler(handler, () => at("2024-01-01T10:00:30Z"));
    scheduler.schedule(buildJob({ schedule: "* * * * *" }));

    scheduler.tick(at("2024-01-01T10:04:30Z"));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(scheduler.getTriggers()[0]?.nextFireAt).toEqual(at("2024-01-01T10:05:00Z"));
  });

  it("never runs a job again after it is unscheduled", () => {
    const handler = vi.fn().mockResolvedValue(undefined);
    const scheduler = buildScheduler(handler, () => at("2024-01-01T10:00:30Z"));
    scheduler.schedule(buildJob({ schedule: "* * * * *" }));

    scheduler.tick(at("2024-01-01T10:01:00Z"));
    scheduler.unschedule("daily-sales");
    scheduler.tick(at("2024-01-01T10:02:00Z"));
    scheduler.tick(at("2024-01-01T10:03:00Z"));

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("keeps running after a handler rejects", async () => {
    const handler = vi.fn().mockRejectedValueOnce(new Error("boom")).mockResolvedValue(undefined);
    const scheduler = buildScheduler(handler, () => at("2024-01-01T10:00:30Z"));
    scheduler.schedule(buildJob({ schedule: "* * * * *" }));

    scheduler.tick(at("2024-01-01T10:01:00Z"));
    await scheduler.waitForIdle();
    scheduler.tick(at("2024-01-01T10:02:00Z"));

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("waits for running jobs only when asked to", async () => {
    const run = deferred();
    const scheduler = buildScheduler(vi.fn().mockReturnValue(run.promise), () => at("2024-01-01T10:00:30Z"));
    scheduler.schedule(buildJob({ schedule: "* * * * *" }));
    scheduler.tick(at("2024-01-01T10:01:00Z"));

    await scheduler.stop(false);
    expect(scheduler.isRunning("daily-sales")).toBe(true);

    let stopped = false;
    const stopping = scheduler.stop(true).then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);

    run.resolve();
    await stopping;
    expect(stopped).toBe(true);
    expect(scheduler.isRunning("daily-sales")).toBe(false);
  });

  it("evaluates triggers from its timer loop once started", async () => {
    vi.useFakeTimers();
    let current = at("2024-01-01T10:00:30Z");
    const handler = vi.fn().mockResolvedValue(undefined);
    const scheduler = buildScheduler(handler, () => current);
    scheduler.schedule(buildJob({ schedule: "* * * * *" }));

    scheduler.start();
    expect(scheduler.isStarted).toBe(true);

    current = at("2024-01-01T10:01:00.200Z");
    vi.advanceTimersByTime(1000);
    expect(handler).toHaveBeenCalledTimes(1);

    await scheduler.stop(true);
    expect(scheduler.isStarted).toBe(false);
  });
});
