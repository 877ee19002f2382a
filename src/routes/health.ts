import { FastifyPluginAsync } from "fastify";

import type { CronScheduler } from "@/queue/cronScheduler";
import { ServiceUnavailableError } from "@/utils/errors";

export interface HealthRoutesOptions {
  scheduler: Pick<CronScheduler, "isStarted" | "getTriggers">;
}

const now = () => new Date().toISOString();

export const registerHealthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (app, { scheduler }) => {
  app.get("/", async () => ({
    service: "Scheduled Jobs Service",
    status: "running",
    timestamp: now(),
  }));

  app.get("/health", async () => ({
    status: "ok",
    timestamp: now(),
  }));

  app.get("/health/scheduler", async () => {
    if (!scheduler.isStarted) {
      throw new ServiceUnavailableError("Scheduler is not running");
    }

    const triggers = scheduler.getTriggers();
    return {
      status: "ok",
      service: "scheduler",
      timestamp: now(),
      jobs: triggers.length,
      triggers: triggers.map((trigger) => ({
        job_name: trigger.name,
        schedule_time: trigger.schedule,
        next_fire_at: trigger.nextFireAt?.toISOString() ?? null,
        state: trigger.state,
      })),
    };
  });
};
