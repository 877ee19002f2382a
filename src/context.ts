import type { AppConfig } from "@/config/config";
import { CronScheduler } from "@/queue/cronScheduler";
import { DataSourceFetcher, type HttpClient } from "@/services/fetcher/dataSourceFetcher";
import { JobRunner } from "@/services/jobs/jobRunner";
import { JobService } from "@/services/jobs/jobService";
import { type MailTransport, Notifier, createSmtpTransport } from "@/services/notification/notificationService";
import { FileJobRegistry, type JobRegistry } from "@/services/registry/jobRegistry";
import { TransformRunner } from "@/services/transform/transformRunner";
import type { Sleep } from "@/utils/sleep";

export interface AppContext {
  config: AppConfig;
  registry: JobRegistry;
  fetcher: DataSourceFetcher;
  transformer: TransformRunner;
  notifier: Notifier;
  runner: JobRunner;
  scheduler: CronScheduler;
  jobService: JobService;
}

/** Collaborators that tests replace with in-process stand-ins. */
export interface AppContextOverrides {
  registry?: JobRegistry;
  http?: HttpClient;
  mailTransport?: MailTransport;
  sleep?: Sleep;
  now?: () => Date;
}

export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const registry = overrides.registry ?? new FileJobRegistry(config.storage.jobsPath);

  const fetcher = new DataSourceFetcher({
    requestTimeoutMs: config.executor.apiFetchTimeoutMs,
    http: overrides.http,
    sleep: overrides.sleep,
  });

  const transformer = new TransformRunner({
    timeoutMs: config.executor.scriptTimeoutMs,
    memoryLimitMb: config.executor.scriptMemoryLimitMb,
  });

  const notifier = new Notifier({
    transport: overrides.mailTransport ?? createSmtpTransport(config.smtp),
    fromEmail: config.smtp.fromEmail,
    dryRun: config.delivery.dryRun,
    sleep: overrides.sleep,
    now: overrides.now,
  });

  const runner = new JobRunner({ fetcher, transformer, notifier, registry, now: overrides.now });

  const scheduler = new CronScheduler({
    handler: (job) => runner.run(job),
    timezone: config.scheduler.timezone,
    pollIntervalMs: config.scheduler.pollIntervalMs,
    misfireGraceMs: config.scheduler.misfireGraceMs,
    now: overrides.now,
  });

  const jobService = new JobService({ registry, scheduler, runner, now: overrides.now });

  return { config, registry, fetcher, transformer, notifier, runner, scheduler, jobService };
}
