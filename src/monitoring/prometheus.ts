import { FastifyInstance, FastifyRequest } from "fastify";
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

export const httpRequestsTotal = new Counter({
  name: "http_requests_total",
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code", "outcome"],
  registers: [metricsRegistry],
});

export const httpRequestDurationHistogram = new Histogram({
  name: "http_request_duration_seconds",
  help: "Duration of HTTP requests in seconds",
  labelNames: ["method", "route", "status_code"],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [metricsRegistry],
});

export const cronJobResultCounter = new Counter({
  name: "cron_job_runs_total",
  help: "Total scheduled job executions grouped by status",
  labelNames: ["job_name", "status"],
  registers: [metricsRegistry],
});

export const cronJobDurationHistogram = new Histogram({
  name: "cron_job_duration_seconds",
  help: "Duration of scheduled job executions in seconds",
  labelNames: ["job_name"],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120, 300],
  registers: [metricsRegistry],
});

export const cronFireEventsCounter = new Counter({
  name: "cron_fire_events_total",
  help: "Trigger fire events grouped by outcome (started, coalesced, misfired)",
  labelNames: ["job_name", "outcome"],
  registers: [metricsRegistry],
});

export const scheduledJobsGauge = new Gauge({
  name: "scheduled_jobs",
  help: "Number of registered triggers",
  registers: [metricsRegistry],
});

export const fetchAttemptsCounter = new Counter({
  name: "data_fetch_attempts_total",
  help: "Data source fetch attempts grouped by source type and status",
  labelNames: ["source_type", "status"],
  registers: [metricsRegistry],
});

export const transformDurationHistogram = new Histogram({
  name: "transform_duration_seconds",
  help: "Duration of transformation runs in seconds",
  labelNames: ["status"],
  buckets: [0.05, 0.1, 0.5, 1, 5, 10, 30, 60, 300],
  registers: [metricsRegistry],
});

export const deliveryCounter = new Counter({
  name: "email_deliveries_total",
  help: "Email deliveries grouped by kind and status",
  labelNames: ["kind", "status"],
  registers: [metricsRegistry],
});

export type JobRunStatus = "success" | "failure";

export function recordJobRun(jobName: string, status: JobRunStatus, durationSeconds?: number) {
  cronJobResultCounter.labels(jobName, status).inc();

  if (typeof durationSeconds === "number" && Number.isFinite(durationSeconds) && durationSeconds >= 0) {
    cronJobDurationHistogram.labels(jobName).observe(durationSeconds);
  }
}

export function recordFireEvent(jobName: string, outcome: "started" | "coalesced" | "misfired") {
  cronFireEventsCounter.labels(jobName, outcome).inc();
}

export function recordFetchAttempt(sourceType: "api" | "file", status: "success" | "failure") {
  fetchAttemptsCounter.labels(sourceType, status).inc();
}

export function recordDelivery(kind: "success" | "failure", status: "sent" | "failed" | "dry_run") {
  deliveryCounter.labels(kind, status).inc();
}

function resolveRouteLabel(request: FastifyRequest) {
  return request.routeOptions.url ?? request.url;
}

function determineOutcome(statusCode: number, hadError?: boolean) {
  if (hadError || statusCode >= 500) {
    return "error";
  }
  if (statusCode >= 400) {
    return "client_error";
  }
  return "success";
}

export function registerPrometheusMiddleware(app: FastifyInstance) {
  app.addHook("onRequest", (request, _reply, done) => {
    const start = process.hrtime.bigint();
    if (request.requestContext) {
      request.requestContext.metricsStartTime = start;
    } else {
      request.requestContext = { startTime: start, metricsStartTime: start };
    }
    done();
  });

  app.addHook("onError", (request, _reply, _error, done) => {
    if (!request.requestContext) {
      request.requestContext = { startTime: process.hrtime.bigint() };
    }
    request.requestContext.hadError = true;
    done();
  });

  app.addHook("onResponse", (request, reply, done) => {
    try {
      const statusCode = reply.statusCode || 500;
      const route = resolveRouteLabel(request);
      const method = request.method;
      const outcome = determineOutcome(statusCode, request.requestContext?.hadError);

      httpRequestsTotal.labels(method, route, statusCode.toString(), outcome).inc();

      const start = request.requestContext?.metricsStartTime ?? request.requestContext?.startTime;
      if (start) {
        const durationSeconds = Number(process.hrtime.bigint() - start) / 1_000_000_000;
        httpRequestDurationHistogram.labels(method, route, statusCode.toString()).observe(durationSeconds);
      }
    } finally {
      done();
    }
  });
}
