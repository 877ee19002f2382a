import { randomUUID } from "node:crypto";

import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import Fastify, { FastifyInstance } from "fastify";

import type { AppContext } from "@/context";
import { errorHandler } from "@/middleware/errorHandler";
import { registerRequestLogger } from "@/middleware/requestLogger";
import { registerPrometheusMiddleware } from "@/monitoring/prometheus";
import { registerHealthRoutes } from "@/routes/health";
import { registerJobRoutes } from "@/routes/jobs";
import { registerMetricsRoutes } from "@/routes/metrics";

const REQUEST_ID_HEADER = "x-request-id";
const BODY_LIMIT_BYTES = 1024 * 1024;

function getRequestId(headerValue: string | string[] | undefined) {
  if (typeof headerValue === "string" && headerValue.length > 0) {
    return headerValue;
  }

  if (Array.isArray(headerValue) && headerValue.length > 0) {
    return headerValue[0];
  }

  return randomUUID();
}

export async function createServer(context: AppContext): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    bodyLimit: BODY_LIMIT_BYTES,
    requestIdHeader: REQUEST_ID_HEADER,
    genReqId: (request) => getRequestId(request.headers[REQUEST_ID_HEADER]),
  });

  await app.register(cors, {
    origin: context.config.server.corsOrigins,
    credentials: true,
  });

  await app.register(helmet);

  registerPrometheusMiddleware(app);
  registerRequestLogger(app);
  app.setErrorHandler(errorHandler);

  await app.register(registerHealthRoutes, { scheduler: context.scheduler });
  await app.register(registerMetricsRoutes);
  await app.register(registerJobRoutes, { jobService: context.jobService });

  return app;
}
