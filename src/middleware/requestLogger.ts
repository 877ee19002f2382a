import { FastifyInstance } from "fastify";

import { logger } from "@/utils/logger";

const toMilliseconds = (start: bigint) => Number(process.hrtime.bigint() - start) / 1_000_000;

export function registerRequestLogger(app: FastifyInstance) {
  app.addHook("onRequest", (request, _reply, done) => {
    if (!request.requestContext) {
      request.requestContext = { startTime: process.hrtime.bigint() };
    }

    logger.debug("Incoming request", { requestId: request.id, method: request.method, url: request.url });
    done();
  });

  app.addHook("onResponse", (request, reply, done) => {
    const start = request.requestContext?.startTime;
    const durationMs = start ? Math.round(toMilliseconds(start)) : undefined;
    const meta = {
      requestId: request.id,
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      durationMs,
    };

    if (reply.statusCode >= 500) {
      logger.error("Request completed", meta);
    } else if (reply.statusCode >= 400) {
      logger.warn("Request completed", meta);
    } else {
      logger.info("Request completed", meta);
    }

    done();
  });
}
