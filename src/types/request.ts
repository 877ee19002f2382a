export interface RequestContext {
  startTime: bigint;
  metricsStartTime?: bigint;
  hadError?: boolean;
}

declare module "fastify" {
  interface FastifyRequest {
    requestContext?: RequestContext;
  }
}
