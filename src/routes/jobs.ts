import { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import { jobCreateSchema, jobUpdateSchema, toJobRecord } from "@/jobs/jobDefinition";
import { validateInput } from "@/middleware/validateRequest";
import { CSV_CONTENT_TYPE, attachmentDisposition, resultFileName } from "@/services/formatter/resultFormatter";
import type { JobService } from "@/services/jobs/jobService";
import { HTTP_STATUS } from "@/utils/errors";

export interface JobRoutesOptions {
  jobService: JobService;
}

const jobParamsSchema = z.object({
  name: z.string().min(1),
});

export const registerJobRoutes: FastifyPluginAsync<JobRoutesOptions> = async (app, { jobService }) => {
  app.post("/jobs/create", async (request, reply) => {
    const input = validateInput(jobCreateSchema, request.body, "body");
    const job = await jobService.createJob(input);

    reply.status(HTTP_STATUS.CREATED);
    return toJobRecord(job);
  });

  app.get("/jobs", async () => {
    const jobs = await jobService.listJobs();
    return jobs.map(toJobRecord);
  });

  app.get("/jobs/:name", async (request) => {
    const { name } = validateInput(jobParamsSchema, request.params, "params");
    return toJobRecord(await jobService.getJob(name));
  });

  app.put("/jobs/:name", async (request) => {
    const { name } = validateInput(jobParamsSchema, request.params, "params");
    const input = validateInput(jobUpdateSchema, request.body, "body");
    return toJobRecord(await jobService.updateJob(name, input));
  });

  app.delete("/jobs/:name", async (request, reply) => {
    const { name } = validateInput(jobParamsSchema, request.params, "params");
    await jobService.deleteJob(name);
    return reply.status(HTTP_STATUS.NO_CONTENT).send();
  });

  app.post("/jobs/:name/test", async (request, reply) => {
    const { name } = validateInput(jobParamsSchema, request.params, "params");
    const outcome = await jobService.testJob(name);

    if (outcome.status === "failure") {
      reply.status(HTTP_STATUS.UNPROCESSABLE_ENTITY);
      return {
        error: {
          code: "JOB_TEST_FAILED",
          stage: outcome.stage,
          message: outcome.message,
        },
      };
    }

    reply
      .header("Content-Type", CSV_CONTENT_TYPE)
      .header("Content-Disposition", attachmentDisposition(resultFileName(name, new Date())));
    return outcome.content;
  });
};
