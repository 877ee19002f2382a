import { Worker } from "node:worker_threads";

import { z } from "zod";

import { transformDurationHistogram } from "@/monitoring/prometheus";
import type { Dataset } from "@/types/dataset";
import { datasetSchema, fromRecords } from "@/utils/dataset";
import {
  TransformError,
  TransformOutputError,
  TransformTimeoutError,
  describeError,
} from "@/utils/errors";
import { logger } from "@/utils/logger";

import { SANDBOX_WORKER_SOURCE } from "./sandboxWorker";

export interface TransformRunnerOptions {
  timeoutMs: number;
  memoryLimitMb?: number;
}

export interface TransformRunOptions {
  timeoutMs?: number;
  jobName?: string;
}

const workerMessageSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("log"), message: z.string() }),
  z.object({
    status: z.literal("records"),
    records: z.array(z.record(z.unknown())),
    usedInput: z.boolean(),
  }),
  z.object({
    status: z.literal("table"),
    columns: z.array(z.string()),
    rows: z.array(z.array(z.unknown())),
    usedInput: z.boolean(),
  }),
  z.object({
    status: z.literal("invalid"),
    producedType: z.string(),
    reason: z.string().optional(),
    usedInput: z.boolean(),
  }),
  z.object({ status: z.literal("error"), errorName: z.string(), message: z.string() }),
]);

type WorkerMessage = z.infer<typeof workerMessageSchema>;
type WorkerResult = Exclude<WorkerMessage, { status: "log" }>;

/**
 * Runs user-supplied transformation code against a dataset in a dedicated
 * worker thread. The caller gets a timeout error as soon as the deadline
 * passes; the worker is then terminated without the caller waiting on it.
 */
export class TransformRunner {
  private readonly timeoutMs: number;
  private readonly memoryLimitMb?: number;

  constructor(options: TransformRunnerOptions) {
    this.timeoutMs = options.timeoutMs;
    this.memoryLimitMb = options.memoryLimitMb;
  }

  async run(code: string, input: Dataset, options: TransformRunOptions = {}): Promise<Dataset> {
    if (code.trim().length === 0) {
      throw new TransformError("Transform code cannot be empty");
    }

    const parsedInput = datasetSchema.safeParse(input);
    if (!parsedInput.success) {
      throw new TransformError(`Transform input is not a valid table: ${parsedInput.error.issues[0]?.message}`);
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const startedAt = process.hrtime.bigint();
    let status = "failure";

    try {
      const result = await this.execute(code, parsedInput.data, timeoutMs, options.jobName);
      const dataset = this.interpret(result, options.jobName);
      status = "success";
      return dataset;
    } catch (error) {
      if (error instanceof TransformTimeoutError) {
        status = "timeout";
      }
      throw error;
    } finally {
      const durationSeconds = Number(process.hrtime.bigint() - startedAt) / 1_000_000_000;
      transformDurationHistogram.labels(status).observe(durationSeconds);
    }
  }

  private execute(code: string, input: Dataset, timeoutMs: number, jobName?: string): Promise<WorkerResult> {
    return new Promise<WorkerResult>((resolve, reject) => {
      const worker = new Worker(SANDBOX_WORKER_SOURCE, {
        eval: true,
        workerData: { code, input: JSON.stringify(input) },
        env: {},
        argv: [],
        ...(this.memoryLimitMb ? { resourceLimits: { maxOldGenerationSizeMb: this.memoryLimitMb } } : {}),
      });

      let settled = false;
      const settle = (finish: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        finish();
      };

      const timer = setTimeout(() => {
        settle(() => reject(new TransformTimeoutError(timeoutMs)));
        logger.warn("Transform timed out, terminating worker", { jobName, timeoutMs });
        void this.abandon(worker, jobName);
      }, timeoutMs);

      worker.on("message", (raw: unknown) => {
        const parsed = workerMessageSchema.safeParse(raw);
        if (!parsed.success) {
          settle(() => reject(new TransformError("Transform worker sent a malformed result")));
          void this.abandon(worker, jobName);
          return;
        }

        const message = parsed.data;
        if (message.status === "log") {
          logger.debug("Transform output", { jobName, message: message.message });
          return;
        }

        settle(() => resolve(message));
        void this.abandon(worker, jobName);
      });

      worker.on("error", (error: Error) => {
        settle(() => reject(new TransformError(`Transform worker crashed: ${error.name}: ${error.message}`, { cause: error })));
      });

      worker.on("exit", (exitCode: number) => {
        settle(() => reject(new TransformError(`Transform worker exited unexpectedly with code ${exitCode}`)));
      });
    });
  }

  private async abandon(worker: Worker, jobName?: string): Promise<void> {
    try {
      await worker.terminate();
    } catch (error) {
      logger.warn("Failed to terminate transform worker", { jobName, error: describeError(error) });
    }
  }

  private interpret(result: WorkerResult, jobName?: string): Dataset {
    switch (result.status) {
      case "error":
        throw new TransformError(`Transform execution failed: ${result.errorName}: ${result.message}`, {
          details: { errorType: result.errorName },
        });
      case "invalid":
        throw new TransformOutputError(result.producedType, result.reason);
      case "records":
        return this.accept(fromRecords(result.records), result.usedInput, jobName);
      case "table": {
        const parsed = datasetSchema.safeParse({ columns: result.columns, rows: result.rows });
        if (!parsed.success) {
          throw new TransformOutputError("object", parsed.error.issues[0]?.message);
        }
        return this.accept(parsed.data, result.usedInput, jobName);
      }
    }
  }

  private accept(dataset: Dataset, usedInput: boolean, jobName?: string): Dataset {
    if (usedInput) {
      logger.info("Transform did not assign output, using input table", { jobName });
    }

    if (dataset.rows.length === 0) {
      logger.warn("Transform produced an empty table", { jobName, columns: dataset.columns.length });
    }

    return dataset;
  }
}
