import { promises as fs } from "node:fs";

import axios, { AxiosError } from "axios";

import { recordFetchAttempt } from "@/monitoring/prometheus";
import type { Dataset } from "@/types/dataset";
import type { DataSource, FileType } from "@/types/job";
import { parseCsv } from "@/utils/csv";
import { datasetFromJson, DatasetShapeError } from "@/utils/dataset";
import { FetchError, describeError } from "@/utils/errors";
import { logger } from "@/utils/logger";
import { type Sleep, wait } from "@/utils/sleep";

export interface HttpResponse {
  status: number;
  data: unknown;
}

export interface HttpClient {
  get(url: string, options: { timeout: number }): Promise<HttpResponse>;
}

export interface DataSourceFetcherOptions {
  requestTimeoutMs: number;
  http?: HttpClient;
  sleep?: Sleep;
  maxAttempts?: number;
  backoffBaseMs?: number;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BACKOFF_BASE_MS = 1000;

export function createAxiosHttpClient(): HttpClient {
  const client = axios.create({
    responseType: "text",
    headers: { Accept: "application/json" },
  });

  return {
    async get(url, options) {
      const response = await client.get<unknown>(url, { timeout: options.timeout });
      return { status: response.status, data: response.data };
    },
  };
}

function describeAttemptError(error: unknown): string {
  if (error instanceof AxiosError) {
    if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
      return `timeout: ${error.message}`;
    }

    if (error.response) {
      return `HTTP ${error.response.status}: ${error.message}`;
    }
  }

  return describeError(error);
}

class InvalidPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPayloadError";
  }
}

function parseJsonBody(data: unknown): unknown {
  if (typeof data !== "string") {
    return data;
  }

  try {
    return JSON.parse(data);
  } catch (error) {
    throw new InvalidPayloadError(`Response body is not valid JSON: ${describeError(error)}`);
  }
}

export class DataSourceFetcher {
  private readonly http: HttpClient;
  private readonly sleep: Sleep;
  private readonly requestTimeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;

  constructor(options: DataSourceFetcherOptions) {
    this.http = options.http ?? createAxiosHttpClient();
    this.sleep = options.sleep ?? wait;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
  }

  async fetch(source: DataSource): Promise<Dataset> {
    switch (source.type) {
      case "api":
        return this.fetchFromApi(source.location);
      case "file":
        return this.fetchFromFile(source.location, source.fileType);
    }
  }

  async fetchFromApi(url: string): Promise<Dataset> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      logger.info("Fetching data from API", { url, attempt, maxAttempts: this.maxAttempts });

      try {
        const response = await this.http.get(url, { timeout: this.requestTimeoutMs });
        const payload = parseJsonBody(response.data);
        recordFetchAttempt("api", "success");

        let dataset: Dataset;
        try {
          dataset = datasetFromJson(payload);
        } catch (error) {
          // wrong shape is final, not retried
          throw new FetchError(`Unexpected data format from API ${url}: ${describeError(error)}`, { cause: error });
        }

        logger.info("Fetched rows from API", { url, rows: dataset.rows.length, columns: dataset.columns.length });
        return dataset;
      } catch (error) {
        if (error instanceof FetchError) {
          throw error;
        }

        lastError = error;
        recordFetchAttempt("api", "failure");
        logger.warn("API fetch attempt failed", { url, attempt, reason: describeAttemptError(error) });
      }

      if (attempt < this.maxAttempts) {
        const delayMs = this.backoffBaseMs * 2 ** attempt;
        logger.info("Retrying API fetch", { url, delayMs });
        await this.sleep(delayMs);
      }
    }

    const message =
      `Failed to fetch data from API ${url} after ${this.maxAttempts} attempts. ` +
      `Last error: ${describeAttemptError(lastError)}`;
    logger.error(message, { url });
    throw new FetchError(message, { cause: lastError });
  }

  async fetchFromFile(path: string, fileType: FileType): Promise<Dataset> {
    logger.info("Reading data from file", { path, fileType });

    try {
      const content = await this.readFile(path);
      const dataset = this.parseFile(path, fileType, content);
      recordFetchAttempt("file", "success");
      logger.info("Read rows from file", { path, rows: dataset.rows.length, columns: dataset.columns.length });
      return dataset;
    } catch (error) {
      recordFetchAttempt("file", "failure");
      logger.error("File fetch failed", { path, fileType, reason: describeError(error) });
      throw error;
    }
  }

  private async readFile(path: string): Promise<string> {
    let isFile: boolean;
    try {
      isFile = (await fs.stat(path)).isFile();
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new FetchError(`File not found: ${path}`, { cause: error });
      }
      throw new FetchError(`Error reading file ${path}: ${describeError(error)}`, { cause: error });
    }

    if (!isFile) {
      throw new FetchError(`Path is not a file: ${path}`);
    }

    try {
      return await fs.readFile(path, "utf8");
    } catch (error) {
      throw new FetchError(`Error reading file ${path}: ${describeError(error)}`, { cause: error });
    }
  }

  private parseFile(path: string, fileType: FileType, content: string): Dataset {
    if (content.trim().length === 0) {
      throw new FetchError(`File is empty: ${path}`);
    }

    try {
      if (fileType === "csv") {
        return parseCsv(content);
      }

      return datasetFromJson(JSON.parse(content));
    } catch (error) {
      if (error instanceof SyntaxError || error instanceof DatasetShapeError) {
        throw new FetchError(`Error parsing ${fileType} file ${path}: ${error.message}`, { cause: error });
      }
      throw new FetchError(`Error reading file ${path}: ${describeError(error)}`, { cause: error });
    }
  }
}
