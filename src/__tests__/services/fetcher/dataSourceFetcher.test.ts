import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { AxiosError } from "axios";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { FakeHttpClient, recordingSleep } from "@/__tests__/helpers/fakes";
import { DataSourceFetcher } from "@/services/fetcher/dataSourceFetcher";
import { FetchError } from "@/utils/errors";

const SOURCE_URL = "http://data.test.local/sales";

function buildFetcher(http: FakeHttpClient) {
  const { delays, sleep } = recordingSleep();
  const fetcher = new DataSourceFetcher({ requestTimeoutMs: 1000, http, sleep });
  return { fetcher, delays };
}

describe("DataSourceFetcher API sources", () => {
  it("retries transient failures with exponential backoff", async () => {
    const http = new FakeHttpClient([
      new Error("socket hang up"),
      new Error("Request failed with status code 503"),
      { status: 200, data: '[{"id":1,"name":"a"}]' },
    ]);
    const { fetcher, delays } = buildFetcher(http);

    const dataset = await fetcher.fetch({ type: "api", location: SOURCE_URL });

    expect(dataset).toEqual({ columns: ["id", "name"], rows: [[1, "a"]] });
    expect(http.calls).toHaveLength(3);
    expect(delays).toEqual([2000, 4000]);
    expect(delays.reduce((total, delay) => total + delay, 0)).toBeGreaterThanOrEqual(6000);
  });

  it("gives up after three attempts and reports the last error", async () => {
    const http = new FakeHttpClient([new Error("connect ECONNREFUSED 127.0.0.1:9")]);
    const { fetcher, delays } = buildFetcher(http);

    const attempt = fetcher.fetchFromApi(SOURCE_URL);

    await expect(attempt).rejects.toBeInstanceOf(FetchError);
    await expect(attempt).rejects.toThrow(
      `Failed to fetch data from API ${SOURCE_URL} after 3 attempts. Last error: connect ECONNREFUSED 127.0.0.1:9`,
    );
    expect(http.calls).toHaveLength(3);
    expect(delays).toEqual([2000, 4000]);
  });

  it("labels request timeouts", async () => {
    const http = new FakeHttpClient([new AxiosError("timeout of 1000ms exceeded", AxiosError.ECONNABORTED)]);
    const { fetcher } = buildFetcher(http);

    await expect(fetcher.fetchFromApi(SOURCE_URL)).rejects.toThrow("Last error: timeout: timeout of 1000ms exceeded");
  });

  it("retries a body that is not JSON", async () => {
    const http = new FakeHttpClient([
      { status: 200, data: "<html>maintenance</html>" },
      { status: 200, data: '{"a":[1,2]}' },
    ]);
    const { fetcher, delays } = buildFetcher(http);

    await expect(fetcher.fetchFromApi(SOURCE_URL)).resolves.toEqual({ columns: ["a"], rows: [[1], [2]] });
    expect(delays).toEqual([2000]);
  });

  it("does not retry a JSON payload of the wrong shape", async () => {
    const http = new FakeHttpClient([{ status: 200, data: '"just text"' }]);
    const { fetcher, delays } = buildFetcher(http);

    await expect(fetcher.fetchFromApi(SOURCE_URL)).rejects.toThrow(
      `Unexpected data format from API ${SOURCE_URL}: Unexpected data format: string`,
    );
    expect(http.calls).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it("accepts an already parsed body and treats a plain object as one row", async () => {
    const http = new FakeHttpClient([{ status: 200, data: { total: 3, currency: "EUR" } }]);
    const { fetcher } = buildFetcher(http);

    await expect(fetcher.fetchFromApi(SOURCE_URL)).resolves.toEqual({ columns: ["total", "currency"], rows: [[3, "EUR"]] });
  });
});

describe("DataSourceFetcher file sources", () => {
  let directory: string;

  beforeAll(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), "fetcher-"));
  });

  afterAll(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  const fetcher = new DataSourceFetcher({ requestTimeoutMs: 1000, http: new FakeHttpClient([]) });

  it("reads a csv file", async () => {
    const file = path.join(directory, "scores.csv");
    await fs.writeFile(file, "id,name,score\n1,Ann,9.5\n2,Bob,7\n");

    await expect(fetcher.fetch({ type: "file", location: file, fileType: "csv" })).resolves.toEqual({
      columns: ["id", "name", "score"],
      rows: [
        [1, "Ann", 9.5],
        [2, "Bob", 7],
      ],
    });
  });

  it("reads a json file", async () => {
    const file = path.join(directory, "scores.json");
    await fs.writeFile(file, JSON.stringify([{ id: 1, passed: true }]));

    await expect(fetcher.fetch({ type: "file", location: file, fileType: "json" })).resolves.toEqual({
      columns: ["id", "passed"],
      rows: [[1, true]],
    });
  });

  it("fails for a missing file", async () => {
    const file = path.join(directory, "missing.csv");
    await expect(fetcher.fetchFromFile(file, "csv")).rejects.toThrow(`File not found: ${file}`);
  });

  it("fails for a directory", async () => {
    await expect(fetcher.fetchFromFile(directory, "csv")).rejects.toThrow(`Path is not a file: ${directory}`);
  });

  it("fails for an empty file", async () => {
    const file = path.join(directory, "empty.json");
    await fs.writeFile(file, "  \n");

    await expect(fetcher.fetchFromFile(file, "json")).rejects.toThrow(`File is empty: ${file}`);
  });

  it("fails for unparsable content", async () => {
    const file = path.join(directory, "broken.json");
    await fs.writeFile(file, "{oops");

    const attempt = fetcher.fetchFromFile(file, "json");
    await expect(attempt).rejects.toBeInstanceOf(FetchError);
    await expect(attempt).rejects.toThrow(`Error parsing json file ${file}:`);
  });
});
