import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { config as loadEnv } from "dotenv";
import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const envCandidates = [process.env.TEST_ENV_FILE, ".env.test"];
const loadedFiles = new Set<string>();

for (const candidate of envCandidates) {
  if (!candidate) {
    continue;
  }

  const resolved = path.isAbsolute(candidate) ? candidate : path.resolve(__dirname, candidate);
  if (!loadedFiles.has(resolved) && fs.existsSync(resolved)) {
    loadEnv({ path: resolved, override: false });
    loadedFiles.add(resolved);
  }
}

process.env.NODE_ENV ??= "test";
process.env.LOG_LEVEL ??= "error";
process.env.LOG_TO_FILE ??= "false";
process.env.JOB_STORAGE_PATH ??= path.join(os.tmpdir(), "scheduled-jobs-test", "jobs.json");
process.env.SMTP_HOST ??= "smtp.test.local";
process.env.SMTP_USER ??= "jobs@test.local";
process.env.SMTP_PASSWORD ??= "test-secret";
process.env.SMTP_FROM_EMAIL ??= "jobs@test.local";

const cpuCount = os.cpus()?.length ?? 4;
const maxThreads = Math.min(Math.max(cpuCount - 1, 2), 8);

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    setupFiles: ["src/__tests__/setup/testEnv.ts"],
    testTimeout: 30_000,
    hookTimeout: 30_000,
    pool: "threads",
    poolOptions: {
      threads: {
        minThreads: 2,
        maxThreads,
      },
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary", "lcov"],
      include: ["src/**"],
      exclude: ["src/__tests__/**", "src/index.ts"],
    },
  },
});
