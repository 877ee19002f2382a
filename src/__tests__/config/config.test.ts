import { describe, expect, it } from "vitest";

import { loadConfig } from "@/config/config";

const baseEnv = {
  SMTP_HOST: "smtp.test.local",
  SMTP_USER: "jobs@test.local",
  SMTP_PASSWORD: "test-secret",
  SMTP_FROM_EMAIL: "jobs@test.local",
};

describe("configuration", () => {
  it("applies defaults and converts seconds to milliseconds", () => {
    const config = loadConfig({ ...baseEnv, NODE_ENV: "production" });

    expect(config.server.port).toBe(8000);
    expect(config.server.corsOrigins).toBe(true);
    expect(config.storage.jobsPath).toBe("./data/jobs.json");
    expect(config.executor).toEqual({ scriptTimeoutMs: 300_000, scriptMemoryLimitMb: 256, apiFetchTimeoutMs: 30_000 });
    expect(config.scheduler).toEqual({ timezone: "UTC", pollIntervalMs: 1000, misfireGraceMs: 300_000 });
    expect(config.smtp.port).toBe(587);
    expect(config.smtp.useTls).toBe(true);
    expect(config.delivery.dryRun).toBe(false);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      ...baseEnv,
      NODE_ENV: "development",
      SCRIPT_TIMEOUT: "10",
      CORS_ORIGIN: "http://a.test, http://b.test",
      EMAIL_DRY_RUN: "true",
      SMTP_USE_TLS: "false",
    });

    expect(config.executor.scriptTimeoutMs).toBe(10_000);
    expect(config.server.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
    expect(config.delivery.dryRun).toBe(true);
    expect(config.smtp.useTls).toBe(false);
  });

  it("always runs delivery dry in tests", () => {
    expect(loadConfig({ ...baseEnv, NODE_ENV: "test" }).delivery.dryRun).toBe(true);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ ...baseEnv, SCRIPT_TIMEOUT: "-1" })).toThrow(/^Invalid environment configuration: SCRIPT_TIMEOUT/);
    expect(() => loadConfig({ SMTP_HOST: "smtp.test.local" })).toThrow(/SMTP_USER/);
  });

  it("caps timeouts at what a timer can hold", () => {
    expect(loadConfig({ ...baseEnv, SCRIPT_TIMEOUT: "2147483" }).executor.scriptTimeoutMs).toBe(2_147_483_000);
    expect(() => loadConfig({ ...baseEnv, SCRIPT_TIMEOUT: "2147484" })).toThrow(
      /^Invalid environment configuration: SCRIPT_TIMEOUT: /,
    );
    expect(() => loadConfig({ ...baseEnv, API_FETCH_TIMEOUT: "3000000" })).toThrow(
      /^Invalid environment configuration: API_FETCH_TIMEOUT: /,
    );
  });
});
