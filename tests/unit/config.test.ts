import { describe, it, expect } from "vitest";

import {
  assertDirectoryConfigured,
  ConfigError,
  loadConfig,
} from "../../src/config.js";

describe("config", () => {
  it("should apply defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      databaseUrl: "postgresql://localhost:5432/directory_mirror",
      directory: {
        baseUrl: "",
        tokenUrl: "",
        clientId: "",
        clientSecret: "",
        pageSize: 100,
        requestTimeoutMs: 15_000,
        fetchDeadlineMs: 120_000,
      },
      sync: { intervalMs: 60_000, onStart: true },
      server: { port: 3000, host: "0.0.0.0" },
    });
  });

  it("should convert numeric and boolean variables", () => {
    const config = loadConfig({
      SCIM_PAGE_SIZE: "250",
      SYNC_INTERVAL_MS: "300000",
      SYNC_ON_START: "false",
      PORT: "8080",
    });

    expect(config.directory.pageSize).toBe(250);
    expect(config.sync).toEqual({ intervalMs: 300_000, onStart: false });
    expect(config.server.port).toBe(8080);
  });

  it("should treat blank variables as unset", () => {
    expect(loadConfig({ PORT: "  ", HOST: "" }).server).toEqual({
      port: 3000,
      host: "0.0.0.0",
    });
  });

  it("should report invalid values together", () => {
    let error: unknown;
    try {
      loadConfig({ SCIM_PAGE_SIZE: "0", PORT: "not-a-port" });
    } catch (caught) {
      error = caught;
    }

    expect(error).toBeInstanceOf(ConfigError);
    const problems = error instanceof ConfigError ? error.problems : [];
    expect(problems.map((problem) => problem.split(" ")[0])).toEqual([
      "/directory/pageSize",
      "/server/port",
    ]);
  });

  describe("assertDirectoryConfigured", () => {
    it("should name every missing directory variable", () => {
      const { directory } = loadConfig({ SCIM_BASE_URL: "https://x.test" });

      expect(() => assertDirectoryConfigured(directory)).toThrow(
        "Invalid configuration: SCIM_TOKEN_URL is required; SCIM_CLIENT_ID is required; SCIM_CLIENT_SECRET is required"
      );
    });

    it("should accept a complete directory configuration", () => {
      const { directory } = loadConfig({
        SCIM_BASE_URL: "https://directory.test/scim",
        SCIM_TOKEN_URL: "https://auth.directory.test/token",
        SCIM_CLIENT_ID: "test-client",
        SCIM_CLIENT_SECRET: "test-secret",
      });

      expect(() => assertDirectoryConfigured(directory)).not.toThrow();
    });
  });
});
