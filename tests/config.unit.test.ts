import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadClientConfig } from "../src/config.js";

describe("loadClientConfig", () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "oncall-config-"));
    configPath = join(dir, "oncall.toml");
    writeFileSync(
      configPath,
      [
        "[api]",
        'token = "file-token"',
        'base_url = "http://pd.test"',
        "",
        "[retry]",
        "write_timeout_ms = 60000",
        "",
        "[log]",
        'level = "debug"',
        "",
      ].join("\n"),
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads the file and applies defaults", () => {
    expect(loadClientConfig(configPath, {})).toEqual({
      api: { token: "file-token", base_url: "http://pd.test" },
      retry: {
        interval_ms: 2000,
        lookup_timeout_ms: 10000,
        read_timeout_ms: 30000,
        write_timeout_ms: 60000,
      },
      log: { level: "debug", json: false },
    });
  });

  it("lets the environment override the API settings", () => {
    const config = loadClientConfig(configPath, {
      PAGERDUTY_TOKEN: "env-token",
      PAGERDUTY_API_URL: "http://other.test",
    });

    expect(config.api).toEqual({ token: "env-token", base_url: "http://other.test" });
    expect(config.log.level).toBe("debug");
  });

  it("works from the environment alone when no file exists", () => {
    const config = loadClientConfig(undefined, { PAGERDUTY_TOKEN: "env-token" });

    expect(config.api).toEqual({ token: "env-token", base_url: "https://api.pagerduty.com" });
    expect(config.log).toEqual({ level: "info", json: false });
  });

  it("requires a token", () => {
    expect(() => loadClientConfig(undefined, {})).toThrow();
  });

  it("fails when an explicit file is missing", () => {
    expect(() => loadClientConfig(join(dir, "missing.toml"), {})).toThrow(/ENOENT/);
  });

  it("rejects invalid values", () => {
    writeFileSync(configPath, '[api]\ntoken = "file-token"\n\n[log]\nlevel = "verbose"\n');

    expect(() => loadClientConfig(configPath, {})).toThrow();
  });
});
