import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG, getConfig, initConfig, updateConfig } from "./config.js";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "powerlens-config-"));
    for (const name of ["POWERLENS_SOCKET", "POWERLENS_TICK_MS", "POWERLENS_PORT", "POWERLENS_RECORD"]) {
      vi.stubEnv(name, "");
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts from defaults when no file exists", () => {
    expect(initConfig(dir)).toEqual(DEFAULT_CONFIG);
  });

  it("persists updates across reloads", () => {
    initConfig(dir);
    updateConfig({ chargeLimit: 70 });

    expect(getConfig().chargeLimit).toBe(70);
    expect(initConfig(dir).chargeLimit).toBe(70);
  });

  it("replaces invalid values with defaults", () => {
    fs.writeFileSync(
      path.join(dir, "config.json"),
      JSON.stringify({ chargeLimit: 150, tickIntervalMs: -5, socketPath: "/tmp/custom.sock" }),
    );

    expect(initConfig(dir)).toEqual({
      ...DEFAULT_CONFIG,
      socketPath: "/tmp/custom.sock",
    });
  });

  it("falls back to defaults for a corrupt file", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    fs.writeFileSync(path.join(dir, "config.json"), "{not json");

    expect(initConfig(dir)).toEqual(DEFAULT_CONFIG);
  });

  it("lets environment variables override the file", () => {
    vi.stubEnv("POWERLENS_SOCKET", "/tmp/env.sock");
    vi.stubEnv("POWERLENS_TICK_MS", "2000");
    vi.stubEnv("POWERLENS_RECORD", "1");

    expect(initConfig(dir)).toMatchObject({
      socketPath: "/tmp/env.sock",
      tickIntervalMs: 2000,
      recordSessions: true,
    });
  });
});
