import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Snapshot } from "@powerlens/shared/types";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSnapshotRecorder, IDLE_TIMEOUT_MS, openSession } from "./recorder.js";

function snapshot(overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    systemLoadWatts: 10,
    adapterVoltageVolts: 20,
    adapterPowerWatts: 60,
    adapterAmperageAmps: 3,
    batteryVoltageVolts: 12.5,
    batteryAmperageAmps: 2,
    batteryPowerWatts: 25,
    isCharging: true,
    designCapacityMilliampHours: 2000,
    maxCapacityMilliampHours: 1800,
    healthPercent: 90,
    cycleCount: 123,
    chargePercent: 50,
    temperatureCelsius: 31,
    serialNumber: "F8Y1234ABCD",
    sampledAt: 1000,
    slowPathUpdatedAt: 1000,
    ...overrides,
  };
}

function readMeta(dir: string): Record<string, unknown> {
  const file = fs.readdirSync(dir).find((name) => name.endsWith(".meta.json"));
  if (!file) throw new Error("no meta file");
  return JSON.parse(fs.readFileSync(path.join(dir, file), "utf-8"));
}

describe("createSnapshotRecorder", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "powerlens-sessions-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes one line per snapshot and a meta file on close", async () => {
    const recorder = createSnapshotRecorder(dir);
    recorder.onSnapshot(snapshot({ chargePercent: 50, sampledAt: 1000 }));
    recorder.onSnapshot(snapshot({ chargePercent: 51, sampledAt: 2000 }));
    recorder.close();

    expect(readMeta(dir)).toMatchObject({
      serialNumber: "F8Y1234ABCD",
      samples: 2,
      startChargePercent: 50,
      endChargePercent: 51,
      firstSampledAt: 1000,
      lastSampledAt: 2000,
    });

    const ndjson = fs.readdirSync(dir).find((name) => name.endsWith(".ndjson"));
    expect(ndjson).toMatch(/_battery-F8Y1234ABCD\.ndjson$/);
    await vi.waitFor(() => {
      const lines = fs.readFileSync(path.join(dir, ndjson ?? ""), "utf-8").trim().split("\n");
      expect(lines.map((line) => JSON.parse(line).timestamp)).toEqual([1000, 2000]);
    });
  });

  it("fills in the serial once the slow path reports it", () => {
    const recorder = createSnapshotRecorder(dir);
    recorder.onSnapshot(snapshot({ serialNumber: "--" }));
    recorder.onSnapshot(snapshot({ serialNumber: "F8Y1234ABCD" }));
    recorder.close();

    expect(readMeta(dir).serialNumber).toBe("F8Y1234ABCD");
    expect(fs.readdirSync(dir).some((name) => name.endsWith("_battery-unknown.ndjson"))).toBe(true);
  });

  it("ends the session after the idle timeout", () => {
    vi.useFakeTimers();
    const recorder = createSnapshotRecorder(dir);
    recorder.onSnapshot(snapshot());

    expect(fs.readdirSync(dir).some((name) => name.endsWith(".meta.json"))).toBe(false);
    vi.advanceTimersByTime(IDLE_TIMEOUT_MS);
    expect(readMeta(dir).endedAt).toEqual(expect.any(String));

    recorder.close();
  });

  it("starts a new session for snapshots after an idle end", () => {
    vi.useFakeTimers();
    const recorder = createSnapshotRecorder(dir, 1_000);
    recorder.onSnapshot(snapshot({ sampledAt: 1000 }));
    vi.advanceTimersByTime(1_000);
    // Second-resolution file names; keep the two sessions apart
    vi.advanceTimersByTime(1_000);
    recorder.onSnapshot(snapshot({ sampledAt: 5000 }));
    recorder.close();

    const metas = fs.readdirSync(dir).filter((name) => name.endsWith(".meta.json"));
    expect(metas).toHaveLength(2);
  });
});

describe("openSession", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "powerlens-session-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("summarises the samples it was given", () => {
    const session = openSession(dir, snapshot({ serialNumber: "--", chargePercent: 40 }));
    session.append(snapshot({ serialNumber: "--", chargePercent: 40, systemLoadWatts: 8, sampledAt: 1000 }));
    session.append(snapshot({ chargePercent: 42, systemLoadWatts: 17.5, sampledAt: 2000 }));
    session.append(snapshot({ chargePercent: 43, systemLoadWatts: 9, sampledAt: 3000 }));
    const summary = session.finish();

    expect(session.name).toMatch(/_battery-unknown$/);
    expect(summary).toMatchObject({
      serialNumber: "F8Y1234ABCD",
      samples: 3,
      firstSampledAt: 1000,
      lastSampledAt: 3000,
      startChargePercent: 40,
      endChargePercent: 43,
      peakSystemLoadWatts: 17.5,
    });
    expect(readMeta(dir)).toEqual(summary);
  });
});
