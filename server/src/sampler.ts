import {
  ADAPTER_MIN_VOLTS,
  CHARGING_THRESHOLD_AMPS,
  TICK_INTERVAL_MS,
} from "@powerlens/shared/constants";
import type { FastPathFields, SlowPathFields, SlowPathPatch, Snapshot } from "@powerlens/shared/types";
import type { BatteryTextSource } from "./battery-source.js";
import { parseBatteryMetrics } from "./metrics.js";
import type { RegisterReader } from "./registers.js";

// ── Visibility gate ─────────────────────────────────────────────

export interface VisibilityGate {
  isOpen(): boolean;
  /** Written by the presentation layer only. */
  set(visible: boolean): void;
}

export function createVisibilityGate(initial = false): VisibilityGate {
  let open = initial;
  return {
    isOpen: () => open,
    set(visible) {
      open = visible;
    },
  };
}

// ── Derivations ─────────────────────────────────────────────────

export function deriveAdapterAmperage(voltage: number, power: number): number {
  return voltage > ADAPTER_MIN_VOLTS ? power / voltage : 0;
}

export function isChargingCurrent(amps: number): boolean {
  return amps > CHARGING_THRESHOLD_AMPS;
}

/** One generation per call, so every derived value comes from the same readings. */
export function readFastPath(registers: RegisterReader): FastPathFields {
  registers.refresh();
  const systemLoadWatts = registers.systemPowerWatts();
  const adapterVoltageVolts = registers.adapterVoltageVolts();
  const adapterPowerWatts = registers.adapterPowerWatts();
  const batteryVoltageVolts = registers.batteryVoltageVolts();
  const batteryAmperageAmps = registers.batteryCurrentAmps();

  return {
    systemLoadWatts,
    adapterVoltageVolts,
    adapterPowerWatts,
    adapterAmperageAmps: deriveAdapterAmperage(adapterVoltageVolts, adapterPowerWatts),
    batteryVoltageVolts,
    batteryAmperageAmps,
    batteryPowerWatts: batteryVoltageVolts * batteryAmperageAmps,
    isCharging: isChargingCurrent(batteryAmperageAmps),
  };
}

/** Apply a parse result; health only moves when a positive design capacity is known. */
export function mergeSlowPath(previous: SlowPathFields, patch: SlowPathPatch): SlowPathFields {
  const next: SlowPathFields = { ...previous, ...patch };
  if (next.designCapacityMilliampHours > 0) {
    next.healthPercent = (100 * next.maxCapacityMilliampHours) / next.designCapacityMilliampHours;
  }
  return next;
}

export const INITIAL_SLOW_PATH: Readonly<SlowPathFields> = Object.freeze({
  designCapacityMilliampHours: 0,
  maxCapacityMilliampHours: 0,
  healthPercent: 0,
  cycleCount: 0,
  chargePercent: 0,
  temperatureCelsius: 0,
  serialNumber: "--",
});

const INITIAL_FAST_PATH: Readonly<FastPathFields> = Object.freeze({
  systemLoadWatts: 0,
  adapterVoltageVolts: 0,
  adapterPowerWatts: 0,
  adapterAmperageAmps: 0,
  batteryVoltageVolts: 0,
  batteryAmperageAmps: 0,
  batteryPowerWatts: 0,
  isCharging: false,
});

// ── Sampler ─────────────────────────────────────────────────────

export type SnapshotListener = (snapshot: Readonly<Snapshot>) => void;

export interface SamplerOptions {
  registers: RegisterReader;
  textSource: BatteryTextSource;
  gate: VisibilityGate;
  now?: () => number;
}

export interface TelemetrySampler {
  /** Sample once. No-op while the gate is closed. */
  tick(): void;
  /** Latest published snapshot. */
  getSnapshot(): Readonly<Snapshot>;
  /** Called with every published snapshot. Returns an unsubscribe function. */
  subscribe(listener: SnapshotListener): () => void;
  /** Resolves once no slow-path refresh is in flight. */
  settled(): Promise<void>;
  start(intervalMs?: number): void;
  stop(): void;
}

export function createTelemetrySampler(options: SamplerOptions): TelemetrySampler {
  const { registers, textSource, gate } = options;
  const now = options.now ?? Date.now;

  let slow: SlowPathFields = { ...INITIAL_SLOW_PATH };
  let slowUpdatedAt: number | null = null;
  let inFlight: Promise<void> | null = null;
  let timer: NodeJS.Timeout | null = null;
  const listeners = new Set<SnapshotListener>();

  let current: Readonly<Snapshot> = Object.freeze({
    ...INITIAL_FAST_PATH,
    ...slow,
    sampledAt: 0,
    slowPathUpdatedAt: null,
  });

  function publish(next: Readonly<Snapshot>): void {
    current = next;
    for (const listener of listeners) {
      try {
        listener(next);
      } catch (err) {
        console.error(
          "[Sampler] Snapshot listener failed:",
          err instanceof Error ? err.message : String(err),
        );
      }
    }
  }

  async function refreshSlowPath(): Promise<void> {
    try {
      const text = await textSource.read();
      const patch = parseBatteryMetrics(text);
      if (Object.keys(patch).length === 0) {
        console.warn("[Sampler] Battery query returned no recognised fields");
        return;
      }
      slow = mergeSlowPath(slow, patch);
      slowUpdatedAt = now();
    } catch (err) {
      // Keep last-known-good slow fields
      console.warn(
        "[Sampler] Battery query failed:",
        err instanceof Error ? err.message : String(err),
      );
    }
  }

  function tick(): void {
    if (!gate.isOpen()) return;

    const fast = readFastPath(registers);

    // At most one subprocess outstanding; a busy tick just skips the slow path
    if (!inFlight) {
      inFlight = refreshSlowPath().finally(() => {
        inFlight = null;
      });
    }

    publish(
      Object.freeze({
        ...fast,
        ...slow,
        sampledAt: now(),
        slowPathUpdatedAt: slowUpdatedAt,
      }),
    );
  }

  function subscribe(listener: SnapshotListener): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  async function settled(): Promise<void> {
    while (inFlight) await inFlight;
  }

  function start(intervalMs = TICK_INTERVAL_MS): void {
    if (timer) return;
    tick();
    timer = setInterval(tick, intervalMs);
  }

  function stop(): void {
    if (timer) clearInterval(timer);
    timer = null;
  }

  return { tick, getSnapshot: () => current, subscribe, settled, start, stop };
}
