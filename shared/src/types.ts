// ── Telemetry snapshot ──────────────────────────────────────────

/** Fields read from the power registers on every tick. */
export interface FastPathFields {
  systemLoadWatts: number;
  adapterVoltageVolts: number;
  adapterPowerWatts: number;
  adapterAmperageAmps: number; // 0 when unplugged
  batteryVoltageVolts: number;
  batteryAmperageAmps: number; // positive = charging, negative = discharging
  batteryPowerWatts: number;
  isCharging: boolean;
}

/** Fields scraped from the battery inventory dump; refreshed asynchronously. */
export interface SlowPathFields {
  designCapacityMilliampHours: number;
  maxCapacityMilliampHours: number;
  healthPercent: number;
  cycleCount: number;
  chargePercent: number; // 0-100
  temperatureCelsius: number;
  serialNumber: string; // "--" until first parse
}

/** Partial update produced by one parse; absent keys keep their last value. */
export type SlowPathPatch = Partial<Omit<SlowPathFields, "healthPercent">>;

export interface Snapshot extends FastPathFields, SlowPathFields {
  sampledAt: number; // epoch ms
  slowPathUpdatedAt: number | null; // epoch ms of last successful parse
}

// ── Charge-limit control ────────────────────────────────────────

export type CommandResult =
  | { kind: "applied"; limit: number }
  | { kind: "rejected"; reason: string }
  | { kind: "transport-failure"; detail: string };

export type LimitQueryResult =
  | { kind: "current"; limit: number }
  | { kind: "rejected"; reason: string }
  | { kind: "transport-failure"; detail: string };

// ── Socket.IO payloads ──────────────────────────────────────────

export interface ConfigState {
  chargeLimit: number;
  socketPath: string;
}

export interface VisibilityParams {
  visible: boolean;
}

export interface SetLimitParams {
  percent: number;
}
