import { execFileSync } from "node:child_process";

/** Synchronous power-register reads. Implementations must be cheap enough to call on every tick. */
export interface RegisterReader {
  /** Start a new reading generation. The five reads below return values from it until the next call. */
  refresh(): void;
  systemPowerWatts(): number;
  adapterVoltageVolts(): number;
  adapterPowerWatts(): number;
  batteryVoltageVolts(): number;
  batteryCurrentAmps(): number;
}

export interface RegisterDump {
  systemPowerWatts: number;
  adapterVoltageVolts: number;
  adapterPowerWatts: number;
  batteryVoltageVolts: number;
  batteryCurrentAmps: number;
}

const EMPTY_DUMP: RegisterDump = {
  systemPowerWatts: 0,
  adapterVoltageVolts: 0,
  adapterPowerWatts: 0,
  batteryVoltageVolts: 0,
  batteryCurrentAmps: 0,
};

/** Top-level `"Key" = 123` on its own line */
function readTopLevel(text: string, key: string): bigint | null {
  const match = new RegExp(`^\\s*\\|?\\s*"${key}" = (\\d+)\\s*$`, "m").exec(text);
  return match ? BigInt(match[1]) : null;
}

/** `"Key"=123` inside the PowerTelemetryData dictionary */
function readTelemetry(text: string, key: string): bigint | null {
  const dict = /"PowerTelemetryData" = \{([^}]*)\}/.exec(text);
  if (!dict) return null;
  const match = new RegExp(`"${key}"=(\\d+)`).exec(dict[1]);
  return match ? BigInt(match[1]) : null;
}

/** ioreg prints signed 64-bit registers as unsigned; reinterpret and scale milli-units. */
function milli(raw: bigint | null, signed = false): number {
  if (raw === null) return 0;
  const value = signed ? BigInt.asIntN(64, raw) : raw;
  return Number(value) / 1000;
}

/** Parse an `ioreg -r -c AppleSmartBattery` dump. Missing registers read as 0. */
export function parseRegisterDump(text: string): RegisterDump {
  return {
    systemPowerWatts: milli(readTelemetry(text, "SystemLoad")),
    adapterVoltageVolts: milli(readTelemetry(text, "SystemVoltageIn")),
    adapterPowerWatts: milli(readTelemetry(text, "SystemPowerIn")),
    batteryVoltageVolts: milli(readTopLevel(text, "Voltage")),
    batteryCurrentAmps: milli(readTopLevel(text, "Amperage"), true),
  };
}

export interface IoregRegisterReaderOptions {
  /** Produces the raw dump; defaults to a synchronous ioreg call. */
  query?: () => string;
}

function queryIoreg(): string {
  return execFileSync("ioreg", ["-r", "-c", "AppleSmartBattery"], {
    encoding: "utf-8",
    timeout: 2_000,
  });
}

/**
 * Register reader backed by the AppleSmartBattery registry entry.
 * `refresh()` takes one dump; the five reads return values from that dump
 * until the next refresh, however long the query took.
 */
export function createIoregRegisterReader(options: IoregRegisterReaderOptions = {}): RegisterReader {
  const query = options.query ?? queryIoreg;

  let dump: RegisterDump = EMPTY_DUMP;
  let failing = false;

  function refresh(): void {
    try {
      dump = parseRegisterDump(query());
      if (failing) console.log("[Power] Register reads recovered");
      failing = false;
    } catch (err) {
      dump = EMPTY_DUMP;
      // Only log the first failure of a streak
      if (!failing) {
        console.warn(
          "[Power] Register read failed:",
          err instanceof Error ? err.message : String(err),
        );
      }
      failing = true;
    }
  }

  return {
    refresh,
    systemPowerWatts: () => dump.systemPowerWatts,
    adapterVoltageVolts: () => dump.adapterVoltageVolts,
    adapterPowerWatts: () => dump.adapterPowerWatts,
    batteryVoltageVolts: () => dump.batteryVoltageVolts,
    batteryCurrentAmps: () => dump.batteryCurrentAmps,
  };
}
