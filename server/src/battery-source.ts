import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Lines the metrics parser cares about; everything else is dropped before parsing. */
const BATTERY_KEYS = /DesignCapacity|CycleCount|Serial|Temperature|CurrentCapacity|AppleRawMaxCapacity/;

export interface BatteryTextSource {
  /** Resolves with the filtered inventory text. Rejects on launch failure, non-zero exit or empty output. */
  read(): Promise<string>;
}

export interface IoregTextSourceOptions {
  command?: string;
  args?: string[];
  timeoutMs?: number;
}

export function filterBatteryLines(output: string): string {
  return output
    .split("\n")
    .filter((line) => BATTERY_KEYS.test(line))
    .join("\n");
}

export function createIoregTextSource(options: IoregTextSourceOptions = {}): BatteryTextSource {
  const command = options.command ?? "ioreg";
  const args = options.args ?? ["-r", "-c", "AppleSmartBattery"];
  const timeout = options.timeoutMs ?? 5_000;

  async function read(): Promise<string> {
    const { stdout } = await execFileAsync(command, args, { encoding: "utf-8", timeout });
    const filtered = filterBatteryLines(stdout);
    if (filtered.trim().length === 0) {
      throw new Error(`${command} produced no battery lines`);
    }
    return filtered;
  }

  return { read };
}
