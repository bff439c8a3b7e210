import fs from "node:fs";
import path from "node:path";
import {
  DAEMON_SOCKET_PATH,
  DEFAULT_CHARGE_LIMIT,
  LIMIT_DEBOUNCE_MS,
  TICK_INTERVAL_MS,
  WS_PORT,
} from "@powerlens/shared/constants";
import { isValidLimit } from "./control.js";

export interface AppConfig {
  socketPath: string;
  /** Last limit the daemon confirmed */
  chargeLimit: number;
  tickIntervalMs: number;
  debounceMs: number;
  recordSessions: boolean;
  port: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  socketPath: DAEMON_SOCKET_PATH,
  chargeLimit: DEFAULT_CHARGE_LIMIT,
  tickIntervalMs: TICK_INTERVAL_MS,
  debounceMs: LIMIT_DEBOUNCE_MS,
  recordSessions: false,
  port: WS_PORT,
};

let configPath: string;
let current: AppConfig;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : fallback;
}

/** Keep known keys with sane values; anything else falls back to the default. */
function sanitize(raw: Record<string, unknown>): AppConfig {
  return {
    socketPath:
      typeof raw.socketPath === "string" && raw.socketPath.length > 0
        ? raw.socketPath
        : DEFAULT_CONFIG.socketPath,
    chargeLimit:
      typeof raw.chargeLimit === "number" && isValidLimit(raw.chargeLimit)
        ? raw.chargeLimit
        : DEFAULT_CONFIG.chargeLimit,
    tickIntervalMs: positiveInt(raw.tickIntervalMs, DEFAULT_CONFIG.tickIntervalMs),
    debounceMs: positiveInt(raw.debounceMs, DEFAULT_CONFIG.debounceMs),
    recordSessions:
      typeof raw.recordSessions === "boolean" ? raw.recordSessions : DEFAULT_CONFIG.recordSessions,
    port: positiveInt(raw.port, DEFAULT_CONFIG.port),
  };
}

function load(): AppConfig {
  if (fs.existsSync(configPath)) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(configPath, "utf-8"));
      if (isRecord(parsed)) return sanitize(parsed);
    } catch (err) {
      console.warn(
        `[Config] Ignoring unreadable ${configPath}:`,
        err instanceof Error ? err.message : String(err),
      );
    }
  }
  return { ...DEFAULT_CONFIG };
}

function save(config: AppConfig): void {
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2));
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : undefined;
}

export function initConfig(dataDir: string): AppConfig {
  configPath = path.join(dataDir, "config.json");
  fs.mkdirSync(dataDir, { recursive: true });

  current = load();

  // Env vars override file config
  if (process.env.POWERLENS_SOCKET) current.socketPath = process.env.POWERLENS_SOCKET;
  current.tickIntervalMs = envInt("POWERLENS_TICK_MS") ?? current.tickIntervalMs;
  current.port = envInt("POWERLENS_PORT") ?? current.port;
  if (process.env.POWERLENS_RECORD === "1") current.recordSessions = true;

  return current;
}

export function getConfig(): AppConfig {
  return current;
}

export function updateConfig(patch: Partial<AppConfig>): AppConfig {
  current = { ...current, ...patch };
  save(current);
  return current;
}
