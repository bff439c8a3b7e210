/** Unix socket the charge-limit daemon listens on */
export const DAEMON_SOCKET_PATH = "/var/run/batt.sock";

export const TICK_INTERVAL_MS = 1000;
export const LIMIT_DEBOUNCE_MS = 500;
export const DAEMON_TIMEOUT_MS = 5_000;

export const LIMIT_MIN = 10;
export const LIMIT_MAX = 99;
export const DEFAULT_CHARGE_LIMIT = 80;

/** Battery current above this (A) counts as charging; filters sensor noise */
export const CHARGING_THRESHOLD_AMPS = 0.05;
/** Adapter voltage at or below this (V) is treated as unplugged */
export const ADAPTER_MIN_VOLTS = 0.01;

export const WS_PORT = 4402;
