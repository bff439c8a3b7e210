import http from "node:http";
import {
  DAEMON_SOCKET_PATH,
  DAEMON_TIMEOUT_MS,
  LIMIT_DEBOUNCE_MS,
  LIMIT_MAX,
  LIMIT_MIN,
} from "@powerlens/shared/constants";
import type { CommandResult, LimitQueryResult } from "@powerlens/shared/types";

// ── Response parsing ────────────────────────────────────────────

/** "successfully set charging limit to 80%" → 80 */
export function parseAppliedLimit(text: string): number | null {
  const match = /charging limit to\s+(\d+)%/.exec(text);
  return match ? Number(match[1]) : null;
}

/** "Upper limit: 80%" or a bare "80" → 80 */
export function parseUpperLimit(text: string): number | null {
  const match = /Upper limit:\s+(\d+)%/.exec(text);
  if (match) return Number(match[1]);
  const bare = /^\s*"?(\d+)"?\s*$/.exec(text);
  return bare ? Number(bare[1]) : null;
}

export function isValidLimit(percent: number): boolean {
  return Number.isInteger(percent) && percent >= LIMIT_MIN && percent <= LIMIT_MAX;
}

// ── Transport ───────────────────────────────────────────────────

interface DaemonResponse {
  status: number;
  body: string;
}

function request(
  socketPath: string,
  method: "GET" | "PUT",
  path: string,
  body: string | null,
  timeoutMs: number,
): Promise<DaemonResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        socketPath,
        method,
        path,
        headers: {
          Connection: "close",
          ...(body !== null
            ? { "Content-Type": "text/plain", "Content-Length": Buffer.byteLength(body) }
            : {}),
        },
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () => {
          resolve({
            status: res.statusCode ?? 0,
            body: Buffer.concat(chunks).toString("utf-8").trim(),
          });
        });
        res.on("error", reject);
      },
    );

    req.setTimeout(timeoutMs, () => {
      req.destroy(new Error(`no response from daemon within ${timeoutMs}ms`));
    });
    req.on("error", reject);
    if (body !== null) req.write(body);
    req.end();
  });
}

export interface ControlChannelOptions {
  socketPath?: string;
  timeoutMs?: number;
}

export interface ControlChannel {
  /** Ask the daemon to cap charging at `percent`. Never throws, never retries. */
  setLimit(percent: number): Promise<CommandResult>;
  /** Ask the daemon for its current upper limit. */
  getLimit(): Promise<LimitQueryResult>;
}

export function createControlChannel(options: ControlChannelOptions = {}): ControlChannel {
  const socketPath = options.socketPath ?? DAEMON_SOCKET_PATH;
  const timeoutMs = options.timeoutMs ?? DAEMON_TIMEOUT_MS;

  async function setLimit(percent: number): Promise<CommandResult> {
    if (!isValidLimit(percent)) {
      return {
        kind: "rejected",
        reason: `limit must be an integer between ${LIMIT_MIN} and ${LIMIT_MAX}`,
      };
    }

    let response: DaemonResponse;
    try {
      response = await request(socketPath, "PUT", "/limit", String(percent), timeoutMs);
    } catch (err) {
      return { kind: "transport-failure", detail: err instanceof Error ? err.message : String(err) };
    }

    if (response.status >= 400) {
      return { kind: "rejected", reason: response.body || `daemon answered HTTP ${response.status}` };
    }
    if (!response.body) {
      return { kind: "rejected", reason: "empty response from daemon" };
    }

    const applied = parseAppliedLimit(response.body);
    if (applied === null) return { kind: "rejected", reason: response.body };
    return { kind: "applied", limit: applied };
  }

  async function getLimit(): Promise<LimitQueryResult> {
    let response: DaemonResponse;
    try {
      response = await request(socketPath, "GET", "/limit", null, timeoutMs);
    } catch (err) {
      return { kind: "transport-failure", detail: err instanceof Error ? err.message : String(err) };
    }

    if (response.status >= 400) {
      return { kind: "rejected", reason: response.body || `daemon answered HTTP ${response.status}` };
    }

    const limit = parseUpperLimit(response.body);
    if (limit === null) return { kind: "rejected", reason: response.body || "empty response from daemon" };
    return { kind: "current", limit };
  }

  return { setLimit, getLimit };
}

// ── Debounced controller ────────────────────────────────────────

export interface LimitControllerOptions {
  debounceMs?: number;
}

export interface LimitController {
  /**
   * Request a new limit. Resolves with the daemon's result for the settled value,
   * or `null` if a newer request superseded this one.
   */
  setLimit(percent: number): Promise<CommandResult | null>;
  /** Drop the pending request, if it has not been sent yet. */
  cancel(): void;
  /** Sequence number of the most recent request. */
  readonly latestSequence: number;
}

interface PendingRequest {
  sequence: number;
  percent: number;
  timer: NodeJS.Timeout;
  resolve: (result: CommandResult | null) => void;
}

export function createLimitController(
  channel: ControlChannel,
  options: LimitControllerOptions = {},
): LimitController {
  const debounceMs = options.debounceMs ?? LIMIT_DEBOUNCE_MS;

  let sequence = 0;
  let pending: PendingRequest | null = null;

  async function dispatch(req: PendingRequest): Promise<void> {
    pending = null;
    const result = await channel.setLimit(req.percent);

    // A newer request was issued while this one was on the wire
    if (req.sequence !== sequence) {
      console.log(`[Control] Discarding stale result for ${req.percent}% (#${req.sequence})`);
      req.resolve(null);
      return;
    }

    switch (result.kind) {
      case "applied":
        if (result.limit !== req.percent) {
          console.warn(`[Control] Daemon applied ${result.limit}% (requested ${req.percent}%)`);
        } else {
          console.log(`[Control] Charge limit set to ${result.limit}%`);
        }
        break;
      case "rejected":
        console.warn(`[Control] Daemon rejected ${req.percent}%: ${result.reason}`);
        break;
      case "transport-failure":
        console.error(`[Control] Daemon unreachable: ${result.detail}`);
        break;
    }

    req.resolve(result);
  }

  function cancel(): void {
    if (!pending) return;
    clearTimeout(pending.timer);
    pending.resolve(null);
    pending = null;
  }

  function setLimit(percent: number): Promise<CommandResult | null> {
    cancel();
    sequence++;
    const current = sequence;

    return new Promise((resolve) => {
      const req: PendingRequest = {
        sequence: current,
        percent,
        resolve,
        timer: setTimeout(() => {
          dispatch(req).catch((err: unknown) => {
            console.error("[Control] Dispatch failed:", err instanceof Error ? err.message : String(err));
            resolve({ kind: "transport-failure", detail: err instanceof Error ? err.message : String(err) });
          });
        }, debounceMs),
      };
      pending = req;
    });
  }

  return {
    setLimit,
    cancel,
    get latestSequence() {
      return sequence;
    },
  };
}
