import fs from "node:fs";
import path from "node:path";
import type { Snapshot } from "@powerlens/shared/types";

export interface SessionSummary {
  startedAt: string;
  endedAt: string;
  serialNumber: string;
  samples: number;
  firstSampledAt: number;
  lastSampledAt: number;
  startChargePercent: number;
  endChargePercent: number;
  peakSystemLoadWatts: number;
}

/** One NDJSON file per session, summarised into `<name>.meta.json` when it finishes. */
export interface RecordingSession {
  readonly name: string;
  append(snapshot: Readonly<Snapshot>): void;
  finish(): SessionSummary;
}

const UNKNOWN_SERIAL = "--";

function sessionName(startedAt: Date, serialNumber: string): string {
  const stamp = startedAt.toISOString().replace(/[:.]/g, "-").slice(0, 19);
  const serial = serialNumber.replace(/[^A-Za-z0-9]/g, "") || "unknown";
  return `${stamp}_battery-${serial}`;
}

export function openSession(dataDir: string, first: Readonly<Snapshot>): RecordingSession {
  const startedAt = new Date();
  const name = sessionName(startedAt, first.serialNumber);
  const out = fs.createWriteStream(path.join(dataDir, `${name}.ndjson`), { flags: "a" });
  out.on("error", (err) => {
    console.error(`[Recorder] Write failed for ${name}:`, err.message);
  });

  let last = first;
  let samples = 0;
  let peakLoad = first.systemLoadWatts;
  // The file name keeps whatever serial the first sample had
  let serialNumber = first.serialNumber;

  return {
    name,
    append(snapshot) {
      out.write(`${JSON.stringify({ timestamp: snapshot.sampledAt, snapshot })}\n`);
      samples++;
      last = snapshot;
      peakLoad = Math.max(peakLoad, snapshot.systemLoadWatts);
      if (serialNumber === UNKNOWN_SERIAL) serialNumber = snapshot.serialNumber;
    },
    finish() {
      const summary: SessionSummary = {
        startedAt: startedAt.toISOString(),
        endedAt: new Date().toISOString(),
        serialNumber,
        samples,
        firstSampledAt: first.sampledAt,
        lastSampledAt: last.sampledAt,
        startChargePercent: first.chargePercent,
        endChargePercent: last.chargePercent,
        peakSystemLoadWatts: peakLoad,
      };
      fs.writeFileSync(path.join(dataDir, `${name}.meta.json`), JSON.stringify(summary, null, 2));
      out.end();
      return summary;
    },
  };
}

export interface SnapshotRecorder {
  /** Called on every published snapshot. Opens a session on the first one after idle. */
  onSnapshot(snapshot: Readonly<Snapshot>): void;
  /** Finish the current session, if any. */
  close(): void;
}

export const IDLE_TIMEOUT_MS = 30_000;

export function createSnapshotRecorder(dataDir: string, idleTimeoutMs = IDLE_TIMEOUT_MS): SnapshotRecorder {
  fs.mkdirSync(dataDir, { recursive: true });

  let session: RecordingSession | null = null;
  let idle: NodeJS.Timeout | null = null;

  function finishSession(reason: string): void {
    if (idle) clearTimeout(idle);
    idle = null;
    if (!session) return;

    const { name } = session;
    const summary = session.finish();
    session = null;
    console.log(`[Recorder] ${name} finished (${reason}): ${summary.samples} samples`);
  }

  return {
    onSnapshot(snapshot) {
      if (!session) {
        session = openSession(dataDir, snapshot);
        console.log(`[Recorder] ${session.name} opened`);
      }
      session.append(snapshot);

      if (idle) clearTimeout(idle);
      idle = setTimeout(() => finishSession(`idle ${idleTimeoutMs / 1000}s`), idleTimeoutMs);
    },
    close() {
      finishSession("closed");
    },
  };
}
