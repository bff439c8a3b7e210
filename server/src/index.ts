import path from "node:path";
import { createIoregTextSource } from "./battery-source.js";
import { getConfig, initConfig, updateConfig } from "./config.js";
import { createControlChannel, createLimitController } from "./control.js";
import { createSnapshotRecorder } from "./recorder.js";
import { createIoregRegisterReader } from "./registers.js";
import { createTelemetrySampler, createVisibilityGate } from "./sampler.js";
import { createWebSocketServer } from "./websocket.js";

// Config + data
const dataDir = path.join(process.cwd(), "data");
const config = initConfig(dataDir);
const recorder = config.recordSessions ? createSnapshotRecorder(path.join(dataDir, "sessions")) : null;

console.log(`[Power] Daemon socket: ${config.socketPath}`);

// Telemetry. Sampling is paused until a client reports the UI as visible
const gate = createVisibilityGate(false);
const sampler = createTelemetrySampler({
  registers: createIoregRegisterReader(),
  textSource: createIoregTextSource(),
  gate,
});

// Charge-limit control
const channel = createControlChannel({ socketPath: config.socketPath });
const controller = createLimitController(channel, { debounceMs: config.debounceMs });

const io = createWebSocketServer(config.port, {
  getConfigState: () => {
    const cfg = getConfig();
    return { chargeLimit: cfg.chargeLimit, socketPath: cfg.socketPath };
  },
  onVisibilityChange: (visible) => {
    gate.set(visible);
    console.log(`[Power] UI ${visible ? "visible, sampling" : "hidden, sampling paused"}`);
  },
  setLimit: async (percent) => {
    const result = await controller.setLimit(percent);
    if (result?.kind === "applied") {
      // The daemon already holds the new limit
      try {
        updateConfig({ chargeLimit: result.limit });
      } catch (err) {
        console.error("[Power] Could not save charge limit:", err instanceof Error ? err.message : String(err));
      }
    }
    return result;
  },
  getLimit: () => channel.getLimit(),
});

sampler.subscribe((snapshot) => {
  io.emit("telemetry:snapshot", snapshot);
  recorder?.onSnapshot(snapshot);
});
sampler.start(config.tickIntervalMs);

// Report what the daemon currently enforces
channel
  .getLimit()
  .then((result) => {
    if (result.kind === "current") {
      console.log(`[Power] Daemon reports charge limit ${result.limit}%`);
    } else if (result.kind === "rejected") {
      console.warn(`[Power] Could not read charge limit: ${result.reason}`);
    } else {
      console.warn(`[Power] Daemon unreachable: ${result.detail}`);
    }
  })
  .catch((err: unknown) => {
    console.error("[Power] Limit query failed:", err instanceof Error ? err.message : String(err));
  });

// Graceful shutdown
function shutdown(): void {
  sampler.stop();
  controller.cancel();
  recorder?.close();
  io.close();
  process.exit(0);
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
