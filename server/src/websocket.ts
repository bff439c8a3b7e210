import http from "node:http";
import type {
  CommandResult,
  ConfigState,
  LimitQueryResult,
  SetLimitParams,
  VisibilityParams,
} from "@powerlens/shared/types";
import { Server as SocketIOServer } from "socket.io";

export interface WebSocketHandlers {
  /** Current config pushed to each client on connect. */
  getConfigState(): ConfigState;
  /** Called whenever the number of clients showing the UI crosses zero. */
  onVisibilityChange(visible: boolean): void;
  setLimit(percent: number): Promise<CommandResult | null>;
  getLimit(): Promise<LimitQueryResult>;
}

type Ack = (result: CommandResult | LimitQueryResult | null) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isSetLimitParams(value: unknown): value is SetLimitParams {
  return isRecord(value) && typeof value.percent === "number";
}

function isVisibilityParams(value: unknown): value is VisibilityParams {
  return isRecord(value) && typeof value.visible === "boolean";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Socket.IO passes the ack callback last, whether or not a payload came first */
function takeAck(args: unknown[]): Ack | null {
  const last = args[args.length - 1];
  if (typeof last !== "function") return null;
  return (result) => {
    last(result);
  };
}

/** Create an HTTP + Socket.IO server on the given port */
export function createWebSocketServer(port: number, handlers: WebSocketHandlers): SocketIOServer {
  const httpServer = http.createServer();
  const io = new SocketIOServer(httpServer, {
    cors: { origin: "*" },
  });

  // The gate stays open while any client has the UI on screen
  const visibleClients = new Set<string>();

  function setVisible(socketId: string, visible: boolean): void {
    const wasVisible = visibleClients.size > 0;
    if (visible) visibleClients.add(socketId);
    else visibleClients.delete(socketId);
    const isVisible = visibleClients.size > 0;
    if (isVisible !== wasVisible) handlers.onVisibilityChange(isVisible);
  }

  io.on("connection", (socket) => {
    console.log(`[WS] Client connected: ${socket.id}`);
    socket.emit("config:state", handlers.getConfigState());

    socket.on("visibility:set", (params: unknown) => {
      setVisible(socket.id, isVisibilityParams(params) && params.visible);
    });

    socket.on("limit:set", async (...args: unknown[]) => {
      const ack = takeAck(args);
      const [params] = args;
      if (!isSetLimitParams(params)) {
        ack?.({ kind: "rejected", reason: "limit:set expects { percent: number }" } satisfies CommandResult);
        return;
      }

      let result: CommandResult | null;
      try {
        result = await handlers.setLimit(params.percent);
      } catch (err) {
        console.error("[WS] limit:set failed:", errorMessage(err));
        result = { kind: "rejected", reason: errorMessage(err) };
      }
      if (result?.kind === "applied") {
        io.emit("config:state", handlers.getConfigState());
      }
      ack?.(result);
    });

    socket.on("limit:get", async (...args: unknown[]) => {
      const ack = takeAck(args);
      let result: LimitQueryResult;
      try {
        result = await handlers.getLimit();
      } catch (err) {
        console.error("[WS] limit:get failed:", errorMessage(err));
        result = { kind: "rejected", reason: errorMessage(err) };
      }
      ack?.(result);
    });

    socket.on("disconnect", () => {
      console.log(`[WS] Client disconnected: ${socket.id}`);
      setVisible(socket.id, false);
    });
  });

  httpServer.listen(port, () => {
    console.log(`[Power] WebSocket server on port ${port}`);
  });

  return io;
}
