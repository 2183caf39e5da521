import WebSocket from "ws";
import http from "http";
import { log, logError } from "./logger";
import type { ServerToClientMessage } from "./messageTypes";
import type { ClientContext } from "./router";

const HEALTH_PATH = "/health";
export const WS_PATH = "/ws/case";

export function rawDataSize(data: WebSocket.RawData): number {
  if (Array.isArray(data)) return data.reduce((total, chunk) => total + chunk.byteLength, 0);
  return data.byteLength;
}

export function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export function createTransport(opts: {
  port: number;
  maxPayloadBytes: number;
  handleMessage: (ws: WebSocket, ctx: ClientContext, raw: string) => void;
  handleClose: (ws: WebSocket, ctx: ClientContext) => void;
  health: () => Record<string, unknown>;
}) {
  const { port, maxPayloadBytes, handleMessage, handleClose, health } = opts;
  const server = http.createServer();
  const wss = new WebSocket.Server({ server, path: WS_PATH });

  server.on("request", (req, res) => {
    if (req.url === HEALTH_PATH) {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ok: true, ...health() }));
      return;
    }
    res.writeHead(404);
    res.end();
  });

  wss.on("connection", (ws) => {
    const ctx: ClientContext = { joined: false, sessionId: null };

    ws.on("message", (data) => {
      if (rawDataSize(data) > maxPayloadBytes) {
        send(ws, { type: "error", message: "Payload too large" });
        ws.close();
        return;
      }
      handleMessage(ws, ctx, rawDataToString(data));
    });

    ws.on("close", () => {
      handleClose(ws, ctx);
    });

    ws.on("error", (err) => {
      logError("Socket error", err);
    });
  });

  server.listen(port, () => {
    log(`Case gateway listening on :${port} (path: ${WS_PATH})`);
  });

  return {
    close: () =>
      new Promise<void>((resolve) => {
        wss.close(() => server.close(() => resolve()));
      }),
  };
}

export function send(ws: WebSocket, msg: ServerToClientMessage) {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(msg));
  }
}
