import { WebSocketServer, type WebSocket } from "ws";
import { createHandRanker, HandStrengthClassifier, loadConfig } from "@pokerbot/shared";
import { createRequestHandler } from "./handler";

const VERSION = "pokerbot-server 0.1.0";

const config = loadConfig();
const ranker = createHandRanker(config.oracle);
const classifier = new HandStrengthClassifier(ranker, config.classifier);
const handle = createRequestHandler({ ranker, classifier, version: VERSION });

const wss = new WebSocketServer({ port: config.server.port });

wss.on("connection", (ws) => {
  ws.on("message", (raw) => {
    handle(raw.toString())
      .then((response) => sendJson(ws, response))
      .catch((err: unknown) => {
        console.error("[server] failed to answer request", err);
      });
  });
});

const oracleState = config.oracle.enabled ? `rank oracle ${config.oracle.url}` : "rank oracle disabled";
console.log(`Hand evaluation server running on ws://localhost:${config.server.port} (${oracleState})`);

function sendJson(ws: WebSocket, data: unknown): void {
  if (ws.readyState === ws.OPEN) ws.send(JSON.stringify(data));
}

function shutdown(): void {
  wss.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
