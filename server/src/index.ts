import http from "http";
import { Server as IOServer } from "socket.io";

import config from "./config.js";
import { createApp } from "./app.js";
import { Database } from "./db/database.js";
import { DigestSweeper } from "./notifications/digest-sweeper.js";
import { LogEmailTransport } from "./notifications/email.js";
import { createServices } from "./services.js";
import {
  createSocketPusher,
  setupSocketHandler,
  type ClientToServerEvents,
  type InterServerEvents,
  type ServerToClientEvents,
  type SocketData,
} from "./socket/handler.js";
import { DiskFileStorage } from "./storage/files.js";

// ---- Instantiate shared services ----
const db = new Database(config.dataFile);
const services = createServices({
  db,
  transport: new LogEmailTransport(config.emailFrom),
  files: new DiskFileStorage(config.uploadsDir),
  maxUploadBytes: config.maxUploadBytes,
});

// ---- HTTP + Socket.IO ----
const app = createApp(services, {
  allowedOrigins: config.allowedOrigins,
  maxUploadBytes: config.maxUploadBytes,
});
const server = http.createServer(app);

const io = new IOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(server, {
  cors: {
    origin: config.allowedOrigins,
    methods: ["GET", "POST"],
    credentials: true,
  },
});

setupSocketHandler(io, services.users, services.ledger);
services.dispatcher.setPusher(createSocketPusher(io));

// ---- Background digest sweeps ----
const sweeper = new DigestSweeper(services.dispatcher, config.digestSweepIntervalMs);

// ---- Graceful shutdown ----
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`[teamboard] ${signal} received — starting graceful shutdown`);

  // 1. Stop sweeping, disconnect sockets and close the HTTP server (io.close() closes both)
  sweeper.stop();
  await io.close();

  // 2. Send whatever digests are still waiting in open windows, bounded by gracefulTimeoutMs
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), config.gracefulTimeoutMs);
  });
  const outcome = await Promise.race([services.dispatcher.flushAll(), timeout]);
  clearTimeout(timer);

  if (outcome === "timeout") {
    console.warn(`[teamboard] Timeout (${config.gracefulTimeoutMs}ms) while flushing digests — exiting anyway`);
  } else if (outcome > 0) {
    console.log(`[teamboard] Flushed ${outcome} pending digest(s)`);
  }

  process.exit(0);
}

// ---- Start listening ----
server.listen(config.port, config.host, () => {
  console.log(`[teamboard] Server running at http://${config.host}:${config.port}`);
  sweeper.start();
});

process.on("SIGTERM", () => {
  gracefulShutdown("SIGTERM").catch((err) => {
    console.error("[teamboard] Shutdown failed:", err);
    process.exit(1);
  });
});
process.on("SIGINT", () => {
  gracefulShutdown("SIGINT").catch((err) => {
    console.error("[teamboard] Shutdown failed:", err);
    process.exit(1);
  });
});
