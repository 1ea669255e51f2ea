import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const projectRoot = path.resolve(__dirname, "../..");

dotenv.config({ path: path.join(projectRoot, ".env") });

export interface Config {
  host: string;
  port: number;
  allowedOrigins: string[];
  /** JSON document holding every table (default: ./data/teamboard.json) */
  dataFile: string;
  /** Directory attachment bodies are written to (default: ./data/uploads) */
  uploadsDir: string;
  /** Sender address on notification email */
  emailFrom: string;
  /** Interval in ms between digest sweeps; 0 disables the sweeper (default: 60000) */
  digestSweepIntervalMs: number;
  /** Largest accepted attachment in bytes (default: 10 MiB) */
  maxUploadBytes: number;
  /** Max time in ms to wait for pending digests during shutdown (default: 10000) */
  gracefulTimeoutMs: number;
}

function resolveFromRoot(value: string | undefined, fallback: string): string {
  return path.resolve(projectRoot, value || fallback);
}

/** Parse an integer setting, falling back when it is unset or not a number. */
export function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

const config: Config = {
  host: process.env.HOST || "0.0.0.0",
  port: intFromEnv(process.env.PORT, 3456),
  allowedOrigins: (process.env.ALLOWED_ORIGINS || "http://localhost:3000,http://localhost:5173").split(","),
  dataFile: resolveFromRoot(process.env.DATA_FILE, "data/teamboard.json"),
  uploadsDir: resolveFromRoot(process.env.UPLOADS_DIR, "data/uploads"),
  emailFrom: process.env.EMAIL_FROM || "teamboard@localhost",
  digestSweepIntervalMs: intFromEnv(process.env.DIGEST_SWEEP_INTERVAL_MS, 60_000),
  maxUploadBytes: intFromEnv(process.env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024),
  gracefulTimeoutMs: intFromEnv(process.env.GRACEFUL_TIMEOUT_MS, 10_000),
};

export default config;
