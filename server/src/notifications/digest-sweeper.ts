import type { NotificationDispatcher } from "./dispatcher.js";

/**
 * Periodically closes expired batching windows so a digest goes out even when
 * the recipient gets no further notification. Windows also close lazily on the
 * next notify(), so this is optional. Disable it with DIGEST_SWEEP_INTERVAL_MS=0.
 */
export class DigestSweeper {
  private dispatcher: NotificationDispatcher;
  private intervalMs: number;
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(dispatcher: NotificationDispatcher, intervalMs: number) {
    this.dispatcher = dispatcher;
    this.intervalMs = intervalMs;
  }

  start(): void {
    if (this.intervalHandle || !Number.isFinite(this.intervalMs) || this.intervalMs <= 0) return;
    this.intervalHandle = setInterval(() => {
      this.tick().catch((err) => console.error("[digest-sweeper] Sweep failed:", err));
    }, this.intervalMs);
    this.intervalHandle.unref();
    console.log(`[digest-sweeper] Started (every ${this.intervalMs}ms)`);
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      console.log("[digest-sweeper] Stopped");
    }
  }

  /** One sweep. Skipped while the previous one is still sending. */
  async tick(): Promise<void> {
    if (this.running) return;
    this.running = true;
    try {
      const sent = await this.dispatcher.sweep();
      if (sent > 0) console.log(`[digest-sweeper] Sent ${sent} digest(s)`);
    } finally {
      this.running = false;
    }
  }
}
