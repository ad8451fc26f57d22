import type { Logger } from "pino";
import type { SerialExecutor } from "./serial-executor.js";

export const DEFAULT_WATCHDOG_POLL_INTERVAL_MS = 5_000;

export interface WatchdogStall {
  elapsedMs: number;
  timeoutSeconds: number;
  lastToolName: string | null;
}

export function formatElapsed(elapsedMs: number): string {
  const totalSeconds = Math.floor(elapsedMs / 1000);
  if (totalSeconds >= 60) {
    return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
  }
  return `${totalSeconds}s`;
}

export function describeStall(stall: WatchdogStall): string {
  return (
    `Request timed out after ${formatElapsed(stall.elapsedMs)} - no response from server ` +
    `(last tool: ${stall.lastToolName ?? "unknown"}, timeout ${stall.timeoutSeconds}s)`
  );
}

export interface ProcessWatchdogOptions {
  executor: SerialExecutor;
  logger: Logger;
  timeoutSeconds: () => number;
  /** Poll stops as soon as this returns false. */
  isInFlight: () => boolean;
  onStall: (stall: WatchdogStall) => void;
  pollIntervalMs?: number;
  now?: () => number;
}

export class ProcessWatchdog {
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;
  private pollInterval: ReturnType<typeof setInterval> | null = null;
  private lastActivityAt = 0;
  private lastToolName: string | null = null;

  constructor(private readonly options: ProcessWatchdogOptions) {
    this.logger = options.logger.child({ module: "process-watchdog" });
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_WATCHDOG_POLL_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  get isArmed(): boolean {
    return this.pollInterval !== null;
  }

  get activeToolName(): string | null {
    return this.lastToolName;
  }

  arm(): void {
    this.disarm();
    this.lastActivityAt = this.now();
    this.pollInterval = setInterval(() => {
      this.options.executor.run("watchdog.poll", () => this.poll());
    }, this.pollIntervalMs);
  }

  disarm(): void {
    if (this.pollInterval) {
      clearInterval(this.pollInterval);
      this.pollInterval = null;
    }
    this.lastToolName = null;
  }

  /** Any inbound frame counts as activity. */
  touch(): void {
    this.lastActivityAt = this.now();
  }

  noteTool(name: string): void {
    this.lastToolName = name;
  }

  private poll(): void {
    if (!this.pollInterval) {
      return;
    }
    if (!this.options.isInFlight()) {
      this.disarm();
      return;
    }
    const elapsedMs = this.now() - this.lastActivityAt;
    const timeoutSeconds = this.options.timeoutSeconds();
    if (elapsedMs < timeoutSeconds * 1000) {
      return;
    }
    const stall: WatchdogStall = {
      elapsedMs,
      timeoutSeconds,
      lastToolName: this.lastToolName,
    };
    this.logger.warn(stall, "Processing stalled");
    this.disarm();
    this.options.onStall(stall);
  }
}
