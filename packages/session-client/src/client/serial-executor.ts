import type { Logger } from "pino";

type SerialTask = {
  label: string;
  run: () => void;
};

/**
 * Single-writer mutation path. Every timer callback, transport callback and
 * public call that touches client state goes through `run`. Tasks submitted
 * while another task is running are queued behind it, so no two handlers ever
 * interleave.
 */
export class SerialExecutor {
  private readonly queue: SerialTask[] = [];
  private draining = false;

  constructor(private readonly logger: Logger) {}

  run(label: string, task: () => void): void {
    this.queue.push({ label, run: task });
    if (this.draining) {
      return;
    }
    this.drain();
  }

  bind<Args extends unknown[]>(label: string, task: (...args: Args) => void): (...args: Args) => void {
    return (...args: Args) => this.run(label, () => task(...args));
  }

  get isRunning(): boolean {
    return this.draining;
  }

  private drain(): void {
    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        try {
          next.run();
        } catch (error) {
          this.logger.error({ err: error, task: next.label }, "serial_task_failed");
        }
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
