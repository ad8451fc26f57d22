import { Worker } from "node:worker_threads";

/** Turns a raw text frame into a plain JSON value. */
export interface FrameDecoder {
  decode(raw: string): Promise<unknown>;
  close(): Promise<void>;
}

export function createInlineFrameDecoder(): FrameDecoder {
  return {
    decode: (raw) => Promise.resolve().then((): unknown => JSON.parse(raw)),
    close: async () => {},
  };
}

// Evaluated as a CommonJS worker script.
const DECODE_WORKER_SOURCE = `
const { parentPort } = require("node:worker_threads");
parentPort.on("message", ({ id, raw }) => {
  try {
    parentPort.postMessage({ id, ok: true, value: JSON.parse(raw) });
  } catch (error) {
    parentPort.postMessage({
      id,
      ok: false,
      message: error instanceof Error ? error.message : String(error),
    });
  }
});
`;

type DecodeReply = { id: number; ok: true; value: unknown } | { id: number; ok: false; message: string };

type PendingDecode = {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
};

function isDecodeReply(value: unknown): value is DecodeReply {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "number" &&
    "ok" in value &&
    typeof value.ok === "boolean"
  );
}

class DecodeWorker {
  private readonly worker: Worker;
  private readonly pending = new Map<number, PendingDecode>();
  private nextId = 0;
  private exited = false;

  constructor() {
    this.worker = new Worker(DECODE_WORKER_SOURCE, { eval: true });
    this.worker.unref();
    this.worker.on("message", (reply: unknown) => this.handleReply(reply));
    this.worker.on("error", (error: Error) => this.failAll(error));
    this.worker.on("exit", (code: number) => {
      this.exited = true;
      this.failAll(new Error(`Decode worker exited with code ${code}`));
    });
  }

  get alive(): boolean {
    return !this.exited;
  }

  get load(): number {
    return this.pending.size;
  }

  decode(raw: string): Promise<unknown> {
    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.worker.postMessage({ id, raw });
    });
  }

  async terminate(): Promise<void> {
    await this.worker.terminate();
  }

  private handleReply(reply: unknown): void {
    if (!isDecodeReply(reply)) {
      return;
    }
    const pending = this.pending.get(reply.id);
    if (!pending) {
      return;
    }
    this.pending.delete(reply.id);
    if (reply.ok) {
      pending.resolve(reply.value);
    } else {
      pending.reject(new SyntaxError(reply.message));
    }
  }

  private failAll(error: Error): void {
    for (const pending of this.pending.values()) {
      pending.reject(error);
    }
    this.pending.clear();
  }
}

/**
 * JSON decode on a small worker_threads pool. Workers are created lazily and
 * unref'd, so an idle pool never keeps the process alive.
 */
export function createWorkerPoolFrameDecoder(options: { size?: number } = {}): FrameDecoder {
  const size = Math.max(1, options.size ?? 2);
  const workers: DecodeWorker[] = [];
  let closed = false;

  const pickWorker = (): DecodeWorker => {
    for (let index = workers.length - 1; index >= 0; index -= 1) {
      if (!workers[index]?.alive) {
        workers.splice(index, 1);
      }
    }
    if (workers.length < size) {
      const worker = new DecodeWorker();
      workers.push(worker);
      return worker;
    }
    return workers.reduce((least, candidate) => (candidate.load < least.load ? candidate : least));
  };

  return {
    decode: (raw) => {
      if (closed) {
        return Promise.reject(new Error("Frame decoder is closed"));
      }
      return pickWorker().decode(raw);
    },
    close: async () => {
      closed = true;
      const terminating = workers.splice(0, workers.length);
      await Promise.all(terminating.map((worker) => worker.terminate()));
    },
  };
}

type DecodedSlot<Tag> = { tag: Tag; ready: boolean; value?: unknown; error?: Error };

/**
 * Re-joins asynchronously decoded frames in arrival order. Delivery happens
 * through `deliver`, which the owner routes onto its serial executor.
 */
export class OrderedFrameJoiner<Tag> {
  private readonly slots = new Map<number, DecodedSlot<Tag>>();
  private nextSeq = 0;
  private nextDeliver = 0;

  constructor(
    private readonly decoder: FrameDecoder,
    private readonly deliver: (result: { tag: Tag; value?: unknown; error?: Error }) => void
  ) {}

  push(raw: string, tag: Tag): void {
    const seq = this.nextSeq++;
    const slot: DecodedSlot<Tag> = { tag, ready: false };
    this.slots.set(seq, slot);
    void this.decoder.decode(raw).then(
      (value) => {
        slot.value = value;
        slot.ready = true;
        this.drain();
      },
      (error: unknown) => {
        slot.error = error instanceof Error ? error : new Error(String(error));
        slot.ready = true;
        this.drain();
      }
    );
  }

  get pendingCount(): number {
    return this.slots.size;
  }

  private drain(): void {
    let slot = this.slots.get(this.nextDeliver);
    while (slot?.ready) {
      this.slots.delete(this.nextDeliver);
      this.nextDeliver += 1;
      this.deliver(slot.error ? { tag: slot.tag, error: slot.error } : { tag: slot.tag, value: slot.value });
      slot = this.slots.get(this.nextDeliver);
    }
  }
}
