import type { Logger } from "pino";
import type { ApprovalRequest } from "../shared/approval.js";
import type { AgentModel } from "../shared/models.js";

export interface TokenUsage {
  used: number;
  total: number;
}

export interface SessionSnapshot {
  sessionId: string | null;
  isProcessing: boolean;
  isReattaching: boolean;
  isAborting: boolean;
  isSwitchingModel: boolean;
  currentText: string;
  lastError: string | null;
  tokenUsage: TokenUsage | null;
  pendingApproval: ApprovalRequest | null;
  currentModel: AgentModel | null;
  currentModelId: string | null;
  lastActiveToolName: string | null;
}

const SNAPSHOT_KEYS = [
  "sessionId",
  "isProcessing",
  "isReattaching",
  "isAborting",
  "isSwitchingModel",
  "currentText",
  "lastError",
  "tokenUsage",
  "pendingApproval",
  "currentModel",
  "currentModelId",
  "lastActiveToolName",
] as const satisfies readonly (keyof SessionSnapshot)[];

export type SessionStateListener = (snapshot: SessionSnapshot, changed: (keyof SessionSnapshot)[]) => void;

export function createInitialSessionSnapshot(): SessionSnapshot {
  return {
    sessionId: null,
    isProcessing: false,
    isReattaching: false,
    isAborting: false,
    isSwitchingModel: false,
    currentText: "",
    lastError: null,
    tokenUsage: null,
    pendingApproval: null,
    currentModel: null,
    currentModelId: null,
    lastActiveToolName: null,
  };
}

/**
 * Observable session state owned by one client instance. Only the serial
 * executor writes to it.
 */
export class SessionStateStore {
  private snapshot: SessionSnapshot;
  private readonly listeners = new Set<SessionStateListener>();

  constructor(
    private readonly logger: Logger,
    initial: Partial<SessionSnapshot> = {}
  ) {
    this.snapshot = { ...createInitialSessionSnapshot(), ...initial };
  }

  get(): SessionSnapshot {
    return this.snapshot;
  }

  update(patch: Partial<SessionSnapshot>): void {
    const next: SessionSnapshot = { ...this.snapshot, ...patch };
    const changed: (keyof SessionSnapshot)[] = SNAPSHOT_KEYS.filter(
      (key) => next[key] !== this.snapshot[key]
    );
    if (changed.length === 0) {
      return;
    }
    this.snapshot = next;
    for (const listener of this.listeners) {
      try {
        listener(next, changed);
      } catch (error) {
        this.logger.warn({ err: error }, "Session state listener threw");
      }
    }
  }

  subscribe(listener: SessionStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
