import type { Logger } from "pino";
import {
  MODEL_SWITCH_MARKER,
  parseModelSwitchConfirmation,
  resolveModelArgument,
  type AgentModel,
} from "../shared/models.js";
import type { ConnectionSupervisor } from "./connection-supervisor.js";
import type { BridgeEvent } from "./events.js";
import type { SerialExecutor } from "./serial-executor.js";
import type { SessionStateStore } from "./session-state.js";

export const MODEL_SWITCH_TIMEOUT_MS = 5_000;

export interface ModelSwitchOptions {
  executor: SerialExecutor;
  logger: Logger;
  state: SessionStateStore;
  supervisor: Pick<ConnectionSupervisor, "transmit">;
  buildCommandFrame: (command: string, projectPath: string) => string;
  emit: (event: BridgeEvent) => void;
  timeoutMs?: number;
}

/**
 * `/model <alias>` is an ordinary command; the server confirms it in prose
 * ("Set model to sonnet (claude-sonnet-...)") inside the next turn.
 */
export class ModelSwitchProtocol {
  private readonly logger: Logger;
  private timeout: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly options: ModelSwitchOptions) {
    this.logger = options.logger.child({ module: "model-switch" });
  }

  switchModel(model: AgentModel, projectPath: string, customModelId?: string): boolean {
    const { state, supervisor } = this.options;
    const argument = resolveModelArgument(model, customModelId);
    if (!argument) {
      this.logger.warn({ model }, "Custom model switch needs a model id");
      return false;
    }

    let frame: string;
    try {
      frame = this.options.buildCommandFrame(`/model ${argument}`, projectPath);
    } catch (error) {
      this.logger.error({ err: error }, "Failed to encode model switch");
      return false;
    }

    state.update({ isSwitchingModel: true });
    this.startTimeout();
    supervisor.transmit(frame, (error) => {
      if (!error) {
        return;
      }
      this.logger.warn({ err: error, model: argument }, "Model switch send failed");
      this.reset();
      state.update({ lastError: "Failed to switch model" });
    });
    return true;
  }

  /** Streaming text may already carry the confirmation. */
  observeText(text: string): void {
    if (!this.options.state.get().isSwitchingModel || !text.includes(MODEL_SWITCH_MARKER)) {
      return;
    }
    // The model id may still be streaming in.
    if (parseModelSwitchConfirmation(text)) {
      this.resolve(text);
    }
  }

  completeTurn(finalText: string): void {
    if (!this.options.state.get().isSwitchingModel) {
      return;
    }
    if (finalText.includes(MODEL_SWITCH_MARKER)) {
      this.resolve(finalText);
      return;
    }
    this.logger.warn("Turn completed without a model switch confirmation");
    this.reset();
  }

  reset(): void {
    this.cancelTimeout();
    this.options.state.update({ isSwitchingModel: false });
  }

  private resolve(text: string): void {
    const selection = parseModelSwitchConfirmation(text);
    this.reset();
    if (!selection) {
      this.logger.warn({ text }, "Unparseable model switch confirmation");
      return;
    }
    this.options.state.update({
      currentModel: selection.model,
      currentModelId: selection.modelId,
    });
    this.options.emit({ type: "model_changed", model: selection.model, modelId: selection.modelId });
  }

  private startTimeout(): void {
    this.cancelTimeout();
    this.timeout = setTimeout(() => {
      this.options.executor.run("model-switch.timeout", () => {
        this.timeout = null;
        if (this.options.state.get().isSwitchingModel) {
          this.logger.warn("Model switch timed out");
          this.options.state.update({ isSwitchingModel: false });
        }
      });
    }, this.options.timeoutMs ?? MODEL_SWITCH_TIMEOUT_MS);
  }

  private cancelTimeout(): void {
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }
  }
}
