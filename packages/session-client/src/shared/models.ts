export type AgentModel = "opus" | "sonnet" | "haiku" | "custom";

export const AGENT_MODEL_ALIASES: readonly Exclude<AgentModel, "custom">[] = [
  "opus",
  "sonnet",
  "haiku",
];

export interface ModelSelection {
  model: AgentModel;
  modelId: string;
}

export function parseModelFromId(modelId: string): AgentModel {
  const lowered = modelId.toLowerCase();
  for (const alias of AGENT_MODEL_ALIASES) {
    if (lowered.includes(alias)) {
      return alias;
    }
  }
  return "custom";
}

export const MODEL_SWITCH_MARKER = "Set model to";

// "Set model to sonnet (claude-sonnet-4-5-20250929)"
const MODEL_SWITCH_PATTERN = /Set model to[^(]*\(([^)]+)\)/;

export function parseModelSwitchConfirmation(text: string): ModelSelection | null {
  const match = MODEL_SWITCH_PATTERN.exec(text);
  const modelId = match?.[1]?.trim();
  if (!modelId) {
    return null;
  }
  return { model: parseModelFromId(modelId), modelId };
}

export function resolveModelArgument(model: AgentModel, customModelId?: string): string | null {
  if (model !== "custom") {
    return model;
  }
  const trimmed = customModelId?.trim();
  return trimmed ? trimmed : null;
}
