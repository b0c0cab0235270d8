import type { ModeDefinition } from "@cellhand/config";
import { UnknownMode } from "./errors";
import type { AgentKind, ModeConfig } from "./types";

export type ModeController = {
  getMode(): ModeConfig;
  setMode(name: string): ModeConfig;
  addMode(name: string, definition: ModeDefinition): ModeConfig;
  listModes(): readonly ModeConfig[];
  /** Frozen copy of the current mode for a new session */
  snapshot(): ModeConfig;
};

const normalizeName = (name: string) => name.trim().toLowerCase();

const freezeMode = (name: string, definition: ModeDefinition): ModeConfig =>
  Object.freeze({
    name,
    systemPrompt: definition.systemPrompt,
    agents: Object.freeze([...definition.agents]),
  });

export function createModeController(
  definitions: Record<string, ModeDefinition>,
  initialMode: string
): ModeController {
  const modes = new Map<string, ModeConfig>();
  for (const [name, definition] of Object.entries(definitions)) {
    const normalized = normalizeName(name);
    modes.set(normalized, freezeMode(normalized, definition));
  }

  const lookup = (name: string): ModeConfig => {
    const mode = modes.get(normalizeName(name));
    if (!mode) {
      throw new UnknownMode(name);
    }
    return mode;
  };

  let current = lookup(initialMode);

  return {
    getMode: () => current,
    setMode(name) {
      current = lookup(name);
      return current;
    },
    addMode(name, definition) {
      const normalized = normalizeName(name);
      if (!normalized) {
        throw new UnknownMode(name);
      }
      const mode = freezeMode(normalized, definition);
      modes.set(normalized, mode);
      return mode;
    },
    listModes: () => [...modes.values()],
    // Modes are frozen on creation, so the current value is already a
    // snapshot that later setMode calls cannot reach.
    snapshot: () => current,
  };
}

/** System prompt to inject for an agent kind, or null when the mode skips it. */
export const systemPromptFor = (
  mode: ModeConfig,
  agentKind: AgentKind
): string | null => {
  if (mode.systemPrompt === null) {
    return null;
  }
  if (mode.agents.length > 0 && !mode.agents.includes(agentKind)) {
    return null;
  }
  return mode.systemPrompt;
};
