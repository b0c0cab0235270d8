import type { EngineConfigInput } from "./schema";

export const DEFAULT_ENGINE_CONFIG = {
  agents: {
    codex: {
      prefix: "@",
      command: "codex",
      args: ["exec", "--json", "--stdin-lines"],
      resumeArgs: ["--resume", "{token}"],
      resumable: true,
      resumeFidelity: "provider",
      protocol: "events",
    },
    claude: {
      prefix: "~",
      command: "claude",
      args: [
        "-p",
        "--input-format",
        "stream-json",
        "--output-format",
        "stream-json",
        "--verbose",
      ],
      resumeArgs: ["--resume", "{token}"],
      resumable: true,
      resumeFidelity: "provider",
      protocol: "stream-json",
    },
    gemini: {
      prefix: "^",
      command: "gemini",
      args: ["--output-format", "json-lines"],
      resumable: false,
      protocol: "events",
    },
  },
  modes: {
    learn: {
      systemPrompt:
        "You are pairing with someone learning in a notebook. Explain each step before writing code, and keep inserted cells small.",
      agents: [],
    },
    direct: {
      systemPrompt:
        "Answer succinctly with direct solutions. Prefer inserting runnable cells over prose.",
      agents: [],
    },
  },
  defaultMode: "learn",
} satisfies EngineConfigInput;
