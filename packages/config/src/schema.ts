import { z } from "zod";

export const agentKinds = ["codex", "claude", "gemini"] as const;

export const agentKindSchema = z.enum(agentKinds);

export type AgentKind = z.infer<typeof agentKindSchema>;

const WHITESPACE_REGEX = /\s/;

/**
 * Trigger literal routing a cell to one agent kind
 */
export const prefixSchema = z
  .string()
  .min(1, "Prefix must not be empty")
  .refine((value) => !WHITESPACE_REGEX.test(value), {
    message: "Prefix must not contain whitespace",
  });

/**
 * External agent process configuration
 */
export const agentSchema = z.object({
  /** Literal that routes a cell submission to this agent (e.g., "@") */
  prefix: prefixSchema,
  /** Executable to launch */
  command: z.string().min(1),
  /** Arguments passed on every launch */
  args: z.array(z.string()).default([]),
  /** Arguments appended when resuming; `{token}` is replaced with the resume token */
  resumeArgs: z.array(z.string()).default([]),
  /** Environment variables merged over the engine's environment */
  env: z.record(z.string(), z.string()).default({}),
  /** Working directory for the process */
  cwd: z.string().optional(),
  /** Whether a stopped or crashed session can be reconnected */
  resumable: z.boolean().default(false),
  /**
   * How a resumed session recovers its history:
   * `provider` relies on the provider's memory behind the resume token,
   * `replay` primes a fresh process with recent transcript entries.
   */
  resumeFidelity: z.enum(["provider", "replay"]).default("provider"),
  /** Line-level wire dialect spoken on stdin/stdout */
  protocol: z.enum(["events", "stream-json"]).default("events"),
  /** Line written to stdin to ask the process to exit */
  shutdownLine: z.string().optional(),
});

export type AgentConfig = z.infer<typeof agentSchema>;
export type AgentConfigInput = z.input<typeof agentSchema>;

/**
 * Named system-prompt configuration
 */
export const modeSchema = z.object({
  /** Opaque system prompt injected once per process; null disables injection */
  systemPrompt: z.string().nullable(),
  /** Agent kinds the prompt applies to; empty means every kind */
  agents: z.array(agentKindSchema).default([]),
});

export type ModeDefinition = z.infer<typeof modeSchema>;

export const timeoutsSchema = z.object({
  /** Bound on waiting for a launched process to signal readiness */
  startMs: z.number().int().positive().default(10_000),
  /** Wait after the shutdown line before signalling */
  shutdownGraceMs: z.number().int().nonnegative().default(5000),
  /** Wait after SIGTERM before SIGKILL */
  killGraceMs: z.number().int().nonnegative().default(2000),
  /** Wait after SIGKILL before giving up on exit confirmation */
  forceKillWaitMs: z.number().int().nonnegative().default(250),
  /** Wait for one frontend acknowledgment */
  commAckMs: z.number().int().positive().default(30_000),
});

export type Timeouts = z.infer<typeof timeoutsSchema>;

export const approvalDecisions = [
  "approve",
  "approve_session",
  "deny",
  "abort",
] as const;

export const approvalDecisionSchema = z.enum(approvalDecisions);

export type ApprovalDecision = z.infer<typeof approvalDecisionSchema>;

export const engineConfigSchema = z
  .object({
    agents: z.record(agentKindSchema, agentSchema),
    modes: z.record(z.string().min(1), modeSchema),
    defaultMode: z.string().min(1).default("learn"),
    timeouts: timeoutsSchema.default({}),
    approvals: z
      .object({
        /** Decision used when no approval handler is wired */
        defaultDecision: approvalDecisionSchema.default("deny"),
      })
      .default({}),
    transcript: z
      .object({
        /** Entries returned in a status snapshot */
        snapshotEntries: z.number().int().nonnegative().default(10),
        /** Entries folded into a replay digest on resume */
        replayEntries: z.number().int().nonnegative().default(20),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Map<string, string>();
    for (const [kind, agent] of Object.entries(config.agents)) {
      if (!agent) {
        continue;
      }
      const owner = seen.get(agent.prefix);
      if (owner) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["agents", kind, "prefix"],
          message: `Prefix "${agent.prefix}" is already used by ${owner}`,
        });
        continue;
      }
      seen.set(agent.prefix, kind);
    }

    if (!Object.hasOwn(config.modes, config.defaultMode)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["defaultMode"],
        message: `Mode "${config.defaultMode}" is not defined`,
      });
    }
  });

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
