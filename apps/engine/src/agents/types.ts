/**
 * Domain types for agent sessions, prompt requests and the events an agent
 * process streams back.
 */

import type { AgentKind, ApprovalDecision } from "@cellhand/config";

export type { AgentKind, ApprovalDecision } from "@cellhand/config";

export const sessionStates = [
  "idle",
  "starting",
  "running",
  "waiting_approval",
  "stopped",
  "crashed",
  "failed",
] as const;

export type SessionState = (typeof sessionStates)[number];

/**
 * Allowed transitions. `starting → idle` is the StartFailed path; every live
 * state may be stopped; `failed` is terminal.
 */
export const SESSION_TRANSITIONS: Readonly<
  Record<SessionState, readonly SessionState[]>
> = {
  idle: ["starting", "stopped"],
  starting: ["running", "idle", "stopped", "crashed", "failed"],
  running: ["idle", "waiting_approval", "stopped", "crashed", "failed"],
  waiting_approval: ["running", "stopped", "crashed", "failed"],
  stopped: ["starting"],
  crashed: ["starting", "stopped"],
  failed: [],
};

export const canTransition = (from: SessionState, to: SessionState): boolean =>
  SESSION_TRANSITIONS[from].includes(to);

export const promptStatuses = [
  "pending",
  "in_flight",
  "completed",
  "cancelled",
  "failed",
] as const;

export type PromptStatus = (typeof promptStatuses)[number];

export type PromptRequest = {
  readonly id: string;
  readonly sessionId: string;
  /** Payload sent to the agent, prefix already stripped */
  readonly text: string;
  readonly submittedAt: Date;
  status: PromptStatus;
  /** Failure detail for `failed` requests */
  error?: string;
};

export type ModeConfig = {
  readonly name: string;
  readonly systemPrompt: string | null;
  readonly agents: readonly AgentKind[];
};

export const actionKinds = [
  "insert_below",
  "insert_above",
  "replace",
  "execute",
  "insert_and_run",
] as const;

export type ActionKind = (typeof actionKinds)[number];

export type ActionPayload = {
  readonly cellType?: string;
  readonly code?: string;
};

export type ApprovalRequest = {
  readonly id?: string;
  readonly kind: string;
  readonly command?: string;
  readonly cwd?: string;
  readonly reason?: string;
};

export type StreamEvent =
  | { readonly type: "text"; readonly content: string }
  | {
      readonly type: "action";
      /** Raw action name as emitted; unknown names are rejected downstream */
      readonly kind: string;
      readonly payload: ActionPayload;
    }
  | { readonly type: "approval"; readonly request: ApprovalRequest }
  | { readonly type: "completion"; readonly finalMessage?: string }
  | { readonly type: "error"; readonly message: string };

export const isTerminalEvent = (event: StreamEvent): boolean =>
  event.type === "completion" || event.type === "error";

export type TranscriptEntry = Readonly<
  | { kind: "prompt"; requestId: string; text: string; at: Date }
  | { kind: "text"; requestId: string; content: string; at: Date }
  | {
      kind: "action";
      requestId: string;
      action: string;
      payload: ActionPayload;
      at: Date;
    }
  | {
      kind: "action_result";
      requestId: string;
      action: string;
      status: "ok" | "error";
      cellId?: string;
      message?: string;
      at: Date;
    }
  | {
      kind: "approval";
      requestId: string;
      request: ApprovalRequest;
      decision: ApprovalDecision;
      at: Date;
    }
  | { kind: "completion"; requestId: string; finalMessage?: string; at: Date }
  | { kind: "error"; requestId?: string; message: string; at: Date }
>;

export type SessionSnapshot = {
  readonly id: string;
  readonly agentKind: AgentKind;
  readonly state: SessionState;
  readonly queueDepth: number;
  readonly inFlightRequestId: string | null;
  readonly mode: ModeConfig;
  readonly resumable: boolean;
  readonly hasResumeToken: boolean;
  readonly createdAt: Date;
  readonly lastActiveAt: Date;
  readonly recentTranscript: readonly TranscriptEntry[];
};

export type PromptRequestSnapshot = Readonly<PromptRequest>;

export type SessionEvent =
  | {
      readonly type: "state";
      readonly sessionId: string;
      readonly from: SessionState;
      readonly to: SessionState;
    }
  | {
      readonly type: "transcript";
      readonly sessionId: string;
      readonly entry: TranscriptEntry;
    }
  | {
      readonly type: "request";
      readonly sessionId: string;
      readonly request: PromptRequestSnapshot;
    };
