import type { AgentConfig, ApprovalDecision } from "@cellhand/config";
import { z } from "zod";
import { safeSync } from "../utils/result";
import type { StreamEvent } from "./types";

export type WireProtocol = AgentConfig["protocol"];

export type DecodedLine =
  | {
      readonly kind: "decoded";
      readonly events: readonly StreamEvent[];
      /** Resume token announced on this line, if any */
      readonly resumeToken?: string;
    }
  | { readonly kind: "malformed"; readonly reason: string };

export type WireCodec = {
  readonly protocol: WireProtocol;
  encodePrompt(text: string): string;
  encodeDecision(decision: ApprovalDecision, approvalId?: string): string;
  decodeLine(line: string): DecodedLine;
};

/** Marker standing in for a newline inside a single-line prompt. */
export const NEWLINE_MARKER = " ⏎ ";

const NEWLINE_REGEX = /\r?\n/g;

const cellActionSchema = z.object({
  type: z.literal("cell.action"),
  action: z.string().min(1),
  cell_type: z.string().optional(),
  code: z.string().optional(),
});

const approvalRequestSchema = z.object({
  type: z.literal("approval.request"),
  id: z.string().optional(),
  kind: z.string().default("command"),
  command: z.string().optional(),
  cwd: z.string().optional(),
  reason: z.string().optional(),
});

const eventLineSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("item.completed"),
    item: z.object({ type: z.string(), text: z.string().optional() }),
  }),
  z.object({ type: z.literal("token"), text: z.string() }),
  cellActionSchema,
  approvalRequestSchema,
  z.object({
    type: z.literal("turn.result"),
    result: z
      .object({
        final_message: z.string().nullish(),
        errors: z.array(z.string()).default([]),
      })
      .default({}),
  }),
  z.object({ type: z.literal("error"), message: z.string() }),
  z.object({ type: z.literal("session.resume"), session_id: z.string() }),
  z.object({ type: z.literal("thread.started"), thread_id: z.string() }),
]);

const streamJsonLineSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("system"),
    subtype: z.string().optional(),
    session_id: z.string().optional(),
  }),
  z.object({
    type: z.literal("assistant"),
    message: z.object({
      content: z.array(
        z.object({ type: z.string(), text: z.string().optional() })
      ),
    }),
  }),
  z.object({
    type: z.literal("result"),
    is_error: z.boolean().default(false),
    result: z.string().optional(),
    session_id: z.string().optional(),
  }),
  cellActionSchema,
  approvalRequestSchema,
]);

const looseTokenSchema = z.object({
  session_id: z.string().optional(),
  msg: z.object({ session_id: z.string().optional() }).optional(),
});

const decoded = (
  events: readonly StreamEvent[],
  resumeToken?: string
): DecodedLine =>
  resumeToken ? { kind: "decoded", events, resumeToken } : { kind: "decoded", events };

const parseJsonObject = (
  line: string
): { ok: true; value: Record<string, unknown> } | { ok: false; reason: string } => {
  const parsed = safeSync((): unknown => JSON.parse(line));
  if (parsed.isErr()) {
    return { ok: false, reason: parsed.error.message };
  }
  const value = parsed.value;
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { ok: false, reason: "Expected a JSON object" };
  }
  return { ok: true, value: Object.fromEntries(Object.entries(value)) };
};

const toActionEvent = (
  line: z.infer<typeof cellActionSchema>
): StreamEvent => ({
  type: "action",
  kind: line.action,
  payload: { cellType: line.cell_type, code: line.code },
});

const toApprovalEvent = (
  line: z.infer<typeof approvalRequestSchema>
): StreamEvent => ({
  type: "approval",
  request: {
    id: line.id,
    kind: line.kind,
    command: line.command,
    cwd: line.cwd,
    reason: line.reason,
  },
});

const looseResumeToken = (value: Record<string, unknown>): string | undefined => {
  const loose = looseTokenSchema.safeParse(value);
  if (!loose.success) {
    return;
  }
  return loose.data.session_id ?? loose.data.msg?.session_id;
};

const describeIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join(", ");

/** A known line type with the wrong shape is malformed; unknown types are skipped. */
const rejectLine = (
  value: Record<string, unknown>,
  knownTypes: { has(type: string): boolean },
  error: z.ZodError
): DecodedLine => {
  const type = value.type;
  if (typeof type === "string" && knownTypes.has(type)) {
    return {
      kind: "malformed",
      reason: `Invalid ${type} line: ${describeIssues(error)}`,
    };
  }
  // Unrecognised but well-formed lines may still announce a session id.
  return decoded([], looseResumeToken(value));
};

const decodeEventLine = (value: Record<string, unknown>): DecodedLine => {
  const result = eventLineSchema.safeParse(value);
  if (!result.success) {
    return rejectLine(value, eventLineSchema.optionsMap, result.error);
  }

  const line = result.data;
  switch (line.type) {
    case "item.completed":
      return line.item.type === "agent_message" && line.item.text
        ? decoded([{ type: "text", content: line.item.text }])
        : decoded([]);
    case "token":
      return decoded([{ type: "text", content: line.text }]);
    case "cell.action":
      return decoded([toActionEvent(line)]);
    case "approval.request":
      return decoded([toApprovalEvent(line)]);
    case "turn.result": {
      const finalMessage = line.result.final_message ?? undefined;
      const [firstError] = line.result.errors;
      if (firstError !== undefined && finalMessage === undefined) {
        return decoded([{ type: "error", message: firstError }]);
      }
      return decoded([{ type: "completion", finalMessage }]);
    }
    case "error":
      return decoded([{ type: "error", message: line.message }]);
    case "session.resume":
      return decoded([], line.session_id);
    case "thread.started":
      return decoded([], line.thread_id);
    default:
      return decoded([]);
  }
};

const decodeStreamJsonLine = (value: Record<string, unknown>): DecodedLine => {
  const result = streamJsonLineSchema.safeParse(value);
  if (!result.success) {
    return rejectLine(value, streamJsonLineSchema.optionsMap, result.error);
  }

  const line = result.data;
  switch (line.type) {
    case "system":
      return decoded([], line.session_id);
    case "assistant": {
      const text = line.message.content
        .filter((part) => part.type === "text" && part.text)
        .map((part) => part.text)
        .join("");
      return decoded(text ? [{ type: "text", content: text }] : []);
    }
    case "result":
      return decoded(
        [
          line.is_error
            ? {
                type: "error",
                message: line.result ?? "Agent reported an error",
              }
            : { type: "completion", finalMessage: line.result },
        ],
        line.session_id
      );
    case "cell.action":
      return decoded([toActionEvent(line)]);
    case "approval.request":
      return decoded([toApprovalEvent(line)]);
    default:
      return decoded([]);
  }
};

export function createWireCodec(protocol: WireProtocol): WireCodec {
  const decodeObject =
    protocol === "stream-json" ? decodeStreamJsonLine : decodeEventLine;

  return {
    protocol,
    encodePrompt(text) {
      if (protocol === "stream-json") {
        return JSON.stringify({
          type: "user",
          message: { role: "user", content: [{ type: "text", text }] },
        });
      }
      return text.replace(NEWLINE_REGEX, NEWLINE_MARKER);
    },
    encodeDecision(decision, approvalId) {
      return JSON.stringify({
        type: "approval.response",
        ...(approvalId ? { id: approvalId } : {}),
        decision,
      });
    },
    decodeLine(line) {
      const trimmed = line.trim();
      if (!trimmed) {
        return decoded([]);
      }
      const parsed = parseJsonObject(trimmed);
      if (!parsed.ok) {
        return { kind: "malformed", reason: parsed.reason };
      }
      return decodeObject(parsed.value);
    },
  };
}
