import { z } from "zod";
import type { ActionKind, ActionPayload } from "../agents/types";
import { actionKinds } from "../agents/types";
import { err, ok, type Result } from "../utils/result";

export const DEFAULT_CELL_TYPE = "code";

export type CommAction =
  | { readonly type: "insert_below"; readonly cellType: string; readonly code: string }
  | { readonly type: "insert_above"; readonly cellType: string; readonly code: string }
  | { readonly type: "replace"; readonly cellType: string; readonly code: string }
  | { readonly type: "execute" }
  | {
      readonly type: "insert_and_run";
      readonly cellType: string;
      readonly code: string;
    };

export type CommResult = {
  readonly status: "ok" | "error";
  readonly cellId?: string;
  readonly message?: string;
};

/** Actions whose results must arrive before the agent's turn may complete. */
export const ACKNOWLEDGED_ACTIONS: ReadonlySet<string> = new Set<ActionKind>([
  "execute",
  "insert_and_run",
]);

export const requiresAcknowledgment = (kind: string): boolean =>
  ACKNOWLEDGED_ACTIONS.has(kind);

const isActionKind = (kind: string): kind is ActionKind =>
  actionKinds.some((candidate) => candidate === kind);

export const unknownActionResult = (kind: string): CommResult => ({
  status: "error",
  message: `Unknown action: ${kind}`,
});

/**
 * Translate an agent-issued action into a CommAction. Unknown names become an
 * error result instead of a message to the frontend.
 */
export function toCommAction(
  kind: string,
  payload: ActionPayload
): Result<CommAction, CommResult> {
  if (!isActionKind(kind)) {
    return err(unknownActionResult(kind));
  }

  const cellType = payload.cellType ?? DEFAULT_CELL_TYPE;
  const code = payload.code ?? "";

  switch (kind) {
    case "execute":
      return ok<CommAction, CommResult>({ type: "execute" });
    case "insert_below":
    case "insert_above":
    case "replace":
    case "insert_and_run":
      return ok<CommAction, CommResult>({ type: kind, cellType, code });
    default: {
      const unreachable: never = kind;
      return err(unknownActionResult(unreachable));
    }
  }
}

/** Message sent to the frontend for one effect. */
export const commRequestSchema = z.object({
  request_id: z.string(),
  action: z.string(),
  cell_type: z.string().default(DEFAULT_CELL_TYPE),
  code: z.string().default(""),
});

export type CommRequestMessage = z.infer<typeof commRequestSchema>;

export const commResponseSchema = z.object({
  request_id: z.string().optional(),
  status: z.enum(["ok", "error"]),
  cell_id: z.string().optional(),
  message: z.string().optional(),
});

export type CommResponseMessage = z.infer<typeof commResponseSchema>;

export const toRequestMessage = (
  requestId: string,
  action: string,
  cellType: string = DEFAULT_CELL_TYPE,
  code = ""
): CommRequestMessage => ({
  request_id: requestId,
  action,
  cell_type: cellType,
  code,
});

export const fromResponseMessage = (message: CommResponseMessage): CommResult => ({
  status: message.status,
  ...(message.cell_id ? { cellId: message.cell_id } : {}),
  ...(message.message ? { message: message.message } : {}),
});
