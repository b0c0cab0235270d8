import { randomUUID } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import type { CommBridge } from "./bridge";
import { NO_ACTIVE_NOTEBOOK } from "./bridge";
import {
  type CommRequestMessage,
  type CommResponseMessage,
  commRequestSchema,
} from "./protocol";

/**
 * In-memory notebook model used by the reference frontend handler. A real
 * frontend maps these calls onto its own document and kernel objects.
 */
export type NotebookCell = {
  readonly id: string;
  cellType: string;
  source: string;
  /** Set once the cell can be executed */
  ready: Promise<void>;
};

export type NotebookKernel = {
  execute(cell: NotebookCell): Promise<void> | void;
};

export type NotebookDocument = {
  cells: NotebookCell[];
  /** -1 when no cell is active */
  activeCellIndex: number;
  kernel: NotebookKernel | null;
};

export type NotebookTracker = {
  currentNotebook(): NotebookDocument | null;
};

export type NotebookActionHandler = {
  handle(raw: unknown): Promise<CommResponseMessage>;
};

export type NotebookActionHandlerOptions = {
  tracker: NotebookTracker;
  createCellId?: () => string;
  /** Pause between inserting a cell and running it in `insert_and_run` */
  settleDelayMs?: number;
};

const DEFAULT_SETTLE_DELAY_MS = 150;

type ActionOutcome =
  | { status: "ok"; cellId?: string }
  | { status: "error"; message: string };

const failure = (message: string): ActionOutcome => ({ status: "error", message });

export function createNotebookActionHandler(
  options: NotebookActionHandlerOptions
): NotebookActionHandler {
  const createCellId = options.createCellId ?? randomUUID;
  const settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;

  const createCell = (cellType: string, source: string): NotebookCell => ({
    id: createCellId(),
    cellType,
    source,
    ready: Promise.resolve(),
  });

  const activeCell = (notebook: NotebookDocument) =>
    notebook.cells[notebook.activeCellIndex];

  const insertBelow = (
    notebook: NotebookDocument,
    message: CommRequestMessage
  ): ActionOutcome => {
    const cell = createCell(message.cell_type, message.code);
    const index = Math.min(notebook.activeCellIndex + 1, notebook.cells.length);
    notebook.cells.splice(index, 0, cell);
    notebook.activeCellIndex = index;
    return { status: "ok", cellId: cell.id };
  };

  const insertAbove = (
    notebook: NotebookDocument,
    message: CommRequestMessage
  ): ActionOutcome => {
    const cell = createCell(message.cell_type, message.code);
    const index = Math.max(notebook.activeCellIndex, 0);
    notebook.cells.splice(index, 0, cell);
    notebook.activeCellIndex = index;
    return { status: "ok", cellId: cell.id };
  };

  const replace = (
    notebook: NotebookDocument,
    message: CommRequestMessage
  ): ActionOutcome => {
    const cell = activeCell(notebook);
    if (!cell) {
      return failure("No active cell");
    }
    cell.source = message.code;
    return { status: "ok", cellId: cell.id };
  };

  const execute = async (notebook: NotebookDocument): Promise<ActionOutcome> => {
    const cell = activeCell(notebook);
    if (!cell) {
      return failure("No active cell");
    }
    const kernel = notebook.kernel;
    if (!kernel) {
      return failure("No kernel");
    }
    await cell.ready;
    await kernel.execute(cell);
    return { status: "ok", cellId: cell.id };
  };

  const dispatch = async (
    notebook: NotebookDocument,
    message: CommRequestMessage
  ): Promise<ActionOutcome> => {
    switch (message.action) {
      case "insert_below":
        return insertBelow(notebook, message);
      case "insert_above":
        return insertAbove(notebook, message);
      case "replace":
        return replace(notebook, message);
      case "execute":
        return execute(notebook);
      case "insert_and_run": {
        const inserted = insertBelow(notebook, message);
        if (inserted.status === "error") {
          return inserted;
        }
        await delay(settleDelayMs);
        return execute(notebook);
      }
      default:
        return failure(`Unknown action: ${message.action}`);
    }
  };

  const handle = async (raw: unknown): Promise<CommResponseMessage> => {
    const parsed = commRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return { status: "error", message: "Malformed action request" };
    }
    const message = parsed.data;
    const reply = (outcome: ActionOutcome): CommResponseMessage =>
      outcome.status === "ok"
        ? {
            request_id: message.request_id,
            status: "ok",
            ...(outcome.cellId ? { cell_id: outcome.cellId } : {}),
          }
        : {
            request_id: message.request_id,
            status: "error",
            message: outcome.message,
          };

    const notebook = options.tracker.currentNotebook();
    if (!notebook) {
      return reply(failure(NO_ACTIVE_NOTEBOOK));
    }

    try {
      return reply(await dispatch(notebook, message));
    } catch (error) {
      return reply(failure(String(error)));
    }
  };

  return { handle };
}

/**
 * Bind a notebook handler to the Comm Bridge through an in-process channel.
 * Returns the unregister function.
 */
export function connectNotebookFrontend(
  bridge: CommBridge,
  connectionId: string,
  handler: NotebookActionHandler
): () => void {
  return bridge.register(connectionId, {
    send(message) {
      handler
        .handle(message)
        .then((reply) => bridge.receive(connectionId, reply))
        .catch((error: unknown) => {
          bridge.receive(connectionId, {
            request_id: message.request_id,
            status: "error",
            message: String(error),
          });
        });
    },
  });
}
