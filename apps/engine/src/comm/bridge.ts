import { randomUUID } from "node:crypto";
import type { ActionPayload } from "../agents/types";
import type { EngineLogger } from "../logger";
import {
  type CommAction,
  type CommRequestMessage,
  type CommResult,
  commResponseSchema,
  fromResponseMessage,
  toCommAction,
  toRequestMessage,
} from "./protocol";

export const NO_ACTIVE_NOTEBOOK = "No active notebook";
export const CHANNEL_CLOSED = "Comm channel closed";
export const ACK_TIMEOUT = "Timed out waiting for frontend acknowledgment";

/** Outgoing side of one frontend binding. */
export type CommTransport = {
  send(message: CommRequestMessage): void;
};

export type PerformActionParams = {
  /** Frontend binding to use; the most recently registered one when omitted */
  connectionId?: string;
  sessionId: string;
  requestId: string;
  kind: string;
  payload: ActionPayload;
};

export type PerformedEffect = {
  /** Action sent to the frontend for this effect */
  readonly action: string;
  readonly result: CommResult;
};

export type CommBridge = {
  register(connectionId: string, transport: CommTransport): () => void;
  /** Deliver a raw reply from the frontend */
  receive(connectionId: string, raw: unknown): void;
  /**
   * Carry out one agent action. Returns one result per frontend effect:
   * two for `insert_and_run`, one otherwise.
   */
  perform(params: PerformActionParams): Promise<PerformedEffect[]>;
  connections(): readonly string[];
};

export type CommBridgeDependencies = {
  logger: EngineLogger;
  ackTimeoutMs: number;
  createRequestId: () => string;
};

type PendingReply = {
  requestId: string;
  resolve: (result: CommResult) => void;
  timer: ReturnType<typeof setTimeout>;
};

type Connection = {
  id: string;
  transport: CommTransport;
  pending: PendingReply[];
};

const errorResult = (message: string): CommResult => ({
  status: "error",
  message,
});

/** Effects a CommAction expands to, in the order they must be issued. */
const toEffects = (action: CommAction): CommRequestMessage[] => {
  const message = (name: string, cellType?: string, code?: string) =>
    toRequestMessage("", name, cellType, code);

  switch (action.type) {
    case "execute":
      return [message("execute")];
    case "insert_and_run":
      return [
        message("insert_below", action.cellType, action.code),
        message("execute"),
      ];
    default:
      return [message(action.type, action.cellType, action.code)];
  }
};

export function createCommBridge(
  overrides: Partial<CommBridgeDependencies> &
    Pick<CommBridgeDependencies, "logger">
): CommBridge {
  const deps: CommBridgeDependencies = {
    ackTimeoutMs: 30_000,
    createRequestId: randomUUID,
    ...overrides,
  };
  const connections = new Map<string, Connection>();

  const settle = (
    connection: Connection,
    pending: PendingReply,
    result: CommResult
  ) => {
    clearTimeout(pending.timer);
    const index = connection.pending.indexOf(pending);
    if (index >= 0) {
      connection.pending.splice(index, 1);
    }
    pending.resolve(result);
  };

  const resolveConnection = (connectionId?: string): Connection | undefined => {
    if (connectionId) {
      return connections.get(connectionId);
    }
    let latest: Connection | undefined;
    for (const connection of connections.values()) {
      latest = connection;
    }
    return latest;
  };

  const request = (
    connection: Connection,
    message: CommRequestMessage
  ): Promise<CommResult> =>
    new Promise<CommResult>((resolve) => {
      const requestId = deps.createRequestId();
      const pending: PendingReply = {
        requestId,
        resolve,
        timer: setTimeout(() => {
          deps.logger.warn("Frontend did not acknowledge action", {
            connectionId: connection.id,
            requestId,
            action: message.action,
          });
          settle(connection, pending, errorResult(ACK_TIMEOUT));
        }, deps.ackTimeoutMs),
      };
      connection.pending.push(pending);

      try {
        connection.transport.send({ ...message, request_id: requestId });
      } catch (error) {
        settle(
          connection,
          pending,
          errorResult(error instanceof Error ? error.message : String(error))
        );
      }
    });

  const register = (connectionId: string, transport: CommTransport) => {
    const existing = connections.get(connectionId);
    if (existing) {
      closeConnection(existing);
    }
    const connection: Connection = { id: connectionId, transport, pending: [] };
    connections.set(connectionId, connection);
    deps.logger.debug("Comm connection registered", { connectionId });

    return () => {
      if (connections.get(connectionId) === connection) {
        connections.delete(connectionId);
        closeConnection(connection);
      }
    };
  };

  const closeConnection = (connection: Connection) => {
    for (const pending of [...connection.pending]) {
      settle(connection, pending, errorResult(CHANNEL_CLOSED));
    }
  };

  const receive = (connectionId: string, raw: unknown) => {
    const connection = connections.get(connectionId);
    if (!connection) {
      deps.logger.warn("Reply for unknown comm connection", { connectionId });
      return;
    }

    const parsed = commResponseSchema.safeParse(raw);
    if (!parsed.success) {
      deps.logger.warn("Ignoring unparseable frontend reply", {
        connectionId,
        issues: parsed.error.errors.map((issue) => issue.message),
      });
      return;
    }

    const reply = parsed.data;
    const pending = reply.request_id
      ? connection.pending.find((entry) => entry.requestId === reply.request_id)
      : connection.pending[0];
    if (!pending) {
      deps.logger.warn("Frontend reply matched no pending action", {
        connectionId,
        requestId: reply.request_id,
      });
      return;
    }

    settle(connection, pending, fromResponseMessage(reply));
  };

  const perform = async (
    params: PerformActionParams
  ): Promise<PerformedEffect[]> => {
    const translated = toCommAction(params.kind, params.payload);
    if (translated.isErr()) {
      deps.logger.warn("Agent requested an unknown action", {
        sessionId: params.sessionId,
        requestId: params.requestId,
        action: params.kind,
      });
      return [{ action: params.kind, result: translated.error }];
    }

    const effects = toEffects(translated.value);
    const performed: PerformedEffect[] = [];
    // Effects are issued strictly one after another: the second is only sent
    // once the first has a result, whatever its status.
    for (const effect of effects) {
      const connection = resolveConnection(params.connectionId);
      const result = connection
        ? await request(connection, effect)
        : errorResult(NO_ACTIVE_NOTEBOOK);
      performed.push({ action: effect.action, result });
    }
    return performed;
  };

  return {
    register,
    receive,
    perform,
    connections: () => [...connections.keys()],
  };
}
