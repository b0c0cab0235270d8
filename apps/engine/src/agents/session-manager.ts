import { randomUUID } from "node:crypto";
import type { AgentConfig, EngineConfig } from "@cellhand/config";
import { Effect, Either } from "effect";
import {
  type CommBridge,
  createCommBridge,
  type PerformedEffect,
} from "../comm/bridge";
import { requiresAcknowledgment } from "../comm/protocol";
import {
  createEngineLogger,
  createPinoInstance,
  type EngineLogger,
} from "../logger";
import { createAsyncEventIterator } from "../utils/async-iterator";
import { safeAsync } from "../utils/result";
import {
  AlreadyRunning,
  ProtocolViolation,
  ResumeUnsupported,
  RoutingError,
  SessionNotFound,
  StartFailed,
} from "./errors";
import { createEventHub } from "./events";
import { createModeController, type ModeController } from "./modes";
import {
  type AgentHandle,
  createProcessBridge,
  type ProcessBridge,
  type ProcessExit,
} from "./process-bridge";
import { createPromptQueue, type PromptQueue } from "./prompt-queue";
import {
  createPrefixRouter,
  type PrefixRouter,
  type RouteResult,
} from "./router";
import {
  type AgentKind,
  type ApprovalDecision,
  type ApprovalRequest,
  canTransition,
  type ModeConfig,
  type PromptRequest,
  type PromptRequestSnapshot,
  type SessionEvent,
  type SessionSnapshot,
  type SessionState,
  type StreamEvent,
  type TranscriptEntry,
} from "./types";

export type ApprovalContext = {
  readonly sessionId: string;
  readonly agentKind: AgentKind;
  readonly requestId: string;
  readonly request: ApprovalRequest;
};

export type ApprovalHandler = (
  context: ApprovalContext
) => Promise<ApprovalDecision> | ApprovalDecision;

export type SubmitOptions = {
  /** Reject the submission unless it routes to this agent kind */
  agentKind?: AgentKind;
  /** Frontend binding that receives this session's cell actions */
  connectionId?: string;
};

export type SessionManager = {
  /** Route and enqueue a cell submission; returns the request id immediately */
  submit(text: string, options?: SubmitOptions): string;
  start(
    agentKind: AgentKind,
    options?: Pick<SubmitOptions, "connectionId">
  ): Promise<SessionSnapshot>;
  status(sessionId: string): SessionSnapshot;
  stop(sessionId: string): Promise<void>;
  resume(sessionId: string): Promise<SessionSnapshot>;
  destroy(sessionId: string): Promise<void>;
  listSessions(): SessionSnapshot[];
  getRequest(requestId: string): PromptRequestSnapshot | undefined;
  lastActiveSessionId(): string | undefined;
  /** Resolves once no dispatch work is running or outstanding for the session */
  whenSettled(sessionId: string): Promise<void>;
  subscribe(
    sessionId: string,
    handler: (event: SessionEvent) => void
  ): () => void;
  stream(sessionId: string, signal?: AbortSignal): AsyncIterable<SessionEvent>;
  shutdown(): Promise<void>;
};

export type SessionManagerDependencies = {
  config: EngineConfig;
  router: PrefixRouter;
  modes: ModeController;
  bridge: ProcessBridge;
  comm: CommBridge;
  logger: EngineLogger;
  approvals: ApprovalHandler;
  now: () => Date;
  createId: () => string;
};

type AgentSession = {
  readonly id: string;
  readonly agentKind: AgentKind;
  readonly agent: AgentConfig;
  readonly mode: ModeConfig;
  readonly queue: PromptQueue;
  readonly transcript: TranscriptEntry[];
  readonly guard: Effect.Semaphore;
  readonly createdAt: Date;
  readonly logger: EngineLogger;
  state: SessionState;
  inFlight: PromptRequest | null;
  handle: AgentHandle | null;
  resumeToken?: string;
  connectionId?: string;
  /** Bumped whenever running work must stop touching the session */
  epoch: number;
  loop: Promise<void> | null;
  /** Aborts the event stream of the in-flight prompt */
  dispatchAbort: AbortController | null;
  /** Process launch in progress, cancelled by stop */
  launch: PendingLaunch | null;
  /** Set while resume holds the guard waiting on a launch */
  resuming: boolean;
  actions: Promise<void>;
  lastActiveAt: Date;
  activity: number;
};

type PendingLaunch = {
  readonly controller: AbortController;
  /** Settles once the launch has finished or been torn down */
  readonly settled: Promise<void>;
};

type BringUpOutcome =
  | { kind: "up" }
  | { kind: "cancelled" }
  | { kind: "failed"; error: StartFailed };

const LIVE_STATES: ReadonlySet<SessionState> = new Set([
  "idle",
  "starting",
  "running",
  "waiting_approval",
]);

const BUSY_STATES: ReadonlySet<SessionState> = new Set([
  "starting",
  "running",
  "waiting_approval",
]);

const SELF_INVOCATION_SEPARATOR = "\n\nCell source:\n";

export const composePromptText = (route: RouteResult): string =>
  route.classification === "self_invocation" && route.leadingCode
    ? `${route.payload}${SELF_INVOCATION_SEPARATOR}${route.leadingCode}`
    : route.payload;

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const describeExit = (exit: ProcessExit): string =>
  exit.signal ? `signal ${exit.signal}` : `code ${exit.code ?? "unknown"}`;

export function createSessionManager(
  overrides: Partial<SessionManagerDependencies> &
    Pick<SessionManagerDependencies, "config">
): SessionManager {
  const { config } = overrides;
  const logger = overrides.logger ?? createEngineLogger(createPinoInstance());
  const deps: SessionManagerDependencies = {
    config,
    logger,
    router: overrides.router ?? createPrefixRouter(config.agents),
    modes:
      overrides.modes ??
      createModeController(config.modes, config.defaultMode),
    bridge:
      overrides.bridge ??
      createProcessBridge({ logger, timeouts: config.timeouts }),
    comm:
      overrides.comm ??
      createCommBridge({ logger, ackTimeoutMs: config.timeouts.commAckMs }),
    approvals:
      overrides.approvals ?? (() => config.approvals.defaultDecision),
    now: overrides.now ?? (() => new Date()),
    createId: overrides.createId ?? randomUUID,
  };
  const { bridge, comm } = deps;

  const sessions = new Map<string, AgentSession>();
  const requests = new Map<string, PromptRequest>();
  const hub = createEventHub<SessionEvent>(logger);
  let activityCounter = 0;

  const requireSession = (sessionId: string): AgentSession => {
    const session = sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFound(sessionId);
    }
    return session;
  };

  const touch = (session: AgentSession) => {
    activityCounter += 1;
    session.activity = activityCounter;
    session.lastActiveAt = deps.now();
  };

  const transition = (session: AgentSession, to: SessionState) => {
    const from = session.state;
    if (from === to) {
      return;
    }
    if (!canTransition(from, to)) {
      throw new ProtocolViolation({
        sessionId: session.id,
        reason: `invalid transition ${from} -> ${to}`,
      });
    }
    session.state = to;
    session.logger.debug("Session transition", { from, to });
    hub.publish(session.id, { type: "state", sessionId: session.id, from, to });
  };

  const append = (session: AgentSession, entry: TranscriptEntry) => {
    const frozen = Object.freeze(entry);
    session.transcript.push(frozen);
    hub.publish(session.id, {
      type: "transcript",
      sessionId: session.id,
      entry: frozen,
    });
  };

  const publishRequest = (session: AgentSession, request: PromptRequest) => {
    hub.publish(session.id, {
      type: "request",
      sessionId: session.id,
      request: { ...request },
    });
  };

  const settleRequest = (
    session: AgentSession,
    request: PromptRequest,
    status: "completed" | "cancelled" | "failed",
    error?: string
  ) => {
    request.status = status;
    if (error) {
      request.error = error;
    }
    if (session.inFlight === request) {
      session.inFlight = null;
    }
    publishRequest(session, request);
  };

  const snapshot = (session: AgentSession): SessionSnapshot => {
    const limit = config.transcript.snapshotEntries;
    return {
      id: session.id,
      agentKind: session.agentKind,
      state: session.state,
      queueDepth: session.queue.size(),
      inFlightRequestId: session.inFlight?.id ?? null,
      mode: session.mode,
      resumable: session.agent.resumable,
      hasResumeToken: Boolean(session.resumeToken),
      createdAt: session.createdAt,
      lastActiveAt: session.lastActiveAt,
      recentTranscript: limit > 0 ? session.transcript.slice(-limit) : [],
    };
  };

  const liveSessionFor = (agentKind: AgentKind): AgentSession | undefined => {
    let found: AgentSession | undefined;
    for (const session of sessions.values()) {
      if (session.agentKind === agentKind && LIVE_STATES.has(session.state)) {
        found = session;
      }
    }
    return found;
  };

  const createSession = (agentKind: AgentKind): AgentSession => {
    const agent = config.agents[agentKind];
    if (!agent) {
      throw new RoutingError({
        text: agentKind,
        reason: `Agent ${agentKind} is not configured`,
      });
    }
    const id = deps.createId();
    const createdAt = deps.now();
    const session: AgentSession = {
      id,
      agentKind,
      agent,
      mode: deps.modes.snapshot(),
      queue: createPromptQueue(),
      transcript: [],
      guard: Effect.unsafeMakeSemaphore(1),
      createdAt,
      logger: logger.child({ sessionId: id, agentKind }),
      state: "idle",
      inFlight: null,
      handle: null,
      epoch: 0,
      loop: null,
      dispatchAbort: null,
      launch: null,
      resuming: false,
      actions: Promise.resolve(),
      lastActiveAt: createdAt,
      activity: 0,
    };
    sessions.set(id, session);
    session.logger.info("Session created", { mode: session.mode.name });
    return session;
  };

  /** Serializes stop and resume for one session. */
  const runExclusive = async <T>(
    session: AgentSession,
    task: () => Promise<T>
  ): Promise<T> => {
    const outcome = await Effect.runPromise(
      session.guard
        .withPermits(1)(
          Effect.tryPromise({ try: task, catch: (cause) => cause })
        )
        .pipe(Effect.either)
    );
    if (Either.isLeft(outcome)) {
      throw outcome.left;
    }
    return outcome.right;
  };

  const replayPrimer = (session: AgentSession): string | undefined => {
    if (session.agent.resumeFidelity !== "replay") {
      return;
    }
    const lines: string[] = [];
    const recent = session.transcript.slice(-config.transcript.replayEntries);
    for (const entry of recent) {
      if (entry.kind === "prompt") {
        lines.push(`User: ${entry.text}`);
      } else if (entry.kind === "completion" && entry.finalMessage) {
        lines.push(`Agent: ${entry.finalMessage}`);
      }
    }
    return lines.length > 0
      ? `Conversation so far:\n${lines.join("\n")}`
      : undefined;
  };

  const handleExit = (
    session: AgentSession,
    exit: ProcessExit,
    handle: AgentHandle
  ) => {
    if (session.handle?.id !== handle.id) {
      return;
    }
    session.handle = null;

    if (!BUSY_STATES.has(session.state)) {
      session.logger.info("Agent process exited while idle", {
        exit: describeExit(exit),
      });
      return;
    }

    session.epoch += 1;
    session.dispatchAbort?.abort();
    const message = `Agent process exited unexpectedly (${describeExit(exit)})`;
    const inFlight = session.inFlight;
    if (inFlight) {
      settleRequest(session, inFlight, "failed", message);
    }
    append(session, {
      kind: "error",
      requestId: inFlight?.id,
      message,
      at: deps.now(),
    });
    transition(session, session.agent.resumable ? "crashed" : "failed");
  };

  const launch = (session: AgentSession): Promise<AgentHandle> => {
    const controller = new AbortController();
    const started = bridge.start({
      signal: controller.signal,
      sessionId: session.id,
      agentKind: session.agentKind,
      agent: session.agent,
      mode: session.mode,
      resumeToken: session.agent.resumable ? session.resumeToken : undefined,
      primer: replayPrimer(session),
      onExit: (exit, handle) => handleExit(session, exit, handle),
      onResumeToken: (token) => {
        session.resumeToken = token;
      },
    });
    const pending: PendingLaunch = {
      controller,
      settled: started.then(
        () => undefined,
        () => undefined
      ),
    };
    session.launch = pending;
    pending.settled
      .finally(() => {
        if (session.launch === pending) {
          session.launch = null;
        }
      })
      .catch((error: unknown) => {
        session.logger.error("Failed to clear launch", {
          error: describeError(error),
        });
      });
    return started;
  };

  const toStartFailed = (session: AgentSession, error: unknown): StartFailed =>
    error instanceof StartFailed
      ? error
      : new StartFailed({
          agentKind: session.agentKind,
          reason: describeError(error),
          cause: error,
        });

  /** Launch the session's process; rejects with StartFailed. */
  const launchChecked = async (session: AgentSession): Promise<AgentHandle> => {
    let handle: AgentHandle;
    try {
      handle = await launch(session);
    } catch (error) {
      throw toStartFailed(session, error);
    }
    if (!bridge.isAlive(handle)) {
      throw new StartFailed({
        agentKind: session.agentKind,
        reason: "process exited during startup",
      });
    }
    return handle;
  };

  /**
   * Move an idle session to Running, spawning its process when none is
   * alive. Leaves the session Idle when the process cannot be started.
   */
  const bringUp = async (
    session: AgentSession,
    epoch: number
  ): Promise<BringUpOutcome> => {
    transition(session, "starting");
    if (session.handle && bridge.isAlive(session.handle)) {
      transition(session, "running");
      return { kind: "up" };
    }

    const launched = await safeAsync(
      () => launchChecked(session),
      (error) => toStartFailed(session, error)
    );
    if (session.epoch !== epoch) {
      if (launched.isOk()) {
        await bridge.terminate(launched.value);
      }
      return { kind: "cancelled" };
    }
    if (launched.isErr()) {
      session.logger.warn("Agent failed to start", {
        error: launched.error.message,
      });
      transition(session, "idle");
      return { kind: "failed", error: launched.error };
    }

    session.handle = launched.value;
    transition(session, "running");
    return { kind: "up" };
  };

  const recordResults = (
    session: AgentSession,
    requestId: string,
    effects: readonly PerformedEffect[]
  ) => {
    for (const { action, result } of effects) {
      append(session, {
        kind: "action_result",
        requestId,
        action,
        status: result.status,
        cellId: result.cellId,
        message: result.message,
        at: deps.now(),
      });
      if (result.status === "error") {
        append(session, {
          kind: "error",
          requestId,
          message: `Frontend rejected ${action}: ${result.message ?? "unknown error"}`,
          at: deps.now(),
        });
      }
    }
  };

  const handleAction = async (
    session: AgentSession,
    request: PromptRequest,
    event: Extract<StreamEvent, { type: "action" }>,
    epoch: number
  ) => {
    append(session, {
      kind: "action",
      requestId: request.id,
      action: event.kind,
      payload: event.payload,
      at: deps.now(),
    });
    const perform = () =>
      comm.perform({
        connectionId: session.connectionId,
        sessionId: session.id,
        requestId: request.id,
        kind: event.kind,
        payload: event.payload,
      });

    if (!requiresAcknowledgment(event.kind)) {
      session.actions = session.actions
        .then(async () => {
          // Skip actions left over from a stopped prompt.
          if (session.epoch !== epoch) {
            return;
          }
          const effects = await perform();
          if (sessions.get(session.id) === session) {
            recordResults(session, request.id, effects);
          }
        })
        .catch((error: unknown) => {
          session.logger.error("Cell action failed", {
            action: event.kind,
            error: describeError(error),
          });
        });
      return;
    }

    transition(session, "waiting_approval");
    // Earlier unacknowledged actions must reach the frontend first.
    await session.actions;
    const effects = await perform();
    if (session.epoch !== epoch) {
      return;
    }
    recordResults(session, request.id, effects);
    transition(session, "running");
  };

  const handleApproval = async (
    session: AgentSession,
    request: PromptRequest,
    event: Extract<StreamEvent, { type: "approval" }>,
    epoch: number
  ) => {
    transition(session, "waiting_approval");
    const decided = await safeAsync(() =>
      deps.approvals({
        sessionId: session.id,
        agentKind: session.agentKind,
        requestId: request.id,
        request: event.request,
      })
    );
    if (session.epoch !== epoch) {
      return;
    }
    let decision = config.approvals.defaultDecision;
    if (decided.isOk()) {
      decision = decided.value;
    } else {
      session.logger.error("Approval handler failed", {
        error: decided.error.message,
      });
    }

    const handle = session.handle;
    if (handle) {
      bridge.respond(handle, decision, event.request.id);
    }
    append(session, {
      kind: "approval",
      requestId: request.id,
      request: event.request,
      decision,
      at: deps.now(),
    });
    transition(session, "running");
  };

  const dispatch = async (
    session: AgentSession,
    request: PromptRequest,
    epoch: number
  ) => {
    const handle = session.handle;
    if (!handle) {
      throw new ProtocolViolation({
        sessionId: session.id,
        reason: "dispatch without a process",
      });
    }

    request.status = "in_flight";
    session.inFlight = request;
    touch(session);
    publishRequest(session, request);
    append(session, {
      kind: "prompt",
      requestId: request.id,
      text: request.text,
      at: deps.now(),
    });

    const controller = new AbortController();
    session.dispatchAbort = controller;
    try {
      await consumeEvents(
        session,
        request,
        bridge.send(handle, request.text, controller.signal),
        epoch
      );
    } finally {
      if (session.dispatchAbort === controller) {
        session.dispatchAbort = null;
      }
    }
  };

  const consumeEvents = async (
    session: AgentSession,
    request: PromptRequest,
    events: AsyncIterable<StreamEvent>,
    epoch: number
  ) => {
    for await (const event of events) {
      if (session.epoch !== epoch) {
        return;
      }
      switch (event.type) {
        case "text":
          append(session, {
            kind: "text",
            requestId: request.id,
            content: event.content,
            at: deps.now(),
          });
          break;
        case "action":
          await handleAction(session, request, event, epoch);
          break;
        case "approval":
          await handleApproval(session, request, event, epoch);
          break;
        case "completion":
          append(session, {
            kind: "completion",
            requestId: request.id,
            finalMessage: event.finalMessage,
            at: deps.now(),
          });
          settleRequest(session, request, "completed");
          return;
        case "error":
          append(session, {
            kind: "error",
            requestId: request.id,
            message: event.message,
            at: deps.now(),
          });
          settleRequest(session, request, "failed", event.message);
          return;
        default: {
          const unreachable: never = event;
          throw new ProtocolViolation({
            sessionId: session.id,
            reason: `unexpected event ${JSON.stringify(unreachable)}`,
          });
        }
      }
      if (session.epoch !== epoch) {
        return;
      }
    }
  };

  const runLoop = async (session: AgentSession, epoch: number) => {
    while (session.epoch === epoch && session.queue.size() > 0) {
      if (session.state === "idle") {
        const outcome = await bringUp(session, epoch);
        if (outcome.kind === "cancelled") {
          return;
        }
        if (outcome.kind === "failed") {
          const head = session.queue.dequeue();
          if (head) {
            settleRequest(session, head, "failed", outcome.error.message);
          }
          append(session, {
            kind: "error",
            requestId: head?.id,
            message: outcome.error.message,
            at: deps.now(),
          });
          return;
        }
      }
      if (session.state !== "running") {
        return;
      }

      const request = session.queue.dequeue();
      if (request) {
        await dispatch(session, request, epoch);
      }
    }

    if (session.epoch === epoch && session.state === "running") {
      transition(session, "idle");
    }
  };

  const stopSession = async (session: AgentSession) => {
    if (session.state === "stopped" || session.state === "failed") {
      return;
    }

    session.epoch += 1;
    session.dispatchAbort?.abort();
    const pendingLaunch = session.launch;
    pendingLaunch?.controller.abort();
    for (const request of session.queue.cancelAll()) {
      publishRequest(session, request);
    }
    const inFlight = session.inFlight;
    if (inFlight) {
      settleRequest(session, inFlight, "cancelled");
    }
    const handle = session.handle;
    session.handle = null;
    transition(session, "stopped");
    session.logger.info("Session stopped");

    if (handle) {
      await bridge.terminate(handle);
    }
    if (pendingLaunch) {
      await pendingLaunch.settled;
    }
  };

  /** Stop under the guard, first cancelling a resume that holds it. */
  const requestStop = (session: AgentSession) => {
    if (session.resuming) {
      session.launch?.controller.abort();
    }
    return runExclusive(session, () => stopSession(session));
  };

  const forceStop = async (session: AgentSession, error: unknown) => {
    session.logger.error("Session loop failed; stopping session", {
      error: describeError(error),
      violation: error instanceof ProtocolViolation,
    });
    append(session, {
      kind: "error",
      requestId: session.inFlight?.id,
      message: describeError(error),
      at: deps.now(),
    });
    await runExclusive(session, () => stopSession(session));
  };

  const drive = (
    session: AgentSession,
    work: (epoch: number) => Promise<void>
  ) => {
    const epoch = session.epoch;
    const loop = work(epoch)
      .catch((error: unknown) => forceStop(session, error))
      .catch((error: unknown) => {
        session.logger.error("Failed to stop session after loop failure", {
          error: describeError(error),
        });
      })
      .finally(() => {
        if (session.loop === loop) {
          session.loop = null;
        }
        // A resume may have taken over while this loop was winding down.
        if (
          session.epoch !== epoch &&
          session.queue.size() > 0 &&
          sessions.get(session.id) === session
        ) {
          schedule(session);
        }
      });
    session.loop = loop;
    return loop;
  };

  const schedule = (session: AgentSession) => {
    if (session.loop) {
      return;
    }
    if (session.state !== "idle" && session.state !== "running") {
      return;
    }
    drive(session, (epoch) => runLoop(session, epoch));
  };

  const submit = (text: string, options: SubmitOptions = {}): string => {
    const route = deps.router.route(text);
    if (options.agentKind && options.agentKind !== route.agentKind) {
      throw new RoutingError({
        text,
        reason: `Prefix "${route.prefix}" routes to ${route.agentKind}, not ${options.agentKind}`,
      });
    }

    const session =
      liveSessionFor(route.agentKind) ?? createSession(route.agentKind);
    if (options.connectionId) {
      session.connectionId = options.connectionId;
    }

    const request: PromptRequest = {
      id: deps.createId(),
      sessionId: session.id,
      text: composePromptText(route),
      submittedAt: deps.now(),
      status: "pending",
    };
    requests.set(request.id, request);
    session.queue.enqueue(request);
    touch(session);
    publishRequest(session, request);
    session.logger.debug("Prompt queued", {
      requestId: request.id,
      classification: route.classification,
      queueDepth: session.queue.size(),
    });

    schedule(session);
    return request.id;
  };

  const start = async (
    agentKind: AgentKind,
    options: Pick<SubmitOptions, "connectionId"> = {}
  ): Promise<SessionSnapshot> => {
    const session = liveSessionFor(agentKind) ?? createSession(agentKind);
    if (options.connectionId) {
      session.connectionId = options.connectionId;
    }
    touch(session);

    if (session.loop) {
      await session.loop;
      return snapshot(session);
    }
    if (session.state !== "idle") {
      return snapshot(session);
    }

    let failure: StartFailed | undefined;
    await drive(session, async (epoch) => {
      const outcome = await bringUp(session, epoch);
      if (outcome.kind === "failed") {
        failure = outcome.error;
        return;
      }
      if (outcome.kind === "up") {
        await runLoop(session, epoch);
      }
    });
    if (failure) {
      throw failure;
    }
    return snapshot(session);
  };

  const stop = async (sessionId: string) => {
    return requestStop(requireSession(sessionId));
  };

  const resume = async (sessionId: string) => {
    const session = requireSession(sessionId);
    return runExclusive(session, async () => {
      if (!session.agent.resumable) {
        throw new ResumeUnsupported({
          sessionId,
          agentKind: session.agentKind,
        });
      }
      const previous = session.state;
      if (previous !== "stopped" && previous !== "crashed") {
        throw new AlreadyRunning({ sessionId, state: previous });
      }

      touch(session);
      session.epoch += 1;
      const epoch = session.epoch;
      transition(session, "starting");

      session.resuming = true;
      const launched = await safeAsync(
        () => launchChecked(session),
        (error) => toStartFailed(session, error)
      ).finally(() => {
        session.resuming = false;
      });
      if (launched.isErr()) {
        if (session.epoch === epoch) {
          transition(session, previous);
        }
        throw launched.error;
      }

      session.handle = launched.value;
      transition(session, "running");
      session.logger.info("Session resumed", {
        queueDepth: session.queue.size(),
      });
      if (session.queue.size() === 0) {
        transition(session, "idle");
      } else {
        schedule(session);
      }
      return snapshot(session);
    });
  };

  const destroy = async (sessionId: string) => {
    const session = requireSession(sessionId);
    await stop(sessionId);
    await session.actions;
    sessions.delete(sessionId);
    session.resumeToken = undefined;
    for (const [id, request] of requests) {
      if (request.sessionId === sessionId) {
        requests.delete(id);
      }
    }
    hub.clear(sessionId);
    session.logger.info("Session destroyed");
  };

  const whenSettled = async (sessionId: string) => {
    const session = requireSession(sessionId);
    while (session.loop) {
      await session.loop;
    }
    await session.actions;
  };

  const lastActiveSessionId = () => {
    let latest: AgentSession | undefined;
    for (const session of sessions.values()) {
      if (!latest || session.activity > latest.activity) {
        latest = session;
      }
    }
    return latest?.id;
  };

  return {
    submit,
    start,
    status: (sessionId) => snapshot(requireSession(sessionId)),
    stop,
    resume,
    destroy,
    listSessions: () => [...sessions.values()].map(snapshot),
    getRequest: (requestId) => {
      const request = requests.get(requestId);
      return request ? { ...request } : undefined;
    },
    lastActiveSessionId,
    whenSettled,
    subscribe: (sessionId, handler) => hub.subscribe(sessionId, handler),
    stream: (sessionId, signal) =>
      createAsyncEventIterator<SessionEvent>(
        (handler) => hub.subscribe(sessionId, handler),
        { signal }
      ).iterator,
    shutdown: async () => {
      await Promise.all(
        [...sessions.values()].map((session) => requestStop(session))
      );
    },
  };
}
