import { spawn } from "node:child_process";
import { randomUUID } from "node:crypto";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { AgentConfig, ApprovalDecision, Timeouts } from "@cellhand/config";
import type { EngineLogger } from "../logger";
import { createAsyncEventIterator } from "../utils/async-iterator";
import { safeSync } from "../utils/result";
import { ProtocolViolation, StartFailed } from "./errors";
import { systemPromptFor } from "./modes";
import {
  type AgentKind,
  isTerminalEvent,
  type ModeConfig,
  type StreamEvent,
} from "./types";
import { createWireCodec, type WireCodec } from "./wire";

const RESUME_TOKEN_PLACEHOLDER = "{token}";
const OUTPUT_SETTLE_MS = 100;

export type ProcessExit = {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
};

export type SpawnAgentOptions = {
  command: string;
  args: string[];
  cwd?: string;
  env: Record<string, string>;
};

/** Running process as seen by the bridge. */
export type AgentProcess = {
  readonly pid?: number;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr?: Readable | null;
  kill: (signal?: NodeJS.Signals) => void;
  /** Resolves once the process is running; rejects when it cannot be spawned */
  readonly ready: Promise<void>;
  /** Resolves once the process has exited; never rejects */
  readonly exited: Promise<ProcessExit>;
};

export type SpawnAgentProcess = (options: SpawnAgentOptions) => AgentProcess;

export type AgentHandle = {
  readonly id: string;
  readonly sessionId: string;
  readonly agentKind: AgentKind;
  readonly pid?: number;
};

export type StartOptions = {
  sessionId: string;
  agentKind: AgentKind;
  agent: AgentConfig;
  mode: ModeConfig;
  resumeToken?: string;
  /** Extra priming text sent after the system prompt (replay digests) */
  primer?: string;
  /** Called for an exit that no terminate() call requested */
  onExit?: (exit: ProcessExit, handle: AgentHandle) => void;
  onResumeToken?: (token: string) => void;
  /** Aborting cancels the launch and terminates the process */
  signal?: AbortSignal;
};

export type ProcessBridge = {
  start(options: StartOptions): Promise<AgentHandle>;
  /**
   * Write one prompt and return its events. The sequence ends after the
   * first Completion or Error, or without either when the process exits.
   */
  send(
    handle: AgentHandle,
    text: string,
    signal?: AbortSignal
  ): AsyncIterable<StreamEvent>;
  respond(
    handle: AgentHandle,
    decision: ApprovalDecision,
    approvalId?: string
  ): void;
  terminate(handle: AgentHandle): Promise<void>;
  isAlive(handle: AgentHandle): boolean;
};

export type ProcessBridgeDependencies = {
  spawnProcess: SpawnAgentProcess;
  logger: EngineLogger;
  timeouts: Pick<
    Timeouts,
    "startMs" | "shutdownGraceMs" | "killGraceMs" | "forceKillWaitMs"
  >;
};

type HandleState = {
  handle: AgentHandle;
  process: AgentProcess;
  codec: WireCodec;
  agent: AgentConfig;
  logger: EngineLogger;
  alive: boolean;
  terminating: boolean;
  busy: boolean;
  listener: ((event: StreamEvent) => void) | null;
  closeChannel: (() => void) | null;
  exited: Promise<ProcessExit>;
};

/** Resolves true when `promise` settles within `ms`, false otherwise. */
const settlesWithin = (promise: Promise<unknown>, ms: number) =>
  new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    promise.then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      () => {
        clearTimeout(timer);
        resolve(true);
      }
    );
  });

type Readiness =
  | { status: "ready" }
  | { status: "timeout" }
  | { status: "aborted" }
  | { status: "failed"; error: unknown };

const awaitReady = (child: AgentProcess, ms: number, signal?: AbortSignal) =>
  new Promise<Readiness>((resolve) => {
    const finish = (readiness: Readiness) => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      resolve(readiness);
    };
    const onAbort = () => finish({ status: "aborted" });
    const timer = setTimeout(() => finish({ status: "timeout" }), ms);
    signal?.addEventListener("abort", onAbort, { once: true });
    child.ready.then(
      () => finish({ status: "ready" }),
      (error: unknown) => finish({ status: "failed", error })
    );
  });

type PrimeOutcome = "answered" | "exited" | "timeout" | "cancelled";

const START_CANCELLED = "start was cancelled";

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const defaultSpawnAgentProcess: SpawnAgentProcess = ({
  command,
  args,
  cwd,
  env,
}) => {
  const child = spawn(command, args, {
    cwd,
    env: { ...process.env, ...env },
    stdio: ["pipe", "pipe", "pipe"],
  });

  const ready = new Promise<void>((resolve, reject) => {
    child.once("spawn", () => resolve());
    child.once("error", reject);
  });

  const exited = new Promise<ProcessExit>((resolve) => {
    child.once("close", (code, signal) => resolve({ code, signal }));
    child.once("error", () => resolve({ code: null, signal: null }));
  });

  return {
    pid: child.pid,
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    kill: (signal) => {
      child.kill(signal);
    },
    ready,
    exited,
  };
};

export const buildLaunchArgs = (
  agent: AgentConfig,
  resumeToken?: string
): string[] => {
  if (!resumeToken || agent.resumeFidelity === "replay") {
    return [...agent.args];
  }
  return [
    ...agent.args,
    ...agent.resumeArgs.map((arg) =>
      arg.replaceAll(RESUME_TOKEN_PLACEHOLDER, resumeToken)
    ),
  ];
};

export function createProcessBridge(
  overrides: Partial<ProcessBridgeDependencies> &
    Pick<ProcessBridgeDependencies, "logger" | "timeouts">
): ProcessBridge {
  const deps: ProcessBridgeDependencies = {
    spawnProcess: defaultSpawnAgentProcess,
    ...overrides,
  };
  const states = new Map<string, HandleState>();

  const stateFor = (handle: AgentHandle): HandleState => {
    const state = states.get(handle.id);
    if (!state) {
      throw new ProtocolViolation({
        sessionId: handle.sessionId,
        reason: `unknown process handle ${handle.id}`,
      });
    }
    return state;
  };

  const writeLine = (state: HandleState, line: string) => {
    state.process.stdin.write(`${line}\n`);
  };

  const handleOutputLine = (
    state: HandleState,
    line: string,
    onResumeToken?: (token: string) => void
  ) => {
    const decoded = state.codec.decodeLine(line);
    if (decoded.kind === "malformed") {
      state.logger.warn("Skipping malformed agent output", {
        reason: decoded.reason,
        line: line.slice(0, 200),
      });
      return;
    }

    if (decoded.resumeToken) {
      onResumeToken?.(decoded.resumeToken);
    }

    for (const event of decoded.events) {
      const listener = state.listener;
      if (!listener) {
        state.logger.debug("Dropping agent output outside a prompt", {
          type: event.type,
        });
        continue;
      }
      if (isTerminalEvent(event)) {
        state.busy = false;
        state.listener = null;
        state.closeChannel = null;
      }
      listener(event);
    }
  };

  const openChannel = (
    state: HandleState,
    signal?: AbortSignal
  ): AsyncIterable<StreamEvent> => {
    const { iterator, close } = createAsyncEventIterator<StreamEvent>(
      (handler) => {
        state.listener = handler;
        return () => {
          if (state.listener === handler) {
            state.listener = null;
          }
        };
      },
      { until: isTerminalEvent, signal }
    );
    state.closeChannel = close;
    return iterator;
  };

  const send = (handle: AgentHandle, text: string, signal?: AbortSignal) => {
    const state = stateFor(handle);
    if (!state.alive) {
      throw new ProtocolViolation({
        sessionId: handle.sessionId,
        reason: "prompt sent to an exited process",
      });
    }
    if (state.busy) {
      throw new ProtocolViolation({
        sessionId: handle.sessionId,
        reason: "prompt sent while another prompt is in flight",
      });
    }

    state.busy = true;
    const events = openChannel(state, signal);
    writeLine(state, state.codec.encodePrompt(text));
    return events;
  };

  /** Send the priming prompt and wait, at most `startMs`, for its answer. */
  const prime = async (
    state: HandleState,
    text: string,
    signal?: AbortSignal
  ): Promise<PrimeOutcome> => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), deps.timeouts.startMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      for await (const event of send(state.handle, text, controller.signal)) {
        if (event.type === "error") {
          state.logger.warn("Agent rejected priming prompt", {
            message: event.message,
          });
        }
        if (isTerminalEvent(event)) {
          return "answered";
        }
      }
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
    if (signal?.aborted) {
      return "cancelled";
    }
    return controller.signal.aborted ? "timeout" : "exited";
  };

  const start = async (options: StartOptions): Promise<AgentHandle> => {
    const { agent, agentKind, sessionId, signal } = options;
    const logger = deps.logger.child({ sessionId, agentKind });
    if (signal?.aborted) {
      throw new StartFailed({ agentKind, reason: START_CANCELLED });
    }

    const spawned = safeSync(() =>
      deps.spawnProcess({
        command: agent.command,
        args: buildLaunchArgs(agent, options.resumeToken),
        cwd: agent.cwd,
        env: agent.env,
      })
    );
    if (spawned.isErr()) {
      throw new StartFailed({
        agentKind,
        reason: spawned.error.message,
        cause: spawned.error,
      });
    }
    const child = spawned.value;

    const readiness = await awaitReady(child, deps.timeouts.startMs, signal);
    if (readiness.status !== "ready") {
      safeSync(() => child.kill("SIGKILL"));
      throw new StartFailed({
        agentKind,
        reason:
          readiness.status === "failed"
            ? describeError(readiness.error)
            : readiness.status === "aborted"
              ? START_CANCELLED
              : `process did not become ready within ${deps.timeouts.startMs}ms`,
        cause: readiness.status === "failed" ? readiness.error : undefined,
      });
    }

    const handle: AgentHandle = {
      id: randomUUID(),
      sessionId,
      agentKind,
      pid: child.pid,
    };
    const state: HandleState = {
      handle,
      process: child,
      codec: createWireCodec(agent.protocol),
      agent,
      logger,
      alive: true,
      terminating: false,
      busy: false,
      listener: null,
      closeChannel: null,
      exited: child.exited,
    };
    states.set(handle.id, state);

    child.stdin.on("error", (error) => {
      logger.warn("Agent stdin closed", { error: error.message });
    });

    const stdout = createInterface({
      input: child.stdout,
      crlfDelay: Number.POSITIVE_INFINITY,
    });
    const stdoutClosed = new Promise<void>((resolve) => {
      stdout.once("close", () => resolve());
    });
    stdout.on("line", (line) =>
      handleOutputLine(state, line, options.onResumeToken)
    );

    if (child.stderr) {
      const stderr = createInterface({ input: child.stderr });
      stderr.on("line", (line) => {
        logger.debug("Agent stderr", { line });
      });
    }

    child.exited
      .then(async (exit) => {
        await settlesWithin(stdoutClosed, OUTPUT_SETTLE_MS);
        state.alive = false;
        state.busy = false;
        states.delete(handle.id);
        if (state.terminating) {
          logger.info("Agent process exited", { ...exit });
        } else {
          logger.warn("Agent process exited unexpectedly", { ...exit });
          options.onExit?.(exit, handle);
        }
        const closeChannel = state.closeChannel;
        state.listener = null;
        state.closeChannel = null;
        closeChannel?.();
      })
      .catch((error: unknown) => {
        logger.error("Failed to handle agent exit", {
          error: describeError(error),
        });
      });

    const priming = [
      options.resumeToken && agent.resumeFidelity === "provider"
        ? null
        : systemPromptFor(options.mode, agentKind),
      options.primer ?? null,
    ]
      .filter((part): part is string => Boolean(part))
      .join("\n\n");

    const outcome: PrimeOutcome = priming
      ? await prime(state, priming, signal)
      : "answered";
    if (outcome === "timeout") {
      state.terminating = true;
      safeSync(() => child.kill("SIGKILL"));
      throw new StartFailed({
        agentKind,
        reason: `process did not answer the mode prompt within ${deps.timeouts.startMs}ms`,
      });
    }
    if (outcome === "exited") {
      throw new StartFailed({
        agentKind,
        reason: "process exited while applying the mode prompt",
      });
    }
    if (outcome === "cancelled" || signal?.aborted) {
      await terminate(handle);
      throw new StartFailed({ agentKind, reason: START_CANCELLED });
    }

    logger.info("Agent process ready", { pid: child.pid });
    return handle;
  };

  const respond = (
    handle: AgentHandle,
    decision: ApprovalDecision,
    approvalId?: string
  ) => {
    const state = stateFor(handle);
    writeLine(state, state.codec.encodeDecision(decision, approvalId));
  };

  const terminate = async (handle: AgentHandle): Promise<void> => {
    const state = states.get(handle.id);
    if (!state?.alive) {
      return;
    }
    state.terminating = true;
    const { timeouts } = deps;

    if (state.agent.shutdownLine) {
      const line = state.agent.shutdownLine;
      safeSync(() => writeLine(state, line));
      safeSync(() => state.process.stdin.end());
      if (await settlesWithin(state.exited, timeouts.shutdownGraceMs)) {
        return;
      }
    }

    safeSync(() => state.process.kill("SIGTERM"));
    if (await settlesWithin(state.exited, timeouts.killGraceMs)) {
      return;
    }

    state.logger.warn("Agent ignored SIGTERM, sending SIGKILL", {
      pid: handle.pid,
    });
    safeSync(() => state.process.kill("SIGKILL"));
    await settlesWithin(state.exited, timeouts.forceKillWaitMs);
  };

  return {
    start,
    send,
    respond,
    terminate,
    isAlive: (handle) => states.get(handle.id)?.alive ?? false,
  };
}
