import { Context, Effect, Layer } from "effect";
import { EngineConfigService } from "../config/context";
import { createEngine, type Engine, type EngineOptions } from "../engine";
import { LoggerService } from "../logger";
import type { SubmitOptions } from "./session-manager";
import type { AgentKind, ModeConfig, SessionSnapshot } from "./types";

export type AgentSessionError = {
  readonly _tag: "AgentSessionError";
  readonly cause: unknown;
};

const makeAgentSessionError = (cause: unknown): AgentSessionError => ({
  _tag: "AgentSessionError",
  cause,
});

const wrapSync =
  <Args extends unknown[], Result>(fn: (...args: Args) => Result) =>
  (...args: Args): Effect.Effect<Result, AgentSessionError> =>
    Effect.try({
      try: () => fn(...args),
      catch: (cause) => makeAgentSessionError(cause),
    });

const wrapAsync =
  <Args extends unknown[], Result>(fn: (...args: Args) => Promise<Result>) =>
  (...args: Args): Effect.Effect<Result, AgentSessionError> =>
    Effect.tryPromise({
      try: () => fn(...args),
      catch: (cause) => makeAgentSessionError(cause),
    });

export type AgentSessionService = {
  readonly engine: Engine;
  readonly submit: (
    text: string,
    options?: SubmitOptions
  ) => Effect.Effect<string, AgentSessionError>;
  readonly start: (
    agentKind: AgentKind
  ) => Effect.Effect<SessionSnapshot, AgentSessionError>;
  readonly status: (
    sessionId?: string
  ) => Effect.Effect<SessionSnapshot, AgentSessionError>;
  readonly listSessions: Effect.Effect<SessionSnapshot[]>;
  readonly stop: (
    sessionId?: string
  ) => Effect.Effect<SessionSnapshot, AgentSessionError>;
  readonly resume: (
    sessionId?: string
  ) => Effect.Effect<SessionSnapshot, AgentSessionError>;
  readonly destroy: (
    sessionId: string
  ) => Effect.Effect<void, AgentSessionError>;
  readonly mode: (
    name?: string
  ) => Effect.Effect<ModeConfig, AgentSessionError>;
  readonly shutdown: Effect.Effect<void, AgentSessionError>;
};

export const AgentSessionService = Context.GenericTag<AgentSessionService>(
  "@cellhand/engine/AgentSessionService"
);

export const makeAgentSessionService = (
  engine: Engine
): AgentSessionService => {
  const { sessions, control } = engine;
  return {
    engine,
    submit: (text, options) => wrapSync(sessions.submit)(text, options),
    start: (agentKind) => wrapAsync(sessions.start)(agentKind),
    status: (sessionId) => wrapSync(control.status)(sessionId),
    listSessions: Effect.sync(() => control.sessions()),
    stop: (sessionId) => wrapAsync(control.stop)(sessionId),
    resume: (sessionId) => wrapAsync(control.resume)(sessionId),
    destroy: (sessionId) => wrapAsync(sessions.destroy)(sessionId),
    mode: (name) => wrapSync(control.mode)(name),
    shutdown: wrapAsync(sessions.shutdown)(),
  };
};

/** Layer building the engine from the loaded config and shared logger. */
export const makeAgentSessionLayer = (
  overrides: Omit<EngineOptions, "config" | "logger"> = {}
) =>
  Layer.effect(
    AgentSessionService,
    Effect.gen(function* () {
      const configService = yield* EngineConfigService;
      const loggerService = yield* LoggerService;
      const config = yield* configService.load();
      const engine = createEngine({
        ...overrides,
        config,
        logger: loggerService.engine,
      });
      yield* loggerService.info("Agent session engine ready", {
        mode: engine.modes.getMode().name,
      });
      return makeAgentSessionService(engine);
    })
  );

export const AgentSessionLayer = makeAgentSessionLayer();
