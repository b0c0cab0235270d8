import { Context, Effect, Layer } from "effect";
import pino from "pino";

export type LogContext = Record<string, unknown>;

/** Synchronous logger handed to components outside the Effect runtime. */
export type EngineLogger = {
  readonly debug: (message: string, context?: LogContext) => void;
  readonly info: (message: string, context?: LogContext) => void;
  readonly warn: (message: string, context?: LogContext) => void;
  readonly error: (message: string, context?: LogContext) => void;
  readonly child: (context: LogContext) => EngineLogger;
};

export type LogFn = (
  message: string,
  context?: LogContext
) => Effect.Effect<void>;

export type LoggerService = {
  readonly debug: LogFn;
  readonly info: LogFn;
  readonly warn: LogFn;
  readonly error: LogFn;
  readonly child: (context: LogContext) => LoggerService;
  /** Plain view over the same pino instance */
  readonly engine: EngineLogger;
};

export const LoggerService = Context.GenericTag<LoggerService>(
  "@cellhand/engine/LoggerService"
);

const STDERR_FD = 2;

export const createPinoInstance = (
  level: string = process.env.LOG_LEVEL ?? "info"
): pino.Logger =>
  pino({ level, name: "cellhand" }, pino.destination({ fd: STDERR_FD }));

export const createEngineLogger = (instance: pino.Logger): EngineLogger => {
  const log =
    (level: pino.Level) => (message: string, context?: LogContext) => {
      if (context) {
        instance[level](context, message);
      } else {
        instance[level](message);
      }
    };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
    child: (context) => createEngineLogger(instance.child(context)),
  } satisfies EngineLogger;
};

const createLoggerService = (instance: pino.Logger): LoggerService => {
  const engine = createEngineLogger(instance);
  const log =
    (level: "debug" | "info" | "warn" | "error"): LogFn =>
    (message, context) =>
      Effect.sync(() => engine[level](message, context));

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
    child: (context) => createLoggerService(instance.child(context)),
    engine,
  } satisfies LoggerService;
};

export const LoggerLayer = Layer.sync(LoggerService, () =>
  createLoggerService(createPinoInstance())
);

export const silentLogger: EngineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
