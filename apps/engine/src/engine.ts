import type { EngineConfig } from "@cellhand/config";
import { createModeController, type ModeController } from "./agents/modes";
import {
  createProcessBridge,
  type ProcessBridge,
  type SpawnAgentProcess,
} from "./agents/process-bridge";
import { createPrefixRouter, type PrefixRouter } from "./agents/router";
import {
  type ApprovalHandler,
  createSessionManager,
  type SessionManager,
} from "./agents/session-manager";
import { type CommBridge, createCommBridge } from "./comm/bridge";
import { loadEngineConfig } from "./config/context";
import { type ControlSurface, createControlSurface } from "./control/surface";
import {
  createEngineLogger,
  createPinoInstance,
  type EngineLogger,
} from "./logger";

export type EngineOptions = {
  config: EngineConfig;
  logger?: EngineLogger;
  spawnProcess?: SpawnAgentProcess;
  approvals?: ApprovalHandler;
  /** Initial mode; falls back to CELLHAND_MODE, then the configured default */
  mode?: string;
  now?: () => Date;
  createId?: () => string;
};

export type Engine = {
  readonly config: EngineConfig;
  readonly router: PrefixRouter;
  readonly modes: ModeController;
  readonly bridge: ProcessBridge;
  readonly comm: CommBridge;
  readonly sessions: SessionManager;
  readonly control: ControlSurface;
};

export function createEngine(options: EngineOptions): Engine {
  const { config } = options;
  const logger = options.logger ?? createEngineLogger(createPinoInstance());
  const router = createPrefixRouter(config.agents);
  const modes = createModeController(
    config.modes,
    options.mode ?? process.env.CELLHAND_MODE ?? config.defaultMode
  );
  const bridge = createProcessBridge({
    logger: logger.child({ component: "process-bridge" }),
    timeouts: config.timeouts,
    ...(options.spawnProcess ? { spawnProcess: options.spawnProcess } : {}),
  });
  const comm = createCommBridge({
    logger: logger.child({ component: "comm-bridge" }),
    ackTimeoutMs: config.timeouts.commAckMs,
  });
  const sessions = createSessionManager({
    config,
    router,
    modes,
    bridge,
    comm,
    logger: logger.child({ component: "session-manager" }),
    ...(options.approvals ? { approvals: options.approvals } : {}),
    ...(options.now ? { now: options.now } : {}),
    ...(options.createId ? { createId: options.createId } : {}),
  });
  const control = createControlSurface({ sessions, modes });

  return { config, router, modes, bridge, comm, sessions, control };
}

/** Load the workspace config, then build an engine from it. */
export async function loadEngine(
  options: Omit<EngineOptions, "config"> & { workspaceRoot?: string } = {}
): Promise<Engine> {
  const { workspaceRoot, ...rest } = options;
  const config = await loadEngineConfig(workspaceRoot);
  return createEngine({ ...rest, config });
}
