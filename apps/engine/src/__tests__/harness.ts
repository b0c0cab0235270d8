import { mergeDeep, resolveEngineConfig } from "@cellhand/config";
import type { ApprovalHandler } from "../agents/session-manager";
import type { SessionEvent, SessionState } from "../agents/types";
import {
  connectNotebookFrontend,
  createNotebookActionHandler,
  type NotebookCell,
  type NotebookDocument,
} from "../comm/notebook";
import { createEngine, type Engine } from "../engine";
import { silentLogger } from "../logger";
import {
  createFakeSpawn,
  echoBehaviour,
  type FakeAgentBehaviour,
  type FakeSpawn,
} from "./fake-agent";

/** Short timeouts and no mode prompt, so tests see only their own prompts. */
export const TEST_CONFIG_OVERRIDES = {
  modes: { learn: { systemPrompt: null } },
  timeouts: {
    startMs: 100,
    shutdownGraceMs: 20,
    killGraceMs: 20,
    forceKillWaitMs: 10,
    commAckMs: 200,
  },
};

export type HarnessOptions = {
  behaviour?: FakeAgentBehaviour | ((index: number) => FakeAgentBehaviour);
  /** Merged over TEST_CONFIG_OVERRIDES and the defaults */
  config?: unknown;
  approvals?: ApprovalHandler;
};

export type Harness = {
  engine: Engine;
  fake: FakeSpawn;
  sessions: Engine["sessions"];
};

export function createHarness(options: HarnessOptions = {}): Harness {
  const fake = createFakeSpawn(options.behaviour ?? echoBehaviour);
  const config = resolveEngineConfig(
    mergeDeep(TEST_CONFIG_OVERRIDES, options.config)
  );
  let counter = 0;
  const engine = createEngine({
    config,
    logger: silentLogger,
    spawnProcess: fake.spawn,
    mode: "learn",
    createId: () => `id-${++counter}`,
    ...(options.approvals ? { approvals: options.approvals } : {}),
  });
  return { engine, fake, sessions: engine.sessions };
}

export type TestNotebook = {
  document: NotebookDocument;
  /** Sources of executed cells, in order */
  executed: string[];
  disconnect: () => void;
};

/** Connect an in-memory notebook to the engine's comm bridge. */
export function connectTestNotebook(
  engine: Engine,
  connectionId = "nb-1"
): TestNotebook {
  const executed: string[] = [];
  const document: NotebookDocument = {
    cells: [],
    activeCellIndex: -1,
    kernel: {
      execute(cell: NotebookCell) {
        executed.push(cell.source);
      },
    },
  };
  let cellCounter = 0;
  const handler = createNotebookActionHandler({
    tracker: { currentNotebook: () => document },
    createCellId: () => `cell-${++cellCounter}`,
    settleDelayMs: 0,
  });
  const disconnect = connectNotebookFrontend(engine.comm, connectionId, handler);
  return { document, executed, disconnect };
}

/** Record the target state of every transition of one session. */
export function recordStates(harness: Harness, sessionId: string) {
  const states: SessionState[] = [];
  harness.sessions.subscribe(sessionId, (event: SessionEvent) => {
    if (event.type === "state") {
      states.push(event.to);
    }
  });
  return states;
}
