import { setTimeout as delay } from "node:timers/promises";
import { describe, expect, it, vi } from "vitest";
import {
  AlreadyRunning,
  RoutingError,
  SessionNotFound,
  StartFailed,
} from "../../agents/errors";
import type { SessionEvent } from "../../agents/types";
import type { CommRequestMessage } from "../../comm/protocol";
import { NEWLINE_MARKER } from "../../agents/wire";
import { echoBehaviour, turnResult } from "../fake-agent";
import { connectTestNotebook, createHarness, recordStates } from "../harness";

const transcriptKinds = (
  entries: ReadonlyArray<{ readonly kind: string }>
): string[] => entries.map((entry) => entry.kind);

describe("submit", () => {
  it("routes a direct prompt, starts the agent and dispatches the payload", async () => {
    const harness = createHarness();
    const { sessions, fake } = harness;

    const requestId = sessions.submit("@ hello");

    expect(requestId).toBe("id-2");
    expect(sessions.getRequest(requestId)).toMatchObject({
      sessionId: "id-1",
      text: "hello",
    });
    expect(sessions.status("id-1").state).toBe("starting");

    await sessions.whenSettled("id-1");

    expect(fake.latest().input).toEqual(["hello"]);
    expect(sessions.getRequest(requestId)?.status).toBe("completed");
    const status = sessions.status("id-1");
    expect(status).toMatchObject({
      agentKind: "codex",
      state: "idle",
      queueDepth: 0,
      inFlightRequestId: null,
    });
    expect(transcriptKinds(status.recentTranscript)).toEqual([
      "prompt",
      "text",
      "completion",
    ]);
    expect(status.recentTranscript[2]).toMatchObject({
      requestId,
      finalMessage: "done:hello",
    });
  });

  it("sends the leading cell source with a trailing invocation", async () => {
    const { sessions, fake } = createHarness();

    sessions.submit("x = 1\n@ explain");
    await sessions.whenSettled("id-1");

    expect(fake.latest().input).toEqual([
      `explain${NEWLINE_MARKER}${NEWLINE_MARKER}Cell source:${NEWLINE_MARKER}x = 1`,
    ]);
  });

  it("keeps later prompts pending until the one in flight completes", async () => {
    const { sessions, fake } = createHarness({ behaviour: {} });

    const first = sessions.submit("@ one");
    const second = sessions.submit("@ two");
    await vi.waitFor(() => expect(fake.latest().input).toEqual(["one"]));

    expect(sessions.getRequest(first)?.status).toBe("in_flight");
    expect(sessions.getRequest(second)?.status).toBe("pending");
    expect(sessions.status("id-1")).toMatchObject({
      state: "running",
      queueDepth: 1,
      inFlightRequestId: first,
    });

    fake.latest().emit(turnResult("r1"));
    await vi.waitFor(() =>
      expect(fake.latest().input).toEqual(["one", "two"])
    );
    fake.latest().emit(turnResult("r2"));
    await sessions.whenSettled("id-1");

    expect(fake.agents).toHaveLength(1);
    expect(sessions.getRequest(first)?.status).toBe("completed");
    expect(sessions.getRequest(second)?.status).toBe("completed");
  });

  it("rejects text without a prefix and creates no session", () => {
    const { sessions } = createHarness();

    expect(() => sessions.submit("print('hi')")).toThrow(RoutingError);
    expect(sessions.listSessions()).toEqual([]);
  });

  it("rejects a submission routed to another agent kind", () => {
    const { sessions } = createHarness();

    expect(() => sessions.submit("@ hi", { agentKind: "claude" })).toThrow(
      'Prefix "@" routes to codex, not claude'
    );
    expect(sessions.listSessions()).toEqual([]);
  });

  it("fails the head request when the agent cannot start", async () => {
    const { sessions } = createHarness({
      behaviour: { failToStart: new Error("boom") },
    });

    const requestId = sessions.submit("@ hello");
    await sessions.whenSettled("id-1");

    expect(sessions.getRequest(requestId)).toMatchObject({
      status: "failed",
      error: "Failed to start codex: boom",
    });
    const status = sessions.status("id-1");
    expect(status.state).toBe("idle");
    expect(status.recentTranscript).toEqual([
      expect.objectContaining({
        kind: "error",
        requestId,
        message: "Failed to start codex: boom",
      }),
    ]);
  });

  it("fails the head request when the agent never answers the mode prompt", async () => {
    const { sessions, fake } = createHarness({
      behaviour: {},
      config: { modes: { learn: { systemPrompt: "be brief" } } },
    });

    const requestId = sessions.submit("@ hello");
    await sessions.whenSettled("id-1");

    expect(sessions.getRequest(requestId)).toMatchObject({
      status: "failed",
      error:
        "Failed to start codex: process did not answer the mode prompt within 100ms",
    });
    expect(sessions.status("id-1").state).toBe("idle");
    expect(fake.latest().input).toEqual(["be brief"]);
    expect(fake.latest().signals).toEqual(["SIGKILL"]);
  });

  it("tracks the most recently active session", async () => {
    const { sessions } = createHarness();

    sessions.submit("@ one");
    sessions.submit("^ two");

    expect(sessions.lastActiveSessionId()).toBe("id-3");
    await sessions.whenSettled("id-1");
    await sessions.whenSettled("id-3");
  });
});

describe("cell actions", () => {
  it("runs insert_and_run as an insert followed by an execute", async () => {
    const harness = createHarness({
      behaviour: {
        onInput(_line, agent) {
          agent.emit({
            type: "cell.action",
            action: "insert_and_run",
            code: "print(1)",
          });
          agent.emit(turnResult("done"));
        },
      },
    });
    const notebook = connectTestNotebook(harness.engine);
    const { sessions } = harness;

    const requestId = sessions.submit("@ add a cell");
    const states = recordStates(harness, "id-1");
    await sessions.whenSettled("id-1");

    expect(states).toEqual(["running", "waiting_approval", "running", "idle"]);
    expect(notebook.executed).toEqual(["print(1)"]);
    expect(notebook.document.cells.map((cell) => cell.source)).toEqual([
      "print(1)",
    ]);
    const results = sessions
      .status("id-1")
      .recentTranscript.filter((entry) => entry.kind === "action_result");
    expect(results).toEqual([
      expect.objectContaining({
        requestId,
        action: "insert_below",
        status: "ok",
        cellId: "cell-1",
      }),
      expect.objectContaining({
        requestId,
        action: "execute",
        status: "ok",
        cellId: "cell-1",
      }),
    ]);
    expect(sessions.getRequest(requestId)?.status).toBe("completed");
  });

  it("drops queued actions of a prompt that was stopped", async () => {
    const { engine, sessions } = createHarness({
      behaviour: {
        onInput(_line, agent) {
          agent.emit({ type: "cell.action", action: "insert_below", code: "a" });
          agent.emit({ type: "cell.action", action: "insert_below", code: "b" });
        },
      },
      config: { timeouts: { commAckMs: 5000 } },
    });
    const sent: CommRequestMessage[] = [];
    engine.comm.register("nb", {
      send(message) {
        sent.push(message);
      },
    });

    sessions.submit("@ add two cells");
    await vi.waitFor(() => {
      const kinds = transcriptKinds(sessions.status("id-1").recentTranscript);
      expect(kinds.filter((kind) => kind === "action")).toHaveLength(2);
      expect(sent).toHaveLength(1);
    });

    await sessions.stop("id-1");
    const first = sent[0];
    if (first) {
      engine.comm.receive("nb", {
        request_id: first.request_id,
        status: "ok",
        cell_id: "cell-a",
      });
    }
    await sessions.whenSettled("id-1");

    expect(sent.map((message) => message.code)).toEqual(["a"]);
  });

  it("records unknown actions as frontend errors", async () => {
    const { sessions } = createHarness({
      behaviour: {
        onInput(_line, agent) {
          agent.emit({ type: "cell.action", action: "frobnicate" });
          agent.emit(turnResult("done"));
        },
      },
    });

    const requestId = sessions.submit("@ go");
    await sessions.whenSettled("id-1");

    const transcript = sessions.status("id-1").recentTranscript;
    expect(transcript).toContainEqual(
      expect.objectContaining({
        kind: "action_result",
        action: "frobnicate",
        status: "error",
        message: "Unknown action: frobnicate",
      })
    );
    expect(transcript).toContainEqual(
      expect.objectContaining({
        kind: "error",
        requestId,
        message: "Frontend rejected frobnicate: Unknown action: frobnicate",
      })
    );
    expect(sessions.getRequest(requestId)?.status).toBe("completed");
  });

  it("reports a missing notebook for acknowledged actions", async () => {
    const { sessions } = createHarness({
      behaviour: {
        onInput(_line, agent) {
          agent.emit({ type: "cell.action", action: "execute" });
          agent.emit(turnResult("done"));
        },
      },
    });

    sessions.submit("@ run it");
    await sessions.whenSettled("id-1");

    expect(sessions.status("id-1").recentTranscript).toContainEqual(
      expect.objectContaining({
        kind: "action_result",
        action: "execute",
        status: "error",
        message: "No active notebook",
      })
    );
  });
});

describe("approvals", () => {
  const approvalBehaviour = {
    onInput(line: string, agent: { emit(line: unknown): void }) {
      if (line.startsWith("{")) {
        agent.emit(turnResult("finished"));
        return;
      }
      agent.emit({ type: "approval.request", id: "ap-1", command: "ls" });
    },
  };

  it("asks the approval handler and forwards its decision", async () => {
    const approvals = vi.fn(() => "approve" as const);
    const { sessions, fake } = createHarness({
      behaviour: approvalBehaviour,
      approvals,
    });

    const requestId = sessions.submit("@ list files");
    await sessions.whenSettled("id-1");

    expect(approvals).toHaveBeenCalledWith({
      sessionId: "id-1",
      agentKind: "codex",
      requestId,
      request: {
        id: "ap-1",
        kind: "command",
        command: "ls",
        cwd: undefined,
        reason: undefined,
      },
    });
    expect(fake.latest().input).toEqual([
      "list files",
      '{"type":"approval.response","id":"ap-1","decision":"approve"}',
    ]);
    expect(sessions.status("id-1").recentTranscript).toContainEqual(
      expect.objectContaining({ kind: "approval", decision: "approve" })
    );
    expect(sessions.getRequest(requestId)?.status).toBe("completed");
  });

  it("falls back to the default decision when the handler fails", async () => {
    const { sessions, fake } = createHarness({
      behaviour: approvalBehaviour,
      approvals: () => {
        throw new Error("no reviewer");
      },
    });

    sessions.submit("@ list files");
    await sessions.whenSettled("id-1");

    expect(fake.latest().input[1]).toBe(
      '{"type":"approval.response","id":"ap-1","decision":"deny"}'
    );
  });
});

describe("stop and resume", () => {
  it("cancels in-flight and queued prompts and terminates the process", async () => {
    const { sessions, fake } = createHarness({
      behaviour: (index) => (index === 0 ? {} : echoBehaviour),
    });

    const first = sessions.submit("@ one");
    const second = sessions.submit("@ two");
    await vi.waitFor(() => expect(fake.latest().input).toEqual(["one"]));
    fake.latest().emit({ type: "session.resume", session_id: "tok-1" });
    await vi.waitFor(() =>
      expect(sessions.status("id-1").hasResumeToken).toBe(true)
    );

    await sessions.stop("id-1");

    expect(sessions.getRequest(first)?.status).toBe("cancelled");
    expect(sessions.getRequest(second)?.status).toBe("cancelled");
    expect(sessions.status("id-1")).toMatchObject({
      state: "stopped",
      queueDepth: 0,
      inFlightRequestId: null,
    });
    expect(fake.agents[0]?.signals).toEqual(["SIGTERM"]);

    const resumed = await sessions.resume("id-1");

    expect(resumed).toMatchObject({ id: "id-1", state: "idle", queueDepth: 0 });
    expect(fake.agents).toHaveLength(2);
    expect(fake.latest().options.args).toEqual([
      "exec",
      "--json",
      "--stdin-lines",
      "--resume",
      "tok-1",
    ]);
  });

  it("cancels a launch waiting on the mode prompt", async () => {
    const { sessions, fake } = createHarness({
      behaviour: {},
      config: {
        modes: { learn: { systemPrompt: "be brief" } },
        timeouts: { startMs: 5000 },
      },
    });

    const requestId = sessions.submit("@ hello");
    await vi.waitFor(() => expect(fake.latest().input).toEqual(["be brief"]));
    expect(sessions.status("id-1").state).toBe("starting");

    await sessions.stop("id-1");
    await sessions.whenSettled("id-1");

    expect(fake.latest().signals).toEqual(["SIGTERM"]);
    expect(fake.latest().exited).toBe(true);
    expect(sessions.getRequest(requestId)?.status).toBe("cancelled");
    expect(sessions.status("id-1").state).toBe("stopped");
  });

  it("stops a resume that is still launching", async () => {
    const { sessions, fake } = createHarness({
      behaviour: (index) => (index === 0 ? echoBehaviour : {}),
      config: {
        modes: { learn: { systemPrompt: "be brief" } },
        timeouts: { startMs: 5000 },
      },
    });
    sessions.submit("@ one");
    await sessions.whenSettled("id-1");
    await sessions.stop("id-1");

    const resumed = sessions.resume("id-1").then(
      () => undefined,
      (error: unknown) => error
    );
    await vi.waitFor(() => {
      expect(fake.agents).toHaveLength(2);
      expect(fake.latest().input).toEqual(["be brief"]);
    });

    await sessions.stop("id-1");

    const failure = await resumed;
    expect(failure).toBeInstanceOf(StartFailed);
    expect(failure).toHaveProperty(
      "message",
      "Failed to start codex: start was cancelled"
    );
    expect(sessions.status("id-1").state).toBe("stopped");
    expect(fake.agents[1]?.signals).toEqual(["SIGTERM"]);
  });

  it("treats stopping a stopped session as a no-op", async () => {
    const { sessions } = createHarness();
    await sessions.start("codex");
    await sessions.stop("id-1");

    await sessions.stop("id-1");

    expect(sessions.status("id-1").state).toBe("stopped");
  });

  it("refuses to resume a session that is not stopped or crashed", async () => {
    const { sessions } = createHarness();
    await sessions.start("codex");

    await expect(sessions.resume("id-1")).rejects.toBeInstanceOf(AlreadyRunning);
  });

  it("refuses to resume an agent without resume support", async () => {
    const { sessions } = createHarness();
    await sessions.start("gemini");
    await sessions.stop("id-1");

    await expect(sessions.resume("id-1")).rejects.toThrow(
      "Agent gemini does not support resume"
    );
  });

  it("starts a new session for a kind whose session was stopped", async () => {
    const { sessions } = createHarness();
    await sessions.start("codex");
    await sessions.stop("id-1");

    sessions.submit("@ again");
    await sessions.whenSettled("id-2");

    expect(sessions.listSessions().map((session) => session.state)).toEqual([
      "stopped",
      "idle",
    ]);
  });
});

describe("process exits", () => {
  it("marks a resumable session crashed and keeps its queue", async () => {
    const { sessions, fake } = createHarness({
      behaviour: (index) => (index === 0 ? {} : echoBehaviour),
    });

    const first = sessions.submit("@ one");
    const second = sessions.submit("@ two");
    await vi.waitFor(() => expect(fake.latest().input).toEqual(["one"]));

    fake.latest().exit(1);
    await vi.waitFor(() =>
      expect(sessions.status("id-1").state).toBe("crashed")
    );

    expect(sessions.getRequest(first)).toMatchObject({
      status: "failed",
      error: "Agent process exited unexpectedly (code 1)",
    });
    expect(sessions.getRequest(second)?.status).toBe("pending");
    expect(sessions.status("id-1").queueDepth).toBe(1);

    await sessions.resume("id-1");
    await sessions.whenSettled("id-1");

    expect(fake.latest().input).toEqual(["two"]);
    expect(sessions.getRequest(second)?.status).toBe("completed");
    expect(sessions.status("id-1").state).toBe("idle");
  });

  it("marks a session without resume support failed", async () => {
    const { sessions, fake } = createHarness({ behaviour: {} });

    const requestId = sessions.submit("^ hi");
    await vi.waitFor(() => expect(fake.latest().input).toEqual(["hi"]));
    fake.latest().exit(null, "SIGSEGV");
    await vi.waitFor(() =>
      expect(sessions.status("id-1").state).toBe("failed")
    );

    expect(sessions.getRequest(requestId)?.error).toBe(
      "Agent process exited unexpectedly (signal SIGSEGV)"
    );
    await sessions.stop("id-1");
    expect(sessions.status("id-1").state).toBe("failed");
  });

  it("only drops the process when an idle session's agent exits", async () => {
    const { sessions, fake } = createHarness();
    await sessions.start("codex");

    fake.latest().exit(0);
    // Let the bridge observe the exit before the next prompt arrives.
    await delay(50);
    sessions.submit("@ hello");
    await sessions.whenSettled("id-1");

    expect(sessions.status("id-1").state).toBe("idle");
    expect(fake.agents).toHaveLength(2);
    expect(fake.latest().input).toEqual(["hello"]);
  });
});

describe("start", () => {
  it("snapshots the current mode for new sessions only", async () => {
    const harness = createHarness();
    const { sessions, engine, fake } = harness;
    await sessions.start("codex");

    engine.modes.setMode("direct");
    const gemini = await sessions.start("gemini");

    expect(sessions.status("id-1").mode.name).toBe("learn");
    expect(gemini.mode.name).toBe("direct");
    expect(gemini.state).toBe("idle");
    expect(fake.latest().input).toEqual([
      "Answer succinctly with direct solutions. Prefer inserting runnable cells over prose.",
    ]);
  });

  it("raises StartFailed when the process cannot be launched", async () => {
    const { sessions } = createHarness({
      behaviour: { failToStart: new Error("missing binary") },
    });

    await expect(sessions.start("claude")).rejects.toBeInstanceOf(StartFailed);
    expect(sessions.status("id-1").state).toBe("idle");
  });
});

describe("destroy", () => {
  it("stops the session and forgets it with its requests", async () => {
    const { sessions, fake } = createHarness();
    const requestId = sessions.submit("@ hello");
    await sessions.whenSettled("id-1");

    await sessions.destroy("id-1");

    expect(() => sessions.status("id-1")).toThrow(SessionNotFound);
    expect(sessions.getRequest(requestId)).toBeUndefined();
    expect(fake.latest().signals).toEqual(["SIGTERM"]);
  });
});

describe("events", () => {
  it("streams request updates until aborted", async () => {
    const { sessions } = createHarness();
    const requestId = sessions.submit("@ hello");
    const controller = new AbortController();
    const statuses: string[] = [];
    const collecting = (async () => {
      for await (const event of sessions.stream("id-1", controller.signal)) {
        if (event.type === "request") {
          statuses.push(event.request.status);
        }
      }
    })();

    await sessions.whenSettled("id-1");
    controller.abort();
    await collecting;

    expect(sessions.getRequest(requestId)?.status).toBe("completed");
    expect(statuses).toEqual(["in_flight", "completed"]);
  });

  it("stops every session on shutdown", async () => {
    const { sessions } = createHarness();
    await sessions.start("codex");
    await sessions.start("claude");
    const seen: SessionEvent[] = [];
    sessions.subscribe("id-2", (event) => seen.push(event));

    await sessions.shutdown();

    expect(sessions.listSessions().map((session) => session.state)).toEqual([
      "stopped",
      "stopped",
    ]);
    expect(seen).toContainEqual({
      type: "state",
      sessionId: "id-2",
      from: "idle",
      to: "stopped",
    });
  });
});
