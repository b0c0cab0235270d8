import { describe, expect, it } from "vitest";
import { SessionNotFound, UnknownMode } from "../../agents/errors";
import { createHarness } from "../harness";

describe("createControlSurface", () => {
  it("targets the most recently active session by default", async () => {
    const { engine, sessions } = createHarness();
    await sessions.start("codex");
    await sessions.start("claude");

    expect(engine.control.status().id).toBe("id-2");
    expect(engine.control.status("id-1").agentKind).toBe("codex");
    expect(engine.control.sessions().map((session) => session.id)).toEqual([
      "id-1",
      "id-2",
    ]);
  });

  it("stops and resumes through the same session", async () => {
    const { engine, sessions } = createHarness();
    await sessions.start("codex");

    const stopped = await engine.control.stop();
    const resumed = await engine.control.resume();

    expect(stopped).toMatchObject({ id: "id-1", state: "stopped" });
    expect(resumed).toMatchObject({ id: "id-1", state: "idle" });
  });

  it("raises SessionNotFound when there is nothing to target", async () => {
    const { engine } = createHarness();

    expect(() => engine.control.status()).toThrow(new SessionNotFound());
    await expect(engine.control.stop()).rejects.toThrow("No active session");
    expect(() => engine.control.status("missing")).toThrow(
      "Session missing not found"
    );
  });

  it("reads and switches the mode", () => {
    const { engine } = createHarness();

    expect(engine.control.mode().name).toBe("learn");
    expect(engine.control.mode("Direct").name).toBe("direct");
    expect(engine.control.mode().name).toBe("direct");
    expect(() => engine.control.mode("loud")).toThrow(UnknownMode);
  });
});
