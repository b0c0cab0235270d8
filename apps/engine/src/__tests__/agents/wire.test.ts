import { describe, expect, it } from "vitest";
import { createWireCodec, NEWLINE_MARKER } from "../../agents/wire";

describe("events dialect", () => {
  const codec = createWireCodec("events");

  it("flattens prompt newlines into one line", () => {
    expect(codec.encodePrompt("line one\nline two\r\nthree")).toBe(
      `line one${NEWLINE_MARKER}line two${NEWLINE_MARKER}three`
    );
  });

  it("decodes agent messages as text", () => {
    const line = JSON.stringify({
      type: "item.completed",
      item: { type: "agent_message", text: "hello" },
    });

    expect(codec.decodeLine(line)).toEqual({
      kind: "decoded",
      events: [{ type: "text", content: "hello" }],
    });
  });

  it("ignores completed items that are not agent messages", () => {
    const line = JSON.stringify({
      type: "item.completed",
      item: { type: "reasoning", text: "thinking" },
    });

    expect(codec.decodeLine(line)).toEqual({ kind: "decoded", events: [] });
  });

  it("decodes streamed tokens", () => {
    expect(codec.decodeLine('{"type":"token","text":"he"}')).toEqual({
      kind: "decoded",
      events: [{ type: "text", content: "he" }],
    });
  });

  it("decodes cell actions with their payload", () => {
    const line = JSON.stringify({
      type: "cell.action",
      action: "insert_and_run",
      code: "print(1)",
    });

    expect(codec.decodeLine(line)).toEqual({
      kind: "decoded",
      events: [
        {
          type: "action",
          kind: "insert_and_run",
          payload: { cellType: undefined, code: "print(1)" },
        },
      ],
    });
  });

  it("decodes approval requests", () => {
    const line = JSON.stringify({
      type: "approval.request",
      id: "ap-1",
      command: "rm -rf build",
      reason: "clean",
    });

    expect(codec.decodeLine(line)).toEqual({
      kind: "decoded",
      events: [
        {
          type: "approval",
          request: {
            id: "ap-1",
            kind: "command",
            command: "rm -rf build",
            cwd: undefined,
            reason: "clean",
          },
        },
      ],
    });
  });

  it("decodes a turn result into a completion", () => {
    const line = JSON.stringify({
      type: "turn.result",
      result: { final_message: "all done", errors: [] },
    });

    expect(codec.decodeLine(line)).toEqual({
      kind: "decoded",
      events: [{ type: "completion", finalMessage: "all done" }],
    });
  });

  it("decodes a failed turn into an error", () => {
    const line = JSON.stringify({
      type: "turn.result",
      result: { final_message: null, errors: ["rate limited", "retry"] },
    });

    expect(codec.decodeLine(line)).toEqual({
      kind: "decoded",
      events: [{ type: "error", message: "rate limited" }],
    });
  });

  it("captures resume tokens from session announcements", () => {
    expect(
      codec.decodeLine('{"type":"session.resume","session_id":"abc"}')
    ).toEqual({ kind: "decoded", events: [], resumeToken: "abc" });
    expect(
      codec.decodeLine('{"type":"thread.started","thread_id":"t-9"}')
    ).toEqual({ kind: "decoded", events: [], resumeToken: "t-9" });
  });

  it("captures a session id carried by an unrecognised line", () => {
    expect(
      codec.decodeLine('{"type":"config","msg":{"session_id":"nested"}}')
    ).toEqual({ kind: "decoded", events: [], resumeToken: "nested" });
  });

  it("reports non-JSON output as malformed", () => {
    expect(codec.decodeLine("Loading model...").kind).toBe("malformed");
    expect(codec.decodeLine("[1, 2]")).toEqual({
      kind: "malformed",
      reason: "Expected a JSON object",
    });
  });

  it("reports known line types with the wrong shape as malformed", () => {
    expect(
      codec.decodeLine('{"type":"turn.result","result":{"final_message":5}}')
    ).toEqual({
      kind: "malformed",
      reason:
        "Invalid turn.result line: result.final_message: Expected string, received number",
    });
    expect(codec.decodeLine('{"type":"cell.action"}')).toEqual({
      kind: "malformed",
      reason: "Invalid cell.action line: action: Required",
    });
  });

  it("skips unknown line types", () => {
    expect(codec.decodeLine('{"type":"heartbeat","seq":3}')).toEqual({
      kind: "decoded",
      events: [],
    });
  });

  it("treats blank lines as empty", () => {
    expect(codec.decodeLine("   ")).toEqual({ kind: "decoded", events: [] });
  });

  it("encodes approval decisions", () => {
    expect(codec.encodeDecision("approve_session", "ap-1")).toBe(
      '{"type":"approval.response","id":"ap-1","decision":"approve_session"}'
    );
    expect(codec.encodeDecision("deny")).toBe(
      '{"type":"approval.response","decision":"deny"}'
    );
  });
});

describe("stream-json dialect", () => {
  const codec = createWireCodec("stream-json");

  it("encodes prompts as user messages", () => {
    expect(JSON.parse(codec.encodePrompt("hi\nthere"))).toEqual({
      type: "user",
      message: {
        role: "user",
        content: [{ type: "text", text: "hi\nthere" }],
      },
    });
  });

  it("takes the session id from the init message", () => {
    const line = JSON.stringify({
      type: "system",
      subtype: "init",
      session_id: "sess-1",
    });

    expect(codec.decodeLine(line)).toEqual({
      kind: "decoded",
      events: [],
      resumeToken: "sess-1",
    });
  });

  it("joins the text parts of assistant messages", () => {
    const line = JSON.stringify({
      type: "assistant",
      message: {
        content: [
          { type: "text", text: "Hello " },
          { type: "tool_use" },
          { type: "text", text: "world" },
        ],
      },
    });

    expect(codec.decodeLine(line)).toEqual({
      kind: "decoded",
      events: [{ type: "text", content: "Hello world" }],
    });
  });

  it("maps results to completion or error", () => {
    expect(
      codec.decodeLine('{"type":"result","result":"ok then","session_id":"s"}')
    ).toEqual({
      kind: "decoded",
      events: [{ type: "completion", finalMessage: "ok then" }],
      resumeToken: "s",
    });
    expect(
      codec.decodeLine('{"type":"result","is_error":true,"result":"boom"}')
    ).toEqual({
      kind: "decoded",
      events: [{ type: "error", message: "boom" }],
    });
  });

  it("reports an assistant message without content as malformed", () => {
    expect(codec.decodeLine('{"type":"assistant","message":{}}')).toEqual({
      kind: "malformed",
      reason: "Invalid assistant line: message.content: Required",
    });
  });
});
