import type { AgentKind, SessionState } from "./types";

export class RoutingError extends Error {
  readonly text: string;

  constructor(params: { text: string; reason: string }) {
    super(params.reason);
    this.name = "RoutingError";
    this.text = params.text;
  }
}

export class StartFailed extends Error {
  readonly agentKind: AgentKind;

  constructor(params: { agentKind: AgentKind; reason: string; cause?: unknown }) {
    super(`Failed to start ${params.agentKind}: ${params.reason}`, {
      cause: params.cause,
    });
    this.name = "StartFailed";
    this.agentKind = params.agentKind;
  }
}

export class ProtocolViolation extends Error {
  readonly sessionId: string;

  constructor(params: { sessionId: string; reason: string }) {
    super(`Protocol violation in session ${params.sessionId}: ${params.reason}`);
    this.name = "ProtocolViolation";
    this.sessionId = params.sessionId;
  }
}

export class ResumeUnsupported extends Error {
  readonly sessionId: string;
  readonly agentKind: AgentKind;

  constructor(params: { sessionId: string; agentKind: AgentKind }) {
    super(`Agent ${params.agentKind} does not support resume`);
    this.name = "ResumeUnsupported";
    this.sessionId = params.sessionId;
    this.agentKind = params.agentKind;
  }
}

export class AlreadyRunning extends Error {
  readonly sessionId: string;
  readonly state: SessionState;

  constructor(params: { sessionId: string; state: SessionState }) {
    super(
      `Session ${params.sessionId} is ${params.state}; only stopped or crashed sessions can be resumed`
    );
    this.name = "AlreadyRunning";
    this.sessionId = params.sessionId;
    this.state = params.state;
  }
}

export class UnknownMode extends Error {
  readonly mode: string;

  constructor(mode: string) {
    super(`Unknown mode: ${mode}`);
    this.name = "UnknownMode";
    this.mode = mode;
  }
}

export class SessionNotFound extends Error {
  /** Undefined when the most recently active session was requested */
  readonly sessionId?: string;

  constructor(sessionId?: string) {
    super(sessionId ? `Session ${sessionId} not found` : "No active session");
    this.name = "SessionNotFound";
    this.sessionId = sessionId;
  }
}
