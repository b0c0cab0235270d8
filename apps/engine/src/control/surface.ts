import { SessionNotFound } from "../agents/errors";
import type { ModeController } from "../agents/modes";
import type { SessionManager } from "../agents/session-manager";
import type { ModeConfig, SessionSnapshot } from "../agents/types";

/**
 * Operations exposed to a CLI or API front. Omitting a session id targets
 * the most recently active session.
 */
export type ControlSurface = {
  status(sessionId?: string): SessionSnapshot;
  sessions(): SessionSnapshot[];
  resume(sessionId?: string): Promise<SessionSnapshot>;
  stop(sessionId?: string): Promise<SessionSnapshot>;
  /** Select a mode, or read the current one when no name is given */
  mode(name?: string): ModeConfig;
};

export function createControlSurface(deps: {
  sessions: SessionManager;
  modes: ModeController;
}): ControlSurface {
  const { sessions, modes } = deps;

  const target = (sessionId?: string): string => {
    const resolved = sessionId ?? sessions.lastActiveSessionId();
    if (!resolved) {
      throw new SessionNotFound();
    }
    return resolved;
  };

  return {
    status: (sessionId) => sessions.status(target(sessionId)),
    sessions: () => sessions.listSessions(),
    async resume(sessionId) {
      return sessions.resume(target(sessionId));
    },
    async stop(sessionId) {
      const id = target(sessionId);
      await sessions.stop(id);
      return sessions.status(id);
    },
    mode: (name) => (name === undefined ? modes.getMode() : modes.setMode(name)),
  };
}
