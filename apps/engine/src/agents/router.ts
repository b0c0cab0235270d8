import { type AgentConfig, agentKinds } from "@cellhand/config";
import { RoutingError } from "./errors";
import type { AgentKind } from "./types";

const WHITESPACE_REGEX = /\s/;
const LINE_SPLIT_REGEX = /\r?\n/;

export type RouteClassification = "direct" | "self_invocation";

export type RouteResult = {
  readonly agentKind: AgentKind;
  readonly prefix: string;
  /** Text sent to the agent, prefix and separating whitespace removed */
  readonly payload: string;
  readonly classification: RouteClassification;
  /** Code that preceded a trailing invocation line */
  readonly leadingCode?: string;
};

export type PrefixRouter = {
  route(text: string): RouteResult;
  prefixFor(agentKind: AgentKind): string | undefined;
  entries(): ReadonlyArray<readonly [prefix: string, agentKind: AgentKind]>;
};

export type PrefixTable = Partial<Record<AgentKind, Pick<AgentConfig, "prefix">>>;

const splitFirstToken = (line: string): { token: string; rest: string } => {
  const trimmed = line.trimStart();
  const match = WHITESPACE_REGEX.exec(trimmed);
  if (!match) {
    return { token: trimmed, rest: "" };
  }
  return {
    token: trimmed.slice(0, match.index),
    rest: trimmed.slice(match.index),
  };
};

export function createPrefixRouter(table: PrefixTable): PrefixRouter {
  const byPrefix = new Map<string, AgentKind>();
  for (const kind of agentKinds) {
    const agent = table[kind];
    if (!agent) {
      continue;
    }
    const owner = byPrefix.get(agent.prefix);
    if (owner) {
      throw new Error(
        `Prefix "${agent.prefix}" is configured for both ${owner} and ${kind}`
      );
    }
    byPrefix.set(agent.prefix, kind);
  }

  const requirePayload = (
    text: string,
    prefix: string,
    payload: string
  ): string => {
    if (!payload) {
      throw new RoutingError({
        text,
        reason: `Prefix "${prefix}" must be followed by a prompt`,
      });
    }
    return payload;
  };

  const route = (text: string): RouteResult => {
    const { token, rest } = splitFirstToken(text);
    const direct = byPrefix.get(token);
    if (direct) {
      return {
        agentKind: direct,
        prefix: token,
        payload: requirePayload(text, token, rest.trim()),
        classification: "direct",
      };
    }

    const lines = text.split(LINE_SPLIT_REGEX);
    let lastIndex = lines.length - 1;
    while (lastIndex >= 0 && !lines[lastIndex]?.trim()) {
      lastIndex -= 1;
    }
    const lastLine = lines[lastIndex];
    if (lastIndex > 0 && lastLine !== undefined) {
      const trailing = splitFirstToken(lastLine);
      const selfKind = byPrefix.get(trailing.token);
      if (selfKind) {
        return {
          agentKind: selfKind,
          prefix: trailing.token,
          payload: requirePayload(text, trailing.token, trailing.rest.trim()),
          classification: "self_invocation",
          leadingCode: lines.slice(0, lastIndex).join("\n").trimEnd(),
        };
      }
    }

    throw new RoutingError({ text, reason: "No configured prefix matched" });
  };

  return {
    route,
    prefixFor(agentKind) {
      return table[agentKind]?.prefix;
    },
    entries() {
      return [...byPrefix.entries()];
    },
  };
}
