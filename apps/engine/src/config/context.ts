import { resolve as resolvePath } from "node:path";
import type { EngineConfig } from "@cellhand/config";
import { Context, Effect, Layer } from "effect";
import { loadConfig } from "./loader";

const configCache = new Map<string, Promise<EngineConfig>>();

export function resolveWorkspaceRoot(): string {
  const forcedWorkspaceRoot = process.env.CELLHAND_WORKSPACE_ROOT;
  if (forcedWorkspaceRoot) {
    return resolvePath(forcedWorkspaceRoot);
  }
  return process.cwd();
}

export function getEngineConfig(workspaceRoot?: string): Promise<EngineConfig> {
  const normalizedRoot = resolvePath(workspaceRoot ?? resolveWorkspaceRoot());
  const cached = configCache.get(normalizedRoot);
  if (cached) {
    return cached;
  }

  const loading = loadConfig(normalizedRoot);
  configCache.set(normalizedRoot, loading);
  // A failed load is not cached so a corrected file is picked up next time.
  loading.catch(() => {
    configCache.delete(normalizedRoot);
  });
  return loading;
}

export function clearEngineConfigCache(workspaceRoot?: string): void {
  if (workspaceRoot) {
    configCache.delete(resolvePath(workspaceRoot));
    return;
  }
  configCache.clear();
}

export type EngineConfigError = {
  readonly _tag: "EngineConfigError";
  readonly workspaceRoot: string;
  readonly cause: unknown;
};

const makeEngineConfigError = (
  workspaceRoot: string,
  cause: unknown
): EngineConfigError => ({
  _tag: "EngineConfigError",
  workspaceRoot,
  cause,
});

export type EngineConfigService = {
  readonly workspaceRoot: string;
  readonly load: (
    workspaceRoot?: string
  ) => Effect.Effect<EngineConfig, EngineConfigError>;
  readonly clear: (workspaceRoot?: string) => Effect.Effect<void>;
};

export const EngineConfigService = Context.GenericTag<EngineConfigService>(
  "@cellhand/engine/EngineConfigService"
);

export const EngineConfigLayer = Layer.sync(EngineConfigService, () => {
  const resolvedAtStartup = resolveWorkspaceRoot();

  const load = (workspaceRoot?: string) =>
    Effect.tryPromise({
      try: () => getEngineConfig(workspaceRoot ?? resolvedAtStartup),
      catch: (cause) =>
        makeEngineConfigError(workspaceRoot ?? resolvedAtStartup, cause),
    });

  const clear = (workspaceRoot?: string) =>
    Effect.sync(() => {
      clearEngineConfigCache(workspaceRoot ?? resolvedAtStartup);
    });

  return {
    workspaceRoot: resolvedAtStartup,
    load,
    clear,
  } satisfies EngineConfigService;
});

export const loadEngineConfigEffect = (workspaceRoot?: string) =>
  Effect.flatMap(EngineConfigService, (service) => service.load(workspaceRoot));

export const loadEngineConfig = (workspaceRoot?: string): Promise<EngineConfig> =>
  Effect.runPromise(
    Effect.provide(EngineConfigLayer)(loadEngineConfigEffect(workspaceRoot))
  );
