import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

export const CONFIG_FILENAMES = [
  "cellhand.config.jsonc",
  "cellhand.config.json",
] as const;

export type ConfigFilename = (typeof CONFIG_FILENAMES)[number];

export const PREFERRED_CONFIG_FILENAME = CONFIG_FILENAMES[0];

const DEFAULT_HOME_DIRECTORY = ".cellhand";

export const resolveEngineHome = (): string => {
  const forced = process.env.CELLHAND_HOME;
  return forced ? resolve(forced) : join(homedir(), DEFAULT_HOME_DIRECTORY);
};

export const findConfigPath = (directory: string): string | null => {
  for (const filename of CONFIG_FILENAMES) {
    const candidate = join(directory, filename);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
};

/** Workspace config wins over the per-user config in the engine home. */
export const locateConfigFile = (
  workspaceRoot: string,
  home: string = resolveEngineHome()
): string | null => findConfigPath(workspaceRoot) ?? findConfigPath(home);
