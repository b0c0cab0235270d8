import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { type EngineConfig, resolveEngineConfig } from "@cellhand/config";
import { type ParseError, parse, printParseErrorCode } from "jsonc-parser";

import { locateConfigFile } from "./files";

const LINE_SPLIT_REGEX = /\r?\n/;

export type LoadConfigOptions = {
  /** Directory searched when the workspace has no config file */
  home?: string;
};

/**
 * Load the engine configuration for a workspace. Without a config file the
 * built-in defaults are returned.
 */
export async function loadConfig(
  workspaceRoot: string,
  options: LoadConfigOptions = {}
): Promise<EngineConfig> {
  const configPath = locateConfigFile(workspaceRoot, options.home);
  if (!configPath) {
    return resolveEngineConfig();
  }

  const overrides = await loadJsonConfig(configPath);
  return resolveEngineConfig(overrides);
}

const loadJsonConfig = async (configPath: string): Promise<unknown> => {
  const contents = await readFile(configPath, "utf8");
  const errors: ParseError[] = [];
  const parsed: unknown = parse(contents, errors, { allowTrailingComma: true });

  const [error] = errors;
  if (error) {
    const position = toLineColumn(contents, error.offset);
    throw new Error(
      `Could not parse ${basename(configPath)} (${printParseErrorCode(error.error)} at ${position.line}:${position.column})`
    );
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(
      `Invalid config format in ${basename(configPath)}: expected a JSON object`
    );
  }

  return parsed;
};

const toLineColumn = (text: string, offset: number) => {
  const preceding = text.slice(0, offset).split(LINE_SPLIT_REGEX);
  const line = preceding.length;
  const column = (preceding.pop()?.length ?? 0) + 1;
  return { line, column };
};
