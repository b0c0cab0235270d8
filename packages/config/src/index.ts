export * from "./defaults";
export * from "./merge";
export * from "./schema";

import { DEFAULT_ENGINE_CONFIG } from "./defaults";
import { mergeDeep } from "./merge";
import type { EngineConfig, EngineConfigInput } from "./schema";
import { engineConfigSchema } from "./schema";

/**
 * Define a complete, type-safe engine configuration.
 *
 * @example
 * ```ts
 * import { defineEngineConfig } from "@cellhand/config";
 *
 * export default defineEngineConfig({
 *   agents: {
 *     codex: { prefix: "@", command: "codex", resumable: true },
 *   },
 *   modes: {
 *     learn: { systemPrompt: "Explain before you code." },
 *   },
 * });
 * ```
 */
export function defineEngineConfig(config: EngineConfigInput): EngineConfig {
  return engineConfigSchema.parse(config);
}

/**
 * Validate an engine configuration without throwing.
 * Returns the parsed config on success, or an error object on failure.
 */
export function validateEngineConfig(
  config: unknown
): { success: true; data: EngineConfig } | { success: false; error: string } {
  const result = engineConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    error: result.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join(", "),
  };
}

/**
 * Layer a partial configuration over the built-in defaults and parse the
 * result. Throws a ZodError when the merged configuration is invalid.
 */
export function resolveEngineConfig(overrides: unknown = {}): EngineConfig {
  return engineConfigSchema.parse(mergeDeep(DEFAULT_ENGINE_CONFIG, overrides));
}
