export type PlainRecord = Record<string, unknown>;

export const isPlainRecord = (value: unknown): value is PlainRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Merge `override` into `base`. Nested objects merge key by key; arrays and
 * scalars from `override` replace the base value. Neither input is mutated.
 */
export function mergeDeep(base: unknown, override: unknown): unknown {
  if (override === undefined) {
    return base;
  }
  if (!(isPlainRecord(base) && isPlainRecord(override))) {
    return override;
  }

  const merged: PlainRecord = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeDeep(base[key], value);
  }
  return merged;
}
