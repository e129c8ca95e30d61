/**
 * Input schema normalization for downstream tool consumers that reject
 * JSON Schema's array form of `type`.
 */

export type JsonSchema = { readonly [key: string]: unknown };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(normalizeValue);
  if (isPlainObject(value)) return normalizeSchema(value);
  return value;
}

/**
 * Returns a deep copy in which every `type: [a, b]` is rewritten to
 * `anyOf: [{ type: a }, { type: b }]`. The input is not modified.
 */
export function normalizeSchema(schema: JsonSchema): JsonSchema {
  const result: Record<string, unknown> = {};
  let typeUnion: unknown[] | undefined;

  for (const [key, value] of Object.entries(schema)) {
    if (key === "type" && Array.isArray(value)) {
      typeUnion = value;
      continue;
    }
    result[key] = normalizeValue(value);
  }

  if (typeUnion) {
    result.anyOf = typeUnion.map((type: unknown) => ({ type }));
  }
  return result;
}
