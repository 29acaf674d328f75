/**
 * Serialize an error for logging.
 * CacheError instances contribute their code and context through `toJSON`.
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const base: Record<string, unknown> = { name: error.name, message: error.message };
    if ("toJSON" in error && typeof error.toJSON === "function") {
      const json: unknown = error.toJSON();
      if (typeof json === "object" && json !== null) {
        return { ...base, ...json };
      }
    }
    if (error.cause !== undefined) {
      base.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    }
    return base;
  }
  return { raw: String(error) };
}

/**
 * Prepare a log payload for JSON output. Errors at the top level or one
 * level down are replaced by their serialized form.
 */
export function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return serializeError(data);
  }
  if (typeof data === "object" && data !== null && !Array.isArray(data)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = value instanceof Error ? serializeError(value) : value;
    }
    return out;
  }
  return data;
}
