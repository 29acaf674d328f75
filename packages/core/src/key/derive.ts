import { createHash } from "node:crypto";
import { DerivationError } from "../errors/index.js";
import { type CacheRequest, readHeader } from "../middleware/types.js";

/**
 * Fingerprint of a cacheable request.
 *
 * `digest` is the lowercase hex SHA-256 of the canonical request material;
 * `storeKey` is the digest under the configured namespace, as written to the
 * backing store.
 */
export interface CacheKey {
  readonly digest: string;
  readonly storeKey: string;
}

export interface KeyDerivationOptions {
  /** Namespace for store keys */
  keyPrefix: string;
  /** Folded into the digest so a format change orphans old entries */
  version: number;
  /** Request headers that participate in the key */
  varyHeaders: readonly string[];
  /** Methods whose body is digested into the key */
  bodyMethods: readonly string[];
  /** Hash JSON bodies by their sorted-key serialization */
  canonicalJsonBodies: boolean;
}

export const DEFAULT_KEY_OPTIONS: KeyDerivationOptions = {
  keyPrefix: "cachet",
  version: 1,
  varyHeaders: [],
  bodyMethods: ["POST", "PUT", "PATCH", "QUERY"],
  canonicalJsonBodies: false,
};

// Only used to resolve origin-form targets; never part of the key.
const PLACEHOLDER_ORIGIN = "http://cache.invalid";

// Concatenated rather than resolved, so "//items" stays a path instead of a host.
function parseTarget(target: string): URL {
  return target.startsWith("/") ? new URL(`${PLACEHOLDER_ORIGIN}${target}`) : new URL(target);
}

function sha256Hex(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Collapse repeated slashes and drop a trailing slash (except for the root).
 */
export function normalizePath(pathname: string): string {
  const collapsed = pathname.replace(/\/{2,}/g, "/");
  if (collapsed.length > 1 && collapsed.endsWith("/")) {
    return collapsed.slice(0, -1);
  }
  return collapsed || "/";
}

/**
 * Query parameters sorted by name, then value, in code-unit order so the
 * result does not depend on the process locale.
 */
export function sortedQuery(params: URLSearchParams): Array<[string, string]> {
  const pairs = [...params.entries()];
  return pairs.sort(([aName, aValue], [bName, bValue]) => {
    if (aName !== bName) return aName < bName ? -1 : 1;
    if (aValue !== bValue) return aValue < bValue ? -1 : 1;
    return 0;
  });
}

/**
 * JSON serialization with object keys sorted at every depth.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const fields = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(Reflect.get(value, key))}`);
    return `{${fields.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  const mediaType = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return mediaType === "application/json" || mediaType.endsWith("+json");
}

function digestBody(request: CacheRequest, canonicalJsonBodies: boolean): string | null {
  if (request.body === undefined) {
    return null;
  }

  if (canonicalJsonBodies && isJsonContentType(readHeader(request.headers, "content-type"))) {
    const text =
      typeof request.body === "string" ? request.body : Buffer.from(request.body).toString("utf8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new DerivationError("Request body is not valid JSON", { cause: error });
    }
    return sha256Hex(canonicalJson(parsed));
  }

  return sha256Hex(request.body);
}

/**
 * Compute the cache key of a request.
 *
 * Two requests get the same key when they agree on method, normalized path,
 * query parameters (in any order), every header in `varyHeaders`, and, for
 * `bodyMethods`, the body digest. Headers outside the whitelist never
 * participate.
 *
 * @throws DerivationError when the URL cannot be parsed, or when a JSON body
 *   must be canonicalized and does not parse
 */
export function deriveCacheKey(request: CacheRequest, options: KeyDerivationOptions): CacheKey {
  let url: URL;
  try {
    url = parseTarget(request.url);
  } catch (error) {
    throw new DerivationError(`Cannot parse request URL: ${request.url}`, {
      cause: error,
      context: { url: request.url },
    });
  }

  const method = request.method.toUpperCase();
  const headerNames = [...new Set(options.varyHeaders.map((name) => name.toLowerCase()))].sort();
  const headers = headerNames.map((name) => [name, readHeader(request.headers, name) ?? null]);
  const body = options.bodyMethods.includes(method)
    ? digestBody(request, options.canonicalJsonBodies)
    : null;

  const material = JSON.stringify([
    options.version,
    method,
    normalizePath(url.pathname),
    sortedQuery(url.searchParams),
    headers,
    body,
  ]);
  const digest = sha256Hex(material);

  return { digest, storeKey: `${options.keyPrefix}:${digest}` };
}

/**
 * Key derivation bound to one immutable set of options.
 *
 * @example
 * ```typescript
 * const keys = new KeyDeriver({ varyHeaders: ["accept-language"] });
 * keys.derive({ method: "GET", url: "/items?b=2&a=1" }).storeKey;
 * // "cachet:3f1c…"
 * ```
 */
export class KeyDeriver {
  readonly options: Readonly<KeyDerivationOptions>;

  constructor(options: Partial<KeyDerivationOptions> = {}) {
    this.options = Object.freeze({
      ...DEFAULT_KEY_OPTIONS,
      ...options,
      varyHeaders: Object.freeze([...(options.varyHeaders ?? DEFAULT_KEY_OPTIONS.varyHeaders)]),
      bodyMethods: Object.freeze(
        (options.bodyMethods ?? DEFAULT_KEY_OPTIONS.bodyMethods).map((m) => m.toUpperCase())
      ),
    });
  }

  derive(request: CacheRequest): CacheKey {
    return deriveCacheKey(request, this.options);
  }
}
