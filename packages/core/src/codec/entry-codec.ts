import { DecodeError } from "../errors/index.js";
import type { CachedResponse, HeaderEntries } from "../middleware/types.js";

/**
 * A stored response plus its freshness metadata.
 */
export interface CacheEntry extends CachedResponse {
  /** Epoch milliseconds at which the entry was written */
  storedAt: number;
  /** Freshness window in milliseconds */
  ttlMs: number;
}

/**
 * Current encoding version. Decoding any other leading byte fails.
 */
export const ENTRY_FORMAT_VERSION = 1;

/**
 * Largest TTL the u32 `ttlMs` slot holds, a little under 50 days.
 */
export const MAX_ENTRY_TTL_MS = 0xffffffff;

// u8 version, u16 status, f64 storedAt, u32 ttlMs, u16 headerCount
const FIXED_HEADER_BYTES = 1 + 2 + 8 + 4 + 2;
const U16_MAX = 0xffff;

function assertRange(value: number, max: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new RangeError(`Cache entry ${field} out of range: ${value}`);
  }
}

/**
 * Serialize an entry to its stored byte form.
 *
 * Layout (big-endian):
 * ```
 * u8  version
 * u16 status
 * f64 storedAt
 * u32 ttlMs
 * u16 headerCount
 *     { u32 nameLength, name (utf8), u32 valueLength, value (utf8) } * headerCount
 * u32 bodyLength, body
 * ```
 *
 * @throws RangeError when a field does not fit its slot
 */
export function encodeEntry(entry: CacheEntry): Buffer {
  assertRange(entry.status, U16_MAX, "status");
  assertRange(entry.ttlMs, MAX_ENTRY_TTL_MS, "ttlMs");
  assertRange(entry.headers.length, U16_MAX, "header count");

  const headerBuffers = entry.headers.map(
    ([name, value]) => [Buffer.from(name, "utf8"), Buffer.from(value, "utf8")] as const
  );
  const headerBytes = headerBuffers.reduce((sum, [name, value]) => sum + 8 + name.length + value.length, 0);

  const out = Buffer.allocUnsafe(FIXED_HEADER_BYTES + headerBytes + 4 + entry.body.length);
  let offset = 0;
  offset = out.writeUInt8(ENTRY_FORMAT_VERSION, offset);
  offset = out.writeUInt16BE(entry.status, offset);
  offset = out.writeDoubleBE(entry.storedAt, offset);
  offset = out.writeUInt32BE(entry.ttlMs, offset);
  offset = out.writeUInt16BE(entry.headers.length, offset);

  for (const [name, value] of headerBuffers) {
    offset = out.writeUInt32BE(name.length, offset);
    offset += name.copy(out, offset);
    offset = out.writeUInt32BE(value.length, offset);
    offset += value.copy(out, offset);
  }

  offset = out.writeUInt32BE(entry.body.length, offset);
  out.set(entry.body, offset);

  return out;
}

/**
 * Sequential reader over a stored entry that reports truncation as DecodeError.
 */
class EntryReader {
  private offset = 0;

  constructor(private readonly bytes: Buffer) {}

  private need(count: number, field: string): void {
    if (this.offset + count > this.bytes.length) {
      throw new DecodeError(`Cache entry truncated while reading ${field}`, {
        offset: this.offset,
        length: this.bytes.length,
      });
    }
  }

  u8(field: string): number {
    this.need(1, field);
    const value = this.bytes.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  u16(field: string): number {
    this.need(2, field);
    const value = this.bytes.readUInt16BE(this.offset);
    this.offset += 2;
    return value;
  }

  u32(field: string): number {
    this.need(4, field);
    const value = this.bytes.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  f64(field: string): number {
    this.need(8, field);
    const value = this.bytes.readDoubleBE(this.offset);
    this.offset += 8;
    return value;
  }

  chunk(field: string): Buffer {
    const length = this.u32(`${field} length`);
    this.need(length, field);
    const value = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }
}

/**
 * Parse stored bytes back into an entry.
 *
 * @throws DecodeError on an unknown version, truncated input, or trailing bytes
 */
export function decodeEntry(bytes: Uint8Array): CacheEntry {
  const reader = new EntryReader(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));

  const version = reader.u8("version");
  if (version !== ENTRY_FORMAT_VERSION) {
    throw new DecodeError(`Unsupported cache entry format version ${version}`, {
      version,
      expected: ENTRY_FORMAT_VERSION,
    });
  }

  const status = reader.u16("status");
  const storedAt = reader.f64("storedAt");
  const ttlMs = reader.u32("ttlMs");
  const headerCount = reader.u16("header count");

  const headers: Array<readonly [string, string]> = [];
  for (let i = 0; i < headerCount; i++) {
    const name = reader.chunk("header name").toString("utf8");
    const value = reader.chunk("header value").toString("utf8");
    headers.push([name, value]);
  }

  const body = new Uint8Array(reader.chunk("body"));

  if (reader.remaining !== 0) {
    throw new DecodeError(`Cache entry has ${reader.remaining} trailing bytes`);
  }

  const entryHeaders: HeaderEntries = headers;
  return { status, headers: entryHeaders, body, storedAt, ttlMs };
}

/**
 * Milliseconds of freshness left at `now`; zero or less means stale.
 */
export function remainingTtlMs(entry: Pick<CacheEntry, "storedAt" | "ttlMs">, now: number): number {
  return entry.storedAt + entry.ttlMs - now;
}

export function isFresh(entry: Pick<CacheEntry, "storedAt" | "ttlMs">, now: number): boolean {
  return remainingTtlMs(entry, now) > 0;
}
