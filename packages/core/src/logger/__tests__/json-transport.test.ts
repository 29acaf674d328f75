import { describe, expect, it } from "vitest";
import { PoolExhaustedError } from "../../errors/index.js";
import { JsonTransport } from "../transports/json.js";
import type { LogEntry } from "../types.js";

function capture(): { lines: string[]; transport: JsonTransport } {
  const lines: string[] = [];
  return { lines, transport: new JsonTransport({ output: (line) => lines.push(line) }) };
}

function parse(line: string | undefined): unknown {
  if (line === undefined) throw new Error("No output line");
  return JSON.parse(line);
}

describe("JsonTransport", () => {
  const baseEntry: LogEntry = {
    level: "info",
    message: "Test message",
    timestamp: new Date("2025-12-26T10:00:00.000Z"),
  };

  it("writes one JSON object per entry with time, level and message", () => {
    const { lines, transport } = capture();

    transport.log(baseEntry);

    expect(lines).toEqual([
      '{"time":"2025-12-26T10:00:00.000Z","level":"info","message":"Test message"}',
    ]);
  });

  it("includes context and data when present", () => {
    const { lines, transport } = capture();

    transport.log({ ...baseEntry, context: { component: "store" }, data: { key: "cachet:ab" } });

    expect(parse(lines[0])).toEqual({
      time: "2025-12-26T10:00:00.000Z",
      level: "info",
      context: { component: "store" },
      message: "Test message",
      data: { key: "cachet:ab" },
    });
  });

  it("serializes cache errors with their code", () => {
    const { lines, transport } = capture();

    transport.log({ ...baseEntry, level: "warn", data: { error: new PoolExhaustedError(50, 2) } });

    expect(parse(lines[0])).toMatchObject({
      data: {
        error: {
          name: "PoolExhaustedError",
          code: 2101,
          message: "No store connection became available within 50ms (pool size 2)",
        },
      },
    });
  });

  it("serializes plain errors with their cause message", () => {
    const { lines, transport } = capture();

    transport.log({ ...baseEntry, data: new Error("outer", { cause: new Error("inner") }) });

    expect(parse(lines[0])).toMatchObject({
      data: { name: "Error", message: "outer", cause: "inner" },
    });
  });

  it("adds trace ids when the entry carries them", () => {
    const { lines, transport } = capture();

    transport.log({ ...baseEntry, traceId: "t-1", spanId: "s-1" });

    expect(parse(lines[0])).toMatchObject({ traceId: "t-1", spanId: "s-1" });
  });
});
