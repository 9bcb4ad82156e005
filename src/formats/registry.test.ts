import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import type { Document } from "../document.js";
import { FormatDetectionError, UnknownFormatError } from "../errors.js";
import { avroFormat } from "./avro/index.js";
import {
  createDefaultRegistry,
  FormatRegistry,
  PEEK_SIZE,
} from "./registry.js";
import { type Format, readAll } from "./types.js";

function fakeFormat(name: string, score: () => number): Format {
  return {
    name,
    detector: { detect: score },
    createParser() {
      throw new Error(`${name} cannot parse`);
    },
    createFormatter() {
      throw new Error(`${name} cannot format`);
    },
  };
}

describe("FormatRegistry", () => {
  it("lists built-in formats in registration order", () => {
    expect(createDefaultRegistry().list()).toEqual([
      "json",
      "yaml",
      "avro",
      "parquet",
    ]);
  });

  it("looks formats up by name", () => {
    const registry = createDefaultRegistry();
    expect(registry.get("avro")).toBe(avroFormat);
    expect(registry.has("csv")).toBe(false);
    expect(() => registry.get("csv")).toThrow(UnknownFormatError);
    expect(() => registry.get("csv")).toThrow("unknown format: csv");
  });

  it("replaces a format registered under the same name", () => {
    const registry = new FormatRegistry();
    const first = fakeFormat("x", () => 1);
    const second = fakeFormat("x", () => 2);
    registry.register(first);
    registry.register(second);
    expect(registry.get("x")).toBe(second);
    expect(registry.list()).toEqual(["x"]);
  });

  it("detects YAML and replays the peeked bytes", async () => {
    const registry = createDefaultRegistry();
    const detection = await registry.autoDetect({
      stream: Readable.from([Buffer.from("name: alice\n"), Buffer.from("age: 3\n")]),
    });
    expect(detection.format.name).toBe("yaml");

    const docs: Document[] = [];
    await detection.format.createParser(detection.input).forEach((doc) => {
      docs.push(doc);
    });
    expect(docs).toEqual([{ name: "alice", age: 3 }]);
  });

  it("replays input longer than the peek window", async () => {
    const text = JSON.stringify(
      Array.from({ length: 200 }, (_, i) => ({ id: i, label: `item-${i}` })),
    );
    expect(text.length).toBeGreaterThan(PEEK_SIZE);
    const chunks: Buffer[] = [];
    for (let i = 0; i < text.length; i += 100) {
      chunks.push(Buffer.from(text.slice(i, i + 100)));
    }

    const detection = await createDefaultRegistry().autoDetect({
      stream: Readable.from(chunks),
      filePath: "items.json",
    });
    expect(detection.format.name).toBe("json");
    expect(detection.input.filePath).toBe("items.json");
    expect((await readAll(detection.input.stream)).toString()).toBe(text);
  });

  it("gives ties to the format registered first", async () => {
    const registry = new FormatRegistry();
    registry.register(fakeFormat("first", () => 50));
    registry.register(fakeFormat("second", () => 50));
    const detection = await registry.autoDetect({
      stream: Readable.from([Buffer.from("anything")]),
    });
    expect(detection.format.name).toBe("first");
  });

  it("skips detectors that throw", async () => {
    const registry = new FormatRegistry();
    registry.register(
      fakeFormat("broken", () => {
        throw new Error("detector failed");
      }),
    );
    registry.register(fakeFormat("fallback", () => 10));
    const detection = await registry.autoDetect({
      stream: Readable.from([Buffer.from("anything")]),
    });
    expect(detection.format.name).toBe("fallback");
  });

  it("fails when no detector scores above zero", async () => {
    const registry = new FormatRegistry();
    registry.register(avroFormat);
    await expect(
      registry.autoDetect({ stream: Readable.from([Buffer.from("plain")]) }),
    ).rejects.toThrow(new FormatDetectionError());
  });

  it("detects empty input as JSON", async () => {
    const detection = await createDefaultRegistry().autoDetect({
      stream: Readable.from([]),
    });
    expect(detection.format.name).toBe("json");
  });
});
