import { Readable } from "node:stream";
import avro from "avsc";
import { describe, expect, it } from "vitest";
import type { Document } from "../../document.js";
import { UnsupportedWriteError } from "../../errors.js";
import { readAll } from "../types.js";
import { avroDetector, avroFormat } from "./index.js";

const userType = avro.Type.forSchema({
  type: "record",
  name: "User",
  fields: [
    { name: "name", type: "string" },
    { name: "age", type: "int" },
    { name: "avatar", type: "bytes" },
    { name: "email", type: ["null", "string"], default: null },
  ],
});

async function containerFile(records: unknown[]): Promise<Buffer> {
  const encoder = new avro.streams.BlockEncoder(userType);
  for (const record of records) {
    encoder.write(record);
  }
  encoder.end();
  return readAll(encoder);
}

describe("avro format", () => {
  it("decodes every record of a container file", async () => {
    const file = await containerFile([
      { name: "alice", age: 30, avatar: Buffer.from("hi"), email: "a@example.com" },
      { name: "bob", age: 41, avatar: Buffer.alloc(0), email: null },
    ]);
    expect(avroDetector.detect(file.subarray(0, 1024))).toBe(100);

    const docs: Document[] = [];
    await avroFormat
      .createParser({ stream: Readable.from([file]) })
      .forEach((doc) => {
        docs.push(doc);
      });

    expect(docs).toEqual([
      { name: "alice", age: 30, avatar: "aGk=", email: "a@example.com" },
      { name: "bob", age: 41, avatar: "", email: null },
    ]);
  });

  it("cannot write", () => {
    expect(() => avroFormat.createFormatter({ write: () => true })).toThrow(
      new UnsupportedWriteError("avro"),
    );
    expect(() => avroFormat.createFormatter({ write: () => true })).toThrow(
      "avro format does not support writing (formatter not implemented)",
    );
  });
});
