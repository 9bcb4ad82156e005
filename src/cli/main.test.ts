import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { main, VERSION } from "./main.js";

function sink() {
  const chunks: string[] = [];
  return {
    write: (chunk: string) => chunks.push(chunk),
    text: () => chunks.join(""),
  };
}

async function runCli(args: string[], stdin = "") {
  const stdout = sink();
  const stderr = sink();
  const exitCode = await main(args, {
    stdin: Readable.from([Buffer.from(stdin)]),
    stdout,
    stderr,
  });
  return { exitCode, stdout: stdout.text(), stderr: stderr.text() };
}

describe("docsift cli", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "docsift-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("transforms stdin to stdout", async () => {
    const result = await runCli(
      ["--pick", "user.name"],
      '{"user":{"name":"alice","id":7}}',
    );
    expect(result).toEqual({ exitCode: 0, stdout: '"alice"\n', stderr: "" });
  });

  it("prints help and version", async () => {
    const help = await runCli(["--help"]);
    expect(help.exitCode).toBe(0);
    expect(help.stdout.split("\n")[0]).toBe(
      "docsift - pick, set, delete and filter fields in structured documents",
    );
    expect((await runCli(["--version"])).stdout).toBe(`docsift ${VERSION}\n`);
  });

  it("reads and writes files", async () => {
    const input = join(dir, "in.yaml");
    const output = join(dir, "out.yaml");
    await writeFile(input, "name: a\nsecret: test-secret\n");

    const result = await runCli([
      "--in",
      input,
      "--out",
      output,
      "--delete",
      "secret",
      "--to",
      "yaml",
    ]);

    expect(result.exitCode).toBe(0);
    expect(await readFile(output, "utf8")).toBe("name: a\n");
  });

  it("reports a missing input file", async () => {
    const missing = join(dir, "missing.json");
    const result = await runCli(["--in", missing]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr.startsWith(`docsift: cannot open input ${missing}: `)).toBe(
      true,
    );
  });

  it("lists every failing file in directory mode", async () => {
    await writeFile(join(dir, "bad.json"), "{");
    await writeFile(join(dir, "good.json"), '{"a":1}');
    const result = await runCli(["--dir", dir, "-c"]);
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe(
      `${JSON.stringify({ _file: join(dir, "good.json"), _row: 1, data: { a: 1 } })}\n`,
    );
    expect(result.stderr).toBe(
      "docsift: directory processing completed with 1 error(s)\n" +
        `  1. failed to process ${join(dir, "bad.json")}: invalid JSON: unexpected end of input\n`,
    );
  });

  it("warns when a directory has no matching files", async () => {
    const result = await runCli(["--dir", dir, "--from", "yaml"]);
    expect(result.exitCode).toBe(0);
    expect(result.stderr).toBe(
      `docsift: warning: no files with extensions .yaml, .yml found in ${dir}\n`,
    );
  });

  it("reports usage errors with status 1", async () => {
    const result = await runCli(["--where", "broken"]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe(
      'docsift: invalid where condition "broken" (expected path=value)\n',
    );
  });

  it("traces progress on stderr when verbose", async () => {
    const result = await runCli(["-v", "-c"], '{"a":1}');
    expect(result.stdout).toBe('{"a":1}\n');
    expect(result.stderr.split("\n")).toEqual([
      'docsift info: input format {"format":"json","source":"detected"}',
      'docsift info: done {"read":1,"written":1}',
      "",
    ]);
  });
});
