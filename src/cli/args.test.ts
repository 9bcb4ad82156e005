import { describe, expect, it } from "vitest";
import { parseArgs } from "./args.js";

function parsedOrFail(args: string[]) {
  const parsed = parseArgs(args);
  if ("exitCode" in parsed) {
    throw new Error(`unexpected usage error: ${parsed.stderr}`);
  }
  return parsed;
}

function usageOf(args: string[]) {
  const parsed = parseArgs(args);
  if (!("exitCode" in parsed)) {
    throw new Error("expected a usage error");
  }
  return parsed;
}

describe("parseArgs", () => {
  it("accumulates repeatable options in order", () => {
    const parsed = parsedOrFail([
      "--pick",
      "a",
      "--pick=b",
      "-pick",
      "c",
      "--set",
      "x=1",
      "--where",
      "k=v",
      "--delete",
      "d",
    ]);
    expect(parsed.options.pick).toEqual(["a", "b", "c"]);
    expect(parsed.options.set).toEqual(["x=1"]);
    expect(parsed.options.where).toEqual(["k=v"]);
    expect(parsed.options.delete).toEqual(["d"]);
  });

  it("keeps '=' inside option values", () => {
    expect(parsedOrFail(["--set=a=b=c"]).options.set).toEqual(["a=b=c"]);
  });

  it("reads flags and formats", () => {
    const parsed = parsedOrFail([
      "--from",
      "yaml",
      "--to=json",
      "-c",
      "--preserve-hierarchy",
      "--indent",
      "4",
      "--verbose",
    ]);
    expect(parsed.options).toEqual({
      pick: [],
      set: [],
      delete: [],
      where: [],
      from: "yaml",
      to: "json",
      compact: true,
      preserveHierarchy: true,
      indent: 4,
    });
    expect(parsed.verbose).toBe(true);
    expect(parsed.version).toBe(false);
  });

  it("takes a single positional argument as the input file", () => {
    const parsed = parsedOrFail(["data.yaml", "--out", "out.json"]);
    expect(parsed.input).toBe("data.yaml");
    expect(parsed.output).toBe("out.json");
    expect(parsedOrFail(["-"]).input).toBeUndefined();
  });

  it("rejects unknown formats", () => {
    const result = usageOf(["--from", "csv"]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe(
      "docsift: invalid format 'csv' for --from (expected json, yaml, avro, parquet)\n" +
        "Try 'docsift --help' for more information.\n",
    );
  });

  it("rejects unknown options and missing values", () => {
    expect(usageOf(["--nope"]).stderr).toMatch(
      /^docsift: unrecognized option '--nope'\n/,
    );
    expect(usageOf(["--compact=yes"]).stderr).toMatch(
      /^docsift: unrecognized option '--compact=yes'\n/,
    );
    expect(usageOf(["--pick"]).stderr).toMatch(
      /^docsift: option '--pick' requires an argument\n/,
    );
  });

  it("rejects conflicting or extra inputs", () => {
    expect(usageOf(["--in", "a.json", "--dir", "d"]).stderr).toMatch(
      /^docsift: --in and --dir cannot be used together\n/,
    );
    expect(usageOf(["a.json", "b.json"]).stderr).toMatch(
      /^docsift: unexpected argument 'b.json'\n/,
    );
  });

  it("validates the indent", () => {
    expect(usageOf(["--indent", "x"]).stderr).toMatch(
      /^docsift: invalid indent 'x' \(expected 0-10\)\n/,
    );
  });

  it("returns the help text for a help flag in option position", () => {
    for (const flag of ["--help", "-help", "-h"]) {
      const result = usageOf(["--pick", "a", flag, "--nope"]);
      expect(result.exitCode).toBe(0);
      expect(result.stderr).toBe("");
      expect(result.stdout.split("\n")[0]).toBe(
        "docsift - pick, set, delete and filter fields in structured documents",
      );
    }
  });

  it("takes a help flag as a plain value after a value option", () => {
    const parsed = parsedOrFail(["--pick", "-h", "--delete", "--help"]);
    expect(parsed.options.pick).toEqual(["-h"]);
    expect(parsed.options.delete).toEqual(["--help"]);
  });
});
