/**
 * CLI entry logic, separated from the process so it can run in tests.
 */

import { type FileHandle, open } from "node:fs/promises";
import type { Readable, Writable } from "node:stream";
import { finished } from "node:stream/promises";
import { DirectoryProcessingError, errorMessage } from "../errors.js";
import type { OutputSink } from "../formats/types.js";
import { createStreamLogger } from "../logger.js";
import { processDirectory } from "../runner/directory.js";
import { runStream } from "../runner/run.js";
import { parseArgs } from "./args.js";

export const VERSION = "0.1.0";

export interface CliIO {
  stdin: Readable;
  stdout: OutputSink;
  stderr: OutputSink;
}

/** Run the CLI and resolve to the process exit status. */
export async function main(args: string[], io: CliIO): Promise<number> {
  const parsed = parseArgs(args);
  if ("exitCode" in parsed) {
    io.stdout.write(parsed.stdout);
    io.stderr.write(parsed.stderr);
    return parsed.exitCode;
  }
  if (parsed.version) {
    io.stdout.write(`docsift ${VERSION}\n`);
    return 0;
  }

  const options = {
    ...parsed.options,
    logger: parsed.verbose ? createStreamLogger(io.stderr, true) : undefined,
  };

  let outputFile: Writable | undefined;
  let inputFile: Readable | undefined;
  try {
    if (parsed.output !== undefined) {
      outputFile = (await openFile(parsed.output, "w", "output")).createWriteStream();
    }
    const output = outputFile ?? io.stdout;

    if (parsed.dir !== undefined) {
      await processDirectory({
        dir: parsed.dir,
        output,
        options,
        onWarning: (message) => io.stderr.write(`docsift: warning: ${message}\n`),
      });
    } else if (parsed.input !== undefined) {
      const handle = await openFile(parsed.input, "r", "input");
      inputFile = handle.createReadStream();
      await runStream({
        input: { stream: inputFile, filePath: parsed.input },
        output,
        options,
      });
    } else {
      await runStream({ input: { stream: io.stdin }, output, options });
    }

    if (outputFile) {
      await closeOutput(outputFile);
    }
    return 0;
  } catch (e) {
    io.stderr.write(`docsift: ${errorMessage(e)}\n`);
    if (e instanceof DirectoryProcessingError) {
      e.failures.forEach((failure, i) => {
        io.stderr.write(`  ${i + 1}. ${failure.message}\n`);
      });
    }
    if (outputFile) {
      outputFile.destroy();
    }
    return 1;
  } finally {
    inputFile?.destroy();
  }
}

async function openFile(
  path: string,
  flags: "r" | "w",
  role: "input" | "output",
): Promise<FileHandle> {
  try {
    return await open(path, flags);
  } catch (e) {
    throw new Error(`cannot open ${role} ${path}: ${errorMessage(e)}`, {
      cause: e,
    });
  }
}

async function closeOutput(stream: Writable): Promise<void> {
  stream.end();
  await finished(stream);
}
