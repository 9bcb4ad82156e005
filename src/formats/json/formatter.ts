import type { Document } from "../../document.js";
import type { Formatter, FormatterOptions, OutputSink } from "../types.js";

/** One document per write: indented over several lines, or one line when compact. */
export class JsonFormatter implements Formatter {
  constructor(
    private readonly sink: OutputSink,
    private readonly options: FormatterOptions,
  ) {}

  write(document: Document): void {
    const text = this.options.compact
      ? JSON.stringify(document)
      : JSON.stringify(document, null, this.options.indent);
    this.sink.write(`${text}\n`);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}
