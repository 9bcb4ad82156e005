import YAML from "yaml";
import type { Document } from "../../document.js";
import type { Formatter, FormatterOptions, OutputSink } from "../types.js";

/**
 * Writes documents as a YAML stream, `---` between documents.
 * `compact` has no effect; YAML output is always block style.
 */
export class YamlFormatter implements Formatter {
  private written = 0;

  constructor(
    private readonly sink: OutputSink,
    private readonly options: FormatterOptions,
  ) {}

  write(document: Document): void {
    const text = YAML.stringify(document, {
      indent: this.options.indent,
      lineWidth: 0,
    });
    this.sink.write(this.written > 0 ? `---\n${text}` : text);
    this.written++;
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}
