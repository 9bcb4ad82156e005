/**
 * Helpers shared by the text format detectors.
 */

const decoder = new TextDecoder();

/** The prefix as text with leading whitespace removed. */
export function leadingText(prefix: Uint8Array): string {
  return decoder.decode(prefix).replace(/^[ \t\r\n]+/, "");
}

/**
 * A `key: value` first line: a colon appears before any comma or closing
 * brace on the first line.
 */
export function looksLikeYaml(head: string): boolean {
  const newline = head.indexOf("\n");
  const line = newline >= 0 ? head.slice(0, newline) : head;

  const colon = line.indexOf(":");
  if (colon < 0) return false;

  const comma = line.indexOf(",");
  const closeBrace = line.indexOf("}");
  return (
    (comma < 0 || colon < comma) && (closeBrace < 0 || colon < closeBrace)
  );
}

/** True when `prefix` starts with exactly `magic`. */
export function hasMagic(prefix: Uint8Array, magic: readonly number[]): boolean {
  if (prefix.length < magic.length) return false;
  return magic.every((byte, i) => prefix[i] === byte);
}
