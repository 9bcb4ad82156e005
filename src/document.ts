/**
 * Document model
 *
 * A document is one decoded unit of structured data: a mapping, a sequence
 * or a scalar. Every format driver normalizes its decoded values into this
 * shape before handing them to the operations.
 */

export type Document =
  | null
  | boolean
  | number
  | string
  | Document[]
  | DocumentMap;

export interface DocumentMap {
  [key: string]: Document;
}

/**
 * Returned by an operation in place of a document to signal that the
 * document must be dropped downstream. Never equal to any document value.
 */
export const FILTERED: unique symbol = Symbol("docsift.filtered");

export type Filtered = typeof FILTERED;

/** What flows between pipeline steps. */
export type StepValue = Document | Filtered;

export function isFiltered(value: unknown): value is Filtered {
  return value === FILTERED;
}

export function isDocumentMap(value: unknown): value is DocumentMap {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isDocumentArray(value: unknown): value is Document[] {
  return Array.isArray(value);
}

/**
 * Convert a value produced by a decoder library into a Document.
 *
 * - bigint: number when it fits, decimal string otherwise
 * - Date: ISO-8601 string
 * - bytes: base64 string
 * - Map: string-keyed mapping (keys rendered with `keyToString`)
 * - Set and other iterables of values: array
 * - class instances (decoded records): own enumerable fields
 * - undefined and functions: null
 */
export function toDocument(value: unknown): Document {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : String(value);
    case "bigint":
      return Number.isSafeInteger(Number(value))
        ? Number(value)
        : value.toString();
    case "object":
      return objectToDocument(value);
    default:
      return null;
  }
}

function objectToDocument(value: object): Document {
  if (Array.isArray(value)) {
    return value.map(toDocument);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
      .toString("base64");
  }
  if (value instanceof Map) {
    const out: DocumentMap = {};
    for (const [key, entry] of value) {
      defineEntry(out, keyToString(key), toDocument(entry));
    }
    return out;
  }
  if (value instanceof Set) {
    return Array.from(value, toDocument);
  }
  const out: DocumentMap = {};
  for (const [key, entry] of Object.entries(value)) {
    defineEntry(out, key, toDocument(entry));
  }
  return out;
}

/**
 * Render a non-string mapping key (YAML allows numbers, booleans, null and
 * even collections as keys) as the string key used downstream.
 */
export function keyToString(key: unknown): string {
  if (typeof key === "string") return key;
  if (key === null || key === undefined) return "null";
  if (typeof key === "object") {
    return JSON.stringify(toDocument(key));
  }
  return String(key).trim();
}

// Object.defineProperty keeps "__proto__" as an ordinary own key instead of
// swapping the prototype, the same way JSON.parse does.
export function defineEntry(target: DocumentMap, key: string, value: Document): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
