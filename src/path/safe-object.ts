/**
 * Safe Object Utilities
 *
 * Documents come from untrusted input, so a "__proto__" key must stay an
 * ordinary own field and never reach the prototype chain when the accessor
 * reads or writes mappings. Keys such as "constructor" or "prototype" are
 * plain fields on a plain object and need no special handling.
 */

import { type Document, type DocumentMap, defineEntry } from "../document.js";

/**
 * Own-property lookup. Inherited members (toString, hasOwnProperty, ...)
 * are never treated as document fields.
 */
export function safeHasOwn(obj: DocumentMap, key: string): boolean {
  return Object.hasOwn(obj, key);
}

/** Set a property on a mapping as an own field. */
export function safeSet(obj: DocumentMap, key: string, value: Document): void {
  if (key === "__proto__") {
    defineEntry(obj, key, value);
    return;
  }
  obj[key] = value;
}

/** Delete an own property from a mapping. */
export function safeDelete(obj: DocumentMap, key: string): void {
  if (Object.hasOwn(obj, key)) {
    delete obj[key];
  }
}
