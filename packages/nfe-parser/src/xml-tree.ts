/**
 * Accessors over the loosely-typed tree produced by fast-xml-parser
 * (attributes under `@_`, mixed text under `#text`).
 */

export type XmlObject = Record<string, unknown>;

export function isXmlObject(value: unknown): value is XmlObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Follows element names from `node`; undefined when any step is missing. */
export function at(node: unknown, ...names: string[]): unknown {
  let current = node;
  for (const name of names) {
    if (!isXmlObject(current)) return undefined;
    current = current[name];
  }
  return current;
}

/** Repeated elements parse as an array, single ones as a value. */
export function asList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

export function xmlText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isXmlObject(value) && value['#text'] !== undefined) return xmlText(value['#text']);
  return '';
}
