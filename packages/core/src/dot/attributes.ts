/** Attribute values are coerced with `String()` when rendered. */
export type AttributeValue = string | number | boolean;

/** Insertion-ordered attribute mapping. */
export type AttributeMap = Map<string, AttributeValue>;

/**
 * What public entry points accept. Plain objects follow `Object.entries`
 * order (integer-like keys first), so pass a Map when that matters.
 */
export type AttributeInput = Readonly<Record<string, AttributeValue>> | ReadonlyMap<string, AttributeValue>;

function isReadonlyMap(input: AttributeInput): input is ReadonlyMap<string, AttributeValue> {
  return input instanceof Map;
}

/** Copy `input` into a fresh, mutable AttributeMap. */
export function toAttributeMap(input?: AttributeInput): AttributeMap {
  if (!input) return new Map();
  if (isReadonlyMap(input)) return new Map(input);
  return new Map(Object.entries(input));
}

/**
 * Merge two maps; keys in `override` win. Keys from `base` keep their
 * position, keys only in `override` are appended in their own order.
 */
export function mergeAttributes(
  base: ReadonlyMap<string, AttributeValue>,
  override: ReadonlyMap<string, AttributeValue>,
): AttributeMap {
  const merged: AttributeMap = new Map(base);
  for (const [key, value] of override) {
    merged.set(key, value);
  }
  return merged;
}

/** Escape backslashes and double quotes for a DOT quoted string. */
export function escapeQuoted(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function quoteIdentifier(id: string): string {
  return `"${escapeQuoted(id)}"`;
}

/** `key="value"` with the value escaped. */
export function formatAttribute(key: string, value: AttributeValue): string {
  return `${key}="${escapeQuoted(String(value))}"`;
}

/**
 * Render an attribute list as `[k1="v1",k2="v2"]`, or `''` when empty.
 */
export function formatAttributes(attributes: ReadonlyMap<string, AttributeValue>): string {
  if (attributes.size === 0) return '';

  const parts: string[] = [];
  for (const [key, value] of attributes) {
    parts.push(formatAttribute(key, value));
  }
  return `[${parts.join(',')}]`;
}
