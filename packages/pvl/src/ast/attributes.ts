/**
 * Queries over attribute lists such as `{:inline 1}` or `{:msg "..."}`.
 *
 * When a key occurs more than once, the last well-formed occurrence wins.
 */

import {
  isExpression,
  type Attribute,
  type Attributes,
  type Contract,
  type Expression,
} from "./spec.js";

export type AttributeCheck<T> =
  | { valid: true; value: T | null }
  | { valid: false };

/**
 * The expression of the last `{:key e}` occurrence with exactly one
 * expression parameter
 */
export function findExprAttribute(
  attributes: Attributes,
  key: string,
): Expression | null {
  let found: Expression | null = null;
  for (const parameters of attributes.get(key) ?? []) {
    const [first] = parameters;
    if (parameters.length === 1 && isExpression(first)) {
      found = first;
    }
  }
  return found;
}

export function findStringAttribute(
  attributes: Attributes,
  key: string,
): string | null {
  let found: string | null = null;
  for (const parameters of attributes.get(key) ?? []) {
    const [first] = parameters;
    if (parameters.length === 1 && typeof first === "string") {
      found = first;
    }
  }
  return found;
}

// `{:msg "..."}` replaces the default message when a contract fails
export function contractErrorMessage(contract: Contract): string | null {
  return findStringAttribute(contract.attributes, "msg");
}

/**
 * `{:key true}` / `{:key false}`; a bare `{:key}` reads as true. Any other
 * parameter makes the attribute invalid.
 */
export function checkBooleanAttribute(
  attributes: Attributes,
  key: string,
): AttributeCheck<boolean> {
  const occurrences = attributes.get(key);
  if (!occurrences) {
    return { valid: true, value: null };
  }
  const expression = findExprAttribute(attributes, key);
  if (!expression) {
    return occurrences.some((parameters) => parameters.length === 0)
      ? { valid: true, value: true }
      : { valid: false };
  }
  if (
    expression.type === "LiteralExpression" &&
    expression.kind === "boolean"
  ) {
    return { valid: true, value: expression.value };
  }
  return { valid: false };
}

/**
 * `{:key N}` for an integer literal N in the safe integer range
 */
export function checkIntAttribute(
  attributes: Attributes,
  key: string,
): AttributeCheck<number> {
  if (!attributes.has(key)) {
    return { valid: true, value: null };
  }
  const expression = findExprAttribute(attributes, key);
  if (
    expression?.type === "LiteralExpression" &&
    expression.kind === "integer" &&
    expression.value <= BigInt(Number.MAX_SAFE_INTEGER)
  ) {
    return { valid: true, value: Number(expression.value) };
  }
  return { valid: false };
}

/**
 * Append `value` to the first occurrence of `key`, or add a new
 * occurrence holding just `value`
 */
export function addAttribute(
  attributes: Attributes,
  key: string,
  value: Attribute.Parameter,
): void {
  const occurrences = attributes.get(key);
  if (occurrences?.length) {
    occurrences[0].push(value);
    return;
  }
  attributes.set(key, [[value]]);
}

/**
 * Build an attribute map from `[key, parameters]` pairs in source order
 */
export function attributesOf(
  entries: Iterable<[string, Attribute.Parameter[]]>,
): Attributes {
  const attributes: Attributes = new Map();
  for (const [key, parameters] of entries) {
    const occurrences = attributes.get(key) ?? [];
    occurrences.push(parameters);
    attributes.set(key, occurrences);
  }
  return attributes;
}

/**
 * Attribute entries flattened back into source order per key
 */
export function attributeEntries(
  attributes: Attributes,
): [string, Attribute.Parameter[]][] {
  return [...attributes.entries()].flatMap(([key, occurrences]) =>
    occurrences.map((parameters): [string, Attribute.Parameter[]] => [
      key,
      parameters,
    ]),
  );
}
