import { customAlphabet, nanoid } from "nanoid";

/**
 * ID generation utilities.
 *
 * Operation IDs for hook contexts use nanoid's default alphabet. Blank-node
 * labels must be valid Turtle local names, so they draw from an
 * alphanumeric alphabet instead.
 */

const blankNodeSuffix = customAlphabet(
  "0123456789abcdefghijklmnopqrstuvwxyz",
  8,
);

/**
 * Generates a new unique ID.
 */
export function generateId(): string {
  return nanoid();
}

/**
 * Generates a fresh blank-node label such as `_:b1k9z0q2m`.
 */
export function generateBlankNodeId(): string {
  return `_:b${blankNodeSuffix()}`;
}
