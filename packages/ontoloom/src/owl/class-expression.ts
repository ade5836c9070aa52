/**
 * OWL class expressions (SHOIN(D)) and their algebra.
 *
 * Expressions are plain immutable trees discriminated by `kind`. The
 * algebra covers negation normal form, canonical operand ordering for
 * cache keys, signature extraction and DL-notation rendering.
 *
 * @example
 * ```typescript
 * const parentOfStudent = intersectionOf([
 *   namedClass("ex:Person"),
 *   someValuesFrom("ex:hasChild", namedClass("ex:Student")),
 * ]);
 *
 * describeClassExpression(toNNF(complementOf(parentOfStudent)));
 * // "(¬ex:Person ⊔ ∀ex:hasChild.¬ex:Student)"
 * ```
 */
import { ConfigurationError } from "../errors";
import { sortedJsonStringify } from "../utils/sorted-json";
import {
  dataComplementOf,
  dataOneOf,
  describeDataRange,
  type OWLDataRange,
} from "./data-range";
import { describeLiteral, type OWLLiteral } from "./literal";

// ============================================================
// Types
// ============================================================

type CardinalityFields = Readonly<{ property: string; cardinality: number }>;

export type OWLClassExpression =
  | Readonly<{ kind: "named"; iri: string }>
  | Readonly<{ kind: "thing" }>
  | Readonly<{ kind: "nothing" }>
  | Readonly<{ kind: "intersectionOf"; operands: readonly OWLClassExpression[] }>
  | Readonly<{ kind: "unionOf"; operands: readonly OWLClassExpression[] }>
  | Readonly<{ kind: "complementOf"; operand: OWLClassExpression }>
  | Readonly<{ kind: "oneOf"; individuals: readonly string[] }>
  | Readonly<{
      kind: "someValuesFrom";
      property: string;
      filler: OWLClassExpression;
    }>
  | Readonly<{
      kind: "allValuesFrom";
      property: string;
      filler: OWLClassExpression;
    }>
  | Readonly<{ kind: "hasValue"; property: string; individual: string }>
  | Readonly<{ kind: "hasSelf"; property: string }>
  | (CardinalityFields &
      Readonly<{ kind: "minCardinality"; filler?: OWLClassExpression }>)
  | (CardinalityFields &
      Readonly<{ kind: "maxCardinality"; filler?: OWLClassExpression }>)
  | (CardinalityFields &
      Readonly<{ kind: "exactCardinality"; filler?: OWLClassExpression }>)
  | Readonly<{ kind: "dataSomeValuesFrom"; property: string; range: OWLDataRange }>
  | Readonly<{ kind: "dataAllValuesFrom"; property: string; range: OWLDataRange }>
  | Readonly<{ kind: "dataHasValue"; property: string; literal: OWLLiteral }>
  | (CardinalityFields &
      Readonly<{ kind: "dataMinCardinality"; range?: OWLDataRange }>)
  | (CardinalityFields &
      Readonly<{ kind: "dataMaxCardinality"; range?: OWLDataRange }>)
  | (CardinalityFields &
      Readonly<{ kind: "dataExactCardinality"; range?: OWLDataRange }>);

export type ClassExpressionKind = OWLClassExpression["kind"];

type ExpressionOf<K extends ClassExpressionKind> = Extract<
  OWLClassExpression,
  { kind: K }
>;

/**
 * Fixed per-variant ordering used by canonicalization.
 */
export const CLASS_EXPRESSION_TAG = {
  nothing: 0,
  thing: 1,
  named: 2,
  complementOf: 3,
  intersectionOf: 4,
  unionOf: 5,
  oneOf: 6,
  someValuesFrom: 7,
  allValuesFrom: 8,
  hasValue: 9,
  hasSelf: 10,
  minCardinality: 11,
  maxCardinality: 12,
  exactCardinality: 13,
  dataSomeValuesFrom: 14,
  dataAllValuesFrom: 15,
  dataHasValue: 16,
  dataMinCardinality: 17,
  dataMaxCardinality: 18,
  dataExactCardinality: 19,
} as const satisfies Record<ClassExpressionKind, number>;

// ============================================================
// Constructors
// ============================================================

export function namedClass(iri: string): OWLClassExpression {
  return { kind: "named", iri };
}

export function thing(): OWLClassExpression {
  return { kind: "thing" };
}

export function nothing(): OWLClassExpression {
  return { kind: "nothing" };
}

export function intersectionOf(
  operands: readonly OWLClassExpression[],
): OWLClassExpression {
  return { kind: "intersectionOf", operands };
}

export function unionOf(
  operands: readonly OWLClassExpression[],
): OWLClassExpression {
  return { kind: "unionOf", operands };
}

export function complementOf(operand: OWLClassExpression): OWLClassExpression {
  return { kind: "complementOf", operand };
}

export function oneOf(individuals: readonly string[]): OWLClassExpression {
  return { kind: "oneOf", individuals };
}

export function someValuesFrom(
  property: string,
  filler: OWLClassExpression,
): OWLClassExpression {
  return { kind: "someValuesFrom", property, filler };
}

export function allValuesFrom(
  property: string,
  filler: OWLClassExpression,
): OWLClassExpression {
  return { kind: "allValuesFrom", property, filler };
}

export function hasValue(
  property: string,
  individual: string,
): OWLClassExpression {
  return { kind: "hasValue", property, individual };
}

export function hasSelf(property: string): OWLClassExpression {
  return { kind: "hasSelf", property };
}

function checkCardinality(cardinality: number, kind: string): void {
  if (!Number.isSafeInteger(cardinality) || cardinality < 0) {
    throw new ConfigurationError(
      `Cardinality must be a non-negative integer, got ${cardinality}`,
      { operation: kind, cardinality },
    );
  }
}

/**
 * `≥n property.filler`; an omitted filler means the unqualified form.
 *
 * @throws ConfigurationError for negative or fractional `cardinality`
 */
export function minCardinality(
  property: string,
  cardinality: number,
  filler?: OWLClassExpression,
): OWLClassExpression {
  checkCardinality(cardinality, "minCardinality");
  return filler === undefined ?
      { kind: "minCardinality", property, cardinality }
    : { kind: "minCardinality", property, cardinality, filler };
}

export function maxCardinality(
  property: string,
  cardinality: number,
  filler?: OWLClassExpression,
): OWLClassExpression {
  checkCardinality(cardinality, "maxCardinality");
  return filler === undefined ?
      { kind: "maxCardinality", property, cardinality }
    : { kind: "maxCardinality", property, cardinality, filler };
}

export function exactCardinality(
  property: string,
  cardinality: number,
  filler?: OWLClassExpression,
): OWLClassExpression {
  checkCardinality(cardinality, "exactCardinality");
  return filler === undefined ?
      { kind: "exactCardinality", property, cardinality }
    : { kind: "exactCardinality", property, cardinality, filler };
}

export function dataSomeValuesFrom(
  property: string,
  range: OWLDataRange,
): OWLClassExpression {
  return { kind: "dataSomeValuesFrom", property, range };
}

export function dataAllValuesFrom(
  property: string,
  range: OWLDataRange,
): OWLClassExpression {
  return { kind: "dataAllValuesFrom", property, range };
}

export function dataHasValue(
  property: string,
  literal: OWLLiteral,
): OWLClassExpression {
  return { kind: "dataHasValue", property, literal };
}

export function dataMinCardinality(
  property: string,
  cardinality: number,
  range?: OWLDataRange,
): OWLClassExpression {
  checkCardinality(cardinality, "dataMinCardinality");
  return range === undefined ?
      { kind: "dataMinCardinality", property, cardinality }
    : { kind: "dataMinCardinality", property, cardinality, range };
}

export function dataMaxCardinality(
  property: string,
  cardinality: number,
  range?: OWLDataRange,
): OWLClassExpression {
  checkCardinality(cardinality, "dataMaxCardinality");
  return range === undefined ?
      { kind: "dataMaxCardinality", property, cardinality }
    : { kind: "dataMaxCardinality", property, cardinality, range };
}

export function dataExactCardinality(
  property: string,
  cardinality: number,
  range?: OWLDataRange,
): OWLClassExpression {
  checkCardinality(cardinality, "dataExactCardinality");
  return range === undefined ?
      { kind: "dataExactCardinality", property, cardinality }
    : { kind: "dataExactCardinality", property, cardinality, range };
}

// ============================================================
// Negation Normal Form
// ============================================================

/**
 * Rewrites an expression so that complement only appears directly in
 * front of a named class, a nominal (`¬{a}`, from negated `hasValue`) or
 * `∃R.Self`, none of which has a pushable negation.
 *
 * Exact cardinalities are expanded to `≥n ⊓ ≤n`, which duplicates the
 * filler into both branches.
 *
 * Idempotent: `toNNF(toNNF(e))` equals `toNNF(e)`.
 */
export function toNNF(expression: OWLClassExpression): OWLClassExpression {
  switch (expression.kind) {
    case "named":
    case "thing":
    case "nothing":
    case "oneOf":
    case "hasValue":
    case "hasSelf":
    case "dataSomeValuesFrom":
    case "dataAllValuesFrom":
    case "dataHasValue":
    case "dataMinCardinality":
    case "dataMaxCardinality": {
      return expression;
    }
    case "intersectionOf": {
      return intersectionOf(expression.operands.map(toNNF));
    }
    case "unionOf": {
      return unionOf(expression.operands.map(toNNF));
    }
    case "complementOf": {
      return negate(expression.operand);
    }
    case "someValuesFrom": {
      return someValuesFrom(expression.property, toNNF(expression.filler));
    }
    case "allValuesFrom": {
      return allValuesFrom(expression.property, toNNF(expression.filler));
    }
    case "minCardinality": {
      return minCardinality(
        expression.property,
        expression.cardinality,
        optionalNNF(expression.filler),
      );
    }
    case "maxCardinality": {
      return maxCardinality(
        expression.property,
        expression.cardinality,
        optionalNNF(expression.filler),
      );
    }
    case "exactCardinality": {
      const filler = optionalNNF(expression.filler);
      return intersectionOf([
        minCardinality(expression.property, expression.cardinality, filler),
        maxCardinality(expression.property, expression.cardinality, filler),
      ]);
    }
    case "dataExactCardinality": {
      return intersectionOf([
        dataMinCardinality(
          expression.property,
          expression.cardinality,
          expression.range,
        ),
        dataMaxCardinality(
          expression.property,
          expression.cardinality,
          expression.range,
        ),
      ]);
    }
  }
}

function optionalNNF(
  expression: OWLClassExpression | undefined,
): OWLClassExpression | undefined {
  return expression === undefined ? undefined : toNNF(expression);
}

function complementRange(range: OWLDataRange): OWLDataRange {
  return range.kind === "dataComplementOf" ?
      range.range
    : dataComplementOf(range);
}

/**
 * NNF of `¬expression`.
 */
function negate(expression: OWLClassExpression): OWLClassExpression {
  switch (expression.kind) {
    case "named":
    case "oneOf":
    case "hasSelf": {
      return complementOf(expression);
    }
    case "thing": {
      return nothing();
    }
    case "nothing": {
      return thing();
    }
    case "intersectionOf": {
      return unionOf(expression.operands.map(negate));
    }
    case "unionOf": {
      return intersectionOf(expression.operands.map(negate));
    }
    case "complementOf": {
      return toNNF(expression.operand);
    }
    case "someValuesFrom": {
      return allValuesFrom(expression.property, negate(expression.filler));
    }
    case "allValuesFrom": {
      return someValuesFrom(expression.property, negate(expression.filler));
    }
    case "hasValue": {
      return allValuesFrom(
        expression.property,
        complementOf(oneOf([expression.individual])),
      );
    }
    case "minCardinality": {
      return maxCardinality(
        expression.property,
        Math.max(0, expression.cardinality - 1),
        optionalNNF(expression.filler),
      );
    }
    case "maxCardinality": {
      return minCardinality(
        expression.property,
        expression.cardinality + 1,
        optionalNNF(expression.filler),
      );
    }
    case "exactCardinality": {
      const filler = optionalNNF(expression.filler);
      const above = minCardinality(
        expression.property,
        expression.cardinality + 1,
        filler,
      );
      if (expression.cardinality === 0) return above;
      return unionOf([
        maxCardinality(expression.property, expression.cardinality - 1, filler),
        above,
      ]);
    }
    case "dataSomeValuesFrom": {
      return dataAllValuesFrom(
        expression.property,
        complementRange(expression.range),
      );
    }
    case "dataAllValuesFrom": {
      return dataSomeValuesFrom(
        expression.property,
        complementRange(expression.range),
      );
    }
    case "dataHasValue": {
      return dataAllValuesFrom(
        expression.property,
        dataComplementOf(dataOneOf([expression.literal])),
      );
    }
    case "dataMinCardinality": {
      return dataMaxCardinality(
        expression.property,
        Math.max(0, expression.cardinality - 1),
        expression.range,
      );
    }
    case "dataMaxCardinality": {
      return dataMinCardinality(
        expression.property,
        expression.cardinality + 1,
        expression.range,
      );
    }
    case "dataExactCardinality": {
      const above = dataMinCardinality(
        expression.property,
        expression.cardinality + 1,
        expression.range,
      );
      if (expression.cardinality === 0) return above;
      return unionOf([
        dataMaxCardinality(
          expression.property,
          expression.cardinality - 1,
          expression.range,
        ),
        above,
      ]);
    }
  }
}

// ============================================================
// Canonicalization
// ============================================================

function compareExpressions(
  a: OWLClassExpression,
  b: OWLClassExpression,
): number {
  const tagDelta = CLASS_EXPRESSION_TAG[a.kind] - CLASS_EXPRESSION_TAG[b.kind];
  if (tagDelta !== 0) return tagDelta;
  const left = describeClassExpression(a);
  const right = describeClassExpression(b);
  if (left < right) return -1;
  return left > right ? 1 : 0;
}

/**
 * Sorts intersection and union operands, recursively, so that expressions
 * differing only in operand order become identical.
 */
export function canonicalize(
  expression: OWLClassExpression,
): OWLClassExpression {
  switch (expression.kind) {
    case "intersectionOf": {
      return intersectionOf(
        expression.operands.map(canonicalize).toSorted(compareExpressions),
      );
    }
    case "unionOf": {
      return unionOf(
        expression.operands.map(canonicalize).toSorted(compareExpressions),
      );
    }
    case "complementOf": {
      return complementOf(canonicalize(expression.operand));
    }
    case "someValuesFrom": {
      return someValuesFrom(expression.property, canonicalize(expression.filler));
    }
    case "allValuesFrom": {
      return allValuesFrom(expression.property, canonicalize(expression.filler));
    }
    case "minCardinality":
    case "maxCardinality":
    case "exactCardinality": {
      return expression.filler === undefined ?
          expression
        : { ...expression, filler: canonicalize(expression.filler) };
    }
    default: {
      return expression;
    }
  }
}

/**
 * Stable cache key: the rendering of the canonical form.
 */
export function classExpressionKey(expression: OWLClassExpression): string {
  return describeClassExpression(canonicalize(expression));
}

export function classExpressionsEqual(
  a: OWLClassExpression,
  b: OWLClassExpression,
): boolean {
  return sortedJsonStringify(a) === sortedJsonStringify(b);
}

// ============================================================
// Signature
// ============================================================

/**
 * Visits every nested class expression, including `expression` itself.
 */
function walk(
  expression: OWLClassExpression,
  visit: (node: OWLClassExpression) => void,
): void {
  visit(expression);
  switch (expression.kind) {
    case "intersectionOf":
    case "unionOf": {
      for (const operand of expression.operands) walk(operand, visit);
      return;
    }
    case "complementOf": {
      walk(expression.operand, visit);
      return;
    }
    case "someValuesFrom":
    case "allValuesFrom": {
      walk(expression.filler, visit);
      return;
    }
    case "minCardinality":
    case "maxCardinality":
    case "exactCardinality": {
      if (expression.filler !== undefined) walk(expression.filler, visit);
      return;
    }
    default: {
      return;
    }
  }
}

export function usedClasses(expression: OWLClassExpression): Set<string> {
  const result = new Set<string>();
  walk(expression, (node) => {
    if (node.kind === "named") result.add(node.iri);
  });
  return result;
}

export function usedObjectProperties(
  expression: OWLClassExpression,
): Set<string> {
  const result = new Set<string>();
  walk(expression, (node) => {
    switch (node.kind) {
      case "someValuesFrom":
      case "allValuesFrom":
      case "hasValue":
      case "hasSelf":
      case "minCardinality":
      case "maxCardinality":
      case "exactCardinality": {
        result.add(node.property);
        break;
      }
      default: {
        break;
      }
    }
  });
  return result;
}

export function usedDataProperties(
  expression: OWLClassExpression,
): Set<string> {
  const result = new Set<string>();
  walk(expression, (node) => {
    switch (node.kind) {
      case "dataSomeValuesFrom":
      case "dataAllValuesFrom":
      case "dataHasValue":
      case "dataMinCardinality":
      case "dataMaxCardinality":
      case "dataExactCardinality": {
        result.add(node.property);
        break;
      }
      default: {
        break;
      }
    }
  });
  return result;
}

export function usedIndividuals(expression: OWLClassExpression): Set<string> {
  const result = new Set<string>();
  walk(expression, (node) => {
    if (node.kind === "oneOf") {
      for (const individual of node.individuals) result.add(individual);
    } else if (node.kind === "hasValue") {
      result.add(node.individual);
    }
  });
  return result;
}

// ============================================================
// Structure
// ============================================================

export function isAtomicClassExpression(
  expression: OWLClassExpression,
): expression is ExpressionOf<"named" | "thing" | "nothing"> {
  return (
    expression.kind === "named" ||
    expression.kind === "thing" ||
    expression.kind === "nothing"
  );
}

export function hasCardinalityRestriction(
  expression: OWLClassExpression,
): boolean {
  let found = false;
  walk(expression, (node) => {
    switch (node.kind) {
      case "minCardinality":
      case "maxCardinality":
      case "exactCardinality":
      case "dataMinCardinality":
      case "dataMaxCardinality":
      case "dataExactCardinality": {
        found = true;
        break;
      }
      default: {
        break;
      }
    }
  });
  return found;
}

// ============================================================
// Description
// ============================================================

function qualifier(text: string | undefined): string {
  return text === undefined ? "" : `.${text}`;
}

/**
 * DL-notation rendering, e.g. `(ex:A ⊓ ∃ex:p.ex:B)` or `≥2 ex:hasChild`.
 */
export function describeClassExpression(
  expression: OWLClassExpression,
): string {
  switch (expression.kind) {
    case "named": {
      return expression.iri;
    }
    case "thing": {
      return "owl:Thing";
    }
    case "nothing": {
      return "owl:Nothing";
    }
    case "intersectionOf": {
      return `(${expression.operands.map(describeClassExpression).join(" ⊓ ")})`;
    }
    case "unionOf": {
      return `(${expression.operands.map(describeClassExpression).join(" ⊔ ")})`;
    }
    case "complementOf": {
      return `¬${describeClassExpression(expression.operand)}`;
    }
    case "oneOf": {
      return `{${expression.individuals.join(", ")}}`;
    }
    case "someValuesFrom": {
      return `∃${expression.property}.${describeClassExpression(expression.filler)}`;
    }
    case "allValuesFrom": {
      return `∀${expression.property}.${describeClassExpression(expression.filler)}`;
    }
    case "hasValue": {
      return `∃${expression.property}.{${expression.individual}}`;
    }
    case "hasSelf": {
      return `∃${expression.property}.Self`;
    }
    case "minCardinality":
    case "maxCardinality":
    case "exactCardinality": {
      const symbol = CARDINALITY_SYMBOL[expression.kind];
      const filler =
        expression.filler === undefined ?
          undefined
        : describeClassExpression(expression.filler);
      return `${symbol}${expression.cardinality} ${expression.property}${qualifier(filler)}`;
    }
    case "dataSomeValuesFrom": {
      return `∃${expression.property}.${describeDataRange(expression.range)}`;
    }
    case "dataAllValuesFrom": {
      return `∀${expression.property}.${describeDataRange(expression.range)}`;
    }
    case "dataHasValue": {
      return `∃${expression.property}.{${describeLiteral(expression.literal)}}`;
    }
    case "dataMinCardinality":
    case "dataMaxCardinality":
    case "dataExactCardinality": {
      const symbol = CARDINALITY_SYMBOL[expression.kind];
      const range =
        expression.range === undefined ?
          undefined
        : describeDataRange(expression.range);
      return `${symbol}${expression.cardinality} ${expression.property}${qualifier(range)}`;
    }
  }
}

const CARDINALITY_SYMBOL = {
  minCardinality: "≥",
  maxCardinality: "≤",
  exactCardinality: "=",
  dataMinCardinality: "≥",
  dataMaxCardinality: "≤",
  dataExactCardinality: "=",
} as const;
