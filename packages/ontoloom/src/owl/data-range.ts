import {
  describeLiteral,
  integerLiteral,
  literalNumberValue,
  literalsEqual,
  type OWLLiteral,
  stringLiteral,
} from "./literal";
import { isDerivedFrom, XSD, type XSDFacet } from "./xsd";

// ============================================================
// Types
// ============================================================

/**
 * A facet constraint on a datatype, e.g. `xsd:minInclusive 0`.
 */
export type FacetRestriction = Readonly<{
  facet: XSDFacet;
  value: OWLLiteral;
}>;

/**
 * OWL 2 data range.
 */
export type OWLDataRange =
  | Readonly<{ kind: "datatype"; iri: string }>
  | Readonly<{ kind: "dataIntersectionOf"; ranges: readonly OWLDataRange[] }>
  | Readonly<{ kind: "dataUnionOf"; ranges: readonly OWLDataRange[] }>
  | Readonly<{ kind: "dataComplementOf"; range: OWLDataRange }>
  | Readonly<{ kind: "dataOneOf"; literals: readonly OWLLiteral[] }>
  | Readonly<{
      kind: "datatypeRestriction";
      datatype: string;
      facets: readonly FacetRestriction[];
    }>;

export type DataRangeKind = OWLDataRange["kind"];

// ============================================================
// Constructors
// ============================================================

export function datatype(iri: string): OWLDataRange {
  return { kind: "datatype", iri };
}

export function dataIntersectionOf(
  ranges: readonly OWLDataRange[],
): OWLDataRange {
  return { kind: "dataIntersectionOf", ranges };
}

export function dataUnionOf(ranges: readonly OWLDataRange[]): OWLDataRange {
  return { kind: "dataUnionOf", ranges };
}

export function dataComplementOf(range: OWLDataRange): OWLDataRange {
  return { kind: "dataComplementOf", range };
}

export function dataOneOf(literals: readonly OWLLiteral[]): OWLDataRange {
  return { kind: "dataOneOf", literals };
}

export function datatypeRestriction(
  datatypeIRI: string,
  facets: readonly FacetRestriction[],
): OWLDataRange {
  return { kind: "datatypeRestriction", datatype: datatypeIRI, facets };
}

/**
 * Facet restriction shorthands.
 */
export const facet = {
  minInclusive: (value: number): FacetRestriction => ({
    facet: "xsd:minInclusive",
    value: integerLiteral(value),
  }),
  maxInclusive: (value: number): FacetRestriction => ({
    facet: "xsd:maxInclusive",
    value: integerLiteral(value),
  }),
  minExclusive: (value: number): FacetRestriction => ({
    facet: "xsd:minExclusive",
    value: integerLiteral(value),
  }),
  maxExclusive: (value: number): FacetRestriction => ({
    facet: "xsd:maxExclusive",
    value: integerLiteral(value),
  }),
  minLength: (value: number): FacetRestriction => ({
    facet: "xsd:minLength",
    value: integerLiteral(value),
  }),
  maxLength: (value: number): FacetRestriction => ({
    facet: "xsd:maxLength",
    value: integerLiteral(value),
  }),
  pattern: (regex: string): FacetRestriction => ({
    facet: "xsd:pattern",
    value: stringLiteral(regex),
  }),
} as const;

/**
 * Common data ranges.
 *
 * @example
 * ```typescript
 * dataRanges.integerRange(0, 150);
 * // xsd:integer[xsd:minInclusive 0, xsd:maxInclusive 150]
 * ```
 */
export const dataRanges = {
  string: datatype(XSD.string),
  integer: datatype(XSD.integer),
  boolean: datatype(XSD.boolean),
  decimal: datatype(XSD.decimal),
  double: datatype(XSD.double),
  float: datatype(XSD.float),
  date: datatype(XSD.date),
  dateTime: datatype(XSD.dateTime),
  anyURI: datatype(XSD.anyURI),

  integerRange(min?: number, max?: number): OWLDataRange {
    const facets: FacetRestriction[] = [];
    if (min !== undefined) facets.push(facet.minInclusive(min));
    if (max !== undefined) facets.push(facet.maxInclusive(max));
    return datatypeRestriction(XSD.integer, facets);
  },

  stringLength(min?: number, max?: number): OWLDataRange {
    const facets: FacetRestriction[] = [];
    if (min !== undefined) facets.push(facet.minLength(min));
    if (max !== undefined) facets.push(facet.maxLength(max));
    return datatypeRestriction(XSD.string, facets);
  },

  stringPattern(regex: string): OWLDataRange {
    return datatypeRestriction(XSD.string, [facet.pattern(regex)]);
  },
} as const;

// ============================================================
// Analysis
// ============================================================

export function isSimpleDatatype(range: OWLDataRange): boolean {
  return range.kind === "datatype";
}

/**
 * The datatype a range is built on, for plain and facet-restricted
 * datatypes only.
 */
export function baseDatatype(range: OWLDataRange): string | undefined {
  switch (range.kind) {
    case "datatype": {
      return range.iri;
    }
    case "datatypeRestriction": {
      return range.datatype;
    }
    default: {
      return undefined;
    }
  }
}

/**
 * Whether `literal` may be a member of `range`. Datatype membership
 * follows the XSD derivation hierarchy; restrictions also check their
 * numeric and length facets.
 */
export function dataRangeCouldContain(
  range: OWLDataRange,
  literal: OWLLiteral,
): boolean {
  switch (range.kind) {
    case "datatype": {
      return (
        range.iri === "rdfs:Literal" ||
        isDerivedFrom(literal.datatype, range.iri)
      );
    }
    case "dataIntersectionOf": {
      return range.ranges.every((r) => dataRangeCouldContain(r, literal));
    }
    case "dataUnionOf": {
      return range.ranges.some((r) => dataRangeCouldContain(r, literal));
    }
    case "dataComplementOf": {
      return !dataRangeCouldContain(range.range, literal);
    }
    case "dataOneOf": {
      return range.literals.some((member) => literalsEqual(member, literal));
    }
    case "datatypeRestriction": {
      return (
        isDerivedFrom(literal.datatype, range.datatype) &&
        range.facets.every((restriction) =>
          satisfiesFacet(restriction, literal),
        )
      );
    }
  }
}

function satisfiesFacet(
  restriction: FacetRestriction,
  literal: OWLLiteral,
): boolean {
  const bound = literalNumberValue(restriction.value);
  switch (restriction.facet) {
    case "xsd:minInclusive":
    case "xsd:maxInclusive":
    case "xsd:minExclusive":
    case "xsd:maxExclusive": {
      const value = literalNumberValue(literal);
      if (value === undefined || bound === undefined) return false;
      if (restriction.facet === "xsd:minInclusive") return value >= bound;
      if (restriction.facet === "xsd:maxInclusive") return value <= bound;
      if (restriction.facet === "xsd:minExclusive") return value > bound;
      return value < bound;
    }
    case "xsd:length": {
      return bound === undefined || [...literal.lexicalForm].length === bound;
    }
    case "xsd:minLength": {
      return bound === undefined || [...literal.lexicalForm].length >= bound;
    }
    case "xsd:maxLength": {
      return bound === undefined || [...literal.lexicalForm].length <= bound;
    }
    case "xsd:pattern": {
      return matchesPattern(restriction.value.lexicalForm, literal.lexicalForm);
    }
    case "xsd:totalDigits":
    case "xsd:fractionDigits":
    case "xsd:whiteSpace": {
      return true;
    }
  }
}

function matchesPattern(pattern: string, value: string): boolean {
  let regex: RegExp;
  try {
    regex = new RegExp(`^(?:${pattern})$`, "u");
  } catch (error) {
    // XSD regex features JavaScript lacks cannot rule a value out.
    if (error instanceof SyntaxError) return true;
    throw error;
  }
  return regex.test(value);
}

// ============================================================
// Description
// ============================================================

/**
 * Functional-syntax-like rendering, e.g. `DataUnionOf(xsd:int xsd:string)`.
 */
export function describeDataRange(range: OWLDataRange): string {
  switch (range.kind) {
    case "datatype": {
      return range.iri;
    }
    case "dataIntersectionOf": {
      return `DataIntersectionOf(${range.ranges.map(describeDataRange).join(" ")})`;
    }
    case "dataUnionOf": {
      return `DataUnionOf(${range.ranges.map(describeDataRange).join(" ")})`;
    }
    case "dataComplementOf": {
      return `DataComplementOf(${describeDataRange(range.range)})`;
    }
    case "dataOneOf": {
      return `DataOneOf(${range.literals.map(describeLiteral).join(" ")})`;
    }
    case "datatypeRestriction": {
      const facets = range.facets
        .map((restriction) => `${restriction.facet} ${restriction.value.lexicalForm}`)
        .join(", ");
      return `${range.datatype}[${facets}]`;
    }
  }
}
