import { XSD_NAMESPACE } from "../vocabulary/namespaces";

// ============================================================
// Datatypes
// ============================================================

/**
 * XSD datatypes usable in literals and data ranges, in prefixed form.
 */
export const XSD = {
  string: "xsd:string",
  boolean: "xsd:boolean",
  decimal: "xsd:decimal",
  float: "xsd:float",
  double: "xsd:double",
  duration: "xsd:duration",
  dateTime: "xsd:dateTime",
  time: "xsd:time",
  date: "xsd:date",
  anyURI: "xsd:anyURI",
  base64Binary: "xsd:base64Binary",
  hexBinary: "xsd:hexBinary",

  normalizedString: "xsd:normalizedString",
  token: "xsd:token",
  language: "xsd:language",
  NMTOKEN: "xsd:NMTOKEN",
  Name: "xsd:Name",
  NCName: "xsd:NCName",

  integer: "xsd:integer",
  nonPositiveInteger: "xsd:nonPositiveInteger",
  negativeInteger: "xsd:negativeInteger",
  nonNegativeInteger: "xsd:nonNegativeInteger",
  positiveInteger: "xsd:positiveInteger",
  long: "xsd:long",
  int: "xsd:int",
  short: "xsd:short",
  byte: "xsd:byte",
  unsignedLong: "xsd:unsignedLong",
  unsignedInt: "xsd:unsignedInt",
  unsignedShort: "xsd:unsignedShort",
  unsignedByte: "xsd:unsignedByte",
} as const;

export type XSDDatatype = (typeof XSD)[keyof typeof XSD];

export const XSD_DATATYPES: readonly XSDDatatype[] = Object.values(XSD);

/** rdf:langString, the datatype of every language-tagged literal. */
export const RDF_LANG_STRING = "rdf:langString";

export function isXSDDatatype(iri: string): iri is XSDDatatype {
  return XSD_DATATYPES.some((datatype) => datatype === iri);
}

/**
 * Rewrites `xsd:local` to the full XML Schema IRI. Other values pass
 * through.
 */
export function expandXSD(iri: string): string {
  return iri.startsWith("xsd:") ? XSD_NAMESPACE + iri.slice(4) : iri;
}

/**
 * Rewrites a full XML Schema IRI to `xsd:local`. Other values pass through.
 */
export function compactXSD(iri: string): string {
  return iri.startsWith(XSD_NAMESPACE) ?
      `xsd:${iri.slice(XSD_NAMESPACE.length)}`
    : iri;
}

// ============================================================
// Derivation hierarchy
// ============================================================

/**
 * Immediate base type of each derived datatype.
 */
const XSD_BASE_TYPE: Readonly<Partial<Record<XSDDatatype, XSDDatatype>>> = {
  [XSD.integer]: XSD.decimal,
  [XSD.nonPositiveInteger]: XSD.integer,
  [XSD.negativeInteger]: XSD.nonPositiveInteger,
  [XSD.nonNegativeInteger]: XSD.integer,
  [XSD.positiveInteger]: XSD.nonNegativeInteger,
  [XSD.long]: XSD.integer,
  [XSD.int]: XSD.long,
  [XSD.short]: XSD.int,
  [XSD.byte]: XSD.short,
  [XSD.unsignedLong]: XSD.nonNegativeInteger,
  [XSD.unsignedInt]: XSD.unsignedLong,
  [XSD.unsignedShort]: XSD.unsignedInt,
  [XSD.unsignedByte]: XSD.unsignedShort,
  [XSD.normalizedString]: XSD.string,
  [XSD.token]: XSD.normalizedString,
  [XSD.language]: XSD.token,
  [XSD.NMTOKEN]: XSD.token,
  [XSD.Name]: XSD.token,
  [XSD.NCName]: XSD.Name,
};

/**
 * True when every value of `derived` is also a value of `base`.
 *
 * @example
 * ```typescript
 * isDerivedFrom("xsd:byte", "xsd:integer"); // true
 * isDerivedFrom("xsd:integer", "xsd:int"); // false
 * ```
 */
export function isDerivedFrom(derived: string, base: string): boolean {
  let current: string | undefined = derived;
  while (current !== undefined) {
    if (current === base) return true;
    current = isXSDDatatype(current) ? XSD_BASE_TYPE[current] : undefined;
  }
  return false;
}

/**
 * Inclusive value bounds of the bounded integer types.
 */
export const XSD_INTEGER_BOUNDS: Readonly<
  Partial<Record<XSDDatatype, Readonly<{ min?: bigint; max?: bigint }>>>
> = {
  [XSD.nonPositiveInteger]: { max: 0n },
  [XSD.negativeInteger]: { max: -1n },
  [XSD.nonNegativeInteger]: { min: 0n },
  [XSD.positiveInteger]: { min: 1n },
  [XSD.long]: { min: -(2n ** 63n), max: 2n ** 63n - 1n },
  [XSD.int]: { min: -(2n ** 31n), max: 2n ** 31n - 1n },
  [XSD.short]: { min: -32_768n, max: 32_767n },
  [XSD.byte]: { min: -128n, max: 127n },
  [XSD.unsignedLong]: { min: 0n, max: 2n ** 64n - 1n },
  [XSD.unsignedInt]: { min: 0n, max: 2n ** 32n - 1n },
  [XSD.unsignedShort]: { min: 0n, max: 65_535n },
  [XSD.unsignedByte]: { min: 0n, max: 255n },
};

// ============================================================
// Facets
// ============================================================

export const XSD_FACETS = [
  "xsd:minInclusive",
  "xsd:maxInclusive",
  "xsd:minExclusive",
  "xsd:maxExclusive",
  "xsd:length",
  "xsd:minLength",
  "xsd:maxLength",
  "xsd:pattern",
  "xsd:totalDigits",
  "xsd:fractionDigits",
  "xsd:whiteSpace",
] as const;

export type XSDFacet = (typeof XSD_FACETS)[number];

export function isXSDFacet(iri: string): iri is XSDFacet {
  return XSD_FACETS.some((facet) => facet === iri);
}
