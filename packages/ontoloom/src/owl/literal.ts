import { ConfigurationError } from "../errors";
import { isDerivedFrom, RDF_LANG_STRING, XSD } from "./xsd";

// ============================================================
// Types
// ============================================================

/**
 * A typed RDF literal.
 *
 * `language` is present only on `rdf:langString` literals. Plain quoted
 * literals are `xsd:string`.
 */
export type OWLLiteral = Readonly<{
  lexicalForm: string;
  /** Datatype IRI, usually in prefixed form (`xsd:integer`) */
  datatype: string;
  language?: string;
}>;

// ============================================================
// Constructors
// ============================================================

export function stringLiteral(value: string): OWLLiteral {
  return { lexicalForm: value, datatype: XSD.string };
}

/**
 * @throws ConfigurationError when `value` is a non-integral number
 */
export function integerLiteral(value: number | bigint): OWLLiteral {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new ConfigurationError(`${value} is not an integer`, {
      operation: "integerLiteral",
      value,
    });
  }
  return { lexicalForm: String(value), datatype: XSD.integer };
}

export function decimalLiteral(value: number): OWLLiteral {
  return { lexicalForm: String(value), datatype: XSD.decimal };
}

export function floatLiteral(value: number): OWLLiteral {
  return { lexicalForm: formatFloating(value), datatype: XSD.float };
}

export function doubleLiteral(value: number): OWLLiteral {
  return { lexicalForm: formatFloating(value), datatype: XSD.double };
}

export function booleanLiteral(value: boolean): OWLLiteral {
  return { lexicalForm: value ? "true" : "false", datatype: XSD.boolean };
}

/**
 * Date literal in `YYYY-MM-DD` form, taken in UTC.
 */
export function dateLiteral(value: Date): OWLLiteral {
  return { lexicalForm: value.toISOString().slice(0, 10), datatype: XSD.date };
}

/**
 * Date-time literal in ISO 8601 form, whole seconds in UTC.
 */
export function dateTimeLiteral(value: Date): OWLLiteral {
  return {
    lexicalForm: value.toISOString().replace(/\.000Z$/, "Z"),
    datatype: XSD.dateTime,
  };
}

export function langStringLiteral(value: string, language: string): OWLLiteral {
  return { lexicalForm: value, datatype: RDF_LANG_STRING, language };
}

export function typedLiteral(value: string, datatype: string): OWLLiteral {
  return { lexicalForm: value, datatype };
}

function formatFloating(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Number.POSITIVE_INFINITY) return "INF";
  if (value === Number.NEGATIVE_INFINITY) return "-INF";
  return String(value);
}

// ============================================================
// Value extraction
// ============================================================

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Integer value of the lexical form, or `undefined` when it is not an
 * integer that fits a JavaScript number exactly.
 */
export function literalIntValue(literal: OWLLiteral): number | undefined {
  const text = literal.lexicalForm.trim();
  if (!INTEGER_PATTERN.test(text)) return undefined;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Numeric value of the lexical form, accepting the XSD special values
 * `INF`, `-INF` and `NaN`.
 */
export function literalNumberValue(literal: OWLLiteral): number | undefined {
  const text = literal.lexicalForm.trim();
  switch (text) {
    case "INF":
    case "+INF": {
      return Number.POSITIVE_INFINITY;
    }
    case "-INF": {
      return Number.NEGATIVE_INFINITY;
    }
    case "NaN": {
      return Number.NaN;
    }
    case "": {
      return undefined;
    }
    default: {
      const value = Number(text);
      return Number.isNaN(value) ? undefined : value;
    }
  }
}

/**
 * Boolean value: `true`/`1` and `false`/`0`, case-insensitive.
 */
export function literalBooleanValue(literal: OWLLiteral): boolean | undefined {
  switch (literal.lexicalForm.toLowerCase()) {
    case "true":
    case "1": {
      return true;
    }
    case "false":
    case "0": {
      return false;
    }
    default: {
      return undefined;
    }
  }
}

export function literalDateValue(literal: OWLLiteral): Date | undefined {
  const time = Date.parse(literal.lexicalForm);
  return Number.isNaN(time) ? undefined : new Date(time);
}

export function literalStringValue(literal: OWLLiteral): string {
  return literal.lexicalForm;
}

// ============================================================
// Classification
// ============================================================

export function isNumericLiteral(literal: OWLLiteral): boolean {
  return (
    isDerivedFrom(literal.datatype, XSD.decimal) ||
    literal.datatype === XSD.float ||
    literal.datatype === XSD.double
  );
}

export function isTemporalLiteral(literal: OWLLiteral): boolean {
  return (
    literal.datatype === XSD.date ||
    literal.datatype === XSD.dateTime ||
    literal.datatype === XSD.time
  );
}

export function literalsEqual(a: OWLLiteral, b: OWLLiteral): boolean {
  return (
    a.lexicalForm === b.lexicalForm &&
    a.datatype === b.datatype &&
    a.language === b.language
  );
}

/**
 * Human-readable rendering: `"hi"@en`, `"hi"`, or `"42"^^<xsd:integer>`.
 */
export function describeLiteral(literal: OWLLiteral): string {
  if (literal.language !== undefined) {
    return `"${literal.lexicalForm}"@${literal.language}`;
  }
  if (literal.datatype === XSD.string) {
    return `"${literal.lexicalForm}"`;
  }
  return `"${literal.lexicalForm}"^^<${literal.datatype}>`;
}
