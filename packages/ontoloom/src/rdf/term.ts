/**
 * String encoding of single RDF terms, following the N-Triples convention.
 *
 * - IRI: as-is (`ex:alice`, `http://example.org/Person`)
 * - Literal: `"lex"`, `"lex"^^datatype` or `"lex"@lang`
 * - Blank node: `_:id`
 *
 * Storage layers that keep terms in string columns use this encoding to
 * preserve the node type.
 *
 * @example
 * ```typescript
 * encodeRDFTerm(literalTerm(integerLiteral(30))); // "\"30\"^^xsd:integer"
 * decodeRDFTerm("\"hello\"@en");
 * // { kind: "literal", literal: { lexicalForm: "hello", datatype: "rdf:langString", language: "en" } }
 * ```
 */
import { type OWLLiteral } from "../owl/literal";
import { RDF_LANG_STRING, XSD } from "../owl/xsd";

export type RDFTerm =
  | Readonly<{ kind: "iri"; iri: string }>
  | Readonly<{ kind: "literal"; literal: OWLLiteral }>
  /** `id` excludes the `_:` marker */
  | Readonly<{ kind: "blankNode"; id: string }>;

export function iriTerm(iri: string): RDFTerm {
  return { kind: "iri", iri };
}

export function literalTerm(literal: OWLLiteral): RDFTerm {
  return { kind: "literal", literal };
}

export function blankNodeTerm(id: string): RDFTerm {
  return { kind: "blankNode", id: id.startsWith("_:") ? id.slice(2) : id };
}

// ============================================================
// Encoding
// ============================================================

const ESCAPES: Readonly<Record<string, string>> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

const UNESCAPES: Readonly<Record<string, string>> = {
  "\\": "\\",
  '"': '"',
  n: "\n",
  r: "\r",
  t: "\t",
};

function escapeLexical(value: string): string {
  return value.replaceAll(/[\\"\n\r\t]/g, (ch) => ESCAPES[ch] ?? ch);
}

export function encodeRDFTerm(term: RDFTerm): string {
  switch (term.kind) {
    case "iri": {
      return term.iri;
    }
    case "literal": {
      const quoted = `"${escapeLexical(term.literal.lexicalForm)}"`;
      if (term.literal.language !== undefined) {
        return `${quoted}@${term.literal.language}`;
      }
      return term.literal.datatype === XSD.string ?
          quoted
        : `${quoted}^^${term.literal.datatype}`;
    }
    case "blankNode": {
      return `_:${term.id}`;
    }
  }
}

// ============================================================
// Decoding
// ============================================================

/**
 * Inverse of {@link encodeRDFTerm}. A leading `"` means a literal, a
 * leading `_:` a blank node; anything else is an IRI. Unknown escapes
 * keep their backslash; a missing closing quote ends the lexical form at
 * the end of input.
 */
export function decodeRDFTerm(encoded: string): RDFTerm {
  if (encoded.startsWith('"')) return literalTerm(parseLiteral(encoded));
  if (encoded.startsWith("_:")) return { kind: "blankNode", id: encoded.slice(2) };
  return iriTerm(encoded);
}

function parseLiteral(encoded: string): OWLLiteral {
  let lexical = "";
  let index = 1;
  while (index < encoded.length) {
    const ch = encoded.charAt(index);
    if (ch === "\\" && index + 1 < encoded.length) {
      const next = encoded.charAt(index + 1);
      lexical += UNESCAPES[next] ?? `\\${next}`;
      index += 2;
      continue;
    }
    if (ch === '"') break;
    lexical += ch;
    index += 1;
  }

  const suffix = encoded.slice(index + 1);
  if (suffix.startsWith("^^")) {
    return { lexicalForm: lexical, datatype: suffix.slice(2) };
  }
  if (suffix.startsWith("@")) {
    return {
      lexicalForm: lexical,
      datatype: RDF_LANG_STRING,
      language: suffix.slice(1),
    };
  }
  return { lexicalForm: lexical, datatype: XSD.string };
}

// ============================================================
// OWL bridge
// ============================================================

export function rdfTermFromLiteral(literal: OWLLiteral): RDFTerm {
  return literalTerm(literal);
}

/**
 * The literal carried by `term`, or `undefined` for IRIs and blank nodes.
 */
export function rdfTermToLiteral(term: RDFTerm): OWLLiteral | undefined {
  return term.kind === "literal" ? term.literal : undefined;
}
