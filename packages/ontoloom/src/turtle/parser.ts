import {
  InvalidIriError,
  UndefinedPrefixError,
  UnexpectedEndOfInputError,
  UnexpectedTokenError,
} from "../errors";
import { type OWLLiteral } from "../owl/literal";
import {
  blankNodeTerm,
  iriTerm,
  literalTerm,
  type RDFTerm,
} from "../rdf/term";
import { RDF, XSD_NAMESPACE } from "../vocabulary/namespaces";
import { Tokenizer } from "./tokenizer";
import {
  type ParsedDocument,
  type SubjectTerm,
  type Token,
  type TokenKind,
  type Triple,
} from "./types";

const ABSOLUTE_IRI = /^[A-Za-z][\w+.-]*:/;

const NUMERIC_DATATYPE: Partial<Record<TokenKind, string>> = {
  integer: `${XSD_NAMESPACE}integer`,
  decimal: `${XSD_NAMESPACE}decimal`,
  double: `${XSD_NAMESPACE}double`,
  boolean: `${XSD_NAMESPACE}boolean`,
};

export type ParserOptions = Readonly<{
  baseIRI?: string;
  prefixes?: Readonly<Record<string, string>>;
}>;

/**
 * Recursive-descent parser producing a flat, ordered triple list.
 *
 * Grammar (EBNF-ish):
 *   document      = statement*
 *   statement     = directive | triples '.'
 *   directive     = '@prefix' PNAME_NS IRIREF '.' | '@base' IRIREF '.'
 *                 | 'PREFIX' PNAME_NS IRIREF | 'BASE' IRIREF
 *   triples       = subject predObjList | bnodeList predObjList?
 *   predObjList   = verb objectList (';' (verb objectList)?)*
 *   objectList    = object (',' object)*
 *   verb          = 'a' | iri
 *   subject       = iri | BLANK_NODE_LABEL | collection
 *   object        = iri | BLANK_NODE_LABEL | collection | bnodeList | literal
 *   bnodeList     = '[' predObjList? ']'
 *   collection    = '(' object* ')'
 *   literal       = STRING (LANGTAG | '^^' iri)? | INTEGER | DECIMAL | DOUBLE | BOOLEAN
 *
 * Prefixes must be declared before use; there is no second pass.
 */
export class Parser {
  readonly #tokens: Token[];
  #pos = 0;
  readonly #prefixes = new Map<string, string>();
  #base: string | undefined;
  readonly #triples: Triple[] = [];
  #blankCounter = 0;
  // Labels written in the document; minted labels skip these
  readonly #documentLabels: ReadonlySet<string>;

  constructor(tokens: Token[], options: ParserOptions = {}) {
    this.#tokens = tokens;
    this.#documentLabels = new Set(
      tokens
        .filter((token) => token.kind === "blankNode")
        .map((token) => token.value),
    );
    this.#base = options.baseIRI;
    const prefixes = options.prefixes ?? {};
    for (const [prefix, namespace] of Object.entries(prefixes)) {
      this.#prefixes.set(prefix, namespace);
    }
  }

  parse(): ParsedDocument {
    while (this.#current().kind !== "eof") {
      this.#parseStatement();
    }
    return {
      prefixes: Object.fromEntries(this.#prefixes),
      ...(this.#base !== undefined && { base: this.#base }),
      triples: this.#triples,
    };
  }

  // === Token access ===

  #current(): Token {
    return this.#tokens[this.#pos] ?? this.#endToken();
  }

  #advance(): Token {
    const token = this.#current();
    if (token.kind !== "eof") this.#pos += 1;
    return token;
  }

  #endToken(): Token {
    const last = this.#tokens.at(-1);
    return { kind: "eof", value: "", line: last?.line ?? 1 };
  }

  #isPunctuation(value: string): boolean {
    const token = this.#current();
    return token.kind === "punctuation" && token.value === value;
  }

  #fail(expected: string): never {
    const token = this.#current();
    if (token.kind === "eof") throw new UnexpectedEndOfInputError(token.line);
    throw new UnexpectedTokenError(expected, describeToken(token), token.line);
  }

  #expectPunctuation(value: string): void {
    if (!this.#isPunctuation(value)) this.#fail(`"${value}"`);
    this.#advance();
  }

  #expect(kind: TokenKind, expected: string): Token {
    if (this.#current().kind !== kind) this.#fail(expected);
    return this.#advance();
  }

  // === Statements ===

  #parseStatement(): void {
    switch (this.#current().kind) {
      case "prefixDirective": {
        this.#parsePrefix(true);
        return;
      }
      case "sparqlPrefix": {
        this.#parsePrefix(false);
        return;
      }
      case "baseDirective": {
        this.#parseBase(true);
        return;
      }
      case "sparqlBase": {
        this.#parseBase(false);
        return;
      }
      default: {
        this.#parseTriples();
        this.#expectPunctuation(".");
      }
    }
  }

  #parsePrefix(terminated: boolean): void {
    this.#advance();
    const name = this.#expect("prefixedName", "a prefix declaration");
    if (name.value.indexOf(":") !== name.value.length - 1) {
      throw new UnexpectedTokenError(
        'a name ending in ":"',
        name.value,
        name.line,
      );
    }
    const iri = this.#expect("iri", "an IRI");
    this.#prefixes.set(
      name.value.slice(0, -1),
      this.#resolve(iri.value, iri.line),
    );
    if (terminated) this.#expectPunctuation(".");
  }

  #parseBase(terminated: boolean): void {
    this.#advance();
    const iri = this.#expect("iri", "an IRI");
    this.#base = this.#resolve(iri.value, iri.line);
    if (terminated) this.#expectPunctuation(".");
  }

  #parseTriples(): void {
    const token = this.#current();
    if (this.#isPunctuation("[")) {
      const subject = this.#parseBlankNodePropertyList();
      if (!this.#isPunctuation(".")) {
        this.#parsePredicateObjectList(subject, token.line);
      }
      return;
    }
    const subject = this.#parseSubject();
    this.#parsePredicateObjectList(subject, token.line);
  }

  #parseSubject(): SubjectTerm {
    const token = this.#current();
    switch (token.kind) {
      case "iri": {
        this.#advance();
        return { kind: "iri", iri: this.#resolve(token.value, token.line) };
      }
      case "prefixedName": {
        this.#advance();
        return { kind: "iri", iri: this.#expandPrefixed(token) };
      }
      case "blankNode": {
        this.#advance();
        return { kind: "blankNode", id: token.value };
      }
      case "punctuation": {
        if (token.value === "(") return this.#parseCollection();
        return this.#fail("a subject");
      }
      default: {
        return this.#fail("a subject");
      }
    }
  }

  #parsePredicateObjectList(subject: SubjectTerm, line: number): void {
    this.#parseVerbObjects(subject, line);
    while (this.#isPunctuation(";")) {
      while (this.#isPunctuation(";")) this.#advance();
      if (
        this.#isPunctuation(".") ||
        this.#isPunctuation("]") ||
        this.#current().kind === "eof"
      ) {
        return;
      }
      this.#parseVerbObjects(subject, line);
    }
  }

  #parseVerbObjects(subject: SubjectTerm, line: number): void {
    const predicate = this.#parseVerb();
    for (;;) {
      const object = this.#parseObject();
      this.#triples.push({ subject, predicate, object, line });
      if (!this.#isPunctuation(",")) return;
      this.#advance();
    }
  }

  #parseVerb(): string {
    const token = this.#current();
    switch (token.kind) {
      case "a": {
        this.#advance();
        return RDF.type;
      }
      case "iri": {
        this.#advance();
        return this.#resolve(token.value, token.line);
      }
      case "prefixedName": {
        this.#advance();
        return this.#expandPrefixed(token);
      }
      default: {
        return this.#fail("a predicate");
      }
    }
  }

  // === Objects ===

  #parseObject(): RDFTerm {
    const token = this.#current();
    switch (token.kind) {
      case "iri": {
        this.#advance();
        return iriTerm(this.#resolve(token.value, token.line));
      }
      case "prefixedName": {
        this.#advance();
        return iriTerm(this.#expandPrefixed(token));
      }
      case "blankNode": {
        this.#advance();
        return blankNodeTerm(token.value);
      }
      case "string": {
        this.#advance();
        return literalTerm(this.#parseLiteralSuffix(token.value));
      }
      case "integer":
      case "decimal":
      case "double":
      case "boolean": {
        this.#advance();
        return literalTerm({
          lexicalForm: token.value,
          datatype: NUMERIC_DATATYPE[token.kind] ?? `${XSD_NAMESPACE}string`,
        });
      }
      case "punctuation": {
        if (token.value === "[") return this.#parseBlankNodePropertyList();
        if (token.value === "(") return this.#parseCollection();
        return this.#fail("an object");
      }
      default: {
        return this.#fail("an object");
      }
    }
  }

  #parseLiteralSuffix(lexicalForm: string): OWLLiteral {
    const token = this.#current();
    if (token.kind === "languageTag") {
      this.#advance();
      return { lexicalForm, datatype: RDF.langString, language: token.value };
    }
    if (token.kind === "datatypeMarker") {
      this.#advance();
      const datatype = this.#current();
      if (datatype.kind === "iri") {
        this.#advance();
        return {
          lexicalForm,
          datatype: this.#resolve(datatype.value, datatype.line),
        };
      }
      if (datatype.kind === "prefixedName") {
        this.#advance();
        return { lexicalForm, datatype: this.#expandPrefixed(datatype) };
      }
      return this.#fail("a datatype IRI");
    }
    return { lexicalForm, datatype: `${XSD_NAMESPACE}string` };
  }

  /**
   * `[ … ]`: a fresh blank node described by the enclosed predicate list.
   */
  #parseBlankNodePropertyList(): SubjectTerm {
    const open = this.#advance();
    const node = this.#freshBlankNode();
    if (!this.#isPunctuation("]")) {
      this.#parsePredicateObjectList(node, open.line);
    }
    this.#expectPunctuation("]");
    return node;
  }

  /**
   * `( a b c )` desugared to an rdf:first/rdf:rest chain. `()` is rdf:nil.
   */
  #parseCollection(): SubjectTerm {
    const open = this.#advance();
    const items: RDFTerm[] = [];
    while (!this.#isPunctuation(")")) {
      if (this.#current().kind === "eof") this.#fail('")"');
      items.push(this.#parseObject());
    }
    this.#advance();

    if (items.length === 0) return { kind: "iri", iri: RDF.nil };

    const head = this.#freshBlankNode();
    let node = head;
    for (const [index, item] of items.entries()) {
      const rest: RDFTerm =
        index === items.length - 1 ? iriTerm(RDF.nil) : this.#freshBlankNode();
      this.#triples.push(
        { subject: node, predicate: RDF.first, object: item, line: open.line },
        { subject: node, predicate: RDF.rest, object: rest, line: open.line },
      );
      if (rest.kind === "blankNode") node = rest;
    }
    return head;
  }

  // === Names ===

  #freshBlankNode(): SubjectTerm {
    let id = `genid${this.#blankCounter}`;
    while (this.#documentLabels.has(id)) {
      this.#blankCounter += 1;
      id = `genid${this.#blankCounter}`;
    }
    this.#blankCounter += 1;
    return { kind: "blankNode", id };
  }

  #expandPrefixed(token: Token): string {
    const colon = token.value.indexOf(":");
    const prefix = token.value.slice(0, colon);
    const namespace = this.#prefixes.get(prefix);
    if (namespace === undefined) {
      throw new UndefinedPrefixError(prefix, token.line);
    }
    return namespace + token.value.slice(colon + 1);
  }

  #resolve(iri: string, line: number): string {
    if (this.#base === undefined || ABSOLUTE_IRI.test(iri)) return iri;
    try {
      return new URL(iri, this.#base).href;
    } catch (error) {
      throw new InvalidIriError(line, iri, { cause: error });
    }
  }
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case "string": {
      return `string "${token.value}"`;
    }
    case "iri": {
      return `<${token.value}>`;
    }
    case "blankNode": {
      return `_:${token.value}`;
    }
    case "languageTag": {
      return `@${token.value}`;
    }
    default: {
      return `"${token.value}"`;
    }
  }
}

/**
 * Tokenizes and parses a Turtle document.
 *
 * @throws TurtleSyntaxError on the first lexical or grammatical error
 */
export function parseTurtle(
  input: string,
  options: ParserOptions = {},
): ParsedDocument {
  return new Parser(new Tokenizer(input).tokenize(), options).parse();
}
