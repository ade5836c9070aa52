/**
 * Unit tests for the Turtle parser.
 */
import { describe, expect, it } from "vitest";

import {
  InvalidIriError,
  UndefinedPrefixError,
  UnexpectedEndOfInputError,
  UnexpectedTokenError,
} from "../src/errors";
import { parseTurtle } from "../src/turtle/parser";
import { type Triple } from "../src/turtle/types";
import { RDF, XSD_NAMESPACE } from "../src/vocabulary";

const EX = "http://example.org/";
const HEADER = `@prefix ex: <${EX}> .\n`;

function simplify(triple: Triple): [string, string, string] {
  const subject =
    triple.subject.kind === "iri" ? triple.subject.iri : `_:${triple.subject.id}`;
  const { object } = triple;
  let rendered: string;
  switch (object.kind) {
    case "iri": {
      rendered = object.iri;
      break;
    }
    case "blankNode": {
      rendered = `_:${object.id}`;
      break;
    }
    case "literal": {
      rendered = object.literal.lexicalForm;
      break;
    }
  }
  return [subject, triple.predicate, rendered];
}

function triplesOf(body: string): [string, string, string][] {
  return parseTurtle(HEADER + body).triples.map(simplify);
}

describe("parseTurtle", () => {
  describe("directives", () => {
    it("collects prefixes in both syntaxes", () => {
      const document = parseTurtle(
        `@prefix ex: <${EX}> .\nPREFIX foaf: <http://xmlns.com/foaf/0.1/>\n`,
      );
      expect(document.prefixes).toEqual({
        ex: EX,
        foaf: "http://xmlns.com/foaf/0.1/",
      });
      expect(document.triples).toEqual([]);
      expect(document.base).toBeUndefined();
    });

    it("lets later bindings win", () => {
      const document = parseTurtle(
        "@prefix ex: <http://one.org/> .\n@prefix ex: <http://two.org/> .\nex:a ex:b ex:c .",
      );
      expect(document.prefixes.ex).toBe("http://two.org/");
      expect(simplify(document.triples[0] ?? fail())).toEqual([
        "http://two.org/a",
        "http://two.org/b",
        "http://two.org/c",
      ]);
    });

    it("resolves relative IRIs against the base", () => {
      const document = parseTurtle(
        "@base <http://example.org/dir/> .\n<item> <#p> <../other> .",
      );
      expect(document.base).toBe("http://example.org/dir/");
      expect(simplify(document.triples[0] ?? fail())).toEqual([
        "http://example.org/dir/item",
        "http://example.org/dir/#p",
        "http://example.org/other",
      ]);
    });

    it("accepts an initial base and prefixes", () => {
      const document = parseTurtle("<a> ex:p ex:o .", {
        baseIRI: "http://base.org/",
        prefixes: { ex: EX },
      });
      expect(simplify(document.triples[0] ?? fail())).toEqual([
        "http://base.org/a",
        `${EX}p`,
        `${EX}o`,
      ]);
    });

    it("rejects prefix names with a local part", () => {
      expect(() => parseTurtle(`@prefix ex:a <${EX}> .`)).toThrow(UnexpectedTokenError);
    });
  });

  describe("triples", () => {
    it("expands predicate and object lists", () => {
      expect(triplesOf("ex:s a ex:T ; ex:p ex:o1 , ex:o2 ; .")).toEqual([
        [`${EX}s`, RDF.type, `${EX}T`],
        [`${EX}s`, `${EX}p`, `${EX}o1`],
        [`${EX}s`, `${EX}p`, `${EX}o2`],
      ]);
    });

    it("records the line of the subject", () => {
      const document = parseTurtle(`${HEADER}\nex:s\n  ex:p ex:o .`);
      expect(document.triples[0]?.line).toBe(3);
    });

    it("types literals with full datatype IRIs", () => {
      const document = parseTurtle(
        `${HEADER}ex:s ex:p "x" , "y"@en , "5"^^<${XSD_NAMESPACE}int> , 7 , 1.5 , 2e3 , true .`,
      );
      const literals = document.triples.map((triple) =>
        triple.object.kind === "literal" ? triple.object.literal : undefined,
      );
      expect(literals).toEqual([
        { lexicalForm: "x", datatype: `${XSD_NAMESPACE}string` },
        { lexicalForm: "y", datatype: RDF.langString, language: "en" },
        { lexicalForm: "5", datatype: `${XSD_NAMESPACE}int` },
        { lexicalForm: "7", datatype: `${XSD_NAMESPACE}integer` },
        { lexicalForm: "1.5", datatype: `${XSD_NAMESPACE}decimal` },
        { lexicalForm: "2e3", datatype: `${XSD_NAMESPACE}double` },
        { lexicalForm: "true", datatype: `${XSD_NAMESPACE}boolean` },
      ]);
    });

    it("keeps labelled blank nodes", () => {
      expect(triplesOf("_:x ex:p _:y .")).toEqual([["_:x", `${EX}p`, "_:y"]]);
    });
  });

  describe("blank node property lists", () => {
    it("mints fresh labels for nested nodes", () => {
      expect(triplesOf("ex:s ex:p [ ex:q ex:o ; ex:r [ ex:t 1 ] ] .")).toEqual([
        ["_:genid0", `${EX}q`, `${EX}o`],
        ["_:genid1", `${EX}t`, "1"],
        ["_:genid0", `${EX}r`, "_:genid1"],
        [`${EX}s`, `${EX}p`, "_:genid0"],
      ]);
    });

    it("accepts a property list as subject, with or without more predicates", () => {
      expect(triplesOf("[ ex:p ex:o ] ex:q ex:r .\n[ ex:a ex:b ] .")).toEqual([
        ["_:genid0", `${EX}p`, `${EX}o`],
        ["_:genid0", `${EX}q`, `${EX}r`],
        ["_:genid1", `${EX}a`, `${EX}b`],
      ]);
    });

    it("never mints a label the document uses", () => {
      expect(
        triplesOf("ex:s ex:p [ ex:q ex:o ] .\n_:genid0 ex:a ex:b .\n_:genid2 ex:c ( ex:d ) ."),
      ).toEqual([
        ["_:genid1", `${EX}q`, `${EX}o`],
        [`${EX}s`, `${EX}p`, "_:genid1"],
        ["_:genid0", `${EX}a`, `${EX}b`],
        ["_:genid3", RDF.first, `${EX}d`],
        ["_:genid3", RDF.rest, RDF.nil],
        ["_:genid2", `${EX}c`, "_:genid3"],
      ]);
    });

    it("accepts an empty property list", () => {
      expect(triplesOf("ex:s ex:p [] .")).toEqual([[`${EX}s`, `${EX}p`, "_:genid0"]]);
    });
  });

  describe("collections", () => {
    it("desugars into first/rest chains", () => {
      expect(triplesOf("ex:s ex:p ( ex:a ex:b ) .")).toEqual([
        ["_:genid0", RDF.first, `${EX}a`],
        ["_:genid0", RDF.rest, "_:genid1"],
        ["_:genid1", RDF.first, `${EX}b`],
        ["_:genid1", RDF.rest, RDF.nil],
        [`${EX}s`, `${EX}p`, "_:genid0"],
      ]);
    });

    it("reads the empty collection as rdf:nil", () => {
      expect(triplesOf("ex:s ex:p () .")).toEqual([[`${EX}s`, `${EX}p`, RDF.nil]]);
    });
  });

  describe("errors", () => {
    it("reports a missing object", () => {
      let caught: unknown;
      try {
        parseTurtle(`${HEADER}ex:Person a .`);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(UnexpectedTokenError);
      if (!(caught instanceof UnexpectedTokenError)) return;
      expect(caught.details).toEqual({ expected: "an object", found: '"."', line: 2 });
    });

    it("describes the offending token", () => {
      expect(() => parseTurtle(`${HEADER}"lit" ex:p ex:o .`)).toThrow(
        'Unexpected token: expected a subject, found string "lit" (line 2)',
      );
    });

    it("reports undeclared prefixes", () => {
      expect(() => parseTurtle("foaf:a foaf:b foaf:c .")).toThrow(UndefinedPrefixError);
    });

    it("reports truncated input", () => {
      expect(() => parseTurtle(`${HEADER}ex:s ex:p ex:o`)).toThrow(UnexpectedEndOfInputError);
      expect(() => parseTurtle(`${HEADER}ex:s ex:p ( ex:a`)).toThrow(
        UnexpectedEndOfInputError,
      );
    });

    it("reports unresolvable relative IRIs", () => {
      expect(() => parseTurtle("<a> <b> <c> .", { baseIRI: "not a base" })).toThrow(
        InvalidIriError,
      );
    });
  });
});

function fail(): never {
  throw new Error("expected a triple");
}
