import { describe, expect, it } from "vitest";

import {
  integerLiteral,
  langStringLiteral,
  stringLiteral,
  typedLiteral,
} from "../src/owl";
import {
  blankNodeTerm,
  decodeRDFTerm,
  encodeRDFTerm,
  iriTerm,
  literalTerm,
  rdfTermFromLiteral,
  rdfTermToLiteral,
} from "../src/rdf";

describe("encodeRDFTerm", () => {
  it("writes IRIs as-is", () => {
    expect(encodeRDFTerm(iriTerm("ex:alice"))).toBe("ex:alice");
  });

  it("writes literals in N-Triples style", () => {
    expect(encodeRDFTerm(literalTerm(stringLiteral("plain")))).toBe('"plain"');
    expect(encodeRDFTerm(literalTerm(integerLiteral(30)))).toBe('"30"^^xsd:integer');
    expect(encodeRDFTerm(literalTerm(langStringLiteral("hello", "en")))).toBe(
      '"hello"@en',
    );
  });

  it("escapes quotes, backslashes and control characters", () => {
    expect(encodeRDFTerm(literalTerm(stringLiteral('say "hi"\\\n\t')))).toBe(
      String.raw`"say \"hi\"\\\n\t"`,
    );
  });

  it("writes blank nodes with their marker", () => {
    expect(blankNodeTerm("_:b1")).toEqual({ kind: "blankNode", id: "b1" });
    expect(encodeRDFTerm(blankNodeTerm("b1"))).toBe("_:b1");
  });
});

describe("decodeRDFTerm", () => {
  it("reads each term kind", () => {
    expect(decodeRDFTerm("http://example.org/x")).toEqual(iriTerm("http://example.org/x"));
    expect(decodeRDFTerm("_:n7")).toEqual(blankNodeTerm("n7"));
    expect(decodeRDFTerm('"hello"@en')).toEqual(
      literalTerm(langStringLiteral("hello", "en")),
    );
    expect(decodeRDFTerm('"2024-01-02"^^xsd:date')).toEqual(
      literalTerm(typedLiteral("2024-01-02", "xsd:date")),
    );
    expect(decodeRDFTerm('"x"')).toEqual(literalTerm(stringLiteral("x")));
  });

  it("undoes escapes", () => {
    expect(decodeRDFTerm(String.raw`"a\"b\\c\nd"`)).toEqual(
      literalTerm(stringLiteral('a"b\\c\nd')),
    );
  });

  it("keeps the backslash of unknown escapes", () => {
    expect(decodeRDFTerm(String.raw`"a\qb"`)).toEqual(literalTerm(stringLiteral(String.raw`a\qb`)));
  });

  it("ends an unterminated literal at the end of input", () => {
    expect(decodeRDFTerm('"open')).toEqual(literalTerm(stringLiteral("open")));
  });

  it("inverts encoding", () => {
    const literal = typedLiteral('line1\nline2 "quoted"', "ex:custom");
    expect(decodeRDFTerm(encodeRDFTerm(literalTerm(literal)))).toEqual(literalTerm(literal));
  });
});

describe("literal bridge", () => {
  it("wraps and unwraps literals", () => {
    const literal = integerLiteral(5);
    expect(rdfTermToLiteral(rdfTermFromLiteral(literal))).toEqual(literal);
    expect(rdfTermToLiteral(iriTerm("ex:a"))).toBeUndefined();
  });
});
