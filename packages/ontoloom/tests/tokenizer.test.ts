/**
 * Unit tests for the Turtle tokenizer.
 */
import { describe, expect, it } from "vitest";

import {
  InvalidIriError,
  UnexpectedCharacterError,
  UnexpectedTokenError,
  UnterminatedStringError,
} from "../src/errors";
import { tokenize } from "../src/turtle/tokenizer";

function kinds(input: string): string[] {
  return tokenize(input).map((token) => token.kind);
}

function values(input: string): string[] {
  return tokenize(input).map((token) => token.value);
}

describe("tokenize", () => {
  it("ends every stream with eof", () => {
    expect(tokenize("")).toEqual([{ kind: "eof", value: "", line: 1 }]);
  });

  it("reads a simple statement", () => {
    expect(kinds('ex:a ex:p "x"@en .')).toEqual([
      "prefixedName",
      "prefixedName",
      "string",
      "languageTag",
      "punctuation",
      "eof",
    ]);
    expect(values('ex:a ex:p "x"@en .')).toEqual(["ex:a", "ex:p", "x", "en", ".", ""]);
  });

  describe("directives", () => {
    it("reads @prefix and @base", () => {
      expect(kinds("@prefix ex: <http://example.org/> .")).toEqual([
        "prefixDirective",
        "prefixedName",
        "iri",
        "punctuation",
        "eof",
      ]);
      expect(kinds("@base <http://example.org/> .")[0]).toBe("baseDirective");
    });

    it("reads SPARQL-style directives in any case", () => {
      expect(kinds("PREFIX ex: <http://example.org/>")).toEqual([
        "sparqlPrefix",
        "prefixedName",
        "iri",
        "eof",
      ]);
      expect(kinds("base <http://example.org/>")[0]).toBe("sparqlBase");
    });
  });

  describe("IRIs and names", () => {
    it("strips angle brackets", () => {
      expect(values("<http://example.org/a#b>")[0]).toBe("http://example.org/a#b");
    });

    it("rejects whitespace inside IRIs", () => {
      expect(() => tokenize("<http://example.org/a b>")).toThrow(InvalidIriError);
    });

    it("rejects unterminated IRIs", () => {
      expect(() => tokenize("<http://example.org/")).toThrow(InvalidIriError);
    });

    it("gives a trailing dot back to the statement", () => {
      expect(values("ex:a ex:b ex:c.")).toEqual(["ex:a", "ex:b", "ex:c", ".", ""]);
    });

    it("keeps inner dots and empty local parts", () => {
      expect(values("ex:v1.2 ex:")).toEqual(["ex:v1.2", "ex:", ""]);
    });

    it("reads the empty prefix", () => {
      expect(tokenize(":alice")[0]).toEqual({
        kind: "prefixedName",
        value: ":alice",
        line: 1,
      });
    });

    it("reads keywords", () => {
      expect(kinds("a true false")).toEqual(["a", "boolean", "boolean", "eof"]);
    });

    it("rejects other bare words", () => {
      expect(() => tokenize("ex:a ex:p maybe .")).toThrow(UnexpectedTokenError);
    });

    it("reads blank node labels without the marker", () => {
      expect(tokenize("_:node1")[0]).toEqual({ kind: "blankNode", value: "node1", line: 1 });
    });
  });

  describe("strings", () => {
    it("decodes escapes", () => {
      expect(values(String.raw`"a\tb\"cé\U0001F600"`)[0]).toBe('a\tb"cé😀');
    });

    it("keeps unknown escapes as written", () => {
      expect(values(String.raw`"a\qb"`)[0]).toBe(String.raw`a\qb`);
    });

    it("keeps escapes beyond the last code point as written", () => {
      expect(values(String.raw`"x\UFFFFFFFF"`)[0]).toBe(String.raw`x\UFFFFFFFF`);
      expect(values(String.raw`"\U0010FFFF"`)[0]).toBe("\u{10FFFF}");
    });

    it("reads single-quoted strings", () => {
      expect(values("'it'")[0]).toBe("it");
    });

    it("reads long strings across lines", () => {
      const tokens = tokenize('"""line one\nline \\"two\\""""\nex:a');
      expect(tokens[0]).toEqual({ kind: "string", value: 'line one\nline "two"', line: 1 });
      expect(tokens[1]).toEqual({ kind: "prefixedName", value: "ex:a", line: 3 });
    });

    it("reports unterminated strings at their opening line", () => {
      let caught: unknown;
      try {
        tokenize('ex:a ex:p\n  "open\n"');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(UnterminatedStringError);
      if (caught instanceof UnterminatedStringError) expect(caught.line).toBe(2);
    });

    it("reports strings cut off by the end of input", () => {
      expect(() => tokenize('"never closed')).toThrow(UnterminatedStringError);
    });
  });

  describe("numbers", () => {
    it("distinguishes integer, decimal and double", () => {
      expect(tokenize("42 -3.14 .5 6.02e23 1E-3").map((t) => [t.kind, t.value])).toEqual([
        ["integer", "42"],
        ["decimal", "-3.14"],
        ["decimal", ".5"],
        ["double", "6.02e23"],
        ["double", "1E-3"],
        ["eof", ""],
      ]);
    });

    it("ends a statement on a dot after an integer", () => {
      expect(values("30.")).toEqual(["30", ".", ""]);
    });
  });

  describe("datatypes and punctuation", () => {
    it("reads the datatype marker", () => {
      expect(kinds('"5"^^xsd:integer')).toEqual([
        "string",
        "datatypeMarker",
        "prefixedName",
        "eof",
      ]);
    });

    it("rejects a lone caret", () => {
      expect(() => tokenize('"5"^xsd:integer')).toThrow(UnexpectedCharacterError);
    });

    it("reads brackets and parentheses", () => {
      expect(values("[ ] ( ) ; ,")).toEqual(["[", "]", "(", ")", ";", ",", ""]);
    });

    it("rejects unknown characters", () => {
      expect(() => tokenize("ex:a $ .")).toThrow(UnexpectedCharacterError);
    });
  });

  it("skips comments and counts lines", () => {
    const tokens = tokenize("# header\nex:a # trailing\n\nex:b");
    expect(tokens.map((token) => [token.value, token.line])).toEqual([
      ["ex:a", 2],
      ["ex:b", 4],
      ["", 4],
    ]);
  });
});
