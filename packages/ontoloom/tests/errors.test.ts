/**
 * Unit tests for Ontoloom error classes.
 */
import { describe, expect, it } from "vitest";
import { z } from "zod";

import {
  ConfigurationError,
  getErrorSuggestion,
  InvalidIriError,
  isOntoloomError,
  isSystemError,
  isTurtleSyntaxError,
  isUserRecoverable,
  OntoloomError,
  TransportError,
  TurtleSyntaxError,
  UndefinedPrefixError,
  UnexpectedCharacterError,
  UnexpectedEndOfInputError,
  UnexpectedTokenError,
  UnrecognizedNodeError,
  UnterminatedStringError,
  ValidationError,
} from "../src/errors";
import { validateWithSchema } from "../src/errors/validation";

describe("OntoloomError", () => {
  it("creates error with message, code, and options", () => {
    const error = new OntoloomError("test message", "TEST_CODE", {
      category: "user",
    });
    expect(error.message).toBe("test message");
    expect(error.code).toBe("TEST_CODE");
    expect(error.name).toBe("OntoloomError");
    expect(error.category).toBe("user");
  });

  it("stores frozen details", () => {
    const error = new OntoloomError("test", "CODE", {
      category: "system",
      details: { foo: "bar", count: 42 },
    });
    expect(error.details).toEqual({ foo: "bar", count: 42 });
    expect(Object.isFrozen(error.details)).toBe(true);
  });

  it("defaults to empty details", () => {
    const error = new OntoloomError("test", "CODE", { category: "user" });
    expect(error.details).toEqual({});
  });

  it("supports error cause chain", () => {
    const cause = new Error("root cause");
    const error = new OntoloomError("wrapper", "CODE", {
      category: "system",
      cause,
    });
    expect(error.cause).toBe(cause);
  });

  describe("toUserMessage", () => {
    it("returns the message alone without a suggestion", () => {
      const error = new OntoloomError("plain", "CODE", { category: "user" });
      expect(error.toUserMessage()).toBe("plain");
    });

    it("appends the suggestion", () => {
      const error = new OntoloomError("broken", "CODE", {
        category: "user",
        suggestion: "fix it",
      });
      expect(error.toUserMessage()).toBe("broken\n\nSuggestion: fix it");
    });
  });

  describe("toLogString", () => {
    it("includes code, category, suggestion, details and cause", () => {
      const error = new OntoloomError("broken", "SOME_CODE", {
        category: "constraint",
        suggestion: "fix it",
        details: { line: 3 },
        cause: "upstream",
      });
      expect(error.toLogString()).toBe(
        [
          "[SOME_CODE] broken",
          "  Category: constraint",
          "  Suggestion: fix it",
          '  Details: {"line":3}',
          "  Cause: upstream",
        ].join("\n"),
      );
    });

    it("omits empty sections", () => {
      const error = new OntoloomError("bare", "BARE", { category: "system" });
      expect(error.toLogString()).toBe("[BARE] bare\n  Category: system");
    });

    it("serializes object causes as JSON", () => {
      const error = new OntoloomError("x", "X", {
        category: "system",
        cause: { reason: "timeout" },
      });
      expect(error.toLogString()).toContain('  Cause: {"reason":"timeout"}');
    });
  });
});

describe("Turtle syntax errors", () => {
  it("UnexpectedTokenError records expected, found and line", () => {
    const error = new UnexpectedTokenError("an object", '"."', 4);
    expect(error).toBeInstanceOf(TurtleSyntaxError);
    expect(error.name).toBe("UnexpectedTokenError");
    expect(error.code).toBe("TURTLE_UNEXPECTED_TOKEN");
    expect(error.line).toBe(4);
    expect(error.message).toBe(
      'Unexpected token: expected an object, found "." (line 4)',
    );
    expect(error.details).toEqual({ expected: "an object", found: '"."', line: 4 });
  });

  it("UnterminatedStringError carries its line", () => {
    const error = new UnterminatedStringError(2);
    expect(error.code).toBe("TURTLE_UNTERMINATED_STRING");
    expect(error.details).toEqual({ line: 2 });
    expect(error.message).toBe("Unterminated string literal (line 2)");
  });

  it("UndefinedPrefixError names the prefix", () => {
    const error = new UndefinedPrefixError("foaf", 7);
    expect(error.code).toBe("TURTLE_UNDEFINED_PREFIX");
    expect(error.prefix).toBe("foaf");
    expect(error.line).toBe(7);
    expect(error.message).toBe('Undefined prefix "foaf:" (line 7)');
    expect(error.suggestion).toBe(
      'Declare it before use, e.g. "@prefix foaf: <http://example.org/foaf#> ."',
    );
  });

  it("InvalidIriError includes the IRI when known", () => {
    expect(new InvalidIriError(1, "http://x").details).toEqual({
      iri: "http://x",
      line: 1,
    });
    expect(new InvalidIriError(1).details).toEqual({ line: 1 });
  });

  it("UnexpectedCharacterError names the character", () => {
    const error = new UnexpectedCharacterError("$", 5);
    expect(error.code).toBe("TURTLE_UNEXPECTED_CHARACTER");
    expect(error.details).toEqual({ character: "$", line: 5 });
  });

  it("UnexpectedEndOfInputError has a code and suggestion", () => {
    const error = new UnexpectedEndOfInputError(9);
    expect(error.code).toBe("TURTLE_UNEXPECTED_END_OF_INPUT");
    expect(error.suggestion).toBe('Terminate the last statement with ".".');
  });
});

describe("UnrecognizedNodeError", () => {
  it("describes class expressions and data ranges", () => {
    expect(new UnrecognizedNodeError("_:b0", "classExpression").message).toBe(
      "Blank node _:b0 is not a recognizable class expression",
    );
    expect(new UnrecognizedNodeError("_:b1", "dataRange", 3).details).toEqual({
      node: "_:b1",
      expected: "dataRange",
      line: 3,
    });
  });

  it("is not a syntax error", () => {
    expect(isTurtleSyntaxError(new UnrecognizedNodeError("_:b0", "dataRange"))).toBe(
      false,
    );
  });
});

describe("TransportError", () => {
  it("uses the transport code and keeps the cause", () => {
    const cause = new SyntaxError("bad json");
    const error = new TransportError("unreadable", { iri: "ex:o" }, { cause });
    expect(error.code).toBe("TRANSPORT_ERROR");
    expect(error.details).toEqual({ iri: "ex:o" });
    expect(error.cause).toBe(cause);
  });
});

describe("ConfigurationError", () => {
  it("has a default suggestion", () => {
    const error = new ConfigurationError("negative", { cardinality: -1 });
    expect(error.code).toBe("CONFIGURATION_ERROR");
    expect(error.suggestion).toBe("Review the arguments passed to the model API.");
  });
});

describe("ValidationError", () => {
  it("lists the failing fields in its suggestion", () => {
    const error = new ValidationError("Invalid", {
      subject: "DecodeOptions",
      issues: [
        { path: "strict", message: "expected boolean" },
        { path: "", message: "bad root" },
      ],
    });
    expect(error.suggestion).toBe(
      "Check the following fields: strict, (root). See error.details.issues for specific validation failures.",
    );
  });
});

describe("validateWithSchema", () => {
  const schema = z.object({ name: z.string(), count: z.number().default(1) });

  it("returns parsed output with defaults", () => {
    expect(validateWithSchema(schema, { name: "a" }, "Thing")).toEqual({
      name: "a",
      count: 1,
    });
  });

  it("throws ValidationError naming the subject and paths", () => {
    let caught: unknown;
    try {
      validateWithSchema(schema, { name: 3 }, "Thing");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.message.startsWith("Invalid Thing: name: ")).toBe(true);
    expect(caught.details.subject).toBe("Thing");
    expect(caught.details.issues.map((issue) => issue.path)).toEqual(["name"]);
  });
});

describe("guards", () => {
  const syntax = new UndefinedPrefixError("ex", 1);
  const system = new OntoloomError("boom", "BOOM", { category: "system" });

  it("isOntoloomError", () => {
    expect(isOntoloomError(syntax)).toBe(true);
    expect(isOntoloomError(new Error("plain"))).toBe(false);
  });

  it("isTurtleSyntaxError", () => {
    expect(isTurtleSyntaxError(syntax)).toBe(true);
    expect(isTurtleSyntaxError(system)).toBe(false);
  });

  it("isUserRecoverable and isSystemError", () => {
    expect(isUserRecoverable(syntax)).toBe(true);
    expect(isUserRecoverable(system)).toBe(false);
    expect(isUserRecoverable("nope")).toBe(false);
    expect(isSystemError(system)).toBe(true);
    expect(isSystemError(syntax)).toBe(false);
  });

  it("getErrorSuggestion", () => {
    expect(getErrorSuggestion(syntax)).toBe(syntax.suggestion);
    expect(getErrorSuggestion(new Error("plain"))).toBeUndefined();
  });
});
