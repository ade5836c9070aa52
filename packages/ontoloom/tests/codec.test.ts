import { describe, expect, it, vi } from "vitest";

import { ValidationError } from "../src/errors";
import {
  classAssertion,
  createClass,
  createDataProperty,
  createNamedIndividual,
  createObjectProperty,
  dataPropertyAssertion,
  dataRanges,
  integerLiteral,
  inverseObjectProperties,
  namedClass,
  objectPropertyAssertion,
  OWLOntology,
  sameIndividual,
  simpleEquivalent,
  simpleSubClassOf,
} from "../src/owl";
import { decodeTurtle, encodeTurtle } from "../src/turtle";

function zoo(): OWLOntology {
  return new OWLOntology({
    iri: "http://example.org/zoo",
    prefixes: { ex: "http://example.org/" },
    classes: [createClass("ex:Person", { label: "Person" }), createClass("ex:Student")],
    dataProperties: [
      createDataProperty("ex:age", { isFunctional: true, ranges: [dataRanges.integer] }),
    ],
    individuals: [createNamedIndividual("ex:alice")],
    axioms: [
      simpleSubClassOf("ex:Student", "ex:Person"),
      classAssertion("ex:alice", namedClass("ex:Student")),
      dataPropertyAssertion("ex:alice", "ex:age", integerLiteral(30)),
    ],
  });
}

describe("encodeTurtle", () => {
  it("calls hooks around encoding", () => {
    const onEncodeStart = vi.fn();
    const onEncodeEnd = vi.fn();
    const text = encodeTurtle(zoo(), { hooks: { onEncodeStart, onEncodeEnd } });

    expect(onEncodeStart).toHaveBeenCalledOnce();
    const [ctx] = onEncodeStart.mock.calls[0] ?? [];
    expect(onEncodeEnd).toHaveBeenCalledWith(
      ctx,
      expect.objectContaining({ lineCount: text.split("\n").length }),
    );
  });

  it("gives each call its own operation ID", () => {
    const onEncodeStart = vi.fn();
    encodeTurtle(zoo(), { hooks: { onEncodeStart } });
    encodeTurtle(zoo(), { hooks: { onEncodeStart } });
    const ids = onEncodeStart.mock.calls.map(([ctx]: unknown[]) =>
      typeof ctx === "object" && ctx !== null ? Reflect.get(ctx, "operationId") : undefined,
    );
    expect(ids).toHaveLength(2);
    expect(ids[0]).not.toBe(ids[1]);
  });

  it("rejects malformed options", () => {
    expect(() => encodeTurtle(zoo(), { prefixes: { "two words": "http://x.org/" } })).toThrow(
      ValidationError,
    );
    expect(() => encodeTurtle(zoo(), { prefixes: { ex: "" } })).toThrow(ValidationError);
  });

  it("names the options in validation errors", () => {
    let caught: unknown;
    try {
      encodeTurtle(zoo(), { prefixes: { ex: "" } });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.message).toContain("EncodeOptions");
    }
  });
});

describe("round trip", () => {
  it("reaches a fixed point after one decode", () => {
    const text = encodeTurtle(zoo());
    expect(encodeTurtle(decodeTurtle(text))).toBe(text);
  });

  it("keeps entities and assertions", () => {
    const decoded = decodeTurtle(encodeTurtle(zoo()));
    expect(decoded.iri).toBe("http://example.org/zoo");
    expect(decoded.classes.map((c) => c.iri)).toEqual(["ex:Person", "ex:Student"]);
    expect(decoded.findClass("ex:Person")?.label).toBe("Person");
    expect(decoded.superClasses("ex:Student")).toEqual([namedClass("ex:Person")]);
    expect(decoded.classAssertions("ex:alice")).toEqual([namedClass("ex:Student")]);
    expect(decoded.dataPropertyAssertions("ex:alice")).toEqual([
      { property: "ex:age", value: integerLiteral(30) },
    ]);
    expect(decoded.findDataProperty("ex:age")?.isFunctional).toBe(true);
  });

  it("keeps every inverse of a property", () => {
    const ontology = new OWLOntology({
      iri: "http://example.org/kin",
      prefixes: { ex: "http://example.org/" },
      objectProperties: [createObjectProperty("ex:p")],
      axioms: [
        inverseObjectProperties("ex:p", "ex:q"),
        inverseObjectProperties("ex:p", "ex:r"),
      ],
    });
    const decoded = decodeTurtle(encodeTurtle(ontology));
    expect(decoded.axioms).toEqual([
      inverseObjectProperties("ex:p", "ex:q"),
      inverseObjectProperties("ex:p", "ex:r"),
    ]);
  });

  it("keeps assertions about undeclared individuals", () => {
    const ontology = new OWLOntology({
      iri: "http://example.org/kin",
      prefixes: { ex: "http://example.org/" },
      axioms: [
        objectPropertyAssertion("ex:bob", "ex:knows", "ex:alice"),
        dataPropertyAssertion("ex:bob", "ex:age", integerLiteral(30)),
      ],
    });
    const decoded = decodeTurtle(encodeTurtle(ontology));
    expect(decoded.individuals).toEqual([]);
    expect(decoded.axioms).toEqual(ontology.axioms);
  });

  it("keeps n-ary equivalence and sameness as single axioms", () => {
    const ontology = new OWLOntology({
      iri: "http://example.org/kin",
      prefixes: { ex: "http://example.org/" },
      axioms: [
        simpleEquivalent("ex:A", "ex:B", "ex:C"),
        sameIndividual(["ex:a", "ex:b", "ex:c"]),
      ],
    });
    const decoded = decodeTurtle(encodeTurtle(ontology));
    expect(decoded.axioms).toEqual(ontology.axioms);
  });
});
