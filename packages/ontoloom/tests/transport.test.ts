/**
 * Unit tests for ontology envelopes.
 */
import { describe, expect, it } from "vitest";

import { TransportError, ValidationError } from "../src/errors";
import {
  FORMAT_VERSION,
  type OntologyEnvelope,
  ontologiesEqual,
  unwrapOntology,
  wrapOntology,
} from "../src/interchange";
import {
  characteristicAxiom,
  classAssertion,
  createClass,
  createDataProperty,
  createObjectProperty,
  dataPropertyAssertion,
  dataRanges,
  langStringLiteral,
  minCardinality,
  namedClass,
  OWLOntology,
  subClassOf,
} from "../src/owl";

function family(): OWLOntology {
  return new OWLOntology({
    iri: "http://example.org/family",
    versionIRI: "http://example.org/family/1",
    prefixes: { ex: "http://example.org/" },
    classes: [createClass("ex:Person", { label: "Person", annotations: { "ex:note": "core" } })],
    objectProperties: [
      createObjectProperty("ex:hasChild", {
        characteristics: ["irreflexive"],
        inverseOf: "ex:hasParent",
        domains: [namedClass("ex:Person")],
      }),
    ],
    dataProperties: [createDataProperty("ex:name", { ranges: [dataRanges.string] })],
    axioms: [
      subClassOf(namedClass("ex:Parent"), minCardinality("ex:hasChild", 1, namedClass("ex:Person"))),
      characteristicAxiom("irreflexive", "ex:hasChild"),
      classAssertion("ex:alice", namedClass("ex:Person")),
      dataPropertyAssertion("ex:alice", "ex:name", langStringLiteral("Alice", "en")),
    ],
  });
}

function envelopeOf(text: string, typeIdentifier = "OWLOntology"): OntologyEnvelope {
  return {
    iri: "http://example.org/family",
    typeIdentifier,
    encodedData: new TextEncoder().encode(text),
  };
}

describe("wrapOntology", () => {
  it("labels the envelope with the ontology IRI and type", () => {
    const envelope = wrapOntology(family());
    expect(envelope.iri).toBe("http://example.org/family");
    expect(envelope.typeIdentifier).toBe("OWLOntology");
  });

  it("encodes JSON with sorted keys", () => {
    const text = new TextDecoder().decode(
      wrapOntology(new OWLOntology({ iri: "" })).encodedData,
    );
    expect(text.startsWith(`{"formatVersion":"${FORMAT_VERSION}","ontology":{"annotationProperties":[]`)).toBe(true);
  });

  it("encodes equal ontologies to equal bytes", () => {
    expect(wrapOntology(family()).encodedData).toEqual(wrapOntology(family()).encodedData);
  });
});

describe("unwrapOntology", () => {
  it("restores an equal ontology", () => {
    const original = family();
    const restored = unwrapOntology(wrapOntology(original));
    expect(ontologiesEqual(original, restored)).toBe(true);
    expect(restored.versionIRI).toBe("http://example.org/family/1");
    expect(restored.findObjectProperty("ex:hasChild")?.inverseOf).toBe("ex:hasParent");
    expect(restored.axioms).toEqual(original.axioms);
  });

  it("keeps prefix tables as stored", () => {
    const original = family();
    original.setPrefix("ex", "http://example.com/other#");
    expect(unwrapOntology(wrapOntology(original)).prefixes.ex).toBe("http://example.com/other#");
  });

  it("rejects envelopes of another type", () => {
    const envelope = { ...wrapOntology(family()), typeIdentifier: "ShapeGraph" };
    expect(() => unwrapOntology(envelope)).toThrow(
      'Expected an envelope of type "OWLOntology", got "ShapeGraph"',
    );
    expect(() => unwrapOntology(envelope)).toThrow(TransportError);
  });

  it("rejects bytes that are not UTF-8", () => {
    const envelope: OntologyEnvelope = {
      iri: "",
      typeIdentifier: "OWLOntology",
      encodedData: new Uint8Array([0xff, 0xfe, 0x7b]),
    };
    expect(() => unwrapOntology(envelope)).toThrow(TransportError);
  });

  it("rejects text that is not JSON", () => {
    expect(() => unwrapOntology(envelopeOf("not json"))).toThrow(TransportError);
  });

  it("rejects payloads of another format version", () => {
    const payload = JSON.stringify({ formatVersion: "0.9", ontology: family().toJSON() });
    expect(() => unwrapOntology(envelopeOf(payload))).toThrow(ValidationError);
  });

  it("reports where the payload is malformed", () => {
    const data = { ...family().toJSON(), axioms: [{ kind: "subClassOf", sub: { kind: "named", iri: "" } }] };
    let caught: unknown;
    try {
      unwrapOntology(envelopeOf(JSON.stringify({ formatVersion: FORMAT_VERSION, ontology: data })));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.details.subject).toBe("OntologyPayload");
    expect(caught.details.issues.length).toBeGreaterThan(0);
    expect(caught.details.issues.every((issue) => issue.path.startsWith("ontology.axioms.0"))).toBe(true);
  });
});

describe("ontologiesEqual", () => {
  it("ignores prefix key order", () => {
    const a = new OWLOntology({ iri: "", prefixes: { a: "http://a.org/", b: "http://b.org/" } });
    const b = new OWLOntology({ iri: "", prefixes: { b: "http://b.org/", a: "http://a.org/" } });
    expect(ontologiesEqual(a, b)).toBe(true);
  });

  it("compares axiom order", () => {
    const first = classAssertion("ex:a", namedClass("ex:A"));
    const second = classAssertion("ex:b", namedClass("ex:B"));
    const a = new OWLOntology({ iri: "", axioms: [first, second] });
    const b = new OWLOntology({ iri: "", axioms: [second, first] });
    expect(ontologiesEqual(a, b)).toBe(false);
  });
});
