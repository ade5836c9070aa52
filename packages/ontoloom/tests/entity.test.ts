/**
 * Unit tests for classes, individuals and properties.
 */
import { describe, expect, it } from "vitest";

import {
  anonymousIndividual,
  CHARACTERISTIC_TYPE_IRI,
  characteristicForTypeIRI,
  conflictingCharacteristics,
  createAnnotationProperty,
  createClass,
  createDataProperty,
  createObjectProperty,
  dataRanges,
  describeClass,
  describeDataProperty,
  describeIndividual,
  describeObjectProperty,
  hasCharacteristic,
  individualIdentifier,
  isPotentiallySimple,
  namedClass,
  namedIndividual,
  normalizeCharacteristics,
} from "../src/owl";
import { OWL_NAMESPACE } from "../src/vocabulary";

describe("classes", () => {
  it("defaults annotations to an empty record", () => {
    expect(createClass("ex:Person")).toEqual({ iri: "ex:Person", annotations: {} });
  });

  it("describes with the label when present", () => {
    expect(describeClass(createClass("ex:Person", { label: "Person" }))).toBe(
      "Person (ex:Person)",
    );
    expect(describeClass(createClass("ex:Person"))).toBe("ex:Person");
  });
});

describe("individuals", () => {
  it("identifies named individuals by IRI", () => {
    const alice = namedIndividual("ex:alice", { comment: "first" });
    expect(individualIdentifier(alice)).toBe("ex:alice");
    expect(describeIndividual(alice)).toBe("ex:alice");
  });

  it("mints blank-node IDs for anonymous individuals", () => {
    const first = anonymousIndividual();
    const second = anonymousIndividual();
    expect(individualIdentifier(first)).toMatch(/^_:b[0-9a-z]{8}$/);
    expect(individualIdentifier(first)).not.toBe(individualIdentifier(second));
  });
});

describe("object properties", () => {
  it("stores characteristics sorted and unique", () => {
    const property = createObjectProperty("ex:ancestorOf", {
      characteristics: ["transitive", "asymmetric", "transitive"],
    });
    expect(property.characteristics).toEqual(["asymmetric", "transitive"]);
    expect(hasCharacteristic(property, "transitive")).toBe(true);
    expect(isPotentiallySimple(property)).toBe(false);
  });

  it("fills list fields with empty defaults", () => {
    const property = createObjectProperty("ex:p");
    expect(property.domains).toEqual([]);
    expect(property.propertyChains).toEqual([]);
    expect(property.inverseOf).toBeUndefined();
  });

  it("reports contradictory characteristics", () => {
    const property = createObjectProperty("ex:p", {
      characteristics: ["symmetric", "asymmetric", "reflexive"],
    });
    expect(conflictingCharacteristics(property)).toEqual([["symmetric", "asymmetric"]]);
  });

  it("maps characteristic types both ways", () => {
    expect(CHARACTERISTIC_TYPE_IRI.functional).toBe(`${OWL_NAMESPACE}FunctionalProperty`);
    expect(characteristicForTypeIRI(`${OWL_NAMESPACE}IrreflexiveProperty`)).toBe(
      "irreflexive",
    );
    expect(characteristicForTypeIRI(`${OWL_NAMESPACE}Class`)).toBeUndefined();
    expect(normalizeCharacteristics(["reflexive", "functional"])).toEqual([
      "functional",
      "reflexive",
    ]);
  });

  it("describes characteristics, inverse and domain", () => {
    const property = createObjectProperty("ex:hasParent", {
      label: "has parent",
      characteristics: ["irreflexive"],
      inverseOf: "ex:hasChild",
      domains: [namedClass("ex:Person")],
    });
    expect(describeObjectProperty(property)).toBe(
      "has parent (ex:hasParent) [irreflexive] inverse: ex:hasChild domain: ex:Person",
    );
  });
});

describe("data properties", () => {
  it("is not functional by default", () => {
    expect(createDataProperty("ex:age").isFunctional).toBe(false);
  });

  it("describes functionality and range", () => {
    const property = createDataProperty("ex:age", {
      isFunctional: true,
      ranges: [dataRanges.integer],
    });
    expect(describeDataProperty(property)).toBe("ex:age [functional] range: xsd:integer");
  });
});

describe("annotation properties", () => {
  it("keeps only the given optional fields", () => {
    expect(createAnnotationProperty("ex:note")).toEqual({
      iri: "ex:note",
      superProperties: [],
      domains: [],
      ranges: [],
    });
  });
});
