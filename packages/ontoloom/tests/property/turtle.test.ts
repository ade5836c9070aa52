import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { type OWLAxiom } from "../../src/owl";
import {
  decodeTurtle,
  encodeTurtle,
  escapeTurtleString,
  tokenize,
} from "../../src/turtle";
import { lexicalFormArb, ontologyArb } from "./arbitraries";

function axiomKeys(axioms: readonly OWLAxiom[]): string[] {
  return [...new Set(axioms.map((axiom) => JSON.stringify(axiom)))].toSorted();
}

describe("Turtle codec properties", () => {
  it("reads back escaped strings unchanged", () => {
    fc.assert(
      fc.property(lexicalFormArb, (value) => {
        const [token] = tokenize(`"${escapeTurtleString(value)}"`);
        expect(token).toEqual({ kind: "string", value, line: 1 });
      }),
    );
  });

  it("encodes deterministically", () => {
    fc.assert(
      fc.property(ontologyArb, (ontology) => {
        expect(encodeTurtle(ontology)).toBe(encodeTurtle(ontology.clone()));
      }),
    );
  });

  it("keeps entities and distinct axioms through a round trip", () => {
    fc.assert(
      fc.property(ontologyArb, (ontology) => {
        const decoded = decodeTurtle(encodeTurtle(ontology));
        expect(decoded.iri).toBe(ontology.iri);
        expect(decoded.classes.map((c) => c.iri)).toEqual(
          ontology.classes.map((c) => c.iri).toSorted(),
        );
        expect(decoded.individuals.map((i) => i.iri)).toEqual(
          ontology.individuals.map((i) => i.iri).toSorted(),
        );
        expect(axiomKeys(decoded.axioms)).toEqual(axiomKeys(ontology.axioms));
      }),
    );
  });

  it("reaches a fixed point after one decode", () => {
    fc.assert(
      fc.property(ontologyArb, (ontology) => {
        const once = encodeTurtle(decodeTurtle(encodeTurtle(ontology)));
        expect(encodeTurtle(decodeTurtle(once))).toBe(once);
      }),
    );
  });
});
