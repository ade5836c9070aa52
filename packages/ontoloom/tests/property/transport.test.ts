import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { ontologiesEqual, unwrapOntology, wrapOntology } from "../../src/interchange";
import { literalsEqual } from "../../src/owl";
import {
  blankNodeTerm,
  decodeRDFTerm,
  encodeRDFTerm,
  iriTerm,
  literalTerm,
} from "../../src/rdf";
import { literalArb, ontologyArb } from "./arbitraries";

describe("envelope properties", () => {
  it("restores every wrapped ontology", () => {
    fc.assert(
      fc.property(ontologyArb, (ontology) => {
        expect(ontologiesEqual(unwrapOntology(wrapOntology(ontology)), ontology)).toBe(true);
      }),
    );
  });
});

describe("RDF term properties", () => {
  it("decodes encoded literals", () => {
    fc.assert(
      fc.property(literalArb, (literal) => {
        const decoded = decodeRDFTerm(encodeRDFTerm(literalTerm(literal)));
        expect(decoded).toEqual(literalTerm(literal));
        if (decoded.kind === "literal") {
          expect(literalsEqual(decoded.literal, literal)).toBe(true);
        }
      }),
    );
  });

  it("decodes encoded IRIs and blank nodes", () => {
    fc.assert(
      fc.property(
        fc.webUrl(),
        fc.stringMatching(/^[A-Za-z]\w{0,8}$/),
        (iri, id) => {
          expect(decodeRDFTerm(encodeRDFTerm(iriTerm(iri)))).toEqual(iriTerm(iri));
          expect(decodeRDFTerm(encodeRDFTerm(blankNodeTerm(id)))).toEqual(blankNodeTerm(id));
        },
      ),
    );
  });
});
