/**
 * Example 01: Build and Encode
 *
 * Builds a small family ontology with the component builder and writes it
 * as Turtle.
 */
import {
  buildOntology,
  classAssertion,
  dataPropertyAssertion,
  dataRanges,
  describeAxiom,
  disjointClasses,
  encodeTurtle,
  integerLiteral,
  minCardinality,
  namedClass,
  objectPropertyAssertion,
  owl,
  simpleSubClassOf,
  subClassOf,
} from "ontoloom";

export async function main(): Promise<void> {
  const ontology = buildOntology(
    {
      iri: "http://example.org/family",
      prefixes: { ex: "http://example.org/family#" },
    },
    [
      owl.class("ex:Person", { label: "Person" }),
      ["ex:Parent", "ex:Child"].map((iri) => owl.class(iri)),
      owl.objectProperty("ex:hasChild", {
        characteristics: ["irreflexive"],
        inverseOf: "ex:hasParent",
        domains: [namedClass("ex:Person")],
        ranges: [namedClass("ex:Person")],
      }),
      owl.dataProperty("ex:age", { isFunctional: true, ranges: [dataRanges.integer] }),
      owl.individual("ex:alice"),
      owl.individual("ex:bob"),

      simpleSubClassOf("ex:Parent", "ex:Person"),
      simpleSubClassOf("ex:Child", "ex:Person"),
      subClassOf(namedClass("ex:Parent"), minCardinality("ex:hasChild", 1)),
      disjointClasses([namedClass("ex:Parent"), namedClass("ex:Child")]),

      classAssertion("ex:alice", namedClass("ex:Parent")),
      objectPropertyAssertion("ex:alice", "ex:hasChild", "ex:bob"),
      dataPropertyAssertion("ex:alice", "ex:age", integerLiteral(42)),
    ],
  );

  console.log("=== Axioms ===\n");
  for (const axiom of ontology.axioms) {
    console.log(`  ${describeAxiom(axiom)}`);
  }

  console.log("\n=== Statistics ===\n");
  console.log(ontology.describe());

  console.log("\n=== Turtle ===\n");
  console.log(encodeTurtle(ontology));
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
