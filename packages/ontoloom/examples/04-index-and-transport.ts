/**
 * Example 04: Indexes, Descriptors and Transport
 *
 * Derives properties from field descriptors, queries an ontology index
 * and moves the ontology through an opaque byte store.
 */
import {
  buildOntology,
  classAssertion,
  defineOntologyProperty,
  describeClassExpression,
  descriptorsToProperties,
  namedClass,
  objectPropertyAssertion,
  type OntologyEnvelope,
  ontologiesEqual,
  owl,
  simpleSubClassOf,
  unwrapOntology,
  wrapOntology,
} from "ontoloom";

const employeeFields = [
  defineOntologyProperty({
    name: "Employee_name",
    fieldName: "name",
    iri: "ex:name",
    label: "name",
  }),
  defineOntologyProperty({
    name: "Employee_employer",
    fieldName: "employer",
    iri: "ex:worksFor",
    targetTypeName: "Company",
    targetFieldName: "employees",
  }),
];

export async function main(): Promise<void> {
  const { objectProperties, dataProperties } = descriptorsToProperties(
    "ex:Employee",
    employeeFields,
    (typeName) => `ex:${typeName}`,
  );

  const ontology = buildOntology(
    { iri: "http://example.org/hr", prefixes: { ex: "http://example.org/hr#" } },
    [
      owl.class("ex:Employee"),
      owl.class("ex:Manager"),
      owl.class("ex:Company"),
      simpleSubClassOf("ex:Manager", "ex:Employee"),
      classAssertion("ex:erin", namedClass("ex:Manager")),
      objectPropertyAssertion("ex:erin", "ex:worksFor", "ex:acme"),
    ],
  );
  for (const property of objectProperties) ontology.addObjectProperty(property);
  for (const property of dataProperties) ontology.addDataProperty(property);

  console.log("=== Index ===\n");
  const index = ontology.buildIndex();
  for (const sup of index.superClassesOf("ex:Manager")) {
    console.log(`  ex:Manager ⊑ ${describeClassExpression(sup)}`);
  }
  for (const type of index.typesOf("ex:erin")) {
    console.log(`  ex:erin : ${describeClassExpression(type)}`);
  }

  ontology.addAxiom(classAssertion("ex:erin", namedClass("ex:Employee")));
  console.log(`  index current after edit: ${index.isCurrentFor(ontology)}`);

  console.log("\n=== Transport ===\n");
  const store = new Map<string, OntologyEnvelope>();
  const envelope = wrapOntology(ontology);
  store.set(envelope.iri, envelope);
  console.log(`  stored ${envelope.encodedData.byteLength} bytes under ${envelope.iri}`);

  const fetched = store.get("http://example.org/hr");
  if (fetched !== undefined) {
    const restored = unwrapOntology(fetched);
    console.log(`  restored equal: ${ontologiesEqual(ontology, restored)}`);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
