/**
 * Shared fast-check arbitraries for the OWL model.
 */
import fc from "fast-check";

import {
  allValuesFrom,
  classAssertion,
  complementOf,
  createClass,
  createNamedIndividual,
  dataHasValue,
  dataRanges,
  dataSomeValuesFrom,
  exactCardinality,
  hasSelf,
  hasValue,
  integerLiteral,
  intersectionOf,
  langStringLiteral,
  maxCardinality,
  minCardinality,
  namedClass,
  nothing,
  objectPropertyAssertion,
  oneOf,
  type OWLAxiom,
  type OWLClassExpression,
  type OWLLiteral,
  OWLOntology,
  someValuesFrom,
  stringLiteral,
  subClassOf,
  thing,
  typedLiteral,
  unionOf,
} from "../../src/owl";

// ============================================================
// Names
// ============================================================

export const classIRIArb = fc.constantFrom(
  "ex:Person",
  "ex:Student",
  "ex:Teacher",
  "ex:Course",
  "ex:Animal",
  "ex:Dog",
);

export const objectPropertyIRIArb = fc.constantFrom(
  "ex:knows",
  "ex:teaches",
  "ex:hasChild",
  "ex:owns",
);

export const dataPropertyIRIArb = fc.constantFrom("ex:age", "ex:name");

export const individualIRIArb = fc.constantFrom(
  "ex:alice",
  "ex:bob",
  "ex:carol",
  "ex:rex",
);

// ============================================================
// Literals
// ============================================================

/**
 * Lexical forms with quotes, backslashes, control characters and
 * non-ASCII text.
 */
export const lexicalFormArb = fc.oneof(
  fc.string(),
  fc.string({ unit: "grapheme" }),
  fc.constantFrom(
    "",
    'say "hi"',
    String.raw`back\slash`,
    "two\nlines",
    "tab\there",
    "carriage\rreturn",
    "日本語",
    "🎉",
  ),
);

export const literalArb: fc.Arbitrary<OWLLiteral> = fc.oneof(
  lexicalFormArb.map((value) => stringLiteral(value)),
  fc.integer().map((value) => integerLiteral(value)),
  fc
    .tuple(lexicalFormArb, fc.constantFrom("en", "fr", "de-CH"))
    .map(([value, language]) => langStringLiteral(value, language)),
  fc
    .tuple(lexicalFormArb, fc.constantFrom("xsd:date", "xsd:anyURI", "ex:celsius"))
    .map(([value, datatype]) => typedLiteral(value, datatype)),
);

// ============================================================
// Class Expressions
// ============================================================

const cardinalityArb = fc.integer({ min: 0, max: 4 });

/**
 * Object class expressions plus a few data restrictions, nested up to
 * `maxDepth` levels.
 */
export const classExpressionArb: fc.Arbitrary<OWLClassExpression> = fc.letrec<{
  expression: OWLClassExpression;
}>((tie) => ({
  expression: fc.oneof(
    { maxDepth: 4, depthIdentifier: "classExpression" },
    classIRIArb.map((iri) => namedClass(iri)),
    fc.constant(thing()),
    fc.constant(nothing()),
    fc
      .array(individualIRIArb, { minLength: 1, maxLength: 3 })
      .map((individuals) => oneOf(individuals)),
    fc
      .tuple(objectPropertyIRIArb, individualIRIArb)
      .map(([property, individual]) => hasValue(property, individual)),
    objectPropertyIRIArb.map((property) => hasSelf(property)),
    dataPropertyIRIArb.map((property) =>
      dataSomeValuesFrom(property, dataRanges.integer),
    ),
    dataPropertyIRIArb.map((property) =>
      dataHasValue(property, integerLiteral(18)),
    ),
    fc
      .array(tie("expression"), { minLength: 2, maxLength: 3 })
      .map((operands) => intersectionOf(operands)),
    fc
      .array(tie("expression"), { minLength: 2, maxLength: 3 })
      .map((operands) => unionOf(operands)),
    tie("expression").map((operand) => complementOf(operand)),
    fc
      .tuple(objectPropertyIRIArb, tie("expression"))
      .map(([property, filler]) => someValuesFrom(property, filler)),
    fc
      .tuple(objectPropertyIRIArb, tie("expression"))
      .map(([property, filler]) => allValuesFrom(property, filler)),
    fc
      .tuple(objectPropertyIRIArb, cardinalityArb, fc.option(tie("expression"), { nil: undefined }))
      .map(([property, n, filler]) => minCardinality(property, n, filler)),
    fc
      .tuple(objectPropertyIRIArb, cardinalityArb, fc.option(tie("expression"), { nil: undefined }))
      .map(([property, n, filler]) => maxCardinality(property, n, filler)),
    fc
      .tuple(objectPropertyIRIArb, cardinalityArb, fc.option(tie("expression"), { nil: undefined }))
      .map(([property, n, filler]) => exactCardinality(property, n, filler)),
  ),
})).expression;

/**
 * Superclass expressions that survive a Turtle round trip: object
 * restrictions on undeclared properties over named fillers.
 */
export const simpleSuperClassArb: fc.Arbitrary<OWLClassExpression> = fc.oneof(
  classIRIArb.map((iri) => namedClass(iri)),
  fc
    .tuple(objectPropertyIRIArb, classIRIArb)
    .map(([property, iri]) => someValuesFrom(property, namedClass(iri))),
  fc
    .tuple(objectPropertyIRIArb, classIRIArb)
    .map(([property, iri]) => allValuesFrom(property, namedClass(iri))),
  fc
    .tuple(objectPropertyIRIArb, cardinalityArb)
    .map(([property, n]) => minCardinality(property, n)),
);

// ============================================================
// Ontologies
// ============================================================

const axiomArb: fc.Arbitrary<OWLAxiom> = fc.oneof(
  fc
    .tuple(classIRIArb, simpleSuperClassArb)
    .map(([sub, sup]) => subClassOf(namedClass(sub), sup)),
  fc
    .tuple(individualIRIArb, classIRIArb)
    .map(([individual, iri]) => classAssertion(individual, namedClass(iri))),
  fc
    .tuple(individualIRIArb, objectPropertyIRIArb, individualIRIArb)
    .map(([subject, property, object]) =>
      objectPropertyAssertion(subject, property, object),
    ),
);

/**
 * Ontologies with declared classes and individuals and a mix of TBox and
 * ABox axioms over them.
 */
export const ontologyArb: fc.Arbitrary<OWLOntology> = fc
  .record({
    classes: fc.uniqueArray(classIRIArb, { maxLength: 6 }),
    individuals: fc.uniqueArray(individualIRIArb, { maxLength: 4 }),
    labels: fc.dictionary(classIRIArb, lexicalFormArb, { maxKeys: 3 }),
    axioms: fc.array(axiomArb, { maxLength: 12 }),
  })
  .map(({ classes, individuals, labels, axioms }) => {
    const individualSet = new Set<string>(individuals);
    return new OWLOntology({
      iri: "http://example.org/generated",
      prefixes: { ex: "http://example.org/" },
      classes: classes.map((iri) => {
        const label = labels[iri];
        return createClass(iri, label === undefined ? {} : { label });
      }),
      individuals: individuals.map((iri) => createNamedIndividual(iri)),
      axioms: axioms.filter(
        (axiom) =>
          (axiom.kind !== "classAssertion" &&
            axiom.kind !== "objectPropertyAssertion") ||
          individualSet.has(
            axiom.kind === "classAssertion" ? axiom.individual : axiom.subject,
          ),
      ),
    });
  });
