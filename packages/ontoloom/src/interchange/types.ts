/**
 * Ontology transport format.
 *
 * Zod schemas for the JSON carried inside an {@link OntologyEnvelope}. The
 * payload mirrors `OWLOntology.toJSON()` and is validated in full when an
 * envelope is unwrapped.
 */
import { z } from "zod";

import { type OWLAxiom } from "../owl/axiom";
import { type OWLClassExpression } from "../owl/class-expression";
import { type OWLDataRange } from "../owl/data-range";
import { type OntologyData } from "../owl/ontology";
import { PROPERTY_CHARACTERISTICS } from "../owl/property";
import { XSD_FACETS } from "../owl/xsd";

// ============================================================
// Format Version
// ============================================================

/**
 * Current transport format version.
 * Increment for breaking changes to the format.
 */
export const FORMAT_VERSION = "1.0" as const;

export const ONTOLOGY_TYPE_IDENTIFIER = "OWLOntology" as const;

// ============================================================
// Envelope
// ============================================================

/**
 * Type-erased wrapper a storage layer can hold without knowing the
 * ontology model. `encodedData` is UTF-8 JSON with sorted keys.
 */
export type OntologyEnvelope = Readonly<{
  iri: string;
  typeIdentifier: string;
  encodedData: Uint8Array;
}>;

// ============================================================
// Values
// ============================================================

const iriSchema = z.string().min(1);

export const LiteralSchema = z.object({
  lexicalForm: z.string(),
  datatype: iriSchema,
  language: z.string().min(1).optional(),
});

export const DataRangeSchema: z.ZodType<OWLDataRange> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("datatype"), iri: iriSchema }),
    z.object({
      kind: z.literal("dataIntersectionOf"),
      ranges: z.array(DataRangeSchema),
    }),
    z.object({
      kind: z.literal("dataUnionOf"),
      ranges: z.array(DataRangeSchema),
    }),
    z.object({ kind: z.literal("dataComplementOf"), range: DataRangeSchema }),
    z.object({ kind: z.literal("dataOneOf"), literals: z.array(LiteralSchema) }),
    z.object({
      kind: z.literal("datatypeRestriction"),
      datatype: iriSchema,
      facets: z.array(
        z.object({ facet: z.enum(XSD_FACETS), value: LiteralSchema }),
      ),
    }),
  ]),
);

const cardinalitySchema = z.number().int().nonnegative();

export const ClassExpressionSchema: z.ZodType<OWLClassExpression> = z.lazy(
  () =>
    z.discriminatedUnion("kind", [
      z.object({ kind: z.literal("named"), iri: iriSchema }),
      z.object({ kind: z.literal("thing") }),
      z.object({ kind: z.literal("nothing") }),
      z.object({
        kind: z.literal("intersectionOf"),
        operands: z.array(ClassExpressionSchema),
      }),
      z.object({
        kind: z.literal("unionOf"),
        operands: z.array(ClassExpressionSchema),
      }),
      z.object({
        kind: z.literal("complementOf"),
        operand: ClassExpressionSchema,
      }),
      z.object({ kind: z.literal("oneOf"), individuals: z.array(iriSchema) }),
      z.object({
        kind: z.literal("someValuesFrom"),
        property: iriSchema,
        filler: ClassExpressionSchema,
      }),
      z.object({
        kind: z.literal("allValuesFrom"),
        property: iriSchema,
        filler: ClassExpressionSchema,
      }),
      z.object({
        kind: z.literal("hasValue"),
        property: iriSchema,
        individual: iriSchema,
      }),
      z.object({ kind: z.literal("hasSelf"), property: iriSchema }),
      ...(["minCardinality", "maxCardinality", "exactCardinality"] as const).map(
        (kind) =>
          z.object({
            kind: z.literal(kind),
            property: iriSchema,
            cardinality: cardinalitySchema,
            filler: ClassExpressionSchema.optional(),
          }),
      ),
      z.object({
        kind: z.literal("dataSomeValuesFrom"),
        property: iriSchema,
        range: DataRangeSchema,
      }),
      z.object({
        kind: z.literal("dataAllValuesFrom"),
        property: iriSchema,
        range: DataRangeSchema,
      }),
      z.object({
        kind: z.literal("dataHasValue"),
        property: iriSchema,
        literal: LiteralSchema,
      }),
      ...(
        [
          "dataMinCardinality",
          "dataMaxCardinality",
          "dataExactCardinality",
        ] as const
      ).map((kind) =>
        z.object({
          kind: z.literal(kind),
          property: iriSchema,
          cardinality: cardinalitySchema,
          range: DataRangeSchema.optional(),
        }),
      ),
    ]),
);

// ============================================================
// Axioms
// ============================================================

const PROPERTY_AXIOM_KINDS = [
  "functionalObjectProperty",
  "inverseFunctionalObjectProperty",
  "transitiveObjectProperty",
  "symmetricObjectProperty",
  "asymmetricObjectProperty",
  "reflexiveObjectProperty",
  "irreflexiveObjectProperty",
  "functionalDataProperty",
] as const;

const DECLARATION_KINDS = [
  "declareClass",
  "declareObjectProperty",
  "declareDataProperty",
  "declareNamedIndividual",
  "declareDatatype",
  "declareAnnotationProperty",
] as const;

const PROPERTY_SET_KINDS = [
  "equivalentObjectProperties",
  "disjointObjectProperties",
  "equivalentDataProperties",
  "disjointDataProperties",
] as const;

const ASSERTION_KINDS = [
  "objectPropertyAssertion",
  "negativeObjectPropertyAssertion",
] as const;

const DATA_ASSERTION_KINDS = [
  "dataPropertyAssertion",
  "negativeDataPropertyAssertion",
] as const;

export const AxiomSchema: z.ZodType<OWLAxiom> = z.discriminatedUnion("kind", [
  // TBox
  z.object({
    kind: z.literal("subClassOf"),
    sub: ClassExpressionSchema,
    sup: ClassExpressionSchema,
  }),
  z.object({
    kind: z.literal("equivalentClasses"),
    classes: z.array(ClassExpressionSchema),
  }),
  z.object({
    kind: z.literal("disjointClasses"),
    classes: z.array(ClassExpressionSchema),
  }),
  z.object({
    kind: z.literal("disjointUnion"),
    classIRI: iriSchema,
    disjuncts: z.array(ClassExpressionSchema),
  }),
  // RBox
  z.object({
    kind: z.literal("subObjectPropertyOf"),
    sub: iriSchema,
    sup: iriSchema,
  }),
  z.object({
    kind: z.literal("subPropertyChainOf"),
    chain: z.array(iriSchema),
    sup: iriSchema,
  }),
  ...PROPERTY_SET_KINDS.map((kind) =>
    z.object({ kind: z.literal(kind), properties: z.array(iriSchema) }),
  ),
  z.object({
    kind: z.literal("inverseObjectProperties"),
    first: iriSchema,
    second: iriSchema,
  }),
  z.object({
    kind: z.literal("objectPropertyDomain"),
    property: iriSchema,
    domain: ClassExpressionSchema,
  }),
  z.object({
    kind: z.literal("objectPropertyRange"),
    property: iriSchema,
    range: ClassExpressionSchema,
  }),
  ...PROPERTY_AXIOM_KINDS.map((kind) =>
    z.object({ kind: z.literal(kind), property: iriSchema }),
  ),
  z.object({
    kind: z.literal("subDataPropertyOf"),
    sub: iriSchema,
    sup: iriSchema,
  }),
  z.object({
    kind: z.literal("dataPropertyDomain"),
    property: iriSchema,
    domain: ClassExpressionSchema,
  }),
  z.object({
    kind: z.literal("dataPropertyRange"),
    property: iriSchema,
    range: DataRangeSchema,
  }),
  // ABox
  z.object({
    kind: z.literal("classAssertion"),
    individual: iriSchema,
    classExpression: ClassExpressionSchema,
  }),
  ...ASSERTION_KINDS.map((kind) =>
    z.object({
      kind: z.literal(kind),
      subject: iriSchema,
      property: iriSchema,
      object: iriSchema,
    }),
  ),
  ...DATA_ASSERTION_KINDS.map((kind) =>
    z.object({
      kind: z.literal(kind),
      subject: iriSchema,
      property: iriSchema,
      value: LiteralSchema,
    }),
  ),
  z.object({
    kind: z.literal("sameIndividual"),
    individuals: z.array(iriSchema),
  }),
  z.object({
    kind: z.literal("differentIndividuals"),
    individuals: z.array(iriSchema),
  }),
  // Declarations
  ...DECLARATION_KINDS.map((kind) =>
    z.object({ kind: z.literal(kind), iri: iriSchema }),
  ),
]);

// ============================================================
// Entities
// ============================================================

const annotationFields = {
  label: z.string().optional(),
  comment: z.string().optional(),
  annotations: z.record(z.string(), z.string()),
};

export const ClassSchema = z.object({ iri: iriSchema, ...annotationFields });

export const NamedIndividualSchema = z.object({
  iri: iriSchema,
  ...annotationFields,
});

export const ObjectPropertySchema = z.object({
  iri: iriSchema,
  ...annotationFields,
  characteristics: z.array(z.enum(PROPERTY_CHARACTERISTICS)),
  inverseOf: iriSchema.optional(),
  domains: z.array(ClassExpressionSchema),
  ranges: z.array(ClassExpressionSchema),
  superProperties: z.array(iriSchema),
  equivalentProperties: z.array(iriSchema),
  disjointProperties: z.array(iriSchema),
  propertyChains: z.array(z.array(iriSchema)),
});

export const DataPropertySchema = z.object({
  iri: iriSchema,
  ...annotationFields,
  domains: z.array(ClassExpressionSchema),
  ranges: z.array(DataRangeSchema),
  isFunctional: z.boolean(),
  superProperties: z.array(iriSchema),
  equivalentProperties: z.array(iriSchema),
  disjointProperties: z.array(iriSchema),
});

export const AnnotationPropertySchema = z.object({
  iri: iriSchema,
  label: z.string().optional(),
  comment: z.string().optional(),
  superProperties: z.array(iriSchema),
  domains: z.array(iriSchema),
  ranges: z.array(iriSchema),
});

// ============================================================
// Ontology
// ============================================================

export const OntologyDataSchema: z.ZodType<OntologyData> = z.object({
  iri: z.string(),
  versionIRI: iriSchema.optional(),
  imports: z.array(iriSchema),
  prefixes: z.record(z.string(), z.string()),
  classes: z.array(ClassSchema),
  objectProperties: z.array(ObjectPropertySchema),
  dataProperties: z.array(DataPropertySchema),
  annotationProperties: z.array(AnnotationPropertySchema),
  individuals: z.array(NamedIndividualSchema),
  axioms: z.array(AxiomSchema),
});

/**
 * The JSON document inside `encodedData`.
 */
export const OntologyPayloadSchema = z.object({
  formatVersion: z.literal(FORMAT_VERSION),
  ontology: OntologyDataSchema,
});

export type OntologyPayload = z.infer<typeof OntologyPayloadSchema>;
