/**
 * Ontology Transport Module
 *
 * Moves whole ontologies through layers that only store opaque bytes,
 * such as a record store keyed by IRI.
 *
 * @example
 * ```typescript
 * import { unwrapOntology, wrapOntology } from "ontoloom/interchange";
 *
 * const envelope = wrapOntology(ontology);
 * await store.put(envelope.iri, envelope);
 *
 * const restored = unwrapOntology(await store.get(iri));
 * ```
 */

// ============================================================
// Types & Schemas
// ============================================================

export {
  AnnotationPropertySchema,
  AxiomSchema,
  ClassExpressionSchema,
  ClassSchema,
  DataPropertySchema,
  DataRangeSchema,
  FORMAT_VERSION,
  LiteralSchema,
  NamedIndividualSchema,
  ObjectPropertySchema,
  ONTOLOGY_TYPE_IDENTIFIER,
  OntologyDataSchema,
  type OntologyEnvelope,
  type OntologyPayload,
  OntologyPayloadSchema,
} from "./types";

// ============================================================
// Functions
// ============================================================

export { ontologiesEqual, unwrapOntology, wrapOntology } from "./transport";
