import { TransportError } from "../errors";
import { validateWithSchema } from "../errors/validation";
import { OWLOntology } from "../owl/ontology";
import { sortedJsonStringify } from "../utils/sorted-json";
import {
  FORMAT_VERSION,
  ONTOLOGY_TYPE_IDENTIFIER,
  type OntologyEnvelope,
  type OntologyPayload,
  OntologyPayloadSchema,
} from "./types";

// ============================================================
// Wrap
// ============================================================

/**
 * Wraps an ontology for a storage layer that only handles opaque bytes.
 *
 * @example
 * ```typescript
 * const envelope = wrapOntology(ontology);
 * const restored = unwrapOntology(envelope);
 * ontologiesEqual(ontology, restored); // true
 * ```
 */
export function wrapOntology(ontology: OWLOntology): OntologyEnvelope {
  const payload: OntologyPayload = {
    formatVersion: FORMAT_VERSION,
    ontology: ontology.toJSON(),
  };
  return {
    iri: ontology.iri,
    typeIdentifier: ONTOLOGY_TYPE_IDENTIFIER,
    encodedData: new TextEncoder().encode(sortedJsonStringify(payload)),
  };
}

// ============================================================
// Unwrap
// ============================================================

/**
 * Restores the ontology carried by an envelope.
 *
 * @throws TransportError if the envelope holds another type or its bytes
 *   are not UTF-8 JSON
 * @throws ValidationError if the JSON does not describe an ontology
 */
export function unwrapOntology(envelope: OntologyEnvelope): OWLOntology {
  if (envelope.typeIdentifier !== ONTOLOGY_TYPE_IDENTIFIER) {
    throw new TransportError(
      `Expected an envelope of type "${ONTOLOGY_TYPE_IDENTIFIER}", got "${envelope.typeIdentifier}"`,
      { typeIdentifier: envelope.typeIdentifier, iri: envelope.iri },
    );
  }

  const payload = validateWithSchema(
    OntologyPayloadSchema,
    parseJson(envelope),
    "OntologyPayload",
  );
  return OWLOntology.fromJSON(payload.ontology);
}

function parseJson(envelope: OntologyEnvelope): unknown {
  try {
    const text = new TextDecoder("utf-8", { fatal: true }).decode(
      envelope.encodedData,
    );
    return JSON.parse(text);
  } catch (error) {
    throw new TransportError(
      "Envelope data is not UTF-8 JSON",
      { iri: envelope.iri, byteLength: envelope.encodedData.byteLength },
      { cause: error },
    );
  }
}

// ============================================================
// Equality
// ============================================================

/**
 * Structural equality: both ontologies serialize to the same sorted-key
 * JSON. List order matters; prefix-table key order does not.
 */
export function ontologiesEqual(a: OWLOntology, b: OWLOntology): boolean {
  return sortedJsonStringify(a.toJSON()) === sortedJsonStringify(b.toJSON());
}
