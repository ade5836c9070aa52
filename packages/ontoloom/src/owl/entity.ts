import { generateBlankNodeId } from "../utils/id";

// ============================================================
// Shared annotation fields
// ============================================================

/**
 * Human-facing annotations carried by named entities.
 */
export type EntityAnnotations = Readonly<{
  /** rdfs:label */
  label?: string;
  /** rdfs:comment */
  comment?: string;
  /** Other annotation property values, keyed by property IRI */
  annotations?: Readonly<Record<string, string>>;
}>;

export function annotationFields(options: EntityAnnotations): {
  label?: string;
  comment?: string;
  annotations: Readonly<Record<string, string>>;
} {
  return {
    ...(options.label !== undefined && { label: options.label }),
    ...(options.comment !== undefined && { comment: options.comment }),
    annotations: options.annotations ?? {},
  };
}

function labelled(iri: string, label: string | undefined): string {
  return label === undefined ? iri : `${label} (${iri})`;
}

// ============================================================
// Classes
// ============================================================

/**
 * A named OWL class declaration.
 */
export type OWLClass = Readonly<{
  iri: string;
  label?: string;
  comment?: string;
  annotations: Readonly<Record<string, string>>;
}>;

export function createClass(
  iri: string,
  options: EntityAnnotations = {},
): OWLClass {
  return { iri, ...annotationFields(options) };
}

export function describeClass(owlClass: OWLClass): string {
  return labelled(owlClass.iri, owlClass.label);
}

// ============================================================
// Individuals
// ============================================================

export type OWLNamedIndividual = Readonly<{
  iri: string;
  label?: string;
  comment?: string;
  annotations: Readonly<Record<string, string>>;
}>;

export type OWLAnonymousIndividual = Readonly<{
  /** Blank-node label, `_:` included */
  nodeID: string;
}>;

export type OWLIndividual =
  | Readonly<{ kind: "named"; individual: OWLNamedIndividual }>
  | Readonly<{ kind: "anonymous"; individual: OWLAnonymousIndividual }>;

export function createNamedIndividual(
  iri: string,
  options: EntityAnnotations = {},
): OWLNamedIndividual {
  return { iri, ...annotationFields(options) };
}

/**
 * Mints an anonymous individual with a fresh `_:b…` node ID.
 */
export function createAnonymousIndividual(): OWLAnonymousIndividual {
  return { nodeID: generateBlankNodeId() };
}

export function namedIndividual(
  iri: string,
  options: EntityAnnotations = {},
): OWLIndividual {
  return { kind: "named", individual: createNamedIndividual(iri, options) };
}

export function anonymousIndividual(): OWLIndividual {
  return { kind: "anonymous", individual: createAnonymousIndividual() };
}

/**
 * IRI of a named individual or node ID of an anonymous one.
 */
export function individualIdentifier(individual: OWLIndividual): string {
  return individual.kind === "named" ?
      individual.individual.iri
    : individual.individual.nodeID;
}

export function describeIndividual(individual: OWLIndividual): string {
  return individual.kind === "named" ?
      labelled(individual.individual.iri, individual.individual.label)
    : individual.individual.nodeID;
}

export { labelled as describeLabelled };
