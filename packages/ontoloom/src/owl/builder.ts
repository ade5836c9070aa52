/**
 * Declarative ontology construction.
 *
 * Components are appended in the order given. Nested arrays are flattened
 * and `false`, `null` and `undefined` entries skipped, so components can
 * be produced with `map` and `&&`.
 *
 * @example
 * ```typescript
 * const ontology = buildOntology(
 *   { iri: "http://example.org/zoo", prefixes: { ex: "http://example.org/zoo#" } },
 *   [
 *     owl.class("ex:Animal"),
 *     ["ex:Lion", "ex:Zebra"].map((iri) => owl.class(iri)),
 *     includeKeepers && owl.objectProperty("ex:caresFor"),
 *     simpleSubClassOf("ex:Lion", "ex:Animal"),
 *   ],
 * );
 * ```
 */
import { type OWLAxiom } from "./axiom";
import {
  createClass,
  createNamedIndividual,
  type EntityAnnotations,
  type OWLClass,
  type OWLNamedIndividual,
} from "./entity";
import { OWLOntology } from "./ontology";
import {
  type AnnotationPropertyOptions,
  createAnnotationProperty,
  createDataProperty,
  createObjectProperty,
  type DataPropertyOptions,
  type ObjectPropertyOptions,
  type OWLAnnotationProperty,
  type OWLDataProperty,
  type OWLObjectProperty,
} from "./property";

// ============================================================
// Components
// ============================================================

export type OntologyComponent =
  | Readonly<{ component: "class"; value: OWLClass }>
  | Readonly<{ component: "objectProperty"; value: OWLObjectProperty }>
  | Readonly<{ component: "dataProperty"; value: OWLDataProperty }>
  | Readonly<{ component: "annotationProperty"; value: OWLAnnotationProperty }>
  | Readonly<{ component: "individual"; value: OWLNamedIndividual }>;

/**
 * Anything `buildOntology` accepts in its component list.
 */
export type ComponentInput =
  | OntologyComponent
  | OWLAxiom
  | false
  | null
  | undefined
  | readonly ComponentInput[];

export type OntologyHeader = Readonly<{
  iri: string;
  versionIRI?: string;
  imports?: readonly string[];
  prefixes?: Readonly<Record<string, string>>;
}>;

/**
 * Component factories. Each takes the same arguments as the matching
 * `create*` function.
 */
export const owl = {
  class: (iri: string, options?: EntityAnnotations): OntologyComponent => ({
    component: "class",
    value: createClass(iri, options),
  }),
  objectProperty: (
    iri: string,
    options?: ObjectPropertyOptions,
  ): OntologyComponent => ({
    component: "objectProperty",
    value: createObjectProperty(iri, options),
  }),
  dataProperty: (
    iri: string,
    options?: DataPropertyOptions,
  ): OntologyComponent => ({
    component: "dataProperty",
    value: createDataProperty(iri, options),
  }),
  annotationProperty: (
    iri: string,
    options?: AnnotationPropertyOptions,
  ): OntologyComponent => ({
    component: "annotationProperty",
    value: createAnnotationProperty(iri, options),
  }),
  individual: (
    iri: string,
    options?: EntityAnnotations,
  ): OntologyComponent => ({
    component: "individual",
    value: createNamedIndividual(iri, options),
  }),
} as const;

// ============================================================
// Build
// ============================================================

export function buildOntology(
  header: OntologyHeader,
  components: readonly ComponentInput[],
): OWLOntology {
  const ontology = new OWLOntology(header);
  applyComponents(ontology, components);
  return ontology;
}

/**
 * Appends components to an existing ontology, in order.
 */
export function applyComponents(
  ontology: OWLOntology,
  components: readonly ComponentInput[],
): OWLOntology {
  for (const input of components) {
    if (input === false || input === null || input === undefined) continue;
    if (isComponentList(input)) {
      applyComponents(ontology, input);
    } else if ("component" in input) {
      applyComponent(ontology, input);
    } else {
      ontology.addAxiom(input);
    }
  }
  return ontology;
}

function isComponentList(
  input: ComponentInput,
): input is readonly ComponentInput[] {
  return Array.isArray(input);
}

function applyComponent(
  ontology: OWLOntology,
  component: OntologyComponent,
): void {
  switch (component.component) {
    case "class": {
      ontology.addClass(component.value);
      return;
    }
    case "objectProperty": {
      ontology.addObjectProperty(component.value);
      return;
    }
    case "dataProperty": {
      ontology.addDataProperty(component.value);
      return;
    }
    case "annotationProperty": {
      ontology.addAnnotationProperty(component.value);
      return;
    }
    case "individual": {
      ontology.addIndividual(component.value);
      return;
    }
  }
}
