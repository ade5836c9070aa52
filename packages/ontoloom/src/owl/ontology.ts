/**
 * OWL DL ontology container.
 *
 * Holds the TBox (classes), RBox (properties) and ABox (individuals) of an
 * ontology together with its axioms and prefix table. Lists are appended
 * only through the `add*` methods; each mutation bumps `revision`, which
 * an {@link OntologyIndex} uses to tell whether it is stale.
 *
 * @example
 * ```typescript
 * const ontology = new OWLOntology({
 *   iri: "http://example.org/family",
 *   prefixes: { ex: "http://example.org/family#" },
 * });
 *
 * ontology
 *   .addClass(createClass("ex:Person", { label: "Person" }))
 *   .addClass(createClass("ex:Parent"))
 *   .addAxiom(simpleSubClassOf("ex:Parent", "ex:Person"));
 *
 * ontology.classSignature(); // Set { "ex:Person", "ex:Parent" }
 * ```
 */
import { DEFAULT_PREFIXES } from "../vocabulary/namespaces";
import {
  axiomCategory,
  type AxiomCategory,
  type AxiomOf,
  type OWLAxiom,
  referencedClasses,
  referencedDataProperties,
  referencedIndividuals,
  referencedObjectProperties,
} from "./axiom";
import { type OWLClassExpression } from "./class-expression";
import { type OWLClass, type OWLNamedIndividual } from "./entity";
import { type OWLLiteral } from "./literal";
import { buildOntologyIndex, type OntologyIndex } from "./ontology-index";
import {
  conflictingCharacteristics,
  type OWLAnnotationProperty,
  type OWLDataProperty,
  type OWLObjectProperty,
  type PropertyCharacteristic,
} from "./property";

// ============================================================
// Types
// ============================================================

/**
 * Plain-data form of an ontology, as produced by `toJSON()`.
 */
export type OntologyData = Readonly<{
  iri: string;
  versionIRI?: string;
  imports: readonly string[];
  prefixes: Readonly<Record<string, string>>;
  classes: readonly OWLClass[];
  objectProperties: readonly OWLObjectProperty[];
  dataProperties: readonly OWLDataProperty[];
  annotationProperties: readonly OWLAnnotationProperty[];
  individuals: readonly OWLNamedIndividual[];
  axioms: readonly OWLAxiom[];
}>;

export type OntologyInit = Readonly<{
  iri: string;
  versionIRI?: string;
  imports?: readonly string[];
  /** Merged over the owl/rdf/rdfs/xsd defaults */
  prefixes?: Readonly<Record<string, string>>;
  classes?: readonly OWLClass[];
  objectProperties?: readonly OWLObjectProperty[];
  dataProperties?: readonly OWLDataProperty[];
  annotationProperties?: readonly OWLAnnotationProperty[];
  individuals?: readonly OWLNamedIndividual[];
  axioms?: readonly OWLAxiom[];
}>;

/**
 * Structural problem found by {@link OWLOntology.validate}. Issues are
 * reported, never thrown.
 */
export type OntologyValidationIssue =
  | Readonly<{
      kind:
        | "duplicateClass"
        | "duplicateObjectProperty"
        | "duplicateDataProperty"
        | "duplicateIndividual";
      iri: string;
    }>
  | Readonly<{
      kind: "incompatibleCharacteristics";
      iri: string;
      characteristics: readonly [PropertyCharacteristic, PropertyCharacteristic];
    }>;

export type OntologyStatistics = Readonly<{
  classCount: number;
  objectPropertyCount: number;
  dataPropertyCount: number;
  annotationPropertyCount: number;
  individualCount: number;
  axiomCount: number;
  tboxAxiomCount: number;
  rboxAxiomCount: number;
  aboxAxiomCount: number;
  declarationAxiomCount: number;
}>;

// ============================================================
// Ontology
// ============================================================

export class OWLOntology {
  readonly iri: string;
  readonly versionIRI: string | undefined;

  #imports: string[];
  #prefixes: Record<string, string>;
  #classes: OWLClass[];
  #objectProperties: OWLObjectProperty[];
  #dataProperties: OWLDataProperty[];
  #annotationProperties: OWLAnnotationProperty[];
  #individuals: OWLNamedIndividual[];
  #axioms: OWLAxiom[];
  #revision = 0;

  constructor(init: OntologyInit) {
    this.iri = init.iri;
    this.versionIRI = init.versionIRI;
    this.#imports = [...(init.imports ?? [])];
    this.#prefixes = { ...DEFAULT_PREFIXES, ...init.prefixes };
    this.#classes = [...(init.classes ?? [])];
    this.#objectProperties = [...(init.objectProperties ?? [])];
    this.#dataProperties = [...(init.dataProperties ?? [])];
    this.#annotationProperties = [...(init.annotationProperties ?? [])];
    this.#individuals = [...(init.individuals ?? [])];
    this.#axioms = [...(init.axioms ?? [])];
  }

  // === Contents ===

  get imports(): readonly string[] {
    return this.#imports;
  }

  get prefixes(): Readonly<Record<string, string>> {
    return this.#prefixes;
  }

  get classes(): readonly OWLClass[] {
    return this.#classes;
  }

  get objectProperties(): readonly OWLObjectProperty[] {
    return this.#objectProperties;
  }

  get dataProperties(): readonly OWLDataProperty[] {
    return this.#dataProperties;
  }

  get annotationProperties(): readonly OWLAnnotationProperty[] {
    return this.#annotationProperties;
  }

  get individuals(): readonly OWLNamedIndividual[] {
    return this.#individuals;
  }

  get axioms(): readonly OWLAxiom[] {
    return this.#axioms;
  }

  /**
   * Incremented by every mutation.
   */
  get revision(): number {
    return this.#revision;
  }

  // === Mutation ===

  addImport(iri: string): this {
    this.#imports.push(iri);
    return this.#touch();
  }

  setPrefix(prefix: string, namespace: string): this {
    this.#prefixes[prefix] = namespace;
    return this.#touch();
  }

  addClass(owlClass: OWLClass): this {
    this.#classes.push(owlClass);
    return this.#touch();
  }

  addObjectProperty(property: OWLObjectProperty): this {
    this.#objectProperties.push(property);
    return this.#touch();
  }

  addDataProperty(property: OWLDataProperty): this {
    this.#dataProperties.push(property);
    return this.#touch();
  }

  addAnnotationProperty(property: OWLAnnotationProperty): this {
    this.#annotationProperties.push(property);
    return this.#touch();
  }

  addIndividual(individual: OWLNamedIndividual): this {
    this.#individuals.push(individual);
    return this.#touch();
  }

  addAxiom(axiom: OWLAxiom): this {
    this.#axioms.push(axiom);
    return this.#touch();
  }

  addAxioms(axioms: Iterable<OWLAxiom>): this {
    this.#axioms.push(...axioms);
    return this.#touch();
  }

  #touch(): this {
    this.#revision += 1;
    return this;
  }

  // === Entity Lookup ===

  findClass(iri: string): OWLClass | undefined {
    return this.#classes.find((entry) => entry.iri === iri);
  }

  findObjectProperty(iri: string): OWLObjectProperty | undefined {
    return this.#objectProperties.find((entry) => entry.iri === iri);
  }

  findDataProperty(iri: string): OWLDataProperty | undefined {
    return this.#dataProperties.find((entry) => entry.iri === iri);
  }

  findAnnotationProperty(iri: string): OWLAnnotationProperty | undefined {
    return this.#annotationProperties.find((entry) => entry.iri === iri);
  }

  findIndividual(iri: string): OWLNamedIndividual | undefined {
    return this.#individuals.find((entry) => entry.iri === iri);
  }

  containsClass(iri: string): boolean {
    return this.findClass(iri) !== undefined;
  }

  containsObjectProperty(iri: string): boolean {
    return this.findObjectProperty(iri) !== undefined;
  }

  containsDataProperty(iri: string): boolean {
    return this.findDataProperty(iri) !== undefined;
  }

  containsIndividual(iri: string): boolean {
    return this.findIndividual(iri) !== undefined;
  }

  // === Axiom Views ===

  axiomsInCategory(category: AxiomCategory): OWLAxiom[] {
    return this.#axioms.filter((axiom) => axiomCategory(axiom) === category);
  }

  tboxAxioms(): OWLAxiom[] {
    return this.axiomsInCategory("tbox");
  }

  rboxAxioms(): OWLAxiom[] {
    return this.axiomsInCategory("rbox");
  }

  aboxAxioms(): OWLAxiom[] {
    return this.axiomsInCategory("abox");
  }

  declarationAxioms(): OWLAxiom[] {
    return this.axiomsInCategory("declaration");
  }

  // === Axiom Queries ===

  /**
   * `subClassOf` axioms whose subclass side is the named class `classIRI`.
   */
  subClassAxioms(classIRI: string): AxiomOf<"subClassOf">[] {
    return this.#axioms.filter(
      (axiom): axiom is AxiomOf<"subClassOf"> =>
        axiom.kind === "subClassOf" &&
        axiom.sub.kind === "named" &&
        axiom.sub.iri === classIRI,
    );
  }

  /**
   * Superclass expressions asserted for the named class `classIRI`.
   */
  superClasses(classIRI: string): OWLClassExpression[] {
    return this.subClassAxioms(classIRI).map((axiom) => axiom.sup);
  }

  equivalentClassAxioms(classIRI: string): AxiomOf<"equivalentClasses">[] {
    return this.#axioms.filter(
      (axiom): axiom is AxiomOf<"equivalentClasses"> =>
        axiom.kind === "equivalentClasses" &&
        axiom.classes.some(
          (expression) =>
            expression.kind === "named" && expression.iri === classIRI,
        ),
    );
  }

  classAssertions(individualIRI: string): OWLClassExpression[] {
    const result: OWLClassExpression[] = [];
    for (const axiom of this.#axioms) {
      if (axiom.kind === "classAssertion" && axiom.individual === individualIRI) {
        result.push(axiom.classExpression);
      }
    }
    return result;
  }

  objectPropertyAssertions(
    subjectIRI: string,
  ): { property: string; object: string }[] {
    const result: { property: string; object: string }[] = [];
    for (const axiom of this.#axioms) {
      if (
        axiom.kind === "objectPropertyAssertion" &&
        axiom.subject === subjectIRI
      ) {
        result.push({ property: axiom.property, object: axiom.object });
      }
    }
    return result;
  }

  dataPropertyAssertions(
    subjectIRI: string,
  ): { property: string; value: OWLLiteral }[] {
    const result: { property: string; value: OWLLiteral }[] = [];
    for (const axiom of this.#axioms) {
      if (axiom.kind === "dataPropertyAssertion" && axiom.subject === subjectIRI) {
        result.push({ property: axiom.property, value: axiom.value });
      }
    }
    return result;
  }

  // === Signature ===

  classSignature(): Set<string> {
    return this.#signature(
      this.#classes.map((entry) => entry.iri),
      referencedClasses,
    );
  }

  objectPropertySignature(): Set<string> {
    return this.#signature(
      this.#objectProperties.map((entry) => entry.iri),
      referencedObjectProperties,
    );
  }

  dataPropertySignature(): Set<string> {
    return this.#signature(
      this.#dataProperties.map((entry) => entry.iri),
      referencedDataProperties,
    );
  }

  individualSignature(): Set<string> {
    return this.#signature(
      this.#individuals.map((entry) => entry.iri),
      referencedIndividuals,
    );
  }

  #signature(
    declared: readonly string[],
    referenced: (axiom: OWLAxiom) => Set<string>,
  ): Set<string> {
    const result = new Set(declared);
    for (const axiom of this.#axioms) {
      for (const iri of referenced(axiom)) result.add(iri);
    }
    return result;
  }

  // === Validation ===

  /**
   * Structural checks: repeated IRIs within one entity list, and object
   * properties carrying contradictory characteristics. Does not check OWL
   * DL regularity.
   */
  validate(): OntologyValidationIssue[] {
    const issues: OntologyValidationIssue[] = [
      ...duplicates(this.#classes, "duplicateClass"),
      ...duplicates(this.#objectProperties, "duplicateObjectProperty"),
      ...duplicates(this.#dataProperties, "duplicateDataProperty"),
      ...duplicates(this.#individuals, "duplicateIndividual"),
    ];
    for (const property of this.#objectProperties) {
      for (const pair of conflictingCharacteristics(property)) {
        issues.push({
          kind: "incompatibleCharacteristics",
          iri: property.iri,
          characteristics: pair,
        });
      }
    }
    return issues;
  }

  // === Statistics ===

  statistics(): OntologyStatistics {
    const byCategory: Record<AxiomCategory, number> = {
      tbox: 0,
      rbox: 0,
      abox: 0,
      declaration: 0,
    };
    for (const axiom of this.#axioms) byCategory[axiomCategory(axiom)] += 1;

    return {
      classCount: this.#classes.length,
      objectPropertyCount: this.#objectProperties.length,
      dataPropertyCount: this.#dataProperties.length,
      annotationPropertyCount: this.#annotationProperties.length,
      individualCount: this.#individuals.length,
      axiomCount: this.#axioms.length,
      tboxAxiomCount: byCategory.tbox,
      rboxAxiomCount: byCategory.rbox,
      aboxAxiomCount: byCategory.abox,
      declarationAxiomCount: byCategory.declaration,
    };
  }

  describe(): string {
    const stats = this.statistics();
    const lines = [`Ontology(${this.iri})`];
    if (this.versionIRI !== undefined) lines.push(`  version: ${this.versionIRI}`);
    lines.push(
      `  classes: ${stats.classCount}`,
      `  object properties: ${stats.objectPropertyCount}`,
      `  data properties: ${stats.dataPropertyCount}`,
      `  individuals: ${stats.individualCount}`,
      `  axioms: ${stats.axiomCount} (TBox: ${stats.tboxAxiomCount}, RBox: ${stats.rboxAxiomCount}, ABox: ${stats.aboxAxiomCount})`,
    );
    return lines.join("\n");
  }

  // === Value Semantics ===

  /**
   * Independent copy. Entity and axiom records are immutable and shared;
   * the lists holding them are not.
   */
  clone(): OWLOntology {
    return OWLOntology.fromJSON(this.toJSON());
  }

  toJSON(): OntologyData {
    return {
      iri: this.iri,
      ...(this.versionIRI !== undefined && { versionIRI: this.versionIRI }),
      imports: [...this.#imports],
      prefixes: { ...this.#prefixes },
      classes: [...this.#classes],
      objectProperties: [...this.#objectProperties],
      dataProperties: [...this.#dataProperties],
      annotationProperties: [...this.#annotationProperties],
      individuals: [...this.#individuals],
      axioms: [...this.#axioms],
    };
  }

  /**
   * Rebuilds an ontology from `toJSON()` output. The prefix table is taken
   * as given, without re-seeding defaults the data may have overridden.
   */
  static fromJSON(data: OntologyData): OWLOntology {
    const ontology = new OWLOntology(data);
    ontology.#prefixes = { ...data.prefixes };
    return ontology;
  }

  // === Index ===

  buildIndex(): OntologyIndex {
    return buildOntologyIndex(this);
  }
}

function duplicates(
  entries: readonly Readonly<{ iri: string }>[],
  kind:
    | "duplicateClass"
    | "duplicateObjectProperty"
    | "duplicateDataProperty"
    | "duplicateIndividual",
): OntologyValidationIssue[] {
  const seen = new Set<string>();
  const issues: OntologyValidationIssue[] = [];
  for (const { iri } of entries) {
    if (seen.has(iri)) {
      issues.push({ kind, iri });
    } else {
      seen.add(iri);
    }
  }
  return issues;
}
