/**
 * Reconstructs an OWL ontology from parsed Turtle triples.
 *
 * Works in three passes over a subject index built once:
 * 1. classification of subjects by `rdf:type`;
 * 2. entity construction (labels, comments, domains, ranges…);
 * 3. axiom reconstruction from entity subjects and the anonymous
 *    `AllDisjoint*`, `AllDifferent` and `NegativePropertyAssertion` nodes.
 *
 * IRIs are compacted back to prefixed form wherever a prefix matches.
 */
import { UnrecognizedNodeError } from "../errors";
import {
  characteristicAxiom,
  classAssertion,
  dataPropertyAssertion,
  dataPropertyDomain,
  dataPropertyRange,
  declareDatatype,
  differentIndividuals,
  disjointClasses,
  disjointDataProperties,
  disjointObjectProperties,
  disjointUnion,
  equivalentClasses,
  equivalentDataProperties,
  equivalentObjectProperties,
  functionalDataProperty,
  inverseObjectProperties,
  negativeDataPropertyAssertion,
  negativeObjectPropertyAssertion,
  objectPropertyAssertion,
  objectPropertyDomain,
  objectPropertyRange,
  type OWLAxiom,
  sameIndividual,
  subClassOf,
  subDataPropertyOf,
  subObjectPropertyOf,
  subPropertyChainOf,
} from "../owl/axiom";
import {
  allValuesFrom,
  complementOf,
  dataAllValuesFrom,
  dataExactCardinality,
  dataHasValue,
  dataMaxCardinality,
  dataMinCardinality,
  dataSomeValuesFrom,
  exactCardinality,
  hasSelf,
  hasValue,
  intersectionOf,
  maxCardinality,
  minCardinality,
  namedClass,
  nothing,
  oneOf,
  type OWLClassExpression,
  someValuesFrom,
  thing,
  unionOf,
} from "../owl/class-expression";
import {
  dataComplementOf,
  dataIntersectionOf,
  dataOneOf,
  datatype,
  datatypeRestriction,
  dataUnionOf,
  type FacetRestriction,
  type OWLDataRange,
} from "../owl/data-range";
import {
  createClass,
  createNamedIndividual,
  type EntityAnnotations,
} from "../owl/entity";
import {
  literalBooleanValue,
  literalIntValue,
  type OWLLiteral,
} from "../owl/literal";
import { OWLOntology } from "../owl/ontology";
import {
  characteristicForTypeIRI,
  createAnnotationProperty,
  createDataProperty,
  createObjectProperty,
  PROPERTY_CHARACTERISTICS,
  type PropertyCharacteristic,
} from "../owl/property";
import { compactXSD, isXSDFacet, RDF_LANG_STRING } from "../owl/xsd";
import { type RDFTerm } from "../rdf/term";
import {
  DEFAULT_PREFIXES,
  OWL,
  OWL_NAMESPACE,
  RDF,
  RDF_NAMESPACE,
  RDFS,
  RDFS_NAMESPACE,
  XSD_NAMESPACE,
} from "../vocabulary/namespaces";
import { PrefixMap } from "../vocabulary/prefix-map";
import { type DecodeWarning, type ParsedDocument, type Triple } from "./types";

// ============================================================
// Public API
// ============================================================

export type OWLBuildOptions = Readonly<{
  /** Throw `UnrecognizedNodeError` instead of falling back */
  strict?: boolean;
  /** Called for each warning as it is raised */
  onWarning?: (warning: DecodeWarning) => void;
}>;

export type OWLBuildResult = Readonly<{
  ontology: OWLOntology;
  warnings: readonly DecodeWarning[];
}>;

/**
 * Builds an ontology from a parsed document.
 *
 * Unrecognized blank-node class expressions decode to `owl:Thing` and
 * unrecognized data ranges to `rdfs:Literal`, each with a warning; in
 * strict mode both throw.
 *
 * @throws UnrecognizedNodeError in strict mode
 */
export function buildOWLOntology(
  document: ParsedDocument,
  options: OWLBuildOptions = {},
): OWLBuildResult {
  return new OWLBuilder(document, options).build();
}

// ============================================================
// Helpers
// ============================================================

type GroupKind =
  | "allDisjointClasses"
  | "allDifferent"
  | "allDisjointProperties"
  | "negativeAssertion";

const GROUP_TYPES: Readonly<Record<string, GroupKind>> = {
  [OWL.AllDisjointClasses]: "allDisjointClasses",
  [OWL.AllDifferent]: "allDifferent",
  [OWL.AllDisjointProperties]: "allDisjointProperties",
  [OWL.NegativePropertyAssertion]: "negativeAssertion",
};

const CLASS_AXIOM_PREDICATES = new Set<string>([
  RDFS.subClassOf,
  OWL.equivalentClass,
  OWL.disjointUnionOf,
  OWL.disjointWith,
]);

const INDIVIDUAL_PREDICATES = new Set<string>([OWL.sameAs, OWL.differentFrom]);

const DATA_RANGE_IRIS = new Set<string>([RDFS.Literal, RDF.langString]);

function nodeKey(term: RDFTerm): string | undefined {
  switch (term.kind) {
    case "iri": {
      return term.iri;
    }
    case "blankNode": {
      return `_:${term.id}`;
    }
    case "literal": {
      return undefined;
    }
  }
}

function isVocabulary(iri: string): boolean {
  return (
    iri.startsWith(OWL_NAMESPACE) ||
    iri.startsWith(RDFS_NAMESPACE) ||
    iri.startsWith(RDF_NAMESPACE)
  );
}

function sortedKeys(keys: Iterable<string>): string[] {
  return [...keys].toSorted();
}

/**
 * Gathers the objects of one repeated predicate on one subject into a single
 * n-ary axiom, held at the position of the first statement.
 */
class NaryAxiom<T> {
  readonly #axioms: OWLAxiom[];
  readonly #members: T[];
  readonly #make: (members: readonly T[]) => OWLAxiom;
  #slot: number | undefined;

  constructor(
    axioms: OWLAxiom[],
    subject: T,
    make: (members: readonly T[]) => OWLAxiom,
  ) {
    this.#axioms = axioms;
    this.#members = [subject];
    this.#make = make;
  }

  add(member: T): void {
    const key = JSON.stringify(member);
    if (this.#members.some((existing) => JSON.stringify(existing) === key)) {
      return;
    }
    this.#members.push(member);
    const axiom = this.#make([...this.#members]);
    if (this.#slot === undefined) {
      this.#slot = this.#axioms.push(axiom) - 1;
    } else {
      this.#axioms[this.#slot] = axiom;
    }
  }
}

// ============================================================
// Builder
// ============================================================

class OWLBuilder {
  readonly #document: ParsedDocument;
  readonly #prefixMap: PrefixMap;
  readonly #strict: boolean;
  readonly #onWarning: ((warning: DecodeWarning) => void) | undefined;
  readonly #warnings: DecodeWarning[] = [];
  // Entity fields and axioms read the same nodes; warn once per node
  readonly #reported = new Set<string>();

  readonly #subjects = new Map<string, Triple[]>();

  // Classification (full IRIs or `_:` keys)
  #ontologyIRI: string | undefined;
  readonly #classes = new Set<string>();
  readonly #objectProperties = new Set<string>();
  readonly #dataProperties = new Set<string>();
  readonly #annotationProperties = new Set<string>();
  readonly #individuals = new Set<string>();
  // Untyped IRI subjects that carry property assertions; never declared
  readonly #assertionSubjects = new Set<string>();
  readonly #datatypes = new Set<string>();
  readonly #characteristics = new Map<string, Set<PropertyCharacteristic>>();
  readonly #groups: { kind: GroupKind; key: string }[] = [];

  readonly #axioms: OWLAxiom[] = [];

  constructor(document: ParsedDocument, options: OWLBuildOptions) {
    this.#document = document;
    this.#strict = options.strict ?? false;
    this.#onWarning = options.onWarning;
    const bindings = Object.entries(document.prefixes).filter(
      ([, namespace]) => namespace.length > 0,
    );
    this.#prefixMap = new PrefixMap(DEFAULT_PREFIXES).merged(
      Object.fromEntries(bindings),
    );
  }

  build(): OWLBuildResult {
    this.#indexSubjects();
    this.#classify();

    const ontology = new OWLOntology({
      iri: this.#ontologyIRI ?? "",
      ...this.#ontologyHeader(),
      prefixes: this.#document.prefixes,
    });

    this.#buildEntities(ontology);
    this.#buildClassAxioms();
    this.#buildObjectPropertyAxioms();
    this.#buildDataPropertyAxioms();
    this.#buildIndividualAxioms();
    this.#buildGroupAxioms();
    for (const iri of sortedKeys(this.#datatypes)) {
      this.#axioms.push(declareDatatype(this.#compact(iri)));
    }

    ontology.addAxioms(this.#axioms);
    return { ontology, warnings: this.#warnings };
  }

  // === Indexing and classification ===

  #indexSubjects(): void {
    for (const triple of this.#document.triples) {
      const key = nodeKey(triple.subject);
      if (key === undefined) continue;
      const bucket = this.#subjects.get(key);
      if (bucket === undefined) {
        this.#subjects.set(key, [triple]);
      } else {
        bucket.push(triple);
      }
    }
  }

  #classify(): void {
    const typed = new Set<string>();
    for (const triple of this.#document.triples) {
      if (triple.predicate !== RDF.type) continue;
      const { subject, object } = triple;
      if (subject.kind === "iri") typed.add(subject.iri);

      if (subject.kind === "blankNode") {
        const group = object.kind === "iri" ? GROUP_TYPES[object.iri] : undefined;
        if (group !== undefined) {
          this.#groups.push({ kind: group, key: `_:${subject.id}` });
        }
        continue;
      }
      if (object.kind === "blankNode") {
        this.#individuals.add(subject.iri);
        continue;
      }
      if (object.kind !== "iri") continue;
      this.#classifyTyped(subject.iri, object.iri);
    }

    for (const { subject, predicate } of this.#document.triples) {
      if (subject.kind !== "iri" || typed.has(subject.iri)) continue;
      if (
        INDIVIDUAL_PREDICATES.has(predicate) ||
        (!isVocabulary(predicate) && !this.#annotationProperties.has(predicate))
      ) {
        this.#assertionSubjects.add(subject.iri);
      }
    }
  }

  #classifyTyped(iri: string, type: string): void {
    switch (type) {
      case OWL.Ontology: {
        this.#ontologyIRI ??= iri;
        return;
      }
      case OWL.Class: {
        this.#classes.add(iri);
        return;
      }
      case OWL.ObjectProperty: {
        this.#objectProperties.add(iri);
        return;
      }
      case OWL.DatatypeProperty: {
        this.#dataProperties.add(iri);
        return;
      }
      case OWL.AnnotationProperty: {
        this.#annotationProperties.add(iri);
        return;
      }
      case OWL.NamedIndividual: {
        this.#individuals.add(iri);
        return;
      }
      case RDFS.Datatype: {
        this.#datatypes.add(iri);
        return;
      }
      default: {
        const characteristic = characteristicForTypeIRI(type);
        if (characteristic !== undefined) {
          const existing =
            this.#characteristics.get(iri) ?? new Set<PropertyCharacteristic>();
          existing.add(characteristic);
          this.#characteristics.set(iri, existing);
          return;
        }
        if (type === OWL.Thing || !isVocabulary(type)) {
          this.#individuals.add(iri);
        }
      }
    }
  }

  #ontologyHeader(): { versionIRI?: string; imports: string[] } {
    if (this.#ontologyIRI === undefined) return { imports: [] };
    const version = this.#firstIRI(this.#ontologyIRI, OWL.versionIRI);
    const imports = this.#objectsOf(this.#ontologyIRI, OWL.imports).flatMap(
      (term) => (term.kind === "iri" ? [term.iri] : []),
    );
    return {
      ...(version !== undefined && { versionIRI: version }),
      imports,
    };
  }

  // === Entities ===

  #buildEntities(ontology: OWLOntology): void {
    for (const iri of sortedKeys(this.#classes)) {
      ontology.addClass(createClass(this.#compact(iri), this.#annotations(iri)));
    }

    for (const iri of sortedKeys(this.#objectProperties)) {
      const inverse = this.#firstIRI(iri, OWL.inverseOf);
      ontology.addObjectProperty(
        createObjectProperty(this.#compact(iri), {
          ...this.#annotations(iri),
          characteristics: this.#characteristics.get(iri) ?? [],
          ...(inverse !== undefined && { inverseOf: this.#compact(inverse) }),
          domains: this.#classExpressionsOf(iri, RDFS.domain),
          ranges: this.#classExpressionsOf(iri, RDFS.range),
          superProperties: this.#compactIRIsOf(iri, RDFS.subPropertyOf),
          equivalentProperties: this.#compactIRIsOf(iri, OWL.equivalentProperty),
          disjointProperties: this.#compactIRIsOf(iri, OWL.propertyDisjointWith),
          propertyChains: this.#objectsOf(iri, OWL.propertyChainAxiom).map(
            (list) => this.#compactIRIList(list),
          ),
        }),
      );
    }

    for (const iri of sortedKeys(this.#dataProperties)) {
      ontology.addDataProperty(
        createDataProperty(this.#compact(iri), {
          ...this.#annotations(iri),
          domains: this.#classExpressionsOf(iri, RDFS.domain),
          ranges: this.#objectsOf(iri, RDFS.range).map((term) =>
            this.#dataRange(term),
          ),
          isFunctional: this.#characteristics.get(iri)?.has("functional") ?? false,
          superProperties: this.#compactIRIsOf(iri, RDFS.subPropertyOf),
          equivalentProperties: this.#compactIRIsOf(iri, OWL.equivalentProperty),
          disjointProperties: this.#compactIRIsOf(iri, OWL.propertyDisjointWith),
        }),
      );
    }

    for (const iri of sortedKeys(this.#annotationProperties)) {
      const { label, comment } = this.#annotations(iri);
      ontology.addAnnotationProperty(
        createAnnotationProperty(this.#compact(iri), {
          ...(label !== undefined && { label }),
          ...(comment !== undefined && { comment }),
          superProperties: this.#compactIRIsOf(iri, RDFS.subPropertyOf),
          domains: this.#compactIRIsOf(iri, RDFS.domain),
          ranges: this.#compactIRIsOf(iri, RDFS.range),
        }),
      );
    }

    for (const iri of sortedKeys(this.#individuals)) {
      ontology.addIndividual(
        createNamedIndividual(this.#compact(iri), this.#annotations(iri)),
      );
    }
  }

  /**
   * Label, comment and literal values of declared annotation properties.
   * The last label or comment wins.
   */
  #annotations(iri: string): EntityAnnotations {
    let label: string | undefined;
    let comment: string | undefined;
    const annotations: Record<string, string> = {};
    for (const triple of this.#triplesOf(iri)) {
      if (triple.object.kind !== "literal") continue;
      const value = triple.object.literal.lexicalForm;
      if (triple.predicate === RDFS.label) {
        label = value;
      } else if (triple.predicate === RDFS.comment) {
        comment = value;
      } else if (this.#annotationProperties.has(triple.predicate)) {
        annotations[this.#compact(triple.predicate)] = value;
      }
    }
    return {
      ...(label !== undefined && { label }),
      ...(comment !== undefined && { comment }),
      annotations,
    };
  }

  // === Axioms ===

  #buildClassAxioms(): void {
    const subjects = new Set<string>();
    for (const [key, triples] of this.#subjects) {
      if (triples.some((triple) => CLASS_AXIOM_PREDICATES.has(triple.predicate))) {
        subjects.add(key);
      }
    }

    // Named subjects first, then general class inclusions in document order
    const named = sortedKeys([...subjects].filter((key) => !key.startsWith("_:")));
    const anonymous = [...subjects].filter((key) => key.startsWith("_:"));

    for (const key of [...named, ...anonymous]) {
      const sub = this.#classExpression(this.#termForKey(key));
      const equivalents = new NaryAxiom(this.#axioms, sub, equivalentClasses);
      for (const triple of this.#triplesOf(key)) {
        switch (triple.predicate) {
          case RDFS.subClassOf: {
            this.#axioms.push(subClassOf(sub, this.#classExpression(triple.object)));
            break;
          }
          case OWL.equivalentClass: {
            equivalents.add(this.#classExpression(triple.object));
            break;
          }
          case OWL.disjointWith: {
            this.#axioms.push(
              disjointClasses([sub, this.#classExpression(triple.object)]),
            );
            break;
          }
          case OWL.disjointUnionOf: {
            if (sub.kind !== "named") break;
            const members = this.#collectList(triple.object).map((node) =>
              this.#classExpression(node),
            );
            this.#axioms.push(disjointUnion(sub.iri, members));
            break;
          }
        }
      }
    }
  }

  #buildObjectPropertyAxioms(): void {
    for (const iri of sortedKeys(this.#objectProperties)) {
      const property = this.#compact(iri);
      const equivalents = new NaryAxiom(
        this.#axioms,
        property,
        equivalentObjectProperties,
      );
      for (const triple of this.#triplesOf(iri)) {
        const target =
          triple.object.kind === "iri" ? this.#compact(triple.object.iri) : undefined;
        switch (triple.predicate) {
          case RDFS.subPropertyOf: {
            if (target !== undefined) {
              this.#axioms.push(subObjectPropertyOf(property, target));
            }
            break;
          }
          case OWL.inverseOf: {
            if (target !== undefined) {
              this.#axioms.push(inverseObjectProperties(property, target));
            }
            break;
          }
          case OWL.propertyChainAxiom: {
            this.#axioms.push(
              subPropertyChainOf(this.#compactIRIList(triple.object), property),
            );
            break;
          }
          case OWL.equivalentProperty: {
            if (target !== undefined) equivalents.add(target);
            break;
          }
          case OWL.propertyDisjointWith: {
            if (target !== undefined) {
              this.#axioms.push(disjointObjectProperties([property, target]));
            }
            break;
          }
          case RDFS.domain: {
            this.#axioms.push(
              objectPropertyDomain(property, this.#classExpression(triple.object)),
            );
            break;
          }
          case RDFS.range: {
            this.#axioms.push(
              objectPropertyRange(property, this.#classExpression(triple.object)),
            );
            break;
          }
        }
      }

      const characteristics = this.#characteristics.get(iri);
      for (const characteristic of PROPERTY_CHARACTERISTICS) {
        if (characteristics?.has(characteristic)) {
          this.#axioms.push(characteristicAxiom(characteristic, property));
        }
      }
    }
  }

  #buildDataPropertyAxioms(): void {
    for (const iri of sortedKeys(this.#dataProperties)) {
      const property = this.#compact(iri);
      const equivalents = new NaryAxiom(
        this.#axioms,
        property,
        equivalentDataProperties,
      );
      for (const triple of this.#triplesOf(iri)) {
        const target =
          triple.object.kind === "iri" ? this.#compact(triple.object.iri) : undefined;
        switch (triple.predicate) {
          case RDFS.subPropertyOf: {
            if (target !== undefined) {
              this.#axioms.push(subDataPropertyOf(property, target));
            }
            break;
          }
          case OWL.equivalentProperty: {
            if (target !== undefined) equivalents.add(target);
            break;
          }
          case OWL.propertyDisjointWith: {
            if (target !== undefined) {
              this.#axioms.push(disjointDataProperties([property, target]));
            }
            break;
          }
          case RDFS.domain: {
            this.#axioms.push(
              dataPropertyDomain(property, this.#classExpression(triple.object)),
            );
            break;
          }
          case RDFS.range: {
            this.#axioms.push(
              dataPropertyRange(property, this.#dataRange(triple.object)),
            );
            break;
          }
        }
      }
      if (this.#characteristics.get(iri)?.has("functional")) {
        this.#axioms.push(functionalDataProperty(property));
      }
    }
  }

  #buildIndividualAxioms(): void {
    const subjects = new Set([...this.#individuals, ...this.#assertionSubjects]);
    for (const iri of sortedKeys(subjects)) {
      const individual = this.#compact(iri);
      const same = new NaryAxiom(this.#axioms, individual, sameIndividual);
      for (const { predicate, object } of this.#triplesOf(iri)) {
        if (predicate === RDF.type) {
          if (object.kind === "iri" && object.iri !== OWL.NamedIndividual) {
            if (object.iri === OWL.Thing || !isVocabulary(object.iri)) {
              this.#axioms.push(classAssertion(individual, this.#classExpression(object)));
            }
          } else if (object.kind === "blankNode") {
            this.#axioms.push(classAssertion(individual, this.#classExpression(object)));
          }
          continue;
        }
        if (object.kind === "blankNode") continue;
        if (predicate === OWL.sameAs) {
          if (object.kind === "iri") same.add(this.#compact(object.iri));
          continue;
        }
        if (predicate === OWL.differentFrom) {
          if (object.kind === "iri") {
            this.#axioms.push(
              differentIndividuals([individual, this.#compact(object.iri)]),
            );
          }
          continue;
        }
        if (isVocabulary(predicate) || this.#annotationProperties.has(predicate)) {
          continue;
        }
        const property = this.#compact(predicate);
        this.#axioms.push(
          object.kind === "literal" ?
            dataPropertyAssertion(individual, property, this.#literal(object.literal))
          : objectPropertyAssertion(individual, property, this.#compact(object.iri)),
        );
      }
    }
  }

  #buildGroupAxioms(): void {
    for (const { kind, key } of this.#groups) {
      switch (kind) {
        case "allDisjointClasses": {
          const list = this.#firstObject(key, OWL.members);
          if (list === undefined) break;
          const members = this.#collectList(list).map((node) =>
            this.#classExpression(node),
          );
          this.#axioms.push(disjointClasses(members));
          break;
        }
        case "allDifferent": {
          const list =
            this.#firstObject(key, OWL.distinctMembers) ??
            this.#firstObject(key, OWL.members);
          if (list === undefined) break;
          this.#axioms.push(differentIndividuals(this.#compactIRIList(list)));
          break;
        }
        case "allDisjointProperties": {
          const list = this.#firstObject(key, OWL.members);
          if (list === undefined) break;
          const first = this.#collectList(list)[0];
          const isObject =
            first?.kind === "iri" && this.#objectProperties.has(first.iri);
          const members = this.#compactIRIList(list);
          this.#axioms.push(
            isObject ?
              disjointObjectProperties(members)
            : disjointDataProperties(members),
          );
          break;
        }
        case "negativeAssertion": {
          this.#buildNegativeAssertion(key);
          break;
        }
      }
    }
  }

  #buildNegativeAssertion(key: string): void {
    const source = this.#firstIRI(key, OWL.sourceIndividual);
    const property = this.#firstIRI(key, OWL.assertionProperty);
    if (source === undefined || property === undefined) return;

    const target = this.#firstIRI(key, OWL.targetIndividual);
    if (target !== undefined) {
      this.#axioms.push(
        negativeObjectPropertyAssertion(
          this.#compact(source),
          this.#compact(property),
          this.#compact(target),
        ),
      );
      return;
    }
    const value = this.#firstObject(key, OWL.targetValue);
    if (value?.kind === "literal") {
      this.#axioms.push(
        negativeDataPropertyAssertion(
          this.#compact(source),
          this.#compact(property),
          this.#literal(value.literal),
        ),
      );
    }
  }

  // === Class expressions ===

  #classExpression(term: RDFTerm): OWLClassExpression {
    if (term.kind === "iri") {
      if (term.iri === OWL.Thing) return thing();
      if (term.iri === OWL.Nothing) return nothing();
      return namedClass(this.#compact(term.iri));
    }
    if (term.kind === "literal") {
      return this.#unrecognizedClass(`"${term.literal.lexicalForm}"`, undefined);
    }

    const key = `_:${term.id}`;
    const expression =
      this.#firstObject(key, OWL.onProperty) === undefined ?
        this.#booleanClassExpression(key)
      : this.#restriction(key);
    return expression ?? this.#unrecognizedClass(key, this.#lineOf(key));
  }

  #booleanClassExpression(key: string): OWLClassExpression | undefined {
    const intersection = this.#firstObject(key, OWL.intersectionOf);
    if (intersection !== undefined) {
      return intersectionOf(
        this.#collectList(intersection).map((node) => this.#classExpression(node)),
      );
    }
    const union = this.#firstObject(key, OWL.unionOf);
    if (union !== undefined) {
      return unionOf(
        this.#collectList(union).map((node) => this.#classExpression(node)),
      );
    }
    const complement = this.#firstObject(key, OWL.complementOf);
    if (complement !== undefined) {
      return complementOf(this.#classExpression(complement));
    }
    const members = this.#firstObject(key, OWL.oneOf);
    if (members !== undefined) {
      return oneOf(this.#compactIRIList(members));
    }
    return undefined;
  }

  /**
   * Reads an `owl:Restriction` node. The first matching predicate wins,
   * in the order someValuesFrom, allValuesFrom, hasValue, hasSelf,
   * qualified cardinalities, unqualified cardinalities.
   */
  #restriction(key: string): OWLClassExpression | undefined {
    const propertyIRI = this.#firstIRI(key, OWL.onProperty);
    if (propertyIRI === undefined) return undefined;
    const property = this.#compact(propertyIRI);

    const some = this.#firstObject(key, OWL.someValuesFrom);
    if (some !== undefined) {
      return this.#isDataRestriction(propertyIRI, some) ?
          dataSomeValuesFrom(property, this.#dataRange(some))
        : someValuesFrom(property, this.#classExpression(some));
    }

    const all = this.#firstObject(key, OWL.allValuesFrom);
    if (all !== undefined) {
      return this.#isDataRestriction(propertyIRI, all) ?
          dataAllValuesFrom(property, this.#dataRange(all))
        : allValuesFrom(property, this.#classExpression(all));
    }

    const value = this.#firstObject(key, OWL.hasValue);
    if (value !== undefined) {
      if (value.kind === "literal") {
        return dataHasValue(property, this.#literal(value.literal));
      }
      if (value.kind === "iri") return hasValue(property, this.#compact(value.iri));
      return undefined;
    }

    const self = this.#firstObject(key, OWL.hasSelf);
    if (self !== undefined) {
      return self.kind === "literal" && literalBooleanValue(self.literal) === true ?
          hasSelf(property)
        : undefined;
    }

    return (
      this.#qualifiedCardinality(key, propertyIRI, property) ??
      this.#unqualifiedCardinality(key, propertyIRI, property)
    );
  }

  #qualifiedCardinality(
    key: string,
    propertyIRI: string,
    property: string,
  ): OWLClassExpression | undefined {
    const onClass = this.#firstObject(key, OWL.onClass);
    const onDataRange = this.#firstObject(key, OWL.onDataRange);
    const predicates = [
      [OWL.minQualifiedCardinality, "min"],
      [OWL.maxQualifiedCardinality, "max"],
      [OWL.qualifiedCardinality, "exact"],
    ] as const;

    for (const [predicate, bound] of predicates) {
      const n = this.#cardinality(key, predicate);
      if (n === undefined) continue;
      const isData =
        onDataRange !== undefined ||
        (onClass === undefined && this.#dataProperties.has(propertyIRI));
      if (isData) {
        const range =
          onDataRange === undefined ? undefined : this.#dataRange(onDataRange);
        return DATA_CARDINALITY[bound](property, n, range);
      }
      const filler =
        onClass === undefined ? undefined : this.#classExpression(onClass);
      return OBJECT_CARDINALITY[bound](property, n, filler);
    }
    return undefined;
  }

  #unqualifiedCardinality(
    key: string,
    propertyIRI: string,
    property: string,
  ): OWLClassExpression | undefined {
    const predicates = [
      [OWL.minCardinality, "min"],
      [OWL.maxCardinality, "max"],
      [OWL.cardinality, "exact"],
    ] as const;

    for (const [predicate, bound] of predicates) {
      const n = this.#cardinality(key, predicate);
      if (n === undefined) continue;
      return this.#dataProperties.has(propertyIRI) ?
          DATA_CARDINALITY[bound](property, n)
        : OBJECT_CARDINALITY[bound](property, n);
    }
    return undefined;
  }

  #cardinality(key: string, predicate: string): number | undefined {
    const value = this.#firstObject(key, predicate);
    if (value?.kind !== "literal") return undefined;
    const n = literalIntValue(value.literal);
    return n !== undefined && n >= 0 ? n : undefined;
  }

  /**
   * A restriction is a data restriction when its property is a known
   * data property, or when it is not a known object property and its
   * filler reads as a data range.
   */
  #isDataRestriction(propertyIRI: string, filler: RDFTerm): boolean {
    if (this.#dataProperties.has(propertyIRI)) return true;
    if (this.#objectProperties.has(propertyIRI)) return false;
    return this.#looksLikeDataRange(filler);
  }

  #looksLikeDataRange(term: RDFTerm): boolean {
    switch (term.kind) {
      case "literal": {
        return true;
      }
      case "iri": {
        return (
          term.iri.startsWith(XSD_NAMESPACE) ||
          DATA_RANGE_IRIS.has(term.iri) ||
          this.#datatypes.has(term.iri)
        );
      }
      case "blankNode": {
        const key = `_:${term.id}`;
        if (
          this.#hasType(key, RDFS.Datatype) ||
          this.#firstObject(key, OWL.onDatatype) !== undefined ||
          this.#firstObject(key, OWL.datatypeComplementOf) !== undefined
        ) {
          return true;
        }
        const members = this.#firstObject(key, OWL.oneOf);
        if (members !== undefined) {
          return this.#collectList(members)[0]?.kind === "literal";
        }
        const operands =
          this.#firstObject(key, OWL.intersectionOf) ??
          this.#firstObject(key, OWL.unionOf);
        const first = operands === undefined ? undefined : this.#collectList(operands)[0];
        return first !== undefined && this.#looksLikeDataRange(first);
      }
    }
  }

  // === Data ranges ===

  #dataRange(term: RDFTerm): OWLDataRange {
    if (term.kind === "iri") return datatype(this.#compactDatatype(term.iri));
    if (term.kind === "literal") {
      return this.#unrecognizedRange(`"${term.literal.lexicalForm}"`, undefined);
    }

    const key = `_:${term.id}`;
    const base = this.#firstIRI(key, OWL.onDatatype);
    if (base !== undefined) {
      const restrictions = this.#firstObject(key, OWL.withRestrictions);
      const facets =
        restrictions === undefined ? [] : (
          this.#collectList(restrictions).flatMap((node) => this.#facet(node))
        );
      return datatypeRestriction(this.#compactDatatype(base), facets);
    }
    const intersection = this.#firstObject(key, OWL.intersectionOf);
    if (intersection !== undefined) {
      return dataIntersectionOf(
        this.#collectList(intersection).map((node) => this.#dataRange(node)),
      );
    }
    const union = this.#firstObject(key, OWL.unionOf);
    if (union !== undefined) {
      return dataUnionOf(
        this.#collectList(union).map((node) => this.#dataRange(node)),
      );
    }
    const complement = this.#firstObject(key, OWL.datatypeComplementOf);
    if (complement !== undefined) {
      return dataComplementOf(this.#dataRange(complement));
    }
    const members = this.#firstObject(key, OWL.oneOf);
    if (members !== undefined) {
      return dataOneOf(
        this.#collectList(members).flatMap((node) =>
          node.kind === "literal" ? [this.#literal(node.literal)] : [],
        ),
      );
    }
    return this.#unrecognizedRange(key, this.#lineOf(key));
  }

  #facet(node: RDFTerm): FacetRestriction[] {
    const key = nodeKey(node);
    if (key === undefined) return [];
    return this.#triplesOf(key).flatMap((triple) => {
      const facet = compactXSD(triple.predicate);
      if (!isXSDFacet(facet) || triple.object.kind !== "literal") return [];
      return [{ facet, value: this.#literal(triple.object.literal) }];
    });
  }

  // === Fallbacks ===

  #unrecognizedClass(node: string, line: number | undefined): OWLClassExpression {
    this.#unrecognized(node, "classExpression", line);
    return thing();
  }

  #unrecognizedRange(node: string, line: number | undefined): OWLDataRange {
    this.#unrecognized(node, "dataRange", line);
    return datatype("rdfs:Literal");
  }

  #unrecognized(
    node: string,
    expected: "classExpression" | "dataRange",
    line: number | undefined,
  ): void {
    if (this.#strict) throw new UnrecognizedNodeError(node, expected, line);
    const reportKey = `${expected} ${node}`;
    if (this.#reported.has(reportKey)) return;
    this.#reported.add(reportKey);
    const warning: DecodeWarning =
      expected === "classExpression" ?
        {
          code: "UNRECOGNIZED_CLASS_EXPRESSION",
          node,
          ...(line !== undefined && { line }),
          message: `${node} is not a recognizable class expression; using owl:Thing`,
        }
      : {
          code: "UNRECOGNIZED_DATA_RANGE",
          node,
          ...(line !== undefined && { line }),
          message: `${node} is not a recognizable data range; using rdfs:Literal`,
        };
    this.#warnings.push(warning);
    this.#onWarning?.(warning);
  }

  // === RDF lists ===

  /**
   * Walks an rdf:first/rdf:rest chain. A bare IRI other than rdf:nil is
   * read as a one-element list.
   */
  #collectList(head: RDFTerm): RDFTerm[] {
    if (head.kind === "iri") return head.iri === RDF.nil ? [] : [head];
    if (head.kind === "literal") return [head];

    const items: RDFTerm[] = [];
    const visited = new Set<string>();
    let current: RDFTerm | undefined = head;
    while (current?.kind === "blankNode") {
      const key = `_:${current.id}`;
      if (visited.has(key)) break;
      visited.add(key);
      const first = this.#firstObject(key, RDF.first);
      if (first !== undefined) items.push(first);
      current = this.#firstObject(key, RDF.rest);
    }
    return items;
  }

  #compactIRIList(list: RDFTerm): string[] {
    return this.#collectList(list).flatMap((node) =>
      node.kind === "iri" ? [this.#compact(node.iri)] : [],
    );
  }

  // === Lookup ===

  #triplesOf(key: string): readonly Triple[] {
    return this.#subjects.get(key) ?? [];
  }

  #objectsOf(key: string, predicate: string): RDFTerm[] {
    return this.#triplesOf(key)
      .filter((triple) => triple.predicate === predicate)
      .map((triple) => triple.object);
  }

  #firstObject(key: string, predicate: string): RDFTerm | undefined {
    return this.#triplesOf(key).find((triple) => triple.predicate === predicate)
      ?.object;
  }

  #firstIRI(key: string, predicate: string): string | undefined {
    const object = this.#firstObject(key, predicate);
    return object?.kind === "iri" ? object.iri : undefined;
  }

  #hasType(key: string, type: string): boolean {
    return this.#objectsOf(key, RDF.type).some(
      (term) => term.kind === "iri" && term.iri === type,
    );
  }

  #lineOf(key: string): number | undefined {
    return this.#triplesOf(key)[0]?.line;
  }

  #termForKey(key: string): RDFTerm {
    return key.startsWith("_:") ?
        { kind: "blankNode", id: key.slice(2) }
      : { kind: "iri", iri: key };
  }

  #classExpressionsOf(iri: string, predicate: string): OWLClassExpression[] {
    return this.#objectsOf(iri, predicate).map((term) =>
      this.#classExpression(term),
    );
  }

  #compactIRIsOf(iri: string, predicate: string): string[] {
    return this.#objectsOf(iri, predicate).flatMap((term) =>
      term.kind === "iri" ? [this.#compact(term.iri)] : [],
    );
  }

  // === Compaction ===

  #compact(iri: string): string {
    return this.#prefixMap.compact(iri);
  }

  /**
   * XSD datatypes always use the `xsd:` prefix so literal helpers can
   * recognize them, whatever the document bound that namespace to.
   */
  #compactDatatype(iri: string): string {
    if (iri.startsWith(XSD_NAMESPACE)) return compactXSD(iri);
    if (iri === RDF.langString) return RDF_LANG_STRING;
    return this.#compact(iri);
  }

  #literal(literal: OWLLiteral): OWLLiteral {
    return { ...literal, datatype: this.#compactDatatype(literal.datatype) };
  }
}

const OBJECT_CARDINALITY = {
  min: minCardinality,
  max: maxCardinality,
  exact: exactCardinality,
} as const;

const DATA_CARDINALITY = {
  min: dataMinCardinality,
  max: dataMaxCardinality,
  exact: dataExactCardinality,
} as const;
