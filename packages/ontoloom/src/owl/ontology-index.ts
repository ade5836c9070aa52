import {
  axiomCategory,
  type AxiomCategory,
  type OWLAxiom,
  referencedClasses,
  referencedDataProperties,
  referencedIndividuals,
  referencedObjectProperties,
} from "./axiom";
import { type OWLClassExpression } from "./class-expression";
import { type OWLLiteral } from "./literal";
import { type OWLOntology } from "./ontology";

export type SubClassPair = Readonly<{
  sub: OWLClassExpression;
  sup: OWLClassExpression;
}>;

export type ObjectAssertionEdge = Readonly<{ property: string; object: string }>;

export type IncomingObjectAssertionEdge = Readonly<{
  property: string;
  subject: string;
}>;

export type DataAssertionEdge = Readonly<{ property: string; value: OWLLiteral }>;

export type ObjectAssertionTriple = Readonly<{
  subject: string;
  property: string;
  object: string;
}>;

type Multimap<T> = ReadonlyMap<string, readonly T[]>;

/**
 * OntologyIndex holds precomputed axiom lookups for one ontology revision.
 *
 * Built in a single pass over the axioms. It is a snapshot: mutating the
 * source ontology does not update it, and `isCurrentFor` reports whether
 * it still matches.
 *
 * @example
 * ```typescript
 * const index = ontology.buildIndex();
 * index.superClassesOf("ex:Employee"); // [namedClass("ex:Person")]
 * index.typesOf("ex:alice");
 *
 * ontology.addAxiom(typeAssertion("ex:bob", "ex:Person"));
 * index.isCurrentFor(ontology); // false
 * ```
 */
export class OntologyIndex {
  readonly #source: OWLOntology;
  readonly revision: number;

  // === TBox ===
  readonly subClassAxiomsBySubClass: Multimap<SubClassPair>;
  readonly subClassAxiomsBySuperClass: Multimap<SubClassPair>;
  readonly equivalentClassAxiomsByClass: Multimap<readonly OWLClassExpression[]>;
  readonly disjointClassAxiomsByClass: Multimap<readonly OWLClassExpression[]>;
  readonly disjointUnionsByClass: Multimap<readonly OWLClassExpression[]>;

  // === ABox ===
  readonly classAssertionsByIndividual: Multimap<OWLClassExpression>;
  readonly objectPropertyAssertionsBySubject: Multimap<ObjectAssertionEdge>;
  readonly objectPropertyAssertionsByObject: Multimap<IncomingObjectAssertionEdge>;
  readonly dataPropertyAssertionsBySubject: Multimap<DataAssertionEdge>;
  readonly sameIndividualsByIndividual: Multimap<readonly string[]>;
  readonly differentIndividualsByIndividual: Multimap<readonly string[]>;
  readonly negativeObjectPropertyAssertionsBySubject: Multimap<ObjectAssertionEdge>;
  readonly negativeDataPropertyAssertionsBySubject: Multimap<DataAssertionEdge>;
  readonly allObjectPropertyAssertions: readonly ObjectAssertionTriple[];

  // === RBox ===
  // Object and data property hierarchies share these maps
  readonly subPropertiesBySub: Multimap<string>;
  readonly subPropertiesBySuper: Multimap<string>;
  readonly propertyChainsBySuper: Multimap<readonly string[]>;
  readonly inverseProperties: ReadonlyMap<string, string>;

  // === Signature ===
  readonly classSignature: ReadonlySet<string>;
  readonly objectPropertySignature: ReadonlySet<string>;
  readonly dataPropertySignature: ReadonlySet<string>;
  readonly individualSignature: ReadonlySet<string>;

  // === Partitions ===
  readonly tboxAxioms: readonly OWLAxiom[];
  readonly rboxAxioms: readonly OWLAxiom[];
  readonly aboxAxioms: readonly OWLAxiom[];
  readonly declarationAxioms: readonly OWLAxiom[];

  constructor(ontology: OWLOntology) {
    const builder = new IndexBuilder(ontology);
    this.#source = ontology;
    this.revision = ontology.revision;

    this.subClassAxiomsBySubClass = builder.subClassBySub;
    this.subClassAxiomsBySuperClass = builder.subClassBySuper;
    this.equivalentClassAxiomsByClass = builder.equivalentByClass;
    this.disjointClassAxiomsByClass = builder.disjointByClass;
    this.disjointUnionsByClass = builder.disjointUnionByClass;

    this.classAssertionsByIndividual = builder.classAssertions;
    this.objectPropertyAssertionsBySubject = builder.objectBySubject;
    this.objectPropertyAssertionsByObject = builder.objectByObject;
    this.dataPropertyAssertionsBySubject = builder.dataBySubject;
    this.sameIndividualsByIndividual = builder.sameIndividuals;
    this.differentIndividualsByIndividual = builder.differentIndividuals;
    this.negativeObjectPropertyAssertionsBySubject = builder.negativeObjectBySubject;
    this.negativeDataPropertyAssertionsBySubject = builder.negativeDataBySubject;
    this.allObjectPropertyAssertions = builder.objectAssertions;

    this.subPropertiesBySub = builder.subPropertyBySub;
    this.subPropertiesBySuper = builder.subPropertyBySuper;
    this.propertyChainsBySuper = builder.chainsBySuper;
    this.inverseProperties = builder.inverses;

    this.classSignature = builder.classSignature;
    this.objectPropertySignature = builder.objectPropertySignature;
    this.dataPropertySignature = builder.dataPropertySignature;
    this.individualSignature = builder.individualSignature;

    this.tboxAxioms = builder.partitions.tbox;
    this.rboxAxioms = builder.partitions.rbox;
    this.aboxAxioms = builder.partitions.abox;
    this.declarationAxioms = builder.partitions.declaration;

    Object.freeze(this);
  }

  /**
   * Whether this index was built from `ontology` at its current revision.
   */
  isCurrentFor(ontology: OWLOntology): boolean {
    return ontology === this.#source && ontology.revision === this.revision;
  }

  // === Lookups ===

  superClassesOf(classIRI: string): OWLClassExpression[] {
    return (this.subClassAxiomsBySubClass.get(classIRI) ?? []).map(
      (pair) => pair.sup,
    );
  }

  subClassesOf(classIRI: string): OWLClassExpression[] {
    return (this.subClassAxiomsBySuperClass.get(classIRI) ?? []).map(
      (pair) => pair.sub,
    );
  }

  inverseOf(propertyIRI: string): string | undefined {
    return this.inverseProperties.get(propertyIRI);
  }

  typesOf(individualIRI: string): readonly OWLClassExpression[] {
    return this.classAssertionsByIndividual.get(individualIRI) ?? [];
  }
}

export function buildOntologyIndex(ontology: OWLOntology): OntologyIndex {
  return new OntologyIndex(ontology);
}

// ============================================================
// Single-pass construction
// ============================================================

function append<T>(map: Map<string, T[]>, key: string, value: T): void {
  const bucket = map.get(key);
  if (bucket === undefined) {
    map.set(key, [value]);
  } else {
    bucket.push(value);
  }
}

function addAll(target: Set<string>, source: Iterable<string>): void {
  for (const value of source) target.add(value);
}

class IndexBuilder {
  readonly subClassBySub = new Map<string, SubClassPair[]>();
  readonly subClassBySuper = new Map<string, SubClassPair[]>();
  readonly equivalentByClass = new Map<string, (readonly OWLClassExpression[])[]>();
  readonly disjointByClass = new Map<string, (readonly OWLClassExpression[])[]>();
  readonly disjointUnionByClass = new Map<string, (readonly OWLClassExpression[])[]>();

  readonly classAssertions = new Map<string, OWLClassExpression[]>();
  readonly objectBySubject = new Map<string, ObjectAssertionEdge[]>();
  readonly objectByObject = new Map<string, IncomingObjectAssertionEdge[]>();
  readonly dataBySubject = new Map<string, DataAssertionEdge[]>();
  readonly sameIndividuals = new Map<string, (readonly string[])[]>();
  readonly differentIndividuals = new Map<string, (readonly string[])[]>();
  readonly negativeObjectBySubject = new Map<string, ObjectAssertionEdge[]>();
  readonly negativeDataBySubject = new Map<string, DataAssertionEdge[]>();
  readonly objectAssertions: ObjectAssertionTriple[] = [];

  readonly subPropertyBySub = new Map<string, string[]>();
  readonly subPropertyBySuper = new Map<string, string[]>();
  readonly chainsBySuper = new Map<string, (readonly string[])[]>();
  readonly inverses = new Map<string, string>();

  readonly classSignature: Set<string>;
  readonly objectPropertySignature: Set<string>;
  readonly dataPropertySignature: Set<string>;
  readonly individualSignature: Set<string>;

  readonly partitions: Record<AxiomCategory, OWLAxiom[]> = {
    tbox: [],
    rbox: [],
    abox: [],
    declaration: [],
  };

  constructor(ontology: OWLOntology) {
    this.classSignature = new Set(ontology.classes.map((entry) => entry.iri));
    this.objectPropertySignature = new Set(
      ontology.objectProperties.map((entry) => entry.iri),
    );
    this.dataPropertySignature = new Set(
      ontology.dataProperties.map((entry) => entry.iri),
    );
    this.individualSignature = new Set(
      ontology.individuals.map((entry) => entry.iri),
    );

    for (const axiom of ontology.axioms) this.#visit(axiom);

    for (const property of ontology.objectProperties) {
      if (property.inverseOf !== undefined) {
        this.inverses.set(property.iri, property.inverseOf);
        this.inverses.set(property.inverseOf, property.iri);
      }
    }
  }

  #visit(axiom: OWLAxiom): void {
    this.partitions[axiomCategory(axiom)].push(axiom);

    addAll(this.classSignature, referencedClasses(axiom));
    addAll(this.objectPropertySignature, referencedObjectProperties(axiom));
    addAll(this.dataPropertySignature, referencedDataProperties(axiom));
    addAll(this.individualSignature, referencedIndividuals(axiom));

    switch (axiom.kind) {
      case "subClassOf": {
        const pair: SubClassPair = { sub: axiom.sub, sup: axiom.sup };
        if (axiom.sub.kind === "named") {
          append(this.subClassBySub, axiom.sub.iri, pair);
        }
        if (axiom.sup.kind === "named") {
          append(this.subClassBySuper, axiom.sup.iri, pair);
        }
        break;
      }
      case "equivalentClasses": {
        for (const expression of axiom.classes) {
          if (expression.kind === "named") {
            append(this.equivalentByClass, expression.iri, axiom.classes);
          }
        }
        break;
      }
      case "disjointClasses": {
        for (const expression of axiom.classes) {
          if (expression.kind === "named") {
            append(this.disjointByClass, expression.iri, axiom.classes);
          }
        }
        break;
      }
      case "disjointUnion": {
        append(this.disjointUnionByClass, axiom.classIRI, axiom.disjuncts);
        break;
      }
      case "classAssertion": {
        append(this.classAssertions, axiom.individual, axiom.classExpression);
        break;
      }
      case "objectPropertyAssertion": {
        const { subject, property, object } = axiom;
        append(this.objectBySubject, subject, { property, object });
        append(this.objectByObject, object, { property, subject });
        this.objectAssertions.push({ subject, property, object });
        break;
      }
      case "dataPropertyAssertion": {
        append(this.dataBySubject, axiom.subject, {
          property: axiom.property,
          value: axiom.value,
        });
        break;
      }
      case "negativeObjectPropertyAssertion": {
        append(this.negativeObjectBySubject, axiom.subject, {
          property: axiom.property,
          object: axiom.object,
        });
        break;
      }
      case "negativeDataPropertyAssertion": {
        append(this.negativeDataBySubject, axiom.subject, {
          property: axiom.property,
          value: axiom.value,
        });
        break;
      }
      case "sameIndividual": {
        for (const individual of axiom.individuals) {
          append(this.sameIndividuals, individual, axiom.individuals);
        }
        break;
      }
      case "differentIndividuals": {
        for (const individual of axiom.individuals) {
          append(this.differentIndividuals, individual, axiom.individuals);
        }
        break;
      }
      case "subObjectPropertyOf":
      case "subDataPropertyOf": {
        append(this.subPropertyBySub, axiom.sub, axiom.sup);
        append(this.subPropertyBySuper, axiom.sup, axiom.sub);
        break;
      }
      case "subPropertyChainOf": {
        append(this.chainsBySuper, axiom.sup, axiom.chain);
        break;
      }
      case "inverseObjectProperties": {
        this.inverses.set(axiom.first, axiom.second);
        this.inverses.set(axiom.second, axiom.first);
        break;
      }
      default: {
        break;
      }
    }
  }
}
