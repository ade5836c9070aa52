/**
 * OWL axioms.
 *
 * Every axiom belongs to exactly one of four categories:
 * - TBox: class-level statements (subclass, equivalence, disjointness)
 * - RBox: property hierarchy, domain/range and characteristics
 * - ABox: facts about individuals
 * - Declaration: entity declarations
 *
 * Signature extractors switch exhaustively over every axiom kind, so a new
 * kind does not compile until each extractor handles it.
 */
import {
  describeClassExpression,
  namedClass,
  type OWLClassExpression,
  usedClasses,
  usedDataProperties,
  usedIndividuals,
  usedObjectProperties,
} from "./class-expression";
import { describeDataRange, type OWLDataRange } from "./data-range";
import { describeLiteral, type OWLLiteral } from "./literal";
import { type PropertyCharacteristic } from "./property";

// ============================================================
// Types
// ============================================================

type PropertyAxiom<K extends string> = Readonly<{ kind: K; property: string }>;

export type OWLAxiom =
  // TBox
  | Readonly<{ kind: "subClassOf"; sub: OWLClassExpression; sup: OWLClassExpression }>
  | Readonly<{ kind: "equivalentClasses"; classes: readonly OWLClassExpression[] }>
  | Readonly<{ kind: "disjointClasses"; classes: readonly OWLClassExpression[] }>
  | Readonly<{
      kind: "disjointUnion";
      classIRI: string;
      disjuncts: readonly OWLClassExpression[];
    }>
  // RBox (object properties)
  | Readonly<{ kind: "subObjectPropertyOf"; sub: string; sup: string }>
  | Readonly<{ kind: "subPropertyChainOf"; chain: readonly string[]; sup: string }>
  | Readonly<{ kind: "equivalentObjectProperties"; properties: readonly string[] }>
  | Readonly<{ kind: "disjointObjectProperties"; properties: readonly string[] }>
  | Readonly<{ kind: "inverseObjectProperties"; first: string; second: string }>
  | Readonly<{
      kind: "objectPropertyDomain";
      property: string;
      domain: OWLClassExpression;
    }>
  | Readonly<{
      kind: "objectPropertyRange";
      property: string;
      range: OWLClassExpression;
    }>
  | PropertyAxiom<"functionalObjectProperty">
  | PropertyAxiom<"inverseFunctionalObjectProperty">
  | PropertyAxiom<"transitiveObjectProperty">
  | PropertyAxiom<"symmetricObjectProperty">
  | PropertyAxiom<"asymmetricObjectProperty">
  | PropertyAxiom<"reflexiveObjectProperty">
  | PropertyAxiom<"irreflexiveObjectProperty">
  // RBox (data properties)
  | Readonly<{ kind: "subDataPropertyOf"; sub: string; sup: string }>
  | Readonly<{ kind: "equivalentDataProperties"; properties: readonly string[] }>
  | Readonly<{ kind: "disjointDataProperties"; properties: readonly string[] }>
  | Readonly<{
      kind: "dataPropertyDomain";
      property: string;
      domain: OWLClassExpression;
    }>
  | Readonly<{ kind: "dataPropertyRange"; property: string; range: OWLDataRange }>
  | PropertyAxiom<"functionalDataProperty">
  // ABox
  | Readonly<{
      kind: "classAssertion";
      individual: string;
      classExpression: OWLClassExpression;
    }>
  | Readonly<{
      kind: "objectPropertyAssertion";
      subject: string;
      property: string;
      object: string;
    }>
  | Readonly<{
      kind: "negativeObjectPropertyAssertion";
      subject: string;
      property: string;
      object: string;
    }>
  | Readonly<{
      kind: "dataPropertyAssertion";
      subject: string;
      property: string;
      value: OWLLiteral;
    }>
  | Readonly<{
      kind: "negativeDataPropertyAssertion";
      subject: string;
      property: string;
      value: OWLLiteral;
    }>
  | Readonly<{ kind: "sameIndividual"; individuals: readonly string[] }>
  | Readonly<{ kind: "differentIndividuals"; individuals: readonly string[] }>
  // Declarations
  | Readonly<{ kind: "declareClass"; iri: string }>
  | Readonly<{ kind: "declareObjectProperty"; iri: string }>
  | Readonly<{ kind: "declareDataProperty"; iri: string }>
  | Readonly<{ kind: "declareNamedIndividual"; iri: string }>
  | Readonly<{ kind: "declareDatatype"; iri: string }>
  | Readonly<{ kind: "declareAnnotationProperty"; iri: string }>;

export type AxiomKind = OWLAxiom["kind"];

export type AxiomOf<K extends AxiomKind> = Extract<OWLAxiom, { kind: K }>;

export type AxiomCategory = "tbox" | "rbox" | "abox" | "declaration";

/**
 * Axiom kind asserting each object-property characteristic.
 */
export const CHARACTERISTIC_AXIOM_KIND = {
  functional: "functionalObjectProperty",
  inverseFunctional: "inverseFunctionalObjectProperty",
  symmetric: "symmetricObjectProperty",
  asymmetric: "asymmetricObjectProperty",
  transitive: "transitiveObjectProperty",
  reflexive: "reflexiveObjectProperty",
  irreflexive: "irreflexiveObjectProperty",
} as const satisfies Record<PropertyCharacteristic, AxiomKind>;

export type CharacteristicAxiomKind =
  (typeof CHARACTERISTIC_AXIOM_KIND)[PropertyCharacteristic];

// ============================================================
// Constructors
// ============================================================

export function subClassOf(
  sub: OWLClassExpression,
  sup: OWLClassExpression,
): OWLAxiom {
  return { kind: "subClassOf", sub, sup };
}

export function equivalentClasses(
  classes: readonly OWLClassExpression[],
): OWLAxiom {
  return { kind: "equivalentClasses", classes };
}

export function disjointClasses(
  classes: readonly OWLClassExpression[],
): OWLAxiom {
  return { kind: "disjointClasses", classes };
}

export function disjointUnion(
  classIRI: string,
  disjuncts: readonly OWLClassExpression[],
): OWLAxiom {
  return { kind: "disjointUnion", classIRI, disjuncts };
}

export function subObjectPropertyOf(sub: string, sup: string): OWLAxiom {
  return { kind: "subObjectPropertyOf", sub, sup };
}

export function subPropertyChainOf(
  chain: readonly string[],
  sup: string,
): OWLAxiom {
  return { kind: "subPropertyChainOf", chain, sup };
}

export function equivalentObjectProperties(
  properties: readonly string[],
): OWLAxiom {
  return { kind: "equivalentObjectProperties", properties };
}

export function disjointObjectProperties(
  properties: readonly string[],
): OWLAxiom {
  return { kind: "disjointObjectProperties", properties };
}

export function inverseObjectProperties(
  first: string,
  second: string,
): OWLAxiom {
  return { kind: "inverseObjectProperties", first, second };
}

export function objectPropertyDomain(
  property: string,
  domain: OWLClassExpression,
): OWLAxiom {
  return { kind: "objectPropertyDomain", property, domain };
}

export function objectPropertyRange(
  property: string,
  range: OWLClassExpression,
): OWLAxiom {
  return { kind: "objectPropertyRange", property, range };
}

/**
 * `characteristicAxiom("transitive", "ex:ancestorOf")` builds a
 * `transitiveObjectProperty` axiom.
 */
export function characteristicAxiom(
  characteristic: PropertyCharacteristic,
  property: string,
): OWLAxiom {
  return { kind: CHARACTERISTIC_AXIOM_KIND[characteristic], property };
}

export function subDataPropertyOf(sub: string, sup: string): OWLAxiom {
  return { kind: "subDataPropertyOf", sub, sup };
}

export function equivalentDataProperties(
  properties: readonly string[],
): OWLAxiom {
  return { kind: "equivalentDataProperties", properties };
}

export function disjointDataProperties(properties: readonly string[]): OWLAxiom {
  return { kind: "disjointDataProperties", properties };
}

export function dataPropertyDomain(
  property: string,
  domain: OWLClassExpression,
): OWLAxiom {
  return { kind: "dataPropertyDomain", property, domain };
}

export function dataPropertyRange(
  property: string,
  range: OWLDataRange,
): OWLAxiom {
  return { kind: "dataPropertyRange", property, range };
}

export function functionalDataProperty(property: string): OWLAxiom {
  return { kind: "functionalDataProperty", property };
}

export function classAssertion(
  individual: string,
  classExpression: OWLClassExpression,
): OWLAxiom {
  return { kind: "classAssertion", individual, classExpression };
}

export function objectPropertyAssertion(
  subject: string,
  property: string,
  object: string,
): OWLAxiom {
  return { kind: "objectPropertyAssertion", subject, property, object };
}

export function negativeObjectPropertyAssertion(
  subject: string,
  property: string,
  object: string,
): OWLAxiom {
  return { kind: "negativeObjectPropertyAssertion", subject, property, object };
}

export function dataPropertyAssertion(
  subject: string,
  property: string,
  value: OWLLiteral,
): OWLAxiom {
  return { kind: "dataPropertyAssertion", subject, property, value };
}

export function negativeDataPropertyAssertion(
  subject: string,
  property: string,
  value: OWLLiteral,
): OWLAxiom {
  return { kind: "negativeDataPropertyAssertion", subject, property, value };
}

export function sameIndividual(individuals: readonly string[]): OWLAxiom {
  return { kind: "sameIndividual", individuals };
}

export function differentIndividuals(individuals: readonly string[]): OWLAxiom {
  return { kind: "differentIndividuals", individuals };
}

export function declareClass(iri: string): OWLAxiom {
  return { kind: "declareClass", iri };
}

export function declareObjectProperty(iri: string): OWLAxiom {
  return { kind: "declareObjectProperty", iri };
}

export function declareDataProperty(iri: string): OWLAxiom {
  return { kind: "declareDataProperty", iri };
}

export function declareNamedIndividual(iri: string): OWLAxiom {
  return { kind: "declareNamedIndividual", iri };
}

export function declareDatatype(iri: string): OWLAxiom {
  return { kind: "declareDatatype", iri };
}

export function declareAnnotationProperty(iri: string): OWLAxiom {
  return { kind: "declareAnnotationProperty", iri };
}

// Shorthands over named classes

export function simpleSubClassOf(sub: string, sup: string): OWLAxiom {
  return subClassOf(namedClass(sub), namedClass(sup));
}

export function simpleEquivalent(...classes: string[]): OWLAxiom {
  return equivalentClasses(classes.map(namedClass));
}

export function simpleDisjoint(...classes: string[]): OWLAxiom {
  return disjointClasses(classes.map(namedClass));
}

export function typeAssertion(individual: string, type: string): OWLAxiom {
  return classAssertion(individual, namedClass(type));
}

// ============================================================
// Classification
// ============================================================

export function axiomCategory(axiom: OWLAxiom): AxiomCategory {
  switch (axiom.kind) {
    case "subClassOf":
    case "equivalentClasses":
    case "disjointClasses":
    case "disjointUnion": {
      return "tbox";
    }
    case "subObjectPropertyOf":
    case "subPropertyChainOf":
    case "equivalentObjectProperties":
    case "disjointObjectProperties":
    case "inverseObjectProperties":
    case "objectPropertyDomain":
    case "objectPropertyRange":
    case "functionalObjectProperty":
    case "inverseFunctionalObjectProperty":
    case "transitiveObjectProperty":
    case "symmetricObjectProperty":
    case "asymmetricObjectProperty":
    case "reflexiveObjectProperty":
    case "irreflexiveObjectProperty":
    case "subDataPropertyOf":
    case "equivalentDataProperties":
    case "disjointDataProperties":
    case "dataPropertyDomain":
    case "dataPropertyRange":
    case "functionalDataProperty": {
      return "rbox";
    }
    case "classAssertion":
    case "objectPropertyAssertion":
    case "negativeObjectPropertyAssertion":
    case "dataPropertyAssertion":
    case "negativeDataPropertyAssertion":
    case "sameIndividual":
    case "differentIndividuals": {
      return "abox";
    }
    case "declareClass":
    case "declareObjectProperty":
    case "declareDataProperty":
    case "declareNamedIndividual":
    case "declareDatatype":
    case "declareAnnotationProperty": {
      return "declaration";
    }
  }
}

export function isTBoxAxiom(axiom: OWLAxiom): boolean {
  return axiomCategory(axiom) === "tbox";
}

export function isRBoxAxiom(axiom: OWLAxiom): boolean {
  return axiomCategory(axiom) === "rbox";
}

export function isABoxAxiom(axiom: OWLAxiom): boolean {
  return axiomCategory(axiom) === "abox";
}

export function isDeclarationAxiom(axiom: OWLAxiom): boolean {
  return axiomCategory(axiom) === "declaration";
}

export function isCharacteristicAxiom(
  axiom: OWLAxiom,
): axiom is AxiomOf<CharacteristicAxiomKind> {
  return Object.values(CHARACTERISTIC_AXIOM_KIND).some(
    (kind) => kind === axiom.kind,
  );
}

// ============================================================
// Signature
// ============================================================

/**
 * Class expressions an axiom carries, in field order.
 */
export function axiomClassExpressions(
  axiom: OWLAxiom,
): readonly OWLClassExpression[] {
  switch (axiom.kind) {
    case "subClassOf": {
      return [axiom.sub, axiom.sup];
    }
    case "equivalentClasses":
    case "disjointClasses": {
      return axiom.classes;
    }
    case "disjointUnion": {
      return axiom.disjuncts;
    }
    case "objectPropertyDomain":
    case "dataPropertyDomain": {
      return [axiom.domain];
    }
    case "objectPropertyRange": {
      return [axiom.range];
    }
    case "classAssertion": {
      return [axiom.classExpression];
    }
    case "subObjectPropertyOf":
    case "subPropertyChainOf":
    case "equivalentObjectProperties":
    case "disjointObjectProperties":
    case "inverseObjectProperties":
    case "functionalObjectProperty":
    case "inverseFunctionalObjectProperty":
    case "transitiveObjectProperty":
    case "symmetricObjectProperty":
    case "asymmetricObjectProperty":
    case "reflexiveObjectProperty":
    case "irreflexiveObjectProperty":
    case "subDataPropertyOf":
    case "equivalentDataProperties":
    case "disjointDataProperties":
    case "dataPropertyRange":
    case "functionalDataProperty":
    case "objectPropertyAssertion":
    case "negativeObjectPropertyAssertion":
    case "dataPropertyAssertion":
    case "negativeDataPropertyAssertion":
    case "sameIndividual":
    case "differentIndividuals":
    case "declareClass":
    case "declareObjectProperty":
    case "declareDataProperty":
    case "declareNamedIndividual":
    case "declareDatatype":
    case "declareAnnotationProperty": {
      return [];
    }
  }
}

function collect(
  direct: Iterable<string>,
  axiom: OWLAxiom,
  extract: (expression: OWLClassExpression) => Set<string>,
): Set<string> {
  const result = new Set(direct);
  for (const expression of axiomClassExpressions(axiom)) {
    for (const iri of extract(expression)) result.add(iri);
  }
  return result;
}

export function referencedClasses(axiom: OWLAxiom): Set<string> {
  switch (axiom.kind) {
    case "disjointUnion": {
      return collect([axiom.classIRI], axiom, usedClasses);
    }
    case "declareClass": {
      return new Set([axiom.iri]);
    }
    case "subClassOf":
    case "equivalentClasses":
    case "disjointClasses":
    case "objectPropertyDomain":
    case "objectPropertyRange":
    case "dataPropertyDomain":
    case "classAssertion":
    case "subObjectPropertyOf":
    case "subPropertyChainOf":
    case "equivalentObjectProperties":
    case "disjointObjectProperties":
    case "inverseObjectProperties":
    case "functionalObjectProperty":
    case "inverseFunctionalObjectProperty":
    case "transitiveObjectProperty":
    case "symmetricObjectProperty":
    case "asymmetricObjectProperty":
    case "reflexiveObjectProperty":
    case "irreflexiveObjectProperty":
    case "subDataPropertyOf":
    case "equivalentDataProperties":
    case "disjointDataProperties":
    case "dataPropertyRange":
    case "functionalDataProperty":
    case "objectPropertyAssertion":
    case "negativeObjectPropertyAssertion":
    case "dataPropertyAssertion":
    case "negativeDataPropertyAssertion":
    case "sameIndividual":
    case "differentIndividuals":
    case "declareObjectProperty":
    case "declareDataProperty":
    case "declareNamedIndividual":
    case "declareDatatype":
    case "declareAnnotationProperty": {
      return collect([], axiom, usedClasses);
    }
  }
}

export function referencedObjectProperties(axiom: OWLAxiom): Set<string> {
  switch (axiom.kind) {
    case "subObjectPropertyOf": {
      return new Set([axiom.sub, axiom.sup]);
    }
    case "subPropertyChainOf": {
      return new Set([...axiom.chain, axiom.sup]);
    }
    case "equivalentObjectProperties":
    case "disjointObjectProperties": {
      return new Set(axiom.properties);
    }
    case "inverseObjectProperties": {
      return new Set([axiom.first, axiom.second]);
    }
    case "objectPropertyDomain":
    case "objectPropertyRange": {
      return collect([axiom.property], axiom, usedObjectProperties);
    }
    case "functionalObjectProperty":
    case "inverseFunctionalObjectProperty":
    case "transitiveObjectProperty":
    case "symmetricObjectProperty":
    case "asymmetricObjectProperty":
    case "reflexiveObjectProperty":
    case "irreflexiveObjectProperty":
    case "objectPropertyAssertion":
    case "negativeObjectPropertyAssertion": {
      return new Set([axiom.property]);
    }
    case "declareObjectProperty": {
      return new Set([axiom.iri]);
    }
    case "subClassOf":
    case "equivalentClasses":
    case "disjointClasses":
    case "disjointUnion":
    case "dataPropertyDomain":
    case "classAssertion":
    case "subDataPropertyOf":
    case "equivalentDataProperties":
    case "disjointDataProperties":
    case "dataPropertyRange":
    case "functionalDataProperty":
    case "dataPropertyAssertion":
    case "negativeDataPropertyAssertion":
    case "sameIndividual":
    case "differentIndividuals":
    case "declareClass":
    case "declareDataProperty":
    case "declareNamedIndividual":
    case "declareDatatype":
    case "declareAnnotationProperty": {
      return collect([], axiom, usedObjectProperties);
    }
  }
}

export function referencedDataProperties(axiom: OWLAxiom): Set<string> {
  switch (axiom.kind) {
    case "subDataPropertyOf": {
      return new Set([axiom.sub, axiom.sup]);
    }
    case "equivalentDataProperties":
    case "disjointDataProperties": {
      return new Set(axiom.properties);
    }
    case "dataPropertyDomain": {
      return collect([axiom.property], axiom, usedDataProperties);
    }
    case "dataPropertyRange":
    case "functionalDataProperty":
    case "dataPropertyAssertion":
    case "negativeDataPropertyAssertion": {
      return new Set([axiom.property]);
    }
    case "declareDataProperty": {
      return new Set([axiom.iri]);
    }
    case "subClassOf":
    case "equivalentClasses":
    case "disjointClasses":
    case "disjointUnion":
    case "objectPropertyDomain":
    case "objectPropertyRange":
    case "classAssertion":
    case "subObjectPropertyOf":
    case "subPropertyChainOf":
    case "equivalentObjectProperties":
    case "disjointObjectProperties":
    case "inverseObjectProperties":
    case "functionalObjectProperty":
    case "inverseFunctionalObjectProperty":
    case "transitiveObjectProperty":
    case "symmetricObjectProperty":
    case "asymmetricObjectProperty":
    case "reflexiveObjectProperty":
    case "irreflexiveObjectProperty":
    case "objectPropertyAssertion":
    case "negativeObjectPropertyAssertion":
    case "sameIndividual":
    case "differentIndividuals":
    case "declareClass":
    case "declareObjectProperty":
    case "declareNamedIndividual":
    case "declareDatatype":
    case "declareAnnotationProperty": {
      return collect([], axiom, usedDataProperties);
    }
  }
}

export function referencedIndividuals(axiom: OWLAxiom): Set<string> {
  switch (axiom.kind) {
    case "classAssertion": {
      return collect([axiom.individual], axiom, usedIndividuals);
    }
    case "objectPropertyAssertion":
    case "negativeObjectPropertyAssertion": {
      return new Set([axiom.subject, axiom.object]);
    }
    case "dataPropertyAssertion":
    case "negativeDataPropertyAssertion": {
      return new Set([axiom.subject]);
    }
    case "sameIndividual":
    case "differentIndividuals": {
      return new Set(axiom.individuals);
    }
    case "declareNamedIndividual": {
      return new Set([axiom.iri]);
    }
    case "subClassOf":
    case "equivalentClasses":
    case "disjointClasses":
    case "disjointUnion":
    case "objectPropertyDomain":
    case "objectPropertyRange":
    case "dataPropertyDomain":
    case "subObjectPropertyOf":
    case "subPropertyChainOf":
    case "equivalentObjectProperties":
    case "disjointObjectProperties":
    case "inverseObjectProperties":
    case "functionalObjectProperty":
    case "inverseFunctionalObjectProperty":
    case "transitiveObjectProperty":
    case "symmetricObjectProperty":
    case "asymmetricObjectProperty":
    case "reflexiveObjectProperty":
    case "irreflexiveObjectProperty":
    case "subDataPropertyOf":
    case "equivalentDataProperties":
    case "disjointDataProperties":
    case "dataPropertyRange":
    case "functionalDataProperty":
    case "declareClass":
    case "declareObjectProperty":
    case "declareDataProperty":
    case "declareDatatype":
    case "declareAnnotationProperty": {
      return collect([], axiom, usedIndividuals);
    }
  }
}

// ============================================================
// Description
// ============================================================

const CHARACTERISTIC_AXIOM_NAME = {
  functionalObjectProperty: "FunctionalObjectProperty",
  inverseFunctionalObjectProperty: "InverseFunctionalObjectProperty",
  transitiveObjectProperty: "TransitiveObjectProperty",
  symmetricObjectProperty: "SymmetricObjectProperty",
  asymmetricObjectProperty: "AsymmetricObjectProperty",
  reflexiveObjectProperty: "ReflexiveObjectProperty",
  irreflexiveObjectProperty: "IrreflexiveObjectProperty",
} as const satisfies Record<CharacteristicAxiomKind, string>;

const DECLARATION_ENTITY = {
  declareClass: "Class",
  declareObjectProperty: "ObjectProperty",
  declareDataProperty: "DataProperty",
  declareNamedIndividual: "NamedIndividual",
  declareDatatype: "Datatype",
  declareAnnotationProperty: "AnnotationProperty",
} as const;

function expressions(list: readonly OWLClassExpression[]): string {
  return list.map(describeClassExpression).join(" ");
}

/**
 * OWL functional-syntax rendering, e.g. `SubClassOf(ex:A ex:B)`.
 */
export function describeAxiom(axiom: OWLAxiom): string {
  switch (axiom.kind) {
    case "subClassOf": {
      return `SubClassOf(${describeClassExpression(axiom.sub)} ${describeClassExpression(axiom.sup)})`;
    }
    case "equivalentClasses": {
      return `EquivalentClasses(${expressions(axiom.classes)})`;
    }
    case "disjointClasses": {
      return `DisjointClasses(${expressions(axiom.classes)})`;
    }
    case "disjointUnion": {
      return `DisjointUnion(${axiom.classIRI} ${expressions(axiom.disjuncts)})`;
    }
    case "subObjectPropertyOf": {
      return `SubObjectPropertyOf(${axiom.sub} ${axiom.sup})`;
    }
    case "subPropertyChainOf": {
      return `SubPropertyChainOf(${axiom.chain.join(" ∘ ")} ${axiom.sup})`;
    }
    case "equivalentObjectProperties": {
      return `EquivalentObjectProperties(${axiom.properties.join(" ")})`;
    }
    case "disjointObjectProperties": {
      return `DisjointObjectProperties(${axiom.properties.join(" ")})`;
    }
    case "inverseObjectProperties": {
      return `InverseObjectProperties(${axiom.first} ${axiom.second})`;
    }
    case "objectPropertyDomain": {
      return `ObjectPropertyDomain(${axiom.property} ${describeClassExpression(axiom.domain)})`;
    }
    case "objectPropertyRange": {
      return `ObjectPropertyRange(${axiom.property} ${describeClassExpression(axiom.range)})`;
    }
    case "functionalObjectProperty":
    case "inverseFunctionalObjectProperty":
    case "transitiveObjectProperty":
    case "symmetricObjectProperty":
    case "asymmetricObjectProperty":
    case "reflexiveObjectProperty":
    case "irreflexiveObjectProperty": {
      return `${CHARACTERISTIC_AXIOM_NAME[axiom.kind]}(${axiom.property})`;
    }
    case "subDataPropertyOf": {
      return `SubDataPropertyOf(${axiom.sub} ${axiom.sup})`;
    }
    case "equivalentDataProperties": {
      return `EquivalentDataProperties(${axiom.properties.join(" ")})`;
    }
    case "disjointDataProperties": {
      return `DisjointDataProperties(${axiom.properties.join(" ")})`;
    }
    case "dataPropertyDomain": {
      return `DataPropertyDomain(${axiom.property} ${describeClassExpression(axiom.domain)})`;
    }
    case "dataPropertyRange": {
      return `DataPropertyRange(${axiom.property} ${describeDataRange(axiom.range)})`;
    }
    case "functionalDataProperty": {
      return `FunctionalDataProperty(${axiom.property})`;
    }
    case "classAssertion": {
      return `ClassAssertion(${describeClassExpression(axiom.classExpression)} ${axiom.individual})`;
    }
    case "objectPropertyAssertion": {
      return `ObjectPropertyAssertion(${axiom.property} ${axiom.subject} ${axiom.object})`;
    }
    case "negativeObjectPropertyAssertion": {
      return `NegativeObjectPropertyAssertion(${axiom.property} ${axiom.subject} ${axiom.object})`;
    }
    case "dataPropertyAssertion": {
      return `DataPropertyAssertion(${axiom.property} ${axiom.subject} ${describeLiteral(axiom.value)})`;
    }
    case "negativeDataPropertyAssertion": {
      return `NegativeDataPropertyAssertion(${axiom.property} ${axiom.subject} ${describeLiteral(axiom.value)})`;
    }
    case "sameIndividual": {
      return `SameIndividual(${axiom.individuals.join(" ")})`;
    }
    case "differentIndividuals": {
      return `DifferentIndividuals(${axiom.individuals.join(" ")})`;
    }
    case "declareClass":
    case "declareObjectProperty":
    case "declareDataProperty":
    case "declareNamedIndividual":
    case "declareDatatype":
    case "declareAnnotationProperty": {
      return `Declaration(${DECLARATION_ENTITY[axiom.kind]}(${axiom.iri}))`;
    }
  }
}
