import { OWL } from "../vocabulary/namespaces";
import {
  describeClassExpression,
  type OWLClassExpression,
} from "./class-expression";
import { describeDataRange, type OWLDataRange } from "./data-range";
import {
  annotationFields,
  describeLabelled,
  type EntityAnnotations,
} from "./entity";

// ============================================================
// Characteristics
// ============================================================

export const PROPERTY_CHARACTERISTICS = [
  "functional",
  "inverseFunctional",
  "symmetric",
  "asymmetric",
  "transitive",
  "reflexive",
  "irreflexive",
] as const;

export type PropertyCharacteristic = (typeof PROPERTY_CHARACTERISTICS)[number];

/**
 * Full IRI of the `owl:*Property` class asserting each characteristic.
 */
export const CHARACTERISTIC_TYPE_IRI = {
  functional: OWL.FunctionalProperty,
  inverseFunctional: OWL.InverseFunctionalProperty,
  symmetric: OWL.SymmetricProperty,
  asymmetric: OWL.AsymmetricProperty,
  transitive: OWL.TransitiveProperty,
  reflexive: OWL.ReflexiveProperty,
  irreflexive: OWL.IrreflexiveProperty,
} as const satisfies Record<PropertyCharacteristic, string>;

export function characteristicForTypeIRI(
  iri: string,
): PropertyCharacteristic | undefined {
  return PROPERTY_CHARACTERISTICS.find(
    (characteristic) => CHARACTERISTIC_TYPE_IRI[characteristic] === iri,
  );
}

/**
 * Characteristics as a sorted list without duplicates, the stored form.
 */
export function normalizeCharacteristics(
  characteristics: Iterable<PropertyCharacteristic>,
): PropertyCharacteristic[] {
  return [...new Set(characteristics)].toSorted();
}

// ============================================================
// Object properties
// ============================================================

export type OWLObjectProperty = Readonly<{
  iri: string;
  label?: string;
  comment?: string;
  annotations: Readonly<Record<string, string>>;
  /** Sorted, unique */
  characteristics: readonly PropertyCharacteristic[];
  inverseOf?: string;
  domains: readonly OWLClassExpression[];
  ranges: readonly OWLClassExpression[];
  superProperties: readonly string[];
  equivalentProperties: readonly string[];
  disjointProperties: readonly string[];
  /** Each chain `[p, q]` means `p ∘ q ⊑ this` */
  propertyChains: readonly (readonly string[])[];
}>;

export type ObjectPropertyOptions = EntityAnnotations &
  Readonly<{
    characteristics?: Iterable<PropertyCharacteristic>;
    inverseOf?: string;
    domains?: readonly OWLClassExpression[];
    ranges?: readonly OWLClassExpression[];
    superProperties?: readonly string[];
    equivalentProperties?: readonly string[];
    disjointProperties?: readonly string[];
    propertyChains?: readonly (readonly string[])[];
  }>;

export function createObjectProperty(
  iri: string,
  options: ObjectPropertyOptions = {},
): OWLObjectProperty {
  return {
    iri,
    ...annotationFields(options),
    characteristics: normalizeCharacteristics(options.characteristics ?? []),
    ...(options.inverseOf !== undefined && { inverseOf: options.inverseOf }),
    domains: options.domains ?? [],
    ranges: options.ranges ?? [],
    superProperties: options.superProperties ?? [],
    equivalentProperties: options.equivalentProperties ?? [],
    disjointProperties: options.disjointProperties ?? [],
    propertyChains: options.propertyChains ?? [],
  };
}

export function hasCharacteristic(
  property: OWLObjectProperty,
  characteristic: PropertyCharacteristic,
): boolean {
  return property.characteristics.includes(characteristic);
}

/**
 * Transitive roles may not appear in cardinality restrictions, so only
 * non-transitive properties are candidates for simple roles.
 */
export function isPotentiallySimple(property: OWLObjectProperty): boolean {
  return !hasCharacteristic(property, "transitive");
}

const INCOMPATIBLE_CHARACTERISTICS: readonly (readonly [
  PropertyCharacteristic,
  PropertyCharacteristic,
])[] = [
  ["symmetric", "asymmetric"],
  ["reflexive", "irreflexive"],
];

/**
 * Pairs of characteristics on `property` that contradict each other.
 */
export function conflictingCharacteristics(
  property: OWLObjectProperty,
): (readonly [PropertyCharacteristic, PropertyCharacteristic])[] {
  return INCOMPATIBLE_CHARACTERISTICS.filter(
    ([a, b]) => hasCharacteristic(property, a) && hasCharacteristic(property, b),
  );
}

export function describeObjectProperty(property: OWLObjectProperty): string {
  const parts = [describeLabelled(property.iri, property.label)];
  if (property.characteristics.length > 0) {
    parts.push(`[${property.characteristics.join(", ")}]`);
  }
  if (property.inverseOf !== undefined) {
    parts.push(`inverse: ${property.inverseOf}`);
  }
  if (property.domains.length > 0) {
    parts.push(`domain: ${property.domains.map(describeClassExpression).join(", ")}`);
  }
  return parts.join(" ");
}

// ============================================================
// Data properties
// ============================================================

export type OWLDataProperty = Readonly<{
  iri: string;
  label?: string;
  comment?: string;
  annotations: Readonly<Record<string, string>>;
  domains: readonly OWLClassExpression[];
  ranges: readonly OWLDataRange[];
  isFunctional: boolean;
  superProperties: readonly string[];
  equivalentProperties: readonly string[];
  disjointProperties: readonly string[];
}>;

export type DataPropertyOptions = EntityAnnotations &
  Readonly<{
    domains?: readonly OWLClassExpression[];
    ranges?: readonly OWLDataRange[];
    isFunctional?: boolean;
    superProperties?: readonly string[];
    equivalentProperties?: readonly string[];
    disjointProperties?: readonly string[];
  }>;

export function createDataProperty(
  iri: string,
  options: DataPropertyOptions = {},
): OWLDataProperty {
  return {
    iri,
    ...annotationFields(options),
    domains: options.domains ?? [],
    ranges: options.ranges ?? [],
    isFunctional: options.isFunctional ?? false,
    superProperties: options.superProperties ?? [],
    equivalentProperties: options.equivalentProperties ?? [],
    disjointProperties: options.disjointProperties ?? [],
  };
}

export function describeDataProperty(property: OWLDataProperty): string {
  const parts = [describeLabelled(property.iri, property.label)];
  if (property.isFunctional) parts.push("[functional]");
  if (property.ranges.length > 0) {
    parts.push(`range: ${property.ranges.map(describeDataRange).join(", ")}`);
  }
  return parts.join(" ");
}

// ============================================================
// Annotation properties
// ============================================================

export type OWLAnnotationProperty = Readonly<{
  iri: string;
  label?: string;
  comment?: string;
  superProperties: readonly string[];
  domains: readonly string[];
  ranges: readonly string[];
}>;

export type AnnotationPropertyOptions = Readonly<{
  label?: string;
  comment?: string;
  superProperties?: readonly string[];
  domains?: readonly string[];
  ranges?: readonly string[];
}>;

export function createAnnotationProperty(
  iri: string,
  options: AnnotationPropertyOptions = {},
): OWLAnnotationProperty {
  return {
    iri,
    ...(options.label !== undefined && { label: options.label }),
    ...(options.comment !== undefined && { comment: options.comment }),
    superProperties: options.superProperties ?? [],
    domains: options.domains ?? [],
    ranges: options.ranges ?? [],
  };
}

export function describeAnnotationProperty(
  property: OWLAnnotationProperty,
): string {
  return describeLabelled(property.iri, property.label);
}
