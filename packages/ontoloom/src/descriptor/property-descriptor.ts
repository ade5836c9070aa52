/**
 * Property descriptors: plain records describing how a field of an
 * application type maps to an OWL property. Code generators and
 * decorators produce them; this module only reads them.
 */
import { namedClass } from "../owl/class-expression";
import {
  createDataProperty,
  createObjectProperty,
  type OWLDataProperty,
  type OWLObjectProperty,
} from "../owl/property";

export type OntologyPropertyDescriptor = Readonly<{
  /** `{TypeName}_{fieldName}` */
  name: string;
  fieldName: string;
  iri: string;
  label?: string;
  /** Present for object properties; absent for data properties */
  targetTypeName?: string;
  /** Field on the target type holding the inverse reference */
  targetFieldName?: string;
}>;

export function defineOntologyProperty(
  descriptor: OntologyPropertyDescriptor,
): OntologyPropertyDescriptor {
  return Object.freeze({
    name: descriptor.name,
    fieldName: descriptor.fieldName,
    iri: descriptor.iri,
    ...(descriptor.label !== undefined && { label: descriptor.label }),
    ...(descriptor.targetTypeName !== undefined && {
      targetTypeName: descriptor.targetTypeName,
    }),
    ...(descriptor.targetFieldName !== undefined && {
      targetFieldName: descriptor.targetFieldName,
    }),
  });
}

export function isObjectPropertyDescriptor(
  descriptor: OntologyPropertyDescriptor,
): boolean {
  return descriptor.targetTypeName !== undefined;
}

export type DescribedProperties = Readonly<{
  objectProperties: OWLObjectProperty[];
  dataProperties: OWLDataProperty[];
}>;

/**
 * Converts descriptors of one owning class into property records whose
 * domain is that class. Object-property ranges come from
 * `resolveTypeIRI(targetTypeName)` and are left empty when it returns
 * `undefined`.
 *
 * @example
 * ```typescript
 * descriptorsToProperties("ex:Person", [
 *   defineOntologyProperty({ name: "Person_name", fieldName: "name", iri: "ex:name" }),
 *   defineOntologyProperty({
 *     name: "Person_employer",
 *     fieldName: "employer",
 *     iri: "ex:worksFor",
 *     targetTypeName: "Company",
 *   }),
 * ], (typeName) => `ex:${typeName}`);
 * ```
 */
export function descriptorsToProperties(
  ownerClassIRI: string,
  descriptors: readonly OntologyPropertyDescriptor[],
  resolveTypeIRI: (typeName: string) => string | undefined = () => undefined,
): DescribedProperties {
  const objectProperties: OWLObjectProperty[] = [];
  const dataProperties: OWLDataProperty[] = [];
  const domains = [namedClass(ownerClassIRI)];

  for (const descriptor of descriptors) {
    const annotations = {
      ...(descriptor.label !== undefined && { label: descriptor.label }),
    };
    if (descriptor.targetTypeName === undefined) {
      dataProperties.push(
        createDataProperty(descriptor.iri, { ...annotations, domains }),
      );
      continue;
    }
    const rangeIRI = resolveTypeIRI(descriptor.targetTypeName);
    objectProperties.push(
      createObjectProperty(descriptor.iri, {
        ...annotations,
        domains,
        ranges: rangeIRI === undefined ? [] : [namedClass(rangeIRI)],
      }),
    );
  }

  return { objectProperties, dataProperties };
}
