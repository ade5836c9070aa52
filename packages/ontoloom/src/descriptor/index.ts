export {
  defineOntologyProperty,
  type DescribedProperties,
  descriptorsToProperties,
  isObjectPropertyDescriptor,
  type OntologyPropertyDescriptor,
} from "./property-descriptor";
