export {
  compactXSD,
  expandXSD,
  isDerivedFrom,
  isXSDDatatype,
  isXSDFacet,
  RDF_LANG_STRING,
  XSD,
  XSD_DATATYPES,
  XSD_FACETS,
  XSD_INTEGER_BOUNDS,
  type XSDDatatype,
  type XSDFacet,
} from "./xsd";
export {
  booleanLiteral,
  dateLiteral,
  dateTimeLiteral,
  decimalLiteral,
  describeLiteral,
  doubleLiteral,
  floatLiteral,
  integerLiteral,
  isNumericLiteral,
  isTemporalLiteral,
  langStringLiteral,
  literalBooleanValue,
  literalDateValue,
  literalIntValue,
  literalNumberValue,
  literalsEqual,
  literalStringValue,
  type OWLLiteral,
  stringLiteral,
  typedLiteral,
} from "./literal";
export {
  baseDatatype,
  dataComplementOf,
  dataIntersectionOf,
  dataOneOf,
  dataRangeCouldContain,
  type DataRangeKind,
  dataRanges,
  datatype,
  datatypeRestriction,
  dataUnionOf,
  describeDataRange,
  facet,
  type FacetRestriction,
  isSimpleDatatype,
  type OWLDataRange,
} from "./data-range";
export {
  allValuesFrom,
  canonicalize,
  CLASS_EXPRESSION_TAG,
  classExpressionKey,
  type ClassExpressionKind,
  classExpressionsEqual,
  complementOf,
  dataAllValuesFrom,
  dataExactCardinality,
  dataHasValue,
  dataMaxCardinality,
  dataMinCardinality,
  dataSomeValuesFrom,
  describeClassExpression,
  exactCardinality,
  hasCardinalityRestriction,
  hasSelf,
  hasValue,
  intersectionOf,
  isAtomicClassExpression,
  maxCardinality,
  minCardinality,
  namedClass,
  nothing,
  oneOf,
  type OWLClassExpression,
  someValuesFrom,
  thing,
  toNNF,
  unionOf,
  usedClasses,
  usedDataProperties,
  usedIndividuals,
  usedObjectProperties,
} from "./class-expression";
export {
  anonymousIndividual,
  createAnonymousIndividual,
  createClass,
  createNamedIndividual,
  describeClass,
  describeIndividual,
  type EntityAnnotations,
  individualIdentifier,
  namedIndividual,
  type OWLAnonymousIndividual,
  type OWLClass,
  type OWLIndividual,
  type OWLNamedIndividual,
} from "./entity";
export {
  type AnnotationPropertyOptions,
  CHARACTERISTIC_TYPE_IRI,
  characteristicForTypeIRI,
  conflictingCharacteristics,
  createAnnotationProperty,
  createDataProperty,
  createObjectProperty,
  type DataPropertyOptions,
  describeAnnotationProperty,
  describeDataProperty,
  describeObjectProperty,
  hasCharacteristic,
  isPotentiallySimple,
  normalizeCharacteristics,
  type ObjectPropertyOptions,
  type OWLAnnotationProperty,
  type OWLDataProperty,
  type OWLObjectProperty,
  PROPERTY_CHARACTERISTICS,
  type PropertyCharacteristic,
} from "./property";
export {
  type AxiomCategory,
  axiomCategory,
  axiomClassExpressions,
  type AxiomKind,
  type AxiomOf,
  CHARACTERISTIC_AXIOM_KIND,
  characteristicAxiom,
  type CharacteristicAxiomKind,
  classAssertion,
  dataPropertyAssertion,
  dataPropertyDomain,
  dataPropertyRange,
  declareAnnotationProperty,
  declareClass,
  declareDataProperty,
  declareDatatype,
  declareNamedIndividual,
  declareObjectProperty,
  describeAxiom,
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
  isABoxAxiom,
  isCharacteristicAxiom,
  isDeclarationAxiom,
  isRBoxAxiom,
  isTBoxAxiom,
  negativeDataPropertyAssertion,
  negativeObjectPropertyAssertion,
  objectPropertyAssertion,
  objectPropertyDomain,
  objectPropertyRange,
  type OWLAxiom,
  referencedClasses,
  referencedDataProperties,
  referencedIndividuals,
  referencedObjectProperties,
  sameIndividual,
  simpleDisjoint,
  simpleEquivalent,
  simpleSubClassOf,
  subClassOf,
  subDataPropertyOf,
  subObjectPropertyOf,
  subPropertyChainOf,
  typeAssertion,
} from "./axiom";
export {
  type OntologyData,
  type OntologyInit,
  type OntologyStatistics,
  type OntologyValidationIssue,
  OWLOntology,
} from "./ontology";
export {
  buildOntologyIndex,
  type DataAssertionEdge,
  type IncomingObjectAssertionEdge,
  type ObjectAssertionEdge,
  type ObjectAssertionTriple,
  OntologyIndex,
  type SubClassPair,
} from "./ontology-index";
export {
  applyComponents,
  buildOntology,
  type ComponentInput,
  type OntologyComponent,
  type OntologyHeader,
  owl,
} from "./builder";
