/**
 * ontoloom: OWL DL ontologies as TypeScript values, with a Turtle codec.
 *
 * @example
 * ```typescript
 * import {
 *   buildOntology,
 *   decodeTurtle,
 *   encodeTurtle,
 *   minCardinality,
 *   namedClass,
 *   owl,
 *   subClassOf,
 * } from "ontoloom";
 *
 * const ontology = buildOntology(
 *   { iri: "http://example.org/family", prefixes: { ex: "http://example.org/family#" } },
 *   [
 *     owl.class("ex:Person", { label: "Person" }),
 *     owl.class("ex:Parent"),
 *     owl.objectProperty("ex:hasChild"),
 *     subClassOf(namedClass("ex:Parent"), minCardinality("ex:hasChild", 1)),
 *   ],
 * );
 *
 * const turtle = encodeTurtle(ontology);
 * decodeTurtle(turtle).axioms.length; // 1
 * ```
 */

// ============================================================
// Errors
// ============================================================

export {
  ConfigurationError,
  type ErrorCategory,
  getErrorSuggestion,
  InvalidIriError,
  isOntoloomError,
  isSystemError,
  isTurtleSyntaxError,
  isUserRecoverable,
  OntoloomError,
  type OntoloomErrorOptions,
  TransportError,
  TurtleSyntaxError,
  UndefinedPrefixError,
  UnexpectedCharacterError,
  UnexpectedEndOfInputError,
  UnexpectedTokenError,
  UnrecognizedNodeError,
  UnterminatedStringError,
  ValidationError,
  type ValidationErrorDetails,
  type ValidationIssue,
} from "./errors";

// ============================================================
// Utilities
// ============================================================

export {
  attempt,
  err,
  flatMap,
  isErr,
  isOk,
  map,
  mapErr,
  ok,
  orElse,
  type Result,
  unwrap,
  unwrapOr,
} from "./utils/result";

// ============================================================
// Vocabulary
// ============================================================

export {
  DEFAULT_PREFIXES,
  OWL,
  OWL_NAMESPACE,
  RDF,
  RDF_NAMESPACE,
  RDFS,
  RDFS_NAMESPACE,
  STANDARD_PREFIXES,
  XSD_NAMESPACE,
} from "./vocabulary/namespaces";
export { PrefixMap } from "./vocabulary/prefix-map";

// ============================================================
// OWL Model
// ============================================================

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
} from "./owl/xsd";
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
} from "./owl/literal";
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
} from "./owl/data-range";
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
} from "./owl/class-expression";
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
} from "./owl/entity";
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
} from "./owl/property";
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
} from "./owl/axiom";
export {
  type OntologyData,
  type OntologyInit,
  type OntologyStatistics,
  type OntologyValidationIssue,
  OWLOntology,
} from "./owl/ontology";
export {
  buildOntologyIndex,
  type DataAssertionEdge,
  type IncomingObjectAssertionEdge,
  type ObjectAssertionEdge,
  type ObjectAssertionTriple,
  OntologyIndex,
  type SubClassPair,
} from "./owl/ontology-index";
export {
  applyComponents,
  buildOntology,
  type ComponentInput,
  type OntologyComponent,
  type OntologyHeader,
  owl,
} from "./owl/builder";

// ============================================================
// RDF Terms
// ============================================================

export {
  blankNodeTerm,
  decodeRDFTerm,
  encodeRDFTerm,
  iriTerm,
  literalTerm,
  type RDFTerm,
  rdfTermFromLiteral,
  rdfTermToLiteral,
} from "./rdf/term";

// ============================================================
// Property Descriptors
// ============================================================

export {
  defineOntologyProperty,
  type DescribedProperties,
  descriptorsToProperties,
  isObjectPropertyDescriptor,
  type OntologyPropertyDescriptor,
} from "./descriptor";

// ============================================================
// Turtle
// ============================================================

export {
  type CodecHookContext,
  type CodecHooks,
  decodeTurtle,
  decodeTurtleDetailed,
  type DecodeOptions,
  type DecodeResult,
  type DecodeWarning,
  type EncodeOptions,
  encodeTurtle,
  tryDecodeTurtle,
} from "./turtle";

// ============================================================
// Transport
// ============================================================

export {
  FORMAT_VERSION,
  type OntologyEnvelope,
  ontologiesEqual,
  unwrapOntology,
  wrapOntology,
} from "./interchange";
