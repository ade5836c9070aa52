/**
 * W3C vocabulary constants used by the Turtle codec.
 *
 * Values are full IRIs; the decoder compares against these after prefix
 * expansion. The encoder writes the prefixed spelling (`owl:Class`) and
 * relies on the default prefix table to resolve it.
 */

// ============================================================
// Namespaces
// ============================================================

export const RDF_NAMESPACE = "http://www.w3.org/1999/02/22-rdf-syntax-ns#";
export const RDFS_NAMESPACE = "http://www.w3.org/2000/01/rdf-schema#";
export const OWL_NAMESPACE = "http://www.w3.org/2002/07/owl#";
export const XSD_NAMESPACE = "http://www.w3.org/2001/XMLSchema#";

/**
 * Prefix bindings every ontology starts with.
 */
export const DEFAULT_PREFIXES: Readonly<Record<string, string>> = {
  owl: OWL_NAMESPACE,
  rdf: RDF_NAMESPACE,
  rdfs: RDFS_NAMESPACE,
  xsd: XSD_NAMESPACE,
};

/**
 * Well-known prefixes beyond the four defaults.
 */
export const STANDARD_PREFIXES: Readonly<Record<string, string>> = {
  ...DEFAULT_PREFIXES,
  sh: "http://www.w3.org/ns/shacl#",
  skos: "http://www.w3.org/2004/02/skos/core#",
  dcterms: "http://purl.org/dc/terms/",
  foaf: "http://xmlns.com/foaf/0.1/",
  schema: "https://schema.org/",
};

// ============================================================
// RDF
// ============================================================

export const RDF = {
  type: `${RDF_NAMESPACE}type`,
  first: `${RDF_NAMESPACE}first`,
  rest: `${RDF_NAMESPACE}rest`,
  nil: `${RDF_NAMESPACE}nil`,
  langString: `${RDF_NAMESPACE}langString`,
} as const;

// ============================================================
// RDFS
// ============================================================

export const RDFS = {
  label: `${RDFS_NAMESPACE}label`,
  comment: `${RDFS_NAMESPACE}comment`,
  subClassOf: `${RDFS_NAMESPACE}subClassOf`,
  subPropertyOf: `${RDFS_NAMESPACE}subPropertyOf`,
  domain: `${RDFS_NAMESPACE}domain`,
  range: `${RDFS_NAMESPACE}range`,
  Datatype: `${RDFS_NAMESPACE}Datatype`,
  Literal: `${RDFS_NAMESPACE}Literal`,
} as const;

// ============================================================
// OWL
// ============================================================

export const OWL = {
  Ontology: `${OWL_NAMESPACE}Ontology`,
  versionIRI: `${OWL_NAMESPACE}versionIRI`,
  imports: `${OWL_NAMESPACE}imports`,

  Class: `${OWL_NAMESPACE}Class`,
  ObjectProperty: `${OWL_NAMESPACE}ObjectProperty`,
  DatatypeProperty: `${OWL_NAMESPACE}DatatypeProperty`,
  AnnotationProperty: `${OWL_NAMESPACE}AnnotationProperty`,
  NamedIndividual: `${OWL_NAMESPACE}NamedIndividual`,
  Thing: `${OWL_NAMESPACE}Thing`,
  Nothing: `${OWL_NAMESPACE}Nothing`,

  FunctionalProperty: `${OWL_NAMESPACE}FunctionalProperty`,
  InverseFunctionalProperty: `${OWL_NAMESPACE}InverseFunctionalProperty`,
  TransitiveProperty: `${OWL_NAMESPACE}TransitiveProperty`,
  SymmetricProperty: `${OWL_NAMESPACE}SymmetricProperty`,
  AsymmetricProperty: `${OWL_NAMESPACE}AsymmetricProperty`,
  ReflexiveProperty: `${OWL_NAMESPACE}ReflexiveProperty`,
  IrreflexiveProperty: `${OWL_NAMESPACE}IrreflexiveProperty`,

  equivalentClass: `${OWL_NAMESPACE}equivalentClass`,
  disjointWith: `${OWL_NAMESPACE}disjointWith`,
  disjointUnionOf: `${OWL_NAMESPACE}disjointUnionOf`,
  AllDisjointClasses: `${OWL_NAMESPACE}AllDisjointClasses`,
  members: `${OWL_NAMESPACE}members`,

  inverseOf: `${OWL_NAMESPACE}inverseOf`,
  equivalentProperty: `${OWL_NAMESPACE}equivalentProperty`,
  propertyDisjointWith: `${OWL_NAMESPACE}propertyDisjointWith`,
  propertyChainAxiom: `${OWL_NAMESPACE}propertyChainAxiom`,
  AllDisjointProperties: `${OWL_NAMESPACE}AllDisjointProperties`,

  sameAs: `${OWL_NAMESPACE}sameAs`,
  differentFrom: `${OWL_NAMESPACE}differentFrom`,
  AllDifferent: `${OWL_NAMESPACE}AllDifferent`,
  distinctMembers: `${OWL_NAMESPACE}distinctMembers`,
  NegativePropertyAssertion: `${OWL_NAMESPACE}NegativePropertyAssertion`,
  sourceIndividual: `${OWL_NAMESPACE}sourceIndividual`,
  assertionProperty: `${OWL_NAMESPACE}assertionProperty`,
  targetIndividual: `${OWL_NAMESPACE}targetIndividual`,
  targetValue: `${OWL_NAMESPACE}targetValue`,

  Restriction: `${OWL_NAMESPACE}Restriction`,
  onProperty: `${OWL_NAMESPACE}onProperty`,
  someValuesFrom: `${OWL_NAMESPACE}someValuesFrom`,
  allValuesFrom: `${OWL_NAMESPACE}allValuesFrom`,
  hasValue: `${OWL_NAMESPACE}hasValue`,
  hasSelf: `${OWL_NAMESPACE}hasSelf`,
  minCardinality: `${OWL_NAMESPACE}minCardinality`,
  maxCardinality: `${OWL_NAMESPACE}maxCardinality`,
  cardinality: `${OWL_NAMESPACE}cardinality`,
  minQualifiedCardinality: `${OWL_NAMESPACE}minQualifiedCardinality`,
  maxQualifiedCardinality: `${OWL_NAMESPACE}maxQualifiedCardinality`,
  qualifiedCardinality: `${OWL_NAMESPACE}qualifiedCardinality`,
  onClass: `${OWL_NAMESPACE}onClass`,
  onDataRange: `${OWL_NAMESPACE}onDataRange`,

  intersectionOf: `${OWL_NAMESPACE}intersectionOf`,
  unionOf: `${OWL_NAMESPACE}unionOf`,
  complementOf: `${OWL_NAMESPACE}complementOf`,
  oneOf: `${OWL_NAMESPACE}oneOf`,

  datatypeComplementOf: `${OWL_NAMESPACE}datatypeComplementOf`,
  onDatatype: `${OWL_NAMESPACE}onDatatype`,
  withRestrictions: `${OWL_NAMESPACE}withRestrictions`,
} as const;
