/**
 * Writes an OWL ontology as Turtle.
 *
 * Layout:
 * - `@prefix` lines, sorted by prefix
 * - the `owl:Ontology` header block
 * - one block per named subject, grouped into sections (classes, object
 *   properties, data properties, annotation properties, individuals) and
 *   sorted by subject within each section
 * - standalone statements: anonymous class axioms, `AllDisjoint*`,
 *   `AllDifferent` and negative property assertions, in axiom order
 *
 * Output is deterministic for a given ontology.
 */
import { type OWLAxiom } from "../owl/axiom";
import { type OWLClassExpression } from "../owl/class-expression";
import { type OWLDataRange } from "../owl/data-range";
import { type OWLLiteral } from "../owl/literal";
import { type OWLOntology } from "../owl/ontology";
import {
  CHARACTERISTIC_TYPE_IRI,
  type PropertyCharacteristic,
} from "../owl/property";
import { compactXSD, expandXSD } from "../owl/xsd";
import { OWL, RDFS } from "../vocabulary/namespaces";
import { PrefixMap } from "../vocabulary/prefix-map";

export type TurtleWriterOptions = Readonly<{
  /** Bindings merged over the ontology's own prefixes */
  prefixes?: Readonly<Record<string, string>>;
  includeHeader?: boolean;
}>;

// ============================================================
// Layout
// ============================================================

const SECTION = {
  class: 1,
  objectProperty: 2,
  dataProperty: 3,
  annotationProperty: 4,
  individual: 6,
} as const;

type Section = (typeof SECTION)[keyof typeof SECTION];

type SubjectBlock = {
  subject: string;
  section: Section;
  types: string[];
  statements: [predicate: string, object: string][];
};

const CHARACTERISTIC_OF_AXIOM = {
  functionalObjectProperty: "functional",
  inverseFunctionalObjectProperty: "inverseFunctional",
  symmetricObjectProperty: "symmetric",
  asymmetricObjectProperty: "asymmetric",
  transitiveObjectProperty: "transitive",
  reflexiveObjectProperty: "reflexive",
  irreflexiveObjectProperty: "irreflexive",
} as const satisfies Partial<Record<OWLAxiom["kind"], PropertyCharacteristic>>;

const CARDINALITY_PREDICATE = {
  min: { plain: OWL.minCardinality, qualified: OWL.minQualifiedCardinality },
  max: { plain: OWL.maxCardinality, qualified: OWL.maxQualifiedCardinality },
  exact: { plain: OWL.cardinality, qualified: OWL.qualifiedCardinality },
} as const;

type CardinalityBound = keyof typeof CARDINALITY_PREDICATE;

// ============================================================
// Lexical rules
// ============================================================

const PREFIX_NAME = /^(?:\p{L}[\p{L}\p{N}_-]*)?$/u;
const LOCAL_NAME = /^(?:[\p{L}\p{N}_](?:[\p{L}\p{N}_.:-]*[\p{L}\p{N}_:-])?)?$/u;

const BARE_LITERAL: Readonly<Record<string, RegExp>> = {
  "xsd:integer": /^[+-]?\d+$/,
  "xsd:decimal": /^[+-]?\d*\.\d+$/,
  "xsd:double": /^[+-]?(?:\d+(?:\.\d+)?|\.\d+)[eE][+-]?\d+$/,
  "xsd:boolean": /^(?:true|false)$/,
};

export function escapeTurtleString(value: string): string {
  return value
    .replaceAll("\\", "\\\\")
    .replaceAll('"', '\\"')
    .replaceAll("\n", "\\n")
    .replaceAll("\r", "\\r")
    .replaceAll("\t", "\\t");
}

// ============================================================
// Writer
// ============================================================

/**
 * Serializes an ontology to Turtle text.
 */
export function writeTurtle(
  ontology: OWLOntology,
  options: TurtleWriterOptions = {},
): string {
  return new TurtleWriter(ontology, options).write();
}

class TurtleWriter {
  readonly #ontology: OWLOntology;
  readonly #prefixMap: PrefixMap;
  readonly #includeHeader: boolean;
  readonly #blocks = new Map<string, SubjectBlock>();
  readonly #standalone: string[] = [];

  constructor(ontology: OWLOntology, options: TurtleWriterOptions) {
    this.#ontology = ontology;
    this.#includeHeader = options.includeHeader ?? true;
    const bindings = Object.entries({
      ...ontology.prefixes,
      ...options.prefixes,
    }).filter(([, namespace]) => namespace.length > 0);
    this.#prefixMap = new PrefixMap(Object.fromEntries(bindings));
  }

  write(): string {
    const lines: string[] = [];

    for (const prefix of this.#prefixMap.prefixes()) {
      lines.push(`@prefix ${prefix}: <${this.#prefixMap.namespace(prefix) ?? ""}> .`);
    }

    if (this.#includeHeader && this.#ontology.iri.length > 0) {
      lines.push("", this.#header());
    }

    this.#collectEntities();
    for (const axiom of this.#ontology.axioms) {
      this.#distribute(axiom);
    }

    const sorted = [...this.#blocks.values()].toSorted((a, b) =>
      a.section === b.section ?
        compareStrings(a.subject, b.subject)
      : a.section - b.section,
    );
    let section: Section | undefined;
    for (const block of sorted) {
      if (block.section !== section) {
        lines.push("");
        section = block.section;
      }
      const rendered = this.#renderBlock(block);
      if (rendered !== undefined) lines.push(rendered);
    }

    if (this.#standalone.length > 0) {
      lines.push("", ...this.#standalone);
    }

    lines.push("");
    return lines.join("\n");
  }

  // === Header ===

  #header(): string {
    const ontology = this.#ontology;
    const parts = [`${this.#iri(ontology.iri)} a ${this.#iri(OWL.Ontology)}`];
    if (ontology.versionIRI !== undefined) {
      parts.push(`    ${this.#iri(OWL.versionIRI)} ${this.#iri(ontology.versionIRI)}`);
    }
    for (const imported of ontology.imports) {
      parts.push(`    ${this.#iri(OWL.imports)} ${this.#iri(imported)}`);
    }
    return `${parts.join(" ;\n")} .`;
  }

  // === Entities ===

  #collectEntities(): void {
    const ontology = this.#ontology;

    for (const owlClass of ontology.classes) {
      const block = this.#block(owlClass.iri, SECTION.class);
      this.#addType(block, OWL.Class);
      this.#addAnnotations(block, owlClass);
    }

    for (const property of ontology.objectProperties) {
      const block = this.#block(property.iri, SECTION.objectProperty);
      this.#addType(block, OWL.ObjectProperty);
      for (const characteristic of property.characteristics) {
        this.#addType(block, CHARACTERISTIC_TYPE_IRI[characteristic]);
      }
      this.#addAnnotations(block, property);
      if (property.inverseOf !== undefined) {
        this.#add(block, OWL.inverseOf, this.#iri(property.inverseOf));
      }
      for (const domain of property.domains) {
        this.#add(block, RDFS.domain, this.#classExpression(domain));
      }
      for (const range of property.ranges) {
        this.#add(block, RDFS.range, this.#classExpression(range));
      }
      this.#addPropertyRelations(block, property);
      for (const chain of property.propertyChains) {
        this.#add(block, OWL.propertyChainAxiom, this.#iriList(chain));
      }
    }

    for (const property of ontology.dataProperties) {
      const block = this.#block(property.iri, SECTION.dataProperty);
      this.#addType(block, OWL.DatatypeProperty);
      if (property.isFunctional) this.#addType(block, OWL.FunctionalProperty);
      this.#addAnnotations(block, property);
      for (const domain of property.domains) {
        this.#add(block, RDFS.domain, this.#classExpression(domain));
      }
      for (const range of property.ranges) {
        this.#add(block, RDFS.range, this.#dataRange(range));
      }
      this.#addPropertyRelations(block, property);
    }

    for (const property of ontology.annotationProperties) {
      const block = this.#block(property.iri, SECTION.annotationProperty);
      this.#addType(block, OWL.AnnotationProperty);
      this.#addAnnotations(block, property);
      for (const sup of property.superProperties) {
        this.#add(block, RDFS.subPropertyOf, this.#iri(sup));
      }
      for (const domain of property.domains) {
        this.#add(block, RDFS.domain, this.#iri(domain));
      }
      for (const range of property.ranges) {
        this.#add(block, RDFS.range, this.#iri(range));
      }
    }

    for (const individual of ontology.individuals) {
      const block = this.#block(individual.iri, SECTION.individual);
      this.#addType(block, OWL.NamedIndividual);
      this.#addAnnotations(block, individual);
    }
  }

  #addAnnotations(
    block: SubjectBlock,
    entity: Readonly<{
      label?: string;
      comment?: string;
      annotations?: Readonly<Record<string, string>>;
    }>,
  ): void {
    if (entity.label !== undefined) {
      this.#add(block, RDFS.label, quote(entity.label));
    }
    if (entity.comment !== undefined) {
      this.#add(block, RDFS.comment, quote(entity.comment));
    }
    for (const [property, value] of Object.entries(entity.annotations ?? {})) {
      this.#add(block, property, quote(value));
    }
  }

  #addPropertyRelations(
    block: SubjectBlock,
    property: Readonly<{
      superProperties: readonly string[];
      equivalentProperties: readonly string[];
      disjointProperties: readonly string[];
    }>,
  ): void {
    for (const sup of property.superProperties) {
      this.#add(block, RDFS.subPropertyOf, this.#iri(sup));
    }
    for (const equivalent of property.equivalentProperties) {
      this.#add(block, OWL.equivalentProperty, this.#iri(equivalent));
    }
    for (const disjoint of property.disjointProperties) {
      this.#add(block, OWL.propertyDisjointWith, this.#iri(disjoint));
    }
  }

  // === Axioms ===

  #distribute(axiom: OWLAxiom): void {
    switch (axiom.kind) {
      // TBox
      case "subClassOf": {
        if (axiom.sub.kind === "named") {
          const block = this.#block(axiom.sub.iri, SECTION.class);
          this.#add(block, RDFS.subClassOf, this.#classExpression(axiom.sup));
        } else {
          this.#standalone.push(
            `${this.#classExpression(axiom.sub)} ${this.#iri(RDFS.subClassOf)} ${this.#classExpression(axiom.sup)} .`,
          );
        }
        return;
      }
      case "equivalentClasses": {
        const anchor = axiom.classes.find((expression) => expression.kind === "named");
        const rest = axiom.classes.filter((expression) => expression !== anchor);
        if (anchor?.kind === "named") {
          const block = this.#block(anchor.iri, SECTION.class);
          for (const expression of rest) {
            this.#add(block, OWL.equivalentClass, this.#classExpression(expression));
          }
          return;
        }
        const [first, ...others] = axiom.classes;
        if (first === undefined || others.length === 0) return;
        const objects = others.map((expression) => this.#classExpression(expression));
        this.#standalone.push(
          `${this.#classExpression(first)} ${this.#iri(OWL.equivalentClass)} ${objects.join(" , ")} .`,
        );
        return;
      }
      case "disjointClasses": {
        this.#pushGroup(
          OWL.AllDisjointClasses,
          OWL.members,
          axiom.classes.map((expression) => this.#classExpression(expression)),
        );
        return;
      }
      case "disjointUnion": {
        const block = this.#block(axiom.classIRI, SECTION.class);
        this.#add(
          block,
          OWL.disjointUnionOf,
          list(axiom.disjuncts.map((expression) => this.#classExpression(expression))),
        );
        return;
      }

      // RBox (object properties)
      case "subObjectPropertyOf": {
        const block = this.#block(axiom.sub, SECTION.objectProperty);
        this.#add(block, RDFS.subPropertyOf, this.#iri(axiom.sup));
        return;
      }
      case "subPropertyChainOf": {
        const block = this.#block(axiom.sup, SECTION.objectProperty);
        this.#add(block, OWL.propertyChainAxiom, this.#iriList(axiom.chain));
        return;
      }
      case "equivalentObjectProperties": {
        this.#addEquivalentProperties(axiom.properties, SECTION.objectProperty);
        return;
      }
      case "disjointObjectProperties":
      case "disjointDataProperties": {
        this.#pushGroup(
          OWL.AllDisjointProperties,
          OWL.members,
          axiom.properties.map((property) => this.#iri(property)),
        );
        return;
      }
      case "inverseObjectProperties": {
        const block = this.#block(axiom.first, SECTION.objectProperty);
        this.#add(block, OWL.inverseOf, this.#iri(axiom.second));
        return;
      }
      case "objectPropertyDomain": {
        const block = this.#block(axiom.property, SECTION.objectProperty);
        this.#add(block, RDFS.domain, this.#classExpression(axiom.domain));
        return;
      }
      case "objectPropertyRange": {
        const block = this.#block(axiom.property, SECTION.objectProperty);
        this.#add(block, RDFS.range, this.#classExpression(axiom.range));
        return;
      }
      case "functionalObjectProperty":
      case "inverseFunctionalObjectProperty":
      case "symmetricObjectProperty":
      case "asymmetricObjectProperty":
      case "transitiveObjectProperty":
      case "reflexiveObjectProperty":
      case "irreflexiveObjectProperty": {
        const block = this.#block(axiom.property, SECTION.objectProperty);
        const characteristic = CHARACTERISTIC_OF_AXIOM[axiom.kind];
        this.#addType(block, CHARACTERISTIC_TYPE_IRI[characteristic]);
        return;
      }

      // RBox (data properties)
      case "subDataPropertyOf": {
        const block = this.#block(axiom.sub, SECTION.dataProperty);
        this.#add(block, RDFS.subPropertyOf, this.#iri(axiom.sup));
        return;
      }
      case "equivalentDataProperties": {
        this.#addEquivalentProperties(axiom.properties, SECTION.dataProperty);
        return;
      }
      case "dataPropertyDomain": {
        const block = this.#block(axiom.property, SECTION.dataProperty);
        this.#add(block, RDFS.domain, this.#classExpression(axiom.domain));
        return;
      }
      case "dataPropertyRange": {
        const block = this.#block(axiom.property, SECTION.dataProperty);
        this.#add(block, RDFS.range, this.#dataRange(axiom.range));
        return;
      }
      case "functionalDataProperty": {
        const block = this.#block(axiom.property, SECTION.dataProperty);
        this.#addType(block, OWL.FunctionalProperty);
        return;
      }

      // ABox
      case "classAssertion": {
        const block = this.#block(axiom.individual, SECTION.individual);
        addUnique(block.types, this.#classExpression(axiom.classExpression));
        return;
      }
      case "objectPropertyAssertion": {
        const block = this.#block(axiom.subject, SECTION.individual);
        this.#add(block, axiom.property, this.#iri(axiom.object));
        return;
      }
      case "dataPropertyAssertion": {
        const block = this.#block(axiom.subject, SECTION.individual);
        this.#add(block, axiom.property, this.#literal(axiom.value));
        return;
      }
      case "negativeObjectPropertyAssertion": {
        this.#pushNegativeAssertion(
          axiom.subject,
          axiom.property,
          OWL.targetIndividual,
          this.#iri(axiom.object),
        );
        return;
      }
      case "negativeDataPropertyAssertion": {
        this.#pushNegativeAssertion(
          axiom.subject,
          axiom.property,
          OWL.targetValue,
          this.#literal(axiom.value),
        );
        return;
      }
      case "sameIndividual": {
        const [first, ...others] = axiom.individuals;
        if (first === undefined) return;
        const block = this.#block(first, SECTION.individual);
        for (const other of others) {
          this.#add(block, OWL.sameAs, this.#iri(other));
        }
        return;
      }
      case "differentIndividuals": {
        this.#pushGroup(
          OWL.AllDifferent,
          OWL.distinctMembers,
          axiom.individuals.map((individual) => this.#iri(individual)),
        );
        return;
      }

      // Declarations
      case "declareClass": {
        this.#addType(this.#block(axiom.iri, SECTION.class), OWL.Class);
        return;
      }
      case "declareObjectProperty": {
        this.#addType(
          this.#block(axiom.iri, SECTION.objectProperty),
          OWL.ObjectProperty,
        );
        return;
      }
      case "declareDataProperty": {
        this.#addType(
          this.#block(axiom.iri, SECTION.dataProperty),
          OWL.DatatypeProperty,
        );
        return;
      }
      case "declareNamedIndividual": {
        this.#addType(
          this.#block(axiom.iri, SECTION.individual),
          OWL.NamedIndividual,
        );
        return;
      }
      case "declareDatatype": {
        this.#addType(this.#block(axiom.iri, SECTION.class), RDFS.Datatype);
        return;
      }
      case "declareAnnotationProperty": {
        this.#addType(
          this.#block(axiom.iri, SECTION.annotationProperty),
          OWL.AnnotationProperty,
        );
        return;
      }
      default: {
        const _exhaustive: never = axiom;
        throw new Error(`Unsupported axiom: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  #addEquivalentProperties(properties: readonly string[], section: Section): void {
    const [first, ...others] = properties;
    if (first === undefined) return;
    const block = this.#block(first, section);
    for (const other of others) {
      this.#add(block, OWL.equivalentProperty, this.#iri(other));
    }
  }

  #pushGroup(type: string, predicate: string, members: readonly string[]): void {
    this.#standalone.push(
      `[] a ${this.#iri(type)} ;\n    ${this.#iri(predicate)} ${list(members)} .`,
    );
  }

  #pushNegativeAssertion(
    source: string,
    property: string,
    targetPredicate: string,
    target: string,
  ): void {
    const parts = [
      `a ${this.#iri(OWL.NegativePropertyAssertion)}`,
      `${this.#iri(OWL.sourceIndividual)} ${this.#iri(source)}`,
      `${this.#iri(OWL.assertionProperty)} ${this.#iri(property)}`,
      `${this.#iri(targetPredicate)} ${target}`,
    ];
    this.#standalone.push(`[ ${parts.join(" ; ")} ] .`);
  }

  // === Blocks ===

  #block(subject: string, section: Section): SubjectBlock {
    const existing = this.#blocks.get(subject);
    if (existing !== undefined) return existing;
    const block: SubjectBlock = { subject, section, types: [], statements: [] };
    this.#blocks.set(subject, block);
    return block;
  }

  #addType(block: SubjectBlock, typeIRI: string): void {
    addUnique(block.types, this.#iri(typeIRI));
  }

  /**
   * Appends a statement unless the block already carries the same
   * predicate and object.
   */
  #add(block: SubjectBlock, predicateIRI: string, object: string): void {
    const predicate = this.#iri(predicateIRI);
    const duplicate = block.statements.some(
      ([p, o]) => p === predicate && o === object,
    );
    if (!duplicate) block.statements.push([predicate, object]);
  }

  #renderBlock(block: SubjectBlock): string | undefined {
    const subject = this.#iri(block.subject);
    const parts: string[] = [];
    if (block.types.length > 0) {
      parts.push(`${subject} a ${block.types.join(" , ")}`);
    }
    for (const [predicate, objects] of groupByPredicate(block.statements)) {
      const clause = `${predicate} ${objects.join(" , ")}`;
      parts.push(parts.length === 0 ? `${subject} ${clause}` : `    ${clause}`);
    }
    return parts.length === 0 ? undefined : `${parts.join(" ;\n")} .`;
  }

  // === Terms ===

  /**
   * Formats an IRI given in full or prefixed form.
   *
   * Prefixed names with a bound prefix and a legal local part are written
   * as-is; full IRIs are compacted when the result is a legal prefixed
   * name. Anything else is written in angle brackets.
   */
  #iri(iri: string): string {
    if (iri.includes("://")) {
      const compacted = this.#prefixMap.compact(iri);
      return compacted !== iri && isPrefixedName(compacted) ? compacted : `<${iri}>`;
    }
    const colon = iri.indexOf(":");
    if (colon === -1) return `<${iri}>`;
    const namespace = this.#prefixMap.namespace(iri.slice(0, colon));
    if (namespace === undefined) return `<${iri}>`;
    return isPrefixedName(iri) ? iri : `<${namespace}${iri.slice(colon + 1)}>`;
  }

  #iriList(iris: readonly string[]): string {
    return list(iris.map((iri) => this.#iri(iri)));
  }

  #literal(literal: OWLLiteral): string {
    const escaped = quote(literal.lexicalForm);
    if (literal.language !== undefined) return `${escaped}@${literal.language}`;
    const datatype = compactXSD(literal.datatype);
    if (datatype === "xsd:string") return escaped;
    if (BARE_LITERAL[datatype]?.test(literal.lexicalForm)) {
      return literal.lexicalForm;
    }
    return `${escaped}^^${this.#iri(expandXSD(datatype))}`;
  }

  #classExpression(expression: OWLClassExpression): string {
    switch (expression.kind) {
      case "named": {
        return this.#iri(expression.iri);
      }
      case "thing": {
        return this.#iri(OWL.Thing);
      }
      case "nothing": {
        return this.#iri(OWL.Nothing);
      }
      case "intersectionOf": {
        return this.#anonymous([
          [OWL.intersectionOf, this.#classList(expression.operands)],
        ]);
      }
      case "unionOf": {
        return this.#anonymous([
          [OWL.unionOf, this.#classList(expression.operands)],
        ]);
      }
      case "complementOf": {
        return this.#anonymous([
          [OWL.complementOf, this.#classExpression(expression.operand)],
        ]);
      }
      case "oneOf": {
        return this.#anonymous([[OWL.oneOf, this.#iriList(expression.individuals)]]);
      }
      case "someValuesFrom": {
        return this.#restriction(expression.property, [
          [OWL.someValuesFrom, this.#classExpression(expression.filler)],
        ]);
      }
      case "allValuesFrom": {
        return this.#restriction(expression.property, [
          [OWL.allValuesFrom, this.#classExpression(expression.filler)],
        ]);
      }
      case "hasValue": {
        return this.#restriction(expression.property, [
          [OWL.hasValue, this.#iri(expression.individual)],
        ]);
      }
      case "hasSelf": {
        return this.#restriction(expression.property, [[OWL.hasSelf, "true"]]);
      }
      case "minCardinality":
      case "maxCardinality":
      case "exactCardinality": {
        const filler =
          expression.filler === undefined ?
            undefined
          : this.#classExpression(expression.filler);
        return this.#cardinality(
          expression.property,
          expression.cardinality,
          boundOf(expression.kind),
          filler === undefined ? undefined : [OWL.onClass, filler],
        );
      }
      case "dataSomeValuesFrom": {
        return this.#restriction(expression.property, [
          [OWL.someValuesFrom, this.#dataRange(expression.range)],
        ]);
      }
      case "dataAllValuesFrom": {
        return this.#restriction(expression.property, [
          [OWL.allValuesFrom, this.#dataRange(expression.range)],
        ]);
      }
      case "dataHasValue": {
        return this.#restriction(expression.property, [
          [OWL.hasValue, this.#literal(expression.literal)],
        ]);
      }
      case "dataMinCardinality":
      case "dataMaxCardinality":
      case "dataExactCardinality": {
        const range =
          expression.range === undefined ?
            undefined
          : this.#dataRange(expression.range);
        return this.#cardinality(
          expression.property,
          expression.cardinality,
          boundOf(expression.kind),
          range === undefined ? undefined : [OWL.onDataRange, range],
        );
      }
    }
  }

  #classList(expressions: readonly OWLClassExpression[]): string {
    return list(expressions.map((expression) => this.#classExpression(expression)));
  }

  #cardinality(
    property: string,
    n: number,
    bound: CardinalityBound,
    qualifier: [predicate: string, object: string] | undefined,
  ): string {
    const predicates = CARDINALITY_PREDICATE[bound];
    return qualifier === undefined ?
        this.#restriction(property, [[predicates.plain, String(n)]])
      : this.#restriction(property, [
          [predicates.qualified, String(n)],
          qualifier,
        ]);
  }

  #restriction(
    property: string,
    statements: readonly [predicate: string, object: string][],
  ): string {
    return this.#anonymous(
      [[OWL.onProperty, this.#iri(property)], ...statements],
      OWL.Restriction,
    );
  }

  #anonymous(
    statements: readonly [predicate: string, object: string][],
    type?: string,
  ): string {
    const parts = statements.map(
      ([predicate, object]) => `${this.#iri(predicate)} ${object}`,
    );
    if (type !== undefined) parts.unshift(`a ${this.#iri(type)}`);
    return `[ ${parts.join(" ; ")} ]`;
  }

  #dataRange(range: OWLDataRange): string {
    switch (range.kind) {
      case "datatype": {
        return this.#iri(expandXSD(range.iri));
      }
      case "dataIntersectionOf": {
        return this.#anonymous([
          [OWL.intersectionOf, list(range.ranges.map((r) => this.#dataRange(r)))],
        ]);
      }
      case "dataUnionOf": {
        return this.#anonymous([
          [OWL.unionOf, list(range.ranges.map((r) => this.#dataRange(r)))],
        ]);
      }
      case "dataComplementOf": {
        return this.#anonymous([
          [OWL.datatypeComplementOf, this.#dataRange(range.range)],
        ]);
      }
      case "dataOneOf": {
        return this.#anonymous([
          [OWL.oneOf, list(range.literals.map((literal) => this.#literal(literal)))],
        ]);
      }
      case "datatypeRestriction": {
        const facets = range.facets.map(
          ({ facet, value }) =>
            `[ ${this.#iri(expandXSD(facet))} ${this.#literal(value)} ]`,
        );
        return this.#anonymous(
          [
            [OWL.onDatatype, this.#iri(expandXSD(range.datatype))],
            [OWL.withRestrictions, list(facets)],
          ],
          RDFS.Datatype,
        );
      }
    }
  }
}

// ============================================================
// Helpers
// ============================================================

function quote(value: string): string {
  return `"${escapeTurtleString(value)}"`;
}

function list(items: readonly string[]): string {
  return items.length === 0 ? "()" : `( ${items.join(" ")} )`;
}

function addUnique(values: string[], value: string): void {
  if (!values.includes(value)) values.push(value);
}

function isPrefixedName(value: string): boolean {
  const colon = value.indexOf(":");
  if (colon === -1) return false;
  return (
    PREFIX_NAME.test(value.slice(0, colon)) &&
    LOCAL_NAME.test(value.slice(colon + 1))
  );
}

function boundOf(kind: string): CardinalityBound {
  if (kind.toLowerCase().includes("min")) return "min";
  if (kind.toLowerCase().includes("max")) return "max";
  return "exact";
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function groupByPredicate(
  statements: readonly [predicate: string, object: string][],
): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const [predicate, object] of statements) {
    const objects = groups.get(predicate);
    if (objects === undefined) {
      groups.set(predicate, [object]);
    } else {
      objects.push(object);
    }
  }
  return groups;
}
