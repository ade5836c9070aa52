/**
 * Unit tests for class expression constructors and algebra.
 */
import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../src/errors";
import {
  allValuesFrom,
  canonicalize,
  classExpressionKey,
  classExpressionsEqual,
  complementOf,
  dataAllValuesFrom,
  dataComplementOf,
  dataExactCardinality,
  dataHasValue,
  dataOneOf,
  dataRanges,
  dataSomeValuesFrom,
  describeClassExpression,
  exactCardinality,
  hasCardinalityRestriction,
  hasSelf,
  hasValue,
  integerLiteral,
  intersectionOf,
  isAtomicClassExpression,
  maxCardinality,
  minCardinality,
  namedClass,
  nothing,
  oneOf,
  someValuesFrom,
  thing,
  toNNF,
  unionOf,
  usedClasses,
  usedDataProperties,
  usedIndividuals,
  usedObjectProperties,
} from "../src/owl";

const person = namedClass("ex:Person");
const student = namedClass("ex:Student");

describe("constructors", () => {
  it("omits an absent filler", () => {
    expect(minCardinality("ex:hasChild", 2)).toEqual({
      kind: "minCardinality",
      property: "ex:hasChild",
      cardinality: 2,
    });
    expect(maxCardinality("ex:hasChild", 1, person)).toEqual({
      kind: "maxCardinality",
      property: "ex:hasChild",
      cardinality: 1,
      filler: person,
    });
  });

  it("rejects negative or fractional cardinalities", () => {
    expect(() => minCardinality("ex:p", -1)).toThrow(ConfigurationError);
    expect(() => exactCardinality("ex:p", 1.5)).toThrow(
      "Cardinality must be a non-negative integer, got 1.5",
    );
  });
});

describe("toNNF", () => {
  it("applies De Morgan through quantifiers", () => {
    const expression = complementOf(
      intersectionOf([person, someValuesFrom("ex:hasChild", student)]),
    );
    expect(describeClassExpression(toNNF(expression))).toBe(
      "(¬ex:Person ⊔ ∀ex:hasChild.¬ex:Student)",
    );
  });

  it("removes double negation", () => {
    expect(toNNF(complementOf(complementOf(person)))).toEqual(person);
  });

  it("swaps top and bottom", () => {
    expect(toNNF(complementOf(thing()))).toEqual(nothing());
    expect(toNNF(complementOf(nothing()))).toEqual(thing());
  });

  it("expands exact cardinality", () => {
    expect(toNNF(exactCardinality("ex:p", 2, person))).toEqual(
      intersectionOf([minCardinality("ex:p", 2, person), maxCardinality("ex:p", 2, person)]),
    );
  });

  it("negates cardinalities", () => {
    expect(toNNF(complementOf(minCardinality("ex:p", 3)))).toEqual(
      maxCardinality("ex:p", 2),
    );
    expect(toNNF(complementOf(minCardinality("ex:p", 0)))).toEqual(
      maxCardinality("ex:p", 0),
    );
    expect(toNNF(complementOf(maxCardinality("ex:p", 1)))).toEqual(
      minCardinality("ex:p", 2),
    );
    expect(toNNF(complementOf(exactCardinality("ex:p", 0)))).toEqual(
      minCardinality("ex:p", 1),
    );
    expect(toNNF(complementOf(exactCardinality("ex:p", 2)))).toEqual(
      unionOf([maxCardinality("ex:p", 1), minCardinality("ex:p", 3)]),
    );
  });

  it("turns a negated hasValue into a universal over a negated nominal", () => {
    expect(toNNF(complementOf(hasValue("ex:knows", "ex:bob")))).toEqual(
      allValuesFrom("ex:knows", complementOf(oneOf(["ex:bob"]))),
    );
  });

  it("keeps complements on nominals and self restrictions", () => {
    expect(toNNF(complementOf(hasSelf("ex:likes")))).toEqual(
      complementOf(hasSelf("ex:likes")),
    );
    expect(toNNF(complementOf(oneOf(["ex:a"])))).toEqual(complementOf(oneOf(["ex:a"])));
  });

  it("negates data restrictions through data complements", () => {
    expect(toNNF(complementOf(dataSomeValuesFrom("ex:age", dataRanges.integer)))).toEqual(
      dataAllValuesFrom("ex:age", dataComplementOf(dataRanges.integer)),
    );
    expect(
      toNNF(
        complementOf(dataAllValuesFrom("ex:age", dataComplementOf(dataRanges.integer))),
      ),
    ).toEqual(dataSomeValuesFrom("ex:age", dataRanges.integer));
    expect(toNNF(complementOf(dataHasValue("ex:age", integerLiteral(3))))).toEqual(
      dataAllValuesFrom("ex:age", dataComplementOf(dataOneOf([integerLiteral(3)]))),
    );
  });

  it("is idempotent", () => {
    const expression = complementOf(
      unionOf([
        exactCardinality("ex:p", 1, complementOf(person)),
        dataExactCardinality("ex:age", 0),
        hasValue("ex:q", "ex:a"),
      ]),
    );
    const once = toNNF(expression);
    expect(toNNF(once)).toEqual(once);
  });
});

describe("canonicalize", () => {
  it("orders operands by variant, then rendering", () => {
    const expression = unionOf([someValuesFrom("ex:p", student), student, person, thing()]);
    expect(describeClassExpression(canonicalize(expression))).toBe(
      "(owl:Thing ⊔ ex:Person ⊔ ex:Student ⊔ ∃ex:p.ex:Student)",
    );
  });

  it("gives permuted expressions the same key", () => {
    const a = intersectionOf([person, unionOf([student, namedClass("ex:A")])]);
    const b = intersectionOf([unionOf([namedClass("ex:A"), student]), person]);
    expect(classExpressionKey(a)).toBe(classExpressionKey(b));
    expect(classExpressionsEqual(a, b)).toBe(false);
    expect(classExpressionsEqual(canonicalize(a), canonicalize(b))).toBe(true);
  });
});

describe("signature", () => {
  const expression = intersectionOf([
    person,
    someValuesFrom("ex:hasChild", unionOf([student, oneOf(["ex:ann"])])),
    hasValue("ex:knows", "ex:bob"),
    minCardinality("ex:owns", 1, namedClass("ex:Car")),
    dataSomeValuesFrom("ex:age", dataRanges.integer),
  ]);

  it("collects classes", () => {
    expect([...usedClasses(expression)].sort()).toEqual([
      "ex:Car",
      "ex:Person",
      "ex:Student",
    ]);
  });

  it("collects object and data properties", () => {
    expect([...usedObjectProperties(expression)].sort()).toEqual([
      "ex:hasChild",
      "ex:knows",
      "ex:owns",
    ]);
    expect([...usedDataProperties(expression)]).toEqual(["ex:age"]);
  });

  it("collects individuals", () => {
    expect([...usedIndividuals(expression)].sort()).toEqual(["ex:ann", "ex:bob"]);
  });

  it("detects cardinality restrictions", () => {
    expect(hasCardinalityRestriction(expression)).toBe(true);
    expect(hasCardinalityRestriction(person)).toBe(false);
  });
});

describe("describeClassExpression", () => {
  it("renders each form", () => {
    expect(describeClassExpression(oneOf(["ex:a", "ex:b"]))).toBe("{ex:a, ex:b}");
    expect(describeClassExpression(hasValue("ex:p", "ex:a"))).toBe("∃ex:p.{ex:a}");
    expect(describeClassExpression(hasSelf("ex:p"))).toBe("∃ex:p.Self");
    expect(describeClassExpression(minCardinality("ex:p", 2))).toBe("≥2 ex:p");
    expect(describeClassExpression(maxCardinality("ex:p", 2, person))).toBe(
      "≤2 ex:p.ex:Person",
    );
    expect(describeClassExpression(dataExactCardinality("ex:age", 1))).toBe("=1 ex:age");
    expect(describeClassExpression(dataHasValue("ex:age", integerLiteral(7)))).toBe(
      '∃ex:age.{"7"^^<xsd:integer>}',
    );
  });

  it("identifies atomic expressions", () => {
    expect(isAtomicClassExpression(person)).toBe(true);
    expect(isAtomicClassExpression(thing())).toBe(true);
    expect(isAtomicClassExpression(complementOf(person))).toBe(false);
  });
});
