/**
 * Example 03: Class Expression Algebra
 *
 * Negation normal form, canonical cache keys and signature extraction.
 */
import {
  classExpressionKey,
  complementOf,
  describeClassExpression,
  exactCardinality,
  hasValue,
  intersectionOf,
  namedClass,
  someValuesFrom,
  toNNF,
  unionOf,
  usedClasses,
  usedObjectProperties,
} from "ontoloom";

export async function main(): Promise<void> {
  const parentOfStudent = intersectionOf([
    namedClass("ex:Person"),
    someValuesFrom("ex:hasChild", namedClass("ex:Student")),
  ]);

  console.log("=== Negation Normal Form ===\n");
  const negated = complementOf(parentOfStudent);
  console.log(`  ${describeClassExpression(negated)}`);
  console.log(`  ≡ ${describeClassExpression(toNNF(negated))}`);

  const twins = exactCardinality("ex:hasChild", 2);
  console.log(`  ${describeClassExpression(twins)} ≡ ${describeClassExpression(toNNF(twins))}`);

  const notAlice = complementOf(hasValue("ex:knows", "ex:alice"));
  console.log(`  ${describeClassExpression(notAlice)} ≡ ${describeClassExpression(toNNF(notAlice))}`);

  console.log("\n=== Canonical Keys ===\n");
  const a = unionOf([namedClass("ex:Student"), namedClass("ex:Teacher")]);
  const b = unionOf([namedClass("ex:Teacher"), namedClass("ex:Student")]);
  console.log(`  ${classExpressionKey(a)}`);
  console.log(`  same key: ${classExpressionKey(a) === classExpressionKey(b)}`);

  console.log("\n=== Signature ===\n");
  console.log(`  classes: ${[...usedClasses(parentOfStudent)].join(", ")}`);
  console.log(`  object properties: ${[...usedObjectProperties(parentOfStudent)].join(", ")}`);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
