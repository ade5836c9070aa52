/**
 * Example 02: Decoding Turtle
 *
 * Reads a Turtle document, reports lenient-mode warnings through hooks
 * and shows how syntax errors surface.
 */
import {
  type CodecHooks,
  decodeTurtleDetailed,
  describeClassExpression,
  tryDecodeTurtle,
} from "ontoloom";

const DOCUMENT = `
@prefix owl: <http://www.w3.org/2002/07/owl#> .
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .
@prefix xsd: <http://www.w3.org/2001/XMLSchema#> .
@prefix ex: <http://example.org/uni#> .

<http://example.org/uni> a owl:Ontology .

ex:Person a owl:Class .
ex:Student a owl:Class ;
    rdfs:subClassOf ex:Person ,
        [ a owl:Restriction ; owl:onProperty ex:enrolledIn ; owl:someValuesFrom ex:Course ] .
ex:Course a owl:Class ;
    rdfs:subClassOf [ ex:madeUp "node" ] .

ex:enrolledIn a owl:ObjectProperty ;
    rdfs:domain ex:Student .

ex:dana a owl:NamedIndividual , ex:Student ;
    ex:enrolledIn ex:algebra .
`;

export async function main(): Promise<void> {
  const hooks: CodecHooks = {
    onDecodeEnd: (ctx, result) => {
      console.log(
        `[${ctx.operationId}] ${result.tripleCount} triples, ${result.axiomCount} axioms`,
      );
    },
    onWarning: (ctx, warning) => {
      console.log(`[${ctx.operationId}] warning ${warning.code}: ${warning.message}`);
    },
  };

  console.log("=== Lenient Decoding ===\n");
  const { ontology, warnings } = decodeTurtleDetailed(DOCUMENT, { hooks });
  console.log(`Ontology: ${ontology.iri}`);
  console.log(`Warnings: ${warnings.length}`);
  for (const sup of ontology.superClasses("ex:Student")) {
    console.log(`  ex:Student ⊑ ${describeClassExpression(sup)}`);
  }

  console.log("\n=== Strict Decoding ===\n");
  const strict = tryDecodeTurtle(DOCUMENT, { strict: true });
  console.log(strict.success ? "decoded" : `failed: ${strict.error.message}`);

  console.log("\n=== Syntax Errors ===\n");
  const broken = tryDecodeTurtle("@prefix ex: <http://example.org/> .\nex:a ex:b .");
  if (!broken.success) {
    console.log(`${broken.error.code}: ${broken.error.message}`);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
