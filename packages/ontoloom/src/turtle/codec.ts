import { isOntoloomError, type OntoloomError } from "../errors";
import { validateWithSchema } from "../errors/validation";
import { type OWLOntology } from "../owl/ontology";
import { generateId } from "../utils/id";
import { attempt, type Result } from "../utils/result";
import { writeTurtle } from "./encoder";
import { buildOWLOntology } from "./owl-builder";
import { parseTurtle } from "./parser";
import {
  type CodecHookContext,
  type CodecHooks,
  type DecodeOptions,
  DecodeOptionsSchema,
  type DecodeResult,
  type EncodeOptions,
  EncodeOptionsSchema,
} from "./types";

// ============================================================
// Decoding
// ============================================================

/**
 * Decodes a Turtle document into an ontology, also returning the warnings
 * raised, the document's own prefixes and base, and its triple count.
 *
 * @throws ValidationError if `options` is malformed
 * @throws TurtleSyntaxError on the first lexical or grammatical error
 * @throws UnrecognizedNodeError in strict mode
 */
export function decodeTurtleDetailed(
  text: string,
  options: DecodeOptions = {},
): DecodeResult {
  const resolved = validateWithSchema(
    DecodeOptionsSchema,
    options,
    "DecodeOptions",
  );
  const hooks = resolved.hooks ?? {};
  const ctx = createHookContext();

  return withHooks(hooks, ctx, hooks.onDecodeStart, () => {
    const startTime = Date.now();
    const document = parseTurtle(text, {
      ...(resolved.baseIRI !== undefined && { baseIRI: resolved.baseIRI }),
      ...(resolved.prefixes !== undefined && { prefixes: resolved.prefixes }),
    });
    const { ontology, warnings } = buildOWLOntology(document, {
      strict: resolved.strict,
      onWarning: (warning) => hooks.onWarning?.(ctx, warning),
    });

    hooks.onDecodeEnd?.(ctx, {
      tripleCount: document.triples.length,
      axiomCount: ontology.axioms.length,
      durationMs: Date.now() - startTime,
    });

    return {
      ontology,
      warnings,
      prefixes: document.prefixes,
      ...(document.base !== undefined && { base: document.base }),
      tripleCount: document.triples.length,
    };
  });
}

/**
 * Decodes a Turtle document into an ontology.
 *
 * @example
 * ```typescript
 * const ontology = decodeTurtle(`
 *   @prefix owl: <http://www.w3.org/2002/07/owl#> .
 *   @prefix ex: <http://example.org/> .
 *   ex:Person a owl:Class .
 * `);
 * ontology.classes[0]?.iri; // "ex:Person"
 * ```
 */
export function decodeTurtle(
  text: string,
  options: DecodeOptions = {},
): OWLOntology {
  return decodeTurtleDetailed(text, options).ontology;
}

/**
 * Like {@link decodeTurtle}, but returns library errors as a failed result.
 * Anything else still throws.
 */
export function tryDecodeTurtle(
  text: string,
  options: DecodeOptions = {},
): Result<OWLOntology, OntoloomError> {
  return attempt(
    () => decodeTurtle(text, options),
    (error) => (isOntoloomError(error) ? error : undefined),
  );
}

// ============================================================
// Encoding
// ============================================================

/**
 * Encodes an ontology as Turtle.
 *
 * @throws ValidationError if `options` is malformed
 */
export function encodeTurtle(
  ontology: OWLOntology,
  options: EncodeOptions = {},
): string {
  const resolved = validateWithSchema(
    EncodeOptionsSchema,
    options,
    "EncodeOptions",
  );
  const hooks = resolved.hooks ?? {};
  const ctx = createHookContext();

  return withHooks(hooks, ctx, hooks.onEncodeStart, () => {
    const startTime = Date.now();
    const text = writeTurtle(ontology, {
      includeHeader: resolved.includeHeader,
      ...(resolved.prefixes !== undefined && { prefixes: resolved.prefixes }),
    });
    hooks.onEncodeEnd?.(ctx, {
      lineCount: text.split("\n").length,
      durationMs: Date.now() - startTime,
    });
    return text;
  });
}

// ============================================================
// Hooks
// ============================================================

function createHookContext(): CodecHookContext {
  return { operationId: generateId(), startedAt: new Date() };
}

function withHooks<T>(
  hooks: CodecHooks,
  ctx: CodecHookContext,
  onStart: ((ctx: CodecHookContext) => void) | undefined,
  fn: () => T,
): T {
  onStart?.(ctx);
  try {
    return fn();
  } catch (error) {
    hooks.onError?.(
      ctx,
      error instanceof Error ? error : new Error(String(error)),
    );
    throw error;
  }
}
