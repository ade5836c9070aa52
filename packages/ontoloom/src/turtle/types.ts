import { z } from "zod";

import { type OWLOntology } from "../owl/ontology";
import { type RDFTerm } from "../rdf/term";

// ============================================================
// Tokens
// ============================================================

export type TokenKind =
  | "prefixDirective" // @prefix
  | "baseDirective" // @base
  | "sparqlPrefix" // PREFIX
  | "sparqlBase" // BASE
  | "iri" // <...>, value without brackets
  | "prefixedName" // ex:Person, ex:
  | "blankNode" // _:b0, value without "_:"
  | "string" // value unescaped
  | "integer"
  | "decimal"
  | "double"
  | "boolean"
  | "a"
  | "punctuation" // . ; , [ ] ( )
  | "datatypeMarker" // ^^
  | "languageTag" // value without "@"
  | "eof";

export type Token = Readonly<{
  kind: TokenKind;
  value: string;
  /** 1-based line the token starts on */
  line: number;
}>;

// ============================================================
// Triples
// ============================================================

export type SubjectTerm = Extract<RDFTerm, { kind: "iri" | "blankNode" }>;

/**
 * A parsed triple. IRIs and literal datatypes are fully expanded.
 */
export type Triple = Readonly<{
  subject: SubjectTerm;
  predicate: string;
  object: RDFTerm;
  /** Line of the token that opened the subject */
  line: number;
}>;

export type ParsedDocument = Readonly<{
  /** Prefix bindings in declaration order, later bindings winning */
  prefixes: Readonly<Record<string, string>>;
  base?: string;
  triples: readonly Triple[];
}>;

// ============================================================
// Hooks
// ============================================================

/**
 * Context passed to codec hooks.
 */
export type CodecHookContext = Readonly<{
  /** Unique ID for this decode or encode call */
  operationId: string;
  startedAt: Date;
}>;

export type DecodeWarningCode =
  | "UNRECOGNIZED_CLASS_EXPRESSION"
  | "UNRECOGNIZED_DATA_RANGE";

/**
 * Raised in lenient decoding when a blank node cannot be read as a class
 * expression or data range and a top-level fallback is used instead.
 */
export type DecodeWarning = Readonly<{
  code: DecodeWarningCode;
  /** Blank node label, e.g. `_:b3` */
  node: string;
  line?: number;
  message: string;
}>;

/**
 * Observability hooks for the Turtle codec.
 *
 * @example
 * ```typescript
 * const hooks: CodecHooks = {
 *   onDecodeEnd: (ctx, result) => {
 *     console.log(`[${ctx.operationId}] ${result.axiomCount} axioms in ${result.durationMs}ms`);
 *   },
 *   onWarning: (ctx, warning) => {
 *     console.warn(`[${ctx.operationId}] ${warning.message}`);
 *   },
 * };
 * ```
 */
export type CodecHooks = Readonly<{
  onDecodeStart?: (ctx: CodecHookContext) => void;
  onDecodeEnd?: (
    ctx: CodecHookContext,
    result: Readonly<{
      tripleCount: number;
      axiomCount: number;
      durationMs: number;
    }>,
  ) => void;
  onEncodeStart?: (ctx: CodecHookContext) => void;
  onEncodeEnd?: (
    ctx: CodecHookContext,
    result: Readonly<{ lineCount: number; durationMs: number }>,
  ) => void;
  onWarning?: (ctx: CodecHookContext, warning: DecodeWarning) => void;
  onError?: (ctx: CodecHookContext, error: Error) => void;
}>;

const HOOK_NAMES = [
  "onDecodeStart",
  "onDecodeEnd",
  "onEncodeStart",
  "onEncodeEnd",
  "onWarning",
  "onError",
] as const;

function isCodecHooks(value: unknown): value is CodecHooks {
  if (typeof value !== "object" || value === null) return false;
  return HOOK_NAMES.every((name) => {
    const hook: unknown = Reflect.get(value, name);
    return hook === undefined || typeof hook === "function";
  });
}

// ============================================================
// Options
// ============================================================

const prefixTableSchema = z.record(
  z.string().regex(/^[\w-]*$/),
  z.string().min(1),
);

export const DecodeOptionsSchema = z.object({
  /** Throw on unrecognized blank nodes instead of falling back */
  strict: z.boolean().default(false),
  /** Initial base IRI, overridden by `@base` directives */
  baseIRI: z.string().min(1).optional(),
  /** Bindings available before the first `@prefix` directive */
  prefixes: prefixTableSchema.optional(),
  hooks: z
    .custom<CodecHooks>(isCodecHooks, { message: "Invalid codec hooks" })
    .optional(),
});

export type DecodeOptions = z.input<typeof DecodeOptionsSchema>;
export type ResolvedDecodeOptions = z.output<typeof DecodeOptionsSchema>;

export const EncodeOptionsSchema = z.object({
  /** Bindings merged over the ontology's own prefixes */
  prefixes: prefixTableSchema.optional(),
  /** Emit the `owl:Ontology` header block */
  includeHeader: z.boolean().default(true),
  hooks: z
    .custom<CodecHooks>(isCodecHooks, { message: "Invalid codec hooks" })
    .optional(),
});

export type EncodeOptions = z.input<typeof EncodeOptionsSchema>;
export type ResolvedEncodeOptions = z.output<typeof EncodeOptionsSchema>;

// ============================================================
// Results
// ============================================================

export type DecodeResult = Readonly<{
  ontology: OWLOntology;
  warnings: readonly DecodeWarning[];
  /** Prefixes declared by the document itself */
  prefixes: Readonly<Record<string, string>>;
  base?: string;
  tripleCount: number;
}>;
