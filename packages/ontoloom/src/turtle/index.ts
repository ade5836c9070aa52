export {
  decodeTurtle,
  decodeTurtleDetailed,
  encodeTurtle,
  tryDecodeTurtle,
} from "./codec";
export { escapeTurtleString, type TurtleWriterOptions, writeTurtle } from "./encoder";
export {
  buildOWLOntology,
  type OWLBuildOptions,
  type OWLBuildResult,
} from "./owl-builder";
export { Parser, parseTurtle, type ParserOptions } from "./parser";
export { tokenize, Tokenizer } from "./tokenizer";
export {
  type CodecHookContext,
  type CodecHooks,
  type DecodeOptions,
  DecodeOptionsSchema,
  type DecodeResult,
  type DecodeWarning,
  type DecodeWarningCode,
  type EncodeOptions,
  EncodeOptionsSchema,
  type ParsedDocument,
  type ResolvedDecodeOptions,
  type ResolvedEncodeOptions,
  type SubjectTerm,
  type Token,
  type TokenKind,
  type Triple,
} from "./types";
