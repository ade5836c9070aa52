/**
 * Ontoloom Error Hierarchy
 *
 * All errors extend OntoloomError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   decodeTurtle(text);
 * } catch (error) {
 *   if (isTurtleSyntaxError(error)) {
 *     console.error(`line ${error.line}: ${error.toUserMessage()}`);
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `constraint`: Ontology constraint violation. Recoverable by changing data.
 * - `system`: Internal error. May require investigation.
 */
export type ErrorCategory = "user" | "constraint" | "system";

/**
 * Options for OntoloomError constructor.
 */
export type OntoloomErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (typeof cause === "symbol") {
    return cause.description ?? "Symbol";
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all Ontoloom errors.
 */
export class OntoloomError extends Error {
  /** Machine-readable error code (e.g., "TURTLE_UNDEFINED_PREFIX") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: OntoloomErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "OntoloomError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Validation Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "axioms.3.kind") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

/**
 * Details for ValidationError.
 */
export type ValidationErrorDetails = Readonly<{
  /** What was being validated (e.g., "DecodeOptions") */
  subject: string;
  /** Individual validation issues */
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown when codec options or a transport payload fail schema validation.
 *
 * @example
 * ```typescript
 * try {
 *   decodeTurtle(text, { strict: "yes" });
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.log(error.details.issues);
 *     // [{ path: "strict", message: "Invalid input: expected boolean, received string" }]
 *   }
 * }
 * ```
 */
export class ValidationError extends OntoloomError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    const fieldList =
      details.issues.length > 0 ?
        details.issues.map((issue) => issue.path || "(root)").join(", ")
      : "unknown";

    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the following fields: ${fieldList}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Thrown when the model API is used with arguments it cannot represent,
 * such as a negative cardinality or an empty namespace.
 */
export class ConfigurationError extends OntoloomError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ?? `Review the arguments passed to the model API.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Turtle Syntax Errors (category: "user")
// ============================================================

/**
 * Base class for errors raised while tokenizing or parsing Turtle text.
 *
 * Every syntax error knows the 1-based line it was detected on.
 */
export class TurtleSyntaxError extends OntoloomError {
  /** 1-based source line */
  readonly line: number;

  constructor(
    message: string,
    code: string,
    line: number,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(`${message} (line ${line})`, code, {
      details: { ...details, line },
      category: "user",
      suggestion: options?.suggestion,
      cause: options?.cause,
    });
    this.name = "TurtleSyntaxError";
    this.line = line;
  }
}

/**
 * Thrown when the parser meets a token it cannot use at that position.
 */
export class UnexpectedTokenError extends TurtleSyntaxError {
  constructor(expected: string, found: string, line: number) {
    super(
      `Unexpected token: expected ${expected}, found ${found}`,
      "TURTLE_UNEXPECTED_TOKEN",
      line,
      { expected, found },
      {
        suggestion: `Check the statement on line ${line}; every triple needs a subject, a predicate and an object and ends with ".".`,
      },
    );
    this.name = "UnexpectedTokenError";
  }
}

/**
 * Thrown when a quoted string runs to the end of input.
 */
export class UnterminatedStringError extends TurtleSyntaxError {
  constructor(line: number) {
    super("Unterminated string literal", "TURTLE_UNTERMINATED_STRING", line, {}, {
      suggestion: "Close the string with the same quote it was opened with.",
    });
    this.name = "UnterminatedStringError";
  }
}

/**
 * Thrown when a prefixed name uses a prefix that no directive has bound.
 */
export class UndefinedPrefixError extends TurtleSyntaxError {
  readonly prefix: string;

  constructor(prefix: string, line: number) {
    super(
      `Undefined prefix "${prefix}:"`,
      "TURTLE_UNDEFINED_PREFIX",
      line,
      { prefix },
      {
        suggestion: `Declare it before use, e.g. "@prefix ${prefix}: <http://example.org/${prefix}#> ."`,
      },
    );
    this.name = "UndefinedPrefixError";
    this.prefix = prefix;
  }
}

/**
 * Thrown when an IRI reference is not closed by ">".
 */
export class InvalidIriError extends TurtleSyntaxError {
  constructor(line: number, iri?: string, options?: { cause?: unknown }) {
    super(
      "Invalid or unterminated IRI",
      "TURTLE_INVALID_IRI",
      line,
      iri === undefined ? {} : { iri },
      options,
    );
    this.name = "InvalidIriError";
  }
}

/**
 * Thrown when the tokenizer meets a character that starts no token.
 */
export class UnexpectedCharacterError extends TurtleSyntaxError {
  constructor(character: string, line: number) {
    super(
      `Unexpected character "${character}"`,
      "TURTLE_UNEXPECTED_CHARACTER",
      line,
      { character },
    );
    this.name = "UnexpectedCharacterError";
  }
}

/**
 * Thrown when input ends inside a statement.
 */
export class UnexpectedEndOfInputError extends TurtleSyntaxError {
  constructor(line: number) {
    super(
      "Unexpected end of input",
      "TURTLE_UNEXPECTED_END_OF_INPUT",
      line,
      {},
      { suggestion: 'Terminate the last statement with ".".' },
    );
    this.name = "UnexpectedEndOfInputError";
  }
}

/**
 * Thrown in strict decoding when a blank node does not describe any
 * known class expression or data range.
 */
export class UnrecognizedNodeError extends OntoloomError {
  constructor(
    node: string,
    expected: "classExpression" | "dataRange",
    line?: number,
  ) {
    super(
      `Blank node ${node} is not a recognizable ${
        expected === "classExpression" ? "class expression" : "data range"
      }`,
      "TURTLE_UNRECOGNIZED_NODE",
      {
        details: { node, expected, ...(line !== undefined && { line }) },
        category: "user",
        suggestion:
          "Disable strict decoding to fall back to owl:Thing, or fix the node's predicates.",
      },
    );
    this.name = "UnrecognizedNodeError";
  }
}

// ============================================================
// Transport Errors (category: "user")
// ============================================================

/**
 * Thrown when an ontology envelope cannot be unwrapped.
 */
export class TransportError extends OntoloomError {
  constructor(
    message: string,
    details: Readonly<Record<string, unknown>> = {},
    options?: { cause?: unknown },
  ) {
    super(message, "TRANSPORT_ERROR", {
      details,
      category: "user",
      suggestion:
        "Only unwrap envelopes produced by wrapOntology with typeIdentifier \"OWLOntology\".",
      cause: options?.cause,
    });
    this.name = "TransportError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for OntoloomError.
 */
export function isOntoloomError(error: unknown): error is OntoloomError {
  return error instanceof OntoloomError;
}

/**
 * Type guard for errors raised by the Turtle tokenizer or parser.
 */
export function isTurtleSyntaxError(
  error: unknown,
): error is TurtleSyntaxError {
  return error instanceof TurtleSyntaxError;
}

/**
 * Check if error is recoverable by user action (user or constraint error).
 *
 * @example
 * ```typescript
 * if (isUserRecoverable(error)) {
 *   showErrorToUser(error.toUserMessage());
 * } else {
 *   reportBug(error);
 * }
 * ```
 */
export function isUserRecoverable(error: unknown): boolean {
  if (!isOntoloomError(error)) return false;
  return error.category === "user" || error.category === "constraint";
}

/**
 * Check if error indicates an internal failure.
 */
export function isSystemError(error: unknown): boolean {
  return isOntoloomError(error) && error.category === "system";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isOntoloomError(error) ? error.suggestion : undefined;
}
