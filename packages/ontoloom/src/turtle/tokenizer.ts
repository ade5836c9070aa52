import {
  InvalidIriError,
  UnexpectedCharacterError,
  UnexpectedTokenError,
  UnterminatedStringError,
} from "../errors";
import { type Token, type TokenKind } from "./types";

const PUNCTUATION = new Set([".", ";", ",", "[", "]", "(", ")"]);

const STRING_ESCAPES: Readonly<Record<string, string>> = {
  t: "\t",
  n: "\n",
  r: "\r",
  '"': '"',
  "'": "'",
  "\\": "\\",
};

const NAME_START = /[\p{L}_]/u;
const NAME_CHAR = /[\p{L}\p{N}_.-]/u;
const LOCAL_CHAR = /[\p{L}\p{N}_.:%-]/u;
const DIGIT = /\d/;
const MAX_CODE_POINT = 0x10_ff_ff;

/**
 * Scans Turtle text into a flat token stream ending with an `eof` token.
 *
 * A `.` directly followed by a digit starts a decimal (`.5`); anywhere
 * else it ends a statement. Comments run from `#` to the end of the line.
 *
 * @example
 * ```typescript
 * new Tokenizer('ex:a ex:p "x"@en .').tokenize().map((t) => t.kind);
 * // ["prefixedName", "prefixedName", "string", "languageTag", "punctuation", "eof"]
 * ```
 */
export class Tokenizer {
  readonly #input: string;
  #pos = 0;
  #line = 1;
  readonly #tokens: Token[] = [];

  constructor(input: string) {
    this.#input = input;
  }

  tokenize(): Token[] {
    for (;;) {
      this.#skipTrivia();
      if (this.#pos >= this.#input.length) break;
      this.#readToken();
    }
    this.#tokens.push({ kind: "eof", value: "", line: this.#line });
    return this.#tokens;
  }

  // === Dispatch ===

  #readToken(): void {
    const ch = this.#peek();
    const next = this.#peek(1);

    if (ch === "<") {
      this.#readIri();
      return;
    }
    if (ch === '"' || ch === "'") {
      this.#readString(ch);
      return;
    }
    if (ch === "@") {
      this.#readAtKeyword();
      return;
    }
    if (ch === "^") {
      if (next !== "^") throw new UnexpectedCharacterError(ch, this.#line);
      this.#pos += 2;
      this.#push("datatypeMarker", "^^");
      return;
    }
    if (ch === "_" && next === ":") {
      this.#readBlankNode();
      return;
    }
    if (this.#startsNumber()) {
      this.#readNumber();
      return;
    }
    if (PUNCTUATION.has(ch)) {
      this.#pos += 1;
      this.#push("punctuation", ch);
      return;
    }
    if (ch === ":" || NAME_START.test(ch)) {
      this.#readName();
      return;
    }
    throw new UnexpectedCharacterError(ch, this.#line);
  }

  // === Trivia ===

  #skipTrivia(): void {
    while (this.#pos < this.#input.length) {
      const ch = this.#peek();
      if (ch === "\n") {
        this.#line += 1;
        this.#pos += 1;
      } else if (ch === " " || ch === "\t" || ch === "\r") {
        this.#pos += 1;
      } else if (ch === "#") {
        while (this.#pos < this.#input.length && this.#peek() !== "\n") {
          this.#pos += 1;
        }
      } else {
        return;
      }
    }
  }

  // === IRIs and names ===

  #readIri(): void {
    const line = this.#line;
    const start = this.#pos + 1;
    let end = start;
    while (end < this.#input.length) {
      const ch = this.#input.charAt(end);
      if (ch === ">") break;
      if (ch === "\n" || ch === " ") {
        throw new InvalidIriError(line, this.#input.slice(start, end));
      }
      end += 1;
    }
    if (end >= this.#input.length) {
      throw new InvalidIriError(line, this.#input.slice(start, end));
    }
    this.#pos = end + 1;
    this.#tokens.push({ kind: "iri", value: this.#input.slice(start, end), line });
  }

  #readBlankNode(): void {
    this.#pos += 2;
    const label = this.#readWhile(NAME_CHAR);
    if (label.length === 0) {
      throw new UnexpectedCharacterError(this.#peek() || "_:", this.#line);
    }
    this.#push("blankNode", label);
  }

  /**
   * Reads a keyword (`a`, `true`, `PREFIX`…) or a prefixed name. The
   * local part may be empty (`ex:`).
   */
  #readName(): void {
    const line = this.#line;
    const prefix = this.#readWhile(NAME_CHAR);
    if (this.#peek() !== ":") {
      this.#tokens.push(classifyWord(prefix, line));
      return;
    }
    this.#pos += 1;
    const local = this.#readWhile(LOCAL_CHAR);
    this.#tokens.push({ kind: "prefixedName", value: `${prefix}:${local}`, line });
  }

  /**
   * Consumes characters matching `pattern`, then gives back trailing
   * dots so that `ex:a.` ends the statement.
   */
  #readWhile(pattern: RegExp): string {
    const start = this.#pos;
    while (this.#pos < this.#input.length && pattern.test(this.#peek())) {
      this.#pos += 1;
    }
    while (this.#pos > start && this.#input.charAt(this.#pos - 1) === ".") {
      this.#pos -= 1;
    }
    return this.#input.slice(start, this.#pos);
  }

  #readAtKeyword(): void {
    this.#pos += 1;
    const start = this.#pos;
    while (
      this.#pos < this.#input.length &&
      /[A-Za-z0-9-]/.test(this.#peek())
    ) {
      this.#pos += 1;
    }
    const word = this.#input.slice(start, this.#pos);
    if (word.length === 0) throw new UnexpectedCharacterError("@", this.#line);
    if (word === "prefix") {
      this.#push("prefixDirective", "@prefix");
    } else if (word === "base") {
      this.#push("baseDirective", "@base");
    } else {
      this.#push("languageTag", word);
    }
  }

  // === Strings ===

  #readString(quote: string): void {
    const line = this.#line;
    const long = this.#input.startsWith(quote.repeat(3), this.#pos);
    this.#pos += long ? 3 : 1;

    let value = "";
    for (;;) {
      if (this.#pos >= this.#input.length) {
        throw new UnterminatedStringError(line);
      }
      const ch = this.#peek();
      if (long && this.#input.startsWith(quote.repeat(3), this.#pos)) {
        this.#pos += 3;
        break;
      }
      if (!long && ch === quote) {
        this.#pos += 1;
        break;
      }
      if (!long && ch === "\n") throw new UnterminatedStringError(line);
      if (ch === "\\") {
        value += this.#readEscape();
        continue;
      }
      if (ch === "\n") this.#line += 1;
      value += ch;
      this.#pos += 1;
    }
    this.#tokens.push({ kind: "string", value, line });
  }

  #readEscape(): string {
    const code = this.#peek(1);
    const simple = STRING_ESCAPES[code];
    if (simple !== undefined) {
      this.#pos += 2;
      return simple;
    }
    if (code === "u" || code === "U") {
      const width = code === "u" ? 4 : 8;
      const hex = this.#input.slice(this.#pos + 2, this.#pos + 2 + width);
      const codePoint = Number.parseInt(hex, 16);
      if (
        hex.length === width &&
        /^[0-9A-Fa-f]+$/.test(hex) &&
        codePoint <= MAX_CODE_POINT
      ) {
        this.#pos += 2 + width;
        return String.fromCodePoint(codePoint);
      }
    }
    // Unknown and out-of-range escapes are kept as written
    this.#pos += 1;
    return "\\";
  }

  // === Numbers ===

  #startsNumber(): boolean {
    const ch = this.#peek();
    if (DIGIT.test(ch)) return true;
    const next = this.#peek(1);
    if (ch === ".") return DIGIT.test(next);
    if (ch === "+" || ch === "-") {
      return DIGIT.test(next) || (next === "." && DIGIT.test(this.#peek(2)));
    }
    return false;
  }

  #readNumber(): void {
    const start = this.#pos;
    let kind: TokenKind = "integer";

    if (this.#peek() === "+" || this.#peek() === "-") this.#pos += 1;
    this.#skipDigits();
    if (this.#peek() === "." && DIGIT.test(this.#peek(1))) {
      kind = "decimal";
      this.#pos += 1;
      this.#skipDigits();
    }
    if (this.#peek() === "e" || this.#peek() === "E") {
      const sign = this.#peek(1) === "+" || this.#peek(1) === "-" ? 1 : 0;
      if (DIGIT.test(this.#peek(1 + sign))) {
        kind = "double";
        this.#pos += 1 + sign;
        this.#skipDigits();
      }
    }
    this.#push(kind, this.#input.slice(start, this.#pos));
  }

  #skipDigits(): void {
    while (this.#pos < this.#input.length && DIGIT.test(this.#peek())) {
      this.#pos += 1;
    }
  }

  // === Helpers ===

  #peek(offset = 0): string {
    return this.#input.charAt(this.#pos + offset);
  }

  #push(kind: TokenKind, value: string): void {
    this.#tokens.push({ kind, value, line: this.#line });
  }
}

function classifyWord(word: string, line: number): Token {
  if (word === "a") return { kind: "a", value: word, line };
  if (word === "true" || word === "false") {
    return { kind: "boolean", value: word, line };
  }
  switch (word.toUpperCase()) {
    case "PREFIX": {
      return { kind: "sparqlPrefix", value: word, line };
    }
    case "BASE": {
      return { kind: "sparqlBase", value: word, line };
    }
    default: {
      throw new UnexpectedTokenError("a prefixed name", word, line);
    }
  }
}

/**
 * Convenience wrapper around {@link Tokenizer}.
 */
export function tokenize(input: string): Token[] {
  return new Tokenizer(input).tokenize();
}
