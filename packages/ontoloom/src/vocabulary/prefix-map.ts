import { ConfigurationError } from "../errors";
import { STANDARD_PREFIXES } from "./namespaces";

/**
 * Bidirectional prefix table: expands `prefix:local` names and compacts
 * full IRIs back to the shortest prefixed form.
 *
 * @example
 * ```typescript
 * const prefixes = PrefixMap.standard().register("ex", "http://example.org/");
 * prefixes.expand("ex:Person"); // "http://example.org/Person"
 * prefixes.compact("http://www.w3.org/2002/07/owl#Class"); // "owl:Class"
 * ```
 */
export class PrefixMap {
  readonly #namespaces = new Map<string, string>();

  constructor(prefixes: Readonly<Record<string, string>> = {}) {
    for (const [prefix, namespace] of Object.entries(prefixes)) {
      this.register(prefix, namespace);
    }
  }

  /**
   * A fresh map with rdf, rdfs, owl, xsd, sh, skos, dcterms, foaf and
   * schema bound.
   */
  static standard(): PrefixMap {
    return new PrefixMap(STANDARD_PREFIXES);
  }

  // ============================================================
  // Registration
  // ============================================================

  register(prefix: string, namespace: string): this {
    if (namespace.length === 0) {
      throw new ConfigurationError(
        `Cannot bind prefix "${prefix}" to an empty namespace`,
        { prefix },
      );
    }
    this.#namespaces.set(prefix, namespace);
    return this;
  }

  remove(prefix: string): this {
    this.#namespaces.delete(prefix);
    return this;
  }

  // ============================================================
  // Expansion
  // ============================================================

  /**
   * Expands a prefixed name. Values without a colon, values that already
   * look like full IRIs (`scheme://…`) and unknown prefixes come back
   * unchanged.
   */
  expand(prefixed: string): string {
    const split = splitPrefixed(prefixed);
    if (split === undefined) return prefixed;
    const namespace = this.#namespaces.get(split.prefix);
    return namespace === undefined ? prefixed : namespace + split.local;
  }

  canExpand(prefixed: string): boolean {
    const split = splitPrefixed(prefixed);
    return split !== undefined && this.#namespaces.has(split.prefix);
  }

  // ============================================================
  // Compaction
  // ============================================================

  /**
   * Compacts a full IRI using the longest matching namespace. Ties go to
   * the alphabetically first prefix. Returns the input when nothing
   * matches.
   */
  compact(iri: string): string {
    let best: { prefix: string; namespace: string } | undefined;
    for (const [prefix, namespace] of this.#namespaces) {
      if (!iri.startsWith(namespace)) continue;
      if (
        best === undefined ||
        namespace.length > best.namespace.length ||
        (namespace.length === best.namespace.length && prefix < best.prefix)
      ) {
        best = { prefix, namespace };
      }
    }
    if (best === undefined) return iri;
    return `${best.prefix}:${iri.slice(best.namespace.length)}`;
  }

  // ============================================================
  // Composition and access
  // ============================================================

  /**
   * Returns a new map holding this map's bindings overridden by `other`'s.
   */
  merged(other: PrefixMap | Readonly<Record<string, string>>): PrefixMap {
    const result = new PrefixMap(this.mappings());
    const entries =
      other instanceof PrefixMap ? other.mappings() : other;
    for (const [prefix, namespace] of Object.entries(entries)) {
      result.register(prefix, namespace);
    }
    return result;
  }

  /** Bound prefixes in sorted order. */
  prefixes(): string[] {
    return [...this.#namespaces.keys()].toSorted();
  }

  mappings(): Record<string, string> {
    return Object.fromEntries(this.#namespaces);
  }

  namespace(prefix: string): string | undefined {
    return this.#namespaces.get(prefix);
  }

  prefix(namespace: string): string | undefined {
    for (const [prefix, bound] of this.#namespaces) {
      if (bound === namespace) return prefix;
    }
    return undefined;
  }

  get size(): number {
    return this.#namespaces.size;
  }

  get isEmpty(): boolean {
    return this.#namespaces.size === 0;
  }

  toString(): string {
    const lines = this.prefixes().map(
      (prefix) => `@prefix ${prefix}: <${this.#namespaces.get(prefix) ?? ""}> .`,
    );
    return [`PrefixMap(${this.size} prefixes)`, ...lines].join("\n");
  }
}

function splitPrefixed(
  value: string,
): { prefix: string; local: string } | undefined {
  const colon = value.indexOf(":");
  if (colon === -1) return undefined;
  const local = value.slice(colon + 1);
  if (local.startsWith("//")) return undefined;
  return { prefix: value.slice(0, colon), local };
}
