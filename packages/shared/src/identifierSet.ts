import {
  formatIdentifier,
  IdentifierError,
  type Identifier,
  type NamespaceAndKind
} from "./identifier.js";

/**
 * Identifiers for a single principal, keyed by NamespaceAndKind. Holds at most one
 * value per key; adding an identifier whose key already exists replaces its value.
 *
 * Every operation runs synchronously, so readers always observe a consistent snapshot
 * even when several in-flight requests share a set.
 */
export class IdentifierSet {
  private readonly ids = new Map<NamespaceAndKind, string>();

  constructor(ids: Iterable<Identifier> = []) {
    for (const id of ids) this.ids.set(id.namespaceAndKind, id.value);
  }

  static fromMap(
    map: Readonly<Record<NamespaceAndKind, string>> | ReadonlyMap<NamespaceAndKind, string>
  ): IdentifierSet {
    const entries = map instanceof Map ? [...map.entries()] : Object.entries(map);
    return new IdentifierSet(
      entries.map(([namespaceAndKind, value]) => ({ namespaceAndKind, value }))
    );
  }

  get size(): number {
    return this.ids.size;
  }

  get(nk: NamespaceAndKind): string | undefined {
    return this.ids.get(nk);
  }

  mustGet(nk: NamespaceAndKind): string {
    const value = this.ids.get(nk);
    if (value === undefined) {
      throw new IdentifierError(`no value found for ${nk}`);
    }
    return value;
  }

  has(nk: NamespaceAndKind): boolean {
    return this.ids.has(nk);
  }

  add(id: Identifier): void {
    this.ids.set(id.namespaceAndKind, id.value);
  }

  merge(other: IdentifierSet): void {
    for (const id of other.toList()) this.add(id);
  }

  /** Identifiers present in both sets with the same key and the same value. */
  intersect(other: IdentifierSet): IdentifierSet {
    const common: Identifier[] = [];
    for (const id of other.toList()) {
      if (this.ids.get(id.namespaceAndKind) === id.value) common.push(id);
    }
    return new IdentifierSet(common);
  }

  /** A snapshot of the set, sorted by key. */
  toList(): Identifier[] {
    return [...this.ids.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([namespaceAndKind, value]) => ({ namespaceAndKind, value }));
  }

  toMap(): Record<NamespaceAndKind, string> {
    const res: Record<NamespaceAndKind, string> = {};
    for (const id of this.toList()) res[id.namespaceAndKind] = id.value;
    return res;
  }

  toJSON(): Record<NamespaceAndKind, string> {
    return this.toMap();
  }

  equals(other: IdentifierSet): boolean {
    if (other.size !== this.size) return false;
    return this.intersect(other).size === this.size;
  }

  copy(): IdentifierSet {
    return new IdentifierSet(this.toList());
  }

  toString(): string {
    return `[${this.toList().map(formatIdentifier).join(" ")}]`;
  }
}
