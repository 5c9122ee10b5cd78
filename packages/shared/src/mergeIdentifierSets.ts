import { IdentifierSet } from "./identifierSet.js";

function find(parent: number[], i: number): number {
  let root = i;
  while (parent[root] !== root) root = parent[root];
  // path compression
  let node = i;
  while (parent[node] !== root) {
    const next = parent[node];
    parent[node] = root;
    node = next;
  }
  return root;
}

function union(parent: number[], i: number, j: number): void {
  const rootI = find(parent, i);
  const rootJ = find(parent, j);
  if (rootI === rootJ) return;
  // keep the lower index as root so group order follows input order
  if (rootI < rootJ) parent[rootJ] = rootI;
  else parent[rootI] = rootJ;
}

/**
 * Merges any sets that share at least one identifier (same key and value), directly or
 * through a chain of other sets. Each output set is the pointwise merge of its group,
 * applied in input order, so the last writer wins on conflicting values. Groups are
 * returned in the order of their first member. Input sets are not modified.
 */
export function mergeAndDeduplicate(sets: readonly IdentifierSet[]): IdentifierSet[] {
  const parent = sets.map((_, i) => i);
  const firstSeen = new Map<string, number>();

  sets.forEach((set, i) => {
    for (const id of set.toList()) {
      const key = JSON.stringify([id.namespaceAndKind, id.value]);
      const seen = firstSeen.get(key);
      if (seen === undefined) firstSeen.set(key, i);
      else union(parent, seen, i);
    }
  });

  const groups = new Map<number, IdentifierSet>();
  sets.forEach((set, i) => {
    const root = find(parent, i);
    const merged = groups.get(root) ?? new IdentifierSet();
    merged.merge(set);
    groups.set(root, merged);
  });

  return [...groups.values()];
}
