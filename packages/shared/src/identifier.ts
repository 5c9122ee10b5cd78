/**
 * A `namespace/kind` pair such as "slack.com/email", or a bare kind such as "email"
 * when the identifier is not tied to a particular system.
 */
export type NamespaceAndKind = string;

export const KIND_EMAIL = "email";
export const KIND_USERNAME = "username";
export const KIND_ID = "id";
export const KIND_BLACKHOLE = "blackhole";

// Identifiers not associated with any specific namespace.
export const GENERIC_EMAIL: NamespaceAndKind = KIND_EMAIL;
export const GENERIC_BLACKHOLE: NamespaceAndKind = KIND_BLACKHOLE;

export class IdentifierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IdentifierError";
  }
}

export type Identifier = {
  readonly namespaceAndKind: NamespaceAndKind;
  readonly value: string;
};

export function namespaceAndKind(namespace: string, kind: string): NamespaceAndKind {
  if (kind.trim() === "") {
    throw new IdentifierError("identifier kind must not be empty");
  }
  return namespace === "" ? kind : `${namespace}/${kind}`;
}

export function splitNamespaceAndKind(nk: NamespaceAndKind): {
  namespace: string;
  kind: string;
} {
  const slash = nk.indexOf("/");
  if (slash === -1) return { namespace: "", kind: nk };
  return { namespace: nk.slice(0, slash), kind: nk.slice(slash + 1) };
}

export function kindOf(nk: NamespaceAndKind): string {
  return splitNamespaceAndKind(nk).kind;
}

export function namespaceOf(nk: NamespaceAndKind): string {
  return splitNamespaceAndKind(nk).namespace;
}

export function identifier(nk: NamespaceAndKind, value: string | number): Identifier {
  const text = String(value);
  if (kindOf(nk) === "") {
    throw new IdentifierError(`identifier kind must not be empty: "${nk}"`);
  }
  if (text === "") {
    throw new IdentifierError(`identifier value must not be empty for ${nk}`);
  }
  return { namespaceAndKind: nk, value: text };
}

/** Renders `<namespace>/<kind>:<value>`, or `<kind>:<value>` without a namespace. */
export function formatIdentifier(id: Identifier): string {
  return `${id.namespaceAndKind}:${id.value}`;
}

export function parseIdentifier(text: string): Identifier {
  const colon = text.indexOf(":");
  if (colon <= 0) {
    throw new IdentifierError(`invalid identifier "${text}": expected <kind>:<value>`);
  }
  return identifier(text.slice(0, colon), text.slice(colon + 1));
}

export const BLACKHOLE_DISCARD: Identifier = identifier(GENERIC_BLACKHOLE, "discard");
