import { describe, expect, it } from "vitest";
import {
  BLACKHOLE_DISCARD,
  GENERIC_BLACKHOLE,
  IdentifierError,
  formatIdentifier,
  identifier,
  kindOf,
  namespaceAndKind,
  namespaceOf,
  parseIdentifier,
  splitNamespaceAndKind
} from "./identifier.js";

describe("namespaceAndKind", () => {
  it("joins namespace and kind", () => {
    expect(namespaceAndKind("slack.com", "id")).toBe("slack.com/id");
    expect(namespaceAndKind("", "email")).toBe("email");
  });

  it("rejects an empty kind", () => {
    expect(() => namespaceAndKind("slack.com", " ")).toThrow(IdentifierError);
  });

  it("splits back into parts", () => {
    expect(splitNamespaceAndKind("gitlab.com/username")).toEqual({
      namespace: "gitlab.com",
      kind: "username"
    });
    expect(splitNamespaceAndKind("email")).toEqual({ namespace: "", kind: "email" });
    expect(kindOf("example.com/blackhole")).toBe("blackhole");
    expect(namespaceOf("example.com/blackhole")).toBe("example.com");
  });
});

describe("identifier", () => {
  it("stringifies numeric values", () => {
    expect(identifier("gitlab.com/id", 123)).toEqual({
      namespaceAndKind: "gitlab.com/id",
      value: "123"
    });
  });

  it("rejects empty values", () => {
    expect(() => identifier("email", "")).toThrow(IdentifierError);
  });

  it("formats with and without a namespace", () => {
    expect(formatIdentifier(identifier("slack.com/id", "U123"))).toBe("slack.com/id:U123");
    expect(formatIdentifier(identifier("email", "bob@example.com"))).toBe(
      "email:bob@example.com"
    );
  });

  it("parses the textual form", () => {
    expect(parseIdentifier("slack.com/email:z@example.com")).toEqual({
      namespaceAndKind: "slack.com/email",
      value: "z@example.com"
    });
    expect(parseIdentifier("id:a:b")).toEqual({ namespaceAndKind: "id", value: "a:b" });
    expect(() => parseIdentifier("no-colon")).toThrow(IdentifierError);
    expect(() => parseIdentifier(":value")).toThrow(IdentifierError);
  });

  it("provides a discard identifier for the black hole", () => {
    expect(GENERIC_BLACKHOLE).toBe("blackhole");
    expect(formatIdentifier(BLACKHOLE_DISCARD)).toBe("blackhole:discard");
  });
});
