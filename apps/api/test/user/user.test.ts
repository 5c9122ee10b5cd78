import { describe, expect, it } from "vitest";
import { IdentifierSet, identifier } from "@hookrelay/shared";
import {
  copyUser,
  createUser,
  withIdentifier,
  withIdentifiers,
  withPreference,
  withPreferences
} from "../../src/user/user.js";

describe("createUser", () => {
  it("applies options in order", () => {
    const user = createUser(
      "codell",
      withIdentifier(identifier("username", "codell")),
      withIdentifiers(new IdentifierSet([identifier("email", "c@example.com")])),
      withPreferences({ "com.example.test": { email: true } }),
      withPreference("com.example.test", "slack", false)
    );
    expect(user.key).toBe("codell");
    expect(user.identifiers.toString()).toBe("[email:c@example.com username:codell]");
    expect(user.preferences).toEqual({ "com.example.test": { email: true, slack: false } });
  });

  it("copies deeply", () => {
    const user = createUser("a", withPreference("t", "slack", true));
    const copy = copyUser(user);
    copy.identifiers.add(identifier("username", "a"));
    copy.preferences.t.slack = false;
    expect(user.identifiers.size).toBe(0);
    expect(user.preferences).toEqual({ t: { slack: true } });
  });
});
