import { describe, expect, it } from "vitest";
import { identifier } from "@hookrelay/shared";
import { UserPreferenceProvider } from "../../src/user/preferenceProvider.js";
import { InMemoryUserStore } from "../../src/user/store.js";
import { createUser, withIdentifier, withPreference } from "../../src/user/user.js";
import { liveSignal, testNotification } from "../support/notifications.js";

const provider = new UserPreferenceProvider(
  new InMemoryUserStore([
    createUser(
      "codell",
      withIdentifier(identifier("username", "codell")),
      withPreference("com.example.test", "slack", false),
      withPreference("com.example.test", "email", true)
    )
  ])
);

describe("UserPreferenceProvider", () => {
  it("answers from the stored preferences", async () => {
    const n = testNotification("com.example.test", identifier("username", "codell"));
    await expect(provider.wants(n, "slack", liveSignal())).resolves.toBe(false);
    await expect(provider.wants(n, "email", liveSignal())).resolves.toBe(true);
    await expect(provider.wants(n, "writer", liveSignal())).resolves.toBeUndefined();
  });

  it("has no opinion about unknown or empty recipients", async () => {
    await expect(
      provider.wants(
        testNotification("com.example.test", identifier("username", "ghost")),
        "slack",
        liveSignal()
      )
    ).resolves.toBeUndefined();
    await expect(
      provider.wants(testNotification("com.example.test"), "slack", liveSignal())
    ).resolves.toBeUndefined();
  });
});
