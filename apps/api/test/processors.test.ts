import { describe, expect, it } from "vitest";
import { identifier, type Event } from "@hookrelay/shared";
import { dropUnaddressed, processorFunc, routeUnaddressedToBlackhole } from "../src/processors.js";
import { defineSource } from "../src/source.js";
import { MessageParser } from "../src/sources/example.js";
import { liveSignal, testContext, testNotification } from "./support/notifications.js";

const event: Event = { context: testContext(), data: {} };

describe("processorFunc", () => {
  it("wraps a function with a name", async () => {
    const processor = processorFunc("count", (_event, notifications) => [
      ...notifications,
      testNotification("com.example.test")
    ]);
    expect(processor.name).toBe("count");
    await expect(processor.process(event, [], liveSignal())).resolves.toHaveLength(1);
  });
});

describe("dropUnaddressed", () => {
  it("removes notifications without recipients", async () => {
    const addressed = testNotification("com.example.test", identifier("username", "a"));
    const result = await dropUnaddressed().process(
      event,
      [testNotification("com.example.test"), addressed],
      liveSignal()
    );
    expect(result).toEqual([addressed]);
  });
});

describe("routeUnaddressedToBlackhole", () => {
  it("addresses empty recipients to the black hole", async () => {
    const addressed = testNotification("com.example.test", identifier("username", "a"));
    const empty = testNotification("com.example.test");
    const [first, second] = await routeUnaddressedToBlackhole().process(
      event,
      [empty, addressed],
      liveSignal()
    );
    expect(first?.recipient.toString()).toBe("[blackhole:discard]");
    expect(second).toBe(addressed);
    expect(empty.recipient.size).toBe(0);
  });
});

describe("defineSource", () => {
  it("rejects keys that cannot be a path segment", () => {
    expect(() => defineSource("bad key", new MessageParser())).toThrow(
      'invalid source key "bad key": use letters, digits, ".", "_" or "-"'
    );
    expect(defineSource("my-source.v2", new MessageParser()).key).toBe("my-source.v2");
  });
});
