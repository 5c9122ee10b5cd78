import { afterEach, describe, expect, it, vi } from "vitest";
import {
  buildRequestLog,
  deriveRequestId,
  errorFields,
  shouldLog,
  toPrettyLine
} from "../src/logger.js";

describe("buildRequestLog", () => {
  it("includes method/path/status/duration", () => {
    const entry = buildRequestLog({
      method: "POST",
      path: "/event/example",
      status: 202,
      duration_ms: 12,
      request_id: "r-1"
    });
    expect(entry).toEqual({
      level: "info",
      msg: "request",
      method: "POST",
      path: "/event/example",
      status: 202,
      duration_ms: 12,
      request_id: "r-1"
    });
  });
});

describe("deriveRequestId", () => {
  it("prefers x-request-id, then delivery ids", () => {
    expect(deriveRequestId({ "x-request-id": "r-1", "x-github-delivery": "d-1" })).toBe("r-1");
    expect(deriveRequestId({ "x-github-delivery": "d-1" })).toBe("d-1");
    expect(deriveRequestId({ "x-gitlab-event-uuid": ["u-1", "u-2"] })).toBe("u-1");
    expect(deriveRequestId({})).toBeUndefined();
  });
});

describe("toPrettyLine", () => {
  it("renders request records compactly", () => {
    expect(
      toPrettyLine({
        level: "info",
        msg: "request",
        method: "POST",
        path: "/event/example",
        status: 202,
        duration_ms: 3,
        request_id: "r-1"
      })
    ).toBe('INFO POST /event/example -> 202 (3ms) request_id="r-1"');
  });

  it("sorts the remaining fields", () => {
    expect(toPrettyLine({ level: "warn", msg: "retrying push", id: "n-1", attempt: 2 })).toBe(
      'WARN retrying push attempt=2 id="n-1"'
    );
  });
});

describe("shouldLog", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("honours LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    expect(shouldLog("info")).toBe(false);
    expect(shouldLog("warn")).toBe(true);
    expect(shouldLog("error")).toBe(true);

    vi.stubEnv("LOG_LEVEL", "debug");
    expect(shouldLog("debug")).toBe(true);

    vi.stubEnv("LOG_LEVEL", "silent");
    expect(shouldLog("error")).toBe(false);
  });
});

describe("errorFields", () => {
  it("flattens errors for JSON output", () => {
    const err = new Error("outer", { cause: new Error("inner") });
    expect(errorFields(err)).toEqual({ error: "outer", error_name: "Error", error_cause: "inner" });
    expect(errorFields("plain")).toEqual({ error: "plain" });
  });
});
