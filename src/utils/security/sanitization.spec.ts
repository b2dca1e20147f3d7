import { describe, it, expect } from "vitest";
import { Sanitization, sanitizeInputForLogging } from "./sanitization.js";

describe("sanitizeInputForLogging", () => {
  it("redacts NCBI identification parameters", () => {
    expect(
      sanitizeInputForLogging({
        db: "pubmed",
        api_key: "test-secret",
        email: "tester@example.com",
        tool: "PubMedAPIClient",
      }),
    ).toEqual({
      db: "pubmed",
      api_key: "[REDACTED]",
      email: "[REDACTED]",
      tool: "PubMedAPIClient",
    });
  });

  it("matches keys case-insensitively and as substrings", () => {
    expect(
      sanitizeInputForLogging({ X_Auth_Token: "abc", nested: { userPassword: "pw" } }),
    ).toEqual({ X_Auth_Token: "[REDACTED]", nested: { userPassword: "[REDACTED]" } });
  });

  it("walks arrays and leaves primitives alone", () => {
    expect(sanitizeInputForLogging([{ secret: 1 }, 2, "three"])).toEqual([
      { secret: "[REDACTED]" },
      2,
      "three",
    ]);
    expect(sanitizeInputForLogging("plain")).toBe("plain");
    expect(sanitizeInputForLogging(null)).toBeNull();
  });

  it("cuts circular references", () => {
    const node: Record<string, unknown> = { name: "root" };
    node.self = node;
    expect(sanitizeInputForLogging(node)).toEqual({ name: "root", self: "[Circular]" });
  });

  it("copies an object shared by two branches both times", () => {
    const shared = { term: "vaccine", api_key: "test-secret" };
    expect(sanitizeInputForLogging({ first: shared, second: [shared] })).toEqual({
      first: { term: "vaccine", api_key: "[REDACTED]" },
      second: [{ term: "vaccine", api_key: "[REDACTED]" }],
    });
  });

  it("does not mutate its input", () => {
    const input = { api_key: "test-secret" };
    sanitizeInputForLogging(input);
    expect(input.api_key).toBe("test-secret");
  });
});

describe("Sanitization", () => {
  it("accepts extra sensitive fields", () => {
    const sanitization = new Sanitization();
    sanitization.setSensitiveFields(["SessionId"]);
    expect(sanitization.sanitizeForLogging({ sessionid: "s-1", term: "x" })).toEqual({
      sessionid: "[REDACTED]",
      term: "x",
    });
    expect(sanitization.getSensitiveFields()).toContain("sessionid");
  });
});
