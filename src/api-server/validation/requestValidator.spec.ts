import { describe, it, expect } from "vitest";
import { characterLength } from "./requestSchemas.js";
import { validateRequest } from "./requestValidator.js";

describe("validateRequest", () => {
  describe("search", () => {
    it("applies the default max_results", () => {
      expect(validateRequest("search", { query: "malaria" })).toEqual({
        ok: true,
        value: { query: "malaria", max_results: 10 },
      });
    });

    it("drops fields outside the schema", () => {
      const result = validateRequest("search", {
        query: "malaria",
        max_results: 3,
        format: "json",
      });
      expect(result).toEqual({
        ok: true,
        value: { query: "malaria", max_results: 3 },
      });
    });

    it("reports the first violation only", () => {
      const result = validateRequest("search", { query: "", max_results: 0 });
      expect(result).toEqual({
        ok: false,
        failure: {
          field: "query",
          constraint: "min_length",
          message: "Field 'query' must be at least 1 character long.",
        },
      });
    });

    it("classifies a missing field as required", () => {
      const result = validateRequest("search", { max_results: 5 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.constraint).toBe("required");
        expect(result.failure.field).toBe("query");
      }
    });

    it("rejects null max_results as the wrong type", () => {
      const result = validateRequest("search", { query: "x", max_results: null });
      expect(result).toEqual({
        ok: false,
        failure: {
          field: "max_results",
          constraint: "type",
          message: "Field 'max_results' must be an integer.",
        },
      });
    });

    it("reports the maximum constraint at 101", () => {
      const result = validateRequest("search", { query: "x", max_results: 101 });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.failure.constraint).toBe("maximum");
    });
  });

  describe("publication", () => {
    it("accepts a digit-only PMID", () => {
      expect(validateRequest("publication", { pmid: "0012" })).toEqual({
        ok: true,
        value: { pmid: "0012" },
      });
    });

    it("rejects a PMID with surrounding whitespace", () => {
      const result = validateRequest("publication", { pmid: " 123" });
      expect(result).toEqual({
        ok: false,
        failure: {
          field: "pmid",
          constraint: "pattern",
          message: "Field 'pmid' must match the pattern ^\\d+$.",
        },
      });
    });

    it("rejects a non-object body", () => {
      expect(validateRequest("publication", "31000001")).toEqual({
        ok: false,
        failure: {
          field: "body",
          constraint: "type",
          message: "Request body must be a JSON object.",
        },
      });
    });
  });

  describe("similar", () => {
    it("caps max_results at 50", () => {
      const result = validateRequest("similar", { pmid: "1", max_results: 51 });
      expect(result).toEqual({
        ok: false,
        failure: {
          field: "max_results",
          constraint: "maximum",
          message: "Field 'max_results' must be less than or equal to 50.",
        },
      });
    });

    it("defaults max_results to 10", () => {
      expect(validateRequest("similar", { pmid: "1" })).toEqual({
        ok: true,
        value: { pmid: "1", max_results: 10 },
      });
    });
  });
});

describe("characterLength", () => {
  it("counts astral characters once", () => {
    expect(characterLength("🧬🧬")).toBe(2);
    expect("🧬🧬".length).toBe(4);
  });
});
