import { describe, it, expect } from "vitest";
import { AppError, BaseErrorCode } from "../../types-global/errors.js";
import { describeFailure, failureEnvelope, successEnvelope } from "./envelope.js";

describe("envelopes", () => {
  it("builds success and failure bodies", () => {
    expect(successEnvelope("# Title")).toEqual({ success: true, data: "# Title" });
    expect(failureEnvelope("nope")).toEqual({ success: false, error: "nope" });
  });
});

describe("describeFailure", () => {
  const cases: Array<[BaseErrorCode, number, string]> = [
    [BaseErrorCode.NO_RESULTS, 200, "upstream said"],
    [BaseErrorCode.NCBI_TIMEOUT, 502, "Search failed: upstream said"],
    [BaseErrorCode.NCBI_SERVICE_UNAVAILABLE, 502, "Search failed: upstream said"],
    [BaseErrorCode.NCBI_API_ERROR, 502, "Search failed: upstream said"],
    [BaseErrorCode.NCBI_PARSING_ERROR, 502, "Search failed: upstream said"],
    [BaseErrorCode.REQUEST_ABORTED, 503, "Search failed: upstream said"],
    [BaseErrorCode.INTERNAL_ERROR, 500, "Internal server error occurred"],
    [BaseErrorCode.CONFIGURATION_ERROR, 500, "Internal server error occurred"],
  ];

  for (const [code, status, message] of cases) {
    it(`maps ${code} to ${status}`, () => {
      const described = describeFailure(
        new AppError(code, "upstream said"),
        "Search failed",
      );
      expect(described).toEqual({
        status,
        envelope: { success: false, error: message },
      });
    });
  }
});
