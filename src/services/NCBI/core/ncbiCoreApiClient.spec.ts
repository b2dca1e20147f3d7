import { describe, it, expect } from "vitest";
import { createFakeEUtilities } from "../../../../spec/helpers/fakeEUtilities.js";
import { AppError, BaseErrorCode } from "../../../types-global/errors.js";
import { requestContextService } from "../../../utils/index.js";
import { isTimeoutReason, NcbiCoreApiClient } from "./ncbiCoreApiClient.js";

const context = requestContextService.createRequestContext({ operation: "coreClientSpec" });

function setup(clientConfig: Partial<ConstructorParameters<typeof NcbiCoreApiClient>[0]> = {}) {
  const upstream = createFakeEUtilities();
  const client = new NcbiCoreApiClient(
    { toolName: "TestTool", timeoutMs: 20, ...clientConfig },
    upstream.client,
  );
  return { upstream, client };
}

async function failureOf(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AppError) return error;
    throw error;
  }
  throw new Error("Expected the request to fail.");
}

describe("NcbiCoreApiClient", () => {
  it("returns the raw body and leaves out unset identification", async () => {
    const { upstream, client } = setup();

    const response = await client.makeRequest(
      "esearch",
      { db: "pubmed", term: "cold chain logistics", retmax: 5, sort: undefined },
      context,
      { retmode: "xml" },
    );

    expect(response.data).toContain("<Count>1</Count>");
    expect(upstream.calls).toEqual([
      {
        endpoint: "esearch",
        params: {
          tool: "TestTool",
          retmode: "xml",
          db: "pubmed",
          term: "cold chain logistics",
          retmax: "5",
        },
      },
    ]);
  });

  it("sends email and api_key when configured", async () => {
    const { upstream, client } = setup({ email: "tester@example.com", apiKey: "test-secret" });

    await client.makeRequest("elink", { id: "1" }, context);

    expect(upstream.calls[0]?.params).toMatchObject({
      email: "tester@example.com",
      api_key: "test-secret",
    });
  });

  it("aborts a stalled call at the deadline and maps it to NCBI_TIMEOUT", async () => {
    const { upstream, client } = setup();
    upstream.failWith("efetch", "stall");

    const error = await failureOf(client.makeRequest("efetch", { id: "1" }, context));

    expect(error.code).toBe(BaseErrorCode.NCBI_TIMEOUT);
    expect(error.message).toBe("PubMed did not respond within 20ms.");
    expect(upstream.aborted).toEqual(["efetch"]);
  });

  it("treats a caller signal that aborted on a timeout as NCBI_TIMEOUT", async () => {
    const { upstream, client } = setup({ timeoutMs: 5000 });
    upstream.failWith("esearch", "stall");

    const error = await failureOf(
      client.makeRequest("esearch", { term: "x" }, context, { signal: AbortSignal.timeout(20) }),
    );

    expect(error.code).toBe(BaseErrorCode.NCBI_TIMEOUT);
    expect(error.message).toBe("PubMed did not respond within 5000ms.");
  });

  it("maps a caller abort during the call to REQUEST_ABORTED", async () => {
    const { upstream, client } = setup({ timeoutMs: 5000 });
    upstream.failWith("esearch", "stall");
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const error = await failureOf(
      client.makeRequest("esearch", { term: "x" }, context, { signal: controller.signal }),
    );

    expect(error.code).toBe(BaseErrorCode.REQUEST_ABORTED);
    expect(upstream.aborted).toEqual(["esearch"]);
  });

  it("tells a timeout reason from a manual abort", async () => {
    const timedOut = AbortSignal.timeout(1);
    await new Promise((resolve) => timedOut.addEventListener("abort", resolve));
    const manual = new AbortController();
    manual.abort();

    expect(isTimeoutReason(timedOut.reason)).toBe(true);
    expect(isTimeoutReason(manual.signal.reason)).toBe(false);
    expect(isTimeoutReason(undefined)).toBe(false);
  });

  it("maps an HTTP error status to NCBI_SERVICE_UNAVAILABLE", async () => {
    const { upstream, client } = setup();
    upstream.failWith("esearch", "http-503");

    const error = await failureOf(client.makeRequest("esearch", { term: "x" }, context));

    expect(error.code).toBe(BaseErrorCode.NCBI_SERVICE_UNAVAILABLE);
    expect(error.message).toBe("PubMed responded with HTTP 503.");
  });

  it("maps a connection failure to NCBI_SERVICE_UNAVAILABLE", async () => {
    const { upstream, client } = setup();
    upstream.failWith("elink", "network");

    const error = await failureOf(client.makeRequest("elink", { id: "1" }, context));

    expect(error.code).toBe(BaseErrorCode.NCBI_SERVICE_UNAVAILABLE);
    expect(error.message).toBe("PubMed could not be reached.");
  });

  it("maps a cancelled request to REQUEST_ABORTED without calling PubMed", async () => {
    const { upstream, client } = setup();
    const controller = new AbortController();
    controller.abort();

    const error = await failureOf(
      client.makeRequest("esearch", { term: "x" }, context, { signal: controller.signal }),
    );

    expect(error.code).toBe(BaseErrorCode.REQUEST_ABORTED);
    expect(error.message).toBe("The request was cancelled before PubMed responded.");
    expect(upstream.callCount()).toBe(0);
  });

  it("makes exactly one attempt per call", async () => {
    const { upstream, client } = setup();
    upstream.failWith("efetch", "http-503");

    await failureOf(client.makeRequest("efetch", { id: "1" }, context));

    expect(upstream.callCount("efetch")).toBe(1);
  });
});
