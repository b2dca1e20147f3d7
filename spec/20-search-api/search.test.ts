import { describe, it, expect } from "vitest";
import {
  createTestApp,
  postJson,
  postRaw,
  readEnvelope,
  readError,
  readMarkdown,
} from "../helpers/testApp.js";

/**
 * POST /search - ESearch followed by EFetch, rendered as a numbered list.
 */

const ENTRY_HEADING = /^\d+\. \*\*/gm;

describe("POST /search", () => {
  describe("Successful searches", () => {
    it("should render a single match exactly", async () => {
      const { app } = createTestApp();

      const response = await postJson(app, "/search", {
        query: "cold chain logistics",
      });

      expect(response.status).toBe(200);
      expect(await readMarkdown(response)).toBe(
        [
          "# PubMed Search Results",
          "",
          "**Query:** cold chain logistics",
          "**Total matches:** 1",
          "**Showing:** 1 result",
          "",
          "1. **Cold-chain logistics for vaccine distribution in rural clinics.**",
          "   - **Authors:** Kowalski J",
          "   - **Journal:** Global Health Logistics",
          "   - **Published:** 2020",
          "   - **PMID:** 31000003",
          "   - **PubMed URL:** https://pubmed.ncbi.nlm.nih.gov/31000003/",
        ].join("\n"),
      );
    });

    it("should return at most max_results entries", async () => {
      const { app } = createTestApp();

      const response = await postJson(app, "/search", {
        query: "COVID-19 vaccine",
        max_results: 5,
      });
      const markdown = await readMarkdown(response);

      expect(markdown.match(ENTRY_HEADING)).toHaveLength(5);
      expect(markdown).toContain("**Total matches:** 1,523");
      expect(markdown).toContain("**Showing:** 5 results");
      expect(markdown).not.toContain("31000006");
    });

    it("should default max_results to 10", async () => {
      const { app, upstream } = createTestApp();

      await postJson(app, "/search", { query: "COVID-19 vaccine" });

      const [esearch] = upstream.calls;
      expect(esearch?.endpoint).toBe("esearch");
      expect(esearch?.params.retmax).toBe("10");
    });

    it("should keep relevance order and abbreviate long author lists", async () => {
      const { app } = createTestApp();

      const markdown = await readMarkdown(
        await postJson(app, "/search", {
          query: "COVID-19 vaccine",
          max_results: 2,
        }),
      );

      expect(markdown).toContain(
        [
          "1. **Immune response durability after mRNA COVID-19 vaccine boosters in older adults.**",
          "   - **Authors:** Alvarez M, Chen W, Okafor N, et al.",
          "   - **Journal:** Journal of Vaccine Research",
          "   - **Published:** 2022 Mar 15",
          "   - **PMID:** 31000001",
          "   - **Abstract:** Booster doses of mRNA vaccines restore neutralising antibody titres in adults over 65, but how long that protection lasts is unclear. We followed a cohort of test participants for twelve months after ...",
          "   - **PubMed URL:** https://pubmed.ncbi.nlm.nih.gov/31000001/",
        ].join("\n"),
      );
      expect(markdown).toContain(
        [
          "2. **Adverse event surveillance for COVID-19 vaccine campaigns.**",
          "   - **Authors:** Vaccine Safety Working Group, Patel A",
          "   - **Journal:** Public Health Reports Quarterly",
          "   - **Published:** 2021 Jul-Aug",
          "   - **PMID:** 31000002",
          "   - **Abstract:** A passive reporting system captured adverse events after mass vaccination.",
          "   - **PubMed URL:** https://pubmed.ncbi.nlm.nih.gov/31000002/",
        ].join("\n"),
      );
    });

    it("should send identification and search parameters to ESearch", async () => {
      const { app, upstream } = createTestApp();

      await postJson(app, "/search", { query: "cold chain logistics", max_results: 3 });

      expect(upstream.calls[0]).toEqual({
        endpoint: "esearch",
        params: {
          tool: "PubMedAPIClient",
          email: "tester@example.com",
          api_key: "test-secret",
          retmode: "xml",
          db: "pubmed",
          term: "cold chain logistics",
          retmax: "3",
          sort: "relevance",
          usehistory: "n",
        },
      });
      expect(upstream.calls[1]).toEqual({
        endpoint: "efetch",
        params: {
          tool: "PubMedAPIClient",
          email: "tester@example.com",
          api_key: "test-secret",
          retmode: "xml",
          rettype: "abstract",
          db: "pubmed",
          id: "31000003",
        },
      });
    });

    it("should ignore fields it does not know", async () => {
      const { app } = createTestApp();

      const response = await postJson(app, "/search", {
        query: "cold chain logistics",
        sort: "pub_date",
      });

      expect(response.status).toBe(200);
      expect((await readEnvelope(response)).success).toBe(true);
    });
  });

  describe("Empty results", () => {
    it("should answer 200 with a failure envelope when nothing matches", async () => {
      const { app, upstream } = createTestApp();

      const response = await postJson(app, "/search", { query: "zebrafish lullabies" });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        success: false,
        error: "No publications found for query: 'zebrafish lullabies'.",
      });
      expect(upstream.callCount("efetch")).toBe(0);
    });

    it("should report no results when EFetch returns no records for the ids", async () => {
      const { app, upstream } = createTestApp();

      const response = await postJson(app, "/search", { query: "withdrawn records" });

      expect(response.status).toBe(200);
      expect(await readError(response)).toBe(
        "No publications found for query: 'withdrawn records'.",
      );
      expect(upstream.callCount("efetch")).toBe(1);
    });
  });

  describe("Validation", () => {
    const cases: Array<{ name: string; body: unknown; error: string }> = [
      { name: "missing query", body: {}, error: "Missing required field 'query'." },
      {
        name: "empty query",
        body: { query: "" },
        error: "Field 'query' must be at least 1 character long.",
      },
      {
        name: "query over 500 characters",
        body: { query: "a".repeat(501) },
        error: "Field 'query' must be at most 500 characters long.",
      },
      {
        name: "non-string query",
        body: { query: 42 },
        error: "Field 'query' must be a string.",
      },
      {
        name: "max_results of 0",
        body: { query: "vaccine", max_results: 0 },
        error: "Field 'max_results' must be greater than or equal to 1.",
      },
      {
        name: "max_results of 101",
        body: { query: "vaccine", max_results: 101 },
        error: "Field 'max_results' must be less than or equal to 100.",
      },
      {
        name: "fractional max_results",
        body: { query: "vaccine", max_results: 2.5 },
        error: "Field 'max_results' must be an integer.",
      },
      {
        name: "string max_results",
        body: { query: "vaccine", max_results: "5" },
        error: "Field 'max_results' must be an integer.",
      },
      {
        name: "array body",
        body: ["vaccine"],
        error: "Request body must be a JSON object.",
      },
    ];

    for (const testCase of cases) {
      it(`should reject ${testCase.name} without calling PubMed`, async () => {
        const { app, upstream } = createTestApp();

        const response = await postJson(app, "/search", testCase.body);

        expect(response.status).toBe(400);
        expect(await response.json()).toEqual({
          success: false,
          error: testCase.error,
        });
        expect(upstream.callCount()).toBe(0);
      });
    }

    it("should accept a query of exactly 500 characters", async () => {
      const { app, upstream } = createTestApp();

      const response = await postJson(app, "/search", { query: "b".repeat(500) });

      expect(response.status).toBe(200);
      expect(upstream.callCount("esearch")).toBe(1);
    });

    it("should count the query length in characters, not UTF-16 units", async () => {
      const { app, upstream } = createTestApp();

      const response = await postJson(app, "/search", { query: "🧬".repeat(500) });

      expect(response.status).toBe(200);
      expect(upstream.callCount("esearch")).toBe(1);
    });

    it("should accept max_results at the upper bound", async () => {
      const { app, upstream } = createTestApp();

      await postJson(app, "/search", { query: "COVID-19 vaccine", max_results: 100 });

      expect(upstream.calls[0]?.params.retmax).toBe("100");
    });

    it("should reject a body that is not JSON", async () => {
      const { app, upstream } = createTestApp();

      const response = await postRaw(app, "/search", "{query: vaccine");

      expect(response.status).toBe(400);
      expect(await readError(response)).toBe("Request body must be valid JSON.");
      expect(upstream.callCount()).toBe(0);
    });
  });
});
