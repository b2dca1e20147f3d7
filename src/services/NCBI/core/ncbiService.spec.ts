import { describe, it, expect } from "vitest";
import { createFakeEUtilities } from "../../../../spec/helpers/fakeEUtilities.js";
import { requestContextService } from "../../../utils/index.js";
import { createNcbiService } from "./ncbiService.js";

const scope = {
  context: requestContextService.createRequestContext({ operation: "ncbiServiceSpec" }),
};

function setup() {
  const upstream = createFakeEUtilities();
  const service = createNcbiService({ toolName: "TestTool", timeoutMs: 50 }, upstream.client);
  return { upstream, service };
}

describe("NcbiService", () => {
  describe("eSearch", () => {
    it("returns counts and ids", async () => {
      const { service } = setup();

      const result = await service.eSearch({ term: "COVID-19 vaccine", retmax: 3 }, scope);

      expect(result).toEqual({
        count: 1523,
        retmax: 3,
        retstart: 0,
        idList: ["31000001", "31000002", "31000003"],
        queryTranslation: "COVID-19 vaccine",
        phrasesNotFound: [],
      });
    });

    it("reports phrases PubMed could not match", async () => {
      const { service } = setup();

      const result = await service.eSearch({ term: "glorp", retmax: 5 }, scope);

      expect(result.count).toBe(0);
      expect(result.idList).toEqual([]);
      expect(result.phrasesNotFound).toEqual(["glorp"]);
    });
  });

  describe("eFetch", () => {
    it("returns records in the requested order", async () => {
      const { service } = setup();

      const articles = await service.eFetch({ ids: ["31000005", "31000002"] }, scope);

      expect(articles.map((a) => a.pmid)).toEqual(["31000005", "31000002"]);
    });

    it("leaves out ids without a record", async () => {
      const { service } = setup();

      const articles = await service.eFetch({ ids: ["39999999", "31000006"] }, scope);

      expect(articles.map((a) => a.pmid)).toEqual(["31000006"]);
    });

    it("does not call PubMed for an empty id list", async () => {
      const { upstream, service } = setup();

      expect(await service.eFetch({ ids: [] }, scope)).toEqual([]);
      expect(upstream.callCount()).toBe(0);
    });
  });

  describe("eLink", () => {
    it("returns neighbours without the source id", async () => {
      const { service } = setup();

      expect(await service.eLink({ id: "31000001" }, scope)).toEqual([
        "31000004",
        "31000005",
        "31000006",
        "31000007",
      ]);
    });
  });
});
