import { describe, it, expect } from "vitest";
import { requestContextService } from "../../../utils/index.js";
import { NcbiResponseHandler } from "../core/ncbiResponseHandler.js";
import { parsePubmedArticleSet } from "./pubmedArticleStructureParser.js";

const context = requestContextService.createRequestContext({ operation: "parserSpec" });
const handler = new NcbiResponseHandler();

function parseArticles(xml: string) {
  return parsePubmedArticleSet(
    handler.parseXmlResponse(xml, "efetch", context).PubmedArticleSet,
  );
}

const FULL_RECORD = `<?xml version="1.0" ?>
<PubmedArticleSet>
  <PubmedArticle>
    <MedlineCitation Status="MEDLINE" Owner="NLM">
      <PMID Version="1">00417</PMID>
      <Article PubModel="Print-Electronic">
        <Journal>
          <JournalIssue CitedMedium="Internet">
            <Volume>12</Volume>
            <Issue>3</Issue>
            <PubDate><MedlineDate>2019 Winter</MedlineDate></PubDate>
          </JournalIssue>
          <Title>Test Journal of Parsing</Title>
          <ISOAbbreviation>Test J Pars</ISOAbbreviation>
        </Journal>
        <ArticleTitle>Reading &amp; writing structured abstracts.</ArticleTitle>
        <Pagination><MedlinePgn>101-9</MedlinePgn></Pagination>
        <ELocationID EIdType="pii" ValidYN="Y">S0000-0000(19)00001-1</ELocationID>
        <ELocationID EIdType="doi" ValidYN="N">10.5555/old</ELocationID>
        <ELocationID EIdType="doi" ValidYN="Y">10.5555/current</ELocationID>
        <Abstract>
          <AbstractText Label="AIMS">Check parsing.</AbstractText>
          <AbstractText>Unlabelled tail.</AbstractText>
        </Abstract>
        <AuthorList CompleteYN="Y">
          <Author ValidYN="Y">
            <LastName>Ng</LastName>
            <ForeName>Ada</ForeName>
            <Initials>A</Initials>
            <AffiliationInfo><Affiliation>Test Institute</Affiliation></AffiliationInfo>
          </Author>
          <Author><CollectiveName>Parsing Consortium</CollectiveName></Author>
        </AuthorList>
        <PublicationTypeList>
          <PublicationType UI="D016428">Journal Article</PublicationType>
        </PublicationTypeList>
      </Article>
      <MeshHeadingList>
        <MeshHeading>
          <DescriptorName UI="D1" MajorTopicYN="N">Parsers</DescriptorName>
          <QualifierName UI="Q1" MajorTopicYN="Y">methods</QualifierName>
        </MeshHeading>
        <MeshHeading>
          <DescriptorName UI="D2" MajorTopicYN="N">Humans</DescriptorName>
        </MeshHeading>
      </MeshHeadingList>
      <KeywordList Owner="NOTNLM"><Keyword>XML</Keyword></KeywordList>
      <KeywordList Owner="NLM"><Keyword>xml</Keyword><Keyword>Abstracts</Keyword></KeywordList>
    </MedlineCitation>
  </PubmedArticle>
</PubmedArticleSet>`;

describe("parsePubmedArticleSet", () => {
  it("extracts every field of a full record", () => {
    const [article] = parseArticles(FULL_RECORD);

    expect(article).toEqual({
      pmid: "00417",
      title: "Reading & writing structured abstracts.",
      abstractText: "AIMS: Check parsing.\n\nUnlabelled tail.",
      authors: [
        {
          lastName: "Ng",
          firstName: "Ada",
          initials: "A",
          affiliation: "Test Institute",
        },
        { collectiveName: "Parsing Consortium" },
      ],
      journalInfo: {
        title: "Test Journal of Parsing",
        isoAbbreviation: "Test J Pars",
        volume: "12",
        issue: "3",
        pages: "101-9",
        publicationDate: {
          year: "2019",
          month: undefined,
          day: undefined,
          medlineDate: "2019 Winter",
        },
      },
      publicationTypes: ["Journal Article"],
      keywords: ["XML", "Abstracts"],
      meshTerms: [
        { descriptorName: "Parsers", qualifierName: "methods", isMajorTopic: true },
        { descriptorName: "Humans", qualifierName: undefined, isMajorTopic: false },
      ],
      doi: "10.5555/current",
    });
  });

  it("falls back to the ArticleIdList for the DOI", () => {
    const [article] = parseArticles(`<PubmedArticleSet><PubmedArticle>
      <MedlineCitation><PMID>5</PMID><Article><ArticleTitle>T</ArticleTitle></Article></MedlineCitation>
      <PubmedData><ArticleIdList>
        <ArticleId IdType="pubmed">5</ArticleId>
        <ArticleId IdType="doi">10.5555/from-id-list</ArticleId>
      </ArticleIdList></PubmedData>
    </PubmedArticle></PubmedArticleSet>`);

    expect(article?.doi).toBe("10.5555/from-id-list");
    expect(article?.authors).toEqual([]);
    expect(article?.abstractText).toBeUndefined();
  });

  it("skips entries without a PMID", () => {
    const articles = parseArticles(`<PubmedArticleSet>
      <PubmedArticle><MedlineCitation><Article><ArticleTitle>No id</ArticleTitle></Article></MedlineCitation></PubmedArticle>
      <PubmedArticle><MedlineCitation><PMID>7</PMID></MedlineCitation></PubmedArticle>
    </PubmedArticleSet>`);

    expect(articles.map((a) => a.pmid)).toEqual(["7"]);
  });

  it("returns an empty list for an empty set", () => {
    expect(parseArticles("<PubmedArticleSet></PubmedArticleSet>")).toEqual([]);
    expect(parsePubmedArticleSet(undefined)).toEqual([]);
  });
});
