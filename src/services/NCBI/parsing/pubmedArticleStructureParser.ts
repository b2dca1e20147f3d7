/**
 * @fileoverview Helper functions for parsing detailed PubMed Article XML structures,
 * typically from EFetch results.
 * @module src/services/NCBI/parsing/pubmedArticleStructureParser
 */

import type {
  ParsedArticle,
  ParsedArticleAuthor,
  ParsedJournalInfo,
  ParsedMeshTerm,
  XmlAbstract,
  XmlArticle,
  XmlAuthorList,
  XmlJournal,
  XmlKeywordList,
  XmlMedlineCitation,
  XmlMeshHeadingList,
  XmlPubmedArticle,
  XmlPubmedArticleSet,
  XmlPublicationTypeList,
} from "../../../types-global/pubmedXml.js";
import {
  ensureArray,
  getAttribute,
  getText,
  isXmlObject,
} from "./xmlGenericHelpers.js";

/**
 * Extracts and formats author information from XML.
 */
export function extractAuthors(
  authorListXml?: XmlAuthorList,
): ParsedArticleAuthor[] {
  if (!isXmlObject(authorListXml)) return [];
  return ensureArray(authorListXml.Author).map((auth) => {
    const collectiveName = getText(auth.CollectiveName).trim();
    if (collectiveName) {
      return { collectiveName };
    }

    const affiliations = ensureArray(auth.AffiliationInfo);
    const affiliation = getText(affiliations[0]?.Affiliation).trim();
    return {
      lastName: getText(auth.LastName).trim() || undefined,
      firstName: getText(auth.ForeName).trim() || undefined, // XML uses ForeName
      initials: getText(auth.Initials).trim() || undefined,
      affiliation: affiliation || undefined,
    };
  });
}

/**
 * Extracts and formats journal information from XML.
 */
export function extractJournalInfo(
  journalXml?: XmlJournal,
  articleXml?: XmlArticle,
): ParsedJournalInfo | undefined {
  if (!isXmlObject(journalXml)) return undefined;

  const pubDate = journalXml.JournalIssue?.PubDate;
  const medlineDate = getText(pubDate?.MedlineDate).trim();

  return {
    title: getText(journalXml.Title).trim() || undefined,
    isoAbbreviation: getText(journalXml.ISOAbbreviation).trim() || undefined,
    volume: getText(journalXml.JournalIssue?.Volume) || undefined,
    issue: getText(journalXml.JournalIssue?.Issue) || undefined,
    pages: getText(articleXml?.Pagination?.MedlinePgn) || undefined,
    publicationDate: {
      year:
        getText(pubDate?.Year, medlineDate.match(/\d{4}/)?.[0] ?? "") ||
        undefined,
      month: getText(pubDate?.Month) || undefined,
      day: getText(pubDate?.Day) || undefined,
      medlineDate: medlineDate || undefined,
    },
  };
}

/**
 * Extracts MeSH descriptor names with their first qualifier.
 */
export function extractMeshTerms(
  meshHeadingListXml?: XmlMeshHeadingList,
): ParsedMeshTerm[] {
  if (!isXmlObject(meshHeadingListXml)) return [];
  return ensureArray(meshHeadingListXml.MeshHeading).flatMap((mh) => {
    const descriptorName = getText(mh.DescriptorName).trim();
    if (!descriptorName) return [];
    const firstQualifier = ensureArray(mh.QualifierName)[0];

    // MajorTopicYN may sit on the descriptor, the qualifier or the heading itself
    const isMajorTopic =
      getAttribute(mh, "MajorTopicYN") === "Y" ||
      getAttribute(mh.DescriptorName, "MajorTopicYN") === "Y" ||
      getAttribute(firstQualifier, "MajorTopicYN") === "Y";

    return [
      {
        descriptorName,
        qualifierName: getText(firstQualifier).trim() || undefined,
        isMajorTopic,
      },
    ];
  });
}

/**
 * Extracts DOI from various possible locations in the XML.
 * Prioritizes ELocationID with ValidYN="Y", then any ELocationID, then the
 * ArticleIdList of the article and of PubmedData.
 */
export function extractDoi(
  articleXml?: XmlArticle,
  pubmedArticleXml?: XmlPubmedArticle,
): string | undefined {
  const eLocationIDs = ensureArray(articleXml?.ELocationID);
  const doiLocations = eLocationIDs.filter(
    (eloc) => getAttribute(eloc, "EIdType") === "doi",
  );
  const preferred =
    doiLocations.find((eloc) => getAttribute(eloc, "ValidYN") === "Y") ??
    doiLocations[0];
  const fromELocation = getText(preferred).trim();
  if (fromELocation) return fromELocation;

  const articleIds = [
    ...ensureArray(articleXml?.ArticleIdList?.ArticleId),
    ...ensureArray(pubmedArticleXml?.PubmedData?.ArticleIdList?.ArticleId),
  ];
  for (const aid of articleIds) {
    if (getAttribute(aid, "IdType") === "doi") {
      const doi = getText(aid).trim();
      if (doi) return doi;
    }
  }
  return undefined;
}

export function extractPublicationTypes(
  publicationTypeListXml?: XmlPublicationTypeList,
): string[] {
  if (!isXmlObject(publicationTypeListXml)) return [];
  return ensureArray(publicationTypeListXml.PublicationType)
    .map((pt) => getText(pt).trim())
    .filter(Boolean);
}

/**
 * Extracts keywords from one or more KeywordList elements. Keywords repeated
 * across lists (compared case-insensitively) are kept once, first spelling wins.
 */
export function extractKeywords(
  keywordListsXml?: XmlKeywordList[] | XmlKeywordList,
): string[] {
  const seen = new Set<string>();
  const allKeywords: string[] = [];
  for (const list of ensureArray(keywordListsXml)) {
    if (!isXmlObject(list)) continue;
    for (const kw of ensureArray(list.Keyword)) {
      const keywordText = getText(kw).trim();
      const key = keywordText.toLowerCase();
      if (keywordText && !seen.has(key)) {
        seen.add(key);
        allKeywords.push(keywordText);
      }
    }
  }
  return allKeywords;
}

/**
 * Extracts abstract text from XML. Structured abstracts are joined section by
 * section, each prefixed with its Label when present.
 */
export function extractAbstractText(
  abstractXml?: XmlAbstract,
): string | undefined {
  if (!isXmlObject(abstractXml)) return undefined;

  const processedTexts = ensureArray(abstractXml.AbstractText)
    .map((at) => {
      const sectionText = getText(at).trim();
      const label = getAttribute(at, "Label").trim();
      if (label && sectionText) {
        return `${label}: ${sectionText}`;
      }
      return sectionText;
    })
    .filter(Boolean);

  if (processedTexts.length === 0) return undefined;
  return processedTexts.join("\n\n");
}

export function extractPmid(
  medlineCitationXml?: XmlMedlineCitation,
): string | undefined {
  return getText(medlineCitationXml?.PMID).trim() || undefined;
}

/**
 * Parses one PubmedArticle element. Returns `undefined` when it carries no PMID.
 */
export function parsePubmedArticle(
  pubmedArticleXml: XmlPubmedArticle,
): ParsedArticle | undefined {
  const citation = pubmedArticleXml.MedlineCitation;
  const pmid = extractPmid(citation);
  if (!citation || !pmid) return undefined;

  const article = isXmlObject(citation.Article) ? citation.Article : undefined;
  return {
    pmid,
    title: getText(article?.ArticleTitle).trim() || undefined,
    abstractText: extractAbstractText(article?.Abstract),
    authors: extractAuthors(article?.AuthorList),
    journalInfo: extractJournalInfo(article?.Journal, article),
    publicationTypes: extractPublicationTypes(article?.PublicationTypeList),
    keywords: extractKeywords(citation.KeywordList),
    meshTerms: extractMeshTerms(citation.MeshHeadingList),
    doi: extractDoi(article, pubmedArticleXml),
  };
}

/**
 * Parses every PubmedArticle of an EFetch PubmedArticleSet, skipping entries
 * without a PMID. An empty set yields an empty array.
 */
export function parsePubmedArticleSet(
  articleSetXml: XmlPubmedArticleSet | string | undefined,
): ParsedArticle[] {
  if (!isXmlObject(articleSetXml)) return [];
  return ensureArray(articleSetXml.PubmedArticle).flatMap((entry) => {
    const parsed = isXmlObject(entry) ? parsePubmedArticle(entry) : undefined;
    return parsed ? [parsed] : [];
  });
}
