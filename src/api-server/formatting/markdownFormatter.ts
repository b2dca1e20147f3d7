/**
 * @fileoverview Renders parsed PubMed articles as the markdown documents carried
 * in the `data` field of success envelopes. Pure string building; no I/O.
 * @module src/api-server/formatting/markdownFormatter
 */

import { PUBMED_ARTICLE_BASE_URL } from "../../services/NCBI/core/ncbiConstants.js";
import type {
  ParsedArticle,
  ParsedArticleAuthor,
  ParsedJournalInfo,
  ParsedJournalPublicationDate,
} from "../../types-global/pubmedXml.js";

export const LIST_AUTHOR_LIMIT = 3;
export const DETAIL_AUTHOR_LIMIT = 15;
export const ABSTRACT_PREVIEW_LENGTH = 200;
export const MESH_TERM_LIMIT = 10;

export function pubmedUrl(pmid: string): string {
  return `${PUBMED_ARTICLE_BASE_URL}/${pmid}/`;
}

/**
 * "Last Initials" for people, the group name for collective authors.
 */
export function formatAuthorName(
  author: ParsedArticleAuthor,
): string | undefined {
  if (author.collectiveName) return author.collectiveName;
  if (!author.lastName) return undefined;
  const given = author.initials ?? author.firstName;
  return given ? `${author.lastName} ${given}` : author.lastName;
}

/**
 * Comma-joined names of the first `limit` authors, followed by "et al." when
 * the list was cut.
 */
export function formatAuthorList(
  authors: readonly ParsedArticleAuthor[],
  limit: number,
): string {
  const names = authors
    .slice(0, limit)
    .map(formatAuthorName)
    .filter((name): name is string => Boolean(name));
  if (names.length === 0) return "Authors not available";
  return authors.length > limit
    ? `${names.join(", ")}, et al.`
    : names.join(", ");
}

/** MedlineDate wins over the Year/Month/Day parts. */
export function formatPublicationDate(
  date?: ParsedJournalPublicationDate,
): string {
  if (date?.medlineDate) return date.medlineDate;
  if (!date?.year) return "Date not available";
  const parts = [date.year];
  if (date.month) {
    parts.push(date.month);
    if (date.day) parts.push(date.day);
  }
  return parts.join(" ");
}

export function formatJournal(journal?: ParsedJournalInfo): string {
  const title = journal?.title;
  const iso = journal?.isoAbbreviation;
  if (title && iso && title !== iso) return `${title} (${iso})`;
  return title ?? iso ?? "Unknown journal";
}

/**
 * Collapses whitespace and cuts the text after `maxLength` characters
 * (code points), appending "..." when something was cut.
 */
export function abstractPreview(
  text: string,
  maxLength = ABSTRACT_PREVIEW_LENGTH,
): string {
  const characters = Array.from(text.replace(/\s+/g, " ").trim());
  if (characters.length <= maxLength) return characters.join("");
  return `${characters.slice(0, maxLength).join("")}...`;
}

export function formatArticleListEntry(
  article: ParsedArticle,
  index: number,
): string {
  const lines = [
    `${index}. **${article.title ?? "No title available"}**`,
    `   - **Authors:** ${formatAuthorList(article.authors, LIST_AUTHOR_LIMIT)}`,
    `   - **Journal:** ${article.journalInfo?.title ?? article.journalInfo?.isoAbbreviation ?? "Unknown journal"}`,
    `   - **Published:** ${formatPublicationDate(article.journalInfo?.publicationDate)}`,
    `   - **PMID:** ${article.pmid}`,
  ];
  if (article.abstractText) {
    lines.push(`   - **Abstract:** ${abstractPreview(article.abstractText)}`);
  }
  lines.push(`   - **PubMed URL:** ${pubmedUrl(article.pmid)}`);
  return lines.join("\n");
}

function formatArticleList(articles: readonly ParsedArticle[]): string {
  return articles
    .map((article, i) => formatArticleListEntry(article, i + 1))
    .join("\n\n");
}

export interface SearchResultsView {
  query: string;
  totalCount: number;
  articles: readonly ParsedArticle[];
}

export function formatSearchResults(view: SearchResultsView): string {
  const shown = view.articles.length;
  const header = [
    "# PubMed Search Results",
    "",
    `**Query:** ${view.query}`,
    `**Total matches:** ${view.totalCount.toLocaleString("en-US")}`,
    `**Showing:** ${shown} ${shown === 1 ? "result" : "results"}`,
  ].join("\n");
  return `${header}\n\n${formatArticleList(view.articles)}`;
}

export interface SimilarArticlesView {
  sourcePmid: string;
  articles: readonly ParsedArticle[];
}

export function formatSimilarArticles(view: SimilarArticlesView): string {
  const found = view.articles.length;
  const header = [
    `# Similar Articles to PMID ${view.sourcePmid}`,
    "",
    `**Found:** ${found} similar ${found === 1 ? "article" : "articles"}`,
  ].join("\n");
  return `${header}\n\n${formatArticleList(view.articles)}`;
}

/**
 * Full record for one PMID. Optional sections (DOI, publication types,
 * abstract, keywords, MeSH terms) appear only when the record has them.
 */
export function formatPublicationDetails(article: ParsedArticle): string {
  const meta = [
    `**Authors:** ${formatAuthorList(article.authors, DETAIL_AUTHOR_LIMIT)}`,
    `**Journal:** ${formatJournal(article.journalInfo)}`,
    `**Published:** ${formatPublicationDate(article.journalInfo?.publicationDate)}`,
    `**PMID:** ${article.pmid}`,
  ];
  if (article.doi) {
    meta.push(`**DOI:** ${article.doi}`);
  }
  if (article.publicationTypes.length > 0) {
    meta.push(`**Publication Types:** ${article.publicationTypes.join(", ")}`);
  }
  meta.push(`**PubMed URL:** ${pubmedUrl(article.pmid)}`);

  const sections = [
    `# Publication Details: PMID ${article.pmid}`,
    `## ${article.title ?? "No title available"}`,
    meta.join("\n"),
  ];
  if (article.abstractText) {
    sections.push(`## Abstract\n\n${article.abstractText}`);
  }
  if (article.keywords.length > 0) {
    sections.push(`**Keywords:** ${article.keywords.join(", ")}`);
  }
  const meshNames = article.meshTerms
    .slice(0, MESH_TERM_LIMIT)
    .flatMap((term) => (term.descriptorName ? [term.descriptorName] : []));
  if (meshNames.length > 0) {
    sections.push(`**MeSH Terms:** ${meshNames.join(", ")}`);
  }
  return sections.join("\n\n");
}
