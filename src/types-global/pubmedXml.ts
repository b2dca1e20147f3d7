/**
 * @fileoverview Global TypeScript type definitions for PubMed XML structures.
 * These types describe the objects fast-xml-parser builds from ESearch, EFetch
 * and ELink responses, plus the application-level records they are parsed into.
 * Attributes carry the `@_` prefix; tag values are kept as strings.
 * @module src/types-global/pubmedXml
 */

// Basic type for elements that primarily contain text but might have attributes
export interface XmlTextElement {
  "#text"?: string;
  [key: string]: unknown;
}

/** Text-only elements parse to a string, elements with attributes to an object. */
export type XmlText = XmlTextElement | string;

export interface XmlAuthor {
  LastName?: XmlText;
  ForeName?: XmlText;
  Initials?: XmlText;
  AffiliationInfo?: {
    Affiliation?: XmlText;
  }[];
  CollectiveName?: XmlText; // For group authors
}

export interface XmlAuthorList {
  Author?: XmlAuthor[] | XmlAuthor;
  "@_CompleteYN"?: "Y" | "N";
}

export interface XmlPublicationTypeList {
  PublicationType?: XmlText[] | XmlText;
}

export interface XmlArticleIdList {
  ArticleId?: XmlText[] | XmlText;
}

export interface XmlAbstract {
  AbstractText?: XmlText[] | XmlText;
  CopyrightInformation?: XmlText;
}

export interface XmlPagination {
  MedlinePgn?: XmlText;
}

export interface XmlPubDate {
  Year?: XmlText;
  Month?: XmlText;
  Day?: XmlText;
  MedlineDate?: XmlText; // e.g., "2000 Spring", "1999-2000"
}

export interface XmlJournalIssue {
  Volume?: XmlText;
  Issue?: XmlText;
  PubDate?: XmlPubDate;
}

export interface XmlJournal {
  JournalIssue?: XmlJournalIssue;
  Title?: XmlText; // Full Journal Title
  ISOAbbreviation?: XmlText;
}

export interface XmlArticle {
  Journal?: XmlJournal;
  ArticleTitle?: XmlText;
  Pagination?: XmlPagination;
  ELocationID?: XmlText[] | XmlText;
  Abstract?: XmlAbstract;
  AuthorList?: XmlAuthorList;
  PublicationTypeList?: XmlPublicationTypeList;
  ArticleIdList?: XmlArticleIdList;
}

export interface XmlMeshHeading {
  DescriptorName?: XmlText;
  QualifierName?: XmlText[] | XmlText;
  "@_MajorTopicYN"?: "Y" | "N";
}

export interface XmlMeshHeadingList {
  MeshHeading?: XmlMeshHeading[] | XmlMeshHeading;
}

export interface XmlKeywordList {
  Keyword?: XmlText[] | XmlText;
  "@_Owner"?: string;
}

export interface XmlMedlineCitation {
  PMID?: XmlText;
  Article?: XmlArticle;
  MeshHeadingList?: XmlMeshHeadingList;
  KeywordList?: XmlKeywordList[] | XmlKeywordList;
}

export interface XmlPubmedArticle {
  MedlineCitation?: XmlMedlineCitation;
  PubmedData?: {
    ArticleIdList?: XmlArticleIdList;
  };
}

export interface XmlPubmedArticleSet {
  PubmedArticle?: XmlPubmedArticle[];
}

// ESearch specific types
export interface ESearchErrorList {
  PhraseNotFound?: XmlText[] | XmlText;
  FieldNotFound?: XmlText[] | XmlText;
}

export interface ESearchResultContent {
  Count?: string;
  RetMax?: string;
  RetStart?: string;
  IdList?: { Id?: string[] } | string;
  QueryTranslation?: XmlText;
  ErrorList?: ESearchErrorList;
  ERROR?: XmlText;
}

// ELink specific types
export interface XmlELinkLink {
  Id?: XmlText;
}

export interface XmlELinkSetDb {
  DbTo?: string;
  LinkName?: string;
  Link?: XmlELinkLink[];
}

export interface XmlELinkSet {
  DbFrom?: string;
  IdList?: { Id?: XmlText[] | XmlText };
  LinkSetDb?: XmlELinkSetDb[];
  ERROR?: XmlText;
}

export interface XmlELinkResult {
  LinkSet?: XmlELinkSet[];
  ERROR?: XmlText;
}

/**
 * Root of any parsed E-utility XML document. Only one of the roots is present
 * per response; an empty root element parses to an empty string.
 */
export interface NcbiXmlDocument {
  eSearchResult?: ESearchResultContent | string;
  PubmedArticleSet?: XmlPubmedArticleSet | string;
  eLinkResult?: XmlELinkResult | string;
  eFetchResult?: { ERROR?: XmlText } | string;
  ERROR?: XmlText;
}

// Parsed object types (for application use, derived from XML types)

export interface ParsedArticleAuthor {
  lastName?: string;
  firstName?: string;
  initials?: string;
  affiliation?: string;
  collectiveName?: string;
}

export interface ParsedJournalPublicationDate {
  year?: string;
  month?: string;
  day?: string;
  medlineDate?: string;
}

export interface ParsedJournalInfo {
  title?: string;
  isoAbbreviation?: string;
  volume?: string;
  issue?: string;
  pages?: string;
  publicationDate?: ParsedJournalPublicationDate;
}

export interface ParsedMeshTerm {
  descriptorName?: string;
  qualifierName?: string;
  isMajorTopic: boolean;
}

export interface ParsedArticle {
  pmid: string;
  title?: string;
  abstractText?: string;
  authors: ParsedArticleAuthor[];
  journalInfo?: ParsedJournalInfo;
  publicationTypes: string[];
  keywords: string[];
  meshTerms: ParsedMeshTerm[];
  doi?: string;
}

// Fully parsed and typed result for ESearch
export interface ESearchResult {
  count: number;
  retmax: number;
  retstart: number;
  idList: string[];
  queryTranslation?: string;
  phrasesNotFound: string[];
}
