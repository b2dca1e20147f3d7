/**
 * @fileoverview Parses ELink (`cmd=neighbor`) results into linked PMID lists.
 * @module src/services/NCBI/parsing/eLinkResultParser
 */

import type { XmlELinkResult } from "../../../types-global/pubmedXml.js";
import { ensureArray, getText, isXmlObject } from "./xmlGenericHelpers.js";

/**
 * Collects the ids linked under `linkName`, in the order NCBI ranked them.
 * Duplicates across link sets are dropped; ids equal to `excludeId` are skipped.
 */
export function extractLinkedIds(
  eLinkResultXml: XmlELinkResult | string | undefined,
  linkName: string,
  excludeId?: string,
): string[] {
  if (!isXmlObject(eLinkResultXml)) return [];

  const seen = new Set<string>();
  const ids: string[] = [];
  for (const linkSet of ensureArray(eLinkResultXml.LinkSet)) {
    if (!isXmlObject(linkSet)) continue;
    for (const linkSetDb of ensureArray(linkSet.LinkSetDb)) {
      if (!isXmlObject(linkSetDb) || getText(linkSetDb.LinkName) !== linkName) {
        continue;
      }
      for (const link of ensureArray(linkSetDb.Link)) {
        const id = isXmlObject(link) ? getText(link.Id).trim() : "";
        if (id && id !== excludeId && !seen.has(id)) {
          seen.add(id);
          ids.push(id);
        }
      }
    }
  }
  return ids;
}
