/**
 * @fileoverview Barrel file for NCBI XML parsing helper utilities.
 * Re-exports functions from more specific parser modules.
 * @module src/services/NCBI/parsing/index
 */

export * from "./xmlGenericHelpers.js";
export * from "./pubmedArticleStructureParser.js";
export * from "./eLinkResultParser.js";
