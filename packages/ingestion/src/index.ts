/**
 * Document ingestion: trigger routing, section extraction and validation
 */

export { BIGGEST_ALLOWED_GAP, SIMILARITY_THRESHOLD, getMatchingBlocks, isValidSubset, subsetSimilarity } from './fuzzy.js';
export type { MatchingBlock } from './fuzzy.js';
export { createSectionExtractor, SECTION_EXTRACTOR_AGENT } from './extractor.js';
export type { SectionExtractor, SectionExtractorDeps } from './extractor.js';
export {
  IngestionOrchestrator,
  isSelectedDocument,
  ALLOWED_DOC_CATEGORIES,
  ALLOWED_DOC_TYPES,
  ALLOWED_MIME_TYPES,
  PLACEHOLDER_CASE_URN,
} from './orchestrator.js';
export type { IngestionOrchestratorDeps } from './orchestrator.js';
export { parseTrigger } from './trigger.js';
export { TRIGGER_TYPES, emptyResult, failedResult, mergeIds } from './types.js';
export type { IngestionResult, IngestionTrigger } from './types.js';
