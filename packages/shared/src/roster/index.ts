/**
 * Committee Roster Extraction Engine
 *
 * Line classifier -> scan state machine -> member-line parser -> aggregator.
 */

export {
  SUBCOMMITTEE_SECTION_PATTERN,
  SECTION_NOISE_PHRASES,
  GROUP_MARKERS,
  MIN_HEADER_LENGTH,
  NUMBERED_MEMBER_PATTERN,
  UNNUMBERED_MEMBER_PATTERN,
  COVER_DATE_PATTERN,
  containsPhrase,
  isAllCaps,
  normalizeWhitespace,
  repairConcatenatedWords,
  repairTruncatedCommitteeName,
  memberKey,
  parseMemberKey,
  memberSlug,
  committeeSlug,
  extractCoverDate,
} from './patterns';
export { classifyLine, type LineClassification, type LineKind } from './classifier';
export { createScanState, applyClassification, type ScanState } from './scan-state';
export {
  parseMemberLine,
  matchNumberedEntries,
  matchUnnumberedEntries,
  type MemberLineParse,
  type MemberEntry,
} from './member-parser';
export { RosterAggregator, toRosterResult } from './aggregator';
export { scanRoster, sourceFromPages, pagesFromText, SCANNER_VERSION, type ScanOptions } from './scanner';
export {
  findMemberAssignments,
  summarizeMember,
  inspectPages,
  type MemberMatch,
  type MemberAssignmentSummary,
  type InspectionEntry,
  type InspectOptions,
} from './lookup';
export {
  buildRosterDocument,
  parseRosterDocument,
  serializeRosterDocument,
  ROSTER_DOCUMENT_SCHEMA_VERSION,
} from './document';
