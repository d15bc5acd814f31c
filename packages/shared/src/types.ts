/**
 * Shared TypeScript Types
 *
 * Types for the committee roster extraction engine, matching the JSON schema in docs/contracts/
 */

// ============================================================================
// Members & Groups
// ============================================================================

export type Group = 'Majority' | 'Minority';

export interface Member {
  /** Whitespace-normalized display name, punctuation preserved */
  name: string;
  /** Two-letter state code */
  state: string;
}

/** Serialized member identity: "<name>, <state>" */
export type MemberKey = string;

// ============================================================================
// Assignment Records
// ============================================================================

export interface AssignmentRecord {
  committee: string;
  subcommittee: string | null;
  /** Explicit rank from a numbered listing, 0 when unranked */
  rank: number;
  /** 1-based source page */
  page: number;
  group: Group;
  sourceLine: string;
  member: Member;
}

/** Which member-line rule produced a record */
export type MemberLineRule = 'numbered' | 'unnumbered';

// ============================================================================
// Source Pages
// ============================================================================

export interface RosterPage {
  pageNumber: number;
  lines: string[];
}

/**
 * Page text provider consumed by the scanner.
 * pages() must be restartable: each call yields the document from page 1.
 */
export interface RosterSource {
  pages(): Iterable<RosterPage>;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

// ============================================================================
// Aggregate Views
// ============================================================================

export type CommitteeIndex = Record<string, MemberKey[]>;

export type SubcommitteeIndex = Record<string, Record<string, MemberKey[]>>;

export type MemberIndex = Record<MemberKey, AssignmentRecord[]>;

export interface RosterResult {
  committees: CommitteeIndex;
  subcommittees: SubcommitteeIndex;
  /** All member keys, sorted */
  members: MemberKey[];
  memberAssignments: MemberIndex;
}

export interface RosterSnapshot extends RosterResult {
  /** Every record in production order */
  records: AssignmentRecord[];
}

// ============================================================================
// Scan Report
// ============================================================================

export type ScanStatus = 'success' | 'degraded';

export interface ScanStats {
  pages: number;
  emptyPages: number;
  lines: number;
  records: number;
  committees: number;
  subcommittees: number;
  members: number;
  /** Member lines seen before any committee header */
  orphanLines: number;
  /** Lines whose processing threw and were dropped */
  failedLines: number;
}

export interface ScanReport {
  status: ScanStatus;
  warnings: string[];
  /** Cover date from page 1 as YYYY-MM-DD */
  coverDate: string | null;
  stats: ScanStats;
}

export interface RosterScan {
  result: RosterResult;
  records: AssignmentRecord[];
  report: ScanReport;
}

// ============================================================================
// Persisted Document
// ============================================================================

export interface RosterDocument {
  schemaVersion: string;
  source: string;
  extractedAt: string;
  coverDate: string | null;
  status: ScanStatus;
  warnings: string[];
  result: RosterResult;
}

// ============================================================================
// API Types
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}

export interface CommitteeSummary {
  name: string;
  slug: string;
  memberCount: number;
  subcommittees: string[];
}

export interface CommitteeDetail {
  name: string;
  slug: string;
  members: MemberKey[];
  subcommittees: Record<string, MemberKey[]>;
}

export interface MemberSummary {
  key: MemberKey;
  slug: string;
  name: string;
  state: string;
  assignmentCount: number;
}

export interface MemberDetail extends Omit<MemberSummary, 'assignmentCount'> {
  assignments: AssignmentRecord[];
}

export interface ListResponse<T> {
  items: T[];
}
