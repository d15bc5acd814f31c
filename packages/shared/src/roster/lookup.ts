/**
 * Roster Lookup
 *
 * Read-only helpers built on the scanner's output: find a member's assignments,
 * summarize them, and inspect selected pages the way the classifier sees them.
 */

import type { AssignmentRecord, MemberKey, RosterResult, RosterSource } from '../types';
import { classifyLine } from './classifier';
import { applyClassification, createScanState } from './scan-state';

export interface MemberMatch {
  key: MemberKey;
  assignments: AssignmentRecord[];
}

export interface MemberAssignmentSummary {
  key: MemberKey;
  committees: Array<{ committee: string; rank: number; group: AssignmentRecord['group'] }>;
  subcommittees: Array<{ committee: string; subcommittee: string; group: AssignmentRecord['group'] }>;
  pages: number[];
}

export type InspectionEntry =
  | { page: number; kind: 'header'; role: 'committee' | 'subcommittee' | 'section'; text: string }
  | { page: number; kind: 'match'; text: string; previous: string | null; next: string | null };

export interface InspectOptions {
  /** Page numbers to inspect; all pages when omitted */
  pages?: number[];
  /** Case-sensitive text to look for in lines */
  needle?: string;
}

/**
 * Members whose key contains every whitespace-separated query token (case-insensitive).
 * Assignments come back ordered by page, ties kept in document order.
 */
export function findMemberAssignments(result: RosterResult, query: string): MemberMatch[] {
  const tokens = query.toLowerCase().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return [];

  return result.members
    .filter(key => {
      const lowered = key.toLowerCase();
      return tokens.every(token => lowered.includes(token));
    })
    .map(key => ({
      key,
      assignments: [...(result.memberAssignments[key] ?? [])].sort((a, b) => a.page - b.page),
    }));
}

/**
 * Split a member's assignments into main-committee seats and subcommittee seats.
 */
export function summarizeMember(key: MemberKey, assignments: AssignmentRecord[]): MemberAssignmentSummary {
  const summary: MemberAssignmentSummary = {
    key,
    committees: [],
    subcommittees: [],
    pages: [],
  };

  for (const assignment of assignments) {
    if (assignment.subcommittee === null) {
      summary.committees.push({
        committee: assignment.committee,
        rank: assignment.rank,
        group: assignment.group,
      });
    } else {
      summary.subcommittees.push({
        committee: assignment.committee,
        subcommittee: assignment.subcommittee,
        group: assignment.group,
      });
    }
    if (!summary.pages.includes(assignment.page)) {
      summary.pages.push(assignment.page);
    }
  }

  return summary;
}

/**
 * Walk the document with the real classifier and report headers and needle matches
 * on the selected pages. State is carried across all pages so header roles match
 * what a full scan would decide.
 */
export function inspectPages(source: RosterSource, options: InspectOptions = {}): InspectionEntry[] {
  const selected = options.pages ? new Set(options.pages) : null;
  const state = createScanState();
  const entries: InspectionEntry[] = [];

  for (const page of source.pages()) {
    const lines = page.lines.map(line => line.trim());
    const include = !selected || selected.has(page.pageNumber);

    lines.forEach((line, index) => {
      const classification = classifyLine(line, state);
      applyClassification(state, classification);

      if (!include) return;

      if (classification.kind === 'committee_header') {
        entries.push({ page: page.pageNumber, kind: 'header', role: classification.role, text: line });
      } else if (classification.kind === 'subcommittee_section_header') {
        entries.push({ page: page.pageNumber, kind: 'header', role: 'section', text: line });
      }

      if (options.needle && line.includes(options.needle)) {
        entries.push({
          page: page.pageNumber,
          kind: 'match',
          text: line,
          previous: index > 0 ? lines[index - 1] : null,
          next: index < lines.length - 1 ? lines[index + 1] : null,
        });
      }
    });
  }

  return entries;
}
