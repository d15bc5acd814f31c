/**
 * Member-Line Parser
 *
 * Turns an assignment candidate line into zero or more assignment records.
 * Two rules, tried in order:
 * - numbered: "3. Pete Sessions, TX" (main committee listings; several per line allowed)
 * - unnumbered: "Pete Sessions, TX Juan Vargas, CA" (subcommittee rosters only)
 *
 * The unnumbered rule assigns groups by column position: the first entry on a line
 * is Majority and every later one Minority. The linearized text carries no other
 * signal, so this stays an approximation and is never reported as a certainty.
 */

import type { AssignmentRecord, Group, Member, MemberLineRule } from '../types';
import type { ScanState } from './scan-state';
import {
  NUMBERED_MEMBER_PATTERN,
  UNNUMBERED_MEMBER_PATTERN,
  normalizeWhitespace,
  repairConcatenatedWords,
} from './patterns';

export interface MemberLineParse {
  records: AssignmentRecord[];
  /** Rule that matched, or null when the line holds no member entries */
  rule: MemberLineRule | null;
  /** Entries matched while no committee was current; they produce no record */
  orphans: number;
}

export interface MemberEntry {
  member: Member;
  rank: number;
  group: Group;
}

// A name group of whitespace alone ("1. , TX") is not an entry
function hasName(entry: MemberEntry): boolean {
  return entry.member.name !== '';
}

/**
 * Numbered entries. Rank is the listed number, group is the current section's.
 */
export function matchNumberedEntries(line: string, group: Group): MemberEntry[] {
  return Array.from(line.matchAll(NUMBERED_MEMBER_PATTERN), (match): MemberEntry => ({
    member: {
      name: normalizeWhitespace(match[2]),
      state: match[3],
    },
    rank: parseInt(match[1], 10),
    group,
  })).filter(hasName);
}

/**
 * Unnumbered entries, left column Majority, later columns Minority.
 */
export function matchUnnumberedEntries(line: string): MemberEntry[] {
  return Array.from(line.matchAll(UNNUMBERED_MEMBER_PATTERN), (match, index): MemberEntry => ({
    member: {
      name: repairConcatenatedWords(normalizeWhitespace(match[1])),
      state: match[2],
    },
    rank: 0,
    group: index === 0 ? 'Majority' : 'Minority',
  })).filter(hasName);
}

function buildRecord(
  entry: MemberEntry,
  committee: string,
  subcommittee: string | null,
  page: number,
  sourceLine: string
): AssignmentRecord {
  return Object.freeze({
    committee,
    subcommittee,
    rank: entry.rank,
    page,
    group: entry.group,
    sourceLine,
    member: Object.freeze({ ...entry.member }),
  });
}

/**
 * Parse one assignment candidate line against the current scan state.
 */
export function parseMemberLine(rawLine: string, state: Readonly<ScanState>, page: number): MemberLineParse {
  const line = rawLine.trim();

  let rule: MemberLineRule = 'numbered';
  let entries = matchNumberedEntries(line, state.currentGroup);

  if (entries.length === 0 && state.currentSubcommittee) {
    rule = 'unnumbered';
    entries = matchUnnumberedEntries(line);
  }

  if (entries.length === 0) {
    return { records: [], rule: null, orphans: 0 };
  }

  const committee = state.currentCommittee;
  if (!committee) {
    return { records: [], rule, orphans: entries.length };
  }

  return {
    records: entries.map(entry => buildRecord(entry, committee, state.currentSubcommittee, page, line)),
    rule,
    orphans: 0,
  };
}
