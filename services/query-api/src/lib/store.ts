/**
 * Roster Store
 *
 * In-memory read model over one persisted roster document, with slug lookups
 * for committees and members.
 */

import fs from 'fs';
import {
  committeeSlug,
  logger,
  memberSlug,
  parseMemberKey,
  parseRosterDocument,
  type CommitteeDetail,
  type CommitteeSummary,
  type MemberDetail,
  type MemberKey,
  type MemberSummary,
  type RosterDocument,
} from '@committee-roster/shared';

export interface MemberSearch {
  /** Case-insensitive substring of the member's name */
  name?: string;
  /** Two-letter state code, any case */
  state?: string;
}

export class RosterStore {
  private readonly committeeNames: string[];
  private readonly committeesBySlug = new Map<string, string>();
  private readonly membersBySlug = new Map<string, MemberKey>();

  constructor(readonly document: RosterDocument) {
    const { committees, subcommittees, members } = document.result;

    // Committees with only subcommittee rosters still get an entry
    this.committeeNames = [...new Set([...Object.keys(committees), ...Object.keys(subcommittees)])];
    for (const name of this.committeeNames) {
      this.committeesBySlug.set(committeeSlug(name), name);
    }

    for (const key of members) {
      this.membersBySlug.set(memberSlug(key), key);
    }
  }

  listCommittees(): CommitteeSummary[] {
    const { committees, subcommittees } = this.document.result;
    return this.committeeNames.map(name => ({
      name,
      slug: committeeSlug(name),
      memberCount: committees[name]?.length ?? 0,
      subcommittees: Object.keys(subcommittees[name] ?? {}),
    }));
  }

  getCommittee(slug: string): CommitteeDetail | null {
    const name = this.committeesBySlug.get(slug.toLowerCase());
    if (!name) return null;

    const { committees, subcommittees } = this.document.result;
    return {
      name,
      slug: committeeSlug(name),
      members: [...(committees[name] ?? [])],
      subcommittees: { ...(subcommittees[name] ?? {}) },
    };
  }

  searchMembers(search: MemberSearch, limit: number): MemberSummary[] {
    const name = search.name?.trim().toLowerCase();
    const state = search.state?.toUpperCase();
    const items: MemberSummary[] = [];

    for (const key of this.document.result.members) {
      if (items.length >= limit) break;

      const member = parseMemberKey(key);
      if (!member) continue;
      if (name && !member.name.toLowerCase().includes(name)) continue;
      if (state && member.state !== state) continue;

      items.push({
        key,
        slug: memberSlug(key),
        name: member.name,
        state: member.state,
        assignmentCount: this.document.result.memberAssignments[key]?.length ?? 0,
      });
    }

    return items;
  }

  getMember(slug: string): MemberDetail | null {
    const key = this.membersBySlug.get(slug.toLowerCase());
    if (!key) return null;

    const member = parseMemberKey(key);
    if (!member) return null;

    return {
      key,
      slug: memberSlug(key),
      name: member.name,
      state: member.state,
      assignments: [...(this.document.result.memberAssignments[key] ?? [])],
    };
  }
}

/**
 * Read and validate a roster document from disk.
 *
 * @throws Error when the file is missing or the document is invalid
 */
export function loadRosterStore(filePath: string): RosterStore {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Roster document not found: ${filePath}`);
  }

  const document = parseRosterDocument(fs.readFileSync(filePath, 'utf-8'));
  logger.info('Roster document loaded', {
    filePath,
    source: document.source,
    status: document.status,
    cover_date: document.coverDate,
    members: document.result.members.length,
  });

  return new RosterStore(document);
}
