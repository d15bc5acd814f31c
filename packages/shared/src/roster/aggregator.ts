/**
 * Roster Aggregator
 *
 * Accumulates assignment records into the committee, subcommittee and member
 * views. Lists keep insertion order (the document's own ranking); nothing is
 * sorted except the global member list in the snapshot.
 *
 * One aggregator per document pass by default. Sharing one across documents
 * unifies members by key, which is the caller's choice.
 */

import type {
  AssignmentRecord,
  MemberKey,
  RosterResult,
  RosterSnapshot,
  CommitteeIndex,
  SubcommitteeIndex,
  MemberIndex,
} from '../types';
import { memberKey } from './patterns';

function getOrCreate<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  let value = map.get(key);
  if (value === undefined) {
    value = create();
    map.set(key, value);
  }
  return value;
}

function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class RosterAggregator {
  private readonly committees = new Map<string, MemberKey[]>();
  private readonly subcommittees = new Map<string, Map<string, MemberKey[]>>();
  private readonly memberAssignments = new Map<MemberKey, AssignmentRecord[]>();
  private readonly allMembers = new Set<MemberKey>();
  private readonly records: AssignmentRecord[] = [];

  /**
   * Add one record to every view it belongs to.
   */
  record(record: AssignmentRecord): void {
    const key = memberKey(record.member);

    if (record.subcommittee !== null) {
      const bySubcommittee = getOrCreate(this.subcommittees, record.committee, () => new Map<string, MemberKey[]>());
      getOrCreate(bySubcommittee, record.subcommittee, () => []).push(key);
    } else {
      getOrCreate(this.committees, record.committee, () => []).push(key);
    }

    getOrCreate(this.memberAssignments, key, () => []).push(record);
    this.allMembers.add(key);
    this.records.push(record);
  }

  get recordCount(): number {
    return this.records.length;
  }

  get memberCount(): number {
    return this.allMembers.size;
  }

  /**
   * Frozen snapshot of all views. Built from copies, so later record() calls leave it untouched.
   */
  finalize(): RosterSnapshot {
    const committees: CommitteeIndex = {};
    for (const [committee, keys] of this.committees) {
      committees[committee] = [...keys];
    }

    const subcommittees: SubcommitteeIndex = {};
    for (const [committee, bySubcommittee] of this.subcommittees) {
      const entry: Record<string, MemberKey[]> = {};
      for (const [subcommittee, keys] of bySubcommittee) {
        entry[subcommittee] = [...keys];
      }
      subcommittees[committee] = entry;
    }

    const memberAssignments: MemberIndex = {};
    for (const [key, records] of this.memberAssignments) {
      memberAssignments[key] = [...records];
    }

    return Object.freeze({
      committees,
      subcommittees,
      members: [...this.allMembers].sort(compareCodePoints),
      memberAssignments,
      records: [...this.records],
    });
  }
}

/**
 * Drop the record list from a snapshot, leaving the serializable result.
 */
export function toRosterResult(snapshot: RosterSnapshot): RosterResult {
  const { committees, subcommittees, members, memberAssignments } = snapshot;
  return { committees, subcommittees, members, memberAssignments };
}
