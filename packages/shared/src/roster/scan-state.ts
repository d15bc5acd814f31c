/**
 * Scan State Machine
 *
 * Context carried forward line to line during one document pass.
 * Only advanced, never rolled back.
 */

import type { Group } from '../types';
import type { LineClassification } from './classifier';

export interface ScanState {
  currentCommittee: string | null;
  currentSubcommittee: string | null;
  inSubcommitteeSection: boolean;
  currentGroup: Group;
}

export function createScanState(): ScanState {
  return {
    currentCommittee: null,
    currentSubcommittee: null,
    inSubcommitteeSection: false,
    currentGroup: 'Majority',
  };
}

/**
 * Apply a classifier decision to the state. Returns true when the state changed.
 */
export function applyClassification(state: ScanState, classification: LineClassification): boolean {
  switch (classification.kind) {
    case 'subcommittee_section_header':
      if (classification.committee) {
        state.currentCommittee = classification.committee;
      }
      state.currentSubcommittee = null;
      state.inSubcommitteeSection = true;
      return true;

    case 'committee_header':
      if (classification.role === 'subcommittee') {
        state.currentSubcommittee = classification.name;
      } else {
        state.currentCommittee = classification.name;
        state.currentSubcommittee = null;
        state.inSubcommitteeSection = false;
        state.currentGroup = 'Majority';
      }
      return true;

    case 'group_marker':
      state.currentGroup = classification.group;
      return true;

    case 'blank':
    case 'section_noise':
    case 'assignment_candidate':
      return false;
  }
}
