/**
 * Line Classifier
 *
 * Decides what one trimmed roster line is, given the current scan state.
 * Check order matters: subcommittee section headers and noise phrases are
 * themselves all caps and would otherwise be read as committee names.
 */

import type { Group } from '../types';
import type { ScanState } from './scan-state';
import {
  SUBCOMMITTEE_SECTION_PATTERN,
  SECTION_NOISE_PHRASES,
  GROUP_MARKERS,
  MIN_HEADER_LENGTH,
  containsPhrase,
  isAllCaps,
  repairTruncatedCommitteeName,
} from './patterns';

export type LineClassification =
  | { kind: 'blank' }
  | { kind: 'subcommittee_section_header'; committee: string | null }
  | { kind: 'committee_header'; name: string; role: 'committee' | 'subcommittee' }
  | { kind: 'group_marker'; group: Group; phrase: string }
  | { kind: 'section_noise'; phrase: string }
  | { kind: 'assignment_candidate'; line: string };

export type LineKind = LineClassification['kind'];

export function classifyLine(rawLine: string, state: Readonly<ScanState>): LineClassification {
  const line = rawLine.trim();

  if (!line) {
    return { kind: 'blank' };
  }

  const sectionMatch = line.match(SUBCOMMITTEE_SECTION_PATTERN);
  if (sectionMatch) {
    const owner = sectionMatch[1].trim();
    return {
      kind: 'subcommittee_section_header',
      committee: owner ? repairTruncatedCommitteeName(owner) : null,
    };
  }

  if (!isHeaderShaped(line)) {
    return { kind: 'assignment_candidate', line };
  }

  const phrase = SECTION_NOISE_PHRASES.find(p => containsPhrase(line, p));
  if (phrase) {
    const marker = GROUP_MARKERS.find(m => containsPhrase(line, m.phrase));
    if (marker) {
      return { kind: 'group_marker', group: marker.group, phrase: marker.phrase };
    }
    return { kind: 'section_noise', phrase };
  }

  return {
    kind: 'committee_header',
    name: line,
    role: state.inSubcommitteeSection && state.currentCommittee ? 'subcommittee' : 'committee',
  };
}

/**
 * All caps, long enough, and not a stray "SUBCOMMITTEE..." line
 */
function isHeaderShaped(line: string): boolean {
  return isAllCaps(line) && line.length >= MIN_HEADER_LENGTH && !line.startsWith('SUBCOMMITTEE');
}
