/**
 * Line Classifier and Scan State Tests
 */

import { classifyLine, createScanState, applyClassification, type ScanState } from '@committee-roster/shared';

function inSection(committee: string | null): ScanState {
  return {
    currentCommittee: committee,
    currentSubcommittee: null,
    inSubcommitteeSection: true,
    currentGroup: 'Majority',
  };
}

describe('Line Classifier', () => {
  it('should classify whitespace-only lines as blank', () => {
    expect(classifyLine('   ', createScanState())).toEqual({ kind: 'blank' });
  });

  describe('subcommittee section headers', () => {
    it('should extract the owning committee', () => {
      expect(classifyLine('SUBCOMMITTEES OF THE COMMITTEE ON RULES', createScanState())).toEqual({
        kind: 'subcommittee_section_header',
        committee: 'RULES',
      });
    });

    it('should match case-insensitively and in the singular', () => {
      expect(classifyLine('Subcommittee of the Committee on Rules', createScanState())).toEqual({
        kind: 'subcommittee_section_header',
        committee: 'Rules',
      });
    });

    it('should repair a truncated committee name', () => {
      expect(classifyLine('SUBCOMMITTEES OF THE COMMITTEE ON OVERSIGHT AND', createScanState())).toEqual({
        kind: 'subcommittee_section_header',
        committee: 'OVERSIGHT AND ACCOUNTABILITY',
      });
    });

    it('should report no committee when the name is missing', () => {
      expect(classifyLine('SUBCOMMITTEES OF THE COMMITTEE ON', createScanState())).toEqual({
        kind: 'subcommittee_section_header',
        committee: null,
      });
    });
  });

  describe('headers', () => {
    it('should read an all-caps line outside a section as a main committee', () => {
      expect(classifyLine('  RULES  ', createScanState())).toEqual({
        kind: 'committee_header',
        name: 'RULES',
        role: 'committee',
      });
    });

    it('should read an all-caps line inside a section as a subcommittee', () => {
      expect(classifyLine('ELECTIONS', inSection('HOUSE ADMINISTRATION'))).toEqual({
        kind: 'committee_header',
        name: 'ELECTIONS',
        role: 'subcommittee',
      });
    });

    it('should fall back to a main committee when the section has no committee', () => {
      expect(classifyLine('ELECTIONS', inSection(null))).toEqual({
        kind: 'committee_header',
        name: 'ELECTIONS',
        role: 'committee',
      });
    });

    it('should not treat a noise word inside another word as noise', () => {
      expect(classifyLine('HOUSE ADMINISTRATION', createScanState())).toEqual({
        kind: 'committee_header',
        name: 'HOUSE ADMINISTRATION',
        role: 'committee',
      });
    });

    it('should not treat all-caps lines of three characters or fewer as headers', () => {
      expect(classifyLine('XYZ', createScanState())).toEqual({ kind: 'assignment_candidate', line: 'XYZ' });
      expect(classifyLine('TX', createScanState())).toEqual({ kind: 'assignment_candidate', line: 'TX' });
      expect(classifyLine('WXYZ', createScanState())).toEqual({
        kind: 'committee_header',
        name: 'WXYZ',
        role: 'committee',
      });
    });

    it('should not treat a stray SUBCOMMITTEE line as a header', () => {
      expect(classifyLine('SUBCOMMITTEE ROSTERS', createScanState())).toEqual({
        kind: 'assignment_candidate',
        line: 'SUBCOMMITTEE ROSTERS',
      });
    });
  });

  describe('noise and group markers', () => {
    it('should classify majority and minority markers', () => {
      expect(classifyLine('MAJORITY', createScanState())).toEqual({
        kind: 'group_marker',
        group: 'Majority',
        phrase: 'MAJORITY',
      });
      expect(classifyLine('MINORITY MEMBERS', createScanState())).toEqual({
        kind: 'group_marker',
        group: 'Minority',
        phrase: 'MINORITY',
      });
    });

    it('should prefer the majority marker when both appear', () => {
      expect(classifyLine('MAJORITY AND MINORITY', createScanState())).toEqual({
        kind: 'group_marker',
        group: 'Majority',
        phrase: 'MAJORITY',
      });
    });

    it('should classify boilerplate as noise with the first listed phrase', () => {
      expect(classifyLine('RATIO 4/2', createScanState())).toEqual({ kind: 'section_noise', phrase: 'RATIO' });
      expect(classifyLine('ONE HUNDRED NINETEENTH CONGRESS', createScanState())).toEqual({
        kind: 'section_noise',
        phrase: 'ONE HUNDRED',
      });
    });

    it('should pass mixed-case boilerplate through as a candidate', () => {
      expect(classifyLine('Ratio 3/2', createScanState())).toEqual({
        kind: 'assignment_candidate',
        line: 'Ratio 3/2',
      });
    });
  });

  it('should forward member lines as assignment candidates', () => {
    expect(classifyLine('3. Pete Sessions, TX', createScanState())).toEqual({
      kind: 'assignment_candidate',
      line: '3. Pete Sessions, TX',
    });
  });
});

describe('Scan State Machine', () => {
  it('should start with no context and the majority group', () => {
    expect(createScanState()).toEqual({
      currentCommittee: null,
      currentSubcommittee: null,
      inSubcommitteeSection: false,
      currentGroup: 'Majority',
    });
  });

  it('should enter a subcommittee section for the named committee', () => {
    const state = createScanState();
    const changed = applyClassification(state, classifyLine('SUBCOMMITTEES OF THE COMMITTEE ON RULES', state));

    expect(changed).toBe(true);
    expect(state).toEqual({
      currentCommittee: 'RULES',
      currentSubcommittee: null,
      inSubcommitteeSection: true,
      currentGroup: 'Majority',
    });
  });

  it('should keep the current committee when a section header names none', () => {
    const state: ScanState = { ...createScanState(), currentCommittee: 'RULES' };
    applyClassification(state, { kind: 'subcommittee_section_header', committee: null });

    expect(state.currentCommittee).toBe('RULES');
    expect(state.inSubcommitteeSection).toBe(true);
  });

  it('should leave the group unchanged on a section header', () => {
    const state: ScanState = { ...createScanState(), currentGroup: 'Minority' };
    applyClassification(state, { kind: 'subcommittee_section_header', committee: 'RULES' });

    expect(state.currentGroup).toBe('Minority');
  });

  it('should set the subcommittee on a subcommittee header', () => {
    const state = inSection('RULES');
    applyClassification(state, { kind: 'committee_header', name: 'LEGISLATIVE AND BUDGET PROCESS', role: 'subcommittee' });

    expect(state.currentCommittee).toBe('RULES');
    expect(state.currentSubcommittee).toBe('LEGISLATIVE AND BUDGET PROCESS');
    expect(state.inSubcommitteeSection).toBe(true);
  });

  it('should reset subcommittee, section and group on a new main committee', () => {
    const state: ScanState = {
      currentCommittee: 'RULES',
      currentSubcommittee: 'LEGISLATIVE AND BUDGET PROCESS',
      inSubcommitteeSection: true,
      currentGroup: 'Minority',
    };
    applyClassification(state, { kind: 'committee_header', name: 'ARMED SERVICES', role: 'committee' });

    expect(state).toEqual({
      currentCommittee: 'ARMED SERVICES',
      currentSubcommittee: null,
      inSubcommitteeSection: false,
      currentGroup: 'Majority',
    });
  });

  it('should switch groups on markers', () => {
    const state = createScanState();
    applyClassification(state, { kind: 'group_marker', group: 'Minority', phrase: 'MINORITY' });

    expect(state.currentGroup).toBe('Minority');
  });

  it('should not change state on blank, noise or candidate lines', () => {
    const state = inSection('RULES');
    const before = { ...state };

    expect(applyClassification(state, { kind: 'blank' })).toBe(false);
    expect(applyClassification(state, { kind: 'section_noise', phrase: 'CONGRESS' })).toBe(false);
    expect(applyClassification(state, { kind: 'assignment_candidate', line: 'Pete Sessions, TX' })).toBe(false);
    expect(state).toEqual(before);
  });
});
