/**
 * Roster Scanner Tests
 *
 * Full passes over the sample roster fixture and small inline documents.
 */

import {
  scanRoster,
  pagesFromText,
  sourceFromPages,
  RosterAggregator,
  linesClassifiedCounter,
  type RosterResult,
} from '@committee-roster/shared';
import { sampleSource } from './helpers';

function keysAcrossIndexes(result: RosterResult): Set<string> {
  const keys = new Set<string>();
  for (const members of Object.values(result.committees)) {
    members.forEach(key => keys.add(key));
  }
  for (const bySubcommittee of Object.values(result.subcommittees)) {
    for (const members of Object.values(bySubcommittee)) {
      members.forEach(key => keys.add(key));
    }
  }
  Object.keys(result.memberAssignments).forEach(key => keys.add(key));
  return keys;
}

describe('Roster Scanner', () => {
  describe('sample roster', () => {
    const scan = scanRoster(sampleSource(), { minExpectedCommittees: 2 });

    it('should build the main committee listings in document order', () => {
      expect(scan.result.committees).toEqual({
        AGRICULTURE: [
          'Glenn Harper, PA',
          'Ada Linwood, IA',
          "Marcus O'Neal, TX",
          'Rosa Delgado, CA',
          'Tim Beck, MN',
        ],
        'HOUSE ADMINISTRATION': ['Ada Linwood, IA', 'Victor Nguyen, OR', 'Tim Beck, MN'],
      });
    });

    it('should build the subcommittee rosters', () => {
      expect(scan.result.subcommittees).toEqual({
        AGRICULTURE: {
          'CONSERVATION AND FORESTRY': [
            'Ada Linwood, IA',
            'Tim Beck, MN',
            "Marcus O'Neal, TX",
            'Rosa Delgado, CA',
          ],
          'LIVESTOCK AND DAIRY': ['Glenn Harper, PA', 'Ada Linwood, IA', 'Rosa Delgado, CA'],
        },
        'HOUSE ADMINISTRATION': {
          ELECTIONS: ['Victor Nguyen, OR', 'Tim Beck, MN'],
        },
      });
    });

    it('should list every member once, sorted', () => {
      expect(scan.result.members).toEqual([
        'Ada Linwood, IA',
        'Glenn Harper, PA',
        "Marcus O'Neal, TX",
        'Rosa Delgado, CA',
        'Tim Beck, MN',
        'Victor Nguyen, OR',
      ]);
    });

    it('should collect every assignment of a member', () => {
      const assignments = scan.result.memberAssignments['Ada Linwood, IA'].map(r => [
        r.page,
        r.committee,
        r.subcommittee,
        r.rank,
        r.group,
      ]);

      expect(assignments).toEqual([
        [2, 'AGRICULTURE', null, 2, 'Majority'],
        [2, 'HOUSE ADMINISTRATION', null, 1, 'Majority'],
        [4, 'AGRICULTURE', 'CONSERVATION AND FORESTRY', 0, 'Majority'],
        [4, 'AGRICULTURE', 'LIVESTOCK AND DAIRY', 0, 'Minority'],
      ]);
    });

    it('should assign groups from markers in numbered listings', () => {
      const tim = scan.result.memberAssignments['Tim Beck, MN'];

      expect(tim[0]).toEqual({
        committee: 'AGRICULTURE',
        subcommittee: null,
        rank: 2,
        page: 2,
        group: 'Minority',
        sourceLine: '2. Tim Beck, MN',
        member: { name: 'Tim Beck', state: 'MN' },
      });
      expect(tim[1].committee).toBe('HOUSE ADMINISTRATION');
      expect(tim[1].group).toBe('Minority');
    });

    it('should repair a concatenated name in a subcommittee roster', () => {
      const rosa = scan.result.memberAssignments['Rosa Delgado, CA'];

      expect(rosa).toHaveLength(3);
      expect(rosa[2].sourceLine).toBe('RosaDelgado, CA');
      expect(rosa[2].subcommittee).toBe('LIVESTOCK AND DAIRY');
    });

    it('should report statistics and the cover date', () => {
      expect(scan.report).toEqual({
        status: 'success',
        warnings: [],
        coverDate: '2025-09-16',
        stats: {
          pages: 5,
          emptyPages: 1,
          lines: 28,
          records: 17,
          committees: 2,
          subcommittees: 3,
          members: 6,
          orphanLines: 0,
          failedLines: 0,
        },
      });
      expect(scan.records).toHaveLength(17);
    });

    it('should have the same keys in the member list and across all indexes', () => {
      expect(keysAcrossIndexes(scan.result)).toEqual(new Set(scan.result.members));
    });
  });

  it('should mark a run with too few committees as degraded', () => {
    const scan = scanRoster(sampleSource());

    expect(scan.report.status).toBe('degraded');
    expect(scan.report.warnings).toEqual(['Only found 2 committees (expected at least 8)']);
  });

  it('should mark a run without subcommittees as degraded', () => {
    const scan = scanRoster(pagesFromText([{ pageNumber: 1, text: 'RULES\n1. Pete Sessions, TX' }]), {
      minExpectedCommittees: 1,
    });

    expect(scan.report.status).toBe('degraded');
    expect(scan.report.warnings).toEqual(['No subcommittees found']);
  });

  it('should produce identical output for identical input', () => {
    const first = scanRoster(sampleSource(), { minExpectedCommittees: 2 });
    const second = scanRoster(sampleSource(), { minExpectedCommittees: 2 });

    expect(JSON.stringify(second.result)).toBe(JSON.stringify(first.result));
  });

  it('should keep prior members when a new main committee starts', () => {
    const scan = scanRoster(
      pagesFromText([
        {
          pageNumber: 1,
          text: [
            'RULES',
            '1. Tom Reyes, OK',
            '2. Vera Fox, NC',
            '3. Pete Sessions, TX',
            'ARMED SERVICES',
            '1. Dana Holt, WA',
          ].join('\n'),
        },
      ]),
      { minExpectedCommittees: 1 }
    );

    expect(scan.result.committees).toEqual({
      RULES: ['Tom Reyes, OK', 'Vera Fox, NC', 'Pete Sessions, TX'],
      'ARMED SERVICES': ['Dana Holt, WA'],
    });
  });

  it('should drop member lines that precede any committee', () => {
    const scan = scanRoster(
      pagesFromText([{ pageNumber: 1, text: '1. Pete Sessions, TX\nRULES\n2. Juan Vargas, CA' }]),
      { minExpectedCommittees: 1 }
    );

    expect(scan.result.committees).toEqual({ RULES: ['Juan Vargas, CA'] });
    expect(scan.report.stats.orphanLines).toBe(1);
    expect(scan.report.warnings).toEqual([
      'No subcommittees found',
      '1 member lines appeared before any committee header',
    ]);
  });

  it('should unify members across documents with a shared aggregator', () => {
    const aggregator = new RosterAggregator();
    scanRoster(pagesFromText([{ pageNumber: 1, text: 'RULES\n1. Pete Sessions, TX' }]), { aggregator });
    const second = scanRoster(pagesFromText([{ pageNumber: 1, text: 'BUDGET\n4. Pete Sessions, TX' }]), {
      aggregator,
    });

    expect(second.result.memberAssignments['Pete Sessions, TX'].map(r => r.committee)).toEqual([
      'RULES',
      'BUDGET',
    ]);
    expect(second.report.stats.records).toBe(1);
  });

  it('should skip pages without text', () => {
    const scan = scanRoster(
      sourceFromPages([
        { pageNumber: 1, lines: [] },
        { pageNumber: 2, lines: ['  ', ''] },
        { pageNumber: 3, lines: ['RULES', '1. Pete Sessions, TX'] },
      ]),
      { minExpectedCommittees: 1 }
    );

    expect(scan.report.stats.pages).toBe(3);
    expect(scan.report.stats.emptyPages).toBe(2);
    expect(scan.report.stats.lines).toBe(2);
    expect(scan.report.coverDate).toBeNull();
    expect(scan.result.memberAssignments['Pete Sessions, TX'][0].page).toBe(3);
  });

  it('should fail when the source has no pages', () => {
    expect(() => scanRoster(sourceFromPages([]))).toThrow('Roster source produced no pages');
  });

  it('should continue past a line whose processing throws', () => {
    const inc = jest.spyOn(linesClassifiedCounter, 'inc').mockImplementationOnce(() => {
      throw new Error('counter unavailable');
    });

    try {
      const scan = scanRoster(
        pagesFromText([{ pageNumber: 1, text: 'RULES\n1. Pete Sessions, TX\n2. Juan Vargas, CA' }]),
        { minExpectedCommittees: 1 }
      );

      expect(scan.report.stats.failedLines).toBe(1);
      expect(scan.result.committees).toEqual({});
      expect(scan.report.warnings).toContain('1 lines could not be processed');
    } finally {
      inc.mockRestore();
    }
  });
});
