/**
 * Roster Scanner
 *
 * One strictly sequential pass over a roster document: pages, then lines,
 * then member entries within a line. Committee context is carried forward
 * line to line, so nothing here may be reordered.
 *
 * A line that cannot be interpreted yields no record; it never aborts the scan.
 * The scan fails only when the source yields no pages at all.
 */

import type { PageText, RosterPage, RosterScan, RosterSource, ScanReport, ScanStats, ScanStatus } from '../types';
import { config } from '../config';
import { logger } from '../logger';
import {
  linesClassifiedCounter,
  recordsExtractedCounter,
  scansCounter,
  scanDurationHistogram,
} from '../metrics';
import { classifyLine } from './classifier';
import { parseMemberLine } from './member-parser';
import { applyClassification, createScanState, type ScanState } from './scan-state';
import { RosterAggregator, toRosterResult } from './aggregator';
import { extractCoverDate } from './patterns';

/**
 * Scanner version for tracking in persisted documents
 */
export const SCANNER_VERSION = '1.0.0';

export interface ScanOptions {
  /** Aggregator to record into; pass one shared instance to unify members across documents */
  aggregator?: RosterAggregator;
  /** Fewer committees than this marks the run degraded */
  minExpectedCommittees?: number;
}

interface ScanTracking {
  stats: ScanStats;
  committees: Set<string>;
  subcommittees: Set<string>;
}

/**
 * Adapt an in-memory list of pages into a restartable source.
 */
export function sourceFromPages(pages: RosterPage[]): RosterSource {
  return {
    *pages() {
      for (const page of pages) {
        yield { pageNumber: page.pageNumber, lines: [...page.lines] };
      }
    },
  };
}

/**
 * Adapt page text (one string per page) into a source, splitting on line breaks.
 */
export function pagesFromText(pageTexts: PageText[]): RosterSource {
  return sourceFromPages(
    pageTexts.map(page => ({
      pageNumber: page.pageNumber,
      lines: page.text.split(/\r?\n/),
    }))
  );
}

function processLine(
  line: string,
  pageNumber: number,
  state: ScanState,
  aggregator: RosterAggregator,
  tracking: ScanTracking
): void {
  const classification = classifyLine(line, state);
  linesClassifiedCounter.inc({ kind: classification.kind });

  applyClassification(state, classification);

  switch (classification.kind) {
    case 'subcommittee_section_header':
      logger.debug('Entering subcommittee section', {
        page: pageNumber,
        committee: state.currentCommittee,
      });
      if (state.currentCommittee) {
        tracking.committees.add(state.currentCommittee);
      }
      return;

    case 'committee_header':
      if (classification.role === 'subcommittee') {
        tracking.subcommittees.add(`${state.currentCommittee}::${classification.name}`);
        logger.debug('Found subcommittee', {
          page: pageNumber,
          committee: state.currentCommittee,
          subcommittee: classification.name,
        });
      } else {
        tracking.committees.add(classification.name);
        logger.debug('Found committee', { page: pageNumber, committee: classification.name });
      }
      return;

    case 'assignment_candidate': {
      const parsed = parseMemberLine(classification.line, state, pageNumber);

      if (parsed.orphans > 0) {
        tracking.stats.orphanLines++;
        logger.warn('Member line found without current committee', {
          page: pageNumber,
          line: classification.line,
        });
      }

      for (const record of parsed.records) {
        aggregator.record(record);
      }
      if (parsed.rule && parsed.records.length > 0) {
        recordsExtractedCounter.inc({ rule: parsed.rule }, parsed.records.length);
        tracking.stats.records += parsed.records.length;
      }
      return;
    }

    default:
      return;
  }
}

function buildReport(
  tracking: ScanTracking,
  coverDate: string | null,
  minExpectedCommittees: number
): ScanReport {
  const warnings: string[] = [];
  let status: ScanStatus = 'success';

  if (tracking.committees.size < minExpectedCommittees) {
    status = 'degraded';
    warnings.push(
      `Only found ${tracking.committees.size} committees (expected at least ${minExpectedCommittees})`
    );
  }

  if (tracking.subcommittees.size === 0) {
    status = 'degraded';
    warnings.push('No subcommittees found');
  }

  if (tracking.stats.orphanLines > 0) {
    warnings.push(`${tracking.stats.orphanLines} member lines appeared before any committee header`);
  }

  if (tracking.stats.failedLines > 0) {
    warnings.push(`${tracking.stats.failedLines} lines could not be processed`);
  }

  return { status, warnings, coverDate, stats: tracking.stats };
}

/**
 * Scan a roster document into assignment records and aggregate views.
 *
 * @throws Error when the source yields no pages
 */
export function scanRoster(source: RosterSource, options: ScanOptions = {}): RosterScan {
  const startTime = Date.now();
  const aggregator = options.aggregator ?? new RosterAggregator();
  const minExpectedCommittees = options.minExpectedCommittees ?? config.minExpectedCommittees;
  const state = createScanState();

  const tracking: ScanTracking = {
    stats: {
      pages: 0,
      emptyPages: 0,
      lines: 0,
      records: 0,
      committees: 0,
      subcommittees: 0,
      members: 0,
      orphanLines: 0,
      failedLines: 0,
    },
    committees: new Set(),
    subcommittees: new Set(),
  };
  let coverDate: string | null = null;

  for (const page of source.pages()) {
    tracking.stats.pages++;

    if (!page.lines.some(line => line.trim())) {
      tracking.stats.emptyPages++;
      logger.debug('Skipping page without text', { page: page.pageNumber });
      continue;
    }

    if (tracking.stats.pages === 1) {
      coverDate = extractCoverDate(page.lines.join('\n'));
    }

    for (const line of page.lines) {
      tracking.stats.lines++;
      try {
        processLine(line, page.pageNumber, state, aggregator, tracking);
      } catch (error) {
        tracking.stats.failedLines++;
        logger.warn('Roster line could not be processed', {
          page: page.pageNumber,
          line,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  if (tracking.stats.pages === 0) {
    throw new Error('Roster source produced no pages');
  }

  const snapshot = aggregator.finalize();
  tracking.stats.committees = tracking.committees.size;
  tracking.stats.subcommittees = tracking.subcommittees.size;
  tracking.stats.members = snapshot.members.length;

  const report = buildReport(tracking, coverDate, minExpectedCommittees);
  const durationMs = Date.now() - startTime;

  scansCounter.inc({ status: report.status });
  scanDurationHistogram.observe(durationMs / 1000);

  if (report.status === 'degraded') {
    logger.warn('Degraded roster scan', { warnings: report.warnings });
  }

  logger.info('Roster scan complete', {
    scanner_version: SCANNER_VERSION,
    status: report.status,
    ...report.stats,
    cover_date: coverDate,
    duration_ms: durationMs,
  });

  return {
    result: toRosterResult(snapshot),
    records: snapshot.records,
    report,
  };
}
