/**
 * Console Formatting
 *
 * Plain-text renderings of scan statistics, member lookups and page inspections.
 * Each returns lines; commands print them.
 */

import { summarizeMember, type InspectionEntry, type MemberMatch, type ScanReport } from '@committee-roster/shared';

export function formatScanSummary(report: ScanReport, outPath: string): string[] {
  const { stats } = report;
  const lines = [
    `Status: ${report.status}`,
    `Cover date: ${report.coverDate ?? 'unknown'}`,
    `Pages: ${stats.pages} (${stats.emptyPages} empty)`,
    `Lines: ${stats.lines}`,
    `Records: ${stats.records}`,
    `Committees: ${stats.committees}`,
    `Subcommittees: ${stats.subcommittees}`,
    `Members: ${stats.members}`,
  ];

  if (report.warnings.length > 0) {
    lines.push('Warnings:');
    for (const warning of report.warnings) {
      lines.push(`  - ${warning}`);
    }
  }

  lines.push(`Wrote ${outPath}`);
  return lines;
}

export function formatMemberMatches(matches: MemberMatch[], query: string): string[] {
  if (matches.length === 0) {
    return [`No members match "${query}"`];
  }

  const lines: string[] = [];
  for (const match of matches) {
    const summary = summarizeMember(match.key, match.assignments);
    lines.push(match.key);

    if (summary.committees.length > 0) {
      lines.push('  Committees:');
      for (const seat of summary.committees) {
        const rank = seat.rank > 0 ? `#${seat.rank} ` : '';
        lines.push(`    ${rank}${seat.committee} (${seat.group})`);
      }
    }

    if (summary.subcommittees.length > 0) {
      lines.push('  Subcommittees:');
      for (const seat of summary.subcommittees) {
        lines.push(`    ${seat.committee} / ${seat.subcommittee} (${seat.group})`);
      }
    }

    lines.push(`  Pages: ${summary.pages.join(', ')}`);
  }

  return lines;
}

export function formatInspection(entries: InspectionEntry[]): string[] {
  const lines: string[] = [];

  for (const entry of entries) {
    if (entry.kind === 'header') {
      lines.push(`[p${entry.page}] ${entry.role.toUpperCase()}: ${entry.text}`);
      continue;
    }

    lines.push(`[p${entry.page}] MATCH: ${entry.text}`);
    if (entry.previous !== null) lines.push(`    prev: ${entry.previous}`);
    if (entry.next !== null) lines.push(`    next: ${entry.next}`);
  }

  return lines;
}

/** Highest page number accepted in a page list */
export const MAX_PAGE_NUMBER = 10000;

/**
 * Parse a page list such as "1,3-5" into sorted, distinct page numbers.
 *
 * @throws Error on anything but positive integers and ascending ranges up to MAX_PAGE_NUMBER
 */
export function parsePageList(value: string): number[] {
  const pages = new Set<number>();

  for (const part of value.split(',').map(p => p.trim()).filter(Boolean)) {
    const range = part.match(/^(\d+)-(\d+)$/);
    if (range) {
      const start = parseInt(range[1], 10);
      const end = parseInt(range[2], 10);
      if (start < 1 || end < start) {
        throw new Error(`Invalid page range: ${part}`);
      }
      if (end > MAX_PAGE_NUMBER) {
        throw new Error(`Page number out of range: ${part}`);
      }
      for (let page = start; page <= end; page++) pages.add(page);
      continue;
    }

    if (!/^\d+$/.test(part) || parseInt(part, 10) < 1) {
      throw new Error(`Invalid page number: ${part}`);
    }
    if (parseInt(part, 10) > MAX_PAGE_NUMBER) {
      throw new Error(`Page number out of range: ${part}`);
    }
    pages.add(parseInt(part, 10));
  }

  if (pages.size === 0) {
    throw new Error(`Invalid page list: ${value}`);
  }

  return [...pages].sort((a, b) => a - b);
}
