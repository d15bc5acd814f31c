/**
 * Member Command
 *
 * Usage:
 *   roster-extract member <query> [--input <file>]
 */

import type { Command } from 'commander';
import { config, findMemberAssignments, logger, parseRosterDocument } from '@committee-roster/shared';
import { readRosterDocumentText } from '../lib/output';
import { formatMemberMatches } from '../lib/format';

interface MemberOptions {
  readonly input?: string;
}

export function runMemberLookup(query: string, options: MemberOptions = {}): string[] {
  const document = parseRosterDocument(readRosterDocumentText(options.input ?? config.rosterOutputPath));
  return formatMemberMatches(findMemberAssignments(document.result, query), query);
}

export function registerMemberCommand(program: Command): void {
  program
    .command('member')
    .description('Show every assignment of members matching a name query')
    .argument('<query>', 'Name fragments, e.g. "sessions tx"')
    .option('-i, --input <file>', 'Roster document JSON (default: ROSTER_OUTPUT_PATH)')
    .action((query: string, options: MemberOptions) => {
      try {
        console.log(runMemberLookup(query, options).join('\n'));
      } catch (error) {
        logger.error('Member lookup failed', error, { query });
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      }
    });
}
