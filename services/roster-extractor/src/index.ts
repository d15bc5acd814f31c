/**
 * Roster Extractor CLI
 *
 * Usage:
 *   roster-extract extract <pdf> [--out <file>]
 *   roster-extract member <query> [--input <file>]
 *   roster-extract inspect <pdf> [--pages <list>] [--needle <text>]
 */

import { Command } from 'commander';
import { logger, SCANNER_VERSION } from '@committee-roster/shared';
import { registerExtractCommand } from './commands/extract';
import { registerMemberCommand } from './commands/member';
import { registerInspectCommand } from './commands/inspect';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('roster-extract')
    .description('Extract committee and subcommittee assignments from a committee roster PDF')
    .version(SCANNER_VERSION);

  registerExtractCommand(program);
  registerMemberCommand(program);
  registerInspectCommand(program);

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error('Roster command failed', error);
      process.exitCode = 1;
    });
}
