/**
 * Inspect Command
 *
 * Shows which lines the classifier treats as headers on the selected pages,
 * and where a piece of text occurs with its neighbouring lines.
 *
 * Usage:
 *   roster-extract inspect <pdf> [--pages 3,5-7] [--needle "Sessions"]
 */

import path from 'path';
import { InvalidArgumentError, type Command } from 'commander';
import { inspectPages, logger, newDocumentContext, runWithContextAsync } from '@committee-roster/shared';
import { loadPdfRoster } from '../lib/pdf';
import { formatInspection, parsePageList } from '../lib/format';

interface InspectCommandOptions {
  readonly pages?: number[];
  readonly needle?: string;
}

function pageListArgument(value: string): number[] {
  try {
    return parsePageList(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

export async function runInspect(pdfPath: string, options: InspectCommandOptions = {}): Promise<string[]> {
  const { source } = await loadPdfRoster(pdfPath);
  const entries = inspectPages(source, { pages: options.pages, needle: options.needle });
  if (entries.length === 0) {
    return ['No headers or matches on the selected pages'];
  }
  return formatInspection(entries);
}

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Inspect how roster pages are classified')
    .argument('<pdf>', 'Roster PDF file')
    .option('-p, --pages <list>', 'Pages to inspect, e.g. "3,5-7" (default: all)', pageListArgument)
    .option('-n, --needle <text>', 'Show lines containing this text with their neighbours')
    .action(async (pdf: string, options: InspectCommandOptions) => {
      await runWithContextAsync(newDocumentContext(pdf, path.basename(pdf)), async () => {
        try {
          console.log((await runInspect(pdf, options)).join('\n'));
        } catch (error) {
          logger.error('Roster inspection failed', error, { pdf });
          console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
          process.exitCode = 1;
        }
      });
    });
}
