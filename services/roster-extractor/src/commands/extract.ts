/**
 * Extract Command
 *
 * Usage:
 *   roster-extract extract <pdf> [--out <file>]
 */

import path from 'path';
import type { Command } from 'commander';
import {
  config,
  logger,
  newDocumentContext,
  runWithContextAsync,
  scanRoster,
  type RosterDocument,
  type ScanReport,
} from '@committee-roster/shared';
import { loadPdfRoster } from '../lib/pdf';
import { toValidatedDocument, writeRosterDocument } from '../lib/output';
import { formatScanSummary } from '../lib/format';

interface ExtractOptions {
  readonly out?: string;
}

export interface ExtractResult {
  document: RosterDocument;
  report: ScanReport;
  outPath: string;
}

export async function runExtract(pdfPath: string, options: ExtractOptions = {}): Promise<ExtractResult> {
  const outPath = options.out ?? config.rosterOutputPath;
  const { source } = await loadPdfRoster(pdfPath);

  const scan = scanRoster(source);
  const document = toValidatedDocument(scan, path.basename(pdfPath));
  writeRosterDocument(document, outPath);

  logger.info('Roster document written', { outPath, status: document.status });
  return { document, report: scan.report, outPath };
}

export function registerExtractCommand(program: Command): void {
  program
    .command('extract')
    .description('Scan a committee roster PDF and write the roster document')
    .argument('<pdf>', 'Roster PDF file')
    .option('-o, --out <file>', 'Output JSON file (default: ROSTER_OUTPUT_PATH)')
    .action(async (pdf: string, options: ExtractOptions) => {
      await runWithContextAsync(newDocumentContext(pdf, path.basename(pdf)), async () => {
        try {
          const { report, outPath } = await runExtract(pdf, options);
          console.log(formatScanSummary(report, outPath).join('\n'));
        } catch (error) {
          logger.error('Roster extraction failed', error, { pdf });
          console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
          process.exitCode = 1;
        }
      });
    });
}
