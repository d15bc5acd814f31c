/**
 * Roster Document Output
 */

import fs from 'fs';
import path from 'path';
import {
  buildRosterDocument,
  serializeRosterDocument,
  validateRosterDocument,
  type RosterDocument,
  type RosterScan,
} from '@committee-roster/shared';

/**
 * Wrap a scan in its persisted envelope and check it against the contract.
 *
 * @throws Error when the document does not match roster_document.schema.json
 */
export function toValidatedDocument(scan: RosterScan, source: string, now: Date = new Date()): RosterDocument {
  const document = buildRosterDocument(scan, source, now);
  const validation = validateRosterDocument(document);
  if (!validation.valid) {
    throw new Error(`Roster document failed schema validation: ${(validation.errors ?? []).join('; ')}`);
  }
  return document;
}

export function writeRosterDocument(document: RosterDocument, outPath: string): void {
  fs.mkdirSync(path.dirname(path.resolve(outPath)), { recursive: true });
  fs.writeFileSync(outPath, serializeRosterDocument(document), 'utf-8');
}

export function readRosterDocumentText(inputPath: string): string {
  if (!fs.existsSync(inputPath)) {
    throw new Error(`Roster document not found: ${inputPath}`);
  }
  return fs.readFileSync(inputPath, 'utf-8');
}
