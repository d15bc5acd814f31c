/**
 * Roster Document
 *
 * Versioned envelope persisted around a scan result, validated against
 * docs/contracts/roster_document.schema.json on the way in and out.
 */

import type { RosterDocument, RosterScan } from '../types';
import { isValidRosterDocument } from '../schemas';

export const ROSTER_DOCUMENT_SCHEMA_VERSION = '1.0.0';

export function buildRosterDocument(scan: RosterScan, source: string, now: Date = new Date()): RosterDocument {
  return {
    schemaVersion: ROSTER_DOCUMENT_SCHEMA_VERSION,
    source,
    extractedAt: now.toISOString(),
    coverDate: scan.report.coverDate,
    status: scan.report.status,
    warnings: [...scan.report.warnings],
    result: scan.result,
  };
}

/**
 * Parse and validate a serialized roster document.
 *
 * @throws Error when the text is not JSON or does not match the schema
 */
export function parseRosterDocument(json: string): RosterDocument {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new Error(
      `Roster document is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const errors: string[] = [];
  if (!isValidRosterDocument(data, errors)) {
    throw new Error(`Invalid roster document: ${errors.join('; ')}`);
  }

  return data;
}

/**
 * Serialize a roster document as indented JSON
 */
export function serializeRosterDocument(document: RosterDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}
