/**
 * Test Helpers
 *
 * Fixture loading and an in-process query API for tests.
 */

import fs from 'fs';
import path from 'path';
import {
  buildRosterDocument,
  pagesFromText,
  scanRoster,
  type PageText,
  type RosterDocument,
  type RosterSource,
} from '@committee-roster/shared';
import { createApp } from '../../services/query-api/src/app';
import { RosterStore } from '../../services/query-api/src/lib/store';

export const FIXTURES_DIR = path.join(__dirname, '../../fixtures/roster');

/** Fixed clock for documents built in tests */
export const EXTRACTED_AT = new Date('2025-09-20T12:00:00.000Z');

export function loadSamplePages(): PageText[] {
  const raw = fs.readFileSync(path.join(FIXTURES_DIR, 'sample_roster.pages.json'), 'utf-8');
  return JSON.parse(raw);
}

export function sampleSource(): RosterSource {
  return pagesFromText(loadSamplePages());
}

/**
 * Scan the sample roster with a threshold it satisfies and wrap it in a document
 */
export function sampleDocument(): RosterDocument {
  const scan = scanRoster(sampleSource(), { minExpectedCommittees: 2 });
  return buildRosterDocument(scan, 'sample_roster.pdf', EXTRACTED_AT);
}

export interface RunningApi {
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * Start the query API on an ephemeral local port
 */
export async function startQueryApi(document: RosterDocument): Promise<RunningApi> {
  const app = createApp(new RosterStore(document));

  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error('Query API did not bind to a TCP port'));
        return;
      }
      const { port } = address;
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close(error => (error ? fail(error) : done()));
          }),
      });
    });
    server.on('error', reject);
  });
}

/**
 * GET a path and decode the JSON body
 */
export async function getJson(
  api: RunningApi,
  pathAndQuery: string,
  headers: Record<string, string> = {}
): Promise<{ status: number; headers: Headers; body: unknown }> {
  const response = await fetch(`${api.baseUrl}${pathAndQuery}`, { headers });
  return { status: response.status, headers: response.headers, body: await response.json() };
}
