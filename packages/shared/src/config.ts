/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // Extraction output
  rosterOutputPath: string;

  // Query API
  rosterResultPath: string;
  queryApiPort: number;

  // Scan quality thresholds
  minExpectedCommittees: number;

  // PDF text reconstruction
  pdfLineTolerance: number;
}

const rosterOutputPath = process.env.ROSTER_OUTPUT_PATH || 'roster_results.json';

export const config: Config = {
  // Extraction output
  rosterOutputPath,

  // Query API
  rosterResultPath: process.env.ROSTER_RESULT_PATH || rosterOutputPath,
  queryApiPort: parseInt(process.env.PORT || '8081', 10),

  // Scan quality thresholds
  minExpectedCommittees: parseInt(process.env.MIN_EXPECTED_COMMITTEES || '8', 10),

  // PDF text reconstruction
  pdfLineTolerance: parseFloat(process.env.PDF_LINE_TOLERANCE || '2'),
};
