/**
 * Committee Roster Extraction Patterns
 *
 * Regular expressions and normalizers for the committee roster document.
 *
 * The roster has no machine-readable structure, only typographic conventions:
 * - "SUBCOMMITTEES OF THE COMMITTEE ON <NAME>" opens a subcommittee section
 * - committee and subcommittee names are set in all caps
 * - main committee listings are numbered: "3. Pete Sessions, TX"
 * - subcommittee listings pack two unnumbered columns per line:
 *   "Pete Sessions, TX Juan Vargas, CA"
 */

import type { Group, Member, MemberKey } from '../types';

/**
 * Opens a subcommittee section. The remainder after "ON" names the owning committee.
 */
export const SUBCOMMITTEE_SECTION_PATTERN = /^SUBCOMMITTEES?\s+OF\s+THE\s+COMMITTEE\s+ON\b\s*(.*)$/i;

/**
 * Title, masthead and footer phrases carried by all-caps lines that are not committee names.
 * MAJORITY / MINORITY are group markers; see GROUP_MARKERS.
 */
export const SECTION_NOISE_PHRASES: readonly string[] = [
  'STANDING COMMITTEES',
  'SELECT COMMITTEES',
  'JOINT COMMITTEES',
  'ALPHABETICAL LIST',
  'HOUSE OF REPRESENTATIVES',
  'ONE HUNDRED',
  'CONGRESS',
  'MAJORITY',
  'MINORITY',
  'DEMOCRATS',
  'REPUBLICANS',
  'RATIO',
  'WASHINGTON',
  'CONTENTS',
  'PREPARED UNDER',
];

/**
 * Checked in order: a line naming both groups counts as a majority marker.
 */
export const GROUP_MARKERS: ReadonlyArray<{ phrase: string; group: Group }> = [
  { phrase: 'MAJORITY', group: 'Majority' },
  { phrase: 'MINORITY', group: 'Minority' },
];

/**
 * Lines this short are never headers, even in all caps.
 */
export const MIN_HEADER_LENGTH = 4;

/**
 * Numbered entry: "3. Pete Sessions, TX". Several may share one line.
 */
export const NUMBERED_MEMBER_PATTERN = /(\d+)\.\s*([A-Za-z\s.\-']+?),\s*([A-Z]{2})/g;

/**
 * Unnumbered entry: "Pete Sessions, TX" with an optional ignored qualifier (", Chairman").
 */
export const UNNUMBERED_MEMBER_PATTERN = /([A-Z][A-Za-z\s.\-']+?),\s*([A-Z]{2})(?:\s*,\s*[A-Za-z]+)?/g;

/**
 * Cover date, possibly glued to preceding text: "https://clerk.house.govSEPTEMBER 16, 2025"
 */
export const COVER_DATE_PATTERN =
  /(JANUARY|FEBRUARY|MARCH|APRIL|MAY|JUNE|JULY|AUGUST|SEPTEMBER|OCTOBER|NOVEMBER|DECEMBER)\s+(\d{1,2}),\s+(\d{4})/i;

const MONTHS = [
  'JANUARY',
  'FEBRUARY',
  'MARCH',
  'APRIL',
  'MAY',
  'JUNE',
  'JULY',
  'AUGUST',
  'SEPTEMBER',
  'OCTOBER',
  'NOVEMBER',
  'DECEMBER',
];

/**
 * Committee names cut short where the section header wraps onto a second line.
 */
const TRUNCATED_COMMITTEE_NAMES: ReadonlyMap<string, string> = new Map([
  ['OVERSIGHT AND', 'OVERSIGHT AND ACCOUNTABILITY'],
  ['SCIENCE, SPACE, AND', 'SCIENCE, SPACE, AND TECHNOLOGY'],
  ['EDUCATION AND THE', 'EDUCATION AND THE WORKFORCE'],
  ['TRANSPORTATION AND', 'TRANSPORTATION AND INFRASTRUCTURE'],
]);

/**
 * Whole-word phrase test, so "RATIO" does not hit "HOUSE ADMINISTRATION".
 */
export function containsPhrase(line: string, phrase: string): boolean {
  return new RegExp(`\\b${phrase}\\b`).test(line);
}

/**
 * True when the line has at least one cased letter and no lower-case letters.
 */
export function isAllCaps(line: string): boolean {
  return line.toUpperCase() === line && line.toLowerCase() !== line;
}

/**
 * Collapse internal whitespace runs to single spaces and trim.
 */
export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Insert a space at every lower-to-upper case transition: "PeteSessions" -> "Pete Sessions".
 * Also splits names such as "McCarthy"; all-caps surnames are never split.
 */
export function repairConcatenatedWords(value: string): string {
  return value.replace(/([a-z])([A-Z])/g, '$1 $2');
}

/**
 * Restore a committee name truncated by line wrapping, or return it unchanged.
 */
export function repairTruncatedCommitteeName(name: string): string {
  return TRUNCATED_COMMITTEE_NAMES.get(name.toUpperCase()) ?? name;
}

/**
 * Serialize a member identity as "<name>, <state>"
 */
export function memberKey(member: Member): MemberKey {
  return `${member.name}, ${member.state}`;
}

/**
 * Inverse of memberKey. Returns null when the key has no ", " separator.
 */
export function parseMemberKey(key: MemberKey): Member | null {
  const separator = key.lastIndexOf(', ');
  if (separator <= 0) return null;
  return {
    name: key.slice(0, separator),
    state: key.slice(separator + 2),
  };
}

/**
 * URL-safe member identity: "Carlos A. Gimenez, FL" -> "carlos-a-gimenez-fl"
 */
export function memberSlug(key: MemberKey): string {
  return key
    .toLowerCase()
    .replace(/, /g, '-')
    .replace(/ /g, '-')
    .replace(/['.]/g, '');
}

/**
 * URL-safe committee identity: "VETERANS' AFFAIRS" -> "veterans-affairs"
 */
export function committeeSlug(name: string): string {
  return name
    .toLowerCase()
    .replace(/^(?:sub)?committee on /, '')
    .replace(/ /g, '-')
    .replace(/['",]/g, '')
    .replace(/^-+|-+$/g, '');
}

/**
 * Extract the cover date from page 1 text as YYYY-MM-DD.
 * Returns null when no date is present or it is not a real calendar date.
 */
export function extractCoverDate(text: string): string | null {
  const match = text.match(COVER_DATE_PATTERN);
  if (!match) return null;

  const month = MONTHS.indexOf(match[1].toUpperCase()) + 1;
  const day = parseInt(match[2], 10);
  const year = parseInt(match[3], 10);

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}
