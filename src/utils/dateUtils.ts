/**
 * Date utility functions
 */

import { AppLogger } from './logger';

const ISSUE_DATE_PATTERN = /^(\d{2})-(\d{2})-(\d{4})$/;

/**
 * Parse a DD-MM-YYYY string into a UTC date
 * Returns null when the text is not in that exact shape or names a day
 * that does not exist (31-02-2024, 00-01-2024, ...)
 */
export function parseIssueDate(text: string): Date | null {
  const match = ISSUE_DATE_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  if (year < 1) {
    return null;
  }

  // setUTCFullYear keeps years below 100 as-is, Date.UTC would shift them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}

/**
 * Format date to YYYYMMDD (UTC)
 */
export function formatCompactDate(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

/**
 * Convert an issue date in DD-MM-YYYY to YYYYMMDD
 * Anything else degrades to the digits it contains, in order
 */
export function normalizeIssueDate(text: string): string {
  const date = parseIssueDate(text);
  if (date) {
    return formatCompactDate(date);
  }

  const digits = text.replace(/\D/g, '');
  AppLogger.warn(`Could not parse date: "${text}", using digits "${digits}"`);
  return digits;
}
