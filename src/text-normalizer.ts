/**
 * Text Normalizer - string shaping shared by the ordinance extractor
 *
 * Handles:
 * - Whitespace runs left by PDF text extraction (page breaks, column gaps)
 * - Title casing of street and company names
 * - Numeric and Italian textual dates -> DD/MM/YYYY
 * - Elix number encoded at the end of the uploaded filename
 * - Heading-delimited sections of the ordinance text
 */

import { ELIX_SENTINEL } from './types.js';

const MONTHS: Record<string, string> = {
  gennaio: '01',
  febbraio: '02',
  marzo: '03',
  aprile: '04',
  maggio: '05',
  giugno: '06',
  luglio: '07',
  agosto: '08',
  settembre: '09',
  ottobre: '10',
  novembre: '11',
  dicembre: '12',
};

const NUMERIC_DATE = /\b(\d{1,2})[./-](\d{1,2})[./-](\d{4})\b/;
const TEXTUAL_DATE = new RegExp(`\\b(\\d{1,2})\\s+(${Object.keys(MONTHS).join('|')})\\s+(\\d{4})\\b`, 'i');

// "N.", "S." and similar stay as written
const ABBREVIATION = /^[A-Z]\.$/;

export function collapseWhitespace(text: string | null | undefined): string {
  if (!text) return '';
  return text.replace(/\s+/g, ' ').trim();
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function titleCaseAddress(text: string): string {
  return text
    .split(/\s+/)
    .filter(Boolean)
    .map(w => (ABBREVIATION.test(w) ? w : capitalize(w)))
    .join(' ');
}

/**
 * Title case every word, no abbreviation exception (company names)
 */
export function titleCaseWords(text: string): string {
  return text.split(/\s+/).filter(Boolean).map(capitalize).join(' ');
}

function pad2(value: string): string {
  return String(parseInt(value, 10)).padStart(2, '0');
}

/**
 * Find a date and return it as DD/MM/YYYY.
 * The numeric form wins whenever present, even if a textual date comes first.
 */
export function parseCanonicalDate(text: string): string {
  if (!text) return '';

  const numeric = text.match(NUMERIC_DATE);
  if (numeric) {
    const [, day, month, year] = numeric;
    return `${pad2(day)}/${pad2(month)}/${year}`;
  }

  const textual = text.match(TEXTUAL_DATE);
  if (textual) {
    const [, day, monthName, year] = textual;
    const month = MONTHS[monthName.toLowerCase()];
    if (month) {
      return `${pad2(day)}/${month}/${year}`;
    }
  }

  return '';
}

/**
 * Text between a heading and the next closing heading; undefined without the heading
 */
export function getSection(text: string, heading: RegExp, end: RegExp): string | undefined {
  const start = heading.exec(text);
  if (!start) return undefined;

  const rest = text.slice(start.index + start[0].length);
  const stop = end.exec(rest);
  return stop ? rest.slice(0, stop.index) : rest;
}

/**
 * Elix number from a filename like "ORD_STRADE_02569.pdf" -> "2569"
 */
export function extractTrailingNumber(filename: string): string {
  if (!filename) return ELIX_SENTINEL;

  const base = filename.split(/[\\/]/).pop() ?? '';
  const name = base.replace(/\.pdf$/i, '');
  const lastSegment = name.split('_').pop() ?? '';

  const digits = lastSegment.match(/(\d+)$/);
  if (!digits) return ELIX_SENTINEL;

  return digits[1].replace(/^0+(?=\d)/, '');
}
