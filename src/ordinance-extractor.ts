/**
 * Ordinance Extractor - turn the text of a "Settore Strade" traffic ordinance
 * into one export record
 *
 * The subject ("OGGETTO") and the body of the ordinance both state address,
 * start date and duration. Each value is read from both places and the pair is
 * checked for agreement; the subject wins when both are present.
 */

import {
  collapseWhitespace,
  extractTrailingNumber,
  getSection,
  parseCanonicalDate,
  titleCaseAddress,
  titleCaseWords,
} from './text-normalizer.js';
import { detectFlags } from './flag-detector.js';
import {
  ADDRESS_MISMATCH,
  ADDRESS_OK,
  DURATION_MISMATCH,
  DURATION_OK,
  GEOWORKS_ABSENT,
  START_DATE_MISMATCH,
  START_DATE_OK,
} from './types.js';
import type {
  AddressVerdict,
  DurationVerdict,
  OrdinanceDiagnostics,
  OrdinanceRecord,
  StartDateVerdict,
} from './types.js';

const SUBJECT_PATTERN = /OGGETTO:\s*([\s\S]+?)IL RESPONSABILE DEL SETTORE STRADE/i;

const ORDER_HEADING = /\bORDINA\b/i;
const ORDER_END = /\b(?:DEMANDA|AVVERTE|Per il Responsabile|IL RESPONSABILE)\b/i;

const REVOCATION_SUBJECT = /^Revoca\b/i;
const REVOCATION_PATTERN = /Data la necessità di revocare l[’']ordinanza P\.G\. n\.[^.;\n]*?per\s+([^;]+);/i;

const GEOWORKS_PATTERN = /(?:Codice\s*Geo\s*Works|Geo\s*Works|Geoworks)\s*:\s*([\w.-]+)/i;

// Subject streets end at the first dash or comma; body streets end at the line
const SUBJECT_STREET = /\bvia\s+[^,;\-–—]+/i;
const BODY_STREET = /\bvia\s+[A-Za-zÀ-ÖØ-öø-ÿ0-9'./ \t-]+/i;
const STREET_HEAD = /^via\s+[^\s,;.]+/i;
const STREET_STOPS = String.raw`\s[-–—]\s|[,;]|(?<!\b[A-Z])\.(?=\s|$)|\s(?:provvedimenti|divieto|dalle|dal|del|durata|per|in prossimità|lato|nei pressi|area|zone|civico|civici)(?=\s|$)`;

const DURATION_PATTERN = /durata\s+presunta\s+di\s+(\d+)\s*(?:gg|giorni)\b/i;
const HOURS_PATTERN = /\bore\b/i;

const PROTOCOL_PATTERN = /\bP\.?\s*G\.?\s*n\s*[°ºo]?\s*\.?\s*(\d+)(?:\s*\/\s*\d{2,4})?/i;
const COMPANY_PATTERN = /\bditta\s+([^,;\n]+)[,;\n]/i;

export function extractSubject(fullText: string): string {
  const match = SUBJECT_PATTERN.exec(fullText);
  return match ? collapseWhitespace(match[1]) : '';
}

/**
 * The body readings come from here: the "ORDINA" section after the subject,
 * or everything after the subject when there is no such heading
 */
export function extractBody(fullText: string): string {
  const subject = SUBJECT_PATTERN.exec(fullText);
  const rest = subject ? fullText.slice(subject.index + subject[0].length) : fullText;
  return getSection(rest, ORDER_HEADING, ORDER_END) ?? rest;
}

export function extractRevocation(subject: string, fullText: string): string {
  if (!REVOCATION_SUBJECT.test(subject)) return '';
  const match = REVOCATION_PATTERN.exec(fullText);
  return match ? collapseWhitespace(match[1]) : '';
}

export function extractGeoworksCode(subject: string): string {
  const match = GEOWORKS_PATTERN.exec(subject);
  return match ? match[1] : GEOWORKS_ABSENT;
}

/**
 * Cut a raw "via ..." match at the first delimiter after the street's first word
 */
export function cleanStreet(raw: string): string {
  const text = collapseWhitespace(raw);
  const head = STREET_HEAD.exec(text);
  const stops = new RegExp(STREET_STOPS, 'gi');
  stops.lastIndex = head ? head[0].length : 0;

  const stop = stops.exec(text);
  return (stop ? text.slice(0, stop.index) : text).trim();
}

function findStreet(pattern: RegExp, text: string): string {
  const match = pattern.exec(text);
  return match ? cleanStreet(match[0]) : '';
}

function sameStreet(a: string, b: string): boolean {
  return collapseWhitespace(a).toLowerCase() === collapseWhitespace(b).toLowerCase();
}

// Agreement rule shared by address and start date: one side alone is fine,
// two sides must match, nothing at all is a mismatch.
function agrees(fromSubject: string, fromBody: string, equal: (a: string, b: string) => boolean): boolean {
  if (fromSubject && fromBody) return equal(fromSubject, fromBody);
  return Boolean(fromSubject) !== Boolean(fromBody);
}

function durationsIn(text: string): string[] {
  const global = new RegExp(DURATION_PATTERN.source, 'gi');
  return Array.from(text.matchAll(global), m => m[1]);
}

export function extractProtocolNumber(fullText: string): string {
  const match = PROTOCOL_PATTERN.exec(fullText);
  return match ? match[1] : '';
}

export function extractCompanyName(fullText: string): string {
  const match = COMPANY_PATTERN.exec(fullText);
  return match ? titleCaseWords(collapseWhitespace(match[1])) : '';
}

/**
 * Subject and body readings of address, start date and duration
 */
export function diagnoseOrdinance(fullText: string, subject: string = extractSubject(fullText)): OrdinanceDiagnostics {
  const body = extractBody(fullText);
  const duration = DURATION_PATTERN.exec(subject);
  return {
    addressFromSubject: findStreet(SUBJECT_STREET, subject),
    addressFromBody: findStreet(BODY_STREET, body),
    dateFromSubject: parseCanonicalDate(subject),
    dateFromBody: parseCanonicalDate(body),
    durationFromSubject: duration ? duration[1] : '',
    durationFromBody: durationsIn(fullText),
  };
}

export interface OrdinanceExtraction {
  record: Readonly<OrdinanceRecord>;
  diagnostics: OrdinanceDiagnostics;
}

/**
 * Main entry point: one record per ordinance, never throws
 */
export function extractOrdinanceFields(filename: string, fullText: string): Readonly<OrdinanceRecord> {
  return extractOrdinance(filename, fullText).record;
}

/**
 * Record plus the subject and body readings it was built from
 */
export function extractOrdinance(filename: string, fullText: string): OrdinanceExtraction {
  const text = fullText || '';
  const subject = extractSubject(text);
  const diag = diagnoseOrdinance(text, subject);

  const addressSource = diag.addressFromSubject || diag.addressFromBody;
  const addressVerdict: AddressVerdict = agrees(diag.addressFromSubject, diag.addressFromBody, sameStreet)
    ? ADDRESS_OK
    : ADDRESS_MISMATCH;

  const startDateVerdict: StartDateVerdict = agrees(diag.dateFromSubject, diag.dateFromBody, (a, b) => a === b)
    ? START_DATE_OK
    : START_DATE_MISMATCH;

  let durationDays = diag.durationFromSubject;
  if (!durationDays && (HOURS_PATTERN.test(subject) || HOURS_PATTERN.test(text))) {
    durationDays = '1';
  }

  // A missing body duration never counts as a disagreement
  const durationVerdict: DurationVerdict =
    diag.durationFromSubject && diag.durationFromBody.some(n => n !== diag.durationFromSubject)
      ? DURATION_MISMATCH
      : DURATION_OK;

  const record: Readonly<OrdinanceRecord> = Object.freeze({
    elixId: extractTrailingNumber(filename),
    subject,
    address: addressSource ? titleCaseAddress(addressSource) : '',
    startDate: diag.dateFromSubject || diag.dateFromBody,
    durationDays,
    geoworksCode: extractGeoworksCode(subject),
    protocolNumber: extractProtocolNumber(text),
    companyName: extractCompanyName(text),
    ...detectFlags(text),
    addressVerdict,
    startDateVerdict,
    durationVerdict,
    revocation: extractRevocation(subject, text),
  });
  return { record, diagnostics: diag };
}
