/**
 * XLS Export - one column per ordinance, one row per field, a blank row after
 * every field. The layout is what the road department's spreadsheet expects.
 */

import * as XLSX from 'xlsx';
import { START_DATE_OK } from './types.js';
import type { ExtractedOrdinance, OrdinanceRecord } from './types.js';

export const SHEET_NAME = 'ordinanze';
export const DIAGNOSTICS_SHEET_NAME = 'diagnostica';
export const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const FIELD_LABELS: ReadonlyArray<readonly [string, keyof OrdinanceRecord]> = [
  ['n. Elix', 'elixId'],
  ['OGGETTO', 'subject'],
  ['INDIRIZZO', 'address'],
  ['DATA INIZIO', 'startDate'],
  ['DURATA IN GIORNI', 'durationDays'],
  ['GEOWORKS', 'geoworksCode'],
  ['N. di protocollo della richiesta P.G.', 'protocolNumber'],
  ['Nome della ditta', 'companyName'],
  ['TRASPORTO PUBBLICO URBANO', 'publicTransport'],
  ['ZTL', 'restrictedZone'],
  ['DEMANDA', 'delegation'],
  ['PISTA CICLABILE', 'bikeLane'],
  ['METRO', 'metro'],
  ["BRESCIA MOBILITA'", 'mobilityAgency'],
  ['TAXI', 'taxi'],
  ['Terzultimo', 'addressVerdict'],
  ['Penultimo', 'startDateVerdict'],
  ['Ultimo', 'durationVerdict'],
  ['Revoca (se presente)', 'revocation'],
];

// Each label followed by an empty spacer row
export const ROW_LABELS: string[] = FIELD_LABELS.flatMap(([label]) => [label, '']);

type Column = Pick<ExtractedOrdinance, 'filename' | 'record'>;

export function buildSheetRows(entries: Column[]): string[][] {
  const header = ['', ...entries.map(e => e.filename)];
  const body = FIELD_LABELS.flatMap(([label, key]) => [
    [label, ...entries.map(e => e.record[key])],
    ['', ...entries.map(() => '')],
  ]);
  return [header, ...body];
}

export const DIAGNOSTICS_HEADER = [
  'PDF',
  'Data OGGETTO',
  'Data ORDINA',
  'Giorni OGGETTO',
  'Giorni ORDINA',
  'Giorni (campo)',
  'Esito data',
];

export function buildDiagnosticsRows(entries: ExtractedOrdinance[]): string[][] {
  const rows = entries.flatMap(e => {
    if (!e.diagnostics) return [];
    return [[
      e.filename,
      e.diagnostics.dateFromSubject,
      e.diagnostics.dateFromBody,
      e.diagnostics.durationFromSubject,
      e.diagnostics.durationFromBody.join(', '),
      e.record.durationDays,
      e.record.startDateVerdict === START_DATE_OK ? START_DATE_OK : 'NON COERENTE',
    ]];
  });
  return [DIAGNOSTICS_HEADER, ...rows];
}

export function buildWorkbook(entries: ExtractedOrdinance[], withDiagnostics = false): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(buildSheetRows(entries)), SHEET_NAME);

  if (withDiagnostics) {
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet(buildDiagnosticsRows(entries)),
      DIAGNOSTICS_SHEET_NAME
    );
  }
  return workbook;
}

export function writeWorkbook(entries: ExtractedOrdinance[], withDiagnostics = false): Buffer {
  const data: Buffer = XLSX.write(buildWorkbook(entries, withDiagnostics), { type: 'buffer', bookType: 'xlsx' });
  return data;
}
