// Flag sentinels are surfaced verbatim in the spreadsheet, so each flag is a
// closed pair of literals rather than a boolean.
export type PublicTransportFlag = 'TRASPORTO_SI' | 'no T';
export type RestrictedZoneFlag = 'ZTL_SI' | 'no Z';
export type DelegationFlag = 'SQ. MULTIDISC. SI' | 'no D';
export type BikeLaneFlag = 'PISTA CICLABILE SI' | 'no P';
export type MetroFlag = 'METRO SI' | 'no M';
export type MobilityAgencyFlag = "BRESCIA MOBILITA' SI" | 'no B';
export type TaxiFlag = 'TAXI SI' | 'no T';

export interface OrdinanceFlags {
  publicTransport: PublicTransportFlag;
  restrictedZone: RestrictedZoneFlag;
  delegation: DelegationFlag;
  bikeLane: BikeLaneFlag;
  metro: MetroFlag;
  mobilityAgency: MobilityAgencyFlag;
  taxi: TaxiFlag;
}

export const ADDRESS_OK = 'OK Indirizzo';
export const ADDRESS_MISMATCH = 'INDIRIZZO NON COERENTE TRA OGGETTO E TESTO DELL’ORDINANZA';
export const START_DATE_OK = 'OK Inizio';
export const START_DATE_MISMATCH = 'DATA INIZIO NON COERENTE TRA OGGETTO E TESTO DELL’ORDINANZA';
export const DURATION_OK = 'OK Durata';
export const DURATION_MISMATCH = 'DURATA IN GIORNI NON COERENTE TRA OGGETTO E TESTO DELL’ORDINANZA';

export type AddressVerdict = typeof ADDRESS_OK | typeof ADDRESS_MISMATCH;
export type StartDateVerdict = typeof START_DATE_OK | typeof START_DATE_MISMATCH;
export type DurationVerdict = typeof DURATION_OK | typeof DURATION_MISMATCH;

export const ELIX_SENTINEL = 'ELIX';
export const GEOWORKS_ABSENT = ' ';

export interface OrdinanceRecord extends OrdinanceFlags {
  elixId: string;
  subject: string;
  address: string;
  startDate: string;        // DD/MM/YYYY or ''
  durationDays: string;
  geoworksCode: string;
  protocolNumber: string;
  companyName: string;
  addressVerdict: AddressVerdict;
  startDateVerdict: StartDateVerdict;
  durationVerdict: DurationVerdict;
  revocation: string;
}

// Subject vs body values behind the three verdicts
export interface OrdinanceDiagnostics {
  addressFromSubject: string;
  addressFromBody: string;
  dateFromSubject: string;
  dateFromBody: string;
  durationFromSubject: string;
  durationFromBody: string[];
}

export interface UploadedOrdinance {
  filename: string;
  data: Buffer;
}

export interface ExtractedOrdinance {
  status: 'succeeded';
  filename: string;
  record: Readonly<OrdinanceRecord>;
  warnings: string[];
  diagnostics?: OrdinanceDiagnostics;
}

export interface FailedOrdinance {
  status: 'failed';
  filename: string;
  error: string;
}

export type OrdinanceResult = ExtractedOrdinance | FailedOrdinance;

export interface BatchMetrics {
  runId: string;
  startTime: string;
  endTime?: string;
  durationMs?: number;
  documentsReceived: number;
  documentsExtracted: number;
  documentsFailed: number;
  elixMissing: number;
  protocolMissing: number;
  addressMismatches: number;
  startDateMismatches: number;
  durationMismatches: number;
}

export interface BatchResult {
  documents: ExtractedOrdinance[];
  failures: FailedOrdinance[];
  warnings: string[];
  metrics: BatchMetrics;
}
