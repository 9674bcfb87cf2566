/**
 * Batch processing - decode and extract every uploaded ordinance
 *
 * Each PDF is handled in its own task. A PDF that cannot be decoded is reported
 * as a failure and the rest of the batch carries on.
 */

import { extractPdfText } from './pdf-text.js';
import type { TextExtractor } from './pdf-text.js';
import { extractOrdinance } from './ordinance-extractor.js';
import { BatchMetricsTracker } from './metrics/tracker.js';
import { ELIX_SENTINEL } from './types.js';
import type {
  BatchResult,
  ExtractedOrdinance,
  FailedOrdinance,
  OrdinanceResult,
  UploadedOrdinance,
} from './types.js';

// Above every real number, however large
export const UNKNOWN_ELIX_RANK = Number.POSITIVE_INFINITY;

export interface BatchOptions {
  orderByElix?: boolean;
  diagnostics?: boolean;
  softUploadLimit?: number;
  extractText?: TextExtractor;
}

export function elixSortKey(elixId: string): number {
  if (!/^\d+$/.test(elixId)) return UNKNOWN_ELIX_RANK;
  const value = parseInt(elixId, 10);
  return Number.isSafeInteger(value) ? value : UNKNOWN_ELIX_RANK;
}

/**
 * Ascending by Elix number; unknown numbers last, ties keep upload order
 */
export function sortByElix<T extends { record: { elixId: string } }>(entries: T[]): T[] {
  return [...entries].sort((a, b) => {
    const left = elixSortKey(a.record.elixId);
    const right = elixSortKey(b.record.elixId);
    return left === right ? 0 : left - right;
  });
}

export function documentWarnings(filename: string, record: { elixId: string; protocolNumber: string }): string[] {
  const warnings: string[] = [];
  if (record.elixId === ELIX_SENTINEL) {
    warnings.push(`ELIX non ricavato dal nome file: ${filename}`);
  }
  if (!record.protocolNumber) {
    warnings.push(`Numero P.G. non trovato: ${filename}`);
  }
  return warnings;
}

async function processOne(
  upload: UploadedOrdinance,
  extractText: TextExtractor,
  withDiagnostics: boolean
): Promise<OrdinanceResult> {
  let fullText: string;
  try {
    fullText = await extractText(upload.data);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[PDF] Failed to read ${upload.filename}:`, message);
    return { status: 'failed', filename: upload.filename, error: message };
  }

  const { record, diagnostics } = extractOrdinance(upload.filename, fullText);
  const result: ExtractedOrdinance = {
    status: 'succeeded',
    filename: upload.filename,
    record,
    warnings: documentWarnings(upload.filename, record),
  };
  if (withDiagnostics) {
    result.diagnostics = diagnostics;
  }
  return result;
}

export async function processOrdinances(
  uploads: UploadedOrdinance[],
  options: BatchOptions = {}
): Promise<BatchResult> {
  const {
    orderByElix = true,
    diagnostics = false,
    softUploadLimit = 3,
    extractText = extractPdfText,
  } = options;

  const tracker = new BatchMetricsTracker();
  tracker.recordReceived(uploads.length);

  const warnings: string[] = [];
  if (uploads.length > softUploadLimit) {
    warnings.push(`Caricati ${uploads.length} PDF (consigliati al massimo ${softUploadLimit})`);
  }

  const results = await Promise.all(uploads.map(u => processOne(u, extractText, diagnostics)));

  const documents: ExtractedOrdinance[] = [];
  const failures: FailedOrdinance[] = [];
  for (const result of results) {
    if (result.status === 'failed') {
      tracker.recordFailure();
      failures.push(result);
      continue;
    }
    tracker.recordExtraction(result.record);
    documents.push(result);
    warnings.push(...result.warnings);
  }

  const metrics = tracker.finalize();
  console.log(
    `[BATCH] ${metrics.runId}: ${metrics.documentsExtracted}/${metrics.documentsReceived} extracted, ${metrics.documentsFailed} failed`
  );

  return {
    documents: orderByElix ? sortByElix(documents) : documents,
    failures,
    warnings,
    metrics,
  };
}
