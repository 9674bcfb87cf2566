import type { BatchMetrics, OrdinanceRecord } from '../types.js';
import { ADDRESS_OK, DURATION_OK, ELIX_SENTINEL, START_DATE_OK } from '../types.js';

export class BatchMetricsTracker {
  private metrics: BatchMetrics;

  constructor(label: string = 'ordinanze') {
    this.metrics = {
      runId: `${this.sanitizeName(label)}-${Date.now()}`,
      startTime: new Date().toISOString(),
      documentsReceived: 0,
      documentsExtracted: 0,
      documentsFailed: 0,
      elixMissing: 0,
      protocolMissing: 0,
      addressMismatches: 0,
      startDateMismatches: 0,
      durationMismatches: 0,
    };
  }

  private sanitizeName(name: string): string {
    return name.replace(/[^a-zA-Z0-9]/g, '_');
  }

  recordReceived(count: number): void {
    this.metrics.documentsReceived += count;
  }

  recordFailure(): void {
    this.metrics.documentsFailed++;
  }

  // Extraction tracking
  recordExtraction(record: OrdinanceRecord): void {
    this.metrics.documentsExtracted++;
    if (record.elixId === ELIX_SENTINEL) this.metrics.elixMissing++;
    if (!record.protocolNumber) this.metrics.protocolMissing++;
    if (record.addressVerdict !== ADDRESS_OK) this.metrics.addressMismatches++;
    if (record.startDateVerdict !== START_DATE_OK) this.metrics.startDateMismatches++;
    if (record.durationVerdict !== DURATION_OK) this.metrics.durationMismatches++;
  }

  // Finalize
  finalize(): BatchMetrics {
    this.metrics.endTime = new Date().toISOString();
    this.metrics.durationMs =
      new Date(this.metrics.endTime).getTime() -
      new Date(this.metrics.startTime).getTime();
    return { ...this.metrics };
  }
}
