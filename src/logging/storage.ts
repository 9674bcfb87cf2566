import fs from 'fs';
import path from 'path';
import type { BatchMetrics } from '../types.js';

// Ensure directories exist
function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function runsDir(logsDir: string): string {
  return path.join(logsDir, 'runs');
}

// Save batch run log
export function saveRunLog(
  logsDir: string,
  data: {
    metrics: BatchMetrics;
    documents: { filename: string; elixId: string; warnings: string[] }[];
    failures: { filename: string; error: string }[];
  }
): string {
  const dir = runsDir(logsDir);
  ensureDir(dir);

  const filepath = path.join(dir, `${data.metrics.runId}.json`);
  const logData = {
    runId: data.metrics.runId,
    savedAt: new Date().toISOString(),
    ...data,
  };

  fs.writeFileSync(filepath, JSON.stringify(logData, null, 2));
  return filepath;
}

// List run logs, newest first
export function listRunLogs(logsDir: string): string[] {
  const dir = runsDir(logsDir);
  if (!fs.existsSync(dir)) {
    return [];
  }

  return fs
    .readdirSync(dir)
    .filter(f => f.endsWith('.json'))
    .map(f => f.replace('.json', ''))
    .sort()
    .reverse();
}
