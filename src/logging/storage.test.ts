import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { listRunLogs, saveRunLog } from './storage.js';
import { BatchMetricsTracker } from '../metrics/tracker.js';

describe('run logs', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function tempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ordinanze-logs-'));
    dirs.push(dir);
    return dir;
  }

  it('saves a run under logs/runs and lists it', () => {
    const logsDir = tempDir();
    const metrics = new BatchMetricsTracker('prova').finalize();

    const filepath = saveRunLog(logsDir, {
      metrics,
      documents: [{ filename: 'ORD_1.pdf', elixId: '1', warnings: [] }],
      failures: [],
    });

    expect(filepath).toBe(path.join(logsDir, 'runs', `${metrics.runId}.json`));
    const saved = JSON.parse(fs.readFileSync(filepath, 'utf8'));
    expect(saved.runId).toBe(metrics.runId);
    expect(saved.documents).toEqual([{ filename: 'ORD_1.pdf', elixId: '1', warnings: [] }]);
    expect(listRunLogs(logsDir)).toEqual([metrics.runId]);
  });

  it('lists nothing before the first run', () => {
    expect(listRunLogs(tempDir())).toEqual([]);
  });
});
