/**
 * Generate the ordinance spreadsheet from a folder of PDFs
 *
 * Usage: tsx src/generate-xls.ts <input-dir> [output.xlsx] [--no-order] [--diagnostics]
 */

import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { loadConfig } from './config.js';
import { processOrdinances } from './batch.js';
import { writeWorkbook } from './xls-export.js';
import { saveRunLog } from './logging/storage.js';
import type { UploadedOrdinance } from './types.js';

export interface CliArgs {
  inputDir: string;
  output: string;
  orderByElix: boolean;
  diagnostics: boolean;
}

export function parseArgs(argv: string[]): CliArgs | null {
  const flags = argv.filter(a => a.startsWith('--'));
  const positional = argv.filter(a => !a.startsWith('--'));
  if (positional.length === 0) return null;

  return {
    inputDir: positional[0],
    output: positional[1] || 'ordinanze.xlsx',
    orderByElix: !flags.includes('--no-order'),
    diagnostics: flags.includes('--diagnostics'),
  };
}

export function readPdfFolder(dir: string): UploadedOrdinance[] {
  return fs
    .readdirSync(dir)
    .filter(f => /\.pdf$/i.test(f))
    .sort()
    .map(f => ({ filename: f, data: fs.readFileSync(path.join(dir, f)) }));
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.log('Usage: generate-xls <input-dir> [output.xlsx] [--no-order] [--diagnostics]');
    return 1;
  }

  const uploads = readPdfFolder(args.inputDir);
  if (uploads.length === 0) {
    console.log(`No PDF found in ${args.inputDir}`);
    return 1;
  }

  const config = loadConfig();
  const result = await processOrdinances(uploads, {
    orderByElix: args.orderByElix,
    diagnostics: args.diagnostics,
    softUploadLimit: config.softUploadLimit,
  });

  for (const warning of result.warnings) {
    console.log(`⚠️  ${warning}`);
  }
  for (const failure of result.failures) {
    console.log(`❌ ${failure.filename}: ${failure.error}`);
  }

  if (result.documents.length > 0) {
    fs.writeFileSync(args.output, writeWorkbook(result.documents, args.diagnostics));
    console.log(`Excel generato (${result.documents.length} colonne / PDF): ${args.output}`);
  }

  if (config.saveRunLogs) {
    const logPath = saveRunLog(config.logsDir, {
      metrics: result.metrics,
      documents: result.documents.map(d => ({ filename: d.filename, elixId: d.record.elixId, warnings: d.warnings })),
      failures: result.failures,
    });
    console.log(`Run log: ${logPath}`);
  }
  return 0;
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('[XLS] Fatal:', error);
      process.exitCode = 1;
    });
}
