/**
 * Runtime settings, read from the environment (.env is loaded by the entry points)
 */

export interface AppConfig {
  port: number;
  maxUploadMb: number;
  softUploadLimit: number;   // advisory only, never enforced
  logsDir: string;
  saveRunLogs: boolean;
}

function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readInt(env.PORT, 3000),
    maxUploadMb: readInt(env.MAX_UPLOAD_MB, 25),
    softUploadLimit: readInt(env.SOFT_UPLOAD_LIMIT, 3),
    logsDir: env.LOGS_DIR || 'logs',
    saveRunLogs: readBool(env.SAVE_RUN_LOGS, true),
  };
}
