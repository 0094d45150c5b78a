import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import type { ExportStorage } from './archiver.js';
import type { MondayClientOptions } from './mondayApi.js';
import { EnvSchema } from './schema.js';

export type BackupConfig = {
  monday: MondayClientOptions;
  driveFolderId: string;
  storage: ExportStorage;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// `KEY=` lines in a .env file come through as empty strings; treat them as unset
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) result[key] = value;
  }
  return result;
}

export function parseConfig(env: NodeJS.ProcessEnv): BackupConfig {
  const parsed = EnvSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.message.includes(String(issue.path[0])) ? issue.message : `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }

  const vars = parsed.data;
  const exportDir = resolve(vars.EXPORT_DIR ?? tmpdir());
  return {
    monday: {
      apiUrl: vars.MONDAY_API_URL,
      apiKey: vars.MONDAY_API_KEY,
      apiVersion: vars.MONDAY_API_VERSION,
      boardLimit: vars.MONDAY_BOARD_LIMIT,
      pageSize: vars.MONDAY_PAGE_SIZE,
      timeoutMs: vars.HTTP_TIMEOUT_MS
    },
    driveFolderId: vars.GDRIVE_FOLDER_ID,
    storage: {
      exportDir,
      failedExportPolicy: vars.FAILED_EXPORT_POLICY,
      failedExportDir: vars.FAILED_EXPORT_DIR ? resolve(vars.FAILED_EXPORT_DIR) : join(exportDir, 'failed-exports')
    }
  };
}
