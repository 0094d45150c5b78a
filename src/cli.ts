#!/usr/bin/env node
import { join } from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { EXIT_FATAL, exitCodeFor, runBackup } from './backup.js';
import { ConfigError, parseConfig, type BackupConfig } from './config.js';
import { connectDrive } from './drive.js';
import { createMondayClient } from './mondayApi.js';
import { createConsoleOutput, describeError } from './output.js';
import type { Uploader } from './types.js';

const EnvFilePathSchema = z.string().min(1);

function getEnvFilePath(): string {
  const arg = process.argv.find((a: string) => a.startsWith('--env-file='));
  if (arg) return EnvFilePathSchema.parse(arg.slice('--env-file='.length));
  return join(process.cwd(), '.env');
}

async function main(): Promise<number> {
  const output = createConsoleOutput();
  dotenv.config({ path: getEnvFilePath() });

  let config: BackupConfig;
  try {
    config = parseConfig(process.env);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    output.appendError(error.message);
    return EXIT_FATAL;
  }

  let uploader: Uploader;
  try {
    uploader = await connectDrive(config.driveFolderId);
  } catch (error) {
    output.appendError(`Error authenticating with Google Cloud: ${describeError(error)}`);
    return EXIT_FATAL;
  }

  const summary = await runBackup({
    source: createMondayClient(config.monday),
    uploader,
    output,
    storage: config.storage
  });
  return exitCodeFor(summary);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(EXIT_FATAL);
  });
