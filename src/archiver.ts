import { constants } from 'node:fs';
import { copyFile, mkdir, rm, writeFile } from 'node:fs/promises';
import { join, parse } from 'node:path';
import { encodeCsv, formatCsv } from './csv.js';
import { ITEM_ID_COLUMN, ITEM_NAME_COLUMN } from './exporter.js';
import { describeError, toError, type Output } from './output.js';
import type { FailedExportPolicy, Row, Uploader } from './types.js';

const ILLEGAL_FILE_NAME_CHARS = /[\\/*?:"<>|]/g;
const UNTITLED_BOARD = 'untitled-board';

export type ExportStorage = {
  exportDir: string;
  failedExportPolicy: FailedExportPolicy;
  failedExportDir: string;
};

export type ArchiveOptions = ExportStorage & {
  uploader: Uploader;
  output: Output;
};

export type ArchiveResult =
  | { ok: true; fileName: string; fileId: string; rowCount: number }
  | { ok: false; fileName: string; error: Error };

export function sanitizeFileName(name: string): string {
  return name.replace(ILLEGAL_FILE_NAME_CHARS, '');
}

export function exportFileName(boardName: string): string {
  const safe = sanitizeFileName(boardName);
  return `${safe.trim() ? safe : UNTITLED_BOARD}.csv`;
}

/**
 * Writes the rows as `<board name>.csv`, uploads the file and disposes of the
 * local copy. Failures are reported in the result, never thrown.
 */
export async function archive(boardName: string, rows: readonly Row[], options: ArchiveOptions): Promise<ArchiveResult> {
  const { uploader, output } = options;
  const fileName = exportFileName(boardName);
  const filePath = join(options.exportDir, fileName);

  try {
    await mkdir(options.exportDir, { recursive: true });
    await writeFile(filePath, encodeCsv(formatCsv(rows, [ITEM_ID_COLUMN, ITEM_NAME_COLUMN])));
  } catch (error) {
    output.appendError(`Error writing ${fileName}: ${describeError(error)}`);
    await removeLocalFile(filePath, output);
    return { ok: false, fileName, error: toError(error) };
  }
  output.appendLine(`Created CSV file: ${fileName} with ${rows.length} rows.`);

  let result: ArchiveResult;
  try {
    const file = await uploader.uploadFile(filePath, fileName);
    output.appendLine(`Uploaded ${fileName} to Google Drive. File ID: ${file.id}`);
    result = { ok: true, fileName, fileId: file.id, rowCount: rows.length };
  } catch (error) {
    output.appendError(`Error uploading ${fileName} to Google Drive: ${describeError(error)}`);
    result = { ok: false, fileName, error: toError(error) };
  }

  if (!result.ok && options.failedExportPolicy === 'retain') {
    await retainFailedExport(filePath, fileName, options);
  } else {
    await removeLocalFile(filePath, output);
  }
  return result;
}

async function removeLocalFile(filePath: string, output: Output): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (error) {
    output.appendError(`Could not remove ${filePath}: ${describeError(error)}`);
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

// Never overwrites: an earlier unsent export of a same-named board gets `<name> (1).csv` and so on
async function retainFailedExport(filePath: string, fileName: string, options: ArchiveOptions): Promise<void> {
  const { name, ext } = parse(fileName);
  try {
    await mkdir(options.failedExportDir, { recursive: true });
    for (let attempt = 0; ; attempt++) {
      const keptName = attempt === 0 ? fileName : `${name} (${attempt})${ext}`;
      try {
        await copyFile(filePath, join(options.failedExportDir, keptName), constants.COPYFILE_EXCL);
      } catch (error) {
        if (isAlreadyExists(error)) continue;
        throw error;
      }
      await rm(filePath, { force: true });
      options.output.appendLine(`Kept ${keptName} in ${options.failedExportDir} for a manual upload.`);
      return;
    }
  } catch (error) {
    // the export stays where it was written
    options.output.appendError(`Could not move ${fileName} to ${options.failedExportDir}: ${describeError(error)}`);
  }
}
