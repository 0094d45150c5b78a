import { mkdir, mkdtemp, rmdir } from 'node:fs/promises';
import { join } from 'node:path';
import { archive, type ExportStorage } from './archiver.js';
import { exportBoard } from './exporter.js';
import { listBoards } from './lister.js';
import { describeError, type Output } from './output.js';
import type { Board, SourceClient, Uploader } from './types.js';

export type BackupOptions = {
  source: SourceClient;
  uploader: Uploader;
  output: Output;
  storage: ExportStorage;
};

export type BoardFailure = {
  board: Board;
  stage: 'export' | 'archive';
  reason: string;
};

export type BackupSummary = {
  listFailed: boolean;
  boards: number;
  exported: string[];
  failed: BoardFailure[];
};

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL_FAILURE = 2;

/**
 * Exports and archives every board, one at a time. A failing board never stops the run.
 *
 * CSV files are written to a fresh `run-*` directory under the export directory,
 * which is removed again once it is empty.
 */
export async function runBackup({ source, uploader, output, storage }: BackupOptions): Promise<BackupSummary> {
  const listing = await listBoards(source, output);
  if (!listing.ok) {
    output.appendError('Could not list boards. Nothing was exported.');
    return { listFailed: true, boards: 0, exported: [], failed: [] };
  }
  if (listing.boards.length === 0) {
    output.appendLine('No boards found. Nothing to export.');
    return { listFailed: false, boards: 0, exported: [], failed: [] };
  }

  await mkdir(storage.exportDir, { recursive: true });
  const runDir = await mkdtemp(join(storage.exportDir, 'run-'));
  const exported: string[] = [];
  const failed: BoardFailure[] = [];

  try {
    for (const board of listing.boards) {
      output.appendLine(`--- Processing Board: ${board.name} (ID: ${board.id}) ---`);

      const rows = await exportBoard(board.id, { source, output });
      if (rows === null) {
        output.appendLine(`No data to process for board '${board.name}'.`);
        failed.push({ board, stage: 'export', reason: 'columns or items could not be fetched' });
        continue;
      }

      const result = await archive(board.name, rows, { ...storage, exportDir: runDir, uploader, output });
      if (result.ok) {
        exported.push(result.fileName);
      } else {
        failed.push({ board, stage: 'archive', reason: describeError(result.error) });
      }
    }
  } finally {
    await removeRunDir(runDir, output);
  }

  output.appendLine(`Done: ${exported.length} exported, ${failed.length} failed.`);
  return { listFailed: false, boards: listing.boards.length, exported, failed };
}

// rmdir refuses a non-empty directory, so an export that could not be moved aside survives
async function removeRunDir(runDir: string, output: Output): Promise<void> {
  try {
    await rmdir(runDir);
  } catch (error) {
    output.appendError(`Left ${runDir} in place: ${describeError(error)}`);
  }
}

export function exitCodeFor(summary: BackupSummary): number {
  if (summary.listFailed) return EXIT_FATAL;
  return summary.failed.length > 0 ? EXIT_PARTIAL_FAILURE : EXIT_OK;
}
