import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ExportStorage } from './archiver.js';
import { exitCodeFor, runBackup } from './backup.js';
import { MondayApiError } from './mondayApi.js';
import { createFakeSource, createRecordingOutput } from './testing/fakes.js';
import type { Uploader } from './types.js';

type Upload = { fileName: string; content: string };

function createCapturingUploader(failFor: string[] = []): Uploader & { uploads: Upload[] } {
  const uploads: Upload[] = [];
  return {
    uploads,
    async uploadFile(filePath, fileName) {
      if (failFor.includes(fileName)) throw new Error('Drive is unavailable');
      uploads.push({ fileName, content: (await readFile(filePath)).toString('utf8') });
      return { id: `drive-${uploads.length}` };
    }
  };
}

describe('runBackup', () => {
  let storage: ExportStorage;

  beforeEach(async () => {
    const dir = await mkdtemp(join(tmpdir(), 'backup-test-'));
    storage = { exportDir: dir, failedExportPolicy: 'delete', failedExportDir: join(dir, 'failed') };
  });

  afterEach(async () => {
    await rm(storage.exportDir, { recursive: true, force: true });
  });

  it('exports a board to a CSV named after it', async () => {
    const source = createFakeSource([{ id: '101', name: 'Sales/Q1' }], {
      '101': {
        columns: [{ id: 'status', title: 'Status' }],
        pages: [
          {
            items: [
              { id: '1', name: 'Deal A', column_values: [{ id: 'status', text: 'Won' }] },
              { id: '2', name: 'Deal B', column_values: [] }
            ],
            cursor: null
          }
        ]
      }
    });
    const uploader = createCapturingUploader();

    const summary = await runBackup({ source, uploader, output: createRecordingOutput(), storage });

    expect(uploader.uploads).toEqual([
      { fileName: 'SalesQ1.csv', content: '\uFEFFItem ID,Item Name,Status\r\n1,Deal A,Won\r\n2,Deal B,\r\n' }
    ]);
    expect(summary).toEqual({ listFailed: false, boards: 1, exported: ['SalesQ1.csv'], failed: [] });
    expect(exitCodeFor(summary)).toBe(0);
    expect(await readdir(storage.exportDir)).toEqual([]);
  });

  it('skips a board whose columns cannot be fetched and carries on', async () => {
    const boards = [
      { id: '1', name: 'First' },
      { id: '2', name: 'Broken' },
      { id: '3', name: 'Third' }
    ];
    const page = { items: [{ id: '10', name: 'Task', column_values: [] }], cursor: null };
    const source = createFakeSource(boards, {
      '1': { columns: [], pages: [page] },
      '2': { columns: new MondayApiError('monday.com columns query returned errors: Board not found'), pages: [page] },
      '3': { columns: [], pages: [page] }
    });
    const uploader = createCapturingUploader();
    const output = createRecordingOutput();

    const summary = await runBackup({ source, uploader, output, storage });

    expect(source.columnRequests).toEqual(['1', '2', '3']);
    expect(source.pageRequests.map((r) => r.boardId)).toEqual(['1', '3']);
    expect(uploader.uploads.map((u) => u.fileName)).toEqual(['First.csv', 'Third.csv']);
    expect(summary.failed).toEqual([
      { board: { id: '2', name: 'Broken' }, stage: 'export', reason: 'columns or items could not be fetched' }
    ]);
    expect(exitCodeFor(summary)).toBe(2);
    expect(output.lines).toContain("No data to process for board 'Broken'.");
    expect(output.lines.at(-1)).toBe('Done: 2 exported, 1 failed.');
  });

  it('removes the local file after a failed upload and moves on', async () => {
    const page = { items: [{ id: '10', name: 'Task', column_values: [] }], cursor: null };
    const source = createFakeSource(
      [
        { id: '1', name: 'Alpha' },
        { id: '2', name: 'Beta' }
      ],
      {
        '1': { columns: [], pages: [page] },
        '2': { columns: [], pages: [page] }
      }
    );
    const uploader = createCapturingUploader(['Alpha.csv']);

    const summary = await runBackup({ source, uploader, output: createRecordingOutput(), storage });

    expect(uploader.uploads.map((u) => u.fileName)).toEqual(['Beta.csv']);
    expect(summary.exported).toEqual(['Beta.csv']);
    expect(summary.failed).toEqual([
      { board: { id: '1', name: 'Alpha' }, stage: 'archive', reason: 'Drive is unavailable' }
    ]);
    expect(await readdir(storage.exportDir)).toEqual([]);
  });

  it('keeps both exports when same-named boards fail to upload under the retain policy', async () => {
    const source = createFakeSource(
      [
        { id: '1', name: 'Sales/Q1' },
        { id: '2', name: 'SalesQ1' }
      ],
      {
        '1': { columns: [], pages: [{ items: [{ id: '10', name: 'From board 1', column_values: [] }], cursor: null }] },
        '2': { columns: [], pages: [{ items: [{ id: '20', name: 'From board 2', column_values: [] }], cursor: null }] }
      }
    );
    const uploader = createCapturingUploader(['SalesQ1.csv']);

    const summary = await runBackup({
      source,
      uploader,
      output: createRecordingOutput(),
      storage: { ...storage, failedExportPolicy: 'retain' }
    });

    expect(summary.failed.map((f) => f.board.id)).toEqual(['1', '2']);
    expect((await readdir(storage.failedExportDir)).sort()).toEqual(['SalesQ1 (1).csv', 'SalesQ1.csv']);
    expect((await readFile(join(storage.failedExportDir, 'SalesQ1.csv'))).toString('utf8')).toBe(
      '\uFEFFItem ID,Item Name\r\n10,From board 1\r\n'
    );
    expect((await readFile(join(storage.failedExportDir, 'SalesQ1 (1).csv'))).toString('utf8')).toBe(
      '\uFEFFItem ID,Item Name\r\n20,From board 2\r\n'
    );
    expect(await readdir(storage.exportDir)).toEqual(['failed']);
  });

  it('writes into its own run directory and leaves other files in the export directory alone', async () => {
    await writeFile(join(storage.exportDir, 'Alpha.csv'), 'not ours');
    const source = createFakeSource([{ id: '1', name: 'Alpha' }], {
      '1': { columns: [], pages: [{ items: [{ id: '10', name: 'Task', column_values: [] }], cursor: null }] }
    });
    const uploader = createCapturingUploader();

    await runBackup({ source, uploader, output: createRecordingOutput(), storage });

    expect(uploader.uploads.map((u) => u.fileName)).toEqual(['Alpha.csv']);
    expect(await readdir(storage.exportDir)).toEqual(['Alpha.csv']);
    expect((await readFile(join(storage.exportDir, 'Alpha.csv'))).toString('utf8')).toBe('not ours');
  });

  it('archives an empty board as a header-only CSV', async () => {
    const source = createFakeSource([{ id: '5', name: 'Empty' }], {
      '5': { columns: [{ id: 'status', title: 'Status' }], pages: [{ items: [], cursor: null }] }
    });
    const uploader = createCapturingUploader();

    await runBackup({ source, uploader, output: createRecordingOutput(), storage });

    expect(uploader.uploads).toEqual([{ fileName: 'Empty.csv', content: '\uFEFFItem ID,Item Name\r\n' }]);
  });

  it('stops when the boards cannot be listed', async () => {
    const uploader = createCapturingUploader();
    const output = createRecordingOutput();

    const summary = await runBackup({
      source: createFakeSource(new Error('getaddrinfo ENOTFOUND api.monday.com')),
      uploader,
      output,
      storage
    });

    expect(summary).toEqual({ listFailed: true, boards: 0, exported: [], failed: [] });
    expect(exitCodeFor(summary)).toBe(1);
    expect(uploader.uploads).toEqual([]);
    expect(output.errors).toEqual([
      'Error fetching boards: getaddrinfo ENOTFOUND api.monday.com',
      'Could not list boards. Nothing was exported.'
    ]);
  });

  it('finishes cleanly when the account has no boards', async () => {
    const output = createRecordingOutput();

    const summary = await runBackup({
      source: createFakeSource([]),
      uploader: createCapturingUploader(),
      output,
      storage
    });

    expect(exitCodeFor(summary)).toBe(0);
    expect(output.lines).toEqual(['Found 0 boards.', 'No boards found. Nothing to export.']);
  });
});
