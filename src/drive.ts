import { createReadStream } from 'node:fs';
import type { Readable } from 'node:stream';
import { google } from 'googleapis';
import type { Uploader } from './types.js';

export const DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive';
export const CSV_MIME_TYPE = 'text/csv';

export type DriveFileCreateParams = {
  requestBody: { name: string; parents: string[] };
  media: { mimeType: string; body: Readable };
  fields: string;
};

// The slice of drive_v3 `files` the uploader calls
export type DriveFilesApi = {
  create(params: DriveFileCreateParams): Promise<{ data: { id?: string | null } }>;
};

export function createDriveUploader(folderId: string, files: DriveFilesApi): Uploader {
  const parent = folderId.trim();
  if (!parent) throw new Error('GDRIVE_FOLDER_ID is required');

  return {
    async uploadFile(filePath: string, fileName: string) {
      const res = await files.create({
        requestBody: { name: fileName, parents: [parent] },
        media: { mimeType: CSV_MIME_TYPE, body: createReadStream(filePath) },
        fields: 'id'
      });
      const id = res.data.id;
      if (!id) throw new Error(`Google Drive returned no file id for ${fileName}`);
      return { id };
    }
  };
}

/**
 * Resolves Application Default Credentials up front, so a credential problem
 * fails the run before any board is processed.
 */
export async function connectDrive(folderId: string): Promise<Uploader> {
  const auth = new google.auth.GoogleAuth({ scopes: [DRIVE_SCOPE] });
  await auth.getClient();
  const drive = google.drive({ version: 'v3', auth });
  return createDriveUploader(folderId, {
    create: (params) => drive.files.create(params)
  });
}
