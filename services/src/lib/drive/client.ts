import fs from "node:fs";
import type { Readable } from "node:stream";
import { google, drive_v3 } from "googleapis";

import type { ServiceAccountCredentials } from "@/lib/config";
import { errorMessage, RemoteError } from "@/lib/errors";

export const DRIVE_API_SCOPE = "https://www.googleapis.com/auth/drive";

const DRIVE_TIMEOUT_MS = 15_000;

export const XLSX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export interface DriveFileEntry {
  id: string;
  name: string;
  modifiedTime?: string;
}

export interface DriveFilePage {
  files: DriveFileEntry[];
  nextPageToken?: string;
}

export interface UploadedDriveFile {
  id: string;
  webViewLink?: string;
  webContentLink?: string;
}

/**
 * The slice of Drive the bot needs. Everything above this interface is
 * testable with an in-memory fake.
 */
export interface DriveGateway {
  listFolder(folderId: string, pageToken?: string): Promise<DriveFilePage>;
  download(fileId: string): Promise<Buffer>;
  upload(input: { name: string; folderId: string; filePath: string; mimeType: string }): Promise<UploadedDriveFile>;
}

export class GoogleDriveGateway implements DriveGateway {
  constructor(private readonly drive: drive_v3.Drive) {}

  async listFolder(folderId: string, pageToken?: string): Promise<DriveFilePage> {
    try {
      const res = await this.drive.files.list(
        {
          q: `'${escapeDriveQuery(folderId)}' in parents and trashed = false`,
          orderBy: "modifiedTime desc",
          fields: "nextPageToken, files(id, name, modifiedTime)",
          pageSize: 100,
          pageToken,
          supportsAllDrives: true,
          includeItemsFromAllDrives: true,
        },
        { timeout: DRIVE_TIMEOUT_MS }
      );

      const files: DriveFileEntry[] = [];
      for (const file of res.data.files ?? []) {
        if (file.id && file.name) {
          files.push({ id: file.id, name: file.name, modifiedTime: file.modifiedTime ?? undefined });
        }
      }
      return { files, nextPageToken: res.data.nextPageToken ?? undefined };
    } catch (error) {
      throw new RemoteError(`Drive listing failed: ${errorMessage(error)}`, { folderId });
    }
  }

  async download(fileId: string): Promise<Buffer> {
    try {
      const res = await this.drive.files.get(
        { fileId, alt: "media", supportsAllDrives: true },
        { responseType: "stream", timeout: DRIVE_TIMEOUT_MS }
      );
      return await readStream(res.data);
    } catch (error) {
      throw new RemoteError(`Drive download failed: ${errorMessage(error)}`, { fileId });
    }
  }

  async upload(input: { name: string; folderId: string; filePath: string; mimeType: string }): Promise<UploadedDriveFile> {
    let file: drive_v3.Schema$File;
    try {
      const res = await this.drive.files.create(
        {
          requestBody: { name: input.name, parents: [input.folderId] },
          media: { mimeType: input.mimeType, body: fs.createReadStream(input.filePath) },
          fields: "id, webViewLink, webContentLink",
          supportsAllDrives: true,
        },
        { timeout: DRIVE_TIMEOUT_MS }
      );
      file = res.data;
    } catch (error) {
      throw new RemoteError(`Drive upload failed: ${errorMessage(error)}`, { name: input.name });
    }

    if (!file.id) {
      throw new RemoteError("Drive upload returned no file id", { name: input.name });
    }
    return {
      id: file.id,
      webViewLink: file.webViewLink ?? undefined,
      webContentLink: file.webContentLink ?? undefined,
    };
  }
}

export function createGoogleDriveGateway(credentials: ServiceAccountCredentials): GoogleDriveGateway {
  const auth = new google.auth.GoogleAuth({
    credentials: { client_email: credentials.client_email, private_key: credentials.private_key },
    scopes: [DRIVE_API_SCOPE],
  });
  return new GoogleDriveGateway(google.drive({ version: "v3", auth }));
}

export function escapeDriveQuery(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

async function readStream(body: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}
