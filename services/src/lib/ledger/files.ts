import type { DriveGateway } from "@/lib/drive/client";
import { ConfigError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import type { LedgerFile } from "@/types/ledger";

export const LEDGER_FILE_PATTERN = /^GL_FP_\d{4}_\d{2}\.xlsx$/i;

export class LedgerFileLister {
  constructor(
    private readonly drive: DriveGateway,
    private readonly sourceFolderId: string | undefined
  ) {}

  /** Most recently modified first. */
  async listLedgerFiles(maxCount: number): Promise<LedgerFile[]> {
    if (!this.sourceFolderId) {
      throw new ConfigError("GL_SOURCE_FOLDER_ID is not configured");
    }
    if (maxCount <= 0) {
      return [];
    }

    const matched: LedgerFile[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.drive.listFolder(this.sourceFolderId, pageToken);
      for (const entry of page.files) {
        if (LEDGER_FILE_PATTERN.test(entry.name)) {
          matched.push({
            id: entry.id,
            name: entry.name,
            modifiedTime: entry.modifiedTime ? new Date(entry.modifiedTime) : new Date(0),
          });
        }
      }
      pageToken = page.nextPageToken;
    } while (pageToken && matched.length < maxCount);

    const files = matched
      .sort((a, b) => b.modifiedTime.getTime() - a.modifiedTime.getTime())
      .slice(0, maxCount);

    logger.debug("Ledger files listed", { count: files.length, names: files.map((file) => file.name) });
    return files;
  }
}
