import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { type DriveGateway, XLSX_MIME_TYPE } from "@/lib/drive/client";
import { ConfigError, EmptyResultError, errorMessage, RemoteError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { writeLedgerWorkbook } from "@/lib/ledger/workbook";
import type { LedgerTable } from "@/types/ledger";

const MAX_TAG_LENGTH = 50;
const DEFAULT_TAG = "resultado";

export function sanitizeTag(tag: string): string {
  const cleaned = tag
    .replace(/[^A-Za-z0-9_-]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, MAX_TAG_LENGTH);
  return cleaned || DEFAULT_TAG;
}

export function buildResultFileName(tag: string, at: Date): string {
  return `resultado_${sanitizeTag(tag)}_${Math.floor(at.getTime() / 1000)}.xlsx`;
}

export interface ResultExporterOptions {
  outputDir?: string;
  now?: () => Date;
}

export class ResultExporter {
  private readonly outputDir: string;
  private readonly now: () => Date;

  constructor(
    private readonly drive: DriveGateway,
    private readonly outputFolderId: string | undefined,
    options: ResultExporterOptions = {}
  ) {
    this.outputDir = options.outputDir ?? os.tmpdir();
    this.now = options.now ?? (() => new Date());
  }

  /** Returns the view link of the uploaded spreadsheet, or its download link. */
  async exportAndUpload(table: LedgerTable, tag: string): Promise<string> {
    if (table.rows.length === 0) {
      throw new EmptyResultError();
    }
    if (!this.outputFolderId) {
      throw new ConfigError("GL_OUTPUT_FOLDER_ID is not configured");
    }

    const fileName = buildResultFileName(tag, this.now());
    const filePath = path.join(this.outputDir, fileName);

    try {
      await writeLedgerWorkbook(table, filePath);
      const uploaded = await this.drive.upload({
        name: fileName,
        folderId: this.outputFolderId,
        filePath,
        mimeType: XLSX_MIME_TYPE,
      });

      const link = uploaded.webViewLink ?? uploaded.webContentLink;
      if (!link) {
        throw new RemoteError("Uploaded file has no shareable link", { fileId: uploaded.id });
      }

      logger.info("Result uploaded", { fileName, fileId: uploaded.id, rows: table.rows.length });
      return link;
    } finally {
      await removeLocalFile(filePath);
    }
  }
}

async function removeLocalFile(filePath: string): Promise<void> {
  try {
    await fs.promises.unlink(filePath);
  } catch (error) {
    logger.warn("Could not remove local export file", { filePath, error: errorMessage(error) });
  }
}
