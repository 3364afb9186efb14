import { classifyCommand, type Command, formatReference, HELP_TEXT } from "@/lib/bot/commands";
import { ConfigError } from "@/lib/errors";
import { filterByJournals, filterByPoPr } from "@/lib/ledger/filters";
import type { ResultExporter } from "@/lib/ledger/export";
import type { LedgerScanner } from "@/lib/ledger/scan";
import { logger } from "@/lib/logger";
import type { Messenger } from "@/lib/seatalk/messenger";
import { formatLocalTime, uptimeSeconds } from "@/lib/time";

export const PO_PR_SCAN_FILES = 12;
export const JOURNAL_SCAN_FILES = 18;

export const UNRECOGNIZED_TEXT = "Não entendi 🤔. Envie 'ajuda' para ver os comandos disponíveis.";
export const JOURNAL_PROMPT_TEXT = "Informe o(s) número(s) do journal. Ex.: journal J12345 J67890";

export interface DispatcherDeps {
  messenger: Messenger;
  scanner?: Pick<LedgerScanner, "scanAndFilter">;
  exporter?: Pick<ResultExporter, "exportAndUpload">;
  timezone: string;
  startedAt: number;
  now?: () => number;
}

export class CommandDispatcher {
  private readonly now: () => number;

  constructor(private readonly deps: DispatcherDeps) {
    this.now = deps.now ?? Date.now;
  }

  get driveConfigured(): boolean {
    return Boolean(this.deps.scanner && this.deps.exporter);
  }

  async dispatch(employeeCode: string, text: string): Promise<Command> {
    const command = classifyCommand(text, { driveConfigured: this.driveConfigured });
    logger.info("Dispatching command", { employeeCode, kind: command.kind });

    switch (command.kind) {
      case "help":
        await this.reply(employeeCode, HELP_TEXT);
        break;
      case "status":
        await this.reply(employeeCode, this.statusText());
        break;
      case "ping":
        await this.reply(employeeCode, "pong");
        break;
      case "po-lookup":
        await this.lookupPoPr(employeeCode, formatReference(command.refType, command.number));
        break;
      case "journal-lookup":
        await this.lookupJournals(employeeCode, command.journalIds);
        break;
      case "journal-prompt":
        await this.reply(employeeCode, JOURNAL_PROMPT_TEXT);
        break;
      case "unrecognized":
        await this.reply(employeeCode, UNRECOGNIZED_TEXT);
        break;
    }

    return command;
  }

  async reply(employeeCode: string, text: string): Promise<void> {
    const delivered = await this.deps.messenger.sendDirectMessage(employeeCode, text);
    if (!delivered) {
      logger.warn("SeaTalk message not delivered", { employeeCode });
    }
  }

  private statusText(): string {
    const now = this.now();
    return [
      "Online ✅",
      `Uptime: ${uptimeSeconds(this.deps.startedAt, now)}s`,
      `Hora: ${formatLocalTime(new Date(now), this.deps.timezone)} (${this.deps.timezone})`,
    ].join("\n");
  }

  private async lookupPoPr(employeeCode: string, reference: string): Promise<void> {
    const { scanner, exporter } = this.requireDrive();
    await this.reply(employeeCode, `🔎 Buscando ${reference} nos últimos ${PO_PR_SCAN_FILES} arquivos GL...`);

    const { table } = await scanner.scanAndFilter((ledger) => filterByPoPr(ledger, reference), PO_PR_SCAN_FILES);
    if (table.rows.length === 0) {
      await this.reply(employeeCode, `Nenhum resultado encontrado para ${reference}.`);
      return;
    }

    const link = await exporter.exportAndUpload(table, reference);
    await this.reply(employeeCode, `✅ Resultado para ${reference}: ${link}`);
  }

  private async lookupJournals(employeeCode: string, journalIds: string[]): Promise<void> {
    const { scanner, exporter } = this.requireDrive();
    const label = journalIds.join(", ");
    await this.reply(employeeCode, `🔎 Buscando journal(s) ${label} nos últimos ${JOURNAL_SCAN_FILES} arquivos GL...`);

    const { table } = await scanner.scanAndFilter((ledger) => filterByJournals(ledger, journalIds), JOURNAL_SCAN_FILES);
    if (table.rows.length === 0) {
      await this.reply(employeeCode, `Nenhum resultado encontrado para journal(s) ${label}.`);
      return;
    }

    const link = await exporter.exportAndUpload(table, `journal_${journalIds.join("_")}`);
    await this.reply(employeeCode, `✅ ${table.rows.length} linha(s) encontrada(s) para journal(s) ${label}: ${link}`);
  }

  private requireDrive() {
    const { scanner, exporter } = this.deps;
    if (!scanner || !exporter) {
      throw new ConfigError("Drive lookups are not configured");
    }
    return { scanner, exporter };
  }
}
