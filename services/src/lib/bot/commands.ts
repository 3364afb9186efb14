import type { LedgerRefType } from "@/types/ledger";

export type Command =
  | { kind: "help" }
  | { kind: "status" }
  | { kind: "ping" }
  | { kind: "po-lookup"; refType: LedgerRefType; number: string }
  | { kind: "journal-lookup"; journalIds: string[] }
  | { kind: "journal-prompt" }
  | { kind: "unrecognized" };

const HELP_WORDS = new Set(["help", "/help", "ajuda"]);

// At least three digits, so stray short numbers after "po"/"pr" are ignored.
const PO_PR_COMMAND = /\b(po|pr)\b[^0-9]*([0-9]{3,})/;

const JOURNAL_TOKEN = /[A-Za-z0-9][A-Za-z0-9_-]*/g;

export interface ClassifyOptions {
  driveConfigured: boolean;
}

export function classifyCommand(rawText: string, options: ClassifyOptions): Command {
  const raw = rawText.trim();
  const lower = raw.toLowerCase();

  if (HELP_WORDS.has(raw)) {
    return { kind: "help" };
  }
  if (lower === "status") {
    return { kind: "status" };
  }
  if (lower === "ping") {
    return { kind: "ping" };
  }

  if (options.driveConfigured) {
    const match = PO_PR_COMMAND.exec(lower);
    if (match) {
      return { kind: "po-lookup", refType: match[1] === "pr" ? "pr" : "po", number: match[2] };
    }

    if (lower.startsWith("journal")) {
      const journalIds = extractJournalIds(raw);
      return journalIds.length > 0 ? { kind: "journal-lookup", journalIds } : { kind: "journal-prompt" };
    }
  }

  return { kind: "unrecognized" };
}

/** Tokens that contain a digit, in order, without duplicates. Case is kept. */
export function extractJournalIds(text: string): string[] {
  const ids: string[] = [];
  for (const token of text.match(JOURNAL_TOKEN) ?? []) {
    if (/\d/.test(token) && !ids.includes(token)) {
      ids.push(token);
    }
  }
  return ids;
}

export function formatReference(refType: LedgerRefType, number: string): string {
  return `${refType.toUpperCase()}-${number}`;
}

export const HELP_TEXT = [
  "Comandos disponíveis:",
  "• po 12345 ou pr 12345: busca a PO/PR nos arquivos GL mais recentes",
  "• journal J123 J456: busca um ou mais journals nos arquivos GL",
  "• status: tempo online e hora atual",
  "• ping: teste de conexão",
  "• ajuda: mostra esta mensagem",
].join("\n");
