import { CommandDispatcher } from "@/lib/bot/dispatcher";
import { type AppConfig, buildAppConfig, isDriveConfigured } from "@/lib/config";
import { createGoogleDriveGateway, type DriveGateway } from "@/lib/drive/client";
import { getEnv } from "@/lib/env";
import { ResultExporter } from "@/lib/ledger/export";
import { LedgerFileLister } from "@/lib/ledger/files";
import { LedgerScanner } from "@/lib/ledger/scan";
import { logger } from "@/lib/logger";
import { SeaTalkMessenger } from "@/lib/seatalk/messenger";
import { AppAccessTokenCache, type FetchFn } from "@/lib/seatalk/token-cache";

export interface BotServices {
  config: AppConfig;
  dispatcher: CommandDispatcher;
  startedAt: number;
  now: () => number;
}

export interface BotServiceOverrides {
  fetchFn?: FetchFn;
  drive?: DriveGateway;
  now?: () => number;
}

export function createBotServices(config: AppConfig, overrides: BotServiceOverrides = {}): BotServices {
  const now = overrides.now ?? Date.now;
  const startedAt = now();

  const tokens = new AppAccessTokenCache({
    tokenUrl: config.seatalk.tokenUrl,
    appId: config.seatalk.appId,
    appSecret: config.seatalk.appSecret,
    fetchFn: overrides.fetchFn,
    now,
  });
  const messenger = new SeaTalkMessenger(config.seatalk.apiBase, tokens, overrides.fetchFn);

  let scanner: LedgerScanner | undefined;
  let exporter: ResultExporter | undefined;
  if (isDriveConfigured(config.drive) && config.drive.credentials) {
    const drive = overrides.drive ?? createGoogleDriveGateway(config.drive.credentials);
    scanner = new LedgerScanner(new LedgerFileLister(drive, config.drive.sourceFolderId), drive);
    exporter = new ResultExporter(drive, config.drive.outputFolderId, { now: () => new Date(now()) });
  }

  const dispatcher = new CommandDispatcher({
    messenger,
    scanner,
    exporter,
    timezone: config.timezone,
    startedAt,
    now,
  });

  logger.info("Bot services initialised", {
    botId: config.seatalk.botId,
    apiBase: config.seatalk.apiBase,
    driveConfigured: dispatcher.driveConfigured,
  });
  return { config, dispatcher, startedAt, now };
}

let cached: BotServices | null = null;

/** Built once per process from the environment. */
export function getBotServices(): BotServices {
  if (!cached) {
    cached = createBotServices(buildAppConfig(getEnv()));
  }
  return cached;
}
