import { z } from "zod";

import type { EnvConfig } from "@/lib/env";
import { ConfigError, errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";

const ServiceAccountSchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
    project_id: z.string().optional(),
  })
  .passthrough();

export type ServiceAccountCredentials = z.infer<typeof ServiceAccountSchema>;

export interface SeaTalkConfig {
  apiBase: string;
  tokenUrl: string;
  appId?: string;
  appSecret?: string;
  botId?: string;
}

export interface DriveConfig {
  credentials?: ServiceAccountCredentials;
  sourceFolderId?: string;
  outputFolderId?: string;
}

export interface AppConfig {
  seatalk: SeaTalkConfig;
  drive: DriveConfig;
  timezone: string;
}

export function parseServiceAccount(raw: string): ServiceAccountCredentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError("GOOGLE_SERVICE_ACCOUNT_JSON is not valid JSON");
  }

  const result = ServiceAccountSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError("GOOGLE_SERVICE_ACCOUNT_JSON is missing client_email or private_key", {
      issues: result.error.issues.map((issue) => issue.path.join(".")),
    });
  }
  return result.data;
}

export function buildAppConfig(env: EnvConfig): AppConfig {
  return {
    seatalk: {
      apiBase: env.SEATALK_API_BASE,
      tokenUrl: env.SEATALK_TOKEN_URL ?? `${env.SEATALK_API_BASE}/auth/app_access_token`,
      appId: env.SEATALK_APP_ID,
      appSecret: env.SEATALK_APP_SECRET,
      botId: env.SEATALK_BOT_ID,
    },
    drive: {
      credentials: readCredentials(env.GOOGLE_SERVICE_ACCOUNT_JSON),
      sourceFolderId: env.GL_SOURCE_FOLDER_ID,
      outputFolderId: env.GL_OUTPUT_FOLDER_ID,
    },
    timezone: env.BOT_TIMEZONE,
  };
}

// Unusable credentials only switch the Drive lookups off; messaging still works.
function readCredentials(raw: string | undefined): ServiceAccountCredentials | undefined {
  if (!raw) {
    return undefined;
  }
  try {
    return parseServiceAccount(raw);
  } catch (error) {
    logger.error("Ignoring Google service account credentials", { error: errorMessage(error) });
    return undefined;
  }
}

export function isDriveConfigured(drive: DriveConfig): boolean {
  return Boolean(drive.credentials && drive.sourceFolderId && drive.outputFolderId);
}
