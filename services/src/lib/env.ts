import { z } from "zod";

const optionalSetting = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  SEATALK_API_BASE: optionalSetting.transform((value) => (value ?? "https://openapi.seatalk.io").replace(/\/+$/, "")),
  SEATALK_APP_ID: optionalSetting,
  SEATALK_APP_SECRET: optionalSetting,
  SEATALK_BOT_ID: optionalSetting,
  SEATALK_TOKEN_URL: optionalSetting,
  GOOGLE_SERVICE_ACCOUNT_JSON: optionalSetting,
  GL_SOURCE_FOLDER_ID: optionalSetting,
  GL_OUTPUT_FOLDER_ID: optionalSetting,
  BOT_TIMEZONE: optionalSetting.transform((value) => value ?? "America/Sao_Paulo"),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" && value.trim() ? value.trim().toLowerCase() : undefined),
    z.enum(["debug", "info", "warn", "error"]).catch("info")
  ),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

let cached: EnvConfig | null = null;

export function parseEnv(source: Record<string, string | undefined>): EnvConfig {
  return EnvSchema.parse(source);
}

export function getEnv(): EnvConfig {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
}
