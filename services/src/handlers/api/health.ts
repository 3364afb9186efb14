import type { APIGatewayProxyStructuredResultV2 } from "aws-lambda";

import { jsonResponse } from "@/lib/response";
import type { BotServices } from "@/lib/services";
import { formatLocalTime, uptimeSeconds } from "@/lib/time";

export function createHealthHandler(getServices: () => BotServices) {
  return async function getHealth(): Promise<APIGatewayProxyStructuredResultV2> {
    const { config, startedAt, now } = getServices();
    const current = now();

    return jsonResponse(200, {
      ok: true,
      time_brt: formatLocalTime(new Date(current), config.timezone),
      uptime_sec: uptimeSeconds(startedAt, current),
    });
  };
}
