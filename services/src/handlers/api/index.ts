import type {
  APIGatewayProxyEvent,
  APIGatewayProxyEventV2,
  APIGatewayProxyStructuredResultV2,
} from "aws-lambda";

import { createHealthHandler } from "@/handlers/api/health";
import { createSeaTalkEventsHandler } from "@/handlers/api/seatalk";
import type { ApiEvent } from "@/lib/api-utils";
import { errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { CORS_HEADERS, errorResponse } from "@/lib/response";
import { type BotServices, getBotServices } from "@/lib/services";

interface RouteConfig {
  method: string;
  pattern: RegExp;
  handler: (event: ApiEvent, params: Record<string, string>) => Promise<APIGatewayProxyStructuredResultV2>;
}

function buildRoutes(getServices: () => BotServices): RouteConfig[] {
  return [
    { method: "POST", pattern: /^\/seatalk\/events\/?$/, handler: createSeaTalkEventsHandler(getServices) },
    { method: "GET", pattern: /^\/health\/?$/, handler: createHealthHandler(getServices) },
  ];
}

function normalisePath(event: ApiEvent): string {
  const stage = event.requestContext?.stage;
  const rawPath = "rawPath" in event ? event.rawPath : event.path;
  let path = rawPath || "/";

  if (stage && stage !== "$default" && path.startsWith(`/${stage}/`)) {
    path = path.slice(stage.length + 1) || "/";
  }

  return path.startsWith("/") ? path : `/${path}`;
}

function resolveMethod(event: ApiEvent): string | undefined {
  return "httpMethod" in event ? event.httpMethod : event.requestContext?.http?.method;
}

export function createApiHandler(getServices: () => BotServices = getBotServices) {
  const routes = buildRoutes(getServices);

  return async function handler(
    event: APIGatewayProxyEvent | APIGatewayProxyEventV2
  ): Promise<APIGatewayProxyStructuredResultV2> {
    try {
      const method = resolveMethod(event)?.toUpperCase();
      const path = normalisePath(event);

      if (!method) {
        return errorResponse(400, "Unsupported request");
      }

      if (method === "OPTIONS") {
        return { statusCode: 200, headers: CORS_HEADERS, body: "" };
      }

      for (const route of routes) {
        if (route.method !== method) continue;
        const match = route.pattern.exec(path);
        if (match) {
          const params = match.groups ?? {};
          logger.debug("Handling route", { method, path });
          return await route.handler(event, params);
        }
      }

      logger.warn("Route not found", { method, path });
      return errorResponse(404, "Route not found");
    } catch (error) {
      logger.error("Unhandled API error", { message: errorMessage(error) });
      return errorResponse(500, "Internal server error");
    }
  };
}

export const handler = createApiHandler();
