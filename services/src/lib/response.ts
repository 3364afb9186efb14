import type { APIGatewayProxyStructuredResultV2 } from "aws-lambda";

export const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Headers": "*",
  "Access-Control-Allow-Methods": "GET,POST,OPTIONS",
};

export function jsonResponse(
  statusCode: number,
  body: Record<string, unknown> | unknown[] | string | null
): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
      ...CORS_HEADERS,
    },
    body: body === null ? "" : JSON.stringify(body),
  };
}

export function textResponse(statusCode: number, body: string): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: {
      "Content-Type": "text/plain; charset=utf-8",
      ...CORS_HEADERS,
    },
    body,
  };
}

export function errorResponse(statusCode: number, message: string) {
  return jsonResponse(statusCode, { message });
}
