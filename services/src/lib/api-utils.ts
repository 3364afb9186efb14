import type { APIGatewayProxyEvent, APIGatewayProxyEventV2 } from "aws-lambda";
import Busboy from "busboy";

import { errorMessage } from "@/lib/errors";

export type ApiEvent = APIGatewayProxyEvent | APIGatewayProxyEventV2;

export type Payload = Record<string, unknown>;

export type PayloadResult =
  | { ok: true; payload: Payload; kind: "json" | "form" | "multipart" | "none" }
  | { ok: false; error: string };

export function getHeader(event: ApiEvent, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(event.headers ?? {})) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return value;
    }
  }
  return undefined;
}

export function getRawBody(event: ApiEvent): Buffer {
  if (!event.body) {
    return Buffer.alloc(0);
  }
  return event.isBase64Encoded ? Buffer.from(event.body, "base64") : Buffer.from(event.body, "utf8");
}

/**
 * Decodes a webhook body by content type. Never throws: an undecodable body
 * comes back as `{ ok: false }` and the caller decides what to do with it.
 */
export async function decodePayload(event: ApiEvent): Promise<PayloadResult> {
  const rawContentType = getHeader(event, "content-type") ?? "";
  const contentType = rawContentType.toLowerCase();
  const raw = getRawBody(event);
  const text = raw.toString("utf8");

  try {
    if (contentType.includes("application/json")) {
      if (!text.trim()) {
        return { ok: true, payload: {}, kind: "json" };
      }
      const parsed: unknown = JSON.parse(text);
      return { ok: true, payload: isPayload(parsed) ? parsed : {}, kind: "json" };
    }

    if (contentType.includes("application/x-www-form-urlencoded")) {
      return { ok: true, payload: Object.fromEntries(new URLSearchParams(text)), kind: "form" };
    }

    if (contentType.includes("multipart/form-data")) {
      return { ok: true, payload: await parseMultipart(raw, rawContentType), kind: "multipart" };
    }

    return { ok: true, payload: {}, kind: "none" };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

// First value wins for repeated fields; file parts contribute their file name.
function parseMultipart(raw: Buffer, contentType: string): Promise<Payload> {
  return new Promise((resolve, reject) => {
    const payload: Payload = {};
    const parser = Busboy({ headers: { "content-type": contentType } });

    parser.on("field", (name, value) => {
      if (!(name in payload)) {
        payload[name] = value;
      }
    });
    parser.on("file", (name, file, info) => {
      if (!(name in payload)) {
        payload[name] = info.filename;
      }
      file.resume();
    });
    parser.once("error", reject);
    parser.once("close", () => resolve(payload));
    parser.end(raw);
  });
}

export function isPayload(value: unknown): value is Payload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
