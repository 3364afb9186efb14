import type { APIGatewayProxyStructuredResultV2 } from "aws-lambda";

import { type ApiEvent, decodePayload, isPayload, type Payload } from "@/lib/api-utils";
import type { CommandDispatcher } from "@/lib/bot/dispatcher";
import { errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { jsonResponse, textResponse } from "@/lib/response";
import type { BotServices } from "@/lib/services";
import {
  CHALLENGE_FIELDS,
  type SeaTalkCallback,
  SeaTalkEventSchema,
  VERIFICATION_EVENT_TYPE,
} from "@/types/seatalk";

export const APOLOGY_TEXT = "⚠️ Desculpe, ocorreu um erro ao processar sua solicitação. Tente novamente em instantes.";

export function createSeaTalkEventsHandler(getServices: () => BotServices) {
  return async function handleSeaTalkEvent(event: ApiEvent): Promise<APIGatewayProxyStructuredResultV2> {
    const payload = await readPayload(event);

    const challenge = findChallenge(payload);
    if (challenge) {
      logger.info("SeaTalk verification handshake");
      return jsonResponse(200, { seatalk_challenge: challenge });
    }

    const callback = parseCallback(payload);
    const eventType = callback.eventType;
    if (!eventType || eventType === VERIFICATION_EVENT_TYPE) {
      return textResponse(200, "ok");
    }

    const employeeCode = callback.event?.employee_code;
    const text = callback.event?.message?.text?.content ?? "";
    logger.info("SeaTalk event received", {
      eventType,
      seatalkId: callback.event?.seatalk_id,
      employeeCode,
      text,
    });

    if (employeeCode) {
      let dispatcher: CommandDispatcher;
      try {
        dispatcher = getServices().dispatcher;
      } catch (error) {
        logger.error("Bot services unavailable", { error: errorMessage(error) });
        return textResponse(200, "ok");
      }
      await dispatchSafely(dispatcher, employeeCode, text);
    }

    return textResponse(200, "ok");
  };
}

async function readPayload(event: ApiEvent): Promise<Payload> {
  const decoded = await decodePayload(event);
  if (!decoded.ok) {
    logger.warn("Could not decode webhook body", { error: decoded.error });
    return {};
  }
  return unwrapEventField(decoded.payload);
}

// Form-encoded callbacks carry the event object as a JSON string.
function unwrapEventField(payload: Payload): Payload {
  const nested = payload.event;
  if (typeof nested !== "string") {
    return payload;
  }
  try {
    const parsed: unknown = JSON.parse(nested);
    return isPayload(parsed) ? { ...payload, event: parsed } : payload;
  } catch {
    return payload;
  }
}

function findChallenge(payload: Payload): string | undefined {
  const sources = isPayload(payload.event) ? [payload, payload.event] : [payload];
  for (const source of sources) {
    for (const field of CHALLENGE_FIELDS) {
      const value = source[field];
      if ((typeof value === "string" && value) || (typeof value === "number" && Number.isFinite(value))) {
        return String(value);
      }
    }
  }
  return undefined;
}

function parseCallback(payload: Payload): SeaTalkCallback {
  const eventType = typeof payload.event_type === "string" ? payload.event_type : undefined;
  if (payload.event === undefined) {
    return { eventType };
  }

  const parsed = SeaTalkEventSchema.safeParse(payload.event);
  if (!parsed.success) {
    logger.warn("Unexpected webhook event shape", {
      eventType,
      issues: parsed.error.issues.map((issue) => issue.path.join(".")),
    });
    return { eventType };
  }
  return { eventType, event: parsed.data };
}

async function dispatchSafely(dispatcher: CommandDispatcher, employeeCode: string, text: string): Promise<void> {
  try {
    await dispatcher.dispatch(employeeCode, text);
  } catch (error) {
    logger.error("Command failed", { employeeCode, text, error: errorMessage(error) });
    try {
      await dispatcher.reply(employeeCode, APOLOGY_TEXT);
    } catch (replyError) {
      logger.error("Could not send apology", { employeeCode, error: errorMessage(replyError) });
    }
  }
}
