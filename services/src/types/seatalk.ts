import { z } from "zod";

export const VERIFICATION_EVENT_TYPE = "event_verification";

/** Fields that may carry the verification token, at the top level or under `event`. */
export const CHALLENGE_FIELDS = ["seatalk_challenge", "challenge"] as const;

export const SeaTalkEventSchema = z
  .object({
    seatalk_id: z.union([z.string(), z.number()]).transform(String).optional(),
    employee_code: z.string().optional(),
    message: z
      .object({
        tag: z.string().optional(),
        text: z.object({ content: z.string().optional() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type SeaTalkEvent = z.infer<typeof SeaTalkEventSchema>;

export interface SeaTalkCallback {
  eventType?: string;
  event?: SeaTalkEvent;
}
