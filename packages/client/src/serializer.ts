import { z } from "zod";
import { ValidationError, type Message } from "switchyard-shared";

const refSchema = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

/**
 * Shape of an inbound message. References may arrive as numbers and are
 * normalized to strings; `null` means absent.
 */
export const messageSchema = z.object({
  event: z.string().min(1),
  payload: z.record(z.unknown()).default({}),
  topic: z.string().optional(),
  ref: refSchema,
  joinRef: refSchema,
});

/**
 * Converts messages to and from the frames a transport carries.
 */
export interface MessageSerializer {
  encode(message: Message): unknown;
  /** Throws a `ValidationError` when `data` is not a message */
  decode(data: unknown): Message;
}

function stripUndefined(message: Message): Message {
  const { event, payload, topic, ref, joinRef } = message;
  return {
    event,
    payload,
    ...(topic !== undefined && { topic }),
    ...(ref !== undefined && { ref }),
    ...(joinRef !== undefined && { joinRef }),
  };
}

/**
 * Frames are plain message objects. Transports that need bytes or text
 * encode them themselves.
 */
export const objectSerializer: MessageSerializer = {
  encode(message) {
    return stripUndefined(message);
  },

  decode(data) {
    const result = messageSchema.safeParse(data);
    if (!result.success) {
      throw ValidationError.frame(
        result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      );
    }
    return stripUndefined(result.data);
  },
};
