/**
 * Message vocabulary shared by the channel client and its transports.
 *
 * A {@link Message} is the unit routed over the shared connection. The
 * reserved event names drive the channel lifecycle; anything else is an
 * application event and passes through untouched.
 */

// ============================================================================
// Events
// ============================================================================

/**
 * Reserved lifecycle/status event names.
 */
export const ChannelEvents = {
  join: "phx_join",
  leave: "phx_leave",
  close: "phx_close",
  error: "phx_error",
  reply: "phx_reply",
  heartbeat: "heartbeat",
} as const;

export type ReservedChannelEvent = (typeof ChannelEvents)[keyof typeof ChannelEvents];

/**
 * Events whose replies are tied to a join epoch. Inbound messages of these
 * kinds carrying a foreign join reference are discarded by the channel.
 */
export const STATUS_EVENTS: ReadonlySet<string> = new Set<string>([
  ChannelEvents.close,
  ChannelEvents.error,
  ChannelEvents.join,
  ChannelEvents.reply,
  ChannelEvents.leave,
]);

export function isStatusEvent(event: string): boolean {
  return STATUS_EVENTS.has(event);
}

const REPLY_EVENT_PREFIX = "chan_reply_";

/**
 * Event name under which the reply to the push with `ref` is republished.
 */
export function replyEventFor(ref: string): string {
  return `${REPLY_EVENT_PREFIX}${ref}`;
}

export function isReplyEventName(event: string): boolean {
  return event.startsWith(REPLY_EVENT_PREFIX);
}

// ============================================================================
// Message
// ============================================================================

export type Payload = Record<string, unknown>;

export interface Message {
  /** Event name, reserved or application-defined */
  readonly event: string;
  readonly payload: Payload;
  readonly topic?: string;
  /** Correlation reference of the push this message answers (or carries) */
  readonly ref?: string;
  /** Join epoch the message belongs to */
  readonly joinRef?: string;
}

export function createMessage(
  event: string,
  payload: Payload = {},
  extra: Omit<Message, "event" | "payload"> = {},
): Message {
  return { event, payload, ...extra };
}

/**
 * Normalize a `phx_reply` message into its per-push reply event.
 * Returns undefined when the reply carries no correlation reference.
 */
export function asReplyEvent(message: Message): Message | undefined {
  if (message.ref === undefined || message.ref === "") {
    return undefined;
  }
  return {
    event: replyEventFor(message.ref),
    payload: message.payload,
    topic: message.topic,
    ref: message.ref,
    joinRef: message.joinRef,
  };
}

// ============================================================================
// Push responses
// ============================================================================

/**
 * Well-known reply statuses. Servers may send others.
 */
export type PushStatus = "ok" | "error" | "timeout" | (string & {});

export interface PushResponse {
  status: PushStatus;
  response: Payload;
}

function isPayload(value: unknown): value is Payload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read `{ status, response }` out of a reply payload.
 */
export function pushResponseFromPayload(payload: Payload): PushResponse {
  const status = typeof payload.status === "string" ? payload.status : "error";
  const response = isPayload(payload.response) ? payload.response : {};
  return { status, response };
}

export function pushResponseFromMessage(message: Message): PushResponse {
  return pushResponseFromPayload(message.payload);
}
