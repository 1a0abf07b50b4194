/**
 * Test Fixtures
 *
 * Factory functions for creating channel messages with sensible defaults.
 */

import { ChannelEvents, type Message, type Payload, type PushStatus } from "../messages";

// =============================================================================
// ID Generation
// =============================================================================

let idCounter = 0;

/**
 * Generate a unique test ID
 */
export function testId(prefix: string = "test"): string {
  return `${prefix}-${++idCounter}`;
}

/**
 * Reset the ID counter (call in beforeEach)
 */
export function resetTestIds(): void {
  idCounter = 0;
}

// =============================================================================
// Message Fixtures
// =============================================================================

/**
 * Create an inbound application message
 */
export function createTestMessage(
  topic: string,
  event: string,
  payload: Payload = {},
  overrides: Partial<Message> = {},
): Message {
  return { topic, event, payload, ...overrides };
}

/**
 * Create a `phx_reply` answering the push with `ref`
 */
export function createReply(
  topic: string,
  ref: string,
  status: PushStatus = "ok",
  options: { response?: Payload; joinRef?: string } = {},
): Message {
  return {
    topic,
    event: ChannelEvents.reply,
    payload: { status, response: options.response ?? {} },
    ref,
    joinRef: options.joinRef,
  };
}

/**
 * Create a server-side `phx_error` for a channel
 */
export function createChannelError(topic: string, joinRef?: string): Message {
  return { topic, event: ChannelEvents.error, payload: {}, joinRef };
}

/**
 * Create a server-side `phx_close` for a channel
 */
export function createChannelClose(topic: string, joinRef?: string): Message {
  return { topic, event: ChannelEvents.close, payload: {}, joinRef };
}
