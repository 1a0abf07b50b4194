/**
 * # Switchyard Client
 *
 * Multiplexed pub/sub channels over one shared connection. Each channel has
 * its own join/leave lifecycle, request/reply correlation and automatic
 * rejoin when the connection or a join attempt fails.
 *
 * ## Architecture
 *
 * 1. **Socket** - owns the transport, routes inbound messages by topic
 * 2. **Channel** - per-topic state machine (join, leave, rejoin, buffering)
 * 3. **Push** - one outbound message awaiting a correlated reply
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Socket } from 'switchyard-client';
 *
 * const socket = new Socket({ transport });
 * socket.connect();
 *
 * const room = socket.channel('room:1');
 * room.join().onReply('ok', () => console.log('joined'));
 *
 * for await (const message of room.messages) {
 *   if (message.event === 'new_msg') console.log(message.payload);
 * }
 * ```
 *
 * @see {@link Channel} - Channel state machine
 * @see {@link Push} - Correlated request/reply
 *
 * @module switchyard-client
 */

export { Channel } from "./channel";
export { Push, type PushCallback } from "./push";

export {
  Socket,
  type SocketConfig,
  type ChannelTransport,
  type TransportState,
  type TransportInfo,
} from "./core";

export { SocketFailure, errorMessageFor, type SocketFailureKind } from "./socket-failure";
export { messageSchema, objectSerializer, type MessageSerializer } from "./serializer";
export {
  configureChannels,
  getChannelDefaults,
  resetChannelDefaults,
  type ChannelDefaults,
} from "./config";

export type {
  ChannelOptions,
  ChannelSocket,
  ChannelState,
  PushHost,
  ReplyWaiter,
  SocketOpenEvent,
  Unsubscribe,
  WaiterConflictPolicy,
} from "./types";

// Re-export shared message vocabulary and errors
export {
  ChannelEvents,
  StateError,
  TransportError,
  ValidationError,
  isStateError,
  isTransportError,
  type Message,
  type Payload,
  type PushResponse,
  type PushStatus,
} from "switchyard-shared";
