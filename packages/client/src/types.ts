/**
 * Shared types for the channel client
 *
 * The {@link ChannelSocket} contract is everything a channel needs from the
 * connection it is multiplexed over. {@link Socket} implements it on top of a
 * {@link ChannelTransport}; tests use `FakeSocket`.
 */

import type { SerialScope } from "switchyard-kernel";
import type { Message, Payload } from "switchyard-shared";
import type { Channel } from "./channel";
import type { SocketFailure } from "./socket-failure";

export type Unsubscribe = () => void;

/**
 * Channel lifecycle. `closed` is both the initial state and, once the
 * channel has been closed, the terminal one.
 */
export type ChannelState = "closed" | "joining" | "joined" | "errored" | "leaving";

/**
 * - `abandon`: the replaced waiter is dropped and never settles
 * - `fail`: the replaced waiter is rejected with a `StateError`
 */
export type WaiterConflictPolicy = "abandon" | "fail";

export interface ChannelOptions {
  topic: string;
  /** Sent as the join payload */
  parameters?: Payload;
  /** Push and rejoin timeout in ms (default: the socket's) */
  timeout?: number;
  waiterConflict?: WaiterConflictPolicy;
}

export interface SocketOpenEvent {
  at: Date;
}

/**
 * A one-shot subscription for the next inbound message of an event.
 */
export interface ReplyWaiter {
  resolve(message: Message): void;
  reject(error: Error): void;
}

/**
 * The connection a channel is multiplexed over.
 */
export interface ChannelSocket {
  /** Timeout for channels that set none, in ms */
  readonly defaultTimeout: number;

  isConnected(): boolean;

  /** Unique correlation reference */
  nextRef(): string;

  /**
   * Inbound messages addressed to `topic`.
   * @returns Unsubscribe function
   */
  onTopicMessage(topic: string, handler: (message: Message) => void): Unsubscribe;

  /** Connection lost or failed */
  onError(handler: (failure: SocketFailure) => void): Unsubscribe;

  /** Connection (re)established */
  onOpen(handler: (event: SocketOpenEvent) => void): Unsubscribe;

  /** Called by a channel once it has closed */
  removeChannel(channel: Channel): void;

  /** Hand a message to the transport */
  sendMessage(message: Message): Promise<void>;
}

/**
 * What a {@link Push} needs from the channel that owns it.
 */
export interface PushHost {
  readonly topic: string;
  readonly socket: ChannelSocket;
  /** Join epoch the push is sent under */
  readonly joinRef: string | undefined;
  readonly scope: SerialScope;
  registerWaiter(event: string, waiter: ReplyWaiter): void;
  /** Removes `waiter` if it is still the one registered for `event` */
  dropWaiter(event: string, waiter: ReplyWaiter): void;
}
