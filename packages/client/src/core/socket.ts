/**
 * Socket - Channel multiplexer over any transport
 *
 * Transport-agnostic. Works with any transport that implements the
 * ChannelTransport interface (WebSocket, SSE + HTTP, in-process).
 * Inbound frames are decoded into messages and routed to the channel for
 * their topic; connection state changes are broadcast to every channel.
 *
 * @example
 * ```typescript
 * const socket = new Socket({ transport: new MyWebSocketTransport(url) });
 * socket.connect();
 *
 * const room = socket.channel('room:1', { token: 'test-token' });
 * room.join().onReply('ok', () => room.push('new_msg', { body: 'hi' }));
 * ```
 */

import { EventStream, Logger } from "switchyard-kernel";
import { TransportError, ensureError, type Message, type Payload } from "switchyard-shared";
import { Channel } from "../channel";
import { getChannelDefaults } from "../config";
import { objectSerializer, type MessageSerializer } from "../serializer";
import { SocketFailure } from "../socket-failure";
import type { ChannelSocket, SocketOpenEvent, Unsubscribe, WaiterConflictPolicy } from "../types";
import type { ChannelTransport, TransportInfo, TransportState } from "./transport";

export interface SocketConfig {
  /** Transport for send/receive */
  transport: ChannelTransport;

  /** Default push and rejoin timeout in ms (default: `configureChannels`) */
  timeout?: number;

  /** Frame codec (default: plain message objects) */
  serializer?: MessageSerializer;

  /** Default waiter conflict policy for channels created by this socket */
  waiterConflict?: WaiterConflictPolicy;
}

type MessageHandler = (message: Message) => void;

export class Socket implements ChannelSocket {
  readonly defaultTimeout: number;

  private transport: ChannelTransport;
  private serializer: MessageSerializer;
  private waiterConflict?: WaiterConflictPolicy;
  private handlers = new Map<string, Set<MessageHandler>>();
  private channelsByTopic = new Map<string, Channel>();
  private openEvents = new EventStream<SocketOpenEvent>("socket:open");
  private errorEvents = new EventStream<SocketFailure>("socket:error");
  private unsubscribeTransport: Unsubscribe[];
  private connected: boolean;
  private refCounter = 0;
  private log = Logger.for(this);

  constructor(config: SocketConfig) {
    this.transport = config.transport;
    this.serializer = config.serializer ?? objectSerializer;
    this.defaultTimeout = config.timeout ?? getChannelDefaults().defaultTimeout;
    this.waiterConflict = config.waiterConflict;
    this.connected = this.transport.isConnected();

    this.unsubscribeTransport = [
      this.transport.onMessage((data) => this.handleData(data)),
      this.transport.onStateChange((state, info) => this.handleStateChange(state, info)),
    ];
  }

  // ===========================================================================
  // Channels
  // ===========================================================================

  /**
   * Get the live channel for `topic`, creating it if needed.
   * Parameters and timeout only apply when a channel is created.
   */
  channel(topic: string, parameters: Payload = {}, timeout?: number): Channel {
    const existing = this.channelsByTopic.get(topic);
    if (existing) {
      return existing;
    }

    this.log.debug({ topic }, "Adding channel");
    const channel = new Channel(this, {
      topic,
      parameters,
      timeout,
      waiterConflict: this.waiterConflict,
    });
    this.channelsByTopic.set(topic, channel);
    return channel;
  }

  /** Live channels by topic */
  get channels(): ReadonlyMap<string, Channel> {
    return this.channelsByTopic;
  }

  removeChannel(channel: Channel): void {
    if (this.channelsByTopic.get(channel.topic) === channel) {
      this.log.debug({ topic: channel.topic }, "Removing channel");
      this.channelsByTopic.delete(channel.topic);
    }
  }

  // ===========================================================================
  // ChannelSocket
  // ===========================================================================

  isConnected(): boolean {
    return this.transport.isConnected();
  }

  nextRef(): string {
    this.refCounter++;
    return String(this.refCounter);
  }

  onTopicMessage(topic: string, handler: MessageHandler): Unsubscribe {
    let handlers = this.handlers.get(topic);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(topic, handlers);
    }
    handlers.add(handler);

    return () => {
      const current = this.handlers.get(topic);
      current?.delete(handler);
      if (current?.size === 0) {
        this.handlers.delete(topic);
      }
    };
  }

  onError(handler: (failure: SocketFailure) => void): Unsubscribe {
    return this.errorEvents.subscribe(handler);
  }

  onOpen(handler: (event: SocketOpenEvent) => void): Unsubscribe {
    return this.openEvents.subscribe(handler);
  }

  async sendMessage(message: Message): Promise<void> {
    try {
      await this.transport.send(this.serializer.encode(message));
    } catch (error) {
      throw TransportError.send(ensureError(error));
    }
  }

  // ===========================================================================
  // Connection
  // ===========================================================================

  connect(): void {
    this.transport.connect();
  }

  disconnect(): void {
    this.transport.disconnect();
  }

  /**
   * Force reconnection
   */
  reconnect(): void {
    this.transport.reconnect();
  }

  getState(): TransportState {
    return this.transport.getState();
  }

  getInfo(): TransportInfo {
    return this.transport.getInfo();
  }

  /**
   * Close every channel and dispose of the transport
   */
  dispose(): void {
    for (const channel of [...this.channelsByTopic.values()]) {
      channel.close();
    }
    for (const unsubscribe of this.unsubscribeTransport.splice(0)) {
      unsubscribe();
    }
    this.handlers.clear();
    this.openEvents.close();
    this.errorEvents.close();
    this.transport.dispose();
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private handleData(data: unknown): void {
    let message: Message;
    try {
      message = this.serializer.decode(data);
    } catch (error) {
      this.log.warn({ err: ensureError(error) }, "Dropping undecodable frame");
      return;
    }

    if (message.topic === undefined) {
      this.log.debug({ event: message.event }, "Dropping message without topic");
      return;
    }

    const handlers = this.handlers.get(message.topic);
    if (!handlers) {
      this.log.trace({ topic: message.topic, event: message.event }, "No channel for topic");
      return;
    }
    for (const handler of [...handlers]) {
      handler(message);
    }
  }

  private handleStateChange(state: TransportState, info: TransportInfo): void {
    const wasConnected = this.connected;
    this.connected = state === "connected";

    if (this.connected && !wasConnected) {
      this.log.debug("Socket open");
      this.openEvents.publish({ at: info.lastConnectedAt ?? new Date() });
      return;
    }

    if (!this.connected && wasConnected) {
      const failure = info.lastError
        ? SocketFailure.error(info.lastError.message, info.lastError)
        : SocketFailure.closed(state);
      this.log.warn({ err: failure, state }, "Socket lost connection");
      this.errorEvents.publish(failure);
    }
  }
}
