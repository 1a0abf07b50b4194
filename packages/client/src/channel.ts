/**
 * Channel - per-topic join/leave/rejoin state machine
 *
 * A channel is one topic multiplexed over a shared socket. It owns:
 * - The join lifecycle (`closed → joining → joined`, `errored → joining` on rejoin)
 * - A buffer of pushes created before the channel could send
 * - One-shot reply waiters keyed by event
 * - A public stream of inbound and derived messages
 *
 * Every public operation, timer and socket callback runs through the
 * channel's {@link SerialScope}, so nothing on one channel interleaves.
 *
 * @example
 * ```typescript
 * const channel = socket.channel('room:1', { token: 'test-token' });
 *
 * channel.messages.subscribe((message) => {
 *   if (message.event === 'new_msg') render(message.payload);
 * });
 *
 * channel
 *   .join()
 *   .onReply('ok', () => log.info('joined'))
 *   .onReply('error', ({ response }) => log.warn(response, 'join refused'));
 *
 * channel.push('new_msg', { body: 'hello' });
 * ```
 */

import {
  EventStream,
  Logger,
  SerialScope,
  type ScopeTimer,
  type SwitchyardLogger,
} from "switchyard-kernel";
import {
  ChannelEvents,
  StateError,
  asReplyEvent,
  createMessage,
  ensureError,
  isStatusEvent,
  type Message,
  type Payload,
  type PushResponse,
} from "switchyard-shared";
import { getChannelDefaults } from "./config";
import { Push } from "./push";
import { errorMessageFor, type SocketFailure } from "./socket-failure";
import type {
  ChannelOptions,
  ChannelSocket,
  ChannelState,
  PushHost,
  ReplyWaiter,
  Unsubscribe,
  WaiterConflictPolicy,
} from "./types";

export class Channel implements PushHost {
  readonly topic: string;
  readonly parameters: Readonly<Payload>;
  readonly scope: SerialScope;

  /** Inbound messages for this topic plus derived reply, error and close messages */
  readonly messages: EventStream<Message>;

  private _timeout: number;
  private _state: ChannelState = "closed";
  private _joinedOnce = false;
  private disposed = false;
  private joinPush: Push;
  private joinAttempts = 0;
  private rejoinTimer?: ScopeTimer;
  private readonly buffer: Push[] = [];
  private readonly waiters = new Map<string, ReplyWaiter>();
  private readonly subscriptions: Unsubscribe[] = [];
  private readonly waiterConflict: WaiterConflictPolicy;
  private readonly log: SwitchyardLogger;

  constructor(
    readonly socket: ChannelSocket,
    options: ChannelOptions,
  ) {
    this.topic = options.topic;
    this.parameters = Object.freeze({ ...options.parameters });
    this._timeout = options.timeout ?? socket.defaultTimeout;
    this.waiterConflict = options.waiterConflict ?? getChannelDefaults().waiterConflict;
    this.log = Logger.for(this);

    this.scope = new SerialScope({
      name: `channel:${this.topic}`,
      fields: { topic: this.topic, join_ref: () => this.joinRef },
      logger: this.log,
      onError: (error) => this.onInternalError(error),
    });
    this.messages = new EventStream<Message>(this.topic);
    this.joinPush = this.createJoinPush();

    this.subscriptions.push(
      this.messages.subscribe(this.scope.bind((message: Message) => this.dispatch(message))),
      socket.onTopicMessage(
        this.topic,
        this.scope.bind((message: Message) => this.onInbound(message)),
      ),
      socket.onError(this.scope.bind((failure: SocketFailure) => this.onSocketError(failure))),
      socket.onOpen(this.scope.bind(() => this.onSocketOpen())),
    );
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get state(): ChannelState {
    return this._state;
  }

  get timeout(): number {
    return this._timeout;
  }

  set timeout(ms: number) {
    this._timeout = ms;
  }

  /** Correlation reference of the current join attempt */
  get joinRef(): string | undefined {
    return this.joinPush.ref;
  }

  get joinedOnce(): boolean {
    return this._joinedOnce;
  }

  get isClosed(): boolean {
    return this._state === "closed";
  }

  get isErrored(): boolean {
    return this._state === "errored";
  }

  get isJoined(): boolean {
    return this._state === "joined";
  }

  get isJoining(): boolean {
    return this._state === "joining";
  }

  get isLeaving(): boolean {
    return this._state === "leaving";
  }

  get canPush(): boolean {
    return this.socket.isConnected() && this.isJoined;
  }

  /** Pushes waiting for the channel to join, in send order */
  get pushBuffer(): readonly Push[] {
    return this.buffer;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Join the topic. Callable once per channel.
   * @throws StateError if the channel was already joined or is closed
   */
  join(timeout?: number): Push {
    return this.scope.run(() => {
      this.assertOpen();
      if (this._joinedOnce) {
        throw StateError.alreadyJoined(this.topic);
      }
      if (timeout !== undefined) {
        this._timeout = timeout;
      }
      this._joinedOnce = true;
      this.attemptJoin();
      return this.joinPush;
    });
  }

  /**
   * Push an application event. Sent at once when the channel can push,
   * otherwise buffered until it joins.
   * @throws StateError if join() was never called or the channel is closed
   */
  push(event: string, payload: Payload = {}, timeout?: number): Push {
    return this.pushEvent(event, payload, timeout);
  }

  /**
   * Push any event, reserved names included.
   */
  pushEvent(event: string, payload: Payload = {}, timeout?: number): Push {
    return this.scope.run(() => {
      this.assertOpen();
      if (!this._joinedOnce) {
        throw StateError.notJoined(this.topic);
      }

      const push = new Push(this, event, payload, timeout ?? this._timeout);
      if (this.canPush) {
        this.transmit(push);
      } else {
        this.log.trace({ event }, "Buffering push until joined");
        this.buffer.push(push);
      }
      return push;
    });
  }

  /**
   * Leave the topic. The channel closes once the server acknowledges or the
   * leave times out; when it cannot push, the leave completes at once.
   */
  leave(timeout?: number): Push {
    return this.scope.run(() => {
      const couldPush = this.canPush;
      this.joinPush.cancelTimeout();
      this.cancelRejoinTimer();
      this.setState("leaving");

      const push = new Push(this, ChannelEvents.leave, {}, timeout ?? this._timeout, (response) => {
        if (response.status === "ok" || response.status === "timeout") {
          this.onLeaveComplete();
        }
      });

      if (couldPush) {
        this.transmit(push);
      } else {
        push.trigger({ status: "ok", response: {} });
      }
      return push;
    });
  }

  /**
   * Shut the channel down and deregister it from the socket. Idempotent.
   */
  close(): void {
    this.scope.run(() => {
      if (this.disposed) return;
      this.log.debug({ from: this._state }, "Closing channel");
      this._state = "closed";
      this.disposed = true;

      for (const push of this.buffer) {
        push.cancelTimeout();
      }
      this.buffer.length = 0;
      this.joinPush.cancelTimeout();
      this.cancelRejoinTimer();

      for (const unsubscribe of this.subscriptions.splice(0)) {
        unsubscribe();
      }
      this.messages.close();
      this.waiters.clear();
      this.scope.dispose();
      this.socket.removeChannel(this);
    });
  }

  /**
   * Publish `message` on the channel's stream. Ignored once closed.
   */
  trigger(message: Message): void {
    this.scope.run(() => {
      this.messages.publish(message);
    });
  }

  /**
   * Put the channel in `errored`: publishes an error message, fails every
   * pending waiter with `error` and schedules a rejoin while the socket is
   * connected. Ignored when already errored, leaving or closed.
   */
  triggerError(error: Error): void {
    this.scope.run(() => {
      if (this.disposed || this.isErrored || this.isLeaving || this.isClosed) {
        this.log.trace({ err: error, state: this._state }, "Ignoring channel error");
        return;
      }
      const wasJoining = this.isJoining;
      this.log.warn({ err: error }, "Channel errored");

      const pending = [...this.waiters.values()];
      this.waiters.clear();
      this.messages.publish(errorMessageFor(this.topic, error));
      for (const waiter of pending) {
        waiter.reject(error);
      }

      // A subscriber may have left or closed the channel from the error message
      if (this.disposed || this.isLeaving) return;

      this.setState("errored");
      if (wasJoining) {
        this.joinPush.reset();
      }
      if (this.socket.isConnected()) {
        this.startRejoinTimer();
      }
    });
  }

  /**
   * Resolve with the next message of `event` on this channel.
   * Replaces any waiter already registered for `event`.
   */
  onPushReply(event: string): Promise<Message> {
    return new Promise<Message>((resolve, reject) => {
      this.scope.run(() => this.registerWaiter(event, { resolve, reject }));
    });
  }

  // ===========================================================================
  // Push host
  // ===========================================================================

  registerWaiter(event: string, waiter: ReplyWaiter): void {
    if (this.disposed) {
      waiter.reject(StateError.closed(this.topic));
      return;
    }
    const previous = this.waiters.get(event);
    if (previous && previous !== waiter) {
      this.log.trace({ event, policy: this.waiterConflict }, "Replacing waiter");
      if (this.waiterConflict === "fail") {
        previous.reject(StateError.waiterReplaced(this.topic, event));
      }
    }
    this.log.trace({ event }, "Waiting for reply");
    this.waiters.set(event, waiter);
  }

  dropWaiter(event: string, waiter: ReplyWaiter): void {
    if (this.waiters.get(event) === waiter) {
      this.waiters.delete(event);
    }
  }

  // ===========================================================================
  // Join protocol
  // ===========================================================================

  private createJoinPush(): Push {
    const push: Push = new Push(
      this,
      ChannelEvents.join,
      this.parameters,
      this._timeout,
      (response) => this.onJoinResponse(push, response),
    );
    return push;
  }

  private attemptJoin(): void {
    if (!this._joinedOnce || this.disposed || this.isLeaving) return;

    if (this.joinAttempts > 0) {
      this.joinPush.reset();
      this.joinPush = this.createJoinPush();
    }
    this.joinAttempts++;
    this.setState("joining");
    this.log.debug({ attempt: this.joinAttempts }, "Joining");
    this.transmit(this.joinPush, this._timeout);
  }

  private onJoinResponse(push: Push, response: PushResponse): void {
    if (push !== this.joinPush) return;
    switch (response.status) {
      case "ok":
        this.onJoinOk();
        break;
      case "error":
        this.onJoinError(response);
        break;
      case "timeout":
        this.onJoinTimeout(push);
        break;
    }
  }

  private onJoinOk(): void {
    this.setState("joined");
    this.cancelRejoinTimer();

    const pending = this.buffer.splice(0);
    if (pending.length > 0) {
      this.log.debug({ count: pending.length }, "Flushing buffered pushes");
    }
    for (const buffered of pending) {
      this.transmit(buffered);
    }
  }

  private onJoinError(response: PushResponse): void {
    this.log.warn({ response: response.response }, "Join refused");
    this.setState("errored");
    if (this.socket.isConnected()) {
      this.startRejoinTimer();
    }
  }

  private onJoinTimeout(push: Push): void {
    this.log.warn({ timeout: push.timeout }, "Join timed out");

    this.transmit(new Push(this, ChannelEvents.leave, {}, this._timeout));
    push.reset();
    this.setState("errored");
    if (this.socket.isConnected()) {
      this.startRejoinTimer();
    }
  }

  private onLeaveComplete(): void {
    this.log.debug("Leave completed");
    this.trigger(createMessage(ChannelEvents.close, { ok: "leave" }, { topic: this.topic }));
  }

  private startRejoinTimer(): void {
    this.cancelRejoinTimer();
    this.rejoinTimer = this.scope.setTimer(this._timeout, () => {
      this.rejoinTimer = undefined;
      if (this.socket.isConnected()) {
        this.attemptJoin();
      }
    });
  }

  private cancelRejoinTimer(): void {
    this.rejoinTimer?.cancel();
    this.rejoinTimer = undefined;
  }

  // ===========================================================================
  // Inbound
  // ===========================================================================

  private onSocketError(failure: SocketFailure): void {
    this.cancelRejoinTimer();
    this.triggerError(failure);
  }

  private onSocketOpen(): void {
    this.cancelRejoinTimer();
    if (this.isErrored) {
      this.attemptJoin();
    }
  }

  /**
   * Status messages from a superseded join attempt are dropped.
   */
  private isMember(message: Message): boolean {
    const { joinRef } = message;
    return !(
      joinRef !== undefined &&
      joinRef !== "" &&
      isStatusEvent(message.event) &&
      joinRef !== this.joinRef
    );
  }

  private onInbound(message: Message): void {
    if (!this.isMember(message)) {
      this.log.trace({ event: message.event, stale_ref: message.joinRef }, "Dropping stale message");
      return;
    }
    this.messages.publish(message);
  }

  private dispatch(message: Message): void {
    this.completeWaiter(message);

    switch (message.event) {
      case ChannelEvents.close:
        this.cancelRejoinTimer();
        this.close();
        break;
      case ChannelEvents.error:
        if (this.isLeaving) break;
        if (this.isJoining) {
          this.joinPush.trigger({ status: "error", response: message.payload });
          this.joinPush.reset();
        }
        this.setState("errored");
        if (this.socket.isConnected()) {
          this.startRejoinTimer();
        }
        break;
      case ChannelEvents.reply: {
        const reply = asReplyEvent(message);
        if (reply) {
          this.messages.publish(reply);
        }
        break;
      }
    }
  }

  private completeWaiter(message: Message): void {
    const waiter = this.waiters.get(message.event);
    if (!waiter) return;
    this.waiters.delete(message.event);
    this.log.trace({ event: message.event }, "Notifying waiter");
    waiter.resolve(message);
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private transmit(push: Push, timeout?: number): void {
    const sending = timeout === undefined ? push.send() : push.resend(timeout);
    void sending.catch((error: unknown) => {
      this.log.warn({ err: ensureError(error), event: push.event }, "Push could not be sent");
    });
  }

  private setState(next: ChannelState): void {
    if (this.disposed || this._state === next) return;
    this.log.debug({ from: this._state, to: next }, "State change");
    this._state = next;
  }

  private assertOpen(): void {
    if (this.disposed) {
      throw StateError.closed(this.topic);
    }
  }

  private onInternalError(error: Error): void {
    this.log.error({ err: error, state: this._state }, "Channel callback failed");
  }
}
