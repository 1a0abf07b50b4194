/**
 * Push - one outbound message awaiting a status-correlated reply
 *
 * A push is sent under a correlation reference. The channel republishes the
 * server's `phx_reply` for that reference as `chan_reply_<ref>`, which
 * completes the push's reply waiter. No reply within `timeout` triggers the
 * push with a synthetic `timeout` status.
 *
 * @example
 * ```typescript
 * channel
 *   .push('new_msg', { body: 'hi' })
 *   .onReply('ok', ({ response }) => render(response))
 *   .onReply('error', ({ response }) => showError(response))
 *   .onReply('timeout', () => retryLater());
 * ```
 */

import type { ScopeTimer } from "switchyard-kernel";
import {
  createMessage,
  pushResponseFromMessage,
  replyEventFor,
  type Message,
  type Payload,
  type PushResponse,
  type PushStatus,
} from "switchyard-shared";
import type { PushHost, ReplyWaiter } from "./types";

export type PushCallback = (response: PushResponse) => void;

type PushOutcome =
  | { settled: "response"; response: PushResponse }
  | { settled: "error"; error: Error };

/**
 * `onResponse` belongs to the push's owner (the channel uses it for join and
 * leave bookkeeping) and runs before the status callback registered with
 * {@link Push.onReply}, which belongs to the caller.
 */
export class Push {
  readonly payload: Readonly<Payload>;

  private _ref?: string;
  private _timeout: number;
  private _sent = false;
  private _received?: PushResponse;
  private readonly callbacks = new Map<PushStatus, PushCallback>();
  private timer?: ScopeTimer;
  private waiter?: ReplyWaiter;
  private waiterEvent?: string;

  private outcome?: PushOutcome;
  private settle?: { resolve: (response: PushResponse) => void; reject: (error: Error) => void };
  private futurePromise?: Promise<PushResponse>;

  constructor(
    private readonly host: PushHost,
    readonly event: string,
    payload: Payload,
    timeout: number,
    private readonly onResponse?: PushCallback,
  ) {
    this.payload = Object.freeze({ ...payload });
    this._timeout = timeout;
  }

  /** Correlation reference, once allocated */
  get ref(): string | undefined {
    return this._ref;
  }

  /** Event the reply to this push is republished under */
  get replyEvent(): string | undefined {
    return this._ref === undefined ? undefined : replyEventFor(this._ref);
  }

  get timeout(): number {
    return this._timeout;
  }

  set timeout(ms: number) {
    this._timeout = ms;
  }

  get sent(): boolean {
    return this._sent;
  }

  /** The response this push was triggered with, if any */
  get received(): PushResponse | undefined {
    return this._received;
  }

  hasReceived(status: PushStatus): boolean {
    return this._received?.status === status;
  }

  /**
   * Settles with the first response (reply, timeout or synthetic), or
   * rejects if the channel fails the reply waiter first.
   */
  get future(): Promise<PushResponse> {
    if (!this.futurePromise) {
      this.futurePromise = new Promise<PushResponse>((resolve, reject) => {
        const outcome = this.outcome;
        if (!outcome) {
          this.settle = { resolve, reject };
        } else if (outcome.settled === "response") {
          resolve(outcome.response);
        } else {
          reject(outcome.error);
        }
      });
    }
    return this.futurePromise;
  }

  /**
   * Register the callback for a reply status, replacing any previous one.
   */
  onReply(status: PushStatus, callback: PushCallback): this {
    this.callbacks.set(status, callback);
    return this;
  }

  /**
   * Transmit the push and arm its timeout.
   * Resolves once the socket accepted the message.
   */
  send(): Promise<void> {
    if (this.hasReceived("timeout")) {
      return Promise.resolve();
    }
    this.startTimeout();
    this._sent = true;
    return this.host.socket.sendMessage(this.toMessage());
  }

  /**
   * Clear flags and send again with a new timeout.
   */
  resend(timeout: number = this._timeout): Promise<void> {
    this._timeout = timeout;
    this.cancelTimeout();
    this._sent = false;
    this._received = undefined;
    return this.send();
  }

  /**
   * Complete the push with `response`: cancels the timeout, notifies the
   * owner's `onResponse` hook, then invokes the callback bound to
   * `response.status`, if any.
   */
  trigger(response: PushResponse): void {
    this.cancelTimeout();
    this._received = response;
    this.settleWith({ settled: "response", response });
    this.onResponse?.(response);
    this.callbacks.get(response.status)?.(response);
  }

  /**
   * Cancel the timeout and stop listening for the reply. No callback runs.
   */
  cancelTimeout(): void {
    this.timer?.cancel();
    this.timer = undefined;
    if (this.waiter && this.waiterEvent !== undefined) {
      this.host.dropWaiter(this.waiterEvent, this.waiter);
    }
    this.waiter = undefined;
    this.waiterEvent = undefined;
  }

  /**
   * Abandon the current attempt: cancel the timeout and clear the
   * reference and flags. No callback runs.
   */
  reset(): void {
    this.cancelTimeout();
    this._ref = undefined;
    this._sent = false;
    this._received = undefined;
  }

  toMessage(): Message {
    return createMessage(this.event, this.payload, {
      topic: this.host.topic,
      ref: this._ref,
      joinRef: this.host.joinRef,
    });
  }

  private startTimeout(): void {
    this.cancelTimeout();
    const ref = this._ref ?? this.host.socket.nextRef();
    this._ref = ref;

    const waiter: ReplyWaiter = {
      resolve: (message) => {
        this.waiter = undefined;
        this.trigger(pushResponseFromMessage(message));
      },
      reject: (error) => {
        this.waiter = undefined;
        this.cancelTimeout();
        this.settleWith({ settled: "error", error });
      },
    };
    this.waiter = waiter;
    this.waiterEvent = replyEventFor(ref);
    this.host.registerWaiter(this.waiterEvent, waiter);

    this.timer = this.host.scope.setTimer(this._timeout, () => {
      this.timer = undefined;
      this.trigger({ status: "timeout", response: {} });
    });
  }

  private settleWith(outcome: PushOutcome): void {
    if (this.outcome) return;
    this.outcome = outcome;
    if (!this.settle) return;
    if (outcome.settled === "response") {
      this.settle.resolve(outcome.response);
    } else {
      this.settle.reject(outcome.error);
    }
    this.settle = undefined;
  }
}
