import {
  ChannelEvents,
  TransportError,
  createMessage,
  type Message,
} from "switchyard-shared";

export type SocketFailureKind = "close" | "error";

/**
 * A lost or failed connection, as seen by the channels multiplexed over it.
 * Channels publish {@link SocketFailure.toMessage} on their event stream.
 */
export class SocketFailure extends TransportError {
  constructor(
    public readonly kind: SocketFailureKind,
    public readonly reason: string,
    cause?: Error,
  ) {
    super(
      kind === "close" ? "TRANSPORT_CLOSED" : "TRANSPORT_CONNECTION",
      kind === "close" ? `Connection closed: ${reason}` : `Connection error: ${reason}`,
      { reason, kind },
      cause,
    );
    this.name = "SocketFailure";
  }

  static closed(reason: string): SocketFailure {
    return new SocketFailure("close", reason);
  }

  static error(reason: string, cause?: Error): SocketFailure {
    return new SocketFailure("error", reason, cause);
  }

  toMessage(topic?: string): Message {
    return createMessage(
      ChannelEvents.error,
      { reason: this.reason, kind: this.kind },
      topic === undefined ? {} : { topic },
    );
  }
}

/**
 * The message a channel publishes for `error`.
 */
export function errorMessageFor(topic: string, error: Error): Message {
  if (error instanceof SocketFailure) {
    return error.toMessage(topic);
  }
  return createMessage(ChannelEvents.error, { reason: error.message }, { topic });
}
