/**
 * ChannelTransport - Abstract bidirectional transport interface
 *
 * All transports appear bidirectional from the socket's perspective.
 * The transport encapsulates HOW it sends/receives and how it reconnects:
 * - WebSocket: sends and receives on the same connection
 * - SSE + HTTP: receives via EventSource, sends via HTTP POST
 * - In-process: hands frames to a peer in the same process
 *
 * Frames are opaque values; the socket's serializer decides their shape.
 *
 * @example
 * ```typescript
 * const socket = new Socket({ transport: new MyWebSocketTransport(url) });
 * socket.connect();
 * ```
 */

export type TransportState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "reconnecting"
  | "offline";

export interface TransportInfo {
  state: TransportState;
  reconnectAttempts: number;
  lastError?: Error;
  lastConnectedAt?: Date;
  lastDisconnectedAt?: Date;
}

/**
 * Base transport interface - all transports implement this
 */
export interface ChannelTransport {
  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /** Connect to the transport */
  connect(): void;

  /** Disconnect from the transport */
  disconnect(): void;

  /** Force reconnection */
  reconnect(): void;

  /** Dispose and cleanup all resources */
  dispose(): void;

  // ===========================================================================
  // Messaging
  // ===========================================================================

  /**
   * Register a handler for inbound frames.
   * @returns Unsubscribe function
   */
  onMessage(handler: (data: unknown) => void): () => void;

  /**
   * Send a frame. Resolves once the transport accepted it.
   */
  send(data: unknown): Promise<void>;

  // ===========================================================================
  // State
  // ===========================================================================

  /**
   * Register a handler for connection state changes.
   * `info.lastError` is set when the change was caused by a failure.
   * @returns Unsubscribe function
   */
  onStateChange(handler: (state: TransportState, info: TransportInfo) => void): () => void;

  /** Get current connection state */
  getState(): TransportState;

  /** Get detailed connection info */
  getInfo(): TransportInfo;

  /** Check if connected */
  isConnected(): boolean;
}
