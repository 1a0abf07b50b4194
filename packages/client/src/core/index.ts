/**
 * Core client primitives
 *
 * Transport-agnostic building blocks:
 * - ChannelTransport: Interface for any transport (WebSocket, SSE + HTTP, in-process)
 * - Socket: Channel multiplexer over any transport
 *
 * @example
 * ```typescript
 * const socket = new Socket({ transport });
 * socket.connect();
 * socket.channel('room:1').join();
 * ```
 */

// Transport interface
export type { ChannelTransport, TransportState, TransportInfo } from "./transport";

// Socket (uses any transport)
export { Socket, type SocketConfig } from "./socket";
