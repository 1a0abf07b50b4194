/**
 * # Switchyard Kernel
 *
 * Low-level execution primitives the channel client builds on.
 *
 * ## Core Primitives
 *
 * - **SerialScope** - Single-owner execution context for timers and callbacks
 * - **Context** - Scope-local state propagated through AsyncLocalStorage
 * - **EventStream** - Broadcast stream with async iteration
 * - **Logger** - Structured logging (pino) with scope injection
 *
 * ## Example
 *
 * ```typescript
 * import { SerialScope, EventStream, Logger } from 'switchyard-kernel';
 *
 * const scope = new SerialScope({ name: 'room:1' });
 * const events = new EventStream<string>('room:1');
 * scope.setTimer(1000, () => events.publish('tick'));
 * ```
 *
 * @module switchyard-kernel
 */

export * from "./context";
export * from "./logger";
export * from "./serial-scope";
export * from "./event-stream";
