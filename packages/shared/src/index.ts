/**
 * # Switchyard Shared
 *
 * Platform-independent definitions shared by all Switchyard packages:
 * the channel message vocabulary and the error hierarchy.
 *
 * ```typescript
 * import { ChannelEvents, replyEventFor, StateError } from 'switchyard-shared';
 * ```
 *
 * @see {@link Message} - The routed unit
 * @see {@link SwitchyardError} - Base error class
 *
 * @module switchyard-shared
 */

export * from "./messages";
export * from "./errors";
