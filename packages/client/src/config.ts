import type { WaiterConflictPolicy } from "./types";

export interface ChannelDefaults {
  /** Push and rejoin timeout in ms, used when neither socket nor channel sets one */
  defaultTimeout: number;
  /** What happens to a reply waiter replaced by a newer one for the same event */
  waiterConflict: WaiterConflictPolicy;
}

const DEFAULTS: ChannelDefaults = {
  defaultTimeout: 10_000,
  waiterConflict: "abandon",
};

const config: ChannelDefaults = { ...DEFAULTS };

/**
 * Configure global defaults for sockets and channels.
 * Socket options override these; channel options override the socket.
 *
 * @example
 * ```typescript
 * configureChannels({
 *   defaultTimeout: 5_000,
 *   waiterConflict: 'fail',
 * });
 * ```
 */
export function configureChannels(options: Partial<ChannelDefaults>): void {
  if (options.defaultTimeout !== undefined) {
    if (!Number.isFinite(options.defaultTimeout) || options.defaultTimeout <= 0) {
      throw new RangeError(`defaultTimeout must be a positive number, got ${options.defaultTimeout}`);
    }
    config.defaultTimeout = options.defaultTimeout;
  }
  if (options.waiterConflict) {
    config.waiterConflict = options.waiterConflict;
  }
}

export function getChannelDefaults(): Readonly<ChannelDefaults> {
  return { ...config };
}

export function resetChannelDefaults(): void {
  Object.assign(config, DEFAULTS);
}
