import { ensureError } from "switchyard-shared";
import { Context, type ScopeContext } from "./context";
import { Logger, type SwitchyardLogger } from "./logger";

/**
 * Handle to a single-shot timer owned by a {@link SerialScope}.
 */
export interface ScopeTimer {
  /** True until the timer fires or is cancelled */
  readonly active: boolean;
  /** Idempotent */
  cancel(): void;
}

export interface SerialScopeOptions {
  /** Scope name, used in logs */
  name: string;
  /** Extra log fields while running inside the scope */
  fields?: ScopeContext["fields"];
  /**
   * Receives errors thrown by bound callbacks (timers, stream handlers).
   * Defaults to logging them at `error`.
   */
  onError?: (error: Error) => void;
  logger?: SwitchyardLogger;
}

const INACTIVE_TIMER: ScopeTimer = {
  active: false,
  cancel() {},
};

class ScopeTimerHandle implements ScopeTimer {
  private handle: ReturnType<typeof setTimeout> | null;

  constructor(
    ms: number,
    fire: () => void,
    private readonly onSettled: (timer: ScopeTimerHandle) => void,
  ) {
    this.handle = setTimeout(() => {
      this.handle = null;
      this.onSettled(this);
      fire();
    }, ms);
  }

  get active(): boolean {
    return this.handle !== null;
  }

  cancel(): void {
    if (this.handle === null) return;
    clearTimeout(this.handle);
    this.handle = null;
    this.onSettled(this);
  }
}

/**
 * Single-owner execution context.
 *
 * Everything that touches the owner's state goes through the scope:
 * public operations via {@link run}, external callbacks (timers, stream
 * handlers) via {@link bind} or {@link setTimer}. A bound callback that
 * arrives while the scope is running is queued and delivered, in arrival
 * order, once the outermost `run` returns, so external events never
 * interleave with an operation in progress.
 *
 * Errors thrown from `run` propagate to the caller. Errors thrown from
 * bound callbacks never escape: they are handed to `onError`.
 *
 * @example
 * ```typescript
 * const scope = new SerialScope({ name: 'room:1' });
 * const timer = scope.setTimer(1000, () => retry());
 * socket.onOpen(scope.bind(() => timer.cancel()));
 * scope.run(() => doSomething());
 * ```
 */
export class SerialScope {
  readonly context: ScopeContext;

  private readonly log: SwitchyardLogger;
  private readonly onError?: (error: Error) => void;
  private readonly mailbox: Array<() => void> = [];
  private readonly timers = new Set<ScopeTimerHandle>();
  private depth = 0;
  private draining = false;
  private disposed = false;

  constructor(options: SerialScopeOptions) {
    this.context = Context.create({ name: options.name, fields: options.fields });
    this.onError = options.onError;
    this.log = options.logger ?? Logger.for("SerialScope").child({ scope: options.name });
  }

  get running(): boolean {
    return this.depth > 0;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Number of live timers */
  get timerCount(): number {
    return this.timers.size;
  }

  /**
   * Run `fn` inside the scope and return its result. Reentrant.
   */
  run<T>(fn: () => T): T {
    this.depth++;
    try {
      return Context.run(this.context, fn);
    } finally {
      this.depth--;
      if (this.depth === 0) {
        this.drain();
      }
    }
  }

  /**
   * Wrap an external callback so it executes inside the scope.
   * Invocations after {@link dispose} are dropped.
   */
  bind<A extends unknown[]>(fn: (...args: A) => void): (...args: A) => void {
    return (...args: A) => {
      if (this.disposed) return;

      const task = (): void => {
        if (this.disposed) return;
        try {
          fn(...args);
        } catch (error) {
          this.report(error);
        }
      };

      if (this.depth > 0 || this.draining) {
        this.mailbox.push(task);
      } else {
        this.run(task);
      }
    };
  }

  /**
   * Start a single-shot timer whose callback runs inside the scope.
   */
  setTimer(ms: number, fn: () => void): ScopeTimer {
    if (this.disposed) {
      return INACTIVE_TIMER;
    }
    const timer = new ScopeTimerHandle(ms, this.bind(fn), (settled) => {
      this.timers.delete(settled);
    });
    this.timers.add(timer);
    return timer;
  }

  /**
   * Cancel every live timer and drop pending and future callbacks.
   * Idempotent.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const timer of [...this.timers]) {
      timer.cancel();
    }
    this.mailbox.length = 0;
  }

  private drain(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      let task = this.mailbox.shift();
      while (task) {
        this.run(task);
        task = this.mailbox.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private report(thrown: unknown): void {
    const error = ensureError(thrown);
    if (!this.onError) {
      this.log.error({ err: error }, "Unhandled error in scope callback");
      return;
    }
    try {
      this.onError(error);
    } catch (handlerError) {
      this.log.error(
        { err: ensureError(handlerError), original: error.message },
        "Scope error handler threw",
      );
    }
  }
}
