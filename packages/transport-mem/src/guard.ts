import { AsyncEventEmitter, type MaybePromise } from '@objstream/transport';

type GuardEvents = {
  close: () => void;
};

/**
 * The close-state shared by both ends of one stream half.
 *
 * Either end may close the half, any number of times; the close action runs
 * exactly once. The check and the update happen in a single synchronous
 * step, so no interleaving of callers can run the action twice.
 */
export class StreamGuard {
  private readonly events = new AsyncEventEmitter<GuardEvents>();
  private _isClosed = false;

  /**
   * @param closeAction Closes the underlying channel. Must not be called by
   * anything other than this guard.
   * @param label Identifies the half in log lines.
   */
  constructor(
    private readonly closeAction: () => void,
    private readonly label: string,
  ) {}

  public get isClosed(): boolean {
    return this._isClosed;
  }

  /** Closes the half. Calls after the first are no-ops. */
  public close(): void {
    if (this._isClosed) return;
    this._isClosed = true;
    this.closeAction();

    this.events.emitAsync('close').catch((err) => {
      console.error(`[${this.label}] Close listener failed:`, err);
    });
  }

  /**
   * Registers a handler for the half's closure. A handler registered after
   * the half closed runs on the next microtask.
   */
  public onClose(handler: () => MaybePromise<void>): void {
    if (!this._isClosed) {
      this.events.once('close', handler);
      return;
    }
    queueMicrotask(() => {
      Promise.resolve()
        .then(handler)
        .catch((err) => {
          console.error(`[${this.label}] Close listener failed:`, err);
        });
    });
  }
}
