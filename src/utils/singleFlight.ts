/**
 * Admits one async task at a time. Unlike a mutex nothing is queued:
 * a second caller is turned away while the first is still running.
 */
export class SingleFlight {
  private _isBusy = false;

  isBusy() {
    return this._isBusy;
  }

  /**
   * Starts `task` when idle and returns its promise, or returns null when busy.
   * The slot is released when the task settles, even on error.
   */
  tryRun<T>(task: () => Promise<T>): Promise<T> | null {
    if (this._isBusy) return null;
    this._isBusy = true;
    const run = async () => {
      try {
        return await task();
      } finally {
        this._isBusy = false;
      }
    };
    return run();
  }
}
