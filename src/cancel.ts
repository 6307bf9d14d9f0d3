/**
 * Cooperative stop flag. Checked between patients, between rows and inside login polling;
 * work already in flight is allowed to finish.
 */
export class CancellationToken {
  private _cancelled = false;
  private readonly listeners = new Set<() => void>();

  get cancelled(): boolean { return this._cancelled; }

  cancel(): void {
    if (this._cancelled) return;
    this._cancelled = true;
    for (const listener of this.listeners) listener();
    this.listeners.clear();
  }

  /** Register a callback for the moment `cancel()` is first called. Returns an unsubscribe. */
  onCancel(listener: () => void): () => void {
    if (this._cancelled) {
      listener();
      return () => {};
    }
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }
}

/** A token nobody cancels. */
export const NEVER_CANCELLED = new CancellationToken();
