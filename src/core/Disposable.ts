/**
 * Disposable contract for engine parts that hold timers, in-flight fetches or
 * decoder sessions.
 */

export interface Disposable {
  /**
   * Release everything held. Calling it again is a no-op.
   */
  dispose(): void;

  readonly disposed: boolean;
}

/**
 * Base class with double-dispose protection. Subclasses put their cleanup in
 * onDispose(), which runs exactly once.
 */
export abstract class BaseDisposable implements Disposable {
  private _disposed = false;

  get disposed(): boolean {
    return this._disposed;
  }

  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    this.onDispose();
  }

  protected abstract onDispose(): void;

  /**
   * Throw if disposed. Use at the top of operations that must not run after
   * teardown.
   */
  protected throwIfDisposed(operation = "operation"): void {
    if (this._disposed) {
      throw new Error(`Cannot perform ${operation} on disposed object`);
    }
  }
}

/**
 * Dispose several parts, continuing past any that throw.
 */
export function disposeAll(...disposables: (Disposable | null | undefined)[]): void {
  for (const d of disposables) {
    if (d && !d.disposed) {
      try {
        d.dispose();
      } catch (err) {
        console.warn("[Disposable] Error during disposal:", err);
      }
    }
  }
}

export default BaseDisposable;
