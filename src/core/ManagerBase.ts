/**
 * Shared lifecycle contracts.
 */

/**
 * Minimal contract for objects that hold resources requiring cleanup
 * (open streams, pending timers).
 */
export interface Disposable {
  /** Release all resources held by this object. Safe to call twice. */
  dispose(): void;
}
