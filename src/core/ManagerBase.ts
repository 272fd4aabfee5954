/**
 * ManagerBase - Lifecycle contract for long-lived application objects.
 */

/**
 * Objects that hold listeners or pending work requiring cleanup.
 */
export interface Disposable {
  dispose(): void;
}

/**
 * Stateful objects that may need deferred setup after construction,
 * such as the store performing its first render.
 */
export interface ManagerBase extends Disposable {
  initialize?(): void | Promise<void>;
}
