/**
 * Write-once cell with async initialisation.
 *
 * Concurrent `getOrInit` callers share a single in-flight init (promise
 * deduplication). A rejected init leaves the cell empty so the next caller
 * can retry; the first value written is never replaced.
 */

type CellState<T> =
  | { kind: "empty" }
  | { kind: "pending"; promise: Promise<T> }
  | { kind: "set"; value: T };

export class OnceCell<T> {
  #state: CellState<T> = { kind: "empty" };

  static withValue<T>(value: T): OnceCell<T> {
    const cell = new OnceCell<T>();
    cell.set(value);
    return cell;
  }

  get(): T | undefined {
    return this.#state.kind === "set" ? this.#state.value : undefined;
  }

  has(): boolean {
    return this.#state.kind === "set";
  }

  /**
   * Set the value if none is set yet. Returns false when the cell was
   * already set; the stored value is left as it was.
   */
  set(value: T): boolean {
    if (this.#state.kind === "set") {
      return false;
    }
    this.#state = { kind: "set", value };
    return true;
  }

  getOrInit(init: () => Promise<T>): Promise<T> {
    const state = this.#state;
    if (state.kind === "set") {
      return Promise.resolve(state.value);
    }
    if (state.kind === "pending") {
      return state.promise;
    }

    const promise: Promise<T> = new Promise<T>((resolve) => resolve(init())).then(
      (value) => {
        const current = this.#state;
        if (current.kind === "set") {
          return current.value;
        }
        this.#state = { kind: "set", value };
        return value;
      },
      (error: unknown) => {
        const current = this.#state;
        if (current.kind === "pending" && current.promise === promise) {
          this.#state = { kind: "empty" };
        }
        throw error;
      }
    );
    this.#state = { kind: "pending", promise };
    return promise;
  }
}
