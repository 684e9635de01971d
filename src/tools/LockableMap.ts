import { lockedMapMutationError } from "../errors";

/**
 * A Map that can be permanently locked to prevent further mutations.
 *
 * Before locking it behaves exactly like a regular `Map`.
 * After `lock()` is called, any call to `set`, `delete` or `clear`
 * throws immediately.
 */
export class LockableMap<K, V> extends Map<K, V> {
  #locked = false;
  readonly #name: string;

  constructor(name?: string) {
    super();
    this.#name = name ?? "LockableMap";
  }

  /** Whether the map is currently locked. */
  get locked(): boolean {
    return this.#locked;
  }

  /** Permanently lock the map. */
  lock(): void {
    this.#locked = true;
  }

  private throwIfLocked(): void {
    if (this.#locked) {
      lockedMapMutationError.throw({ name: this.#name });
    }
  }

  override set(key: K, value: V): this {
    this.throwIfLocked();
    return super.set(key, value);
  }

  override delete(key: K): boolean {
    this.throwIfLocked();
    return super.delete(key);
  }

  override clear(): void {
    this.throwIfLocked();
    super.clear();
  }
}
