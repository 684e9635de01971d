import { danglingReferenceError, referenceMetadataError } from "../errors";

type Patch = (target: object) => void;

interface PendingPatch {
  readonly path: string;
  readonly apply: Patch;
}

/**
 * Identity bookkeeping for one encode or decode call.
 *
 * Encoding hands out sequential ids in first-seen order. Decoding maps ids
 * back to objects and holds patches for references that arrive before the
 * object they name.
 */
export class ReferenceTracker {
  private readonly ids = new WeakMap<object, string>();
  private nextId = 1;

  private readonly objects = new Map<string, object>();
  private readonly pending = new Map<string, PendingPatch[]>();

  public idFor(value: object): { id: string; isNew: boolean } {
    const existing = this.ids.get(value);
    if (existing !== undefined) {
      return { id: existing, isNew: false };
    }
    const id = String(this.nextId++);
    this.ids.set(value, id);
    return { id, isNew: true };
  }

  /**
   * Record the object carrying `$id`, then flush patches waiting for it.
   */
  public register(id: string, value: object, path = "$"): void {
    if (this.objects.has(id)) {
      throw referenceMetadataError.create({
        message: `Duplicate $id "${id}"`,
        path,
      });
    }
    this.objects.set(id, value);

    const waiting = this.pending.get(id);
    if (waiting) {
      this.pending.delete(id);
      for (const patch of waiting) {
        patch.apply(value);
      }
    }
  }

  public has(id: string): boolean {
    return this.objects.has(id);
  }

  public resolve(id: string, path = "$"): object {
    const value = this.objects.get(id);
    if (value === undefined) {
      throw danglingReferenceError.create({ id, path });
    }
    return value;
  }

  /**
   * Run `patch` once `id` is registered; immediately when it already is.
   */
  public whenRegistered(id: string, patch: Patch, path = "$"): void {
    const value = this.objects.get(id);
    if (value !== undefined) {
      patch(value);
      return;
    }
    const waiting = this.pending.get(id) ?? [];
    waiting.push({ path, apply: patch });
    this.pending.set(id, waiting);
  }

  /**
   * Fails on the first reference that never found its object.
   */
  public assertSettled(): void {
    const [unresolved] = this.pending;
    if (unresolved) {
      const [id, [first]] = unresolved;
      throw danglingReferenceError.create({ id, path: first.path });
    }
  }
}
