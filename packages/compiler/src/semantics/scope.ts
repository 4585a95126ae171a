type UndoEntry = { name: string; previous?: number };

/**
 * Name to slot bindings for one function or one file's top level. Slots are
 * handed out densely and never reused; a block's bindings are undone when it
 * exits, restoring whatever they shadowed.
 */
export class ScopeStack {
  #bindings = new Map<string, number>();
  #undo: UndoEntry[] = [];
  #blockMarks: number[] = [];
  #nextSlot = 0;

  get slotCount(): number {
    return this.#nextSlot;
  }

  get depth(): number {
    return this.#blockMarks.length;
  }

  declare(name: string): number {
    const slot = this.#nextSlot;
    this.#nextSlot += 1;
    this.#undo.push({ name, previous: this.#bindings.get(name) });
    this.#bindings.set(name, slot);
    return slot;
  }

  lookup(name: string): number | undefined {
    return this.#bindings.get(name);
  }

  enterBlock(): void {
    this.#blockMarks.push(this.#undo.length);
  }

  exitBlock(): void {
    const mark = this.#blockMarks.pop();
    if (mark === undefined) {
      throw new Error("exitBlock called without a matching enterBlock");
    }

    while (this.#undo.length > mark) {
      const entry = this.#undo.pop();
      if (!entry) break;
      if (entry.previous === undefined) {
        this.#bindings.delete(entry.name);
      } else {
        this.#bindings.set(entry.name, entry.previous);
      }
    }
  }

  withBlock<T>(fn: () => T): T {
    this.enterBlock();
    try {
      return fn();
    } finally {
      this.exitBlock();
    }
  }

  /** Bindings currently in scope, in slot order. */
  visibleBindings(): [name: string, slot: number][] {
    return Array.from(this.#bindings.entries()).sort(
      ([, left], [, right]) => left - right
    );
  }
}
