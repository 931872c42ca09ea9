import type { Destructible } from "./types";

/**
 * Exclusive owner of at most one object. The object is destroyed when the
 * handle is reset, unless ownership was released or moved first.
 */
export class UniqueHandle<T extends Destructible> {
  private value: T | null;

  constructor(value: T | null = null) {
    this.value = value;
  }

  get empty(): boolean {
    return this.value === null;
  }

  get(): T | null {
    return this.value;
  }

  /** Gives up ownership without destroying the object. */
  release(): T | null {
    const value = this.value;
    this.value = null;
    return value;
  }

  /** Destroys the held object, then takes ownership of `next`. */
  reset(next: T | null = null): void {
    const previous = this.value;
    this.value = next;
    if (previous !== null && previous !== next) {
      previous.destroy();
    }
  }

  /** Transfers ownership to a new handle, leaving this one empty. */
  move(): UniqueHandle<T> {
    return new UniqueHandle(this.release());
  }

  /**
   * Runs `fn` with the held object and destroys it afterwards, even if `fn`
   * throws. Returns null without calling `fn` when the handle is empty.
   */
  use<R>(fn: (value: T) => R): R | null {
    if (this.value === null) return null;
    try {
      return fn(this.value);
    } finally {
      this.reset();
    }
  }
}

interface ControlBlock<T> {
  value: T;
  owners: number;
}

/**
 * Reference-counted owner. Every handle from `share()` counts as one owner;
 * the last `reset()` destroys the object.
 */
export class SharedHandle<T extends Destructible> {
  private block: ControlBlock<T> | null;

  private constructor(block: ControlBlock<T> | null) {
    this.block = block;
  }

  static of<T extends Destructible>(value: T | null): SharedHandle<T> {
    return new SharedHandle(value === null ? null : { value, owners: 1 });
  }

  get empty(): boolean {
    return this.block === null;
  }

  /** Number of live handles sharing the object, 0 when empty. */
  get useCount(): number {
    return this.block?.owners ?? 0;
  }

  get(): T | null {
    return this.block?.value ?? null;
  }

  share(): SharedHandle<T> {
    if (this.block) this.block.owners += 1;
    return new SharedHandle(this.block);
  }

  /** Drops this owner. Safe to call more than once. */
  reset(): void {
    const block = this.block;
    if (!block) return;
    this.block = null;
    block.owners -= 1;
    if (block.owners === 0) {
      block.value.destroy();
    }
  }
}
