import type { Creator } from "./Creator";
import type { ChildConstructor } from "./types";

/**
 * Name -> Creator mapping for a single base and argument signature.
 * Keeps a reverse index so each child holds at most one name.
 */
export class RegistryTable<TBase, TArgs extends unknown[]> {
  private creators = new Map<string, Creator<TBase, TArgs>>();
  private names = new Map<ChildConstructor<TBase, TArgs>, string>();

  get size(): number {
    return this.creators.size;
  }

  get(name: string): Creator<TBase, TArgs> | undefined {
    return this.creators.get(name);
  }

  has(name: string): boolean {
    return this.creators.has(name);
  }

  nameOf(child: ChildConstructor<TBase, TArgs>): string | undefined {
    return this.names.get(child);
  }

  /** Adds `creator` under `name`; false if the name is empty or taken, or the child already has a name. */
  insert(name: string, creator: Creator<TBase, TArgs>): boolean {
    if (name === "" || this.creators.has(name) || this.names.has(creator.child)) {
      return false;
    }
    this.creators.set(name, creator);
    this.names.set(creator.child, name);
    return true;
  }

  remove(name: string): boolean {
    const creator = this.creators.get(name);
    if (!creator) return false;
    this.creators.delete(name);
    this.names.delete(creator.child);
    return true;
  }

  /** Registered names in ascending code-unit order. */
  list(): string[] {
    return Array.from(this.creators.keys()).sort();
  }
}
