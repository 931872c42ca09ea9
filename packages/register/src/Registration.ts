import { createCreator } from "./Creator";
import type { Creator } from "./Creator";
import log from "./logger";
import type { Registrable } from "./Registrable";
import type { RegisterBase } from "./RegisterBase";
import type { Binding, ChildConstructor } from "./types";

/**
 * Binds one child class to its base. A child declared with a fixed name
 * registers itself on first activation; an unnamed child stays
 * constructible only directly until `setName` gives it a name.
 */
export class Registration<TBase extends Registrable, TArgs extends unknown[]> implements Binding {
  readonly creator: Creator<TBase, TArgs>;
  private activated = false;
  private name: string;

  constructor(
    readonly owner: RegisterBase<TBase, TArgs>,
    readonly child: ChildConstructor<TBase, TArgs>,
    readonly fixedName?: string
  ) {
    this.creator = createCreator(child);
    this.name = fixedName ?? "";
  }

  /** Registers the fixed name, once. Later calls do nothing. */
  activate(): void {
    if (this.activated) return;
    this.activated = true;
    if (this.fixedName === undefined) return;

    if (!this.owner.setChild(this.child, this.fixedName)) {
      log.warn(
        { base: this.owner.label, child: this.fixedName },
        "self-registration failed, name is taken or invalid"
      );
    }
  }

  /** Whether the table currently maps a name to the child. */
  isRegistered(): boolean {
    return this.owner.nameOf(this.child) !== "";
  }

  /**
   * The last name the child was given, or "" if it never had one. Removing
   * the name from the table does not clear it.
   */
  getName(): string {
    return this.name;
  }

  /** Records a name the owner has just registered for the child. */
  assign(name: string): void {
    this.name = name;
  }

  /**
   * Moves the child to `name`. The old table entry is removed first and is
   * not restored if `name` cannot be taken, leaving the child unregistered
   * while `getName()` keeps reporting the old name.
   */
  setName(name: string): boolean {
    this.activate();
    const previous = this.owner.nameOf(this.child);
    if (previous !== "") {
      this.owner.removeChild(previous);
    }
    if (this.owner.setChild(this.child, name)) {
      return true;
    }
    if (previous !== "") {
      log.warn(
        { base: this.owner.label, child: previous, requested: name },
        "rename failed, child is no longer registered"
      );
    }
    return false;
  }

  info(): string {
    return `Registered sub-class "${this.getName()}".`;
  }
}
