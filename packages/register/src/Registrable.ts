import { findBinding } from "./bindings";
import type { Destructible } from "./types";

/**
 * Root of every base capability. Concrete children inherit `name()` and
 * `info()`, which answer from the child's registration.
 */
export abstract class Registrable implements Destructible {
  /** Runtime name of this object's registered class, or "" when unbound. */
  name(): string {
    return findBinding(this)?.getName() ?? "";
  }

  info(): string {
    const binding = findBinding(this);
    return binding ? binding.info() : this.describe();
  }

  /** Description reported by instances of classes without a registration. */
  protected describe(): string {
    return "Register base class.";
  }

  /** Called once an owning handle lets go of the object. */
  destroy(): void {}
}
