import type Logger from "bunyan";
import { getBinding, setBinding } from "./bindings";
import { RegistryError } from "./errors";
import { SharedHandle, UniqueHandle } from "./handles";
import log from "./logger";
import type { Registrable } from "./Registrable";
import { RegistryTable } from "./RegistryTable";
import { Registration } from "./Registration";
import type { AbstractConstructor, ChildConstructor } from "./types";

export interface RegisterBaseOptions {
  /** Display name of the base. Defaults to the base class name. */
  label?: string;
  description?: string;
  /**
   * Tells apart several registries over the same base class that construct
   * children from different argument lists.
   */
  signature?: string;
}

/**
 * The construction contract of one base capability: children are
 * registered under unique names and created from a name chosen at runtime.
 *
 * One instance exists per (base, argument list) pair and is meant to live
 * for the whole process, usually as a module-level constant next to the
 * base class.
 *
 * A child class is bound to a single `RegisterBase`. When a base declares
 * several argument lists, each child registers with exactly one of them;
 * `register` throws and `setChild` returns false for a class bound to
 * another instance, even one over the same base class.
 */
export class RegisterBase<TBase extends Registrable, TArgs extends unknown[] = []> {
  readonly label: string;
  readonly description: string;
  readonly signature: string;

  private table: RegistryTable<TBase, TArgs> | null = null;
  private registrations = new Map<ChildConstructor<TBase, TArgs>, Registration<TBase, TArgs>>();
  private log: Logger;

  constructor(readonly base: AbstractConstructor<TBase>, options: RegisterBaseOptions = {}) {
    this.label = options.label ?? base.name;
    this.description = options.description ?? "Register base class.";
    this.signature = options.signature ?? "";
    this.log = log.child({ base: this.label, signature: this.signature });
  }

  private get creators(): RegistryTable<TBase, TArgs> {
    if (!this.table) {
      this.table = new RegistryTable<TBase, TArgs>();
      this.log.debug("registry table created");
    }
    return this.table;
  }

  /** Constructs the child registered under `name`, or returns null if there is none. */
  create(name: string, ...args: TArgs): TBase | null {
    return this.construct(name, args);
  }

  /** Like `create`, with the result owned by an exclusive handle (empty on failure). */
  createUnique(name: string, ...args: TArgs): UniqueHandle<TBase> {
    return new UniqueHandle(this.construct(name, args));
  }

  /** Like `create`, with the result owned by a reference-counted handle (empty on failure). */
  createShared(name: string, ...args: TArgs): SharedHandle<TBase> {
    return SharedHandle.of(this.construct(name, args));
  }

  hasChild(name: string): boolean {
    return this.creators.has(name);
  }

  /** Unregisters `name`. Objects already created are unaffected. */
  removeChild(name: string): boolean {
    const removed = this.creators.remove(name);
    if (removed) {
      this.log.debug({ child: name }, "child removed");
    }
    return removed;
  }

  /**
   * Registers `child` under `name`. Fails without changing anything if the
   * name is empty or taken, if `child` already holds a name here (use
   * `Registration.setName` to rename), or if `child` belongs to another base.
   */
  setChild(child: ChildConstructor<TBase, TArgs>, name: string): boolean {
    const registration = this.attach(child);
    if (!registration) {
      this.log.warn({ child: child.name }, "class is bound to another base");
      return false;
    }
    const inserted = this.creators.insert(name, registration.creator);
    if (inserted) {
      registration.assign(name);
      this.log.debug({ child: name }, "child registered");
    }
    return inserted;
  }

  /** Names of all registered children in ascending order. */
  getChildren(): string[] {
    return this.creators.list();
  }

  /**
   * Binds `child` to this base and, when `name` is given, registers it under
   * that name. Repeated calls with the same arguments return the same
   * binding and register nothing new.
   *
   * @throws RegistryError if `child` is already bound to another base or
   *   under a different fixed name.
   */
  register(child: ChildConstructor<TBase, TArgs>, name?: string): Registration<TBase, TArgs> {
    const existing = this.registrations.get(child);
    if (existing && existing.fixedName !== name) {
      throw new RegistryError(`${child.name} is already bound to ${this.label} under another name`);
    }
    const registration = existing ?? this.attach(child, name);
    if (!registration) {
      throw new RegistryError(`${child.name} is already bound to another base than ${this.label}`);
    }
    registration.activate();
    return registration;
  }

  registrationOf(child: ChildConstructor<TBase, TArgs>): Registration<TBase, TArgs> | undefined {
    return this.registrations.get(child);
  }

  /** The name the table currently maps to `child`, or "". */
  nameOf(child: ChildConstructor<TBase, TArgs>): string {
    return this.creators.nameOf(child) ?? "";
  }

  private attach(
    child: ChildConstructor<TBase, TArgs>,
    fixedName?: string
  ): Registration<TBase, TArgs> | null {
    const existing = this.registrations.get(child);
    if (existing) return existing;
    if (getBinding(child)) return null;

    const registration = new Registration(this, child, fixedName);
    this.registrations.set(child, registration);
    setBinding(child, registration);
    return registration;
  }

  private construct(name: string, args: TArgs): TBase | null {
    const creator = this.creators.get(name);
    if (!creator) {
      this.log.trace({ child: name }, "no child registered under name");
      return null;
    }
    return creator.create(...args);
  }
}
