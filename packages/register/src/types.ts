/** Any class whose instances are `T`, including abstract ones. */
export type AbstractConstructor<T> = abstract new (...args: never[]) => T;

/** A concrete class constructible from the argument list `TArgs`. */
export type ChildConstructor<TBase, TArgs extends unknown[]> = new (...args: TArgs) => TBase;

/** The per-type view an instance needs to report its own name. */
export interface Binding {
  readonly owner: object;
  getName(): string;
  info(): string;
}

/** Something an ownership handle can release. */
export interface Destructible {
  destroy(): void;
}
