import type { ChildConstructor } from "./types";

/** Stateless factory for one child class. */
export interface Creator<TBase, TArgs extends unknown[]> {
  readonly child: ChildConstructor<TBase, TArgs>;
  create(...args: TArgs): TBase;
}

export function createCreator<TBase, TArgs extends unknown[]>(
  child: ChildConstructor<TBase, TArgs>
): Creator<TBase, TArgs> {
  return Object.freeze({
    child,
    create: (...args: TArgs): TBase => new child(...args),
  });
}
