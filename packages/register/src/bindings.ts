import type { Binding } from "./types";

// Keyed by constructor and shared by every base: a class has at most one binding.
const bindings = new WeakMap<object, Binding>();

export function getBinding(child: object): Binding | undefined {
  return bindings.get(child);
}

export function setBinding(child: object, binding: Binding): void {
  bindings.set(child, binding);
}

/**
 * Finds the binding for an instance's class, falling back to the nearest
 * bound ancestor so unbound subclasses report the name they inherit.
 */
export function findBinding(instance: object): Binding | undefined {
  let proto: unknown = Object.getPrototypeOf(instance);
  while (typeof proto === "object" && proto !== null && proto !== Object.prototype) {
    const binding = bindings.get(proto.constructor);
    if (binding) return binding;
    proto = Object.getPrototypeOf(proto);
  }
  return undefined;
}
