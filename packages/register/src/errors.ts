/**
 * Raised for misuse of the registry that the type system cannot rule out.
 * Lookups and (un)registrations never throw; they report failure through
 * their return values.
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}
