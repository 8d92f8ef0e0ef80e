/**
 * NameLookup — name → value map honouring a case rule.
 *
 * Registering a name that is already taken, or that collapses onto a taken
 * name when matching case-insensitively, fails with DuplicateNameError.
 */

import { DuplicateNameError } from "@argloom/sdk";

export interface NameLookup<T> {
  add(name: string, value: T): void;
  get(name: string): T | undefined;
  has(name: string): boolean;
  /** Registered names in insertion order, as declared. */
  names(): string[];
}

export function createNameLookup<T>(kind: string, caseInsensitive: boolean): NameLookup<T> {
  const entries = new Map<string, { name: string; value: T }>();
  const normalize = (name: string): string => (caseInsensitive ? name.toLowerCase() : name);

  return {
    add(name: string, value: T): void {
      const existing = entries.get(normalize(name));
      if (existing) {
        const message =
          existing.name === name
            ? `Duplicate ${kind} name '${name}'`
            : `${kind.charAt(0).toUpperCase()}${kind.slice(1)} names '${existing.name}' and '${name}' collide when matched case-insensitively`;
        throw new DuplicateNameError(name, message);
      }
      entries.set(normalize(name), { name, value });
    },

    get(name: string): T | undefined {
      return entries.get(normalize(name))?.value;
    },

    has(name: string): boolean {
      return entries.has(normalize(name));
    },

    names(): string[] {
      return Array.from(entries.values(), (entry) => entry.name);
    },
  };
}
