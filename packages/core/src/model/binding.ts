/**
 * Bindings connect an argument to the place its value lives.
 */

import type { Binding } from "@argloom/sdk";

/** Holds the value itself; the default when no binding is given. */
export class ValueBinding<T> implements Binding<T> {
  constructor(private value: T) {}

  get(): T {
    return this.value;
  }

  set(value: T): void {
    this.value = value;
  }
}

export function valueBinding<T>(initial: T): ValueBinding<T> {
  return new ValueBinding(initial);
}

/** Reads and writes one property of a target object. */
export function propertyBinding<T extends object, K extends keyof T>(target: T, key: K): Binding<T[K]> {
  return {
    get: () => target[key],
    set: (value) => {
      target[key] = value;
    },
  };
}

/** Shallow copy of container values so defaults survive repeated parses. */
export function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) return [...value];
  if (value instanceof Set) return new Set(value);
  if (value instanceof Map) return new Map(value);
  return value;
}
