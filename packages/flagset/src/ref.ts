/**
 * A mutable location a flag writes into when it is set.
 *
 * Bindings hold a `Ref` rather than the value itself, so the flag set can
 * update a field that lives inside some caller-owned object.
 */
export interface Ref<T> {
  get(): T;
  set(value: T): void;
}

/** A standalone box holding a single value. */
export function ref<T>(initial: T): Ref<T> {
  let current = initial;
  return {
    get: () => current,
    set(value: T) {
      current = value;
    },
  };
}

/** Reference a property of a statically typed object. */
export function propertyRef<O extends object, K extends keyof O>(
  target: O,
  key: K,
): Ref<O[K]> {
  return {
    get: () => target[key],
    set(value: O[K]) {
      target[key] = value;
    },
  };
}

/**
 * Reference a property of a loosely typed record.
 *
 * Reads go through `is`; when the property does not currently hold a `T`
 * the reference reports `fallback` instead.
 */
export function fieldRef<T>(
  target: Record<string, unknown>,
  key: string,
  is: (value: unknown) => value is T,
  fallback: T,
): Ref<T> {
  return {
    get() {
      const value = target[key];
      return is(value) ? value : fallback;
    },
    set(value: T) {
      target[key] = value;
    },
  };
}
