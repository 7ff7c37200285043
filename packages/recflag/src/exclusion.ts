/**
 * A set of resolved flag names to skip.
 *
 * Names may be scoped with dots (`db.host`); `subset("db")` yields the
 * names under that scope with the scope removed.
 */
export class ExclusionSet implements Iterable<string> {
  private readonly names: Set<string>;

  constructor(...names: string[]) {
    this.names = new Set(names);
  }

  /** A bare string is one name, not a sequence of characters. */
  static from(names: Iterable<string> | undefined): ExclusionSet {
    if (names instanceof ExclusionSet) return names;
    if (typeof names === "string") return new ExclusionSet(names);
    return new ExclusionSet(...(names ?? []));
  }

  get size(): number {
    return this.names.size;
  }

  contains(name: string): boolean {
    return this.names.has(name);
  }

  /** Members of the form `<prefix>.<rest>`, as `rest`. Splits at the first dot only. */
  subset(prefix: string): ExclusionSet {
    const rest: string[] = [];
    for (const name of this.names) {
      const dot = name.indexOf(".");
      if (dot >= 0 && name.slice(0, dot) === prefix) {
        rest.push(name.slice(dot + 1));
      }
    }
    return new ExclusionSet(...rest);
  }

  [Symbol.iterator](): Iterator<string> {
    return this.names[Symbol.iterator]();
  }
}
