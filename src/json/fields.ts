/**
 * Field Matching
 *
 * Object keys resolve to declared names under identifier normalization:
 * case and word separators are ignored, so `fooBar`, `foo_bar`, `FooBar`
 * and `foo-bar` all name the same field.
 */

export function normalizeIdentifier(name: string): string {
  return name.replace(/[_\-\s]/g, '').toLowerCase();
}

/**
 * Lookup table from normalized names to declaration indices
 */
export class FieldTable {
  private readonly index = new Map<string, number>();

  /**
   * @throws {TypeError} If two names collide after normalization
   */
  constructor(
    readonly names: readonly string[],
    readonly owner: string
  ) {
    names.forEach((name, position) => {
      const key = normalizeIdentifier(name);
      const existing = this.index.get(key);
      if (existing !== undefined) {
        throw new TypeError(
          `${owner}: "${names[existing]}" and "${name}" are the same name after normalization`
        );
      }
      this.index.set(key, position);
    });
  }

  lookup(key: string): number | undefined {
    return this.index.get(normalizeIdentifier(key));
  }
}

export type FieldMatch =
  | { matched: true; index: number }
  | { matched: false; action: 'reject' | 'skip' };

/**
 * Resolve a raw object key against a table. A miss is rejected under
 * strict matching and skipped otherwise.
 */
export function matchField(table: FieldTable, key: string, strict: boolean): FieldMatch {
  const index = table.lookup(key);
  if (index !== undefined) {
    return { matched: true, index };
  }
  return { matched: false, action: strict ? 'reject' : 'skip' };
}
