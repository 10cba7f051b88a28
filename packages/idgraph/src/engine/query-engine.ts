/**
 * Query Engine
 *
 * Linear-scan attribute search. There are no property indexes: each call walks
 * the records it is given, in their iteration order.
 */

/**
 * Whether any supplied attribute equals the record's value.
 * An empty predicate matches nothing.
 */
export function matchesAny<R extends object>(record: R, predicate: Partial<R>): boolean {
  for (const key in predicate) {
    if (Object.hasOwn(predicate, key) && record[key] === predicate[key]) {
      return true
    }
  }
  return false
}

/**
 * Lazily yield the records matching `predicate`, each at most once.
 */
export function* searchRecords<R extends object>(
  records: Iterable<R>,
  predicate: Partial<R>,
): Generator<R, void, undefined> {
  for (const record of records) {
    if (matchesAny(record, predicate)) {
      yield record
    }
  }
}

/**
 * Field-wise equality of two records: same keys, `===` values.
 */
export function recordsEqual(a: object, b: object): boolean {
  const left: Array<[string, unknown]> = Object.entries(a)
  const right = new Map<string, unknown>(Object.entries(b))
  return left.length === right.size && left.every(([key, value]) => right.has(key) && right.get(key) === value)
}
