/**
 * Reads `key` only when the record defines it itself, so names such as
 * `constructor` taken from a document never resolve to inherited members.
 */
export function ownValue<T>(
  record: Readonly<Record<string, T>>,
  key: string,
): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
