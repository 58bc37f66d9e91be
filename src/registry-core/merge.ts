/**
 * Overlays the fields a caller explicitly set onto a stored record.
 *
 * A key counts as set when it is present with any value other than
 * `undefined`; an explicit `null` is applied. Nested values such as address
 * lists are replaced wholesale, never merged element by element. The result
 * is untyped until the caller re-validates it against the full record schema.
 */
export function mergeRecord(stored: object, patch: object): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...stored };
  for (const [field, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    merged[field] = value;
  }
  return merged;
}
