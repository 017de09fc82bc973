/**
 * Formats a thrown value as `<ErrorName>: <message>`.
 *
 * Values thrown inside a `vm` context come from another realm and fail
 * `instanceof Error`, so the shape is checked instead.
 */
export function describeThrown(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'message' in value) {
    const name: unknown = Reflect.get(value, 'name');
    const message: unknown = Reflect.get(value, 'message');
    return `${typeof name === 'string' && name ? name : 'Error'}: ${String(message)}`;
  }
  return String(value);
}
