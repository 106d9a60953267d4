/**
 * String form of an arbitrary key or value for messages and toString.
 * Values String() rejects (null-prototype objects, throwing toString)
 * fall back to their "[object Tag]" form.
 */
export function format_value(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}
