/** Encodes an email as one URL path segment, keeping `@` readable. */
export function emailPathSegment(email: string): string {
  return encodeURIComponent(email).replace(/%40/g, '@');
}
