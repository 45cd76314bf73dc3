/**
 * Machine-readable error kinds returned in every error body.
 * The frontend SDK switches on these to render a consistent error state.
 */
export const ERROR_KINDS = {
  /** Malformed route parameter or request body */
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',

  /** Unknown view identifier or unknown user */
  NOT_FOUND: 'NOT_FOUND',

  /** The auth module rejected a write that clashes with existing data */
  CONFLICT: 'CONFLICT',

  /** The auth module requires credentials it did not get */
  UNAUTHENTICATED: 'UNAUTHENTICATED',

  /** The auth module refused the operation */
  FORBIDDEN: 'FORBIDDEN',

  /** The auth module is unreachable, timed out, or failed */
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',

  /** Unexpected exception inside this service */
  INTERNAL: 'INTERNAL'
} as const;

export type ErrorKind = (typeof ERROR_KINDS)[keyof typeof ERROR_KINDS];
