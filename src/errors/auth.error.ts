export type ErrorKind =
  | 'KeyFileNotFound'
  | 'InvalidKeyMaterial'
  | 'UnknownInstallation'
  | 'ExchangeFailed'
  | 'InstallationListFailed'
  | 'CollaboratorNotConfigured'
  | 'InvalidInstallationId';

/**
 * Error raised by the token lifecycle
 *
 * Nothing is retried internally: the kind tells the caller whether a retry
 * makes sense (UnknownInstallation, ExchangeFailed, InstallationListFailed)
 * or the configuration is broken (the rest).
 */
export class AuthError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
    this.kind = kind;
  }
}

export function isAuthError(error: unknown, kind?: ErrorKind): error is AuthError {
  return error instanceof AuthError && (kind === undefined || error.kind === kind);
}

/**
 * Extracts error message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
