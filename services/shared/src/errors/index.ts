import { randomUUID } from "node:crypto";
import type { Logger } from "pino";

export const AuthErrorKind = {
  MalformedToken: "malformed_token",
  UnknownSigningKey: "unknown_signing_key",
  TokenExpired: "token_expired",
  InvalidAudience: "invalid_audience",
  InvalidIssuer: "invalid_issuer",
  InvalidToken: "invalid_token",
  InsufficientRole: "insufficient_role",
  IdentityProviderUnavailable: "identity_provider_unavailable",
  TokenRefreshFailed: "token_refresh_failed",
  ResourceNotFound: "resource_not_found",
  UpstreamServerError: "upstream_server_error",
  UnexpectedUpstreamError: "unexpected_upstream_error",
  InternalError: "internal_error",
} as const;

export type AuthErrorKind = (typeof AuthErrorKind)[keyof typeof AuthErrorKind];

export interface AuthErrorDetails {
  requiredRoles?: string[];
  status?: number;
  correlationId?: string;
}

/**
 * Failure raised by the auth core. Carries no transport concerns; the web
 * layer decides how each kind is rendered.
 */
export class AuthError extends Error {
  readonly kind: AuthErrorKind;
  readonly details: AuthErrorDetails;

  constructor(
    kind: AuthErrorKind,
    message: string,
    details: AuthErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AuthError";
    this.kind = kind;
    this.details = details;
  }
}

export function isAuthError(err: unknown): err is AuthError {
  return err instanceof AuthError;
}

const TOKEN_KINDS: ReadonlySet<AuthErrorKind> = new Set([
  AuthErrorKind.MalformedToken,
  AuthErrorKind.UnknownSigningKey,
  AuthErrorKind.TokenExpired,
  AuthErrorKind.InvalidAudience,
  AuthErrorKind.InvalidIssuer,
  AuthErrorKind.InvalidToken,
]);

export function isTokenError(err: AuthError): boolean {
  return TOKEN_KINDS.has(err.kind);
}

/**
 * Passes AuthErrors through; anything else is logged under a fresh
 * correlation id and replaced by an internal_error that only exposes the id.
 */
export function toInternalError(
  err: unknown,
  logger: Logger,
  context: string
): AuthError {
  if (isAuthError(err)) return err;
  const correlationId = randomUUID();
  logger.error({ err, correlationId }, `Unexpected error ${context}`);
  return new AuthError(
    AuthErrorKind.InternalError,
    `Unexpected error (Error ID: ${correlationId})`,
    { correlationId },
    { cause: err }
  );
}
