import type { ErrorRequestHandler } from "express";
import {
	AuthErrorKind,
	isAuthError,
	isTokenError,
	toInternalError,
	type AuthError,
} from "@resumeflow/shared/errors";
import type { Logger } from "@resumeflow/shared/utils";

const STATUS_BY_KIND: Record<AuthErrorKind, number> = {
	[AuthErrorKind.MalformedToken]: 401,
	[AuthErrorKind.UnknownSigningKey]: 401,
	[AuthErrorKind.TokenExpired]: 401,
	[AuthErrorKind.InvalidAudience]: 401,
	[AuthErrorKind.InvalidIssuer]: 401,
	[AuthErrorKind.InvalidToken]: 401,
	[AuthErrorKind.TokenRefreshFailed]: 401,
	[AuthErrorKind.InsufficientRole]: 403,
	[AuthErrorKind.ResourceNotFound]: 404,
	[AuthErrorKind.UpstreamServerError]: 502,
	[AuthErrorKind.UnexpectedUpstreamError]: 502,
	[AuthErrorKind.IdentityProviderUnavailable]: 503,
	[AuthErrorKind.InternalError]: 500,
};

export function statusFor(err: AuthError): number {
	return STATUS_BY_KIND[err.kind];
}

function publicMessage(err: AuthError): string {
	switch (err.kind) {
		case AuthErrorKind.IdentityProviderUnavailable:
			return "Authentication server is currently unavailable. Please try again later.";
		case AuthErrorKind.UpstreamServerError:
		case AuthErrorKind.UnexpectedUpstreamError:
			return "The identity provider returned an unexpected response.";
		default:
			return err.message;
	}
}

interface ClientRequestError {
	status: number;
	type?: string;
}

// body-parser and other http-errors style failures (bad JSON, oversized body).
function clientRequestErrorOf(err: unknown): ClientRequestError | undefined {
	if (typeof err !== "object" || err === null) return undefined;
	const status =
		"status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
	if (typeof status !== "number" || status < 400 || status > 499) return undefined;
	const type = "type" in err && typeof err.type === "string" ? err.type : undefined;
	return { status, type };
}

/**
 * The only place an AuthError kind becomes an HTTP status. Errors of any
 * other type are logged under a correlation id and answered with a 500,
 * except client errors raised by express itself, which keep their 4xx.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
	return (err: unknown, req, res, next) => {
		if (res.headersSent) return next(err);

		const clientError = isAuthError(err) ? undefined : clientRequestErrorOf(err);
		if (clientError) {
			logger.debug({ status: clientError.status, type: clientError.type }, "Rejected request");
			return res
				.status(clientError.status)
				.json({ error: clientError.type ?? "bad_request" });
		}

		const authError = toInternalError(err, logger, `handling ${req.method} ${req.path}`);
		const status = statusFor(authError);

		if (isTokenError(authError)) {
			res.setHeader("WWW-Authenticate", 'Bearer error="invalid_token"');
		} else if (status === 401) {
			res.setHeader("WWW-Authenticate", "Bearer");
		}
		if (status === 503) res.setHeader("Retry-After", "30");

		const body: Record<string, unknown> = {
			error: authError.kind,
			message: publicMessage(authError),
		};
		if (authError.details.requiredRoles) body.requiredRoles = authError.details.requiredRoles;
		if (authError.details.correlationId) body.errorId = authError.details.correlationId;

		return res.status(status).json(body);
	};
}
