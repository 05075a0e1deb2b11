import type { NextFunction, Request, RequestHandler, Response } from "express";
import { bearerFromAuthHeader } from "@resumeflow/shared/auth";
import { AuthError, AuthErrorKind } from "@resumeflow/shared/errors";
import type { VerifiedIdentity } from "@resumeflow/shared/types";
import type { TokenVerifier } from "../keycloak/token-verifier";
import "../types";

/**
 * Requires a valid bearer token and, when roles are listed, at least one of
 * them. The verified identity is left on `req.identity`.
 */
export function authenticate(
	verifier: TokenVerifier,
	...requiredRoles: string[]
): RequestHandler {
	return async (req: Request, res: Response, next: NextFunction) => {
		const token = bearerFromAuthHeader(req.headers.authorization);
		if (!token) {
			res.setHeader("WWW-Authenticate", "Bearer");
			return res.status(401).json({ error: "missing_token" });
		}
		try {
			req.identity = await verifier.verify(token, requiredRoles);
			return next();
		} catch (err) {
			return next(err);
		}
	};
}

export function currentIdentity(req: Request): VerifiedIdentity {
	if (!req.identity) {
		throw new AuthError(AuthErrorKind.MalformedToken, "Request is not authenticated");
	}
	return req.identity;
}

/** Aborts when the client goes away before the response is finished. */
export function requestSignal(req: Request, res: Response): AbortSignal {
	const controller = new AbortController();
	res.on("close", () => {
		if (!res.writableFinished) controller.abort(new Error(`Client closed ${req.method} ${req.path}`));
	});
	return controller.signal;
}
