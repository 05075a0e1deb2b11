import { Router, type Request, type Response, type NextFunction } from "express";
import type { TokenVerifier } from "../keycloak/token-verifier";
import type { AuthService } from "../services/auth-service";
import { authenticate, currentIdentity } from "../middleware/auth";

export function authRouter(verifier: TokenVerifier, authService: AuthService): Router {
	const router = Router();

	router.get("/auth/me", authenticate(verifier), (req, res, next) => {
		try {
			const identity = currentIdentity(req);
			return res.json({
				sub: identity.sub,
				preferred_username: identity.username,
				email: identity.email ?? null,
				email_verified: identity.emailVerified ?? null,
				realm_access: { roles: [...identity.realmRoles] },
				resource_access: Object.fromEntries(
					[...identity.clientRoles].map(([clientId, roles]) => [clientId, { roles: [...roles] }])
				),
			});
		} catch (err) {
			return next(err);
		}
	});

	router.post("/auth/refresh", async (req, res, next) => {
		const refreshToken: unknown = req.body?.refresh_token;
		if (typeof refreshToken !== "string" || refreshToken === "") {
			return res.status(400).json({ error: "missing_refresh_token" });
		}
		try {
			const tokens = await authService.refreshToken(refreshToken);
			return res.json({
				access_token: tokens.access_token,
				refresh_token: tokens.refresh_token ?? null,
				token_type: tokens.token_type,
				expires_in: tokens.expires_in,
			});
		} catch (err) {
			return next(err);
		}
	});

	const tokenInfo = (req: Request, res: Response, next: NextFunction) => {
		try {
			return res.json(currentIdentity(req).claims);
		} catch (err) {
			return next(err);
		}
	};

	router.get("/auth/tokens/info", authenticate(verifier), tokenInfo);

	// Deprecated alias kept for older clients.
	router.get(
		"/auth/token-info",
		(_req, res, next) => {
			res.setHeader("Deprecation", "true");
			res.setHeader("Link", '</auth/tokens/info>; rel="successor-version"');
			next();
		},
		authenticate(verifier),
		tokenInfo
	);

	return router;
}
