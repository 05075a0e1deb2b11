import { z } from "zod";
import { AuthError, AuthErrorKind } from "@resumeflow/shared/errors";
import type { TokenSet } from "@resumeflow/shared/types";
import type { Logger } from "@resumeflow/shared/utils";
import type { KeycloakConfig } from "../config";
import type { FetchFn } from "../keycloak/admin-token-cache";

const tokenSetSchema = z.object({
	access_token: z.string().min(1),
	refresh_token: z.string().optional(),
	token_type: z.string().default("Bearer"),
	expires_in: z.number().default(3600),
});

export interface AuthServiceOptions {
	config: KeycloakConfig;
	timeoutMs: number;
	logger: Logger;
	fetchImpl?: FetchFn;
}

/** User-facing token operations against the realm's token endpoint. */
export class AuthService {
	private readonly logger: Logger;
	private readonly fetchImpl: FetchFn;

	constructor(private readonly options: AuthServiceOptions) {
		this.logger = options.logger.child({ component: "AuthService" });
		this.fetchImpl = options.fetchImpl ?? fetch;
	}

	async refreshToken(refreshToken: string): Promise<TokenSet> {
		const { config, timeoutMs } = this.options;
		const form = new URLSearchParams({
			grant_type: "refresh_token",
			refresh_token: refreshToken,
			client_id: config.clientId,
		});
		if (config.clientSecret) form.set("client_secret", config.clientSecret);

		let resp: Response;
		try {
			resp = await this.fetchImpl(config.tokenUrl, {
				method: "POST",
				headers: { "Content-Type": "application/x-www-form-urlencoded" },
				body: form,
				signal: AbortSignal.timeout(timeoutMs),
			});
		} catch (err) {
			this.logger.error({ err }, "Token endpoint unreachable");
			throw new AuthError(
				AuthErrorKind.IdentityProviderUnavailable,
				"Keycloak service unavailable",
				{},
				{ cause: err }
			);
		}

		if (resp.status !== 200) {
			this.logger.debug({ status: resp.status }, "Refresh token rejected");
			throw new AuthError(AuthErrorKind.TokenRefreshFailed, "Failed to refresh token", {
				status: resp.status,
			});
		}

		const parsed = tokenSetSchema.safeParse(await resp.json().catch(() => null));
		if (!parsed.success) {
			throw new AuthError(
				AuthErrorKind.UnexpectedUpstreamError,
				"Token endpoint returned a malformed response",
				{ status: resp.status }
			);
		}
		return parsed.data;
	}
}
