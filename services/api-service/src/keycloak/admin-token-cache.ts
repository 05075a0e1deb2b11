import { z } from "zod";
import { AuthError, AuthErrorKind } from "@resumeflow/shared/errors";
import type { Logger } from "@resumeflow/shared/utils";
import { AsyncSlot } from "./async-slot";

export type FetchFn = typeof fetch;

export interface AdminTokenCacheOptions {
	tokenUrl: string;
	clientId: string;
	clientSecret: string;
	timeoutMs: number;
	logger: Logger;
	fetchImpl?: FetchFn;
}

const tokenResponseSchema = z.object({
	access_token: z.string().min(1),
	expires_in: z.number().optional(),
	token_type: z.string().optional(),
});

/**
 * Service-account token obtained with the client-credentials grant. The
 * token's own expiry is not tracked; callers invalidate it when Keycloak
 * answers 401/403.
 */
export class AdminTokenCache {
	private readonly slot: AsyncSlot<string>;
	private readonly logger: Logger;
	private readonly fetchImpl: FetchFn;

	constructor(private readonly options: AdminTokenCacheOptions) {
		this.logger = options.logger.child({ component: "AdminTokenCache" });
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.slot = new AsyncSlot(() => this.requestToken());
	}

	async getToken(): Promise<string> {
		return this.slot.get();
	}

	invalidateToken(): void {
		this.logger.debug("Admin token invalidated");
		this.slot.invalidate();
	}

	private async requestToken(): Promise<string> {
		const { tokenUrl, clientId, clientSecret, timeoutMs } = this.options;

		let resp: Response;
		try {
			resp = await this.fetchImpl(tokenUrl, {
				method: "POST",
				headers: { "Content-Type": "application/x-www-form-urlencoded" },
				body: new URLSearchParams({
					grant_type: "client_credentials",
					client_id: clientId,
					client_secret: clientSecret,
				}),
				signal: AbortSignal.timeout(timeoutMs),
			});
		} catch (err) {
			this.logger.error({ err }, "Admin token request failed");
			throw new AuthError(
				AuthErrorKind.IdentityProviderUnavailable,
				"Failed to obtain admin token",
				{},
				{ cause: err }
			);
		}

		if (!resp.ok) {
			this.logger.error({ status: resp.status }, "Admin token request rejected");
			throw new AuthError(
				AuthErrorKind.IdentityProviderUnavailable,
				`Failed to obtain admin token (${resp.status})`,
				{ status: resp.status }
			);
		}

		const parsed = tokenResponseSchema.safeParse(await resp.json().catch(() => null));
		if (!parsed.success) {
			this.logger.error("Admin token response is missing access_token");
			throw new AuthError(
				AuthErrorKind.IdentityProviderUnavailable,
				"Failed to obtain admin token (malformed response)"
			);
		}

		this.logger.info({ expiresIn: parsed.data.expires_in }, "Obtained admin token");
		return parsed.data.access_token;
	}
}
