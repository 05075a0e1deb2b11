import jwt, { type Jwt, type JwtPayload } from "jsonwebtoken";
import { z } from "zod";
import { AuthError, AuthErrorKind, toInternalError } from "@resumeflow/shared/errors";
import { collectRoles, toVerifiedIdentity } from "@resumeflow/shared/auth";
import type { KeycloakClaims, VerifiedIdentity } from "@resumeflow/shared/types";
import type { Logger } from "@resumeflow/shared/utils";
import { AsyncSlot } from "./async-slot";

/**
 * Anything that can list the realm's signing keys. `JwksClient` from
 * jwks-rsa satisfies this.
 */
export interface SigningKeySource {
	getSigningKeys(): Promise<Array<{ kid: string; getPublicKey(): string }>>;
}

export interface TokenVerifierOptions {
	issuer: string;
	clientId: string;
	keySource: SigningKeySource;
	logger: Logger;
}

type PublicKeySet = ReadonlyMap<string, string>;

const rolesSchema = z.object({ roles: z.array(z.string()) });

const claimsSchema = z
	.object({
		sub: z.string(),
		preferred_username: z.string().optional(),
		name: z.string().optional(),
		given_name: z.string().optional(),
		family_name: z.string().optional(),
		email: z.string().optional(),
		email_verified: z.boolean().optional(),
		realm_access: rolesSchema.optional(),
		resource_access: z.record(rolesSchema).optional(),
	})
	.passthrough();

export class TokenVerifier {
	private readonly keys: AsyncSlot<PublicKeySet>;
	private readonly logger: Logger;

	constructor(private readonly options: TokenVerifierOptions) {
		this.logger = options.logger.child({ component: "TokenVerifier" });
		this.keys = new AsyncSlot(() => this.fetchPublicKeys());
	}

	/**
	 * Verifies signature, expiry, audience and issuer, then (when roles are
	 * given) checks that the token holds at least one of them across realm
	 * and client roles.
	 */
	async verify(
		token: string,
		requiredRoles?: Iterable<string>
	): Promise<VerifiedIdentity> {
		try {
			const kid = this.readKeyId(token);
			const publicKey = await this.resolveKey(kid);
			const claims = this.verifySignedClaims(token, publicKey);

			const required = requiredRoles ? [...requiredRoles] : [];
			if (required.length > 0) {
				const held = collectRoles(claims);
				if (!required.some((role) => held.has(role))) {
					this.logger.warn(
						{ sub: claims.sub, required, held: [...held] },
						"Token lacks required roles"
					);
					throw new AuthError(
						AuthErrorKind.InsufficientRole,
						`Required role(s): ${required.join(", ")}`,
						{ requiredRoles: required }
					);
				}
			}

			const identity = toVerifiedIdentity(claims);
			this.logger.debug({ username: identity.username }, "Token verified");
			return identity;
		} catch (err) {
			throw toInternalError(err, this.logger, "verifying token");
		}
	}

	private readKeyId(token: string): string {
		let decoded: Jwt | null;
		try {
			decoded = jwt.decode(token, { complete: true });
		} catch {
			decoded = null;
		}
		if (!decoded) {
			this.logger.debug("Token could not be decoded");
			throw new AuthError(AuthErrorKind.MalformedToken, "Token could not be decoded");
		}
		const kid = decoded.header.kid;
		if (!kid) {
			this.logger.debug("Token missing key ID (kid)");
			throw new AuthError(AuthErrorKind.MalformedToken, "Token missing key ID");
		}
		return kid;
	}

	// At most one refetch per call; none if this call already populated the cache.
	private async resolveKey(kid: string): Promise<string> {
		const cached = this.keys.peek();
		let keys = cached ?? (await this.keys.get());
		let key = keys.get(kid);

		if (key === undefined && cached !== undefined) {
			this.logger.info({ kid }, "Unknown key id, refreshing public keys");
			keys = await this.keys.refresh();
			key = keys.get(kid);
		}
		if (key === undefined) {
			this.logger.warn({ kid }, "Public key not found for token");
			throw new AuthError(
				AuthErrorKind.UnknownSigningKey,
				"Public key not found for token"
			);
		}
		return key;
	}

	private verifySignedClaims(token: string, publicKey: string): KeycloakClaims {
		let payload: string | JwtPayload;
		try {
			payload = jwt.verify(token, publicKey, {
				algorithms: ["RS256"],
				audience: this.options.clientId,
				issuer: this.options.issuer,
			});
		} catch (err) {
			throw this.mapVerifyError(err);
		}

		const parsed = claimsSchema.safeParse(payload);
		if (!parsed.success) {
			this.logger.debug({ issues: parsed.error.issues }, "Token claims are malformed");
			throw new AuthError(AuthErrorKind.InvalidToken, "Invalid token: malformed claims");
		}
		return parsed.data;
	}

	private mapVerifyError(err: unknown): unknown {
		if (err instanceof jwt.TokenExpiredError) {
			this.logger.debug({ expiredAt: err.expiredAt }, "Token expired");
			return new AuthError(AuthErrorKind.TokenExpired, "Token has expired");
		}
		if (!(err instanceof jwt.JsonWebTokenError)) return err;

		this.logger.debug({ reason: err.message }, "Token rejected");
		if (err.message.startsWith("jwt audience invalid")) {
			return new AuthError(
				AuthErrorKind.InvalidAudience,
				`Token audience does not match client: ${this.options.clientId}`
			);
		}
		if (err.message.startsWith("jwt issuer invalid")) {
			return new AuthError(AuthErrorKind.InvalidIssuer, "Token issuer is invalid");
		}
		return new AuthError(AuthErrorKind.InvalidToken, `Invalid token: ${err.message}`);
	}

	private async fetchPublicKeys(): Promise<PublicKeySet> {
		try {
			const signingKeys = await this.options.keySource.getSigningKeys();
			const keys = new Map<string, string>();
			for (const signingKey of signingKeys) {
				if (signingKey.kid) keys.set(signingKey.kid, signingKey.getPublicKey());
			}
			this.logger.info({ count: keys.size }, "Fetched public keys from Keycloak");
			return keys;
		} catch (err) {
			this.logger.error({ err }, "Failed to fetch public keys");
			throw new AuthError(
				AuthErrorKind.IdentityProviderUnavailable,
				"Failed to fetch Keycloak public keys",
				{},
				{ cause: err }
			);
		}
	}
}
