import { z } from "zod";
import { AuthError, AuthErrorKind, toInternalError } from "@resumeflow/shared/errors";
import type {
	KeycloakRole,
	KeycloakUser,
	UpdateUserInfoDTO,
} from "@resumeflow/shared/types";
import type { Logger } from "@resumeflow/shared/utils";
import type { KeycloakConfig } from "../config";
import type { AdminRequestExecutor, AdminResponse } from "./request-executor";

const userSchema = z
	.object({
		id: z.string(),
		username: z.string(),
		email: z.string().optional(),
		firstName: z.string().optional(),
		lastName: z.string().optional(),
		enabled: z.boolean().optional(),
		attributes: z.record(z.array(z.string())).optional(),
	})
	.passthrough();

const roleSchema = z.object({
	id: z.string().optional(),
	name: z.string(),
	description: z.string().optional(),
	composite: z.boolean().optional(),
	clientRole: z.boolean().optional(),
	containerId: z.string().optional(),
});

export interface RequestContext {
	signal?: AbortSignal;
}

/**
 * User and role management against the Keycloak admin REST API. Every call
 * goes through the retrying executor.
 */
export class KeycloakAdmin {
	private readonly logger: Logger;

	constructor(
		private readonly config: KeycloakConfig,
		private readonly executor: AdminRequestExecutor,
		logger: Logger
	) {
		this.logger = logger.child({ component: "KeycloakAdmin" });
	}

	async getUserInfo(userId: string, ctx: RequestContext = {}): Promise<KeycloakUser> {
		try {
			return await this.fetchUser(userId, ctx);
		} catch (err) {
			throw toInternalError(err, this.logger, "getting user info");
		}
	}

	async updateUserInfo(
		userId: string,
		update: UpdateUserInfoDTO,
		ctx: RequestContext = {}
	): Promise<boolean> {
		try {
			this.logger.info({ userId }, "Updating user info");
			const user = await this.fetchUser(userId, ctx);

			const payload: Partial<KeycloakUser> = {};
			if (update.firstName !== undefined) payload.firstName = update.firstName;
			if (update.lastName !== undefined) payload.lastName = update.lastName;
			if (update.email !== undefined) payload.email = update.email;

			const attributes = { ...user.attributes };
			if (update.phoneNumber !== undefined) {
				attributes.phone_number = [update.phoneNumber];
				payload.attributes = attributes;
			} else if (Object.keys(attributes).length > 0) {
				payload.attributes = attributes;
			}

			if (Object.keys(payload).length === 0) {
				this.logger.warn({ userId }, "No update fields provided");
				return true;
			}

			const resp = await this.executor.executeWithRetry("PUT", this.config.userUrl(userId), {
				body: payload,
				signal: ctx.signal,
			});
			this.expectStatus(resp, [200, 204], `Failed to update user ${userId}`);

			this.logger.info({ userId }, "Updated user info");
			return true;
		} catch (err) {
			throw toInternalError(err, this.logger, "updating user info");
		}
	}

	async addUserAttribute(
		userId: string,
		name: string,
		value: string,
		ctx: RequestContext = {}
	): Promise<boolean> {
		try {
			this.logger.info({ userId, attribute: name }, "Setting user attribute");
			const user = await this.fetchUser(userId, ctx);
			const updated: KeycloakUser = {
				...user,
				attributes: { ...user.attributes, [name]: [value] },
			};

			const resp = await this.executor.executeWithRetry("PUT", this.config.userUrl(userId), {
				body: updated,
				signal: ctx.signal,
			});
			this.expectStatus(resp, [200, 204], `Failed to update user ${userId}`);
			return true;
		} catch (err) {
			throw toInternalError(err, this.logger, "setting user attribute");
		}
	}

	/**
	 * Maps a realm role (no `clientUuid`) or a client role onto the user.
	 * `clientUuid` is the client's internal id, not its clientId.
	 */
	async assignRoleToUser(
		userId: string,
		roleName: string,
		clientUuid?: string,
		ctx: RequestContext = {}
	): Promise<boolean> {
		try {
			this.logger.info({ userId, roleName, clientUuid }, "Assigning role");
			const role = await this.fetchRole(roleName, clientUuid, ctx);

			const resp = await this.executor.executeWithRetry(
				"POST",
				this.mappingUrl(userId, clientUuid),
				{ body: [role], signal: ctx.signal }
			);
			this.expectStatus(resp, [200, 204], `Failed to assign role '${roleName}'`);

			this.logger.info({ userId, roleName }, "Assigned role");
			return true;
		} catch (err) {
			throw toInternalError(err, this.logger, "assigning role");
		}
	}

	async revokeRoleFromUser(
		userId: string,
		roleName: string,
		clientUuid?: string,
		ctx: RequestContext = {}
	): Promise<boolean> {
		try {
			this.logger.info({ userId, roleName, clientUuid }, "Revoking role");
			const role = await this.fetchRole(roleName, clientUuid, ctx);

			const resp = await this.executor.executeWithRetry(
				"DELETE",
				this.mappingUrl(userId, clientUuid),
				{ body: [role], signal: ctx.signal }
			);
			this.expectStatus(resp, [200, 204], `Failed to revoke role '${roleName}'`);

			this.logger.info({ userId, roleName }, "Revoked role");
			return true;
		} catch (err) {
			throw toInternalError(err, this.logger, "revoking role");
		}
	}

	async createRole(
		roleName: string,
		description = "",
		clientUuid?: string,
		ctx: RequestContext = {}
	): Promise<boolean> {
		try {
			const url =
				clientUuid === undefined
					? this.config.realmRolesUrl
					: this.config.clientRolesUrl(clientUuid);
			const resp = await this.executor.executeWithRetry("POST", url, {
				body: { name: roleName, description, composite: false },
				signal: ctx.signal,
			});
			this.expectStatus(resp, [201, 204], `Failed to create role '${roleName}'`);

			this.logger.info({ roleName, clientUuid }, "Created role");
			return true;
		} catch (err) {
			throw toInternalError(err, this.logger, "creating role");
		}
	}

	async deleteUser(userId: string, ctx: RequestContext = {}): Promise<boolean> {
		try {
			const resp = await this.executor.executeWithRetry(
				"DELETE",
				this.config.userUrl(userId),
				{ signal: ctx.signal }
			);
			this.expectStatus(resp, [200, 204], `Failed to delete user ${userId}`);

			this.logger.info({ userId }, "Deleted user");
			return true;
		} catch (err) {
			throw toInternalError(err, this.logger, "deleting user");
		}
	}

	private async fetchUser(userId: string, ctx: RequestContext): Promise<KeycloakUser> {
		const resp = await this.executor.executeWithRetry("GET", this.config.userUrl(userId), {
			signal: ctx.signal,
		});
		return this.parse(userSchema, resp, "user");
	}

	private async fetchRole(
		roleName: string,
		clientUuid: string | undefined,
		ctx: RequestContext
	): Promise<KeycloakRole> {
		const url =
			clientUuid === undefined
				? this.config.realmRoleUrl(roleName)
				: this.config.clientRoleUrl(clientUuid, roleName);
		const resp = await this.executor.executeWithRetry("GET", url, { signal: ctx.signal });
		return this.parse(roleSchema, resp, "role");
	}

	private mappingUrl(userId: string, clientUuid?: string): string {
		return clientUuid === undefined
			? this.config.realmRoleMappingUrl(userId)
			: this.config.clientRoleMappingUrl(userId, clientUuid);
	}

	private parse<S extends z.ZodTypeAny>(
		schema: S,
		resp: AdminResponse,
		what: string
	): z.infer<S> {
		const parsed = schema.safeParse(resp.data);
		if (!parsed.success) {
			throw new AuthError(
				AuthErrorKind.UnexpectedUpstreamError,
				`Keycloak returned an unexpected ${what} representation`,
				{ status: resp.status }
			);
		}
		return parsed.data;
	}

	private expectStatus(resp: AdminResponse, accepted: number[], message: string): void {
		if (!accepted.includes(resp.status)) {
			this.logger.error({ status: resp.status }, message);
			throw new AuthError(AuthErrorKind.UnexpectedUpstreamError, message, {
				status: resp.status,
			});
		}
	}
}
