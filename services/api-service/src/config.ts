import { env, envInt, isLogLevel, type LogLevel } from "@resumeflow/shared/utils";

type EnvSource = Record<string, string | undefined>;

export interface KeycloakConfig {
	readonly baseUrl: string;
	readonly realm: string;
	readonly clientId: string;
	readonly clientSecret: string;
	readonly issuer: string;
	readonly jwksUrl: string;
	readonly tokenUrl: string;
	readonly userinfoUrl: string;
	readonly realmRolesUrl: string;
	realmRoleUrl(roleName: string): string;
	realmRoleMappingUrl(userId: string): string;
	userUrl(userId: string): string;
	clientRolesUrl(clientUuid: string): string;
	clientRoleUrl(clientUuid: string, roleName: string): string;
	clientRoleMappingUrl(userId: string, clientUuid: string): string;
	availableClientRolesUrl(userId: string, clientUuid: string): string;
}

export interface KeycloakSettings {
	baseUrl: string;
	realm: string;
	clientId: string;
	clientSecret: string;
}

export function createKeycloakConfig(settings: KeycloakSettings): KeycloakConfig {
	const baseUrl = settings.baseUrl.replace(/\/+$/, "");
	const realm = encodeURIComponent(settings.realm);
	const issuer = `${baseUrl}/realms/${realm}`;
	const admin = `${baseUrl}/admin/realms/${realm}`;
	const seg = encodeURIComponent;

	return Object.freeze({
		baseUrl,
		realm: settings.realm,
		clientId: settings.clientId,
		clientSecret: settings.clientSecret,
		issuer,
		jwksUrl: `${issuer}/protocol/openid-connect/certs`,
		tokenUrl: `${issuer}/protocol/openid-connect/token`,
		userinfoUrl: `${issuer}/protocol/openid-connect/userinfo`,
		realmRolesUrl: `${admin}/roles`,
		realmRoleUrl: (roleName: string) => `${admin}/roles/${seg(roleName)}`,
		realmRoleMappingUrl: (userId: string) =>
			`${admin}/users/${seg(userId)}/role-mappings/realm`,
		userUrl: (userId: string) => `${admin}/users/${seg(userId)}`,
		clientRolesUrl: (clientUuid: string) => `${admin}/clients/${seg(clientUuid)}/roles`,
		clientRoleUrl: (clientUuid: string, roleName: string) =>
			`${admin}/clients/${seg(clientUuid)}/roles/${seg(roleName)}`,
		clientRoleMappingUrl: (userId: string, clientUuid: string) =>
			`${admin}/users/${seg(userId)}/role-mappings/clients/${seg(clientUuid)}`,
		availableClientRolesUrl: (userId: string, clientUuid: string) =>
			`${admin}/users/${seg(userId)}/role-mappings/clients/${seg(clientUuid)}/available`,
	});
}

export interface LiveKitConfig {
	readonly url: string;
	readonly apiKey: string;
	readonly apiSecret: string;
	readonly agentName: string;
}

/** Interview rooms are served only when `LIVEKIT_URL` is set. */
function loadLiveKitConfig(source: EnvSource): LiveKitConfig | undefined {
	if (!source.LIVEKIT_URL) return undefined;
	return Object.freeze({
		url: env("LIVEKIT_URL", undefined, source),
		apiKey: env("LIVEKIT_API_KEY", undefined, source),
		apiSecret: env("LIVEKIT_API_SECRET", undefined, source),
		agentName: env("LIVEKIT_AGENT_NAME", "interviewer", source),
	});
}

export interface AppConfig {
	port: number;
	logLevel: LogLevel;
	apiVersion: string;
	environment: string;
	httpTimeoutMs: number;
	adminMaxRetries: number;
	adminRetryBaseDelayMs: number;
	keycloak: KeycloakConfig;
	livekit: LiveKitConfig | undefined;
}

export function loadConfig(source: EnvSource = process.env): AppConfig {
	const logLevel = env("LOG_LEVEL", "info", source);
	if (!isLogLevel(logLevel)) {
		throw new Error(`Env var LOG_LEVEL has unsupported value "${logLevel}"`);
	}
	const adminMaxRetries = envInt("ADMIN_MAX_RETRIES", 3, source);
	if (adminMaxRetries < 1) {
		throw new Error("Env var ADMIN_MAX_RETRIES must be at least 1");
	}

	return {
		port: envInt("API_PORT", 8000, source),
		logLevel,
		apiVersion: env("API_VERSION", "1.0.0", source),
		environment: env("ENVIRONMENT", "development", source),
		httpTimeoutMs: envInt("HTTP_TIMEOUT_MS", 10_000, source),
		adminMaxRetries,
		adminRetryBaseDelayMs: envInt("ADMIN_RETRY_BASE_DELAY_MS", 1000, source),
		keycloak: createKeycloakConfig({
			baseUrl: env("KEYCLOAK_URL", "http://localhost:8080", source),
			realm: env("KEYCLOAK_REALM", "resume-flow", source),
			clientId: env("KEYCLOAK_CLIENT_ID", "resume-flow-api", source),
			clientSecret: env("KEYCLOAK_CLIENT_SECRET", "", source),
		}),
		livekit: loadLiveKitConfig(source),
	};
}
