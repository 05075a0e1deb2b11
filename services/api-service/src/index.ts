import "dotenv/config";
import jwksRsa from "jwks-rsa";
import { AgentDispatchClient, RoomServiceClient } from "livekit-server-sdk";
import { createLogger } from "@resumeflow/shared/utils";
import { loadConfig } from "./config";
import { TokenVerifier } from "./keycloak/token-verifier";
import { AdminTokenCache } from "./keycloak/admin-token-cache";
import { AdminRequestExecutor } from "./keycloak/request-executor";
import { KeycloakAdmin } from "./keycloak/keycloak-admin";
import { AuthService } from "./services/auth-service";
import { InterviewService } from "./services/interview-service";
import { createApp } from "./app";

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, serviceName: "api-service" });
const { keycloak } = config;

// One instance of each collaborator for the life of the process.
const jwksClient = jwksRsa({
	jwksUri: keycloak.jwksUrl,
	cache: false,
	rateLimit: false,
	timeout: config.httpTimeoutMs,
});

const verifier = new TokenVerifier({
	issuer: keycloak.issuer,
	clientId: keycloak.clientId,
	keySource: jwksClient,
	logger,
});

const tokens = new AdminTokenCache({
	tokenUrl: keycloak.tokenUrl,
	clientId: keycloak.clientId,
	clientSecret: keycloak.clientSecret,
	timeoutMs: config.httpTimeoutMs,
	logger,
});

const executor = new AdminRequestExecutor({
	tokens,
	logger,
	maxRetries: config.adminMaxRetries,
	baseDelayMs: config.adminRetryBaseDelayMs,
	timeoutMs: config.httpTimeoutMs,
});

const { livekit } = config;
const interviews = livekit
	? new InterviewService({
			config: livekit,
			rooms: new RoomServiceClient(livekit.url, livekit.apiKey, livekit.apiSecret),
			agents: new AgentDispatchClient(livekit.url, livekit.apiKey, livekit.apiSecret),
			logger,
		})
	: undefined;

const app = createApp({
	verifier,
	admin: new KeycloakAdmin(keycloak, executor, logger),
	authService: new AuthService({ config: keycloak, timeoutMs: config.httpTimeoutMs, logger }),
	interviews,
	logger,
	info: { version: config.apiVersion, environment: config.environment },
});

app.listen(config.port, () =>
	logger.info(
		{ port: config.port, realm: keycloak.realm, interviews: interviews !== undefined },
		"api-service listening"
	)
);
