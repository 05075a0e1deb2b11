import type { Server } from "node:http";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { silentLogger } from "@resumeflow/shared/utils";
import { createApp } from "./app";
import { TokenVerifier } from "./keycloak/token-verifier";
import { AdminTokenCache } from "./keycloak/admin-token-cache";
import { AdminRequestExecutor } from "./keycloak/request-executor";
import { KeycloakAdmin } from "./keycloak/keycloak-admin";
import { AuthService } from "./services/auth-service";
import { InterviewService } from "./services/interview-service";
import {
	FakeAgentDispatcher,
	FakeKeySource,
	FakeRoomClient,
	emptyResponse,
	fakeFetch,
	generateTestKey,
	jsonResponse,
	nowSeconds,
	signToken,
	testKeycloak,
	type FetchStep,
	type TestKey,
} from "./testing/fixtures";

let key: TestKey;
let server: Server;
let baseUrl: string;
let keySource: FakeKeySource;
let keycloakRoute: FetchStep;
let rooms: FakeRoomClient;
let agents: FakeAgentDispatcher;

const ADMIN = "http://keycloak.test/admin/realms/resume-flow";

beforeAll(async () => {
	key = generateTestKey("key-1");
	keySource = new FakeKeySource([key]);
	const logger = silentLogger();
	const keycloak = fakeFetch((req) => keycloakRoute(req));
	rooms = new FakeRoomClient();
	agents = new FakeAgentDispatcher();

	const tokens = new AdminTokenCache({
		tokenUrl: testKeycloak.tokenUrl,
		clientId: testKeycloak.clientId,
		clientSecret: testKeycloak.clientSecret,
		timeoutMs: 1000,
		logger,
		fetchImpl: keycloak.fetchImpl,
	});
	const executor = new AdminRequestExecutor({
		tokens,
		logger,
		baseDelayMs: 0,
		fetchImpl: keycloak.fetchImpl,
	});
	const app = createApp({
		verifier: new TokenVerifier({
			issuer: testKeycloak.issuer,
			clientId: testKeycloak.clientId,
			keySource,
			logger,
		}),
		admin: new KeycloakAdmin(testKeycloak, executor, logger),
		authService: new AuthService({
			config: testKeycloak,
			timeoutMs: 1000,
			logger,
			fetchImpl: keycloak.fetchImpl,
		}),
		interviews: new InterviewService({
			config: {
				url: "wss://rooms.test",
				apiKey: "test-key",
				apiSecret: "test-secret",
				agentName: "interviewer",
			},
			rooms,
			agents,
			logger,
		}),
		logger,
		info: { version: "1.2.3", environment: "test" },
	});

	await new Promise<void>((resolve) => {
		server = app.listen(0, "127.0.0.1", () => resolve());
	});
	const address = server.address();
	if (!address || typeof address === "string") throw new Error("server did not bind a TCP port");
	baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
	await new Promise<void>((resolve, reject) =>
		server.close((err) => (err ? reject(err) : resolve()))
	);
});

beforeEach(() => {
	keySource.failWith = null;
	rooms.rooms = [];
	rooms.failWith = null;
	agents.dispatches = [];
	keycloakRoute = (req) =>
		req.url === testKeycloak.tokenUrl
			? jsonResponse({ access_token: "admin-token" })
			: jsonResponse({ error: "unexpected" }, 500);
});

function call(path: string, init: RequestInit & { token?: string } = {}) {
	const { token, ...rest } = init;
	const headers = new Headers(rest.headers);
	if (token) headers.set("Authorization", `Bearer ${token}`);
	if (rest.body) headers.set("Content-Type", "application/json");
	return fetch(`${baseUrl}${path}`, { ...rest, headers });
}

const adminToken = () => signToken(key, { realm_access: { roles: ["admin"] } });

describe("public routes", () => {
	it("reports health", async () => {
		const res = await call("/health");
		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ status: "healthy", version: "1.2.3", environment: "test" });
	});

	it("answers unknown paths with 404", async () => {
		const res = await call("/nowhere");
		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({ error: "not_found" });
	});
});

describe("GET /auth/me", () => {
	it("requires a bearer token", async () => {
		const res = await call("/auth/me");
		expect(res.status).toBe(401);
		expect(res.headers.get("www-authenticate")).toBe("Bearer");
		expect(await res.json()).toEqual({ error: "missing_token" });
	});

	it("returns the caller's identity", async () => {
		const token = signToken(key, {
			realm_access: { roles: ["user"] },
			resource_access: { "resume-flow-api": { roles: ["editor"] } },
		});
		const res = await call("/auth/me", { token });

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({
			sub: "user-123",
			preferred_username: "jdoe",
			email: "jdoe@example.com",
			email_verified: null,
			realm_access: { roles: ["user"] },
			resource_access: { "resume-flow-api": { roles: ["editor"] } },
		});
	});

	it("rejects an expired token with a bearer challenge", async () => {
		const res = await call("/auth/me", { token: signToken(key, { exp: nowSeconds() - 1 }) });

		expect(res.status).toBe(401);
		expect(res.headers.get("www-authenticate")).toBe('Bearer error="invalid_token"');
		expect(await res.json()).toEqual({ error: "token_expired", message: "Token has expired" });
	});

	it("answers 503 when the signing keys cannot be fetched", async () => {
		const coldKey = generateTestKey("key-cold");
		keySource.failWith = new Error("ECONNREFUSED");

		const res = await call("/auth/me", { token: signToken(coldKey) });

		expect(res.status).toBe(503);
		expect(await res.json()).toEqual({
			error: "identity_provider_unavailable",
			message: "Authentication server is currently unavailable. Please try again later.",
		});
	});
});

describe("token info", () => {
	it("returns the verified claims", async () => {
		const res = await call("/auth/tokens/info", { token: signToken(key, { sub: "claims-user" }) });
		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({ sub: "claims-user", aud: "resume-flow-api" });
	});

	it("marks the old path as deprecated", async () => {
		const res = await call("/auth/token-info", { token: signToken(key) });
		expect(res.status).toBe(200);
		expect(res.headers.get("deprecation")).toBe("true");
	});
});

describe("POST /auth/refresh", () => {
	it("requires a refresh token", async () => {
		const res = await call("/auth/refresh", { method: "POST", body: JSON.stringify({}) });
		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: "missing_refresh_token" });
	});

	it("returns the refreshed token set", async () => {
		keycloakRoute = () =>
			jsonResponse({ access_token: "fresh", refresh_token: "next", expires_in: 300 });

		const res = await call("/auth/refresh", {
			method: "POST",
			body: JSON.stringify({ refresh_token: "old" }),
		});

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({
			access_token: "fresh",
			refresh_token: "next",
			token_type: "Bearer",
			expires_in: 300,
		});
	});

	it("answers 400 to a malformed JSON body", async () => {
		const res = await call("/auth/refresh", { method: "POST", body: "{not json" });

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: "entity.parse.failed" });
	});

	it("answers 401 when Keycloak rejects the refresh token", async () => {
		keycloakRoute = () => jsonResponse({ error: "invalid_grant" }, 400);

		const res = await call("/auth/refresh", {
			method: "POST",
			body: JSON.stringify({ refresh_token: "stale" }),
		});

		expect(res.status).toBe(401);
		expect(await res.json()).toMatchObject({ error: "token_refresh_failed" });
	});
});

describe("admin routes", () => {
	it("forbids callers without the admin role", async () => {
		const token = signToken(key, { realm_access: { roles: ["user"] } });
		const res = await call("/admin/users/user-1", { token });

		expect(res.status).toBe(403);
		expect(await res.json()).toEqual({
			error: "insufficient_role",
			message: "Required role(s): admin",
			requiredRoles: ["admin"],
		});
	});

	it("returns a user for an admin", async () => {
		keycloakRoute = (req) =>
			req.url === testKeycloak.tokenUrl
				? jsonResponse({ access_token: "admin-token" })
				: jsonResponse({ id: "user-1", username: "jdoe" });

		const res = await call("/admin/users/user-1", { token: adminToken() });

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ id: "user-1", username: "jdoe" });
	});

	it("maps a missing user to 404", async () => {
		keycloakRoute = (req) =>
			req.url === testKeycloak.tokenUrl
				? jsonResponse({ access_token: "admin-token" })
				: jsonResponse({ error: "User not found" }, 404);

		const res = await call("/admin/users/ghost", { token: adminToken() });

		expect(res.status).toBe(404);
		expect(await res.json()).toMatchObject({ error: "resource_not_found" });
	});

	it("maps a Keycloak server error to 502", async () => {
		const res = await call("/admin/users/user-1", { token: adminToken() });

		expect(res.status).toBe(502);
		expect(await res.json()).toMatchObject({ error: "upstream_server_error" });
	});

	it("answers 401 when Keycloak keeps rejecting the admin token", async () => {
		keycloakRoute = (req) =>
			req.url === testKeycloak.tokenUrl
				? jsonResponse({ access_token: "admin-token" })
				: jsonResponse({ error: "unauthorized" }, 401);

		const res = await call("/admin/users/user-1", { token: adminToken() });

		expect(res.status).toBe(401);
		expect(res.headers.get("www-authenticate")).toBe("Bearer");
		expect(await res.json()).toEqual({
			error: "token_refresh_failed",
			message: "Admin token was rejected after all retries",
		});
	});

	it("rejects a malformed JSON update without calling Keycloak", async () => {
		const calls: string[] = [];
		keycloakRoute = (req) => {
			calls.push(req.url);
			return jsonResponse({ access_token: "admin-token" });
		};

		const res = await call("/admin/users/user-1", {
			method: "PATCH",
			token: adminToken(),
			body: '{"firstName":',
		});

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: "entity.parse.failed" });
		expect(calls).toEqual([]);
	});

	it("validates profile updates", async () => {
		const res = await call("/admin/users/user-1", {
			method: "PATCH",
			token: adminToken(),
			body: JSON.stringify({ email: "not-an-email" }),
		});

		expect(res.status).toBe(400);
		expect(await res.json()).toMatchObject({
			error: "invalid_update",
			issues: [{ path: "email" }],
		});
	});

	it("updates a profile", async () => {
		keycloakRoute = (req) => {
			if (req.url === testKeycloak.tokenUrl) return jsonResponse({ access_token: "admin-token" });
			return req.method === "GET"
				? jsonResponse({ id: "user-1", username: "jdoe" })
				: emptyResponse(204);
		};

		const res = await call("/admin/users/user-1", {
			method: "PATCH",
			token: adminToken(),
			body: JSON.stringify({ firstName: "John" }),
		});

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ success: true });
	});

	it("assigns and revokes roles", async () => {
		const calls: string[] = [];
		keycloakRoute = (req) => {
			if (req.url === testKeycloak.tokenUrl) return jsonResponse({ access_token: "admin-token" });
			calls.push(`${req.method} ${req.url}`);
			return req.method === "GET" ? jsonResponse({ name: "premium" }) : emptyResponse(204);
		};

		const assigned = await call("/admin/users/user-1/roles", {
			method: "POST",
			token: adminToken(),
			body: JSON.stringify({ roleName: "premium" }),
		});
		const revoked = await call("/admin/users/user-1/roles/premium?clientUuid=client-uuid", {
			method: "DELETE",
			token: adminToken(),
		});

		expect(assigned.status).toBe(201);
		expect(revoked.status).toBe(200);
		expect(calls).toEqual([
			`GET ${ADMIN}/roles/premium`,
			`POST ${ADMIN}/users/user-1/role-mappings/realm`,
			`GET ${ADMIN}/clients/client-uuid/roles/premium`,
			`DELETE ${ADMIN}/users/user-1/role-mappings/clients/client-uuid`,
		]);
	});
});

describe("interview routes", () => {
	const startBody = JSON.stringify({ resume: "Five years of TypeScript", job_description: "Backend" });

	it("requires a bearer token", async () => {
		const res = await call("/interviews/rooms", { method: "POST" });
		expect(res.status).toBe(401);
		expect(await res.json()).toEqual({ error: "missing_token" });
	});

	it("creates a room for the caller", async () => {
		const res = await call("/interviews/rooms", { method: "POST", token: signToken(key) });

		expect(res.status).toBe(201);
		expect(await res.json()).toMatchObject({
			room_name: expect.stringMatching(/^interview_user-123_jdoe_\d{8}_\d{6}$/),
			token: expect.any(String),
			websocket_url: "wss://rooms.test",
			status: "active",
		});
		expect(rooms.rooms).toHaveLength(1);
	});

	it("lists only the caller's rooms", async () => {
		rooms.rooms = [
			{ name: "interview_user-123_jdoe_1", numParticipants: 1, creationTime: 100 },
			{ name: "interview_user-999_mallory_1", numParticipants: 0, creationTime: 200 },
		];

		const res = await call("/interviews/rooms?limit=5", { token: signToken(key) });

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({
			data: [
				{
					id: "interview_user-123_jdoe_1",
					room_name: "interview_user-123_jdoe_1",
					num_participants: 1,
					created_at: "1970-01-01T00:01:40.000Z",
				},
			],
			total: 1,
			limit: 5,
			offset: 0,
		});
	});

	it("starts the interviewer in an owned room", async () => {
		rooms.rooms = [{ name: "interview_user-123_jdoe_1", numParticipants: 1, creationTime: 100 }];

		const res = await call("/interviews/rooms/interview_user-123_jdoe_1/start", {
			method: "POST",
			token: signToken(key),
			body: startBody,
		});

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({
			message: "AI interviewer started in room interview_user-123_jdoe_1.",
			room_id: "interview_user-123_jdoe_1",
			room_name: "interview_user-123_jdoe_1",
		});
		expect(agents.dispatches).toHaveLength(1);
	});

	it("requires the resume and job description", async () => {
		const res = await call("/interviews/rooms/interview_user-123_jdoe_1/start", {
			method: "POST",
			token: signToken(key),
			body: JSON.stringify({ resume: "only a resume" }),
		});

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: "missing_required_fields" });
	});

	it("answers 404 for another user's room", async () => {
		rooms.rooms = [{ name: "interview_user-999_mallory_1", numParticipants: 1, creationTime: 100 }];

		const res = await call("/interviews/rooms/interview_user-999_mallory_1", {
			token: signToken(key),
		});

		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({
			error: "resource_not_found",
			message: "Interview room with id interview_user-999_mallory_1 not found",
		});
	});

	it("ends an owned room", async () => {
		rooms.rooms = [{ name: "interview_user-123_jdoe_1", numParticipants: 0, creationTime: 100 }];

		const res = await call("/interviews/rooms/interview_user-123_jdoe_1", {
			method: "DELETE",
			token: signToken(key),
		});

		expect(res.status).toBe(204);
		expect(rooms.rooms).toEqual([]);
	});

	it("answers 500 with an error id when LiveKit fails", async () => {
		rooms.failWith = new Error("connect ECONNREFUSED");

		const res = await call("/interviews/rooms", { method: "POST", token: signToken(key) });

		expect(res.status).toBe(500);
		expect(await res.json()).toEqual({
			error: "internal_error",
			message: expect.stringMatching(/^Unexpected error \(Error ID: [0-9a-f-]{36}\)$/),
			errorId: expect.stringMatching(/^[0-9a-f-]{36}$/),
		});
	});

	it("keeps the old room creation path as a deprecated alias", async () => {
		const res = await call("/interviews/start-room", { method: "POST", token: signToken(key) });

		expect(res.status).toBe(201);
		expect(res.headers.get("deprecation")).toBe("true");
	});

	it("takes the room from the body on the old start path", async () => {
		rooms.rooms = [{ name: "interview_user-123_jdoe_1", numParticipants: 1, creationTime: 100 }];

		const res = await call("/interviews/start-interviewer", {
			method: "POST",
			token: signToken(key),
			body: JSON.stringify({
				room_name: "interview_user-123_jdoe_1",
				resume: "r",
				job_description: "j",
			}),
		});

		expect(res.status).toBe(200);
		expect(res.headers.get("deprecation")).toBe("true");
		expect(agents.dispatches.map((d) => d.roomName)).toEqual(["interview_user-123_jdoe_1"]);
	});
});
