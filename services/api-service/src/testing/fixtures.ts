import { generateKeyPairSync } from "node:crypto";
import jwt from "jsonwebtoken";
import type { FetchFn } from "../keycloak/admin-token-cache";
import type { SigningKeySource } from "../keycloak/token-verifier";
import type {
	AgentDispatcher,
	LiveKitRoom,
	RoomClient,
} from "../services/interview-service";
import { createKeycloakConfig } from "../config";

export const testKeycloak = createKeycloakConfig({
	baseUrl: "http://keycloak.test",
	realm: "resume-flow",
	clientId: "resume-flow-api",
	clientSecret: "test-secret",
});

export interface TestKey {
	kid: string;
	publicKey: string;
	privateKey: string;
}

export function generateTestKey(kid: string): TestKey {
	const { publicKey, privateKey } = generateKeyPairSync("rsa", {
		modulusLength: 2048,
		publicKeyEncoding: { type: "spki", format: "pem" },
		privateKeyEncoding: { type: "pkcs8", format: "pem" },
	});
	return { kid, publicKey, privateKey };
}

export function nowSeconds(): number {
	return Math.floor(Date.now() / 1000);
}

export function signToken(
	key: TestKey,
	claims: Record<string, unknown> = {},
	header: { kid?: string | null } = {}
): string {
	const now = nowSeconds();
	const payload = {
		sub: "user-123",
		preferred_username: "jdoe",
		email: "jdoe@example.com",
		iss: testKeycloak.issuer,
		aud: testKeycloak.clientId,
		iat: now,
		exp: now + 3600,
		...claims,
	};
	const kid = header.kid === undefined ? key.kid : header.kid;
	return jwt.sign(payload, key.privateKey, {
		algorithm: "RS256",
		...(kid === null ? {} : { keyid: kid }),
	});
}

/** In-memory stand-in for the JWKS endpoint. */
export class FakeKeySource implements SigningKeySource {
	calls = 0;
	failWith: Error | null = null;

	constructor(private keys: TestKey[]) {}

	publish(keys: TestKey[]): void {
		this.keys = keys;
	}

	async getSigningKeys(): Promise<Array<{ kid: string; getPublicKey(): string }>> {
		this.calls += 1;
		if (this.failWith) throw this.failWith;
		return this.keys.map((key) => ({ kid: key.kid, getPublicKey: () => key.publicKey }));
	}
}

export interface RecordedRequest {
	url: string;
	method: string;
	headers: Headers;
	body: string | null;
	signal: AbortSignal | undefined;
	at: number;
}

export type FetchStep = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "content-type": "application/json" },
	});
}

export function emptyResponse(status = 204): Response {
	return new Response(null, { status });
}

/** A JSON response whose body never arrives; it errors once `signal` aborts. */
export function stalledJsonResponse(signal: AbortSignal | undefined): Response {
	const body = new ReadableStream<Uint8Array>({
		start(controller) {
			signal?.addEventListener("abort", () => controller.error(signal.reason), { once: true });
		},
	});
	return new Response(body, { status: 200, headers: { "content-type": "application/json" } });
}

/** An error response that records whether its body was cancelled. */
export function trackedErrorResponse(status: number): { response: Response; cancelled: () => boolean } {
	let cancelled = false;
	const body = new ReadableStream<Uint8Array>({
		cancel() {
			cancelled = true;
		},
	});
	return {
		response: new Response(body, { status, headers: { "content-type": "application/json" } }),
		cancelled: () => cancelled,
	};
}

export function connectionRefused(): never {
	throw new TypeError("fetch failed");
}

/**
 * Fetch stand-in that answers from a routing function and records every
 * request it receives.
 */
export function fakeFetch(route: FetchStep): { fetchImpl: FetchFn; requests: RecordedRequest[] } {
	const requests: RecordedRequest[] = [];
	const fetchImpl: FetchFn = async (input, init) => {
		const url =
			typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
		const body = init?.body;
		const recorded: RecordedRequest = {
			url,
			method: init?.method ?? "GET",
			headers: new Headers(init?.headers),
			body: typeof body === "string" ? body : body instanceof URLSearchParams ? body.toString() : null,
			signal: init?.signal ?? undefined,
			at: Date.now(),
		};
		requests.push(recorded);
		return route(recorded);
	};
	return { fetchImpl, requests };
}

/** In-memory stand-in for LiveKit's room service. */
export class FakeRoomClient implements RoomClient {
	rooms: LiveKitRoom[] = [];
	failWith: Error | null = null;

	async createRoom(options: { name: string }): Promise<LiveKitRoom> {
		if (this.failWith) throw this.failWith;
		const room = { name: options.name, numParticipants: 0, creationTime: nowSeconds() };
		this.rooms.push(room);
		return room;
	}

	async listRooms(names?: string[]): Promise<LiveKitRoom[]> {
		if (this.failWith) throw this.failWith;
		return names ? this.rooms.filter((room) => names.includes(room.name)) : [...this.rooms];
	}

	async deleteRoom(name: string): Promise<void> {
		if (this.failWith) throw this.failWith;
		this.rooms = this.rooms.filter((room) => room.name !== name);
	}
}

export class FakeAgentDispatcher implements AgentDispatcher {
	dispatches: Array<{ roomName: string; agentName: string; metadata?: string }> = [];

	async createDispatch(
		roomName: string,
		agentName: string,
		options: { metadata?: string } = {}
	): Promise<unknown> {
		this.dispatches.push({ roomName, agentName, metadata: options.metadata });
		return { id: `dispatch-${this.dispatches.length}` };
	}
}
