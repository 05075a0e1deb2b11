import { AuthError, AuthErrorKind } from "@resumeflow/shared/errors";
import type { Logger } from "@resumeflow/shared/utils";
import type { AdminTokenCache, FetchFn } from "./admin-token-cache";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface ExecuteOptions {
	body?: unknown;
	signal?: AbortSignal;
}

export interface AdminResponse {
	status: number;
	data?: unknown;
}

export interface AdminRequestExecutorOptions {
	tokens: AdminTokenCache;
	logger: Logger;
	maxRetries?: number;
	baseDelayMs?: number;
	timeoutMs?: number;
	fetchImpl?: FetchFn;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(signal.reason);
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			reject(signal?.reason);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Runs Keycloak admin REST calls with the service-account token.
 *
 * Per call, at most `maxRetries` sequential attempts:
 * - 2xx returns
 * - 401/403 invalidates the token and retries at once
 * - 404, 5xx and other statuses fail without retrying
 * - network errors and timeouts back off `baseDelayMs * 2^attempt`
 */
export class AdminRequestExecutor {
	readonly maxRetries: number;
	readonly baseDelayMs: number;
	readonly timeoutMs: number;
	private readonly tokens: AdminTokenCache;
	private readonly logger: Logger;
	private readonly fetchImpl: FetchFn;

	constructor(options: AdminRequestExecutorOptions) {
		this.tokens = options.tokens;
		this.logger = options.logger.child({ component: "AdminRequestExecutor" });
		this.maxRetries = options.maxRetries ?? 3;
		this.baseDelayMs = options.baseDelayMs ?? 1000;
		this.timeoutMs = options.timeoutMs ?? 10_000;
		this.fetchImpl = options.fetchImpl ?? fetch;
	}

	async executeWithRetry(
		method: HttpMethod,
		url: string,
		options: ExecuteOptions = {}
	): Promise<AdminResponse> {
		const { body, signal } = options;

		for (let attempt = 0; attempt < this.maxRetries; attempt++) {
			signal?.throwIfAborted();
			const lastAttempt = attempt === this.maxRetries - 1;
			const token = await this.tokens.getToken();

			let resp: Response;
			let text = "";
			try {
				resp = await this.fetchImpl(url, {
					method,
					headers: {
						Authorization: `Bearer ${token}`,
						"Content-Type": "application/json",
					},
					body: body === undefined ? undefined : JSON.stringify(body),
					signal: this.attemptSignal(signal),
				});
				// The attempt's timeout covers the body as well as the headers.
				if (resp.ok && isJson(resp)) text = await resp.text();
				else await resp.body?.cancel();
			} catch (err) {
				if (signal?.aborted) throw signal.reason;
				this.logger.warn(
					{ err, method, url, attempt: attempt + 1, maxRetries: this.maxRetries },
					"Keycloak connection error"
				);
				if (lastAttempt) break;
				await sleep(this.baseDelayMs * 2 ** attempt, signal);
				continue;
			}

			if (resp.ok) {
				return { status: resp.status, data: parseJson(text, resp.status) };
			}

			const status = resp.status;
			this.logger.error({ method, url, status }, "Keycloak API error");

			if (status === 401 || status === 403) {
				this.tokens.invalidateToken();
				if (!lastAttempt) {
					this.logger.warn(
						{ attempt: attempt + 1, maxRetries: this.maxRetries },
						"Admin token rejected, clearing cache and retrying"
					);
					continue;
				}
				this.logger.error("Token refresh failed after all retries");
				throw new AuthError(
					AuthErrorKind.TokenRefreshFailed,
					"Admin token was rejected after all retries",
					{ status }
				);
			}
			if (status === 404) {
				throw new AuthError(AuthErrorKind.ResourceNotFound, "Resource not found", {
					status,
				});
			}
			if (status >= 500) {
				throw new AuthError(
					AuthErrorKind.UpstreamServerError,
					`Keycloak server error (${status})`,
					{ status }
				);
			}
			throw new AuthError(
				AuthErrorKind.UnexpectedUpstreamError,
				`Keycloak error (${status})`,
				{ status }
			);
		}

		this.logger.error({ method, url }, "All retry attempts failed");
		throw new AuthError(
			AuthErrorKind.IdentityProviderUnavailable,
			"All retry attempts failed"
		);
	}

	private attemptSignal(caller?: AbortSignal): AbortSignal {
		const timeout = AbortSignal.timeout(this.timeoutMs);
		return caller ? AbortSignal.any([caller, timeout]) : timeout;
	}
}

function isJson(resp: Response): boolean {
	return (resp.headers.get("content-type") || "").includes("application/json");
}

function parseJson(text: string, status: number): unknown {
	if (text.trim() === "") return undefined;
	try {
		return JSON.parse(text);
	} catch (err) {
		throw new AuthError(
			AuthErrorKind.UnexpectedUpstreamError,
			"Keycloak returned malformed JSON",
			{ status },
			{ cause: err }
		);
	}
}
