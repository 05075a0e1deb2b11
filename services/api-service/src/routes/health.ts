import { Router } from "express";

export interface HealthInfo {
	version: string;
	environment: string;
}

export function healthRouter(info: HealthInfo & { interviews: boolean }): Router {
	const router = Router();

	router.get("/health", (_req, res) =>
		res.json({ status: "healthy", version: info.version, environment: info.environment })
	);

	router.get("/", (_req, res) =>
		res.json({
			message: "Resume Flow API",
			version: info.version,
			environment: info.environment,
			endpoints: {
				auth: ["/auth/me", "/auth/refresh", "/auth/tokens/info"],
				admin: ["/admin/users/:userId", "/admin/users/:userId/roles"],
				...(info.interviews
					? { interviews: ["/interviews/rooms", "/interviews/rooms/:roomId/start"] }
					: {}),
				public: ["/health", "/"],
			},
		})
	);

	return router;
}
